import type { IdentifierGenerator } from "../core";
import { SchemaRegistry, TypeTagRegistry } from "../schema";
import type { AliasOverrides, ClassDefinition, FieldDeclarations, SchemaClass, TypeRef } from "../schema";
import { SerializerRegistry } from "../serializers/serializer-registry";
import type { Serializer } from "../serializers/serializer";

/**
 * Process-wide type tag registry. Type identity is global, so every loader
 * created without its own registries shares this one.
 */
export const sharedTypeTags = new TypeTagRegistry();

/** Process-wide schema registry, tagging into sharedTypeTags */
export const sharedSchemas = new SchemaRegistry({ tags: sharedTypeTags });

/** Process-wide serializer registry, pre-populated with the built-ins */
export const sharedSerializers = new SerializerRegistry();

/**
 * Register a class layout with the shared schema registry.
 *
 * @example
 * ```ts
 * registerClass(Player, { name: Types.str, score: Types.int }, { score: 9 });
 * ```
 */
export function registerClass(
  type: SchemaClass,
  fields?: FieldDeclarations,
  aliasOverrides?: AliasOverrides
): ClassDefinition {
  return sharedSchemas.register(type, fields, aliasOverrides);
}

/**
 * Register a serializer with the shared serializer registry.
 */
export function registerSerializer<T>(type: TypeRef<T>, serializer: Serializer<T>): void {
  sharedSerializers.register(type, serializer);
}

/**
 * Swap the shared tag generator. Existing tags are kept until
 * rebuildTagRegistry() is called; forgetting it leaves old and new
 * tags mixed in one registry.
 */
export function setTagGenerator(generator: IdentifierGenerator<TypeRef>): void {
  sharedTypeTags.setGenerator(generator);
}

/**
 * Regenerate every auto-generated shared tag under the current generator.
 * Explicitly assigned tags are kept.
 */
export function rebuildTagRegistry(): void {
  sharedTypeTags.rebuild();
}
