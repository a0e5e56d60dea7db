import { SchemaNotFoundError, sequentialIdentifiers } from "../core";
import type { IdentifierGenerator } from "../core";
import { ClassDefinition, FIELD_ALIAS_BASE } from "./class-definition";
import { TypeTagRegistry } from "./type-tag-registry";
import { getDeclaredSchema, isClass, typeName } from "./types";
import type { AliasOverrides, FieldDeclarations, SchemaClass, SchemaDeclaration } from "./types";

export interface SchemaRegistryOptions {
  /** Registry receiving a tag for every registered class and field type */
  tags?: TypeTagRegistry;
  /** Alias strategy for new Class Definitions (default: sequentialIdentifiers(FIELD_ALIAS_BASE)) */
  aliasGenerator?: IdentifierGenerator<string>;
}

/**
 * Registry of Class Definitions, one per class.
 *
 * Registering the same class again replaces its definition (last write
 * wins); its type tag is kept.
 *
 * @example
 * ```ts
 * const schemas = new SchemaRegistry();
 *
 * schemas.register(Point, { x: Types.int, y: Types.int });
 * schemas.register(Player, { name: Types.str, position: Point }, { name: 5 });
 *
 * schemas.get(Player).aliasOf("name"); // 5
 * ```
 */
export class SchemaRegistry {
  readonly tags: TypeTagRegistry;
  private definitions = new Map<SchemaClass, ClassDefinition>();
  private registering = new Set<SchemaClass>();
  private aliasGenerator: IdentifierGenerator<string>;

  constructor(options: SchemaRegistryOptions = {}) {
    this.tags = options.tags ?? new TypeTagRegistry();
    this.aliasGenerator = options.aliasGenerator ?? sequentialIdentifiers<string>(FIELD_ALIAS_BASE);
  }

  /**
   * Register a class and its fields.
   *
   * Without `fields`, the class's own static `schema` declaration is used,
   * with `aliasOverrides` taking precedence over its declared aliases; a
   * class with neither is registered with no fields. Field types that are
   * unregistered classes carrying a static declaration are registered too.
   */
  register(type: SchemaClass, fields?: FieldDeclarations, aliasOverrides?: AliasOverrides): ClassDefinition {
    const declaration = this.resolveDeclaration(type, fields, aliasOverrides);

    this.registering.add(type);
    try {
      const definition = new ClassDefinition(type, declaration.fields, declaration.aliases, this.aliasGenerator);

      this.tags.tagOf(type);
      for (const field of definition.fields) {
        this.tags.tagOf(field.type);
      }

      this.definitions.set(type, definition);
      this.discover(definition);
      return definition;
    } finally {
      this.registering.delete(type);
    }
  }

  /**
   * Returns the Class Definition for a type.
   * @throws SchemaNotFoundError when the type was never registered
   */
  get(type: SchemaClass): ClassDefinition {
    const definition = this.definitions.get(type);
    if (!definition) {
      throw new SchemaNotFoundError(typeName(type));
    }
    return definition;
  }

  find(type: SchemaClass): ClassDefinition | undefined {
    return this.definitions.get(type);
  }

  has(type: SchemaClass): boolean {
    return this.definitions.has(type);
  }

  unregister(type: SchemaClass): boolean {
    return this.definitions.delete(type);
  }

  types(): SchemaClass[] {
    return Array.from(this.definitions.keys());
  }

  /**
   * Replace the alias strategy of every current and future Class Definition.
   * Existing aliases stay until rebuildAliases() is called.
   */
  setAliasGenerator(generator: IdentifierGenerator<string>): void {
    this.aliasGenerator = generator;
    for (const definition of this.definitions.values()) {
      definition.aliases.setGenerator(generator);
    }
  }

  /**
   * Regenerate the auto-generated aliases of every Class Definition.
   */
  rebuildAliases(): void {
    for (const definition of this.definitions.values()) {
      definition.aliases.rebuild();
    }
  }

  /**
   * Explicit fields win over the static declaration; explicit aliases are
   * layered over the declared ones.
   */
  private resolveDeclaration(
    type: SchemaClass,
    fields: FieldDeclarations | undefined,
    aliasOverrides: AliasOverrides | undefined
  ): SchemaDeclaration {
    if (fields !== undefined) {
      return { fields, aliases: aliasOverrides };
    }

    const declared = getDeclaredSchema(type);
    if (!declared) {
      return { fields: {}, aliases: aliasOverrides };
    }
    return { fields: declared.fields, aliases: { ...declared.aliases, ...aliasOverrides } };
  }

  private discover(definition: ClassDefinition): void {
    for (const field of definition.fields) {
      const fieldType = field.type;
      if (!isClass(fieldType)) continue;
      if (this.definitions.has(fieldType) || this.registering.has(fieldType)) continue;
      if (getDeclaredSchema(fieldType) === undefined) continue;

      this.register(fieldType);
    }
  }
}
