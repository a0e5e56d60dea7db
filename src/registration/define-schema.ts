import type { SchemaClass, SchemaDeclaration, SchemaRegistry } from "../schema";
import { sharedSchemas } from "./registration";

/**
 * Declare a class as a schema in one place.
 *
 * Resolves to the same call as manual registration, so the two styles
 * can be mixed freely. Returns the class to allow inline use.
 *
 * @template C The class being declared
 * @param type Class to register
 * @param declaration Fields in wire order, plus optional alias overrides
 * @param registry Target registry (default: the shared one)
 *
 * @example
 * ```ts
 * class Item {
 *   name = "";
 *   count = 0;
 * }
 *
 * defineSchema(Item, {
 *   fields: { name: Types.str, count: Types.int },
 *   aliases: { count: 20 },
 * });
 * ```
 *
 * @example With a private registry
 * ```ts
 * const schemas = new SchemaRegistry();
 * const Item = defineSchema(class Item { name = ""; }, { fields: { name: Types.str } }, schemas);
 * ```
 */
export function defineSchema<C extends SchemaClass>(
  type: C,
  declaration: SchemaDeclaration,
  registry: SchemaRegistry = sharedSchemas
): C {
  registry.register(type, declaration.fields, declaration.aliases);
  return type;
}
