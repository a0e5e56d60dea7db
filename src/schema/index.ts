/**
 * Schema layer: what the engine knows about types.
 *
 * - Type references (built-in tokens and classes) and runtime type resolution
 * - Class Definitions with their field alias registries
 * - The Schema Registry and the Type Tag Registry
 */

export {
  Types,
  BUILTIN_TYPES,
  accepts,
  describeValue,
  getDeclaredSchema,
  isBuiltinType,
  isClass,
  isInt32,
  isTypeRef,
  resolveType,
  typeName,
} from "./types";
export type {
  AliasOverrides,
  BuiltinName,
  BuiltinType,
  FieldDeclarations,
  SchemaClass,
  SchemaDeclaration,
  TypeRef,
} from "./types";
export { ClassDefinition, FIELD_ALIAS_BASE, FIELD_ALIAS_MAX } from "./class-definition";
export type { FieldDefinition } from "./class-definition";
export { SchemaRegistry } from "./schema-registry";
export type { SchemaRegistryOptions } from "./schema-registry";
export { TypeTagRegistry, TYPE_TAG_BASE, TYPE_TAG_MAX } from "./type-tag-registry";
export type { TypeTagRegistryOptions } from "./type-tag-registry";
