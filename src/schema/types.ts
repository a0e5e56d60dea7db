/**
 * Names of the built-in wire types.
 */
export type BuiltinName = "bool" | "int" | "float" | "str" | "bytes" | "set" | "map" | "list";

/**
 * Token standing for a built-in type.
 * @template T The value type the token decodes to (phantom)
 */
export interface BuiltinType<T> {
  readonly kind: "builtin";
  readonly name: BuiltinName;
  /** Phantom marker for inference, never set */
  readonly __value?: T;
}

/**
 * Any class whose instances can be described by a schema or a bespoke serializer.
 */
export type SchemaClass<T extends object = object> = abstract new (...args: never[]) => T;

/**
 * A type as the engine sees it: a built-in token or a class.
 */
export type TypeRef<T = unknown> = BuiltinType<T> | SchemaClass<T & object>;

/**
 * Field name → declared type, in declaration order.
 */
export type FieldDeclarations = Readonly<Record<string, TypeRef>>;

/**
 * Field name → explicit wire alias.
 */
export type AliasOverrides = Readonly<Record<string, number>>;

/**
 * Layout a class can carry on a static `schema` property, picked up by
 * SchemaRegistry.register() and by auto-discovery of nested field types.
 *
 * @example
 * ```ts
 * class Point {
 *   static readonly schema = { fields: { x: Types.int, y: Types.int } };
 *   x = 0;
 *   y = 0;
 * }
 * ```
 */
export interface SchemaDeclaration {
  fields: FieldDeclarations;
  aliases?: AliasOverrides;
}

function builtin<T>(name: BuiltinName): BuiltinType<T> {
  const type: BuiltinType<T> = { kind: "builtin", name };
  return Object.freeze(type);
}

/**
 * Built-in type tokens.
 *
 * JavaScript has a single number type, so `int` and `float` are told apart
 * by value when resolving (see resolveType) or by the declared field type.
 */
export const Types = {
  bool: builtin<boolean>("bool"),
  int: builtin<number>("int"),
  float: builtin<number>("float"),
  str: builtin<string>("str"),
  bytes: builtin<Uint8Array>("bytes"),
  set: builtin<Set<unknown>>("set"),
  map: builtin<Map<unknown, unknown>>("map"),
  list: builtin<unknown[]>("list"),
} as const;

/** Built-ins in their fixed seeding order */
export const BUILTIN_TYPES: ReadonlyArray<BuiltinType<unknown>> = [
  Types.bool,
  Types.int,
  Types.float,
  Types.str,
  Types.bytes,
  Types.set,
  Types.map,
  Types.list,
];

const BUILTIN_CONSTRUCTORS = new Map<unknown, BuiltinType<unknown>>([
  [Uint8Array, Types.bytes],
  [Set, Types.set],
  [Map, Types.map],
  [Array, Types.list],
]);

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export function isClass(value: unknown): value is SchemaClass {
  return typeof value === "function";
}

export function isBuiltinType(value: unknown): value is BuiltinType<unknown> {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "builtin";
}

export function isTypeRef(value: unknown): value is TypeRef {
  return isClass(value) || isBuiltinType(value);
}

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX && !Object.is(value, -0);
}

/**
 * Resolves the exact runtime type of a value.
 *
 * Objects resolve through their own prototype's constructor, so an instance
 * of a subclass never resolves to its parent. Returns undefined for values
 * with no wire representation (undefined, null, bigint, symbol, functions,
 * prototype-less objects).
 */
export function resolveType(value: unknown): TypeRef | undefined {
  switch (typeof value) {
    case "boolean":
      return Types.bool;
    case "number":
      return isInt32(value) ? Types.int : Types.float;
    case "string":
      return Types.str;
    case "object": {
      if (value === null) return undefined;
      const proto: unknown = Object.getPrototypeOf(value);
      if (typeof proto !== "object" || proto === null || !("constructor" in proto)) {
        return undefined;
      }
      const ctor = proto.constructor;
      if (!isClass(ctor)) return undefined;
      return BUILTIN_CONSTRUCTORS.get(ctor) ?? ctor;
    }
    default:
      return undefined;
  }
}

/**
 * Whether `value` can be encoded as `type`.
 * Class types accept instances of subclasses too.
 */
export function accepts(value: unknown, type: TypeRef): boolean {
  if (isClass(type)) {
    return value instanceof type;
  }

  switch (type.name) {
    case "bool":
      return typeof value === "boolean";
    case "int":
      return typeof value === "number" && isInt32(value);
    case "float":
      return typeof value === "number";
    case "str":
      return typeof value === "string";
    case "bytes":
      return value instanceof Uint8Array;
    case "set":
      return value instanceof Set;
    case "map":
      return value instanceof Map;
    case "list":
      return Array.isArray(value);
  }
}

export function typeName(type: TypeRef): string {
  if (isClass(type)) {
    return type.name || "<anonymous class>";
  }
  return type.name;
}

/**
 * Short description of a value for error messages.
 */
export function describeValue(value: unknown): string {
  const type = resolveType(value);
  if (type !== undefined) return typeName(type);
  if (value === null) return "null";
  return typeof value;
}

/**
 * Reads the static `schema` declaration a class carries itself
 * (inherited declarations are ignored). A static getter works too, which
 * lets two classes reference each other.
 */
export function getDeclaredSchema(type: SchemaClass): SchemaDeclaration | undefined {
  if (!Object.hasOwn(type, "schema")) return undefined;
  const declared: unknown = Reflect.get(type, "schema");
  return isSchemaDeclaration(declared) ? declared : undefined;
}

function isSchemaDeclaration(value: unknown): value is SchemaDeclaration {
  if (typeof value !== "object" || value === null || !("fields" in value)) return false;

  const { fields } = value;
  if (typeof fields !== "object" || fields === null) return false;
  if (!Object.values(fields).every(isTypeRef)) return false;

  if (!("aliases" in value)) return true;
  const { aliases } = value;
  if (aliases === undefined) return true;
  return (
    typeof aliases === "object" &&
    aliases !== null &&
    Object.values(aliases).every((alias) => typeof alias === "number")
  );
}
