import { BinaryPrimitives, ByteWriter, MalformedStreamError, SchemaNotFoundError, SerializationError } from "../core";
import type { ByteReader } from "../core";
import type { Loader } from "../loader/loader";
import { isClass, resolveType, typeName } from "../schema";
import type { SchemaClass, TypeRef } from "../schema";
import type { DeserializeOptions, SerializeOptions, Serializer } from "./serializer";

/**
 * Default codec for registered classes without a bespoke serializer.
 *
 * Layout, per field in declaration order:
 * ```
 * ┌─────────────┬───────────────────────────────┐
 * │ Field alias │ Field payload (declared type) │
 * │ (u8)        │ (variable)                    │
 * └─────────────┴───────────────────────────────┘
 * ```
 * No count or terminator is written: the decoder reads exactly as many
 * fields as the Class Definition declares and leaves anything after them
 * untouched. Field payloads are never tagged.
 */
export class SchemaSerializer implements Serializer<object> {
  encode(loader: Loader, value: object, options: SerializeOptions): Uint8Array {
    const type = this.targetClass(options.type ?? resolveType(value));
    const definition = loader.schemas.get(type);
    const writer = new ByteWriter();

    for (const field of definition.fields) {
      const fieldValue: unknown = Reflect.get(value, field.name);
      writer.write(BinaryPrimitives.u8, definition.aliasOf(field.name));
      writer.writeBytes(loader.serialize(fieldValue, { type: field.type, context: options.context }));
    }

    return writer.toBytes();
  }

  decode(loader: Loader, type: TypeRef<object>, reader: ByteReader, options: DeserializeOptions): object {
    const target = this.targetClass(type);
    const definition = loader.schemas.get(target);
    // Built without running the constructor; every field is assigned below
    const instance: object = Object.create(target.prototype);
    const seen = new Set<string>();

    for (let i = 0; i < definition.fieldCount; i++) {
      const alias = reader.read(BinaryPrimitives.u8, "field alias");
      const field = definition.fieldOf(alias);
      if (!field) {
        throw new MalformedStreamError(`Unknown field alias ${alias} for ${typeName(target)}`);
      }
      if (seen.has(field.name)) {
        throw new MalformedStreamError(`Field ${field.name} of ${typeName(target)} appears twice`);
      }
      seen.add(field.name);

      const fieldValue = loader.deserialize(reader, field.type, { context: options.context });
      if (!Reflect.set(instance, field.name, fieldValue)) {
        throw new SerializationError(`Cannot assign field ${field.name} of ${typeName(target)}`);
      }
    }

    return instance;
  }

  private targetClass(type: TypeRef | undefined): SchemaClass {
    if (type === undefined) {
      throw new SchemaNotFoundError("undefined");
    }
    if (!isClass(type)) {
      throw new SchemaNotFoundError(typeName(type));
    }
    return type;
  }
}
