import { BinaryPrimitives, ByteWriter, MalformedStreamError } from "../core";
import type { ByteReader } from "../core";
import type { Loader } from "../loader/loader";
import { Types } from "../schema";
import type { BuiltinType, TypeRef } from "../schema";
import type { DeserializeOptions, SerializeOptions, Serializer } from "./serializer";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Nested elements are tagged individually and only carry the caller's context.
 */
function elementOptions(options: SerializeOptions | DeserializeOptions): { tagging: true; context?: Readonly<Record<string, unknown>> } {
  return { tagging: true, context: options.context };
}

/**
 * Boolean as one byte: 0x00 or 0x01.
 */
export class BoolSerializer implements Serializer<boolean> {
  encode(_loader: Loader, value: boolean): Uint8Array {
    return new Uint8Array([value ? 1 : 0]);
  }

  decode(_loader: Loader, _type: TypeRef<boolean>, reader: ByteReader): boolean {
    const byte = reader.read(BinaryPrimitives.u8, "bool");
    if (byte > 1) {
      throw new MalformedStreamError(`Invalid bool byte 0x${byte.toString(16).padStart(2, "0")}`);
    }
    return byte === 1;
  }
}

/**
 * Signed 32-bit integer, big-endian two's complement.
 */
export class IntSerializer implements Serializer<number> {
  encode(_loader: Loader, value: number): Uint8Array {
    return new ByteWriter().write(BinaryPrimitives.i32, value).toBytes();
  }

  decode(_loader: Loader, _type: TypeRef<number>, reader: ByteReader): number {
    return reader.read(BinaryPrimitives.i32, "int");
  }
}

/**
 * IEEE-754 double, big-endian.
 */
export class FloatSerializer implements Serializer<number> {
  encode(_loader: Loader, value: number): Uint8Array {
    return new ByteWriter().write(BinaryPrimitives.f64, value).toBytes();
  }

  decode(_loader: Loader, _type: TypeRef<number>, reader: ByteReader): number {
    return reader.read(BinaryPrimitives.f64, "float");
  }
}

/**
 * UTF-8 string with a u32 byte-length prefix.
 */
export class StringSerializer implements Serializer<string> {
  encode(_loader: Loader, value: string): Uint8Array {
    const bytes = textEncoder.encode(value);
    return new ByteWriter().write(BinaryPrimitives.u32, bytes.byteLength).writeBytes(bytes).toBytes();
  }

  decode(_loader: Loader, _type: TypeRef<string>, reader: ByteReader): string {
    const length = reader.read(BinaryPrimitives.u32, "string length");
    const bytes = reader.readBytes(length, "string");
    try {
      return textDecoder.decode(bytes);
    } catch (error) {
      throw new MalformedStreamError(`Invalid UTF-8 in string: ${error}`);
    }
  }
}

/**
 * Raw bytes with a u32 length prefix. Decoding copies out of the source buffer.
 */
export class BytesSerializer implements Serializer<Uint8Array> {
  encode(_loader: Loader, value: Uint8Array): Uint8Array {
    return new ByteWriter().write(BinaryPrimitives.u32, value.byteLength).writeBytes(value).toBytes();
  }

  decode(_loader: Loader, _type: TypeRef<Uint8Array>, reader: ByteReader): Uint8Array {
    const length = reader.read(BinaryPrimitives.u32, "bytes length");
    return reader.readBytes(length).slice();
  }
}

/**
 * Set as a u32 count followed by tagged elements.
 */
export class SetSerializer implements Serializer<Set<unknown>> {
  encode(loader: Loader, value: Set<unknown>, options: SerializeOptions): Uint8Array {
    const writer = new ByteWriter().write(BinaryPrimitives.u32, value.size);
    for (const item of value) {
      writer.writeBytes(loader.serialize(item, elementOptions(options)));
    }
    return writer.toBytes();
  }

  decode(loader: Loader, _type: TypeRef<Set<unknown>>, reader: ByteReader, options: DeserializeOptions): Set<unknown> {
    const count = reader.read(BinaryPrimitives.u32, "set length");
    const out = new Set<unknown>();
    for (let i = 0; i < count; i++) {
      out.add(loader.deserialize(reader, elementOptions(options)));
    }
    return out;
  }
}

/**
 * Map as a u32 count followed by tagged key/value pairs.
 */
export class MapSerializer implements Serializer<Map<unknown, unknown>> {
  encode(loader: Loader, value: Map<unknown, unknown>, options: SerializeOptions): Uint8Array {
    const writer = new ByteWriter().write(BinaryPrimitives.u32, value.size);
    for (const [key, item] of value) {
      writer.writeBytes(loader.serialize(key, elementOptions(options)));
      writer.writeBytes(loader.serialize(item, elementOptions(options)));
    }
    return writer.toBytes();
  }

  decode(
    loader: Loader,
    _type: TypeRef<Map<unknown, unknown>>,
    reader: ByteReader,
    options: DeserializeOptions
  ): Map<unknown, unknown> {
    const count = reader.read(BinaryPrimitives.u32, "map length");
    const out = new Map<unknown, unknown>();
    for (let i = 0; i < count; i++) {
      const key = loader.deserialize(reader, elementOptions(options));
      out.set(key, loader.deserialize(reader, elementOptions(options)));
    }
    return out;
  }
}

/**
 * Array as a u32 count followed by tagged elements, in index order.
 */
export class ListSerializer implements Serializer<unknown[]> {
  encode(loader: Loader, value: unknown[], options: SerializeOptions): Uint8Array {
    const writer = new ByteWriter().write(BinaryPrimitives.u32, value.length);
    for (const item of value) {
      writer.writeBytes(loader.serialize(item, elementOptions(options)));
    }
    return writer.toBytes();
  }

  decode(loader: Loader, _type: TypeRef<unknown[]>, reader: ByteReader, options: DeserializeOptions): unknown[] {
    const count = reader.read(BinaryPrimitives.u32, "list length");
    const out: unknown[] = [];
    for (let i = 0; i < count; i++) {
      out.push(loader.deserialize(reader, elementOptions(options)));
    }
    return out;
  }
}

/**
 * Codecs every SerializerRegistry starts with.
 */
export function builtinSerializers(): Array<[BuiltinType<unknown>, Serializer]> {
  return [
    [Types.bool, new BoolSerializer()],
    [Types.int, new IntSerializer()],
    [Types.float, new FloatSerializer()],
    [Types.str, new StringSerializer()],
    [Types.bytes, new BytesSerializer()],
    [Types.set, new SetSerializer()],
    [Types.map, new MapSerializer()],
    [Types.list, new ListSerializer()],
  ];
}
