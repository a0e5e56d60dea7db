import type { ByteReader } from "../core";
import type { Loader } from "../loader/loader";
import type { TypeRef } from "../schema";

/**
 * Call-time options for encoding.
 */
export interface SerializeOptions {
  /** Prefix the top-level payload with its type tag */
  tagging?: boolean;
  /**
   * Encode as this type instead of the value's runtime type.
   * When a serializer is invoked, holds the type being encoded.
   */
  type?: TypeRef;
  /** Free-form data forwarded untouched to every nested serializer call */
  context?: Readonly<Record<string, unknown>>;
}

/**
 * Call-time options for decoding.
 */
export interface DeserializeOptions {
  /** Read a type tag first and decode into the type it names */
  tagging?: boolean;
  /** Free-form data forwarded untouched to every nested serializer call */
  context?: Readonly<Record<string, unknown>>;
}

/**
 * Codec for one type. The only contract a custom serializer must satisfy.
 *
 * Nested values go back through the loader (`loader.serialize` /
 * `loader.deserialize`), which picks the serializer for each of them.
 *
 * @example
 * ```ts
 * class DateSerializer implements Serializer<Date> {
 *   encode(loader: Loader, value: Date, options: SerializeOptions): Uint8Array {
 *     return loader.serialize(value.toISOString(), { context: options.context });
 *   }
 *
 *   decode(loader: Loader, _type: TypeRef<Date>, reader: ByteReader, options: DeserializeOptions): Date {
 *     return new Date(loader.deserialize(reader, Types.str, { context: options.context }));
 *   }
 * }
 *
 * loader.register(Date, new DateSerializer());
 * ```
 */
export interface Serializer<T = unknown> {
  /**
   * Encode a value.
   */
  encode(loader: Loader, value: T, options: SerializeOptions): Uint8Array;

  /**
   * Decode a value, consuming exactly its bytes from the reader.
   */
  decode(loader: Loader, type: TypeRef<T>, reader: ByteReader, options: DeserializeOptions): T;
}
