import { readFile, writeFile } from "node:fs/promises";
import {
  BinaryPrimitives,
  ByteReader,
  ByteWriter,
  FileAccessError,
  InvalidValueError,
  MalformedStreamError,
  UnknownTypeTagError,
  UnregisteredTypeError,
} from "../core";
import {
  accepts,
  describeValue,
  isClass,
  isTypeRef,
  resolveType,
  typeName,
} from "../schema";
import type { BuiltinType, SchemaClass, SchemaRegistry, TypeRef, TypeTagRegistry } from "../schema";
import { sharedSchemas, sharedSerializers } from "../registration/registration";
import { SchemaSerializer } from "../serializers/schema-serializer";
import type { SerializerRegistry } from "../serializers/serializer-registry";
import type { DeserializeOptions, SerializeOptions, Serializer } from "../serializers/serializer";

/**
 * Configuration for a Loader
 */
export interface LoaderConfig {
  /** Serializers to dispatch to (default: the shared registry) */
  serializers?: SerializerRegistry;
  /** Class Definitions for the schema-driven fallback (default: the shared registry) */
  schemas?: SchemaRegistry;
  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Decode options for self-describing streams, where the tag names the type.
 */
export type TaggedDeserializeOptions = DeserializeOptions & { tagging: true };

/** Anything the loader can decode from */
export type ByteSource = Uint8Array | ByteReader;

/**
 * Dispatch engine: picks the serializer for every value of an object graph
 * and handles the optional type tag of the top-level value.
 *
 * Resolution order for a type: a serializer registered for it (bespoke or
 * built-in), then the schema-driven serializer if the type has a Class
 * Definition, otherwise UnregisteredTypeError.
 *
 * Encoding recurses once per nesting level and has no cycle detection:
 * a value graph that references itself never terminates.
 *
 * @example
 * ```ts
 * const loader = new Loader();
 *
 * loader.serialize(1); // 00 00 00 01
 * loader.deserialize(new Uint8Array([0, 0, 0, 0]), Types.int); // 0
 *
 * registerClass(Point, { x: Types.int, y: Types.int });
 * const bytes = loader.serialize(point, { tagging: true });
 * const copy = loader.deserialize(bytes, { tagging: true }); // Point
 * ```
 */
export class Loader {
  readonly serializers: SerializerRegistry;
  readonly schemas: SchemaRegistry;
  /** The registry the schemas tag into */
  readonly tags: TypeTagRegistry;

  private readonly config: { debug: boolean };
  private readonly schemaSerializer = new SchemaSerializer();

  constructor(config: LoaderConfig = {}) {
    this.serializers = config.serializers ?? sharedSerializers;
    this.schemas = config.schemas ?? sharedSchemas;
    this.tags = this.schemas.tags;
    this.config = {
      debug: config.debug ?? false,
    };
  }

  /**
   * Register a serializer for a type. Last registration wins.
   */
  register<T>(type: TypeRef<T>, serializer: Serializer<T>): void {
    this.serializers.register(type, serializer);
    this.log(`Registered serializer for ${typeName(type)}`);
  }

  /**
   * Returns the serializer responsible for a type.
   * @throws UnregisteredTypeError when neither a serializer nor a schema exists
   */
  resolveSerializer(type: TypeRef): Serializer {
    const serializer = this.serializers.get(type);
    if (serializer) return serializer;

    if (isClass(type) && this.schemas.has(type)) {
      this.log(`Falling back to schema serializer for ${typeName(type)}`);
      return this.schemaSerializer;
    }

    throw new UnregisteredTypeError(typeName(type));
  }

  /**
   * Encode a value.
   *
   * The type is the value's exact runtime type unless `options.type` forces
   * one. With `options.tagging`, the payload is prefixed by the type's tag
   * (u16, big-endian); nested values are never tagged this way.
   */
  serialize(value: unknown, options: SerializeOptions = {}): Uint8Array {
    const type = options.type ?? resolveType(value);
    if (type === undefined) {
      throw new UnregisteredTypeError(describeValue(value));
    }
    if (options.type !== undefined && !accepts(value, options.type)) {
      throw new InvalidValueError(`Cannot encode ${describeValue(value)} ${this.preview(value)} as ${typeName(options.type)}`);
    }

    const serializer = this.resolveSerializer(type);
    const payload = serializer.encode(this, value, { ...options, type });

    if (!options.tagging) return payload;

    if (this.tags.isStale) {
      this.log("Type tag registry is stale: rebuild() it after changing the generator");
    }
    return new ByteWriter()
      .write(BinaryPrimitives.u16, this.tags.tagOf(type))
      .writeBytes(payload)
      .toBytes();
  }

  /**
   * Decode a value of a known type.
   */
  deserialize<T extends object>(source: ByteSource, type: SchemaClass<T>, options?: DeserializeOptions): T;
  deserialize<T>(source: ByteSource, type: BuiltinType<T>, options?: DeserializeOptions): T;
  deserialize(source: ByteSource, type: TypeRef, options?: DeserializeOptions): unknown;
  /**
   * Decode a self-describing value: the leading tag names its type.
   */
  deserialize(source: ByteSource, options: TaggedDeserializeOptions): unknown;
  deserialize(
    source: ByteSource,
    typeOrOptions: TypeRef | TaggedDeserializeOptions,
    maybeOptions?: DeserializeOptions
  ): unknown {
    const reader = source instanceof ByteReader ? source : new ByteReader(source);
    return this.decodeFrom(reader, typeOrOptions, maybeOptions);
  }

  /**
   * Read and decode a file.
   * @throws FileAccessError when the file cannot be read
   */
  read<T extends object>(path: string, type: SchemaClass<T>, options?: DeserializeOptions): Promise<T>;
  read<T>(path: string, type: BuiltinType<T>, options?: DeserializeOptions): Promise<T>;
  read(path: string, type: TypeRef, options?: DeserializeOptions): Promise<unknown>;
  read(path: string, options: TaggedDeserializeOptions): Promise<unknown>;
  async read(
    path: string,
    typeOrOptions: TypeRef | TaggedDeserializeOptions,
    maybeOptions?: DeserializeOptions
  ): Promise<unknown> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new FileAccessError("Unable to read file", path, error);
    }

    this.log(`Read ${bytes.byteLength} bytes from ${path}`);
    return this.decodeFrom(new ByteReader(bytes), typeOrOptions, maybeOptions);
  }

  /**
   * Encode a value and write it to a file, replacing its contents.
   * Nothing is written when encoding fails.
   * @throws FileAccessError when the file cannot be written
   */
  async write(path: string, value: unknown, options: SerializeOptions = {}): Promise<void> {
    const bytes = this.serialize(value, options);

    try {
      await writeFile(path, bytes);
    } catch (error) {
      throw new FileAccessError("Unable to write file", path, error);
    }

    this.log(`Wrote ${bytes.byteLength} bytes to ${path}`);
  }

  private decodeFrom(
    reader: ByteReader,
    typeOrOptions: TypeRef | TaggedDeserializeOptions,
    maybeOptions: DeserializeOptions = {}
  ): unknown {
    const options: DeserializeOptions = isTypeRef(typeOrOptions) ? maybeOptions : typeOrOptions;
    let type: TypeRef | undefined = isTypeRef(typeOrOptions) ? typeOrOptions : undefined;

    if (options.tagging) {
      const tag = reader.read(BinaryPrimitives.u16, "type tag");
      const tagged = this.tags.typeOf(tag);
      if (tagged === undefined) {
        throw new UnknownTypeTagError(tag);
      }
      if (type !== undefined && type !== tagged) {
        throw new MalformedStreamError(`Stream is tagged as ${typeName(tagged)}, expected ${typeName(type)}`);
      }
      type = tagged;
    }

    if (type === undefined) {
      throw new TypeError("A target type is required unless tagging is enabled");
    }

    return this.resolveSerializer(type).decode(this, type, reader, options);
  }

  private preview(value: unknown): string {
    const text = typeof value === "string" ? JSON.stringify(value) : String(value);
    return text.length > 32 ? `${text.slice(0, 29)}...` : text;
  }

  /**
   * Debug logging
   */
  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[Loader] ${message}`);
    }
  }
}
