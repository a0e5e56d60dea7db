import type { TypeRef } from "../schema";
import { builtinSerializers } from "./builtin-serializers";
import type { Serializer } from "./serializer";

export interface SerializerRegistryOptions {
  /** Start with the built-in codecs (default: true) */
  builtins?: boolean;
}

/**
 * Registry mapping types to their serializers.
 *
 * Lookup is by exact type: a serializer registered for a class is not
 * used for its subclasses. Registering a type again replaces its serializer.
 *
 * @example
 * ```ts
 * const serializers = new SerializerRegistry();
 * serializers.register(Date, new DateSerializer());
 * serializers.get(Types.int); // IntSerializer
 * ```
 */
export class SerializerRegistry {
  private serializers = new Map<TypeRef, Serializer>();

  constructor(options: SerializerRegistryOptions = {}) {
    if (options.builtins ?? true) {
      for (const [type, serializer] of builtinSerializers()) {
        this.serializers.set(type, serializer);
      }
    }
  }

  /**
   * Register a serializer for a type. Last registration wins.
   */
  register<T>(type: TypeRef<T>, serializer: Serializer<T>): void {
    this.serializers.set(type, serializer);
  }

  get(type: TypeRef): Serializer | undefined {
    return this.serializers.get(type);
  }

  has(type: TypeRef): boolean {
    return this.serializers.has(type);
  }

  unregister(type: TypeRef): boolean {
    return this.serializers.delete(type);
  }

  types(): TypeRef[] {
    return Array.from(this.serializers.keys());
  }
}
