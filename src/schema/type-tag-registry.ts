import { IdentifierRegistry, TypeTagConflictError, sequentialIdentifiers } from "../core";
import type { IdentifierGenerator } from "../core";
import { BUILTIN_TYPES, typeName } from "./types";
import type { TypeRef } from "./types";

/** First auto-generated type tag */
export const TYPE_TAG_BASE = 1;

/** Type tags are written as a big-endian u16 */
export const TYPE_TAG_MAX = 0xffff;

export interface TypeTagRegistryOptions {
  /** Strategy for auto-generated tags (default: sequentialIdentifiers(TYPE_TAG_BASE)) */
  generator?: IdentifierGenerator<TypeRef>;
  /** Assign tags to the built-in types up front, in fixed order (default: true) */
  builtins?: boolean;
}

/**
 * Global mapping between types and their compact wire tags.
 *
 * Used for self-describing (tagging) streams and for the per-element tags
 * of sets, maps and lists. Tags are generated on first use; built-ins are
 * seeded first so their tags do not depend on which value is encoded first.
 *
 * @example
 * ```ts
 * const tags = new TypeTagRegistry();
 * tags.tagOf(Types.int); // 2
 * tags.tagOf(Player); // 9, first user type
 * tags.typeOf(9); // Player
 * ```
 */
export class TypeTagRegistry extends IdentifierRegistry<TypeRef> {
  constructor(options: TypeTagRegistryOptions = {}) {
    super({
      generator: options.generator ?? sequentialIdentifiers<TypeRef>(TYPE_TAG_BASE),
      min: 0,
      max: TYPE_TAG_MAX,
      describe: typeName,
      conflict: (key, identifier, boundTo) => new TypeTagConflictError(key, identifier, boundTo),
    });

    if (options.builtins ?? true) {
      for (const type of BUILTIN_TYPES) this.get(type);
    }
  }

  /**
   * Returns the tag for a type, assigning one on first use.
   */
  tagOf(type: TypeRef): number {
    return this.get(type);
  }

  /**
   * Returns the type bound to a tag, if any.
   */
  typeOf(tag: number): TypeRef | undefined {
    return this.getByIdentifier(tag);
  }

  /**
   * Binds an explicit tag. Explicit tags survive rebuild().
   */
  assign(type: TypeRef, tag: number): void {
    this.put(type, tag);
  }
}
