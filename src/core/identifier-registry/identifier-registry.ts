import {
  IdentifierConflictError,
  InvalidIdentifierError,
} from "../errors";

/**
 * Produces the identifier for a key seen for the first time.
 *
 * `isTaken` reports whether an identifier is already bound, so a strategy
 * can step over explicit overrides. Returning a bound identifier anyway
 * fails with the registry's conflict error.
 */
export type IdentifierGenerator<K> = (
  key: K,
  isTaken: (identifier: number) => boolean
) => number;

/**
 * Counter strategy: the smallest unbound identifier at or above `base`.
 *
 * Since entries are only ever added between rebuilds, identifiers come out
 * in first-seen order and two registries fed the same keys in the same
 * order agree on every identifier.
 */
export function sequentialIdentifiers<K>(base = 1): IdentifierGenerator<K> {
  return (_key, isTaken) => {
    let id = base;
    while (isTaken(id)) id++;
    return id;
  };
}

export interface IdentifierRegistryOptions<K> {
  /** Strategy for auto-generated identifiers (default: sequentialIdentifiers(1)) */
  generator?: IdentifierGenerator<K>;
  /** Smallest accepted identifier (default: 0) */
  min?: number;
  /** Largest accepted identifier, usually the wire width (default: 0xffffffff) */
  max?: number;
  /** Renders a key for error messages (default: String) */
  describe?: (key: K) => string;
  /** Builds the error thrown on a conflicting binding */
  conflict?: (key: string, identifier: number, boundTo: string) => IdentifierConflictError;
}

/**
 * Symmetric map between keys and compact numeric identifiers.
 *
 * Identifiers are generated lazily on first lookup unless put() binds one
 * explicitly. Swapping the generator does not touch cached entries: call
 * rebuild() afterwards, or old and new identifiers will coexist.
 *
 * @example
 * ```ts
 * const registry = new IdentifierRegistry<string>();
 * registry.get("x"); // 1
 * registry.put("y", 7);
 * registry.get("z"); // 2
 * registry.getByIdentifier(7); // "y"
 *
 * registry.setGenerator(sequentialIdentifiers(100));
 * registry.rebuild();
 * registry.get("x"); // 100, "y" keeps 7
 * ```
 */
export class IdentifierRegistry<K> {
  private forward = new Map<K, number>();
  private backward = new Map<number, K>();
  private explicit = new Set<K>();
  private generator: IdentifierGenerator<K>;
  private stale = false;

  private readonly min: number;
  private readonly max: number;
  private readonly describe: (key: K) => string;
  private readonly conflict: (key: string, identifier: number, boundTo: string) => IdentifierConflictError;

  constructor(options: IdentifierRegistryOptions<K> = {}) {
    this.generator = options.generator ?? sequentialIdentifiers<K>(1);
    this.min = options.min ?? 0;
    this.max = options.max ?? 0xffffffff;
    this.describe = options.describe ?? ((key) => String(key));
    this.conflict =
      options.conflict ?? ((key, identifier, boundTo) => new IdentifierConflictError(key, identifier, boundTo));
  }

  /** Number of bound keys */
  get size(): number {
    return this.forward.size;
  }

  /**
   * True once the generator has changed while auto-generated entries
   * exist, until rebuild() runs.
   */
  get isStale(): boolean {
    return this.stale;
  }

  /**
   * Returns the identifier for `key`, generating one on first access.
   */
  get(key: K): number {
    const existing = this.forward.get(key);
    if (existing !== undefined) return existing;
    return this.generate(key);
  }

  /**
   * Returns the identifier for `key` without generating one.
   */
  peek(key: K): number | undefined {
    return this.forward.get(key);
  }

  getByIdentifier(identifier: number): K | undefined {
    return this.backward.get(identifier);
  }

  /**
   * Binds `identifier` to `key` explicitly. Explicit bindings survive rebuild().
   * Rebinding a key releases its previous identifier.
   */
  put(key: K, identifier: number): void {
    this.validate(identifier);

    const bound = this.backward.get(identifier);
    if (bound !== undefined && bound !== key) {
      throw this.conflict(this.describe(key), identifier, this.describe(bound));
    }

    const previous = this.forward.get(key);
    if (previous !== undefined && previous !== identifier) {
      this.backward.delete(previous);
    }

    this.forward.set(key, identifier);
    this.backward.set(identifier, key);
    this.explicit.add(key);
  }

  has(key: K): boolean {
    return this.forward.has(key);
  }

  hasIdentifier(identifier: number): boolean {
    return this.backward.has(identifier);
  }

  isExplicit(key: K): boolean {
    return this.explicit.has(key);
  }

  /**
   * Replaces the generation strategy. Cached entries are kept as they are.
   */
  setGenerator(generator: IdentifierGenerator<K>): void {
    this.generator = generator;
    if (this.forward.size > this.explicit.size) {
      this.stale = true;
    }
  }

  /**
   * Regenerates every auto-generated entry under the current generator, in
   * first-seen order. Explicit entries stay.
   *
   * All-or-nothing: if the generator fails for any key, the registry is left
   * exactly as it was, still stale.
   */
  rebuild(): void {
    const taken = new Map<number, K>();
    const generated: K[] = [];
    for (const [key, identifier] of this.forward) {
      if (this.explicit.has(key)) {
        taken.set(identifier, key);
      } else {
        generated.push(key);
      }
    }

    const next = new Map<K, number>();
    for (const key of generated) {
      const identifier = this.generator(key, (id) => taken.has(id));
      this.validate(identifier);

      const bound = taken.get(identifier);
      if (bound !== undefined) {
        throw this.conflict(this.describe(key), identifier, this.describe(bound));
      }
      taken.set(identifier, key);
      next.set(key, identifier);
    }

    for (const key of generated) {
      const previous = this.forward.get(key);
      if (previous !== undefined) this.backward.delete(previous);
    }
    for (const [key, identifier] of next) {
      this.forward.set(key, identifier);
      this.backward.set(identifier, key);
    }
    this.stale = false;
  }

  remove(key: K): boolean {
    const identifier = this.forward.get(key);
    if (identifier === undefined) return false;

    this.forward.delete(key);
    this.backward.delete(identifier);
    this.explicit.delete(key);
    return true;
  }

  clear(): void {
    this.forward.clear();
    this.backward.clear();
    this.explicit.clear();
    this.stale = false;
  }

  /** Entries in first-seen order */
  entries(): IterableIterator<[K, number]> {
    return this.forward.entries();
  }

  private generate(key: K): number {
    const identifier = this.generator(key, (id) => this.backward.has(id));
    this.validate(identifier);

    const bound = this.backward.get(identifier);
    if (bound !== undefined) {
      throw this.conflict(this.describe(key), identifier, this.describe(bound));
    }

    this.forward.set(key, identifier);
    this.backward.set(identifier, key);
    return identifier;
  }

  private validate(identifier: number): void {
    if (!Number.isInteger(identifier) || identifier < this.min || identifier > this.max) {
      throw new InvalidIdentifierError(identifier, this.min, this.max);
    }
  }
}
