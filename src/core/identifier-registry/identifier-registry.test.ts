import { describe, it, expect, beforeEach } from "vitest";
import { IdentifierRegistry, sequentialIdentifiers } from "./identifier-registry";
import {
  IdentifierConflictError,
  InvalidIdentifierError,
  TypeTagConflictError,
} from "../errors";

describe("IdentifierRegistry", () => {
  let registry: IdentifierRegistry<string>;

  beforeEach(() => {
    registry = new IdentifierRegistry<string>();
  });

  describe("get", () => {
    it("should generate identifiers in first-seen order", () => {
      expect(registry.get("alpha")).toBe(1);
      expect(registry.get("beta")).toBe(2);
      expect(registry.get("gamma")).toBe(3);
    });

    it("should return the cached identifier on repeated lookups", () => {
      const first = registry.get("alpha");
      registry.get("beta");
      expect(registry.get("alpha")).toBe(first);
      expect(registry.size).toBe(2);
    });

    it("should keep both directions consistent", () => {
      for (const key of ["a", "b", "c"]) {
        expect(registry.getByIdentifier(registry.get(key))).toBe(key);
      }
    });

    it("should produce identical identifiers for identical registration order", () => {
      const other = new IdentifierRegistry<string>();
      const keys = ["x", "y", "z", "w"];

      expect(keys.map((k) => registry.get(k))).toEqual(keys.map((k) => other.get(k)));
    });
  });

  describe("peek", () => {
    it("should not generate an identifier", () => {
      expect(registry.peek("alpha")).toBeUndefined();
      expect(registry.has("alpha")).toBe(false);
    });
  });

  describe("put", () => {
    it("should bind an explicit identifier", () => {
      registry.put("alpha", 42);
      expect(registry.get("alpha")).toBe(42);
      expect(registry.getByIdentifier(42)).toBe("alpha");
      expect(registry.isExplicit("alpha")).toBe(true);
    });

    it("should let auto-generation step over explicit identifiers", () => {
      registry.put("alpha", 1);
      registry.put("beta", 2);
      expect(registry.get("gamma")).toBe(3);
    });

    it("should throw when the identifier is bound to another key", () => {
      registry.put("alpha", 5);
      expect(() => registry.put("beta", 5)).toThrow(IdentifierConflictError);
      expect(() => registry.put("beta", 5)).toThrow(
        "Identifier 5 for beta is already bound to alpha"
      );
    });

    it("should allow re-putting the same binding", () => {
      registry.put("alpha", 5);
      expect(() => registry.put("alpha", 5)).not.toThrow();
    });

    it("should release the previous identifier when a key is rebound", () => {
      registry.put("alpha", 5);
      registry.put("alpha", 6);
      expect(registry.hasIdentifier(5)).toBe(false);
      expect(registry.getByIdentifier(6)).toBe("alpha");
    });

    it("should reject identifiers outside the accepted range", () => {
      const narrow = new IdentifierRegistry<string>({ min: 0, max: 255 });
      expect(() => narrow.put("alpha", 256)).toThrow(InvalidIdentifierError);
      expect(() => narrow.put("alpha", -1)).toThrow(InvalidIdentifierError);
      expect(() => narrow.put("alpha", 1.5)).toThrow(InvalidIdentifierError);
    });

    it("should build conflicts with the configured factory", () => {
      const tags = new IdentifierRegistry<string>({
        conflict: (key, id, boundTo) => new TypeTagConflictError(key, id, boundTo),
      });
      tags.put("Player", 3);
      expect(() => tags.put("Enemy", 3)).toThrow(TypeTagConflictError);
    });
  });

  describe("generator", () => {
    it("should throw when a generator returns a bound identifier", () => {
      const constant = new IdentifierRegistry<string>({ generator: () => 9 });
      constant.get("alpha");
      expect(() => constant.get("beta")).toThrow(IdentifierConflictError);
    });

    it("should reject generated identifiers outside the range", () => {
      const narrow = new IdentifierRegistry<string>({ max: 2 });
      narrow.get("a");
      narrow.get("b");
      expect(() => narrow.get("c")).toThrow(InvalidIdentifierError);
    });

    it("should not change cached entries when the generator changes", () => {
      registry.get("alpha");
      registry.setGenerator(sequentialIdentifiers(100));

      expect(registry.get("alpha")).toBe(1);
      expect(registry.get("beta")).toBe(100);
      expect(registry.isStale).toBe(true);
    });

    it("should not mark the registry stale when only explicit entries exist", () => {
      registry.put("alpha", 4);
      registry.setGenerator(sequentialIdentifiers(100));
      expect(registry.isStale).toBe(false);
    });
  });

  describe("rebuild", () => {
    it("should regenerate auto entries under the new generator", () => {
      registry.get("alpha");
      registry.get("beta");
      registry.setGenerator(sequentialIdentifiers(100));
      registry.rebuild();

      expect(registry.get("alpha")).toBe(100);
      expect(registry.get("beta")).toBe(101);
      expect(registry.getByIdentifier(1)).toBeUndefined();
      expect(registry.isStale).toBe(false);
    });

    it("should keep explicit entries", () => {
      registry.get("alpha");
      registry.put("beta", 50);
      registry.get("gamma");
      registry.setGenerator(sequentialIdentifiers(10));
      registry.rebuild();

      expect(registry.get("alpha")).toBe(10);
      expect(registry.get("beta")).toBe(50);
      expect(registry.get("gamma")).toBe(11);
    });

    it("should leave the registry untouched when the generator conflicts", () => {
      registry.get("a");
      registry.get("b");
      registry.put("c", 7);
      const fresh: Record<string, number> = { a: 10, b: 7 };
      registry.setGenerator((key) => fresh[key] ?? 0);

      expect(() => registry.rebuild()).toThrow(IdentifierConflictError);
      expect([...registry.entries()]).toEqual([
        ["a", 1],
        ["b", 2],
        ["c", 7],
      ]);
      expect(registry.getByIdentifier(2)).toBe("b");
      expect(registry.hasIdentifier(10)).toBe(false);
      expect(registry.isStale).toBe(true);
    });

    it("should leave the registry untouched when a generated identifier is out of range", () => {
      const narrow = new IdentifierRegistry<string>({ max: 10 });
      narrow.get("a");
      narrow.get("b");
      narrow.setGenerator(sequentialIdentifiers(10));

      expect(() => narrow.rebuild()).toThrow(InvalidIdentifierError);
      expect(narrow.get("a")).toBe(1);
      expect(narrow.get("b")).toBe(2);
      expect(narrow.isStale).toBe(true);
    });

    it("should let regenerated identifiers reuse each other's old values", () => {
      registry.get("a");
      registry.get("b");
      const swapped: Record<string, number> = { a: 2, b: 1 };
      registry.setGenerator((key) => swapped[key] ?? 0);
      registry.rebuild();

      expect(registry.getByIdentifier(1)).toBe("b");
      expect(registry.getByIdentifier(2)).toBe("a");
      expect(registry.size).toBe(2);
    });

    it("should preserve first-seen order", () => {
      registry.get("c");
      registry.get("a");
      registry.get("b");
      registry.rebuild();

      expect([...registry.entries()]).toEqual([
        ["c", 1],
        ["a", 2],
        ["b", 3],
      ]);
    });
  });

  describe("remove and clear", () => {
    it("should remove both directions", () => {
      const id = registry.get("alpha");
      expect(registry.remove("alpha")).toBe(true);
      expect(registry.hasIdentifier(id)).toBe(false);
      expect(registry.remove("alpha")).toBe(false);
    });

    it("should clear everything", () => {
      registry.get("alpha");
      registry.put("beta", 7);
      registry.clear();
      expect(registry.size).toBe(0);
      expect(registry.get("gamma")).toBe(1);
    });
  });
});
