import { describe, it, expect, beforeEach } from "vitest";
import { Loader } from "../loader/loader";
import { SchemaRegistry, TypeTagRegistry, Types } from "../schema";
import { SerializerRegistry } from "./serializer-registry";
import { IntSerializer } from "./builtin-serializers";
import { ByteReader, InvalidValueError, MalformedStreamError, UnregisteredTypeError } from "../core";

const bytes = (...values: number[]) => new Uint8Array(values);

describe("built-in serializers", () => {
  let loader: Loader;

  beforeEach(() => {
    const tags = new TypeTagRegistry();
    loader = new Loader({
      schemas: new SchemaRegistry({ tags }),
      serializers: new SerializerRegistry(),
    });
  });

  describe("bool", () => {
    it("should encode as a single byte", () => {
      expect(Array.from(loader.serialize(true))).toEqual([1]);
      expect(Array.from(loader.serialize(false))).toEqual([0]);
    });

    it("should reject bytes other than 0 and 1", () => {
      expect(() => loader.deserialize(bytes(2), Types.bool)).toThrow(MalformedStreamError);
      expect(() => loader.deserialize(bytes(2), Types.bool)).toThrow("Invalid bool byte 0x02");
    });
  });

  describe("int", () => {
    it("should encode 1 as four big-endian bytes", () => {
      expect(Array.from(loader.serialize(1))).toEqual([0, 0, 0, 1]);
    });

    it("should decode zero", () => {
      expect(loader.deserialize(bytes(0, 0, 0, 0), Types.int)).toBe(0);
    });

    it("should use two's complement for negatives", () => {
      expect(Array.from(loader.serialize(-1))).toEqual([0xff, 0xff, 0xff, 0xff]);
      expect(loader.deserialize(bytes(0x80, 0, 0, 0), Types.int)).toBe(-2147483648);
    });

    it("should refuse values outside the int range when forced", () => {
      expect(() => loader.serialize(2 ** 31, { type: Types.int })).toThrow(InvalidValueError);
      expect(() => loader.serialize(1.5, { type: Types.int })).toThrow("Cannot encode float 1.5 as int");
    });
  });

  describe("float", () => {
    it("should encode non-integral numbers as doubles", () => {
      expect(Array.from(loader.serialize(1.5))).toEqual([0x3f, 0xf8, 0, 0, 0, 0, 0, 0]);
    });

    it("should encode integral numbers as doubles when forced", () => {
      const encoded = loader.serialize(2, { type: Types.float });

      expect(Array.from(encoded)).toEqual([0x40, 0, 0, 0, 0, 0, 0, 0]);
      expect(loader.deserialize(encoded, Types.float)).toBe(2);
    });

    it("should keep negative zero", () => {
      const encoded = loader.serialize(-0);

      expect(encoded[0]).toBe(0x80);
      expect(Object.is(loader.deserialize(encoded, Types.float), -0)).toBe(true);
    });
  });

  describe("str", () => {
    it("should prefix UTF-8 bytes with their length", () => {
      expect(Array.from(loader.serialize("hé"))).toEqual([0, 0, 0, 3, 0x68, 0xc3, 0xa9]);
    });

    it("should round-trip the empty string", () => {
      const encoded = loader.serialize("");

      expect(Array.from(encoded)).toEqual([0, 0, 0, 0]);
      expect(loader.deserialize(encoded, Types.str)).toBe("");
    });

    it("should round-trip characters outside the BMP", () => {
      expect(loader.deserialize(loader.serialize("a😀b"), Types.str)).toBe("a😀b");
    });

    it("should reject invalid UTF-8", () => {
      expect(() => loader.deserialize(bytes(0, 0, 0, 1, 0xff), Types.str)).toThrow(MalformedStreamError);
    });

    it("should reject a length running past the end", () => {
      expect(() => loader.deserialize(bytes(0, 0, 0, 5, 0x61), Types.str)).toThrow(
        "Stream truncated reading string: need 5 bytes at offset 4, 1 available"
      );
    });
  });

  describe("bytes", () => {
    it("should prefix raw bytes with their length", () => {
      expect(Array.from(loader.serialize(bytes(7, 8)))).toEqual([0, 0, 0, 2, 7, 8]);
    });

    it("should decode into a copy of the source", () => {
      const source = bytes(0, 0, 0, 1, 9);
      const decoded = loader.deserialize(source, Types.bytes);
      source[4] = 0;

      expect(Array.from(decoded)).toEqual([9]);
    });
  });

  describe("list", () => {
    it("should tag every element", () => {
      // int is tag 2, str is tag 4
      expect(Array.from(loader.serialize([1, "a"]))).toEqual([
        0, 0, 0, 2,
        0, 2, 0, 0, 0, 1,
        0, 4, 0, 0, 0, 1, 0x61,
      ]);
    });

    it("should round-trip mixed and nested elements", () => {
      const value = [true, 3, 0.25, "x", [1, 2]];

      expect(loader.deserialize(loader.serialize(value), Types.list)).toEqual(value);
    });

    it("should encode an empty list as a zero count", () => {
      expect(Array.from(loader.serialize([]))).toEqual([0, 0, 0, 0]);
      expect(loader.deserialize(bytes(0, 0, 0, 0), Types.list)).toEqual([]);
    });

    it("should fail on unsupported elements", () => {
      expect(() => loader.serialize([1, null])).toThrow(UnregisteredTypeError);
    });
  });

  describe("set", () => {
    it("should round-trip elements", () => {
      const value = new Set(["a", "b"]);
      const decoded = loader.deserialize(loader.serialize(value), Types.set);

      expect(decoded).toEqual(value);
      expect(Array.from(decoded)).toEqual(["a", "b"]);
    });
  });

  describe("map", () => {
    it("should tag keys and values", () => {
      // str is tag 4, bool is tag 1
      expect(Array.from(loader.serialize(new Map([["k", true]])))).toEqual([
        0, 0, 0, 1,
        0, 4, 0, 0, 0, 1, 0x6b,
        0, 1, 1,
      ]);
    });

    it("should round-trip entries of mixed types", () => {
      const value = new Map<unknown, unknown>([
        [1, "one"],
        ["two", new Set([2])],
      ]);

      expect(loader.deserialize(loader.serialize(value), Types.map)).toEqual(value);
    });
  });

  it("should consume exactly the bytes of one value", () => {
    const reader = new ByteReader(bytes(0, 0, 0, 1, 0, 0, 0, 2));

    expect(loader.deserialize(reader, Types.int)).toBe(1);
    expect(reader.position).toBe(4);
    expect(loader.deserialize(reader, Types.int)).toBe(2);
  });

  it("should be usable outside a loader's dispatch", () => {
    const serializer = new IntSerializer();
    const encoded = serializer.encode(loader, 258);

    expect(Array.from(encoded)).toEqual([0, 0, 1, 2]);
    expect(serializer.decode(loader, Types.int, new ByteReader(encoded))).toBe(258);
  });
});

describe("SerializerRegistry", () => {
  it("should start with the built-ins", () => {
    const registry = new SerializerRegistry();

    expect(registry.has(Types.int)).toBe(true);
    expect(registry.types()).toHaveLength(8);
  });

  it("should start empty when asked to", () => {
    expect(new SerializerRegistry({ builtins: false }).types()).toEqual([]);
  });

  it("should replace a serializer on re-registration", () => {
    const registry = new SerializerRegistry();
    const replacement = new IntSerializer();
    registry.register(Types.int, replacement);

    expect(registry.get(Types.int)).toBe(replacement);
    expect(registry.unregister(Types.int)).toBe(true);
    expect(registry.get(Types.int)).toBeUndefined();
  });
});
