import { MalformedStreamError } from "../errors";

/**
 * A binary field descriptor.
 * Defines how a single value is written/read at a fixed byte size.
 */
export type Field<T> = {
  /** Size of the field in bytes */
  size: number;

  /**
   * Writes a value into a DataView at the given offset.
   * @param dv DataView to write into
   * @param o Byte offset
   * @param v Value to write
   */
  write(dv: DataView, o: number, v: T): void;

  /**
   * Reads a value from a DataView at the given offset.
   * @param dv DataView to read from
   * @param o Byte offset
   */
  read(dv: DataView, o: number): T;
};

/**
 * Fixed-width primitives used on the wire. All multi-byte values are big-endian.
 */
export class BinaryPrimitives {
  /** Unsigned 8-bit integer */
  static readonly u8: Field<number> = {
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v),
    read: (dv, o) => dv.getUint8(o),
  };

  /** Unsigned 16-bit integer (big-endian) */
  static readonly u16: Field<number> = {
    size: 2,
    write: (dv, o, v) => dv.setUint16(o, v, false),
    read: (dv, o) => dv.getUint16(o, false),
  };

  /** Unsigned 32-bit integer (big-endian) */
  static readonly u32: Field<number> = {
    size: 4,
    write: (dv, o, v) => dv.setUint32(o, v, false),
    read: (dv, o) => dv.getUint32(o, false),
  };

  /** Signed 32-bit integer, two's complement (big-endian) */
  static readonly i32: Field<number> = {
    size: 4,
    write: (dv, o, v) => dv.setInt32(o, v, false),
    read: (dv, o) => dv.getInt32(o, false),
  };

  /** 64-bit floating point number (IEEE 754 double, big-endian) */
  static readonly f64: Field<number> = {
    size: 8,
    write: (dv, o, v) => dv.setFloat64(o, v, false),
    read: (dv, o) => dv.getFloat64(o, false),
  };
}

/**
 * Accumulates encoded chunks and joins them once.
 *
 * @example
 * ```ts
 * const writer = new ByteWriter();
 * writer.write(BinaryPrimitives.u16, 7);
 * writer.writeBytes(payload);
 * const bytes = writer.toBytes();
 * ```
 */
export class ByteWriter {
  private chunks: Uint8Array[] = [];
  private length = 0;

  /** Total number of bytes written so far */
  get byteLength(): number {
    return this.length;
  }

  /**
   * Writes a fixed-width value.
   */
  write<T>(field: Field<T>, value: T): this {
    const chunk = new Uint8Array(field.size);
    field.write(new DataView(chunk.buffer), 0, value);
    return this.writeBytes(chunk);
  }

  /**
   * Appends raw bytes as-is.
   */
  writeBytes(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    this.length += bytes.byteLength;
    return this;
  }

  /**
   * Returns every written byte in a single buffer.
   */
  toBytes(): Uint8Array {
    if (this.chunks.length === 1) return this.chunks[0];

    const out = new Uint8Array(this.length);
    let o = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, o);
      o += chunk.byteLength;
    }
    return out;
  }
}

/**
 * Cursor over a byte buffer.
 *
 * Every read is bounds-checked: asking for more bytes than remain
 * throws MalformedStreamError instead of returning short data.
 */
export class ByteReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly buf: Uint8Array) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  /** Current read offset */
  get position(): number {
    return this.offset;
  }

  /** Bytes left after the cursor */
  get remaining(): number {
    return this.buf.byteLength - this.offset;
  }

  /**
   * Reads a fixed-width value and advances the cursor.
   * @param label Used in the error message when the stream is short
   */
  read<T>(field: Field<T>, label = "value"): T {
    this.ensure(field.size, label);
    const v = field.read(this.view, this.offset);
    this.offset += field.size;
    return v;
  }

  /**
   * Reads `length` raw bytes. The result is a view, not a copy.
   */
  readBytes(length: number, label = "bytes"): Uint8Array {
    this.ensure(length, label);
    const out = this.buf.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  private ensure(length: number, label: string): void {
    if (length > this.remaining) {
      throw new MalformedStreamError(
        `Stream truncated reading ${label}: need ${length} bytes at offset ${this.offset}, ${this.remaining} available`
      );
    }
  }
}
