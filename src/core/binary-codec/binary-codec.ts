/**
 * A binary field descriptor.
 * Defines how a single value is serialized/deserialized
 * at a fixed byte size.
 */
export type Field<T> = {
  /** Size of the field in bytes */
  size: number;

  /**
   * Writes a value into a byte buffer at the given offset.
   * @param buf Buffer to write into
   * @param o Byte offset
   * @param v Value to write
   */
  write(buf: Uint8Array, o: number, v: T): void;

  /**
   * Reads a value from a byte buffer at the given offset.
   * @param buf Buffer to read from
   * @param o Byte offset
   */
  read(buf: Uint8Array, o: number): T;

  /**
   * Returns the nil value
   */
  toNil(): T;
};

/**
 * A schema mapping object keys to binary fields.
 * The order of iteration defines the binary layout.
 *
 * IMPORTANT:
 * Property order is respected as insertion order.
 * Do not rely on computed or dynamic keys.
 */
export type Schema<T> = {
  [K in keyof T]: Field<T[K]>;
};

const schemaSizes = new WeakMap<object, number>();

/**
 * Computes and caches the total byte size of a schema.
 * @param schema Binary schema definition
 */
export function getSchemaSize<T extends object>(schema: Schema<T>): number {
  const cached = schemaSizes.get(schema);
  if (cached !== undefined) return cached;

  let size = 0;
  for (const k of Object.keys(schema) as (keyof T)[]) {
    size += schema[k].size;
  }

  schemaSizes.set(schema, size);
  return size;
}

// Integer paths. Every scalar, floats included, goes through these so the
// byte order never depends on the host.

function writeUint(buf: Uint8Array, o: number, width: number, v: number): void {
  for (let i = width - 1; i >= 0; i--) {
    buf[o + i] = v & 0xff;
    v >>>= 8;
  }
}

function readUint(buf: Uint8Array, o: number, width: number): number {
  let v = 0;
  for (let i = 0; i < width; i++) {
    v = v * 256 + buf[o + i];
  }
  return v;
}

function writeUint64(buf: Uint8Array, o: number, v: bigint): void {
  let bits = BigInt.asUintN(64, v);
  for (let i = 7; i >= 0; i--) {
    buf[o + i] = Number(bits & 0xffn);
    bits >>= 8n;
  }
}

function readUint64(buf: Uint8Array, o: number): bigint {
  let v = 0n;
  for (let i = 0; i < 8; i++) {
    v = (v << 8n) | BigInt(buf[o + i]);
  }
  return v;
}

/**
 * Reinterprets an IEEE-754 single as its 32-bit pattern.
 */
export function float32ToBits(v: number): number {
  const dv = new DataView(new ArrayBuffer(4));
  dv.setFloat32(0, v);
  return dv.getUint32(0);
}

export function bitsToFloat32(bits: number): number {
  const dv = new DataView(new ArrayBuffer(4));
  dv.setUint32(0, bits >>> 0);
  return dv.getFloat32(0);
}

/**
 * Reinterprets an IEEE-754 double as its 64-bit pattern.
 */
export function float64ToBits(v: number): bigint {
  const dv = new DataView(new ArrayBuffer(8));
  dv.setFloat64(0, v);
  return dv.getBigUint64(0);
}

export function bitsToFloat64(bits: bigint): number {
  const dv = new DataView(new ArrayBuffer(8));
  dv.setBigUint64(0, BigInt.asUintN(64, bits));
  return dv.getFloat64(0);
}

function assertFits(buf: Uint8Array, o: number, size: number): void {
  if (!Number.isInteger(o) || o < 0 || o + size > buf.byteLength) {
    throw new RangeError(
      `Field of ${size} bytes does not fit at offset ${o} of a ${buf.byteLength}-byte buffer`
    );
  }
}

/**
 * Base codec implementation.
 * Handles schema-driven encoding/decoding.
 */
export class BaseBinaryCodec {
  /**
   * Encodes an object into a binary buffer using the given schema.
   *
   * Allocates a right-sized buffer per call.
   *
   * @param schema Binary schema definition
   * @param data Object to encode
   * @returns A Uint8Array containing the encoded bytes
   */
  protected static encodeInto<T extends object>(
    schema: Schema<T>,
    data: T
  ): Uint8Array {
    const buffer = new Uint8Array(getSchemaSize(schema));

    let o = 0;
    for (const k of Object.keys(schema) as (keyof T)[]) {
      const f = schema[k];
      f.write(buffer, o, data[k]);
      o += f.size;
    }

    return buffer;
  }

  /**
   * Decodes a binary buffer into a target object using the given schema.
   *
   * Validates buffer size before reading.
   *
   * @param schema Binary schema definition
   * @param buf Buffer containing encoded data
   * @param target Target object to mutate
   * @returns The mutated target object
   */
  static decodeInto<T extends object>(
    schema: Schema<T>,
    buf: Uint8Array,
    target: T
  ): T {
    const expectedSize = getSchemaSize(schema);

    if (buf.byteLength < expectedSize) {
      throw new RangeError(
        `Buffer too small: expected ${expectedSize} bytes, got ${buf.byteLength}`
      );
    }

    let o = 0;
    for (const k of Object.keys(schema) as (keyof T)[]) {
      const f = schema[k];
      target[k] = f.read(buf, o);
      o += f.size;
    }

    return target;
  }
}

/**
 * Built-in big-endian primitive field definitions.
 */
export class BinaryPrimitives {
  /** Unsigned 8-bit integer */
  static readonly u8: Field<number> = {
    size: 1,
    write: (buf, o, v) => writeUint(buf, o, 1, v),
    read: (buf, o) => buf[o],
    toNil: () => 0,
  };

  /** Unsigned 16-bit integer */
  static readonly u16: Field<number> = {
    size: 2,
    write: (buf, o, v) => writeUint(buf, o, 2, v),
    read: (buf, o) => readUint(buf, o, 2),
    toNil: () => 0,
  };

  /** Unsigned 32-bit integer */
  static readonly u32: Field<number> = {
    size: 4,
    write: (buf, o, v) => writeUint(buf, o, 4, v),
    read: (buf, o) => readUint(buf, o, 4),
    toNil: () => 0,
  };

  /** Unsigned 64-bit integer */
  static readonly u64: Field<bigint> = {
    size: 8,
    write: (buf, o, v) => writeUint64(buf, o, v),
    read: (buf, o) => readUint64(buf, o),
    toNil: () => 0n,
  };

  /** Signed 8-bit integer */
  static readonly i8: Field<number> = {
    size: 1,
    write: (buf, o, v) => writeUint(buf, o, 1, v),
    read: (buf, o) => (buf[o] << 24) >> 24,
    toNil: () => 0,
  };

  /** Signed 16-bit integer */
  static readonly i16: Field<number> = {
    size: 2,
    write: (buf, o, v) => writeUint(buf, o, 2, v),
    read: (buf, o) => (readUint(buf, o, 2) << 16) >> 16,
    toNil: () => 0,
  };

  /** Signed 32-bit integer */
  static readonly i32: Field<number> = {
    size: 4,
    write: (buf, o, v) => writeUint(buf, o, 4, v),
    read: (buf, o) => readUint(buf, o, 4) | 0,
    toNil: () => 0,
  };

  /** Signed 64-bit integer */
  static readonly i64: Field<bigint> = {
    size: 8,
    write: (buf, o, v) => writeUint64(buf, o, v),
    read: (buf, o) => BigInt.asIntN(64, readUint64(buf, o)),
    toNil: () => 0n,
  };

  /** 32-bit floating point number (IEEE 754) */
  static readonly f32: Field<number> = {
    size: 4,
    write: (buf, o, v) => writeUint(buf, o, 4, float32ToBits(v)),
    read: (buf, o) => bitsToFloat32(readUint(buf, o, 4)),
    toNil: () => 0,
  };

  /** 64-bit floating point number (double) */
  static readonly f64: Field<number> = {
    size: 8,
    write: (buf, o, v) => writeUint64(buf, o, float64ToBits(v)),
    read: (buf, o) => bitsToFloat64(readUint64(buf, o)),
    toNil: () => 0,
  };

  /** Boolean stored as 1 byte (written as 0 or 1, any nonzero byte reads as true) */
  static readonly bool: Field<boolean> = {
    size: 1,
    write: (buf, o, v) => {
      buf[o] = v ? 1 : 0;
    },
    read: (buf, o) => buf[o] !== 0,
    toNil: () => false,
  };
}

/**
 * Public codec API.
 * Re-exports primitives and exposes encode/decode helpers.
 */
export class BinaryCodec extends BaseBinaryCodec {
  static readonly u8 = BinaryPrimitives.u8;
  static readonly u16 = BinaryPrimitives.u16;
  static readonly u32 = BinaryPrimitives.u32;
  static readonly u64 = BinaryPrimitives.u64;
  static readonly i8 = BinaryPrimitives.i8;
  static readonly i16 = BinaryPrimitives.i16;
  static readonly i32 = BinaryPrimitives.i32;
  static readonly i64 = BinaryPrimitives.i64;
  static readonly f32 = BinaryPrimitives.f32;
  static readonly f64 = BinaryPrimitives.f64;
  static readonly bool = BinaryPrimitives.bool;

  /**
   * Encodes an object into a binary buffer.
   */
  static encode<T extends object>(
    schema: Schema<T>,
    data: T
  ): Uint8Array {
    return this.encodeInto(schema, data);
  }

  /**
   * Decodes a binary buffer into an existing object.
   */
  static decode<T extends object>(
    schema: Schema<T>,
    buf: Uint8Array,
    target: T
  ): T {
    return this.decodeInto(schema, buf, target);
  }

  /**
   * Writes a single value at `offset`.
   * @throws RangeError if the field does not fit in `buf` at `offset`
   */
  static write<T>(field: Field<T>, value: T, buf: Uint8Array, offset = 0): void {
    assertFits(buf, offset, field.size);
    field.write(buf, offset, value);
  }

  /**
   * Reads a single value at `offset`.
   * @throws RangeError if the field does not fit in `buf` at `offset`
   */
  static read<T>(field: Field<T>, buf: Uint8Array, offset = 0): T {
    assertFits(buf, offset, field.size);
    return field.read(buf, offset);
  }
}
