import { BinaryPrimitives, type Field } from "../binary-codec";

/**
 * Decimal value `unscaled * 10^-scale` with a signed 32-bit magnitude.
 */
export interface FixedPoint32 {
  unscaled: number;
  scale: number;
}

/**
 * Decimal value `unscaled * 10^-scale` with a signed 64-bit magnitude.
 */
export interface FixedPoint64 {
  unscaled: bigint;
  scale: number;
}

/**
 * Fixed-point field with a signed 32-bit magnitude.
 *
 * Only the magnitude is transmitted. The scale belongs to the schema, so it
 * is fixed when the field is built: `write` ignores `value.scale` and `read`
 * reports the field's own scale.
 *
 * @param scale Decimal exponent applied on read
 *
 * @example
 * ```ts
 * const temperature = fixedPoint32(2);
 * temperature.write(buf, 0, { unscaled: 2150, scale: 2 }); // 21.50
 * ```
 */
export function fixedPoint32(scale: number): Field<FixedPoint32> {
  return {
    size: 4,
    write: (buf, o, v) => BinaryPrimitives.i32.write(buf, o, v.unscaled),
    read: (buf, o) => ({ unscaled: BinaryPrimitives.i32.read(buf, o), scale }),
    toNil: () => ({ unscaled: 0, scale }),
  };
}

/**
 * Fixed-point field with a signed 64-bit magnitude.
 * Same out-of-band scale rule as {@link fixedPoint32}.
 */
export function fixedPoint64(scale: number): Field<FixedPoint64> {
  return {
    size: 8,
    write: (buf, o, v) => BinaryPrimitives.i64.write(buf, o, v.unscaled),
    read: (buf, o) => ({ unscaled: BinaryPrimitives.i64.read(buf, o), scale }),
    toNil: () => ({ unscaled: 0n, scale }),
  };
}

/**
 * Renders a fixed-point value as an exact decimal string.
 *
 * @example
 * ```ts
 * fixedPointToString({ unscaled: -5, scale: 2 });  // "-0.05"
 * fixedPointToString({ unscaled: 12, scale: -3 }); // "12000"
 * ```
 */
export function fixedPointToString(value: FixedPoint32 | FixedPoint64): string {
  const unscaled = BigInt(value.unscaled);
  const negative = unscaled < 0n;
  let digits = (negative ? -unscaled : unscaled).toString();

  if (value.scale <= 0) {
    digits = unscaled === 0n ? "0" : digits + "0".repeat(-value.scale);
  } else {
    digits = digits.padStart(value.scale + 1, "0");
    digits = `${digits.slice(0, -value.scale)}.${digits.slice(-value.scale)}`;
  }

  return negative ? `-${digits}` : digits;
}
