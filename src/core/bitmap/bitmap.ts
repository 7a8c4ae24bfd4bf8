function assertBitIndex(bitmap: Uint8Array, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= bitmap.length * 8) {
    throw new RangeError(
      `Bit index ${index} out of range for a ${bitmap.length}-byte bitmap`
    );
  }
}

/**
 * Tests bit `index` of a packed bitmap. Bit `i` lives in byte `i / 8`,
 * at position `i % 8` counted from the least significant bit.
 *
 * @throws RangeError if `index` is not inside the bitmap
 */
export function isBitSet(bitmap: Uint8Array, index: number): boolean {
  assertBitIndex(bitmap, index);
  return (bitmap[index >>> 3] & (1 << (index & 7))) !== 0;
}

/**
 * Sets or clears bit `index` in place. Same layout and precondition as
 * {@link isBitSet}.
 */
export function setBit(bitmap: Uint8Array, index: number, value = true): void {
  assertBitIndex(bitmap, index);
  const mask = 1 << (index & 7);
  if (value) {
    bitmap[index >>> 3] |= mask;
  } else {
    bitmap[index >>> 3] &= ~mask;
  }
}
