/**
 * Accumulator and sign-extension rules for one output integer width
 * Lets the reader share a single bit-extraction loop across 32 and 64 bits
 */
export interface IntegerCodec<T> {
  readonly maxBits: number;
  readonly zero: T;
  /** Append one bit to the right of the accumulator */
  shiftIn(acc: T, bit: number): T;
  /** Reinterpret the low `width` bits of an unsigned value as two's complement */
  signExtend(raw: T, width: number): T;
}

// Plain arithmetic keeps values above 2^31 unsigned; `<<` would wrap to int32.
export const UINT32: IntegerCodec<number> = {
  maxBits: 32,
  zero: 0,
  shiftIn(acc, bit) {
    return acc * 2 + bit;
  },
  signExtend(raw, width) {
    if (width === 0) {
      return 0;
    }

    const modulus = 2 ** width;
    const value = raw % modulus;

    return value >= modulus / 2 ? value - modulus : value;
  },
};

export const UINT64: IntegerCodec<bigint> = {
  maxBits: 64,
  zero: 0n,
  shiftIn(acc, bit) {
    return (acc << 1n) | BigInt(bit);
  },
  signExtend(raw, width) {
    if (width === 0) {
      return 0n;
    }

    return BigInt.asIntN(width, raw);
  },
};
