/**
 * Exponential-Golomb helpers
 * A code is `zeros` 0-bits, a terminating 1-bit, then `zeros` suffix bits
 */
export class ExpGolombUtils {
  /**
   * Longest prefix whose decoded value still fits in 32 bits unsigned
   */
  static readonly MAX_PREFIX_ZEROS = 31;

  /**
   * Smallest value encodable with a prefix of `zeros` 0-bits (2^zeros - 1)
   */
  static baseValue(zeros: number): number {
    return 2 ** zeros - 1;
  }

  /**
   * Map an unsigned code number to its signed value: 0, 1, 2, 3, 4 -> 0, 1, -1, 2, -2
   */
  static toSigned(codeNum: number): number {
    const half = Math.floor(codeNum / 2);
    if (codeNum % 2 === 1) {
      return half + 1;
    }
    return half === 0 ? 0 : -half;
  }

  /**
   * Inverse of toSigned
   */
  static fromSigned(value: number): number {
    return value > 0 ? value * 2 - 1 : Math.abs(value) * 2;
  }

  /**
   * Total bits taken by the code for `value`
   */
  static codeLength(value: number): number {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`Exp-Golomb value must be a non-negative integer: ${value}`);
    }
    return 2 * this.prefixLength(value) + 1;
  }

  /**
   * Number of leading zeros in the code for `value`
   */
  static prefixLength(value: number): number {
    let zeros = 0;
    while (2 ** (zeros + 1) - 1 <= value) {
      zeros++;
    }
    return zeros;
  }
}
