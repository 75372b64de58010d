import { BitPosition } from "./types";

/**
 * Cursor arithmetic over (byte, bit) positions
 * Positions are never mutated; every operation returns a new one
 */
export class CursorUtils {
  static readonly START: BitPosition = Object.freeze({ byte: 0, bit: 0 });

  /**
   * Move a position forward, carrying bit overflow into the byte component
   * @param pos Starting position
   * @param bytes Whole bytes to advance
   * @param bits Bits to advance (may exceed 7)
   */
  static advance(pos: BitPosition, bytes: number, bits: number): BitPosition {
    const totalBits = pos.bit + bits;
    return {
      byte: pos.byte + bytes + Math.floor(totalBits / 8),
      bit: totalBits % 8,
    };
  }

  /**
   * Check whether `bytes` + `bits` can be read starting at `pos`
   * The only valid end state is (length, 0)
   */
  static hasRest(
    pos: BitPosition,
    bytes: number,
    bits: number,
    length: number
  ): boolean {
    const next = this.advance(pos, bytes, bits);

    if (next.byte < length) {
      return true;
    }

    return next.byte === length && next.bit === 0;
  }

  static isInBuffer(byte: number, length: number): boolean {
    return byte < length;
  }

  static toBitOffset(pos: BitPosition): number {
    return pos.byte * 8 + pos.bit;
  }

  static fromBitOffset(offset: number): BitPosition {
    return { byte: Math.floor(offset / 8), bit: offset % 8 };
  }

  /**
   * Bits left between `pos` and the end of a buffer of `length` bytes
   */
  static remainingBits(pos: BitPosition, length: number): number {
    return Math.max(0, length * 8 - this.toBitOffset(pos));
  }
}
