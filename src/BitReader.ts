import {
  BitPosition,
  BitReaderOptions,
  GolombSuffixPolicy,
  ReaderSnapshot,
  ReadResult,
} from "./types";
import { CursorUtils } from "./CursorUtils";
import { ExpGolombUtils } from "./ExpGolombUtils";
import { IntegerCodec, UINT32, UINT64 } from "./IntegerCodecs";
import {
  CodeOverflowError,
  NotByteAlignedError,
  OutOfBufferError,
  fail,
  ok,
} from "./errors";

/**
 * BitReader - Reads bits, integers, byte runs and Exp-Golomb codes from a
 * borrowed buffer, MSB-first within each byte.
 *
 * Running out of data is not exceptional: every read returns a ReadResult
 * and leaves the cursor where it was when it fails. Invalid arguments
 * (widths out of range, negative counts) throw RangeError.
 */
export class BitReader {
  private buffer: Buffer;
  private bufLen: number;
  private pos: BitPosition = CursorUtils.START;
  private readonly golombSuffix: GolombSuffixPolicy;
  private readonly label: string;

  constructor(
    buffer: Uint8Array,
    length: number = buffer.length,
    options: BitReaderOptions = {}
  ) {
    this.buffer = BitReader.view(buffer);
    this.bufLen = BitReader.checkLength(buffer, length);
    this.golombSuffix = options.golombSuffix ?? "strict";
    this.label = options.label ?? "BitReader";
  }

  /**
   * Rebind the reader to another buffer and rewind the cursor
   */
  reset(buffer: Uint8Array, length: number = buffer.length): void {
    this.buffer = BitReader.view(buffer);
    this.bufLen = BitReader.checkLength(buffer, length);
    this.pos = CursorUtils.START;
  }

  get length(): number {
    return this.bufLen;
  }

  get bytePos(): number {
    return this.pos.byte;
  }

  get bitPos(): number {
    return this.pos.bit;
  }

  /**
   * Read a single bit
   */
  getBool(): ReadResult<boolean> {
    if (!this.hasRest(0, 1)) {
      return this.outOfBuffer(CursorUtils.advance(this.pos, 0, 1));
    }

    const value = this.bitAt(CursorUtils.toBitOffset(this.pos)) === 1;
    this.pos = CursorUtils.advance(this.pos, 0, 1);
    return ok(value);
  }

  /**
   * Read up to 32 bits as an unsigned integer
   */
  getUInt32(bits: number): ReadResult<number> {
    return this.readUnsigned(bits, UINT32);
  }

  /**
   * Read up to 64 bits as an unsigned integer
   */
  getUInt64(bits: number): ReadResult<bigint> {
    return this.readUnsigned(bits, UINT64);
  }

  /**
   * Read up to 32 bits as a two's-complement integer of that width
   */
  getInt32(bits: number): ReadResult<number> {
    return this.readSigned(bits, UINT32);
  }

  /**
   * Read up to 64 bits as a two's-complement integer of that width
   */
  getInt64(bits: number): ReadResult<bigint> {
    return this.readSigned(bits, UINT64);
  }

  /**
   * Copy `count` whole bytes. The cursor must be byte aligned.
   * @param count Number of bytes
   * @param target Optional destination; the result is a view of the written range
   * @param targetOffset Where to start writing in `target`
   */
  getBytes(
    count: number,
    target?: Uint8Array,
    targetOffset: number = 0
  ): ReadResult<Uint8Array> {
    BitReader.checkCount("Byte count", count);
    if (target !== undefined) {
      BitReader.checkCount("Target offset", targetOffset);
      if (targetOffset + count > target.length) {
        throw new RangeError(
          `Target too small: need ${count} bytes at offset ${targetOffset}, ` +
            `have ${target.length}`
        );
      }
    }

    if (!this.isByteAligned()) {
      return fail(new NotByteAlignedError(this.getPos()));
    }

    if (!this.hasRest(count, 0)) {
      return this.outOfBuffer(CursorUtils.advance(this.pos, count, 0));
    }

    const start = this.pos.byte;
    const source = this.buffer.subarray(start, start + count);

    let value: Uint8Array;
    if (target === undefined) {
      value = Buffer.from(source);
    } else {
      target.set(source, targetOffset);
      value = target.subarray(targetOffset, targetOffset + count);
    }

    this.pos = CursorUtils.advance(this.pos, count, 0);
    return ok(value);
  }

  /**
   * Read an unsigned Exp-Golomb code.
   *
   * The decode works on a local offset and commits the cursor once, so a
   * prefix that never terminates leaves the reader untouched. With the
   * "truncate" suffix policy a suffix cut short by the end of the buffer
   * still decodes from the bits that were present.
   */
  getGlm(): ReadResult<number> {
    const end = this.bufLen * 8;
    let offset = CursorUtils.toBitOffset(this.pos);

    let zeros = 0;
    while (offset < end && this.bitAt(offset) === 0) {
      zeros++;
      offset++;
    }

    if (offset >= end) {
      return this.outOfBuffer(CursorUtils.fromBitOffset(end + 1));
    }

    if (zeros > ExpGolombUtils.MAX_PREFIX_ZEROS) {
      return fail(new CodeOverflowError(this.getPos(), zeros));
    }

    // terminating '1'
    offset++;

    const available = end - offset;
    if (zeros > available && this.golombSuffix === "strict") {
      return this.outOfBuffer(CursorUtils.fromBitOffset(offset + zeros));
    }

    let suffix = 0;
    const suffixBits = Math.min(zeros, available);
    for (let i = 0; i < suffixBits; i++) {
      suffix = suffix * 2 + this.bitAt(offset);
      offset++;
    }

    this.pos = CursorUtils.fromBitOffset(offset);
    return ok(suffix + ExpGolombUtils.baseValue(zeros));
  }

  /**
   * Read a signed Exp-Golomb code
   */
  getSGlm(): ReadResult<number> {
    const result = this.getGlm();
    if (!result.ok) {
      return result;
    }
    return ok(ExpGolombUtils.toSigned(result.value));
  }

  isByteAligned(): boolean {
    return this.pos.bit === 0;
  }

  /**
   * Check if the cursor sits on a multiple-of-`bytes` byte boundary
   */
  isAligned(bytes: number): boolean {
    BitReader.checkAlignment(bytes);
    return this.pos.byte % bytes === 0 && this.pos.bit === 0;
  }

  /**
   * Align to the next byte boundary. No-op when already aligned or at the end.
   */
  alignByte(): ReadResult<BitPosition> {
    if (!CursorUtils.isInBuffer(this.pos.byte, this.bufLen)) {
      return ok(this.getPos());
    }

    if (this.pos.bit !== 0) {
      this.pos = { byte: this.pos.byte + 1, bit: 0 };
    }

    return ok(this.getPos());
  }

  /**
   * Align to the next multiple-of-`bytes` byte boundary.
   * Fails if that boundary is not inside the buffer.
   */
  alignBytes(bytes: number): ReadResult<BitPosition> {
    BitReader.checkAlignment(bytes);

    if (!CursorUtils.isInBuffer(this.pos.byte, this.bufLen)) {
      return ok(this.getPos());
    }

    const rem = this.pos.byte % bytes;
    if (rem === 0 && this.pos.bit === 0) {
      return ok(this.getPos());
    }

    const aligned: BitPosition = { byte: this.pos.byte - rem + bytes, bit: 0 };
    if (!CursorUtils.isInBuffer(aligned.byte, this.bufLen)) {
      return this.outOfBuffer(aligned);
    }

    this.pos = aligned;
    return ok(this.getPos());
  }

  /**
   * Move to an absolute position. Only the byte component is bounds checked;
   * the bit is stored as given and may exceed 7.
   */
  seek(byte: number, bit: number): ReadResult<BitPosition> {
    BitReader.checkCount("Seek byte", byte);
    BitReader.checkCount("Seek bit", bit);

    const target: BitPosition = { byte, bit };
    if (!CursorUtils.isInBuffer(byte, this.bufLen)) {
      return this.outOfBuffer(target);
    }

    this.pos = target;
    return ok(this.getPos());
  }

  /**
   * Move forward relative to the cursor, carrying bit overflow into bytes
   */
  skip(bytes: number, bits: number): ReadResult<BitPosition> {
    BitReader.checkCount("Skip bytes", bytes);
    BitReader.checkCount("Skip bits", bits);

    const target = CursorUtils.advance(this.pos, bytes, bits);
    return this.seek(target.byte, target.bit);
  }

  getPos(): BitPosition {
    return { byte: this.pos.byte, bit: this.pos.bit };
  }

  /**
   * Check if `bytes` + `bits` can still be read from the cursor
   */
  hasRest(bytes: number, bits: number): boolean {
    return CursorUtils.hasRest(this.pos, bytes, bits, this.bufLen);
  }

  inspect(): ReaderSnapshot {
    return {
      label: this.label,
      length: this.bufLen,
      bytePos: this.pos.byte,
      bitPos: this.pos.bit,
      remainingBits: CursorUtils.remainingBits(this.pos, this.bufLen),
      byteAligned: this.isByteAligned(),
    };
  }

  /**
   * Write the buffer length and cursor position to a diagnostic stream
   */
  dump(stream: NodeJS.WritableStream = process.stderr): void {
    const lines = [
      `***** ${this.label} Dump *****`,
      `bufLen  = ${this.bufLen}`,
      `posByte = ${this.pos.byte}`,
      `posBit  = ${this.pos.bit}`,
      "",
      "",
    ];
    stream.write(lines.join("\n"));
  }

  private readUnsigned<T>(bits: number, codec: IntegerCodec<T>): ReadResult<T> {
    BitReader.checkWidth(bits, codec.maxBits);

    // Width-0 reads never touch the buffer
    if (bits === 0) {
      return ok(codec.zero);
    }

    if (!this.hasRest(0, bits)) {
      return this.outOfBuffer(CursorUtils.advance(this.pos, 0, bits));
    }

    const start = CursorUtils.toBitOffset(this.pos);
    let value = codec.zero;
    for (let i = 0; i < bits; i++) {
      value = codec.shiftIn(value, this.bitAt(start + i));
    }

    this.pos = CursorUtils.advance(this.pos, 0, bits);
    return ok(value);
  }

  private readSigned<T>(bits: number, codec: IntegerCodec<T>): ReadResult<T> {
    const result = this.readUnsigned(bits, codec);
    if (!result.ok) {
      return result;
    }
    return ok(codec.signExtend(result.value, bits));
  }

  /**
   * Bit at an absolute bit offset; callers bounds check first
   */
  private bitAt(offset: number): number {
    const byte = this.buffer[Math.floor(offset / 8)];
    if (byte === undefined) {
      throw new Error("Attempted to read beyond buffer");
    }
    return (byte >> (7 - (offset % 8))) & 0x1;
  }

  private outOfBuffer<T>(target: BitPosition): ReadResult<T> {
    return fail(new OutOfBufferError(this.getPos(), target, this.bufLen));
  }

  private static view(buffer: Uint8Array): Buffer {
    if (Buffer.isBuffer(buffer)) {
      return buffer;
    }
    return Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  private static checkLength(buffer: Uint8Array, length: number): number {
    if (!Number.isInteger(length) || length < 0 || length > buffer.length) {
      throw new RangeError(
        `Length must be 0-${buffer.length} for this buffer, got ${length}`
      );
    }
    return length;
  }

  private static checkWidth(bits: number, maxBits: number): void {
    if (!Number.isInteger(bits) || bits < 0 || bits > maxBits) {
      throw new RangeError(`Can only read 0-${maxBits} bits at a time`);
    }
  }

  private static checkCount(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
    }
  }

  private static checkAlignment(bytes: number): void {
    if (!Number.isInteger(bytes) || bytes < 1) {
      throw new RangeError(`Alignment must be a positive integer, got ${bytes}`);
    }
  }
}
