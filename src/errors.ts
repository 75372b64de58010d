import type { BitPosition, BitReaderErrorKind, ReadResult } from "./types";

/**
 * Base class for every recoverable read failure
 */
export abstract class BitReaderError extends Error {
  abstract readonly kind: BitReaderErrorKind;
  readonly position: BitPosition;

  constructor(message: string, position: BitPosition) {
    super(message);
    this.name = new.target.name;
    this.position = position;
  }
}

/**
 * The operation needed bits up to `target`, which lies past the end of the buffer
 */
export class OutOfBufferError extends BitReaderError {
  readonly kind = "OutOfBuffer";
  readonly target: BitPosition;
  readonly length: number;

  constructor(position: BitPosition, target: BitPosition, length: number) {
    super(
      `Attempted to read beyond buffer: byte ${target.byte}, bit ${target.bit} ` +
        `requested from byte ${position.byte}, bit ${position.bit} (length ${length})`,
      position
    );
    this.target = target;
    this.length = length;
  }
}

export class NotByteAlignedError extends BitReaderError {
  readonly kind = "NotByteAligned";

  constructor(position: BitPosition) {
    super(
      `Cursor is not byte aligned (byte ${position.byte}, bit ${position.bit})`,
      position
    );
  }
}

/**
 * Raised when an Exp-Golomb prefix is too long for a 32-bit result
 */
export class CodeOverflowError extends BitReaderError {
  readonly kind = "CodeOverflow";
  readonly zeros: number;

  constructor(position: BitPosition, zeros: number) {
    super(
      `Exp-Golomb prefix of ${zeros} zeros overflows 32 bits ` +
        `(byte ${position.byte}, bit ${position.bit})`,
      position
    );
    this.zeros = zeros;
  }
}

export function ok<T>(value: T): ReadResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: BitReaderError): ReadResult<T> {
  return { ok: false, error };
}

export function isOk<T>(
  result: ReadResult<T>
): result is { ok: true; value: T } {
  return result.ok;
}

/**
 * Return the value of a successful read, or throw the error it carries
 */
export function unwrap<T>(result: ReadResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
