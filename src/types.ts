/**
 * Type definitions for the bit cursor reader
 */

import type { BitReaderError } from "./errors";

/**
 * Cursor position. `bit` counts from the most-significant bit of `byte`.
 */
export interface BitPosition {
  readonly byte: number;
  readonly bit: number;
}

export type GolombSuffixPolicy = "strict" | "truncate";

export interface BitReaderOptions {
  /**
   * What to do when an Exp-Golomb suffix runs past the end of the buffer.
   * "strict" fails the read; "truncate" keeps the bits that were available.
   */
  golombSuffix?: GolombSuffixPolicy;
  label?: string;
}

export interface ReaderSnapshot {
  label: string;
  length: number;
  bytePos: number;
  bitPos: number;
  remainingBits: number;
  byteAligned: boolean;
}

export type ReadResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: BitReaderError };

export type BitReaderErrorKind = "OutOfBuffer" | "NotByteAligned" | "CodeOverflow";
