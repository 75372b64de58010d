export { BitReader } from "./BitReader";
export { CursorUtils } from "./CursorUtils";
export { ExpGolombUtils } from "./ExpGolombUtils";
export { UINT32, UINT64 } from "./IntegerCodecs";
export type { IntegerCodec } from "./IntegerCodecs";
export {
  BitReaderError,
  CodeOverflowError,
  NotByteAlignedError,
  OutOfBufferError,
  fail,
  isOk,
  ok,
  unwrap,
} from "./errors";
export type {
  BitPosition,
  BitReaderErrorKind,
  BitReaderOptions,
  GolombSuffixPolicy,
  ReaderSnapshot,
  ReadResult,
} from "./types";
