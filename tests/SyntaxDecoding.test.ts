import { BitReader, OutOfBufferError, ReadResult, isOk, unwrap } from "../src";
import { BitWriter } from "../src/__tests__/support/BitWriter";

interface ParameterSet {
  profile: number;
  constrained: boolean;
  id: number;
  log2MaxFrameNum: number;
  qpOffset: number;
  widthInUnits: number;
  timestamp: bigint;
  payload: number[];
}

/**
 * Decode a made-up parameter set: u(8) u(1) ue ue se ue u(64), byte
 * alignment, then a 3-byte payload
 */
function parseParameterSet(reader: BitReader): ParameterSet {
  const profile = unwrap(reader.getUInt32(8));
  const constrained = unwrap(reader.getBool());
  const id = unwrap(reader.getGlm());
  const log2MaxFrameNum = unwrap(reader.getGlm());
  const qpOffset = unwrap(reader.getSGlm());
  const widthInUnits = unwrap(reader.getGlm());
  const timestamp = unwrap(reader.getUInt64(64));
  unwrap(reader.alignByte());
  const payload = Array.from(unwrap(reader.getBytes(3)));

  return {
    profile,
    constrained,
    id,
    log2MaxFrameNum,
    qpOffset,
    widthInUnits,
    timestamp,
    payload,
  };
}

function writeParameterSet(writer: BitWriter): BitWriter {
  return writer
    .writeBits(100, 8)
    .writeBit(1)
    .writeExpGolomb(0)
    .writeExpGolomb(4)
    .writeSignedExpGolomb(-3)
    .writeExpGolomb(119)
    .writeBits(0x00000123, 32)
    .writeBits(0x89abcdef, 32)
    .padToByte()
    .writeBits(0xde, 8)
    .writeBits(0xad, 8)
    .writeBits(0x01, 8);
}

describe("Syntax decoding", () => {
  let buffer: Buffer;

  beforeAll(() => {
    buffer = writeParameterSet(new BitWriter()).getBuffer();
  });

  it("should lay out the fixture as expected", () => {
    expect(buffer.length).toBe(16);
  });

  it("should decode every field of a parameter set", () => {
    const reader = new BitReader(buffer);

    expect(parseParameterSet(reader)).toEqual({
      profile: 100,
      constrained: true,
      id: 0,
      log2MaxFrameNum: 4,
      qpOffset: -3,
      widthInUnits: 119,
      timestamp: 0x0000012389abcdefn,
      payload: [0xde, 0xad, 0x01],
    });
    expect(reader.getPos()).toEqual({ byte: 16, bit: 0 });
    expect(reader.hasRest(0, 1)).toBe(false);
  });

  it("should stop at the 64-bit field when the header is cut short", () => {
    const reader = new BitReader(buffer, 10);

    expect(() => parseParameterSet(reader)).toThrow(OutOfBufferError);
    expect(reader.getPos()).toEqual({ byte: 4, bit: 1 });
  });

  it("should reuse one reader across buffers", () => {
    const second = writeParameterSet(new BitWriter().writePattern("0000 0000"))
      .getBuffer();
    const reader = new BitReader(buffer);

    parseParameterSet(reader);
    reader.reset(second);
    reader.skip(1, 0);

    expect(parseParameterSet(reader).widthInUnits).toBe(119);
  });

  it("should let callers branch on results without exceptions", () => {
    const reader = new BitReader(Buffer.from([0x00]));
    const results: Array<ReadResult<number>> = [reader.getUInt32(4), reader.getGlm()];

    expect(results.map((result) => isOk(result))).toEqual([true, false]);
    expect(reader.getPos()).toEqual({ byte: 0, bit: 4 });
  });
});
