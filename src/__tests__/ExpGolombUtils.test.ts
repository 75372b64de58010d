import { ExpGolombUtils } from "../ExpGolombUtils";

describe("ExpGolombUtils", () => {
  it("should compute the base value of a prefix", () => {
    expect(ExpGolombUtils.baseValue(0)).toBe(0);
    expect(ExpGolombUtils.baseValue(3)).toBe(7);
    expect(ExpGolombUtils.baseValue(31)).toBe(2147483647);
  });

  it("should map code numbers to signed values", () => {
    expect([0, 1, 2, 3, 4, 5, 6].map((u) => ExpGolombUtils.toSigned(u))).toEqual([
      0, 1, -1, 2, -2, 3, -3,
    ]);
  });

  it("should map code numbers above 2^31", () => {
    expect(ExpGolombUtils.toSigned(4294967293)).toBe(2147483647);
    expect(ExpGolombUtils.toSigned(4294967294)).toBe(-2147483647);
  });

  it("should invert the signed mapping", () => {
    [-5, -1, 0, 1, 5].forEach((value) => {
      expect(ExpGolombUtils.toSigned(ExpGolombUtils.fromSigned(value))).toBe(value);
    });
  });

  it("should measure code lengths", () => {
    expect(ExpGolombUtils.codeLength(0)).toBe(1);
    expect(ExpGolombUtils.codeLength(1)).toBe(3);
    expect(ExpGolombUtils.codeLength(2)).toBe(3);
    expect(ExpGolombUtils.codeLength(3)).toBe(5);
    expect(ExpGolombUtils.codeLength(6)).toBe(5);
    expect(ExpGolombUtils.codeLength(7)).toBe(7);
  });

  it("should reject negative values", () => {
    expect(() => ExpGolombUtils.codeLength(-1)).toThrow(RangeError);
  });
});
