import { describe, expect, test } from "vitest";
import {
  fingerprintSlice,
  hammingDistance,
  parseFingerprint,
} from "@/fingerprint";
import { FingerprintError } from "@/utils/errors";

describe("parseFingerprint", () => {
  test("normalises case, whitespace and 0x prefix", () => {
    const fp = parseFingerprint(" 0x00FF ", 16);
    expect(fp.hex).toBe("00ff");
    expect(fp.bits).toBe(16);
    expect([...fp.bytes]).toEqual([0, 255]);
  });

  test("pads odd nibble counts on the left", () => {
    const fp = parseFingerprint("abc", 12);
    expect([...fp.bytes]).toEqual([0x0a, 0xbc]);
  });

  test("rejects non-hex input", () => {
    expect(() => parseFingerprint("zz", 8)).toThrow(FingerprintError);
  });

  test("rejects a width mismatch", () => {
    expect(() => parseFingerprint("abcd", 8)).toThrow(
      'Fingerprint "abcd" has 16 bits, expected 8',
    );
  });
});

describe("hammingDistance", () => {
  test("counts differing bits", () => {
    expect(hammingDistance(parseFingerprint("ff", 8), parseFingerprint("00", 8))).toBe(8);
    expect(hammingDistance(parseFingerprint("0f", 8), parseFingerprint("0e", 8))).toBe(1);
    expect(
      hammingDistance(
        parseFingerprint("0000000000000000", 64),
        parseFingerprint("0000000000000007", 64),
      ),
    ).toBe(3);
  });

  test("is zero for identical codes", () => {
    const fp = parseFingerprint("deadbeef", 32);
    expect(hammingDistance(fp, parseFingerprint("DEADBEEF", 32))).toBe(0);
  });

  test("refuses to compare different widths", () => {
    expect(() =>
      hammingDistance(parseFingerprint("ff", 8), parseFingerprint("ffff", 16)),
    ).toThrow(FingerprintError);
  });
});

describe("fingerprintSlice", () => {
  const fp = parseFingerprint("abcd", 16);

  test("extracts bit ranges from the most significant end", () => {
    expect(fingerprintSlice(fp, 0, 4)).toBe("a");
    expect(fingerprintSlice(fp, 4, 8)).toBe("bc");
    expect(fingerprintSlice(fp, 12, 4)).toBe("d");
    expect(fingerprintSlice(fp, 0, 16)).toBe("abcd");
  });

  test("rejects ranges outside the code", () => {
    expect(() => fingerprintSlice(fp, 10, 8)).toThrow(FingerprintError);
    expect(() => fingerprintSlice(fp, 0, 0)).toThrow(FingerprintError);
  });
});
