import { describe, it, expect } from "vitest";
import { currentCode, decodeBase32, hotp, millisecondsRemaining, secondsRemaining } from "../totp.js";
import { InvalidOtpSecretError } from "../../errors.js";

// ASCII "12345678901234567890" encoded as base32
const REFERENCE_SECRET = "GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ";

describe("decodeBase32", () => {
  it("should decode to the original key bytes", () => {
    expect(decodeBase32(REFERENCE_SECRET).toString("ascii")).toBe("12345678901234567890");
  });

  it("should ignore padding, spaces and case", () => {
    expect(decodeBase32("gezd gnbv gy3t qojq").toString("ascii")).toBe("1234567890");
    expect(decodeBase32("MZXW6===").toString("ascii")).toBe("foo");
  });

  it("should reject characters outside the alphabet", () => {
    expect(() => decodeBase32("ABC1")).toThrow(InvalidOtpSecretError);
    expect(() => decodeBase32("   ")).toThrow(InvalidOtpSecretError);
  });
});

describe("hotp", () => {
  it("should match the counter-based reference values", () => {
    const key = decodeBase32(REFERENCE_SECRET);
    expect(hotp(key, 0, 6)).toBe("755224");
    expect(hotp(key, 1, 6)).toBe("287082");
    expect(hotp(key, 2, 6)).toBe("359152");
    expect(hotp(key, 9, 6)).toBe("520489");
  });
});

describe("currentCode", () => {
  it("should match the time-based reference values", () => {
    expect(currentCode(REFERENCE_SECRET, 30, 8, 59_000)).toBe("94287082");
    expect(currentCode(REFERENCE_SECRET, 30, 8, 1_111_111_109_000)).toBe("07081804");
    expect(currentCode(REFERENCE_SECRET, 30, 8, 1_234_567_890_000)).toBe("89005924");
    expect(currentCode(REFERENCE_SECRET, 30, 8, 2_000_000_000_000)).toBe("69279037");
  });

  it("should produce 6 numeric digits by default", () => {
    const code = currentCode("BASE32SECRET");
    expect(code).toMatch(/^\d{6}$/);
  });

  it("should keep leading zeros", () => {
    expect(currentCode(REFERENCE_SECRET, 30, 6, 1_234_567_890_000)).toBe("005924");
  });

  it("should change exactly at the 30 second boundary", () => {
    expect(currentCode(REFERENCE_SECRET, 30, 6, 30_000)).toBe("287082");
    expect(currentCode(REFERENCE_SECRET, 30, 6, 59_999)).toBe("287082");
    expect(currentCode(REFERENCE_SECRET, 30, 6, 60_000)).toBe("359152");
  });

  it("should reject unusable digit counts", () => {
    expect(() => currentCode(REFERENCE_SECRET, 30, 0)).toThrow(RangeError);
    expect(() => currentCode(REFERENCE_SECRET, 0, 6)).toThrow(RangeError);
  });
});

describe("secondsRemaining", () => {
  it("should count down within the window", () => {
    expect(secondsRemaining(30, 0)).toBe(30);
    expect(secondsRemaining(30, 28_500)).toBe(2);
    expect(secondsRemaining(30, 31_000)).toBe(29);
  });

  it("should round a partial second up", () => {
    expect(secondsRemaining(30, 27_900)).toBe(3);
  });
});

describe("millisecondsRemaining", () => {
  it("should keep the fraction of the last second", () => {
    expect(millisecondsRemaining(30, 27_900)).toBe(2_100);
    expect(millisecondsRemaining(30, 30_000)).toBe(30_000);
    expect(millisecondsRemaining(30, 1_700_000_039_300)).toBe(700);
  });
});
