import { createHmac } from "crypto";
import { InvalidOtpSecretError } from "../errors.js";

const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

/**
 * Decode an RFC 4648 base32 secret. Whitespace, dashes and `=` padding are
 * ignored and lowercase is accepted, matching how authenticator apps display keys.
 */
export function decodeBase32(secret: string): Buffer {
  const clean = secret.replace(/[\s=-]/g, "").toUpperCase();
  if (clean.length === 0) {
    throw new InvalidOtpSecretError("OTP secret is empty");
  }

  const bytes: number[] = [];
  let buffer = 0;
  let bits = 0;
  for (const char of clean) {
    const index = BASE32_ALPHABET.indexOf(char);
    if (index < 0) {
      throw new InvalidOtpSecretError(`OTP secret contains a non-base32 character: "${char}"`);
    }
    buffer = ((buffer << 5) | index) & 0xffff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      bytes.push((buffer >> bits) & 0xff);
    }
  }
  return Buffer.from(bytes);
}

/** Index of the time step containing `now` (ms since epoch). */
export function timeStepIndex(timeStepSeconds: number, now: number): number {
  return Math.floor(now / 1000 / timeStepSeconds);
}

/** Milliseconds left before the step containing `now` rolls over. */
export function millisecondsRemaining(timeStepSeconds: number, now: number): number {
  const stepMs = timeStepSeconds * 1000;
  return stepMs - (now % stepMs);
}

/** Seconds left in the current step, rounded up. */
export function secondsRemaining(timeStepSeconds: number, now: number): number {
  return Math.ceil(millisecondsRemaining(timeStepSeconds, now) / 1000);
}

/** HOTP (RFC 4226) over an explicit counter. */
export function hotp(key: Buffer, counter: number, digits: number): string {
  const counterBuf = Buffer.alloc(8);
  counterBuf.writeBigUInt64BE(BigInt(counter));
  const hmac = createHmac("sha1", key).update(counterBuf).digest();

  const offset = hmac[hmac.length - 1] & 0x0f;
  const binary =
    ((hmac[offset] & 0x7f) << 24) |
    (hmac[offset + 1] << 16) |
    (hmac[offset + 2] << 8) |
    hmac[offset + 3];

  return (binary % 10 ** digits).toString().padStart(digits, "0");
}

/**
 * Current TOTP code (RFC 6238, HMAC-SHA1) for a base32 shared secret.
 */
export function currentCode(
  secret: string,
  timeStepSeconds: number = 30,
  digits: number = 6,
  now: number = Date.now()
): string {
  if (!Number.isInteger(digits) || digits < 1 || digits > 9) {
    throw new RangeError(`OTP digits must be an integer between 1 and 9, got ${digits}`);
  }
  if (!(timeStepSeconds > 0)) {
    throw new RangeError(`OTP time step must be positive, got ${timeStepSeconds}`);
  }
  return hotp(decodeBase32(secret), timeStepIndex(timeStepSeconds, now), digits);
}
