/**
 * Fixed-width binary fingerprints
 *
 * A fingerprint is carried as lower-case hex (the form scanners emit and the
 * database stores) plus its big-endian bytes for distance computation.
 */

import { FingerprintError } from "@/utils/errors";

export interface Fingerprint {
  readonly hex: string;
  readonly bits: number;
  readonly bytes: Uint8Array;
}

const HEX_PATTERN = /^[0-9a-f]+$/;

const POPCOUNT = new Uint8Array(256);
for (let i = 1; i < 256; i++) {
  POPCOUNT[i] = (i & 1) + POPCOUNT[i >> 1];
}

/**
 * Parse a hex fingerprint of exactly `bits` width.
 *
 * @throws {FingerprintError} on non-hex input or a width mismatch
 */
export function parseFingerprint(hex: string, bits: number): Fingerprint {
  const normalized = hex.trim().toLowerCase().replace(/^0x/, "");

  if (!HEX_PATTERN.test(normalized)) {
    throw new FingerprintError(`Fingerprint "${hex}" is not hexadecimal`);
  }
  if (normalized.length * 4 !== bits) {
    throw new FingerprintError(
      `Fingerprint "${hex}" has ${normalized.length * 4} bits, expected ${bits}`,
    );
  }

  // Odd nibble counts are left-padded so byte boundaries line up from the right
  const padded = normalized.length % 2 === 0 ? normalized : `0${normalized}`;
  const bytes = new Uint8Array(padded.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(padded.slice(i * 2, i * 2 + 2), 16);
  }

  return { hex: normalized, bits, bytes };
}

export function hammingDistance(a: Fingerprint, b: Fingerprint): number {
  if (a.bits !== b.bits) {
    throw new FingerprintError(
      `Cannot compare a ${a.bits}-bit fingerprint with a ${b.bits}-bit fingerprint`,
    );
  }

  let distance = 0;
  for (let i = 0; i < a.bytes.length; i++) {
    distance += POPCOUNT[a.bytes[i] ^ b.bytes[i]];
  }
  return distance;
}

/**
 * Extract `width` bits starting at bit `start` (bit 0 is the most significant
 * bit of the code) as a hex key for bucket lookups.
 */
export function fingerprintSlice(
  fp: Fingerprint,
  start: number,
  width: number,
): string {
  if (start < 0 || width <= 0 || start + width > fp.bits) {
    throw new FingerprintError(
      `Slice [${start}, ${start + width}) is outside a ${fp.bits}-bit fingerprint`,
    );
  }

  const value = BigInt(`0x${fp.hex}`);
  const shift = BigInt(fp.bits - start - width);
  const mask = (1n << BigInt(width)) - 1n;
  return ((value >> shift) & mask).toString(16);
}
