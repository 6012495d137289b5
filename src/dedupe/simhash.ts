/**
 * 64-bit simhash over weighted word shingles
 */
import { createHash } from 'node:crypto';

export const FINGERPRINT_BITS = 64;

const MASK_64 = (1n << 64n) - 1n;
const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

export type Fingerprint = bigint;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Overlapping word shingles with their occurrence counts. A text shorter than
 * the shingle size becomes a single shingle.
 */
export function shingles(tokens: string[], size: number): Map<string, number> {
  const counts = new Map<string, number>();
  if (tokens.length === 0) return counts;

  if (tokens.length <= size) {
    counts.set(tokens.join(' '), 1);
    return counts;
  }

  for (let i = 0; i + size <= tokens.length; i++) {
    const shingle = tokens.slice(i, i + size).join(' ');
    counts.set(shingle, (counts.get(shingle) ?? 0) + 1);
  }
  return counts;
}

/** First 8 bytes of the MD5 digest, big-endian. */
export function hashShingle(shingle: string): bigint {
  return createHash('md5').update(shingle, 'utf8').digest().readBigUInt64BE(0);
}

/**
 * Classic simhash: every shingle votes on each output bit with its weight,
 * positive when its hash has the bit set. Bits with a positive total are set.
 */
export function simhash(text: string, shingleSize: number = 3): Fingerprint {
  const votes = new Array<number>(FINGERPRINT_BITS).fill(0);

  for (const [shingle, weight] of shingles(tokenize(text), shingleSize)) {
    const hash = hashShingle(shingle);
    for (let bit = 0; bit < FINGERPRINT_BITS; bit++) {
      votes[bit] += (hash >> BigInt(bit)) & 1n ? weight : -weight;
    }
  }

  let fingerprint = 0n;
  for (let bit = 0; bit < FINGERPRINT_BITS; bit++) {
    if (votes[bit] > 0) fingerprint |= 1n << BigInt(bit);
  }
  return fingerprint;
}

export function hammingDistance(a: Fingerprint, b: Fingerprint): number {
  let diff = (a ^ b) & MASK_64;
  let count = 0;
  while (diff) {
    diff &= diff - 1n;
    count++;
  }
  return count;
}

/** Split into `bandCount` equal bands, most significant band first. */
export function splitBands(fingerprint: Fingerprint, bandCount: number): bigint[] {
  const width = BigInt(FINGERPRINT_BITS / bandCount);
  const bandMask = (1n << width) - 1n;
  const bands: bigint[] = [];
  for (let band = bandCount - 1; band >= 0; band--) {
    bands.push((fingerprint >> (width * BigInt(band))) & bandMask);
  }
  return bands;
}

export function fingerprintToHex(fingerprint: Fingerprint): string {
  return (fingerprint & MASK_64).toString(16).padStart(16, '0');
}

export function fingerprintFromHex(hex: string): Fingerprint {
  if (!/^[0-9a-f]{1,16}$/i.test(hex)) {
    throw new Error(`Invalid fingerprint: ${hex}`);
  }
  return BigInt(`0x${hex}`);
}
