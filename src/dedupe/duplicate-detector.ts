/**
 * Near-duplicate detection over simhash fingerprints with a banded index.
 *
 * A fingerprint is split into `bandCount` bands; any stored fingerprint that
 * shares at least one band value is a candidate and gets an exact Hamming
 * check. With `bandCount > hammingThreshold`, two fingerprints within the
 * threshold always share a band, so no near-duplicate is missed.
 *
 * Fingerprints taken through admit() are provisional until commit(): they
 * count for duplicate checks but stay out of snapshots, so a saved index never
 * holds a page whose URL is not yet settled.
 */
import { logger } from '../logger.js';
import {
  FINGERPRINT_BITS,
  type Fingerprint,
  fingerprintFromHex,
  fingerprintToHex,
  hammingDistance,
  simhash,
  splitBands,
} from './simhash.js';

export interface DuplicateDetectorOptions {
  hammingThreshold?: number;
  bandCount?: number;
  shingleSize?: number;
}

export interface DuplicateIndexSnapshot {
  version: 1;
  savedAt: string;
  bits: number;
  bandCount: number;
  hammingThreshold: number;
  fingerprints: string[];
  /** One table per band: band value (hex) → fingerprints (hex). */
  bands: Array<Record<string, string[]>>;
}

export const DEFAULT_HAMMING_THRESHOLD = 3;
export const DEFAULT_BAND_COUNT = 4;
export const DEFAULT_SHINGLE_SIZE = 3;

export class DuplicateDetector {
  readonly hammingThreshold: number;
  readonly bandCount: number;
  readonly shingleSize: number;

  private fingerprints: Fingerprint[] = [];
  private readonly provisional = new Set<Fingerprint>();
  private bands: Array<Map<bigint, Set<Fingerprint>>>;

  constructor(options: DuplicateDetectorOptions = {}) {
    this.hammingThreshold = options.hammingThreshold ?? DEFAULT_HAMMING_THRESHOLD;
    this.bandCount = options.bandCount ?? DEFAULT_BAND_COUNT;
    this.shingleSize = options.shingleSize ?? DEFAULT_SHINGLE_SIZE;

    if (
      !Number.isInteger(this.bandCount) ||
      this.bandCount < 1 ||
      FINGERPRINT_BITS % this.bandCount !== 0
    ) {
      throw new RangeError(`bandCount must divide ${FINGERPRINT_BITS}, got ${this.bandCount}`);
    }
    if (this.bandCount <= this.hammingThreshold) {
      logger.warn(
        { bandCount: this.bandCount, hammingThreshold: this.hammingThreshold },
        'Band count does not exceed the Hamming threshold; some near-duplicates may be missed'
      );
    }

    this.bands = this.emptyBands();
  }

  fingerprint(text: string): Fingerprint {
    return simhash(text, this.shingleSize);
  }

  isDuplicate(fingerprint: Fingerprint): boolean {
    const bandValues = splitBands(fingerprint, this.bandCount);

    for (let band = 0; band < this.bandCount; band++) {
      const candidates = this.bands[band].get(bandValues[band]);
      if (!candidates) continue;
      for (const candidate of candidates) {
        if (hammingDistance(candidate, fingerprint) <= this.hammingThreshold) return true;
      }
    }
    return false;
  }

  /** Index an accepted page's fingerprint. */
  add(fingerprint: Fingerprint): void {
    const bandValues = splitBands(fingerprint, this.bandCount);
    for (let band = 0; band < this.bandCount; band++) {
      const table = this.bands[band];
      const bucket = table.get(bandValues[band]);
      if (bucket) {
        bucket.add(fingerprint);
      } else {
        table.set(bandValues[band], new Set([fingerprint]));
      }
    }
    this.fingerprints.push(fingerprint);
  }

  /**
   * Check and index in one step; false when the fingerprint is a
   * near-duplicate. An admitted fingerprint is provisional.
   */
  admit(fingerprint: Fingerprint): boolean {
    if (this.isDuplicate(fingerprint)) return false;
    this.add(fingerprint);
    this.provisional.add(fingerprint);
    return true;
  }

  /** Make an admitted fingerprint part of saved state. */
  commit(fingerprint: Fingerprint): void {
    this.provisional.delete(fingerprint);
  }

  /** Drop an admitted fingerprint whose page was never saved. */
  discard(fingerprint: Fingerprint): void {
    if (!this.provisional.delete(fingerprint)) return;

    const bandValues = splitBands(fingerprint, this.bandCount);
    for (let band = 0; band < this.bandCount; band++) {
      const table = this.bands[band];
      const bucket = table.get(bandValues[band]);
      if (!bucket) continue;
      bucket.delete(fingerprint);
      if (bucket.size === 0) table.delete(bandValues[band]);
    }
    const index = this.fingerprints.indexOf(fingerprint);
    if (index !== -1) this.fingerprints.splice(index, 1);
  }

  get size(): number {
    return this.fingerprints.length;
  }

  get provisionalCount(): number {
    return this.provisional.size;
  }

  /** Export committed fingerprints only. */
  snapshot(): DuplicateIndexSnapshot {
    const committed = (fingerprint: Fingerprint) => !this.provisional.has(fingerprint);
    return {
      version: 1,
      savedAt: new Date().toISOString(),
      bits: FINGERPRINT_BITS,
      bandCount: this.bandCount,
      hammingThreshold: this.hammingThreshold,
      fingerprints: this.fingerprints.filter(committed).map(fingerprintToHex),
      bands: this.bands.map((table) => {
        const out: Record<string, string[]> = {};
        for (const [value, bucket] of table) {
          const kept = [...bucket].filter(committed);
          if (kept.length > 0) out[value.toString(16)] = kept.map(fingerprintToHex);
        }
        return out;
      }),
    };
  }

  /**
   * Replace the index with a snapshot. The band table is taken as stored when
   * its band count matches this detector; otherwise it is rebuilt.
   */
  restore(snapshot: DuplicateIndexSnapshot): void {
    const fingerprints = snapshot.fingerprints.map(fingerprintFromHex);
    this.provisional.clear();

    if (snapshot.bandCount !== this.bandCount || snapshot.bands.length !== this.bandCount) {
      logger.info(
        { stored: snapshot.bandCount, configured: this.bandCount },
        'Rebuilding duplicate index for a new band count'
      );
      this.fingerprints = [];
      this.bands = this.emptyBands();
      for (const fingerprint of fingerprints) this.add(fingerprint);
      return;
    }

    this.fingerprints = fingerprints;
    this.bands = snapshot.bands.map((table) => {
      const restored = new Map<bigint, Set<Fingerprint>>();
      for (const [value, bucket] of Object.entries(table)) {
        restored.set(BigInt(`0x${value}`), new Set(bucket.map(fingerprintFromHex)));
      }
      return restored;
    });
  }

  private emptyBands(): Array<Map<bigint, Set<Fingerprint>>> {
    return Array.from({ length: this.bandCount }, () => new Map<bigint, Set<Fingerprint>>());
  }
}
