import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { DuplicateDetector } from '../dedupe/duplicate-detector.js';
import { fingerprintToHex, simhash } from '../dedupe/simhash.js';
import { logger } from '../logger.js';
import { generateText } from './test-helpers.js';

const BASE = 0x0123456789abcdefn;

describe('DuplicateDetector', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('configuration', () => {
    it('rejects a band count that does not divide 64', () => {
      expect(() => new DuplicateDetector({ bandCount: 5 })).toThrow(RangeError);
      expect(() => new DuplicateDetector({ bandCount: 0 })).toThrow(RangeError);
    });

    it('warns when the band count does not exceed the threshold', () => {
      new DuplicateDetector({ bandCount: 2, hammingThreshold: 3 });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('uses 4 bands and a threshold of 3 by default', () => {
      const detector = new DuplicateDetector();
      expect(detector.bandCount).toBe(4);
      expect(detector.hammingThreshold).toBe(3);
      expect(detector.shingleSize).toBe(3);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe('fingerprint', () => {
    it('uses the configured shingle size', () => {
      const detector = new DuplicateDetector({ shingleSize: 2 });
      const text = 'one two three four five';
      expect(detector.fingerprint(text)).toBe(simhash(text, 2));
    });
  });

  describe('admit', () => {
    it('accepts the first fingerprint and rejects one at distance 1', () => {
      const detector = new DuplicateDetector();

      expect(detector.admit(BASE)).toBe(true);
      expect(detector.admit(BASE ^ 1n)).toBe(false);
      expect(detector.size).toBe(1);
    });

    it('finds near-duplicates whose differences span several bands', () => {
      const detector = new DuplicateDetector();
      detector.add(BASE);

      // one flipped bit in each of the three most significant bands
      const spread = BASE ^ (1n << 63n) ^ (1n << 47n) ^ (1n << 31n);
      expect(detector.isDuplicate(spread)).toBe(true);
    });

    it('accepts a fingerprint just beyond the threshold', () => {
      const detector = new DuplicateDetector();
      detector.add(BASE);

      expect(detector.admit(BASE ^ 0b1111n)).toBe(true);
      expect(detector.size).toBe(2);
    });

    it('accepts a fingerprint sharing no band', () => {
      const detector = new DuplicateDetector();
      detector.add(BASE);

      expect(detector.isDuplicate(~BASE & ((1n << 64n) - 1n))).toBe(false);
    });

    it('flags pages sharing a 90% template with a template-sized threshold', () => {
      const detector = new DuplicateDetector({ hammingThreshold: 18, bandCount: 32 });
      const template = generateText(40, 900);

      expect(detector.admit(detector.fingerprint(`${template} ${generateText(41, 100)}`))).toBe(true);
      expect(detector.admit(detector.fingerprint(`${template} ${generateText(42, 100)}`))).toBe(false);
      expect(detector.admit(detector.fingerprint(generateText(43, 1000)))).toBe(true);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('does not index on isDuplicate', () => {
      const detector = new DuplicateDetector();
      expect(detector.isDuplicate(BASE)).toBe(false);
      expect(detector.isDuplicate(BASE)).toBe(false);
      expect(detector.size).toBe(0);
    });
  });

  describe('provisional fingerprints', () => {
    const OTHER = 0xfedcba9876543210n;

    it('counts for duplicate checks but stays out of snapshots until committed', () => {
      const detector = new DuplicateDetector();
      detector.add(BASE);

      expect(detector.admit(OTHER)).toBe(true);
      expect(detector.provisionalCount).toBe(1);
      expect(detector.isDuplicate(OTHER ^ 1n)).toBe(true);
      expect(detector.snapshot().fingerprints).toEqual(['0123456789abcdef']);
      expect(detector.snapshot().bands[0]).toEqual({ '123': ['0123456789abcdef'] });

      detector.commit(OTHER);

      expect(detector.provisionalCount).toBe(0);
      expect(detector.snapshot().fingerprints).toEqual(['0123456789abcdef', 'fedcba9876543210']);
      expect(detector.snapshot().bands[0]).toEqual({
        '123': ['0123456789abcdef'],
        fedc: ['fedcba9876543210'],
      });
    });

    it('forgets a discarded fingerprint', () => {
      const detector = new DuplicateDetector();
      detector.admit(BASE);

      detector.discard(BASE);

      expect(detector.size).toBe(0);
      expect(detector.provisionalCount).toBe(0);
      expect(detector.isDuplicate(BASE)).toBe(false);
      expect(detector.snapshot().bands).toEqual([{}, {}, {}, {}]);
    });

    it('ignores discard for a committed fingerprint', () => {
      const detector = new DuplicateDetector();
      detector.admit(BASE);
      detector.commit(BASE);

      detector.discard(BASE);

      expect(detector.size).toBe(1);
      expect(detector.isDuplicate(BASE ^ 1n)).toBe(true);
    });
  });

  describe('snapshot / restore', () => {
    const others = [BASE ^ 0xff00n, 0xfedcba9876543210n];

    it('exports fingerprints and band tables as hex', () => {
      const detector = new DuplicateDetector();
      detector.add(BASE);

      const snapshot = detector.snapshot();
      expect(snapshot.version).toBe(1);
      expect(snapshot.bits).toBe(64);
      expect(snapshot.bandCount).toBe(4);
      expect(snapshot.hammingThreshold).toBe(3);
      expect(snapshot.fingerprints).toEqual(['0123456789abcdef']);
      expect(snapshot.bands).toEqual([
        { '123': ['0123456789abcdef'] },
        { '4567': ['0123456789abcdef'] },
        { '89ab': ['0123456789abcdef'] },
        { cdef: ['0123456789abcdef'] },
      ]);
    });

    it('round-trips to an index giving the same answers', () => {
      const original = new DuplicateDetector();
      original.add(BASE);
      for (const fingerprint of others) original.add(fingerprint);

      const restored = new DuplicateDetector();
      restored.restore(original.snapshot());

      expect(restored.size).toBe(3);
      for (const candidate of [BASE ^ 1n, BASE ^ 0b1111n, others[1] ^ 0b110n, 0n]) {
        expect(restored.isDuplicate(candidate)).toBe(original.isDuplicate(candidate));
      }
      const { savedAt: _a, ...before } = original.snapshot();
      const { savedAt: _b, ...after } = restored.snapshot();
      expect(after).toEqual(before);
    });

    it('rebuilds the band table for a different band count', () => {
      const original = new DuplicateDetector({ bandCount: 4 });
      original.add(BASE);

      const restored = new DuplicateDetector({ bandCount: 8 });
      restored.restore(original.snapshot());

      const snapshot = restored.snapshot();
      expect(snapshot.bandCount).toBe(8);
      expect(snapshot.bands).toHaveLength(8);
      expect(snapshot.fingerprints).toEqual([fingerprintToHex(BASE)]);
      expect(restored.isDuplicate(BASE ^ 1n)).toBe(true);
    });
  });
});
