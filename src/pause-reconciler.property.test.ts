// Property-Based Tests for the pause reconciler
// Non-overlap, boundary filtering and VAD retention over random interval sets

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { MAX_BOUNDARY_MARGIN_SEC, OVERLAP_TOLERANCE_SEC, mergeIntervals } from "./pause-reconciler.js";
import type { Interval } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const DURATION = 60;

function arbitraryInterval(): fc.Arbitrary<Interval> {
  return fc
    .tuple(
      fc.double({ min: 0, max: DURATION, noNaN: true }),
      fc.double({ min: 0.05, max: 4, noNaN: true }),
    )
    .map(([start, length]) => ({ start, end: start + length }));
}

const arbitraryIntervals = fc.array(arbitraryInterval(), { maxLength: 25 });

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("mergeIntervals properties", () => {
  it("never returns two intervals overlapping by the tolerance or more", () => {
    fc.assert(
      fc.property(arbitraryIntervals, arbitraryIntervals, (asr, vad) => {
        const merged = mergeIntervals(asr, vad, DURATION);
        for (let i = 0; i < merged.length; i++) {
          for (let j = i + 1; j < merged.length; j++) {
            const a = merged[i];
            const b = merged[j];
            const overlap = Math.min(a.end, b.end) - Math.max(a.start, b.start);
            expect(overlap).toBeLessThan(OVERLAP_TOLERANCE_SEC);
          }
        }
      }),
      { numRuns: 200 },
    );
  });

  it("returns start-sorted interior intervals", () => {
    fc.assert(
      fc.property(arbitraryIntervals, arbitraryIntervals, (asr, vad) => {
        const merged = mergeIntervals(asr, vad, DURATION);
        for (let i = 0; i < merged.length; i++) {
          expect(merged[i].end).toBeGreaterThan(merged[i].start);
          expect(merged[i].start).toBeGreaterThan(MAX_BOUNDARY_MARGIN_SEC);
          expect(merged[i].end).toBeLessThan(DURATION - MAX_BOUNDARY_MARGIN_SEC);
          if (i > 0) expect(merged[i].start).toBeGreaterThanOrEqual(merged[i - 1].start);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("keeps every interior VAD interval inside some VAD output", () => {
    fc.assert(
      fc.property(arbitraryIntervals, arbitraryIntervals, (asr, vad) => {
        const merged = mergeIntervals(asr, vad, DURATION);
        const interior = vad.filter(
          (v) => v.start > MAX_BOUNDARY_MARGIN_SEC && v.end < DURATION - MAX_BOUNDARY_MARGIN_SEC,
        );
        for (const v of interior) {
          const covered = merged.some(
            (m) => m.source === "vad" && m.start <= v.start && m.end >= v.end,
          );
          expect(covered).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("is independent of input order", () => {
    fc.assert(
      fc.property(arbitraryIntervals, arbitraryIntervals, (asr, vad) => {
        expect(mergeIntervals([...asr].reverse(), [...vad].reverse(), DURATION)).toEqual(
          mergeIntervals(asr, vad, DURATION),
        );
      }),
      { numRuns: 200 },
    );
  });
});
