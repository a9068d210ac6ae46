// Presentation Analyzer - Pause Reconciler
//
// Merges the two independently detected silence streams (gaps between ASR
// words, and VAD silence) into one sorted list with no overlapping entries,
// then classifies each pause by duration and by the words around it.
//
// Resolution rules, applied in start order:
//  - same source overlapping: union of the two intervals
//  - vad against asr: the vad interval wins, the asr interval is dropped
// Survivors intersect by less than OVERLAP_TOLERANCE_SEC.

import type {
  Interval,
  Pause,
  PauseContext,
  PauseQuality,
  PauseSource,
  TranscriptWord,
} from "./types.js";
import { isFillerToken, normalizeToken } from "./filler-detector.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const OVERLAP_TOLERANCE_SEC = 0.1;

/** Intervals within this distance of either end of the recording are not mid-speech pauses. */
export const MAX_BOUNDARY_MARGIN_SEC = 0.3;

const SHORT_PAUSE_MAX_SEC = 0.5;
const MEDIUM_PAUSE_MAX_SEC = 1.0;

// Clause or sentence boundary on the word before the pause
const BOUNDARY_PUNCT = /[.!?,;:]["')\]]*$/;

// Duration window in which an unpunctuated pause may still read as deliberate
const DELIBERATE_MIN_SEC = 0.5;
const DELIBERATE_MAX_SEC = 3.0;

const COMMON_SENTENCE_FINAL_WORDS = new Set([
  "right", "so", "well", "yes", "no", "okay", "ok", "too", "now", "then",
  "here", "there", "today", "again", "together", "everyone", "all",
]);

// ─── Interval Helpers ───────────────────────────────────────────────────────────

export interface SourcedInterval extends Interval {
  source: PauseSource;
}

function overlap(a: Interval, b: Interval): number {
  return Math.min(a.end, b.end) - Math.max(a.start, b.start);
}

function boundaryMargin(durationSec: number): number {
  return Math.min(MAX_BOUNDARY_MARGIN_SEC, durationSec / 4);
}

function isInterior(interval: Interval, durationSec: number): boolean {
  const margin = boundaryMargin(durationSec);
  return (
    Number.isFinite(interval.start) &&
    Number.isFinite(interval.end) &&
    interval.end > interval.start &&
    interval.start > margin &&
    interval.end < durationSec - margin
  );
}

function compareIntervals(a: SourcedInterval, b: SourcedInterval): number {
  if (a.start !== b.start) return a.start - b.start;
  if (a.end !== b.end) return a.end - b.end;
  // vad first on exact ties so the result does not depend on input order
  return a.source === b.source ? 0 : a.source === "vad" ? -1 : 1;
}

/**
 * Resolves overlaps between the two sources. Returns start-sorted intervals
 * no two of which overlap by OVERLAP_TOLERANCE_SEC or more.
 */
export function mergeIntervals(
  asrIntervals: readonly Interval[],
  vadIntervals: readonly Interval[],
  durationSec: number,
): SourcedInterval[] {
  const candidates: SourcedInterval[] = [
    ...asrIntervals.map((i) => ({ start: i.start, end: i.end, source: "asr" as const })),
    ...vadIntervals.map((i) => ({ start: i.start, end: i.end, source: "vad" as const })),
  ]
    .filter((i) => isInterior(i, durationSec))
    .sort(compareIntervals);

  const kept: SourcedInterval[] = [];

  for (const candidate of candidates) {
    let pending: SourcedInterval = { ...candidate };
    let dropped = false;

    // Each pass removes one kept entry or ends the loop
    for (;;) {
      const idx = kept.findIndex((k) => overlap(k, pending) >= OVERLAP_TOLERANCE_SEC);
      if (idx < 0) break;
      const existing = kept[idx];

      if (existing.source === pending.source) {
        kept.splice(idx, 1);
        pending = {
          start: Math.min(existing.start, pending.start),
          end: Math.max(existing.end, pending.end),
          source: pending.source,
        };
      } else if (pending.source === "vad") {
        kept.splice(idx, 1);
      } else {
        dropped = true;
        break;
      }
    }

    if (!dropped) {
      kept.push(pending);
      kept.sort(compareIntervals);
    }
  }

  return kept;
}

// ─── Classification ─────────────────────────────────────────────────────────────

export function classifyPauseQuality(durationSec: number): PauseQuality {
  if (durationSec < SHORT_PAUSE_MAX_SEC) return "short";
  if (durationSec < MEDIUM_PAUSE_MAX_SEC) return "medium";
  return "long";
}

function startsWithCapital(word: string): boolean {
  const first = word.trim().charAt(0);
  return first.length > 0 && first === first.toUpperCase() && first !== first.toLowerCase();
}

/**
 * Classifies a pause by its neighbouring words.
 *
 * - awkward: no word on one side, the preceding word is a filler, or the
 *   speaker repeats the preceding word after the pause
 * - helpful: the preceding word closes a clause or sentence
 * - otherwise helpful only when at least two of: deliberate duration, a
 *   capitalized following word, a common sentence-final preceding word
 *
 * `words` must be sorted by start time.
 */
export function classifyPauseContext(
  pause: Interval,
  words: readonly TranscriptWord[],
): PauseContext {
  let before: TranscriptWord | null = null;
  let after: TranscriptWord | null = null;
  for (const w of words) {
    if (w.startTime < pause.start) {
      before = w;
    } else {
      after = w;
      break;
    }
  }

  if (!before || !after) return "awkward";

  const prev = normalizeToken(before.word);
  const next = normalizeToken(after.word);

  if (isFillerToken(before.word)) return "awkward";
  if (prev.length > 0 && prev === next) return "awkward";

  if (BOUNDARY_PUNCT.test(before.word.trim())) return "helpful";

  const duration = pause.end - pause.start;
  let indicators = 0;
  if (duration >= DELIBERATE_MIN_SEC && duration <= DELIBERATE_MAX_SEC) indicators++;
  if (startsWithCapital(after.word)) indicators++;
  if (COMMON_SENTENCE_FINAL_WORDS.has(prev)) indicators++;

  return indicators >= 2 ? "helpful" : "awkward";
}

// ─── Reconciler ─────────────────────────────────────────────────────────────────

export interface ReconcileInput {
  asrIntervals: readonly Interval[];
  vadIntervals: readonly Interval[];
  durationSec: number;
  /** ASR words, used for the helpful/awkward context */
  words: readonly TranscriptWord[];
}

export function reconcilePauses(input: ReconcileInput): Pause[] {
  const words = [...input.words].sort((a, b) => a.startTime - b.startTime);

  return mergeIntervals(input.asrIntervals, input.vadIntervals, input.durationSec).map(
    (interval) => ({
      start_sec: interval.start,
      end_sec: interval.end,
      source: interval.source,
      quality: classifyPauseQuality(interval.end - interval.start),
      context: classifyPauseContext(interval, words),
    }),
  );
}
