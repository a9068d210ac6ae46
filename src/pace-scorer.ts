// Presentation Analyzer - Pace Scorer
// Words per minute against a conversational band, with per-segment checks.

import type { FeedbackItem, Interval, PaceDetails, TranscriptWord } from "./types.js";
import {
  MIN_ANALYSIS_DURATION_SEC,
  abstain,
  type Scorer,
  type ScorerVerdict,
} from "./metric-framework.js";
import { mean, round } from "./stats.js";

export const SLOW_WPM = 110;
export const FAST_WPM = 170;
export const SEGMENT_SEC = 30;

const LONG_GAP_SEC = 0.4;
const CONFIDENCE = 0.8;

export type PaceLabel = "too_slow" | "optimal" | "too_fast";

const LABEL_SCORES: Record<PaceLabel, number> = {
  too_slow: 40,
  optimal: 90,
  too_fast: 50,
};

export function labelForWpm(wpm: number): PaceLabel {
  if (wpm < SLOW_WPM) return "too_slow";
  if (wpm <= FAST_WPM) return "optimal";
  return "too_fast";
}

export interface SegmentPace {
  start: number;
  end: number;
  wordCount: number;
  wpm: number;
}

/**
 * Words per minute in consecutive fixed-length segments. A word belongs to
 * the segment containing its start time; the last segment is measured over
 * its actual length.
 */
export function segmentPace(
  words: readonly TranscriptWord[],
  durationSec: number,
  segmentSec: number = SEGMENT_SEC,
): SegmentPace[] {
  const segments: SegmentPace[] = [];
  for (let start = 0; start < durationSec; start += segmentSec) {
    const end = Math.min(start + segmentSec, durationSec);
    const wordCount = words.filter((w) => w.startTime >= start && w.startTime < end).length;
    segments.push({ start, end, wordCount, wpm: wordCount / ((end - start) / 60) });
  }
  return segments;
}

export interface PaceInput {
  words: readonly TranscriptWord[];
  durationSec: number;
  vadSpeechSegments: readonly Interval[];
}

export function scorePace(input: PaceInput): ScorerVerdict<PaceDetails> {
  const { words, durationSec } = input;
  if (!(durationSec >= MIN_ANALYSIS_DURATION_SEC)) return abstain("talk_too_short");
  if (words.length === 0) return abstain("no_words");

  const wpm = words.length / (durationSec / 60);
  const label = labelForWpm(wpm);

  const gaps: number[] = [];
  for (let i = 1; i < words.length; i++) {
    gaps.push(Math.max(0, words[i].startTime - words[i - 1].endTime));
  }
  const speech = input.vadSpeechSegments.reduce((sum, s) => sum + (s.end - s.start), 0);

  // Segments shorter than 10 s give unstable rates
  const segments = segmentPace(words, durationSec).filter((s) => s.end - s.start >= 10);
  const segmentRates = segments.map((s) => s.wpm);

  const feedback: FeedbackItem[] = [];
  if (label === "optimal") {
    feedback.push({
      start_sec: 0,
      end_sec: durationSec,
      metric: "pace",
      message: `Your pace of ${Math.round(wpm)} words per minute is easy to follow.`,
      tip_type: "strength",
    });
  } else {
    feedback.push({
      start_sec: 0,
      end_sec: durationSec,
      metric: "pace",
      message:
        label === "too_fast"
          ? `Your pace of ${Math.round(wpm)} words per minute is fast. Add strategic pauses and aim for ${SLOW_WPM}-${FAST_WPM}.`
          : `Your pace of ${Math.round(wpm)} words per minute is slow. Reduce hesitation pauses and aim for ${SLOW_WPM}-${FAST_WPM}.`,
      tip_type: "improvement",
    });
  }

  for (const s of segments) {
    if (s.wordCount === 0) continue;
    const segmentLabel = labelForWpm(s.wpm);
    if (segmentLabel === "optimal" || segmentLabel === label) continue;
    feedback.push({
      start_sec: s.start,
      end_sec: s.end,
      metric: "pace",
      message:
        segmentLabel === "too_fast"
          ? `You speed up to ${Math.round(s.wpm)} words per minute here.`
          : `You slow down to ${Math.round(s.wpm)} words per minute here.`,
      tip_type: "improvement",
    });
  }

  return {
    kind: "scored",
    score: LABEL_SCORES[label],
    label,
    confidence: CONFIDENCE,
    details: {
      words_per_minute: round(wpm, 1),
      total_words: words.length,
      mean_gap_sec: gaps.length > 0 ? round(mean(gaps), 3) : null,
      long_gap_ratio: gaps.length > 0 ? round(gaps.filter((g) => g > LONG_GAP_SEC).length / gaps.length, 3) : null,
      speech_ratio: round(Math.min(1, speech / durationSec), 3),
      segment_wpm_min: segmentRates.length > 0 ? round(Math.min(...segmentRates), 1) : null,
      segment_wpm_max: segmentRates.length > 0 ? round(Math.max(...segmentRates), 1) : null,
    },
    feedback,
  };
}

export const paceScorer: Scorer<PaceDetails> = (ctx) =>
  scorePace({
    words: ctx.features.words,
    durationSec: ctx.features.durationSec,
    vadSpeechSegments: ctx.features.vadSpeechSegments,
  });
