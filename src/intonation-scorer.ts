// Presentation Analyzer - Intonation Scorer
//
// Multi-factor dynamism score from pitch and energy statistics. The pitch
// range comes from the 5th–95th percentile of voiced frames when a raw
// timeseries is available; percentiles keep octave-jump errors from the pitch
// tracker out of the range. Without raw frames the range is estimated as
// 4 × std and marked as such.

import type {
  EnergySummary,
  FeedbackItem,
  IntonationDetails,
  PitchRangeSource,
  PitchSummary,
} from "./types.js";
import {
  MIN_ANALYSIS_DURATION_SEC,
  abstain,
  type Scorer,
  type ScorerVerdict,
} from "./metric-framework.js";
import { normalize, percentile, round } from "./stats.js";

// ─── Thresholds ─────────────────────────────────────────────────────────────────

export const MIN_VOICED_FRAMES = 10;

/** Normal-distribution approximation: ±2σ covers ~95% of values */
export const ESTIMATED_RANGE_STD_FACTOR = 4;

interface ComponentThresholds {
  moderate: number;
  high: number;
}

const PITCH_STD_HZ: ComponentThresholds = { moderate: 12, high: 25 };
const PITCH_RANGE_HZ: ComponentThresholds = { moderate: 50, high: 120 };
const PITCH_COV: ComponentThresholds = { moderate: 0.1, high: 0.2 };
const ENERGY_STD: ComponentThresholds = { moderate: 0.005, high: 0.02 };

const WEIGHTS = { std: 0.35, range: 0.25, cov: 0.25, energy: 0.15 } as const;

const MONOTONE_MAX = 0.7;
const SOMEWHAT_MONOTONE_MAX = 1.4;

const LABEL_SCORES = {
  monotone: 45,
  somewhat_monotone: 65,
  dynamic: 85,
} as const;

export type IntonationLabel = keyof typeof LABEL_SCORES;

const TARGET_RANGE_HZ = 100;

// ─── Range ──────────────────────────────────────────────────────────────────────

export function voicedFrames(timeseries: readonly number[]): number[] {
  return timeseries.filter((v) => Number.isFinite(v) && v > 0);
}

export interface PitchRange {
  rangeHz: number;
  source: PitchRangeSource;
}

/** 95th minus 5th percentile of voiced frames; null with too few of them. */
export function exactPitchRange(voiced: readonly number[]): number | null {
  if (voiced.length < MIN_VOICED_FRAMES) return null;
  return percentile(voiced, 95) - percentile(voiced, 5);
}

// ─── Classification ─────────────────────────────────────────────────────────────

/** 0 below `moderate`, 1 below `high`, else 2. */
function componentScore(value: number, t: ComponentThresholds): number {
  if (value < t.moderate) return 0;
  if (value < t.high) return 1;
  return 2;
}

export interface IntonationComponents {
  pitchStd: number;
  pitchRange: number;
  pitchCov: number;
  energy: number;
}

export function intonationComponents(
  pitchStdHz: number,
  pitchRangeHz: number,
  pitchCov: number,
  energyStd: number,
): IntonationComponents {
  return {
    pitchStd: componentScore(pitchStdHz, PITCH_STD_HZ),
    pitchRange: componentScore(pitchRangeHz, PITCH_RANGE_HZ),
    pitchCov: componentScore(pitchCov, PITCH_COV),
    energy: componentScore(energyStd, ENERGY_STD),
  };
}

export function intonationIndex(c: IntonationComponents): number {
  return (
    WEIGHTS.std * c.pitchStd +
    WEIGHTS.range * c.pitchRange +
    WEIGHTS.cov * c.pitchCov +
    WEIGHTS.energy * c.energy
  );
}

export function labelForIndex(index: number): IntonationLabel {
  if (index < MONOTONE_MAX) return "monotone";
  if (index < SOMEWHAT_MONOTONE_MAX) return "somewhat_monotone";
  return "dynamic";
}

// ─── Scorer ─────────────────────────────────────────────────────────────────────

export interface IntonationInput {
  pitchSummary: PitchSummary;
  energySummary: EnergySummary;
  rawPitchTimeseries: readonly number[] | null;
  durationSec: number;
}

function buildFeedback(
  label: IntonationLabel,
  pitchStd: number,
  range: PitchRange,
  durationSec: number,
): FeedbackItem {
  const rangeText = `${range.source === "estimated" ? "~" : ""}${range.rangeHz.toFixed(0)} Hz`;
  const measured = `pitch variation ${pitchStd.toFixed(1)} Hz, range ${rangeText}`;

  let message: string;
  switch (label) {
    case "monotone":
      message =
        `Your delivery sounds flat (${measured}). Vary your pitch more to emphasize key ideas; ` +
        `increase range toward ≥${TARGET_RANGE_HZ} Hz.`;
      break;
    case "somewhat_monotone":
      message =
        `Your intonation is somewhat limited (${measured}). Lift your pitch on key words and ` +
        `aim for a range above ${TARGET_RANGE_HZ} Hz.`;
      break;
    case "dynamic":
      message = `Your voice has good dynamic range (${measured}), which keeps listeners engaged.`;
      break;
  }

  return {
    start_sec: 0,
    end_sec: durationSec,
    metric: "intonation",
    message,
    tip_type: label === "dynamic" ? "strength" : "improvement",
  };
}

export function scoreIntonation(input: IntonationInput): ScorerVerdict<IntonationDetails> {
  const { pitchSummary, energySummary, rawPitchTimeseries, durationSec } = input;
  if (!pitchSummary || !energySummary) {
    throw new Error("intonation requires pitch and energy summaries");
  }

  if (!(durationSec >= MIN_ANALYSIS_DURATION_SEC)) return abstain("talk_too_short_for_intonation");

  const pitchMean = pitchSummary.mean;
  if (pitchMean === null || !(pitchMean > 0)) return abstain("no_pitch_data");

  let voicedCount: number | null = null;
  let range: PitchRange | null = null;

  if (rawPitchTimeseries !== null && rawPitchTimeseries.length > 0) {
    const voiced = voicedFrames(rawPitchTimeseries);
    voicedCount = voiced.length;
    const exact = exactPitchRange(voiced);
    if (exact === null) return abstain("insufficient_voiced_frames");
    range = { rangeHz: exact, source: "exact" };
  }

  const pitchStd = pitchSummary.std;
  if (pitchStd === null || !Number.isFinite(pitchStd)) return abstain("no_pitch_data");

  if (range === null) {
    range = { rangeHz: ESTIMATED_RANGE_STD_FACTOR * pitchStd, source: "estimated" };
  }

  const cov = pitchStd / pitchMean;

  const components = intonationComponents(pitchStd, range.rangeHz, cov, energySummary.std);
  const index = intonationIndex(components);
  const label = labelForIndex(index);

  const prosody =
    0.5 * (normalize(pitchStd, 5, 50) + normalize(energySummary.std, 0.001, 0.05));
  const confidence = Math.min(0.95, 0.6 + 0.3 * prosody + (Number.isFinite(cov) ? 0.05 : 0));

  return {
    kind: "scored",
    score: LABEL_SCORES[label],
    label,
    confidence: round(confidence, 3),
    details: {
      pitch_mean_hz: round(pitchMean),
      pitch_std_hz: round(pitchStd),
      pitch_range_hz: round(range.rangeHz),
      pitch_range_source: range.source,
      pitch_cov: round(cov, 4),
      energy_mean: round(energySummary.mean, 5),
      energy_std: round(energySummary.std, 5),
      voiced_frame_count: voicedCount,
      intonation_index: round(index, 3),
      prosody_variance_score: round(prosody, 3),
    },
    feedback: [buildFeedback(label, pitchStd, range, durationSec)],
  };
}

export const intonationScorer: Scorer<IntonationDetails> = (ctx) =>
  scoreIntonation({
    pitchSummary: ctx.features.pitchSummary,
    energySummary: ctx.features.energySummary,
    rawPitchTimeseries: ctx.features.rawPitchTimeseries,
    durationSec: ctx.features.durationSec,
  });
