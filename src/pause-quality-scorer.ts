// Presentation Analyzer - Pause Quality Scorer
// Rate-based score over the reconciled pause list.

import type { FeedbackItem, Pause, PauseQualityDetails } from "./types.js";
import {
  MIN_ANALYSIS_DURATION_SEC,
  abstain,
  type Scorer,
  type ScorerVerdict,
} from "./metric-framework.js";
import { round } from "./stats.js";

const TOO_MANY_PER_SEC = 0.3;
const TOO_FEW_PER_SEC = 0.05;
const LONG_PAUSE_SEC = 1.0;
const SHORT_PAUSE_SEC = 0.5;
const CONFIDENCE = 0.75;

export interface PauseQualityInput {
  pauses: readonly Pause[];
  durationSec: number;
}

export function scorePauseQuality(input: PauseQualityInput): ScorerVerdict<PauseQualityDetails> {
  const { pauses, durationSec } = input;
  if (!(durationSec >= MIN_ANALYSIS_DURATION_SEC)) return abstain("talk_too_short");
  if (pauses.length === 0) return abstain("no_pauses_detected");

  const durations = pauses.map((p) => p.end_sec - p.start_sec);
  const rate = pauses.length / durationSec;
  const awkward = pauses.filter((p) => p.context === "awkward");

  let label: string;
  let score: number;
  let message: string;
  if (rate > TOO_MANY_PER_SEC) {
    label = "too_many_pauses";
    score = 45;
    message = "You pause very frequently. Try connecting ideas more fluidly.";
  } else if (rate < TOO_FEW_PER_SEC) {
    label = "too_few_pauses";
    score = 55;
    message = "You rarely pause. Add short pauses to emphasize key transitions.";
  } else {
    label = "good_pause_control";
    score = 85;
    message = "Your pacing and pauses are balanced and clear.";
  }

  const feedback: FeedbackItem[] = [
    {
      start_sec: 0,
      end_sec: durationSec,
      metric: "pause_quality",
      message: `${message} (${pauses.length} pauses, ${(rate * 60).toFixed(1)} per minute)`,
      tip_type: label === "good_pause_control" ? "strength" : "improvement",
    },
  ];

  for (const p of awkward) {
    if (p.quality !== "long") continue;
    feedback.push({
      start_sec: p.start_sec,
      end_sec: p.end_sec,
      metric: "pause_quality",
      message: `A ${(p.end_sec - p.start_sec).toFixed(1)} s pause interrupts this sentence. Finish the thought before pausing.`,
      tip_type: "improvement",
    });
  }

  return {
    kind: "scored",
    score,
    label,
    confidence: CONFIDENCE,
    details: {
      total_pauses: pauses.length,
      average_pause_sec: round(durations.reduce((a, b) => a + b, 0) / durations.length),
      long_pauses: durations.filter((d) => d > LONG_PAUSE_SEC).length,
      short_pauses: durations.filter((d) => d < SHORT_PAUSE_SEC).length,
      helpful_pauses: pauses.length - awkward.length,
      awkward_pauses: awkward.length,
      pause_rate_per_sec: round(rate, 3),
    },
    feedback,
  };
}

export const pauseQualityScorer: Scorer<PauseQualityDetails> = (ctx) =>
  scorePauseQuality({ pauses: ctx.pauses, durationSec: ctx.features.durationSec });
