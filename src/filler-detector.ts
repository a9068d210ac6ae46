// Presentation Analyzer - Filler Detector
//
// Scans ASR tokens against a fixed filler lexicon and classifies the filler
// rate. Also reports local spikes: 30 s windows where the rate runs well above
// the talk's average.

import type { FeedbackItem, FillerCount, FillerDetails, TranscriptWord } from "./types.js";
import {
  MIN_ANALYSIS_DURATION_SEC,
  abstain,
  type Scorer,
  type ScorerVerdict,
} from "./metric-framework.js";
import { round } from "./stats.js";

// ─── Lexicon ────────────────────────────────────────────────────────────────────

export const FILLER_TOKENS: ReadonlySet<string> = new Set([
  "um",
  "uh",
  "erm",
  "er",
  "uhm",
  "like",
  "actually",
  "basically",
]);

/** Multi-token fillers, matched across consecutive tokens. */
export const FILLER_PHRASES: readonly (readonly string[])[] = [["you", "know"]];

// ASR engines sometimes emit a phrase as one token
const COLLAPSED_PHRASES = new Map(
  FILLER_PHRASES.flatMap((p): [string, string][] => [
    [p.join(" "), p.join(" ")],
    [p.join(""), p.join(" ")],
  ]),
);

// ─── Thresholds ─────────────────────────────────────────────────────────────────

const LOW_RATE_MAX = 3; // fillers per minute
const MODERATE_RATE_MAX = 7;

const SPIKE_WINDOW_SEC = 30;
const SPIKE_STEP_SEC = SPIKE_WINDOW_SEC / 4;
const SPIKE_RATE_PER_MIN = 10;

const TOP_FILLER_LIMIT = 5;
const CONFIDENCE = 0.75;

// ─── Token Matching ─────────────────────────────────────────────────────────────

/** Lowercase, strip punctuation, collapse whitespace. */
export function normalizeToken(token: string): string {
  return token
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

export interface FillerOccurrence {
  token: string;
  start: number;
  end: number;
  /** Indices into the word list covered by this filler */
  wordIndices: number[];
}

/**
 * Finds every filler in the word list, in order. A phrase match consumes its
 * tokens so "you know" counts once, not as "you" plus "know".
 */
export function findFillerOccurrences(words: readonly TranscriptWord[]): FillerOccurrence[] {
  const normalized = words.map((w) => normalizeToken(w.word));
  const found: FillerOccurrence[] = [];

  let i = 0;
  while (i < words.length) {
    const phrase = FILLER_PHRASES.find((p) =>
      p.every((part, k) => normalized[i + k] === part),
    );
    if (phrase) {
      const last = i + phrase.length - 1;
      found.push({
        token: phrase.join(" "),
        start: words[i].startTime,
        end: words[last].endTime,
        wordIndices: phrase.map((_, k) => i + k),
      });
      i += phrase.length;
      continue;
    }

    const collapsed = COLLAPSED_PHRASES.get(normalized[i]);
    const token = collapsed ?? (FILLER_TOKENS.has(normalized[i]) ? normalized[i] : null);
    if (token !== null) {
      found.push({
        token,
        start: words[i].startTime,
        end: words[i].endTime,
        wordIndices: [i],
      });
    }
    i++;
  }

  return found;
}

export function isFillerToken(token: string): boolean {
  const n = normalizeToken(token);
  return FILLER_TOKENS.has(n) || COLLAPSED_PHRASES.has(n);
}

function rankFillers(occurrences: readonly FillerOccurrence[]): FillerCount[] {
  const counts = new Map<string, number>();
  for (const o of occurrences) counts.set(o.token, (counts.get(o.token) ?? 0) + 1);
  return [...counts.entries()]
    .map(([token, count]) => ({ token, count }))
    .sort((a, b) => b.count - a.count || a.token.localeCompare(b.token));
}

// ─── Spikes ─────────────────────────────────────────────────────────────────────

export interface FillerSpike {
  start: number;
  end: number;
  /** Highest windowed rate within the spike, per minute */
  peakRatePerMin: number;
}

/**
 * Slides a full-length window across the talk and merges adjacent windows
 * whose filler rate exceeds the spike threshold.
 */
export function detectFillerSpikes(
  occurrences: readonly FillerOccurrence[],
  durationSec: number,
): FillerSpike[] {
  const spikes: FillerSpike[] = [];

  for (let start = 0; start + SPIKE_WINDOW_SEC <= durationSec; start += SPIKE_STEP_SEC) {
    const end = start + SPIKE_WINDOW_SEC;
    const count = occurrences.filter((o) => o.start >= start && o.start < end).length;
    const rate = count / (SPIKE_WINDOW_SEC / 60);
    if (rate <= SPIKE_RATE_PER_MIN) continue;

    const last = spikes[spikes.length - 1];
    if (last && start <= last.end) {
      last.end = end;
      last.peakRatePerMin = Math.max(last.peakRatePerMin, rate);
    } else {
      spikes.push({ start, end, peakRatePerMin: rate });
    }
  }

  return spikes;
}

// ─── Scorer ─────────────────────────────────────────────────────────────────────

export interface FillerInput {
  words: readonly TranscriptWord[];
  durationSec: number;
}

function classifyRate(rate: number): { label: string; score: number } {
  if (rate <= LOW_RATE_MAX) {
    return { label: "low_filler_rate", score: Math.round(95 - (10 * rate) / LOW_RATE_MAX) };
  }
  if (rate <= MODERATE_RATE_MAX) {
    return { label: "moderate_filler_rate", score: 65 };
  }
  return { label: "high_filler_rate", score: 45 };
}

function describeTop(top: readonly FillerCount[]): string {
  return top
    .slice(0, 3)
    .map((f) => `"${f.token}" (${f.count})`)
    .join(", ");
}

export function scoreFillers(input: FillerInput): ScorerVerdict<FillerDetails> {
  const { words, durationSec } = input;
  if (!(durationSec >= MIN_ANALYSIS_DURATION_SEC)) return abstain("talk_too_short");

  const spoken = words.filter((w) => normalizeToken(w.word).length > 0);
  if (spoken.length === 0) return abstain("no_words");

  const occurrences = findFillerOccurrences(words);
  const total = occurrences.length;
  const rate = total / (durationSec / 60);
  const top = rankFillers(occurrences).slice(0, TOP_FILLER_LIMIT);
  const { label, score } = classifyRate(rate);

  const feedback: FeedbackItem[] = [];
  const rateText = `${rate.toFixed(1)} per minute`;
  if (total === 0) {
    feedback.push({
      start_sec: 0,
      end_sec: durationSec,
      metric: "fillers",
      message: `No filler words detected (${rateText}). Your delivery sounds clean.`,
      tip_type: "strength",
    });
  } else if (label === "low_filler_rate") {
    feedback.push({
      start_sec: 0,
      end_sec: durationSec,
      metric: "fillers",
      message: `Filler rate is ${rateText} (${total} total), well controlled. Most frequent: ${describeTop(top)}.`,
      tip_type: "strength",
    });
  } else {
    feedback.push({
      start_sec: 0,
      end_sec: durationSec,
      metric: "fillers",
      message:
        `Filler rate is ${rateText} (${total} total). Most frequent: ${describeTop(top)}. ` +
        `Try replacing them with a short silent pause; aim for ${LOW_RATE_MAX} or fewer per minute.`,
      tip_type: "improvement",
    });
  }

  for (const spike of detectFillerSpikes(occurrences, durationSec)) {
    feedback.push({
      start_sec: spike.start,
      end_sec: spike.end,
      metric: "fillers",
      message:
        `Filler words cluster here (up to ${spike.peakRatePerMin.toFixed(1)} per minute). ` +
        `Slow down and pause instead of filling the gap.`,
      tip_type: "improvement",
    });
  }

  return {
    kind: "scored",
    score,
    label,
    confidence: CONFIDENCE,
    details: {
      filler_rate_per_min: round(rate),
      fillers_per_100_words: round((total / spoken.length) * 100),
      total_fillers: total,
      total_words: spoken.length,
      top_fillers: top,
    },
    feedback,
  };
}

export const fillerScorer: Scorer<FillerDetails> = (ctx) =>
  scoreFillers({ words: ctx.features.words, durationSec: ctx.features.durationSec });
