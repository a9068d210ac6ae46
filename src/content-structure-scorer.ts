// Presentation Analyzer - Content Structure Scorer
//
// Rubric over sentence length and signpost usage ("first", "in summary", ...).
// The signpost lexicon lives in data/signpost-phrases.json.

import { readFileSync } from "node:fs";
import type { ContentStructureDetails, FeedbackItem } from "./types.js";
import { abstain, type Scorer, type ScorerVerdict } from "./metric-framework.js";
import { splitSentences, tokenizeWords } from "./utils.js";
import { round } from "./stats.js";

const LONG_SENTENCE_TOKENS = 30;
const LONG_RATIO_LIMIT = 0.4;
const MAX_EXAMPLES = 5;
const CONFIDENCE = 0.75;

const SIGNPOST_FILE = new URL("../data/signpost-phrases.json", import.meta.url);

let signpostPatterns: RegExp[] | null = null;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function loadSignpostPhrases(file: URL = SIGNPOST_FILE): string[] {
  const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
  const phrases =
    typeof parsed === "object" && parsed !== null && "phrases" in parsed ? parsed.phrases : null;
  if (!isStringArray(phrases)) {
    throw new Error(`${file.pathname} must contain {"phrases": string[]}`);
  }
  return phrases;
}

function patterns(): RegExp[] {
  if (signpostPatterns === null) {
    signpostPatterns = loadSignpostPhrases().map(
      (p) => new RegExp(`(?<![\\p{L}\\p{N}'])${escapeRegExp(p.toLowerCase())}(?![\\p{L}\\p{N}'])`, "gu"),
    );
  }
  return signpostPatterns;
}

/** Number of signpost phrase occurrences in `text`, on word boundaries. */
export function countSignposts(text: string): number {
  const lower = text.toLowerCase();
  let count = 0;
  for (const re of patterns()) {
    count += lower.match(re)?.length ?? 0;
  }
  return count;
}

type StructureLabel =
  | "unclear_structure"
  | "mixed_structure"
  | "mostly_clear_structure"
  | "very_clear_structure";

const RUBRIC: Record<StructureLabel, { score: number; message: string }> = {
  unclear_structure: {
    score: 45,
    message:
      "Your talk structure is hard to follow: you rarely use signposts and several sentences are " +
      "quite long. Try phrases like 'first', 'next' or 'in summary', and break long sentences up.",
  },
  mixed_structure: {
    score: 60,
    message:
      "Some parts of your structure are clear, but the flow could improve. " +
      "Use more explicit signposts to mark transitions.",
  },
  mostly_clear_structure: {
    score: 75,
    message:
      "Your structure is mostly clear. A few long sentences could be simplified.",
  },
  very_clear_structure: {
    score: 90,
    message:
      "Your structure is very clear. You use signposts well and keep sentences at a readable length.",
  },
};

function classify(signposts: number, longRatio: number): StructureLabel {
  const heavy = longRatio > LONG_RATIO_LIMIT;
  if (signposts === 0) return heavy ? "unclear_structure" : "mixed_structure";
  return heavy ? "mostly_clear_structure" : "very_clear_structure";
}

export interface ContentStructureInput {
  transcriptText: string;
  durationSec: number;
}

export function scoreContentStructure(
  input: ContentStructureInput,
): ScorerVerdict<ContentStructureDetails> {
  const text = input.transcriptText.trim();
  if (text.length === 0) return abstain("empty_transcript");

  const sentences = splitSentences(text)
    .map((s) => ({ text: s, tokens: tokenizeWords(s).length }))
    .filter((s) => s.tokens > 0);
  if (sentences.length === 0) return abstain("no_sentences");

  const signpostCount = countSignposts(text);
  const longCount = sentences.filter((s) => s.tokens > LONG_SENTENCE_TOKENS).length;
  const longRatio = longCount / sentences.length;
  const label = classify(signpostCount, longRatio);

  const examples = sentences
    .filter((s) => countSignposts(s.text) > 0)
    .slice(0, MAX_EXAMPLES)
    .map((s) => s.text);

  const feedback: FeedbackItem[] = [
    {
      start_sec: 0,
      end_sec: input.durationSec,
      metric: "content_structure",
      message: RUBRIC[label].message,
      tip_type: label === "very_clear_structure" ? "strength" : "improvement",
    },
  ];

  return {
    kind: "scored",
    score: RUBRIC[label].score,
    label,
    confidence: CONFIDENCE,
    details: {
      sentence_count: sentences.length,
      avg_sentence_length: round(
        sentences.reduce((sum, s) => sum + s.tokens, 0) / sentences.length,
      ),
      long_sentence_ratio: round(longRatio, 3),
      signpost_count: signpostCount,
      signpost_examples: examples,
    },
    feedback,
  };
}

export const contentStructureScorer: Scorer<ContentStructureDetails> = (ctx) =>
  scoreContentStructure({
    transcriptText: ctx.transcriptText,
    durationSec: ctx.features.durationSec,
  });
