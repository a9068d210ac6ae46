// Presentation Analyzer - Metric Framework
//
// Every scorer is a deterministic, side-effect-free function from the run's
// scoring context to a verdict. "Not enough signal" is an abstained verdict,
// never an exception. A scorer that throws is recorded as a failed outcome and
// surfaces as an abstained MetricResult with the error message as its reason.

import type {
  FeedbackItem,
  MetricDetails,
  MetricResult,
  Pause,
  RawFeatures,
} from "./types.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Recordings shorter than this make every duration-dependent scorer abstain. */
export const MIN_ANALYSIS_DURATION_SEC = 3;

export const ABSTAINED_LABEL = "abstained";

// ─── Contract ───────────────────────────────────────────────────────────────────

export interface ScoringContext {
  readonly features: RawFeatures;
  /** Reconciled, classified pauses for the recording */
  readonly pauses: readonly Pause[];
  /** Transcript text assembled from the ASR words */
  readonly transcriptText: string;
}

export interface Scored<D extends MetricDetails> {
  kind: "scored";
  score: number;
  label: string;
  confidence: number;
  details: D;
  feedback: FeedbackItem[];
}

export interface Abstained {
  kind: "abstained";
  reason: string;
}

export interface Failed {
  kind: "failed";
  error: Error;
}

export type ScorerVerdict<D extends MetricDetails> = Scored<D> | Abstained;
export type ScorerOutcome = Scored<MetricDetails> | Abstained | Failed;

export type Scorer<D extends MetricDetails = MetricDetails> = (
  ctx: ScoringContext,
) => ScorerVerdict<D>;

export function abstain(reason: string): Abstained {
  return { kind: "abstained", reason };
}

// ─── Outcome → MetricResult ─────────────────────────────────────────────────────

function clampScore(score: number): number {
  return Math.min(100, Math.max(0, Math.round(score)));
}

function clampConfidence(confidence: number): number {
  return Math.min(1, Math.max(0, confidence));
}

export function abstainedResult(reason: string): MetricResult {
  return {
    score_0_100: null,
    label: ABSTAINED_LABEL,
    confidence: 0,
    abstained: true,
    details: { reason },
    feedback: [],
  };
}

export function toMetricResult(outcome: ScorerOutcome): MetricResult {
  switch (outcome.kind) {
    case "scored":
      return {
        score_0_100: clampScore(outcome.score),
        label: outcome.label,
        confidence: clampConfidence(outcome.confidence),
        abstained: false,
        details: outcome.details,
        feedback: outcome.feedback,
      };
    case "abstained":
      return abstainedResult(outcome.reason);
    case "failed":
      return abstainedResult(`metric_computation_failed: ${outcome.error.message}`);
  }
}

/**
 * Invokes one scorer, converting a thrown error into a `failed` outcome.
 */
export function runScorer(scorer: Scorer, ctx: ScoringContext): ScorerOutcome {
  try {
    return scorer(ctx);
  } catch (err) {
    return {
      kind: "failed",
      error: err instanceof Error ? err : new Error(errorMessage(err)),
    };
  }
}

// ─── Registry ───────────────────────────────────────────────────────────────────

export class MetricRegistry {
  private readonly scorers = new Map<string, Scorer>();

  register<D extends MetricDetails>(name: string, scorer: Scorer<D>): this {
    if (this.scorers.has(name)) {
      throw new Error(`Scorer "${name}" is already registered`);
    }
    this.scorers.set(name, scorer);
    return this;
  }

  get(name: string): Scorer | undefined {
    return this.scorers.get(name);
  }

  has(name: string): boolean {
    return this.scorers.has(name);
  }

  names(): string[] {
    return [...this.scorers.keys()];
  }
}

/**
 * Computes every requested metric in request order. Unknown names abstain
 * with `metric_not_supported`; failures are logged and recorded, never thrown.
 */
export function computeMetrics(
  requested: readonly string[],
  registry: MetricRegistry,
  ctx: ScoringContext,
  logger: Logger,
): Record<string, MetricResult> {
  // Caller-supplied names; "__proto__" and "constructor" must stay ordinary keys
  const metrics = new Map<string, MetricResult>();

  for (const name of requested) {
    if (metrics.has(name)) continue;

    const scorer = registry.get(name);
    if (!scorer) {
      metrics.set(name, abstainedResult("metric_not_supported"));
      continue;
    }

    const outcome = runScorer(scorer, ctx);
    if (outcome.kind === "failed") {
      logger.warn(`Metric "${name}" failed: ${outcome.error.message}`);
    } else if (outcome.kind === "abstained") {
      logger.debug(`Metric "${name}" abstained: ${outcome.reason}`);
    }
    metrics.set(name, toMetricResult(outcome));
  }

  return Object.fromEntries(metrics);
}
