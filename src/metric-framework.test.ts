import { describe, it, expect, vi } from "vitest";
import {
  MetricRegistry,
  abstain,
  computeMetrics,
  runScorer,
  toMetricResult,
  type Scorer,
  type ScoringContext,
} from "./metric-framework.js";
import type { PaceDetails, RawFeatures } from "./types.js";

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const features: RawFeatures = {
  words: [],
  transcriptText: "",
  asrPauseIntervals: [],
  vadPauseIntervals: [],
  vadSpeechSegments: [],
  pitchSummary: { mean: null, std: null },
  rawPitchTimeseries: null,
  energySummary: { mean: 0, std: 0 },
  noiseFloorDbfs: -100,
  durationSec: 30,
  language: "en",
  asrProvider: "deepgram",
  asrModel: "nova-2",
  asrQualityWarning: false,
};

const ctx: ScoringContext = { features, pauses: [], transcriptText: "" };

const paceDetails: PaceDetails = {
  words_per_minute: 120,
  total_words: 60,
  mean_gap_sec: 0.2,
  long_gap_ratio: 0,
  speech_ratio: 0.8,
  segment_wpm_min: 120,
  segment_wpm_max: 120,
};

const steadyScorer: Scorer<PaceDetails> = () => ({
  kind: "scored",
  score: 90,
  label: "optimal",
  confidence: 0.8,
  details: paceDetails,
  feedback: [],
});

const throwingScorer: Scorer = () => {
  throw new Error("pitch tracker exploded");
};

describe("toMetricResult", () => {
  it("clamps and rounds scored outcomes", () => {
    const result = toMetricResult({
      kind: "scored",
      score: 104.6,
      label: "x",
      confidence: 1.3,
      details: paceDetails,
      feedback: [],
    });
    expect(result.score_0_100).toBe(100);
    expect(result.confidence).toBe(1);
    expect(result.abstained).toBe(false);
  });

  it("turns abstentions into the abstained shape", () => {
    expect(toMetricResult(abstain("no_words"))).toEqual({
      score_0_100: null,
      label: "abstained",
      confidence: 0,
      abstained: true,
      details: { reason: "no_words" },
      feedback: [],
    });
  });

  it("records failures as abstained with the error message", () => {
    const result = toMetricResult({ kind: "failed", error: new Error("boom") });
    expect(result.abstained).toBe(true);
    expect(result.details).toEqual({ reason: "metric_computation_failed: boom" });
  });
});

describe("runScorer", () => {
  it("catches thrown errors", () => {
    const outcome = runScorer(throwingScorer, ctx);
    expect(outcome.kind).toBe("failed");
  });

  it("wraps non-Error throws", () => {
    const outcome = runScorer(() => {
      throw "bad";
    }, ctx);
    expect(outcome).toEqual({ kind: "failed", error: new Error("bad") });
  });
});

describe("MetricRegistry", () => {
  it("rejects duplicate names", () => {
    const registry = new MetricRegistry().register("pace", steadyScorer);
    expect(() => registry.register("pace", steadyScorer)).toThrow('Scorer "pace" is already registered');
    expect(registry.names()).toEqual(["pace"]);
    expect(registry.has("pace")).toBe(true);
    expect(registry.get("fillers")).toBeUndefined();
  });
});

describe("computeMetrics", () => {
  it("isolates a failing scorer from the others", () => {
    const logger = createMockLogger();
    const registry = new MetricRegistry().register("pace", steadyScorer).register("intonation", throwingScorer);

    const metrics = computeMetrics(["intonation", "pace"], registry, ctx, logger);

    expect(metrics.intonation.abstained).toBe(true);
    expect(metrics.intonation.details).toEqual({
      reason: "metric_computation_failed: pitch tracker exploded",
    });
    expect(metrics.pace.score_0_100).toBe(90);
    expect(logger.warn).toHaveBeenCalledWith('Metric "intonation" failed: pitch tracker exploded');
  });

  it("abstains on unknown metric names and skips duplicates", () => {
    const registry = new MetricRegistry().register("pace", steadyScorer);
    const metrics = computeMetrics(["pace", "gestures", "pace"], registry, ctx, createMockLogger());
    expect(Object.keys(metrics)).toEqual(["pace", "gestures"]);
    expect(metrics.gestures.details).toEqual({ reason: "metric_not_supported" });
  });

  it("treats names that shadow Object.prototype members as ordinary metrics", () => {
    const names = ["constructor", "__proto__", "toString"];
    const metrics = computeMetrics(names, new MetricRegistry(), ctx, createMockLogger());

    expect(Object.keys(metrics)).toEqual(names);
    expect(Object.getPrototypeOf(metrics)).toBe(Object.prototype);
    for (const name of names) {
      expect(Object.hasOwn(metrics, name)).toBe(true);
      expect(metrics[name].details).toEqual({ reason: "metric_not_supported" });
    }
    expect(Object.keys(JSON.parse(JSON.stringify(metrics)))).toEqual(names);
  });
});
