import { describe, it, expect } from "vitest";
import { buildContentSegments, buildTimeline } from "./timeline.js";
import type { MetricResult, Pause, PauseContext, TranscriptWord } from "./types.js";

function evenWords(tokens: string[], start: number, step: number): TranscriptWord[] {
  return tokens.map((word, i) => ({
    word,
    startTime: start + i * step,
    endTime: start + i * step + 0.2,
    confidence: 0.9,
  }));
}

function pause(start: number, end: number, context: PauseContext): Pause {
  return { start_sec: start, end_sec: end, source: "vad", quality: "medium", context };
}

function result(metric: string, feedback: Array<[number, number, string]>): MetricResult {
  return {
    score_0_100: 80,
    label: "ok",
    confidence: 0.8,
    abstained: false,
    details: { reason: "n/a" },
    feedback: feedback.map(([start, end, message]) => ({
      start_sec: start,
      end_sec: end,
      metric,
      message,
      tip_type: "improvement" as const,
    })),
  };
}

describe("buildContentSegments", () => {
  it("tags issues and highlights per 30 s window", () => {
    const first = Array.from({ length: 60 }, (_, i) => (i % 10 === 0 && i < 30 ? "um" : "word"));
    const second = Array.from({ length: 100 }, () => "word");
    const words = [...evenWords(first, 0, 0.5), ...evenWords(second, 30, 0.3)];
    const pauses = [pause(5, 5.6, "helpful"), pause(35, 35.6, "awkward"), pause(45, 45.6, "awkward")];

    expect(buildContentSegments(words, pauses, 75)).toEqual([
      { start_sec: 0, end_sec: 30, dominant_issues: ["filler_words"], highlights: ["steady_pace", "well_placed_pauses"] },
      { start_sec: 30, end_sec: 60, dominant_issues: ["awkward_pauses", "fast_pace"], highlights: ["no_fillers"] },
      { start_sec: 60, end_sec: 75, dominant_issues: [], highlights: [] },
    ]);
  });

  it("flags slow windows that contain speech", () => {
    const words = evenWords(["slow", "and", "steady"], 0, 5);
    expect(buildContentSegments(words, [], 30)).toEqual([
      { start_sec: 0, end_sec: 30, dominant_issues: ["slow_pace"], highlights: ["no_fillers"] },
    ]);
  });
});

describe("buildTimeline", () => {
  const pauses = [pause(2, 3, "helpful")];
  const segments = [{ start_sec: 0, end_sec: 30, dominant_issues: [], highlights: [] }];
  const pace = result("pace", [[0, 30, "Pace tip"]]);
  const fillers = result("fillers", [
    [0, 30, "Filler tip"],
    [0, 60, "Overall filler tip"],
  ]);

  it("orders by start, end, then segment, pause, feedback", () => {
    const timeline = buildTimeline(pauses, { pace, fillers }, segments);
    expect(timeline).toEqual([
      { start_sec: 0, end_sec: 30, dominant_issues: [], highlights: [] },
      { type: "feedback", start_sec: 0, end_sec: 30, metric: "fillers", message: "Filler tip", tip_type: "improvement" },
      { type: "feedback", start_sec: 0, end_sec: 30, metric: "pace", message: "Pace tip", tip_type: "improvement" },
      {
        type: "feedback",
        start_sec: 0,
        end_sec: 60,
        metric: "fillers",
        message: "Overall filler tip",
        tip_type: "improvement",
      },
      { type: "pause", start_sec: 2, end_sec: 3, source: "vad", quality: "medium", context: "helpful" },
    ]);
  });

  it("does not depend on the order metrics were computed in", () => {
    expect(buildTimeline(pauses, { fillers, pace }, segments)).toEqual(
      buildTimeline(pauses, { pace, fillers }, segments),
    );
  });
});
