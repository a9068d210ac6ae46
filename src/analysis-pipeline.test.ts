import { describe, it, expect, vi } from "vitest";
import {
  AnalysisPipeline,
  ANALYZER_VERSION,
  buildTranscript,
  computeOverallScore,
} from "./analysis-pipeline.js";
import type { AcousticFrontEnd } from "./acoustic-front-end.js";
import { MetricRegistry, abstainedResult, type Scorer } from "./metric-framework.js";
import { paceScorer } from "./pace-scorer.js";
import { DEFAULT_METRICS } from "./submission.js";
import { FrontEndError, InputValidationError } from "./errors.js";
import { JobManager } from "./job-manager.js";
import {
  JobStatus,
  type AudioInput,
  type JobInput,
  type MetricResult,
  type RawFeatures,
  type TranscriptWord,
} from "./types.js";

// ─── Fixtures ───────────────────────────────────────────────────────────────────

function evenWords(count: number, step: number): TranscriptWord[] {
  return Array.from({ length: count }, (_, i) => ({
    word: i % 20 === 19 ? "point." : "word",
    startTime: i * step,
    endTime: i * step + 0.3,
    confidence: 0.9,
  }));
}

function makeFeatures(overrides: Partial<RawFeatures> = {}): RawFeatures {
  return {
    words: evenWords(120, 0.5),
    transcriptText: "First, we start with the plan. Next, we go through the numbers.",
    asrPauseIntervals: [],
    vadPauseIntervals: [
      { start: 10, end: 10.6 },
      { start: 20, end: 20.6 },
      { start: 30, end: 30.6 },
    ],
    vadSpeechSegments: [{ start: 0, end: 54 }],
    pitchSummary: { mean: 150, std: 20 },
    rawPitchTimeseries: null,
    energySummary: { mean: 0.05, std: 0.01 },
    noiseFloorDbfs: -65,
    durationSec: 60,
    language: "en",
    asrProvider: "deepgram",
    asrModel: "nova-2",
    asrQualityWarning: false,
    ...overrides,
  };
}

function makeInput(overrides: Partial<JobInput> = {}): JobInput {
  return {
    audioUrl: "/recordings/talk.wav",
    videoUrl: null,
    language: "en",
    talkType: "informative",
    audienceType: "peers",
    requestedMetrics: [...DEFAULT_METRICS],
    userMetadata: {},
    ...overrides,
  };
}

const audio: AudioInput = {
  samples: new Float32Array(16000),
  sampleRate: 16000,
  encoded: Buffer.alloc(0),
  mimeType: "audio/wav",
};

function makeFrontEnd(extract: AcousticFrontEnd["extract"]): AcousticFrontEnd {
  return { extract, vadModel: "test-vad", pitchModel: "test-pitch" };
}

function scored(score: number, confidence: number): MetricResult {
  return { score_0_100: score, label: "x", confidence, abstained: false, details: { reason: "" }, feedback: [] };
}

// ─── Overall Score ──────────────────────────────────────────────────────────────

describe("computeOverallScore", () => {
  it("weights scores by confidence and ignores abstained metrics", () => {
    const overall = computeOverallScore({
      a: scored(80, 1),
      b: scored(40, 0.5),
      c: abstainedResult("talk_too_short"),
    });
    // (80 × 1 + 40 × 0.5) / 1.5 = 66.67
    expect(overall).toEqual({ score_0_100: 67, label: "developing", confidence: 0.75 });
  });

  it("uses 50, 70 and 85 as label edges", () => {
    expect(computeOverallScore({ a: scored(49, 1) }).label).toBe("needs_work");
    expect(computeOverallScore({ a: scored(50, 1) }).label).toBe("developing");
    expect(computeOverallScore({ a: scored(70, 1) }).label).toBe("proficient");
    expect(computeOverallScore({ a: scored(85, 1) }).label).toBe("excellent");
  });

  it("is unavailable when every metric abstained", () => {
    expect(computeOverallScore({ a: abstainedResult("no_words") })).toEqual({
      score_0_100: null,
      label: "unavailable",
      confidence: 0,
    });
  });
});

// ─── Transcript ─────────────────────────────────────────────────────────────────

describe("buildTranscript", () => {
  it("groups words at sentence ends and flags fillers", () => {
    const words: TranscriptWord[] = [
      { word: "Hello", startTime: 0, endTime: 0.4, confidence: 0.9 },
      { word: "there.", startTime: 0.5, endTime: 0.9, confidence: 0.7 },
      { word: "Um", startTime: 1.5, endTime: 1.7, confidence: 0.6 },
      { word: "next", startTime: 1.8, endTime: 2.1, confidence: 0.8 },
      { word: "point", startTime: 2.2, endTime: 2.6, confidence: 1.0 },
    ];
    const transcript = buildTranscript(makeFeatures({ words, transcriptText: "Hello there. Um next point" }));

    expect(transcript.full_text).toBe("Hello there. Um next point");
    expect(transcript.language).toBe("en");
    expect(transcript.segments).toEqual([
      { start_sec: 0, end_sec: 0.9, text: "Hello there.", avg_confidence: 0.8 },
      { start_sec: 1.5, end_sec: 2.6, text: "Um next point", avg_confidence: 0.8 },
    ]);
    expect(transcript.tokens.map((t) => t.is_filler)).toEqual([false, false, true, false, false]);
  });

  it("has no segments without words", () => {
    expect(buildTranscript(makeFeatures({ words: [], transcriptText: "" })).segments).toEqual([]);
  });
});

// ─── Pipeline ───────────────────────────────────────────────────────────────────

describe("AnalysisPipeline.analyze", () => {
  const pipeline = new AnalysisPipeline({ frontEnd: makeFrontEnd(async () => makeFeatures()) });

  it("builds a complete report", () => {
    const report = pipeline.analyze("pres_0123456789", makeInput(), makeFeatures());

    expect(report.job_id).toBe("pres_0123456789");
    expect(report.input).toEqual({
      audio_url: "/recordings/talk.wav",
      video_url: null,
      language: "en",
      talk_type: "informative",
      audience_type: "peers",
      duration_sec: 60,
    });
    expect(Object.keys(report.metrics)).toEqual([...DEFAULT_METRICS]);
    expect(report.metrics.pace.score_0_100).toBe(90);
    expect(report.metrics.pause_quality.score_0_100).toBe(85);
    expect(report.metrics.fillers.score_0_100).toBe(95);
    expect(report.metrics.intonation.score_0_100).toBe(65);
    expect(report.metrics.content_structure.score_0_100).toBe(90);
    // 321.82 / 3.778
    expect(report.overall_score).toEqual({ score_0_100: 85, label: "excellent", confidence: 0.756 });
    expect(report.quality_flags.abstain_reason).toBeNull();
    expect(report.timeline.filter((e) => "type" in e && e.type === "pause")).toHaveLength(3);
    expect(report.model_metadata).toEqual({
      asr_model: "deepgram/nova-2",
      vad_model: "test-vad",
      pitch_model: "test-pitch",
      analyzer_version: ANALYZER_VERSION,
    });
  });

  it("makes every duration-dependent metric abstain on a one-second recording", () => {
    const features = makeFeatures({
      words: evenWords(2, 0.4),
      transcriptText: "First, a word.",
      vadPauseIntervals: [],
      vadSpeechSegments: [{ start: 0, end: 1 }],
      durationSec: 1,
    });
    const report = pipeline.analyze("pres_short00000", makeInput(), features);

    expect(report.metrics.pace.details).toEqual({ reason: "talk_too_short" });
    expect(report.metrics.pause_quality.details).toEqual({ reason: "talk_too_short" });
    expect(report.metrics.fillers.details).toEqual({ reason: "talk_too_short" });
    expect(report.metrics.intonation.details).toEqual({ reason: "talk_too_short_for_intonation" });
    expect(report.metrics.content_structure.abstained).toBe(false);
  });

  it("keeps other metrics when one scorer throws", () => {
    const broken: Scorer = () => {
      throw new Error("pitch summary corrupted");
    };
    const isolated = new AnalysisPipeline({
      frontEnd: makeFrontEnd(async () => makeFeatures()),
      registry: new MetricRegistry().register("pace", paceScorer).register("intonation", broken),
    });

    const report = isolated.analyze("pres_isolated00", makeInput({ requestedMetrics: ["pace", "intonation"] }), makeFeatures());

    expect(report.metrics.intonation).toEqual(abstainedResult("metric_computation_failed: pitch summary corrupted"));
    expect(report.metrics.pace.score_0_100).toBe(90);
    expect(report.overall_score).toEqual({ score_0_100: 90, label: "excellent", confidence: 0.8 });
  });
});

describe("AnalysisPipeline.run", () => {
  it("loads the audio and extracts features with the job language", async () => {
    const extract = vi.fn(async () => makeFeatures());
    const loadAudio = vi.fn(async () => audio);
    const pipeline = new AnalysisPipeline({ frontEnd: makeFrontEnd(extract), loadAudio });

    const report = await pipeline.run("pres_aaaaaaaaaa", makeInput({ language: "de" }));

    expect(loadAudio).toHaveBeenCalledWith("/recordings/talk.wav");
    expect(extract).toHaveBeenCalledWith(audio, "de");
    expect(report.job_id).toBe("pres_aaaaaaaaaa");
  });

  it("wraps unexpected front-end failures", async () => {
    const pipeline = new AnalysisPipeline({
      frontEnd: makeFrontEnd(async () => {
        throw new TypeError("cannot read samples");
      }),
      loadAudio: async () => audio,
    });

    const run = pipeline.run("pres_bbbbbbbbbb", makeInput());
    await expect(run).rejects.toBeInstanceOf(FrontEndError);
    await expect(run).rejects.toThrow("Acoustic front end failed: cannot read samples");
  });

  it("passes input errors from loading through unchanged", async () => {
    const pipeline = new AnalysisPipeline({
      frontEnd: makeFrontEnd(async () => makeFeatures()),
      loadAudio: async () => {
        throw new InputValidationError("Audio file could not be read: missing");
      },
    });

    await expect(pipeline.run("pres_cccccccccc", makeInput())).rejects.toBeInstanceOf(InputValidationError);
  });
});

describe("AnalysisPipeline under JobManager", () => {
  it("completes the job as done when one scorer throws", async () => {
    const broken: Scorer = () => {
      throw new Error("pitch summary corrupted");
    };
    const pipeline = new AnalysisPipeline({
      frontEnd: makeFrontEnd(async () => makeFeatures()),
      registry: new MetricRegistry().register("pace", paceScorer).register("intonation", broken),
      loadAudio: async () => audio,
    });
    const manager = new JobManager({ runner: pipeline });

    const id = manager.submit({
      audio_url: "/recordings/talk.wav",
      talk_type: "informative",
      audience_type: "peers",
      requested_metrics: ["pace", "intonation"],
    });
    await manager.waitForJob(id);

    const view = manager.getStatus(id);
    expect(view.status).toBe(JobStatus.DONE);
    expect(view.available_metrics).toEqual(["pace", "intonation"]);

    const report = manager.getFullReport(id);
    expect(report.metrics.intonation.abstained).toBe(true);
    expect(report.metrics.intonation.details).toEqual({
      reason: "metric_computation_failed: pitch summary corrupted",
    });
    expect(report.metrics.pace.score_0_100).toBe(90);
  });
});
