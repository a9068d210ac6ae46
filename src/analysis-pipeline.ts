// Presentation Analyzer - Analysis Pipeline
//
// One run per job: load audio → front end → quality flags → pauses →
// metrics → timeline → overall score → report. Input and front-end errors
// fail the run; a scorer's failure only abstains its own metric.

import type {
  AudioInput,
  JobInput,
  MetricResult,
  OverallScore,
  RawFeatures,
  Report,
  Transcript,
  TranscriptSegmentView,
} from "./types.js";
import type { AcousticFrontEnd } from "./acoustic-front-end.js";
import { AppError, FrontEndError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { MetricRegistry, computeMetrics, type ScoringContext } from "./metric-framework.js";
import { reconcilePauses } from "./pause-reconciler.js";
import { computeQualityFlags } from "./quality-flags.js";
import { buildContentSegments, buildTimeline } from "./timeline.js";
import { paceScorer } from "./pace-scorer.js";
import { pauseQualityScorer } from "./pause-quality-scorer.js";
import { fillerScorer, findFillerOccurrences } from "./filler-detector.js";
import { intonationScorer } from "./intonation-scorer.js";
import { contentStructureScorer } from "./content-structure-scorer.js";
import { loadAudio } from "./submission.js";
import { mean, round } from "./stats.js";

export const ANALYZER_VERSION = "0.1.0";

export function createDefaultRegistry(): MetricRegistry {
  return new MetricRegistry()
    .register("pace", paceScorer)
    .register("pause_quality", pauseQualityScorer)
    .register("fillers", fillerScorer)
    .register("intonation", intonationScorer)
    .register("content_structure", contentStructureScorer);
}

// ─── Overall Score ──────────────────────────────────────────────────────────────

function overallLabel(score: number): string {
  if (score < 50) return "needs_work";
  if (score < 70) return "developing";
  if (score < 85) return "proficient";
  return "excellent";
}

/**
 * Confidence-weighted mean of scored metrics. Abstained metrics carry no
 * weight.
 */
export function computeOverallScore(metrics: Record<string, MetricResult>): OverallScore {
  let weighted = 0;
  let totalWeight = 0;
  const confidences: number[] = [];

  for (const m of Object.values(metrics)) {
    if (m.abstained || m.score_0_100 === null || m.confidence <= 0) continue;
    weighted += m.score_0_100 * m.confidence;
    totalWeight += m.confidence;
    confidences.push(m.confidence);
  }

  if (totalWeight === 0) {
    return { score_0_100: null, label: "unavailable", confidence: 0 };
  }

  const score = Math.round(weighted / totalWeight);
  return { score_0_100: score, label: overallLabel(score), confidence: round(mean(confidences), 3) };
}

// ─── Transcript ─────────────────────────────────────────────────────────────────

const SENTENCE_END = /[.!?]["')\]]*$/;

export function buildTranscript(features: RawFeatures): Transcript {
  const { words } = features;
  const fillerIndices = new Set(findFillerOccurrences(words).flatMap((o) => o.wordIndices));

  const segments: TranscriptSegmentView[] = [];
  let segStart = 0;
  for (let i = 0; i < words.length; i++) {
    if (i < words.length - 1 && !SENTENCE_END.test(words[i].word)) continue;
    const group = words.slice(segStart, i + 1);
    segments.push({
      start_sec: group[0].startTime,
      end_sec: group[group.length - 1].endTime,
      text: group.map((w) => w.word).join(" "),
      avg_confidence: round(mean(group.map((w) => w.confidence)), 3),
    });
    segStart = i + 1;
  }

  return {
    full_text: features.transcriptText,
    language: features.language,
    segments,
    tokens: words.map((w, i) => ({
      text: w.word,
      start_sec: w.startTime,
      end_sec: w.endTime,
      is_filler: fillerIndices.has(i),
    })),
  };
}

// ─── Pipeline ───────────────────────────────────────────────────────────────────

export interface AnalysisPipelineDeps {
  frontEnd: AcousticFrontEnd;
  registry?: MetricRegistry;
  /** Reads the recording behind an audio_url. Defaults to local WAV files. */
  loadAudio?: (audioUrl: string) => Promise<AudioInput>;
  logger?: Logger;
}

export class AnalysisPipeline {
  private readonly frontEnd: AcousticFrontEnd;
  private readonly registry: MetricRegistry;
  private readonly load: (audioUrl: string) => Promise<AudioInput>;
  private readonly logger: Logger;

  constructor(deps: AnalysisPipelineDeps) {
    this.frontEnd = deps.frontEnd;
    this.registry = deps.registry ?? createDefaultRegistry();
    this.load = deps.loadAudio ?? loadAudio;
    this.logger = deps.logger ?? silentLogger;
  }

  async run(jobId: string, input: JobInput): Promise<Report> {
    const audio = await this.load(input.audioUrl);

    let features: RawFeatures;
    try {
      features = await this.frontEnd.extract(audio, input.language);
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new FrontEndError(`Acoustic front end failed: ${errorMessage(err)}`);
    }
    this.logger.info(
      `[${jobId}] features: ${features.words.length} words, ${features.durationSec.toFixed(1)} s, ` +
        `asr=${features.asrProvider}`,
    );

    return this.analyze(jobId, input, features);
  }

  /** Everything after feature extraction. Synchronous and deterministic. */
  analyze(jobId: string, input: JobInput, features: RawFeatures): Report {
    const qualityFlags = computeQualityFlags(features);
    if (qualityFlags.abstain_reason) {
      this.logger.warn(`[${jobId}] recording quality: ${qualityFlags.abstain_reason}`);
    }

    const pauses = reconcilePauses({
      asrIntervals: features.asrPauseIntervals,
      vadIntervals: features.vadPauseIntervals,
      durationSec: features.durationSec,
      words: features.words,
    });

    const ctx: ScoringContext = {
      features,
      pauses,
      transcriptText: features.transcriptText,
    };
    const metrics = computeMetrics(input.requestedMetrics, this.registry, ctx, this.logger);

    const segments = buildContentSegments(features.words, pauses, features.durationSec);

    return {
      job_id: jobId,
      input: {
        audio_url: input.audioUrl,
        video_url: input.videoUrl,
        language: input.language,
        talk_type: input.talkType,
        audience_type: input.audienceType,
        duration_sec: round(features.durationSec, 3),
      },
      quality_flags: qualityFlags,
      metrics,
      timeline: buildTimeline(pauses, metrics, segments),
      overall_score: computeOverallScore(metrics),
      transcript: buildTranscript(features),
      model_metadata: {
        asr_model: `${features.asrProvider}/${features.asrModel}`,
        vad_model: this.frontEnd.vadModel,
        pitch_model: this.frontEnd.pitchModel,
        analyzer_version: ANALYZER_VERSION,
      },
    };
  }
}
