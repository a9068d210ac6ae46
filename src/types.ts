// Presentation Analyzer - Shared Types
//
// Internal pipeline types use camelCase. The report shapes (MetricResult,
// timeline entries, quality flags, transcript) are the persisted/wire form
// consumed by clients and keep their snake_case field names.

// ─── Utility Types ──────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

/** A closed time range in seconds. */
export interface Interval {
  start: number;
  end: number;
}

// ─── Front-End Output ───────────────────────────────────────────────────────────

export interface TranscriptWord {
  word: string;
  startTime: number; // seconds
  endTime: number; // seconds
  confidence: number; // 0..1
}

export interface PitchSummary {
  /** Mean F0 over voiced frames in Hz, null when no voiced frame was found */
  mean: number | null;
  std: number | null;
}

export interface EnergySummary {
  mean: number;
  std: number;
}

export type AsrProvider = "deepgram" | "openai";

/**
 * Output of the acoustic front end. Read-only input to one pipeline run.
 */
export interface RawFeatures {
  words: TranscriptWord[];
  /** Punctuated transcript text */
  transcriptText: string;
  asrPauseIntervals: Interval[];
  vadPauseIntervals: Interval[];
  vadSpeechSegments: Interval[];
  pitchSummary: PitchSummary;
  /** One value per analysis frame, NaN for unvoiced frames. Null when not tracked. */
  rawPitchTimeseries: number[] | null;
  energySummary: EnergySummary;
  /** Background noise floor estimate in dBFS */
  noiseFloorDbfs: number;
  durationSec: number;
  language: string;
  asrProvider: AsrProvider;
  asrModel: string;
  /** True when the transcript came from the fallback ASR */
  asrQualityWarning: boolean;
}

/** Decoded audio handed to the front end. Samples are normalized to [-1, 1]. */
export interface AudioInput {
  samples: Float32Array;
  sampleRate: number;
  /** Original encoded bytes, forwarded to the speech-to-text service */
  encoded: Buffer;
  mimeType: string;
}

// ─── Pauses ─────────────────────────────────────────────────────────────────────

export type PauseSource = "asr" | "vad";
export type PauseQuality = "short" | "medium" | "long";
export type PauseContext = "helpful" | "awkward";

export interface Pause {
  start_sec: number;
  end_sec: number;
  source: PauseSource;
  quality: PauseQuality;
  context: PauseContext;
}

// ─── Metric Results ─────────────────────────────────────────────────────────────

export type MetricName =
  | "pace"
  | "pause_quality"
  | "fillers"
  | "intonation"
  | "content_structure";

export type TipType = "strength" | "improvement";

export interface FeedbackItem {
  start_sec: number;
  end_sec: number;
  metric: string;
  message: string;
  tip_type: TipType;
}

export interface AbstainedDetails {
  reason: string;
}

export interface PaceDetails {
  words_per_minute: number;
  total_words: number;
  mean_gap_sec: number | null;
  long_gap_ratio: number | null;
  speech_ratio: number;
  segment_wpm_min: number | null;
  segment_wpm_max: number | null;
}

export interface PauseQualityDetails {
  total_pauses: number;
  average_pause_sec: number;
  long_pauses: number;
  short_pauses: number;
  helpful_pauses: number;
  awkward_pauses: number;
  pause_rate_per_sec: number;
}

export interface FillerCount {
  token: string;
  count: number;
}

export interface FillerDetails {
  filler_rate_per_min: number;
  fillers_per_100_words: number;
  total_fillers: number;
  total_words: number;
  top_fillers: FillerCount[];
}

export type PitchRangeSource = "exact" | "estimated";

export interface IntonationDetails {
  pitch_mean_hz: number;
  pitch_std_hz: number;
  pitch_range_hz: number;
  pitch_range_source: PitchRangeSource;
  pitch_cov: number;
  energy_mean: number;
  energy_std: number;
  voiced_frame_count: number | null;
  intonation_index: number;
  prosody_variance_score: number;
}

export interface ContentStructureDetails {
  sentence_count: number;
  avg_sentence_length: number;
  long_sentence_ratio: number;
  signpost_count: number;
  signpost_examples: string[];
}

export type MetricDetails =
  | AbstainedDetails
  | PaceDetails
  | PauseQualityDetails
  | FillerDetails
  | IntonationDetails
  | ContentStructureDetails;

export interface MetricResult<D extends MetricDetails = MetricDetails> {
  score_0_100: number | null;
  label: string;
  confidence: number;
  abstained: boolean;
  details: D | AbstainedDetails;
  feedback: FeedbackItem[];
}

// ─── Timeline ───────────────────────────────────────────────────────────────────

export interface PauseTimelineEntry extends Pause {
  type: "pause";
}

export interface FeedbackTimelineEntry extends FeedbackItem {
  type: "feedback";
}

/** Content segment marker. Carries no `type` field on the wire. */
export interface ContentSegment {
  start_sec: number;
  end_sec: number;
  dominant_issues: string[];
  highlights: string[];
}

export type TimelineEntry = PauseTimelineEntry | FeedbackTimelineEntry | ContentSegment;

// ─── Report ─────────────────────────────────────────────────────────────────────

export type MicQuality = "ok" | "very_quiet" | "noisy";
export type NoiseLevel = "low" | "medium" | "high";
export type QualityAbstainReason =
  | "low_asr_confidence"
  | "low_speech_ratio"
  | "low_asr_and_speech_ratio";

export interface QualityFlags {
  mic_quality: MicQuality;
  background_noise_level: NoiseLevel;
  asr_confidence: number;
  speech_ratio: number;
  abstain_reason: QualityAbstainReason | null;
  asr_quality_warning: boolean;
}

export interface OverallScore {
  score_0_100: number | null;
  label: string;
  confidence: number;
}

export interface TranscriptSegmentView {
  start_sec: number;
  end_sec: number;
  text: string;
  avg_confidence: number;
}

export interface TranscriptToken {
  text: string;
  start_sec: number;
  end_sec: number;
  is_filler: boolean;
}

export interface Transcript {
  full_text: string;
  language: string;
  segments: TranscriptSegmentView[];
  tokens: TranscriptToken[];
}

export interface ReportInput {
  audio_url: string;
  video_url: string | null;
  language: string;
  talk_type: string;
  audience_type: string;
  duration_sec: number;
}

export interface ModelMetadata {
  asr_model: string;
  vad_model: string;
  pitch_model: string;
  analyzer_version: string;
}

export interface Report {
  job_id: string;
  input: ReportInput;
  quality_flags: QualityFlags;
  metrics: Record<string, MetricResult>;
  timeline: TimelineEntry[];
  overall_score: OverallScore;
  transcript: Transcript;
  model_metadata: ModelMetadata;
}

// ─── Jobs ───────────────────────────────────────────────────────────────────────

export enum JobStatus {
  QUEUED = "queued",
  PROCESSING = "processing",
  DONE = "done",
  FAILED = "failed",
}

/** A validated submission. */
export interface JobInput {
  audioUrl: string;
  videoUrl: string | null;
  language: string;
  talkType: string;
  audienceType: string;
  requestedMetrics: string[];
  userMetadata: Record<string, unknown>;
}

export type FailureCode = "invalid_input" | "front_end_error" | "timeout" | "analysis_error";

export interface JobFailure {
  code: FailureCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface Job {
  id: string;
  status: JobStatus;
  createdAt: Date;
  updatedAt: Date;
  input: JobInput;
  report: Report | null;
  failure: JobFailure | null;
}

/** Status subset returned to callers. Always a pure read of the job record. */
export interface JobStatusView {
  job_id: string;
  status: JobStatus;
  created_at: string;
  updated_at: string;
  failure?: JobFailure;
  quality_flags?: QualityFlags;
  overall_score?: OverallScore;
  available_metrics?: string[];
}
