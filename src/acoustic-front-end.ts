// Presentation Analyzer - Acoustic Front End
//
// Turns a decoded recording into RawFeatures: ASR words and word-gap pauses,
// VAD speech/silence, frame energy, noise floor and a pitch track. Missing
// signals become null fields; only transcription service failures throw.

import type { AudioInput, Interval, RawFeatures, TranscriptWord } from "./types.js";
import type { TranscriptionResult } from "./transcription-engine.js";
import {
  DEFAULT_PITCH_OPTIONS,
  ENERGY_FRAME_SEC,
  frameRms,
  noiseFloorDbfs,
  summarizeEnergy,
  summarizePitch,
  trackPitch,
  type PitchTrackerOptions,
} from "./audio-features.js";
import { DEFAULT_VAD_CONFIG, segmentSpeech, type VadConfig } from "./vad-segmenter.js";
import { silentLogger, type Logger } from "./logger.js";

/** Boundary the pipeline consumes. One call per job. */
export interface AcousticFrontEnd {
  extract(audio: AudioInput, language: string): Promise<RawFeatures>;
  readonly vadModel: string;
  readonly pitchModel: string;
}

export interface Transcriber {
  transcribe(audio: Buffer, mimeType: string, language: string): Promise<TranscriptionResult>;
}

/** Word gaps at least this long count as ASR pauses */
export const ASR_PAUSE_MIN_SEC = 0.25;

/** Gaps of at least `minGapSec` between consecutive words. */
export function wordGapPauses(
  words: readonly TranscriptWord[],
  minGapSec: number = ASR_PAUSE_MIN_SEC,
): Interval[] {
  const sorted = [...words].sort((a, b) => a.startTime - b.startTime);
  const gaps: Interval[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const start = sorted[i - 1].endTime;
    const end = sorted[i].startTime;
    if (end - start >= minGapSec) gaps.push({ start, end });
  }
  return gaps;
}

export interface AudioFrontEndDeps {
  transcriber: Transcriber;
  vadConfig?: VadConfig;
  pitchOptions?: PitchTrackerOptions;
  logger?: Logger;
}

export class AudioFrontEnd implements AcousticFrontEnd {
  readonly vadModel = "energy-vad";
  readonly pitchModel = "autocorrelation-f0";

  private readonly transcriber: Transcriber;
  private readonly vadConfig: VadConfig;
  private readonly pitchOptions: PitchTrackerOptions;
  private readonly logger: Logger;

  constructor(deps: AudioFrontEndDeps) {
    this.transcriber = deps.transcriber;
    this.vadConfig = deps.vadConfig ?? DEFAULT_VAD_CONFIG;
    this.pitchOptions = deps.pitchOptions ?? DEFAULT_PITCH_OPTIONS;
    this.logger = deps.logger ?? silentLogger;
  }

  async extract(audio: AudioInput, language: string): Promise<RawFeatures> {
    const durationSec = audio.samples.length / audio.sampleRate;

    const rms = frameRms(audio.samples, audio.sampleRate, ENERGY_FRAME_SEC);
    const vad = segmentSpeech(rms, durationSec, this.vadConfig);
    const pitchTrack = trackPitch(audio.samples, audio.sampleRate, this.pitchOptions);
    const pitchSummary = summarizePitch(pitchTrack);

    const asr = await this.transcriber.transcribe(audio.encoded, audio.mimeType, language);
    if (asr.words.length === 0) {
      this.logger.warn(`No words transcribed (${durationSec.toFixed(1)} s of audio)`);
    }
    if (pitchSummary.mean === null) {
      this.logger.debug("No voiced frames found in pitch track");
    }

    const words = [...asr.words].sort((a, b) => a.startTime - b.startTime);

    return {
      words,
      transcriptText: asr.text.length > 0 ? asr.text : words.map((w) => w.word).join(" "),
      asrPauseIntervals: wordGapPauses(words),
      vadPauseIntervals: vad.silence,
      vadSpeechSegments: vad.speech,
      pitchSummary,
      rawPitchTimeseries: pitchTrack.length > 0 ? pitchTrack : null,
      energySummary: summarizeEnergy(rms),
      noiseFloorDbfs: noiseFloorDbfs(rms),
      durationSec,
      language,
      asrProvider: asr.provider,
      asrModel: asr.model,
      asrQualityWarning: asr.qualityWarning,
    };
  }
}
