// Presentation Analyzer - Recording Quality Flags

import type {
  MicQuality,
  NoiseLevel,
  QualityAbstainReason,
  QualityFlags,
  RawFeatures,
} from "./types.js";
import { mean, round } from "./stats.js";

const VERY_QUIET_ENERGY = 0.001;
const NOISY_FLOOR_DBFS = -30;
const LOW_NOISE_DBFS = -60;
const MEDIUM_NOISE_DBFS = -40;

export const MIN_ASR_CONFIDENCE = 0.5;
export const MIN_SPEECH_RATIO = 0.3;

export function micQuality(energyMean: number, noiseFloorDbfs: number): MicQuality {
  if (energyMean < VERY_QUIET_ENERGY) return "very_quiet";
  if (noiseFloorDbfs > NOISY_FLOOR_DBFS) return "noisy";
  return "ok";
}

export function noiseLevel(noiseFloorDbfs: number): NoiseLevel {
  if (noiseFloorDbfs < LOW_NOISE_DBFS) return "low";
  if (noiseFloorDbfs < MEDIUM_NOISE_DBFS) return "medium";
  return "high";
}

export function qualityAbstainReason(
  asrConfidence: number,
  speechRatio: number,
): QualityAbstainReason | null {
  const lowAsr = asrConfidence < MIN_ASR_CONFIDENCE;
  const lowSpeech = speechRatio < MIN_SPEECH_RATIO;
  if (lowAsr && lowSpeech) return "low_asr_and_speech_ratio";
  if (lowAsr) return "low_asr_confidence";
  if (lowSpeech) return "low_speech_ratio";
  return null;
}

export function computeQualityFlags(features: RawFeatures): QualityFlags {
  const asrConfidence = mean(features.words.map((w) => w.confidence));
  const speech = features.vadSpeechSegments.reduce((sum, s) => sum + (s.end - s.start), 0);
  const speechRatio =
    features.durationSec > 0 ? Math.min(1, Math.max(0, speech / features.durationSec)) : 0;

  return {
    mic_quality: micQuality(features.energySummary.mean, features.noiseFloorDbfs),
    background_noise_level: noiseLevel(features.noiseFloorDbfs),
    asr_confidence: round(asrConfidence, 3),
    speech_ratio: round(speechRatio, 3),
    abstain_reason: qualityAbstainReason(asrConfidence, speechRatio),
    asr_quality_warning: features.asrQualityWarning,
  };
}
