// Presentation Analyzer - Offline Voice Activity Segmenter
//
// Energy-based speech/silence segmentation over a complete recording.
// Thresholding is adaptive: a fixed conservative threshold picks out
// candidate speech frames, then the silence threshold becomes a fraction of
// their median energy.

import type { Interval } from "./types.js";
import { ENERGY_FRAME_SEC } from "./audio-features.js";
import { median } from "./stats.js";

export interface VadConfig {
  /** Seconds per analysis frame. Default: 0.05 */
  frameSec: number;
  /** Fixed RMS threshold used before enough speech has been seen (normalized samples). Default: 50 / 32768 */
  bootstrapThreshold: number;
  /** Fraction of median speech energy used as the silence threshold. Default: 0.15 */
  thresholdMultiplier: number;
  /** Minimum bootstrap speech frames before the adaptive threshold applies. Default: 10 */
  minBootstrapFrames: number;
  /** Speech runs shorter than this are discarded. Default: 0.15 */
  minSpeechSec: number;
  /** Silences shorter than this inside speech are bridged. Default: 0.1 */
  minGapSec: number;
  /** Silence intervals shorter than this are not reported as pauses. Default: 0.15 */
  minSilenceSec: number;
}

export const DEFAULT_VAD_CONFIG: VadConfig = {
  frameSec: ENERGY_FRAME_SEC,
  bootstrapThreshold: 50 / 32768,
  thresholdMultiplier: 0.15,
  minBootstrapFrames: 10,
  minSpeechSec: 0.15,
  minGapSec: 0.1,
  minSilenceSec: 0.15,
};

export interface VadResult {
  speech: Interval[];
  silence: Interval[];
  threshold: number;
}

export function silenceThreshold(rms: readonly number[], config: VadConfig): number {
  const candidates = rms.filter((v) => v > config.bootstrapThreshold);
  if (candidates.length < config.minBootstrapFrames) return config.bootstrapThreshold;
  return Math.max(config.bootstrapThreshold, median(candidates) * config.thresholdMultiplier);
}

/**
 * Segments per-frame RMS energy into speech and silence intervals.
 * Silence covers every gap of at least `minSilenceSec` between, before or
 * after speech segments.
 */
export function segmentSpeech(
  rms: readonly number[],
  durationSec: number,
  config: VadConfig = DEFAULT_VAD_CONFIG,
): VadResult {
  const threshold = silenceThreshold(rms, config);
  const frame = config.frameSec;

  // Raw speech runs
  let runs: Interval[] = [];
  let runStart: number | null = null;
  for (let i = 0; i < rms.length; i++) {
    if (rms[i] > threshold) {
      if (runStart === null) runStart = i;
    } else if (runStart !== null) {
      runs.push({ start: runStart * frame, end: i * frame });
      runStart = null;
    }
  }
  if (runStart !== null) runs.push({ start: runStart * frame, end: rms.length * frame });

  // Bridge short gaps, then drop blips
  const bridged: Interval[] = [];
  for (const run of runs) {
    const last = bridged[bridged.length - 1];
    if (last && run.start - last.end < config.minGapSec - 1e-9) {
      last.end = run.end;
    } else {
      bridged.push({ ...run });
    }
  }
  runs = bridged.filter((r) => r.end - r.start >= config.minSpeechSec - 1e-9);

  const end = Math.max(durationSec, rms.length * frame);
  const silence: Interval[] = [];
  let cursor = 0;
  for (const run of runs) {
    if (run.start - cursor >= config.minSilenceSec - 1e-9) {
      silence.push({ start: cursor, end: run.start });
    }
    cursor = run.end;
  }
  if (end - cursor >= config.minSilenceSec - 1e-9) {
    silence.push({ start: cursor, end });
  }

  return { speech: runs, silence, threshold };
}
