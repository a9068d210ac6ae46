// Presentation Analyzer - Frame-level audio features
//
// RMS energy per frame, a noise-floor estimate, and an autocorrelation pitch
// tracker. All functions take mono samples normalized to [-1, 1].

import type { EnergySummary, PitchSummary } from "./types.js";
import { mean, percentile, std } from "./stats.js";

// ─── Energy ─────────────────────────────────────────────────────────────────────

export const ENERGY_FRAME_SEC = 0.05;

/** Level reported for digital silence */
export const SILENCE_DBFS = -100;

const NOISE_FLOOR_PERCENTILE = 20;

/** RMS energy of consecutive non-overlapping frames; a trailing partial frame is dropped. */
export function frameRms(
  samples: Float32Array,
  sampleRate: number,
  frameSec: number = ENERGY_FRAME_SEC,
): number[] {
  const frameLen = Math.max(1, Math.round(sampleRate * frameSec));
  const frames = Math.floor(samples.length / frameLen);
  const out: number[] = new Array(frames);
  for (let f = 0; f < frames; f++) {
    let sumSquares = 0;
    const base = f * frameLen;
    for (let i = 0; i < frameLen; i++) {
      const s = samples[base + i];
      sumSquares += s * s;
    }
    out[f] = Math.sqrt(sumSquares / frameLen);
  }
  return out;
}

export function summarizeEnergy(rms: readonly number[]): EnergySummary {
  return { mean: mean(rms), std: std(rms) };
}

/** 20th-percentile frame energy in dBFS. */
export function noiseFloorDbfs(rms: readonly number[]): number {
  if (rms.length === 0) return SILENCE_DBFS;
  const floor = percentile(rms, NOISE_FLOOR_PERCENTILE);
  if (!(floor > 1e-5)) return SILENCE_DBFS;
  return 20 * Math.log10(floor);
}

// ─── Pitch ──────────────────────────────────────────────────────────────────────

export interface PitchTrackerOptions {
  minHz: number;
  maxHz: number;
  frameSec: number;
  hopSec: number;
  /** Normalized autocorrelation peak required to call a frame voiced */
  voicingThreshold: number;
  /** Frames quieter than this RMS are unvoiced */
  minRms: number;
}

export const DEFAULT_PITCH_OPTIONS: PitchTrackerOptions = {
  minHz: 50,
  maxHz: 400,
  frameSec: 0.04,
  hopSec: 0.02,
  voicingThreshold: 0.5,
  minRms: 0.005,
};

// Octave guard: the first peak within this fraction of the best one wins
const PEAK_ACCEPT_RATIO = 0.9;

/** Averages adjacent samples to halve the rate when it is comfortably above need. */
function decimate(samples: Float32Array, sampleRate: number): { x: Float32Array; rate: number } {
  if (sampleRate < 16000) return { x: samples, rate: sampleRate };
  const out = new Float32Array(Math.floor(samples.length / 2));
  for (let i = 0; i < out.length; i++) {
    out[i] = (samples[2 * i] + samples[2 * i + 1]) / 2;
  }
  return { x: out, rate: sampleRate / 2 };
}

function normalizedAutocorrelation(
  x: Float32Array,
  start: number,
  length: number,
  lag: number,
): number {
  let cross = 0;
  let e0 = 0;
  let e1 = 0;
  const n = length - lag;
  for (let i = 0; i < n; i++) {
    const a = x[start + i];
    const b = x[start + i + lag];
    cross += a * b;
    e0 += a * a;
    e1 += b * b;
  }
  const denom = Math.sqrt(e0 * e1);
  return denom > 0 ? cross / denom : 0;
}

/**
 * Estimates F0 per frame. Unvoiced or silent frames are NaN.
 */
export function trackPitch(
  samples: Float32Array,
  sampleRate: number,
  options: PitchTrackerOptions = DEFAULT_PITCH_OPTIONS,
): number[] {
  const { x, rate } = decimate(samples, sampleRate);
  const minLag = Math.max(2, Math.floor(rate / options.maxHz));
  const maxLag = Math.ceil(rate / options.minHz);
  const frameLen = Math.max(Math.round(rate * options.frameSec), 2 * maxLag);
  const hop = Math.max(1, Math.round(rate * options.hopSec));

  const track: number[] = [];
  for (let start = 0; start + frameLen <= x.length; start += hop) {
    let energy = 0;
    for (let i = 0; i < frameLen; i++) energy += x[start + i] * x[start + i];
    if (Math.sqrt(energy / frameLen) < options.minRms) {
      track.push(NaN);
      continue;
    }

    const r: number[] = new Array(maxLag + 2).fill(0);
    let best = 0;
    for (let lag = minLag - 1; lag <= maxLag + 1; lag++) {
      r[lag] = normalizedAutocorrelation(x, start, frameLen, lag);
      if (lag >= minLag && lag <= maxLag && r[lag] > best) best = r[lag];
    }
    if (best < options.voicingThreshold) {
      track.push(NaN);
      continue;
    }

    let chosen = -1;
    for (let lag = minLag; lag <= maxLag; lag++) {
      const isPeak = r[lag] >= r[lag - 1] && r[lag] >= r[lag + 1];
      if (isPeak && r[lag] >= PEAK_ACCEPT_RATIO * best) {
        chosen = lag;
        break;
      }
    }
    if (chosen < 0) {
      track.push(NaN);
      continue;
    }

    // Parabolic interpolation around the chosen peak
    const a = r[chosen - 1];
    const b = r[chosen];
    const c = r[chosen + 1];
    const curvature = a - 2 * b + c;
    const shift = curvature !== 0 ? (0.5 * (a - c)) / curvature : 0;
    track.push(rate / (chosen + shift));
  }

  return track;
}

export function summarizePitch(track: readonly number[]): PitchSummary {
  const voiced = track.filter((v) => Number.isFinite(v) && v > 0);
  if (voiced.length === 0) return { mean: null, std: null };
  return { mean: mean(voiced), std: std(voiced) };
}
