// Presentation Analyzer - Submission validation and audio loading
//
// Invalid submissions are rejected before a job is created. Audio that cannot
// be read is an input error raised when the pipeline loads it.

import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { AudioInput, JobInput, MetricName } from "./types.js";
import { InputValidationError, errorMessage } from "./errors.js";
import { decodeWav } from "./wav-decoder.js";

export const DEFAULT_METRICS: readonly MetricName[] = [
  "pace",
  "pause_quality",
  "fillers",
  "intonation",
  "content_structure",
];

const SUPPORTED_EXTENSIONS = new Set([".wav"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requiredString(body: Record<string, unknown>, key: string, fallback?: string): string {
  const value = body[key] ?? fallback;
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InputValidationError(`"${key}" is required and must be a non-empty string`, { field: key });
  }
  return value.trim();
}

function optionalString(body: Record<string, unknown>, key: string): string | null {
  const value = body[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new InputValidationError(`"${key}" must be a string`, { field: key });
  }
  return value.trim().length > 0 ? value.trim() : null;
}

/**
 * Resolves an audio reference to a local file path. Accepts absolute paths
 * and file:// URLs.
 */
export function resolveAudioPath(audioUrl: string): string {
  let filePath: string;
  if (audioUrl.startsWith("file://")) {
    try {
      filePath = fileURLToPath(audioUrl);
    } catch (err) {
      throw new InputValidationError(`Invalid audio_url: ${errorMessage(err)}`, { field: "audio_url" });
    }
  } else if (/^[a-z][a-z0-9+.-]*:\/\//i.test(audioUrl)) {
    throw new InputValidationError("Remote audio URLs are not supported; upload the file instead", {
      field: "audio_url",
    });
  } else if (path.isAbsolute(audioUrl)) {
    filePath = audioUrl;
  } else {
    throw new InputValidationError("audio_url must be an absolute path or a file:// URL", {
      field: "audio_url",
    });
  }

  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new InputValidationError(`Unsupported audio format "${ext || "(none)"}"; expected .wav`, {
      field: "audio_url",
    });
  }
  return filePath;
}

/** Validates a wire-format submission body. */
export function validateSubmission(body: unknown): JobInput {
  if (!isRecord(body)) {
    throw new InputValidationError("Submission body must be a JSON object");
  }

  const audioUrl = requiredString(body, "audio_url");
  resolveAudioPath(audioUrl);

  let requestedMetrics: string[] = [...DEFAULT_METRICS];
  const rawMetrics = body["requested_metrics"];
  if (rawMetrics !== undefined && rawMetrics !== null) {
    if (
      !Array.isArray(rawMetrics) ||
      rawMetrics.length === 0 ||
      !rawMetrics.every((m): m is string => typeof m === "string" && m.trim().length > 0)
    ) {
      throw new InputValidationError('"requested_metrics" must be a non-empty list of metric names', {
        field: "requested_metrics",
      });
    }
    requestedMetrics = [...new Set(rawMetrics.map((m) => m.trim()))];
  }

  const userMetadata = body["user_metadata"] ?? {};
  if (!isRecord(userMetadata)) {
    throw new InputValidationError('"user_metadata" must be an object', { field: "user_metadata" });
  }

  return {
    audioUrl,
    videoUrl: optionalString(body, "video_url"),
    language: requiredString(body, "language", "en"),
    talkType: requiredString(body, "talk_type"),
    audienceType: requiredString(body, "audience_type"),
    requestedMetrics,
    userMetadata,
  };
}

/** Reads and decodes the recording behind a validated audio_url. */
export async function loadAudio(audioUrl: string): Promise<AudioInput> {
  const filePath = resolveAudioPath(audioUrl);
  let encoded: Buffer;
  try {
    encoded = await readFile(filePath);
  } catch (err) {
    throw new InputValidationError(`Audio file could not be read: ${errorMessage(err)}`, {
      field: "audio_url",
    });
  }

  const { samples, sampleRate } = decodeWav(encoded);
  if (samples.length === 0) {
    throw new InputValidationError("Audio file contains no samples", { field: "audio_url" });
  }
  return { samples, sampleRate, encoded, mimeType: "audio/wav" };
}
