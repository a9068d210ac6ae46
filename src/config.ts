// Presentation Analyzer - Configuration
//
// The entry point loads `.env` through dotenv before calling loadConfig();
// this module only reads the environment object it is given.

import path from "node:path";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  deepgramApiKey: string | null;
  openaiApiKey: string | null;
  /** Absolute directory uploaded recordings are written to */
  uploadDir: string;
  maxConcurrentJobs: number;
  /** Wall-clock budget per pipeline run in ms; 0 disables it */
  jobTimeoutMs: number;
  maxUploadBytes: number;
}

const DEFAULT_LOG_LEVEL: LogLevel = "info";

const DEFAULTS = {
  port: 3000,
  logLevel: DEFAULT_LOG_LEVEL,
  uploadDir: "uploads",
  maxConcurrentJobs: 2,
  jobTimeoutMs: 0,
  maxUploadBytes: 50 * 1024 * 1024,
};

function readInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  min: number,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | null {
  const raw = env[key];
  return raw !== undefined && raw.trim() !== "" ? raw.trim() : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = readString(env, "LOG_LEVEL") ?? DEFAULTS.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  return {
    port: readInt(env, "PORT", DEFAULTS.port, 0),
    logLevel,
    deepgramApiKey: readString(env, "DEEPGRAM_API_KEY"),
    openaiApiKey: readString(env, "OPENAI_API_KEY"),
    uploadDir: path.resolve(readString(env, "UPLOAD_DIR") ?? DEFAULTS.uploadDir),
    maxConcurrentJobs: readInt(env, "MAX_CONCURRENT_JOBS", DEFAULTS.maxConcurrentJobs, 1),
    jobTimeoutMs: readInt(env, "JOB_TIMEOUT_MS", DEFAULTS.jobTimeoutMs, 0),
    maxUploadBytes: readInt(env, "MAX_UPLOAD_BYTES", DEFAULTS.maxUploadBytes, 1),
  };
}
