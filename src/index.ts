// Presentation Analyzer - Entry point
// Wires up all pipeline dependencies and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { errorMessage } from "./errors.js";
import { createAppServer } from "./server.js";
import { JobManager } from "./job-manager.js";
import { AnalysisPipeline, ANALYZER_VERSION } from "./analysis-pipeline.js";
import { AudioFrontEnd } from "./acoustic-front-end.js";
import { TranscriptionEngine } from "./transcription-engine.js";
import type {
  DeepgramPrerecordedClient,
  OpenAITranscriptionClient,
} from "./transcription-engine.js";

export const APP_NAME = "Presentation Analyzer";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Configuration ──────────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(`Invalid configuration: ${errorMessage(err)}`);
  process.exit(1);
}

if (!config.deepgramApiKey && !config.openaiApiKey) {
  logFatal("Neither DEEPGRAM_API_KEY nor OPENAI_API_KEY is set. Add one to your .env file.");
  process.exit(1);
}

// ─── Initialize API clients ─────────────────────────────────────────────────────

let deepgramClient: DeepgramPrerecordedClient | null = null;
if (config.deepgramApiKey) {
  logInit("Creating Deepgram client...");
  deepgramClient = createDeepgramClient(config.deepgramApiKey) as unknown as DeepgramPrerecordedClient;
}

let openaiClient: OpenAITranscriptionClient | null = null;
if (config.openaiApiKey) {
  logInit("Creating OpenAI client (transcription fallback)...");
  openaiClient = new OpenAI({ apiKey: config.openaiApiKey }) as unknown as OpenAITranscriptionClient;
}

// ─── Initialize pipeline components ─────────────────────────────────────────────

const { logLevel } = config;

const transcriptionEngine = new TranscriptionEngine({
  deepgramClient,
  openaiClient,
  logger: createLogger("TranscriptionEngine", logLevel),
});

const frontEnd = new AudioFrontEnd({
  transcriber: transcriptionEngine,
  logger: createLogger("FrontEnd", logLevel),
});

const pipeline = new AnalysisPipeline({
  frontEnd,
  logger: createLogger("Pipeline", logLevel),
});

const jobManager = new JobManager({
  runner: pipeline,
  maxConcurrentJobs: config.maxConcurrentJobs,
  jobTimeoutMs: config.jobTimeoutMs,
  logger: createLogger("JobManager", logLevel),
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  jobManager,
  uploadDir: config.uploadDir,
  maxUploadBytes: config.maxUploadBytes,
  logger: createLogger("Server", logLevel),
});

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${ANALYZER_VERSION} running at http://localhost:${config.port}`);
    logInit(`Uploads stored in ${config.uploadDir}`);
  })
  .catch((err: unknown) => {
    logFatal(`Could not start server: ${errorMessage(err)}`);
    process.exit(1);
  });

function shutdown(signal: string): void {
  logInit(`${signal} received, shutting down`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
