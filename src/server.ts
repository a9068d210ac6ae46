// Presentation Analyzer - HTTP API and Job Status Feed
//
// REST routes under /api/v1/presentations drive the JobManager. A WebSocket
// endpoint at /ws pushes status views to clients subscribed to a job.

import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket } from "ws";
import type { Job, JobStatusView } from "./types.js";
import { AppError, InputValidationError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { toStatusView, type JobManager } from "./job-manager.js";
import { decodeWav } from "./wav-decoder.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const API_PREFIX = "/api/v1/presentations";
export const FEED_PATH = "/ws";

const UPLOAD_CONTENT_TYPES = ["audio/wav", "audio/x-wav", "audio/wave", "application/octet-stream"];

/** Used for uploads that omit the query parameters */
export const UPLOAD_DEFAULTS = {
  talkType: "presentation",
  audienceType: "general",
  language: "en",
};

const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

// ─── Feed Messages ──────────────────────────────────────────────────────────────

export type FeedClientMessage = { type: "subscribe"; job_id: string };

export type FeedServerMessage =
  | ({ type: "job_status" } & JobStatusView)
  | { type: "error"; message: string };

function parseClientMessage(text: string): FeedClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new InputValidationError("Message is not valid JSON");
  }
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "type" in parsed &&
    parsed.type === "subscribe" &&
    "job_id" in parsed &&
    typeof parsed.job_id === "string"
  ) {
    return { type: "subscribe", job_id: parsed.job_id };
  }
  throw new InputValidationError('Expected {"type":"subscribe","job_id":"..."}');
}

export function sendMessage(ws: WebSocket, message: FeedServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  jobManager: JobManager;
  /** Absolute directory uploaded recordings are written to */
  uploadDir: string;
  maxUploadBytes?: number;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  jobManager: JobManager;
  /** Start listening on the given port. Resolves once listening. */
  listen(port: number): Promise<void>;
  /** Closes feed connections and the HTTP server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server and feed WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    jobManager,
    uploadDir,
    maxUploadBytes = DEFAULT_MAX_UPLOAD_BYTES,
    logger = silentLogger,
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", jobs: jobManager.size });
  });

  app.post(API_PREFIX, (req, res) => {
    const jobId = jobManager.submit(req.body);
    res.status(201).json({ job_id: jobId, status: jobManager.getStatus(jobId).status });
  });

  app.post(
    `${API_PREFIX}/upload`,
    express.raw({ type: UPLOAD_CONTENT_TYPES, limit: maxUploadBytes }),
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new InputValidationError(
          `Upload body must be WAV audio sent as ${UPLOAD_CONTENT_TYPES.join(", ")}`,
        );
      }
      decodeWav(body);

      await mkdir(uploadDir, { recursive: true });
      const filePath = path.join(uploadDir, `${uuidv4()}.wav`);
      await writeFile(filePath, body);
      logger.info(`Stored upload ${filePath} (${body.length} bytes)`);

      let jobId: string;
      try {
        jobId = jobManager.submit({
          audio_url: filePath,
          talk_type: queryString(req, "talk_type") ?? UPLOAD_DEFAULTS.talkType,
          audience_type: queryString(req, "audience_type") ?? UPLOAD_DEFAULTS.audienceType,
          language: queryString(req, "language") ?? UPLOAD_DEFAULTS.language,
        });
      } catch (err) {
        await rm(filePath, { force: true });
        throw err;
      }
      res.status(201).json({
        job_id: jobId,
        status: jobManager.getStatus(jobId).status,
        audio_url: filePath,
      });
    }),
  );

  app.get(API_PREFIX, (_req, res) => {
    res.json(jobManager.listJobs());
  });

  app.get(`${API_PREFIX}/:id`, (req, res) => {
    res.json(jobManager.getStatus(req.params.id));
  });

  app.get(`${API_PREFIX}/:id/full`, (req, res) => {
    res.json(jobManager.getFullReport(req.params.id));
  });

  app.get(`${API_PREFIX}/:id/transcript`, (req, res) => {
    res.json(jobManager.getTranscript(req.params.id));
  });

  app.delete(`${API_PREFIX}/:id`, (req, res) => {
    const jobId = req.params.id;
    // Surfaces 404 for unknown ids
    jobManager.getStatus(jobId);
    jobManager.delete(jobId);
    res.status(204).end();
  });

  app.use((req, res) => {
    res.status(404).json({ error: { code: "not_found", message: `No route for ${req.method} ${req.path}` } });
  });

  app.use(errorHandler(logger));

  // ─── Status Feed ────────────────────────────────────────────────────────────

  const wss = new WebSocketServer({ server: httpServer, path: FEED_PATH });
  const subscriptions = new Map<WebSocket, Set<string>>();

  wss.on("connection", (ws: WebSocket) => {
    subscriptions.set(ws, new Set());
    logger.info(`Feed client connected (${subscriptions.size} open)`);

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      try {
        if (isBinary) {
          throw new InputValidationError("Binary messages are not supported");
        }
        const message = parseClientMessage(data.toString());
        const view = jobManager.getStatus(message.job_id);
        subscriptions.get(ws)?.add(message.job_id);
        sendMessage(ws, { type: "job_status", ...view });
      } catch (err) {
        sendMessage(ws, { type: "error", message: errorMessage(err) });
      }
    });

    ws.on("close", () => {
      subscriptions.delete(ws);
    });

    ws.on("error", (err) => {
      logger.warn(`Feed client error: ${err.message}`);
      subscriptions.delete(ws);
    });
  });

  const unsubscribe = jobManager.onTransition((job: Readonly<Job>) => {
    let view: JobStatusView | null = null;
    for (const [ws, jobIds] of subscriptions) {
      if (!jobIds.has(job.id)) continue;
      view ??= toStatusView(job);
      sendMessage(ws, { type: "job_status", ...view });
    }
  });

  return {
    app,
    httpServer,
    wss,
    jobManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      unsubscribe();
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

/** Express 4 does not forward rejected promises to the error handler. */
function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/** Status set by body-parser on malformed or oversized bodies */
function bodyParserStatus(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return null;
}

function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError) {
      res.status(err.statusCode).json({ error: { code: err.code, message: err.message } });
      return;
    }

    const status = bodyParserStatus(err);
    if (status === 413) {
      res.status(413).json({ error: { code: "payload_too_large", message: errorMessage(err) } });
      return;
    }
    if (status !== null && status >= 400 && status < 500) {
      res.status(400).json({ error: { code: "invalid_input", message: errorMessage(err) } });
      return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.path}: ${errorMessage(err)}`);
    res.status(500).json({ error: { code: "internal_error", message: "Internal server error" } });
  };
}
