// Presentation Analyzer - Job Manager
//
// Owns the job store and the lifecycle state machine:
//
//   queued → processing → done
//                       ↘ failed
//
// Each job gets at most one pipeline run. State transitions are synchronous
// read-modify-write steps on the event loop, so a transition on one job can
// never interleave with another transition on the same job.
//
// A delete does not preempt a running pipeline; the run's result is discarded
// when it settles. Likewise a timed-out run keeps going in the background and
// its late result is ignored.

import { v4 as uuidv4 } from "uuid";
import {
  JobStatus,
  type Deferred,
  type Job,
  type JobFailure,
  type JobInput,
  type JobStatusView,
  type Report,
  type Transcript,
  type FailureCode,
} from "./types.js";
import {
  AppError,
  InvalidTransitionError,
  JobNotFoundError,
  JobNotReadyError,
  JobTimeoutError,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { validateSubmission } from "./submission.js";
import { createDeferred } from "./utils/deferred.js";

// ─── State Machine ──────────────────────────────────────────────────────────────

const VALID_TRANSITIONS: ReadonlyMap<JobStatus, readonly JobStatus[]> = new Map([
  [JobStatus.QUEUED, [JobStatus.PROCESSING]],
  [JobStatus.PROCESSING, [JobStatus.DONE, JobStatus.FAILED]],
  [JobStatus.DONE, []],
  [JobStatus.FAILED, []],
]);

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
}

export function isTerminal(status: JobStatus): boolean {
  return status === JobStatus.DONE || status === JobStatus.FAILED;
}

const FAILURE_CODES: ReadonlySet<string> = new Set<FailureCode>([
  "invalid_input",
  "front_end_error",
  "timeout",
]);

function isFailureCode(code: string): code is FailureCode {
  return FAILURE_CODES.has(code);
}

export function toFailure(err: unknown): JobFailure {
  if (err instanceof AppError && isFailureCode(err.code)) {
    return { code: err.code, message: err.message, details: { error_type: err.name } };
  }
  const error = err instanceof Error ? err : new Error(String(err));
  return {
    code: "analysis_error",
    message: error.message,
    details: { error_type: error.name },
  };
}

export function newJobId(): string {
  return `pres_${uuidv4().replace(/-/g, "").slice(0, 10)}`;
}

// ─── Views ──────────────────────────────────────────────────────────────────────

export function toStatusView(job: Job): JobStatusView {
  const view: JobStatusView = {
    job_id: job.id,
    status: job.status,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };
  if (job.status === JobStatus.FAILED && job.failure) {
    view.failure = job.failure;
  }
  if (job.status === JobStatus.DONE && job.report) {
    view.quality_flags = { ...job.report.quality_flags };
    view.overall_score = { ...job.report.overall_score };
    view.available_metrics = Object.keys(job.report.metrics);
  }
  return view;
}

export interface TranscriptView {
  job_id: string;
  status: JobStatus;
  transcript?: Transcript;
}

// ─── Job Manager ────────────────────────────────────────────────────────────────

/** Runs the analysis for one job. AnalysisPipeline implements this. */
export interface JobRunner {
  run(jobId: string, input: JobInput): Promise<Report>;
}

export type TransitionListener = (job: Readonly<Job>, from: JobStatus | null) => void;

export interface JobManagerDeps {
  runner: JobRunner;
  logger?: Logger;
  /** Pipeline runs allowed at once; further jobs wait in `queued`. Default: 2 */
  maxConcurrentJobs?: number;
  /** Wall-clock budget per run in ms; 0 disables it. Default: 0 */
  jobTimeoutMs?: number;
  now?: () => Date;
  generateId?: () => string;
}

export class JobManager {
  private readonly jobs = new Map<string, Job>();
  private readonly activeRuns = new Map<string, Promise<void>>();
  private readonly settled = new Map<string, Deferred<void>>();
  private readonly waiting: string[] = [];
  private readonly listeners = new Set<TransitionListener>();
  private running = 0;

  private readonly runner: JobRunner;
  private readonly logger: Logger;
  private readonly maxConcurrentJobs: number;
  private readonly jobTimeoutMs: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(deps: JobManagerDeps) {
    this.runner = deps.runner;
    this.logger = deps.logger ?? silentLogger;
    this.maxConcurrentJobs = Math.max(1, deps.maxConcurrentJobs ?? 2);
    this.jobTimeoutMs = deps.jobTimeoutMs ?? 0;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? newJobId;
  }

  /**
   * Validates a submission, creates a `queued` job and schedules its run.
   * Returns before the run starts. Throws InputValidationError for an
   * invalid body; no job is created in that case.
   */
  submit(body: unknown): string {
    const input = validateSubmission(body);

    let id = this.generateId();
    while (this.jobs.has(id)) id = this.generateId();

    const timestamp = this.now();
    const job: Job = {
      id,
      status: JobStatus.QUEUED,
      createdAt: timestamp,
      updatedAt: timestamp,
      input,
      report: null,
      failure: null,
    };
    this.jobs.set(id, job);
    this.settled.set(id, createDeferred<void>());
    this.waiting.push(id);
    this.logger.info(`Job ${id} queued (metrics: ${input.requestedMetrics.join(", ")})`);
    this.notify(job, null);

    setImmediate(() => this.dispatch());
    return id;
  }

  getJob(jobId: string): Readonly<Job> {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  getStatus(jobId: string): JobStatusView {
    return toStatusView(this.getJob(jobId));
  }

  getFullReport(jobId: string): Report {
    const job = this.getJob(jobId);
    if (job.status !== JobStatus.DONE || !job.report) {
      throw new JobNotReadyError(jobId, job.status);
    }
    return structuredClone(job.report);
  }

  /** Transcript once done; status only while pending. A failed job has none. */
  getTranscript(jobId: string): TranscriptView {
    const job = this.getJob(jobId);
    if (job.status === JobStatus.FAILED) {
      throw new JobNotReadyError(jobId, job.status);
    }
    if (job.status === JobStatus.DONE && job.report) {
      return { job_id: job.id, status: job.status, transcript: structuredClone(job.report.transcript) };
    }
    return { job_id: job.id, status: job.status };
  }

  listJobs(): JobStatusView[] {
    return [...this.jobs.values()].map(toStatusView);
  }

  /**
   * Removes a job record. A running pipeline is not interrupted; its result
   * is dropped when it finishes.
   */
  delete(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) return false;
    this.jobs.delete(jobId);

    const queuedAt = this.waiting.indexOf(jobId);
    if (queuedAt >= 0) {
      this.waiting.splice(queuedAt, 1);
      this.settle(jobId);
    }
    if (this.activeRuns.has(jobId)) {
      this.logger.warn(`Job ${jobId} deleted while processing; its result will be discarded`);
    } else {
      this.logger.info(`Job ${jobId} deleted`);
    }
    return true;
  }

  /** Subscribe to status changes. Returns an unsubscribe function. */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once the job's run has settled (or immediately when the job
   * has no pending run).
   */
  waitForJob(jobId: string): Promise<void> {
    return this.settled.get(jobId)?.promise ?? Promise.resolve();
  }

  get size(): number {
    return this.jobs.size;
  }

  get activeCount(): number {
    return this.running;
  }

  // ─── Scheduling ───────────────────────────────────────────────────────────────

  private dispatch(): void {
    while (this.running < this.maxConcurrentJobs && this.waiting.length > 0) {
      const jobId = this.waiting.shift();
      if (jobId === undefined) break;
      const job = this.jobs.get(jobId);
      if (!job) continue;
      this.start(job);
    }
  }

  private start(job: Job): void {
    if (this.activeRuns.has(job.id)) {
      throw new Error(`Job ${job.id} already has an active run`);
    }
    this.transition(job, JobStatus.PROCESSING);
    this.running++;

    const run = this.execute(job.id, job.input).finally(() => {
      this.running--;
      this.activeRuns.delete(job.id);
      this.settle(job.id);
      this.dispatch();
    });
    this.activeRuns.set(job.id, run);
  }

  private async execute(jobId: string, input: JobInput): Promise<void> {
    const startedAt = Date.now();
    try {
      const report = await this.withTimeout(jobId, this.runner.run(jobId, input));
      this.commit(jobId, (job) => {
        job.report = report;
        this.transition(job, JobStatus.DONE);
      });
      this.logger.info(`Job ${jobId} done in ${Date.now() - startedAt} ms`);
    } catch (err) {
      const failure = toFailure(err);
      this.commit(jobId, (job) => {
        job.failure = failure;
        this.transition(job, JobStatus.FAILED);
      });
      this.logger.error(`Job ${jobId} failed (${failure.code}): ${failure.message}`);
    }
  }

  private withTimeout(jobId: string, run: Promise<Report>): Promise<Report> {
    if (this.jobTimeoutMs <= 0) return run;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new JobTimeoutError(jobId, this.jobTimeoutMs)), this.jobTimeoutMs);
    });
    // The race only observes the first settlement; keep a late rejection handled
    run.catch((err: unknown) => {
      this.logger.debug(`Job ${jobId} run rejected: ${String(err)}`);
    });
    return Promise.race([run, timeout]).finally(() => clearTimeout(timer));
  }

  /**
   * Applies a result to a job still in `processing`. Results for deleted or
   * already-terminal jobs are dropped.
   */
  private commit(jobId: string, apply: (job: Job) => void): void {
    const job = this.jobs.get(jobId);
    if (!job) {
      this.logger.info(`Discarding result for deleted job ${jobId}`);
      return;
    }
    if (job.status !== JobStatus.PROCESSING) {
      this.logger.warn(`Discarding late result for job ${jobId} in "${job.status}" state`);
      return;
    }
    apply(job);
  }

  private transition(job: Job, target: JobStatus): void {
    if (!canTransition(job.status, target)) {
      throw new InvalidTransitionError(job.id, job.status, target);
    }
    const from = job.status;
    job.status = target;
    job.updatedAt = this.now();
    this.notify(job, from);
  }

  private notify(job: Job, from: JobStatus | null): void {
    for (const listener of this.listeners) {
      try {
        listener(job, from);
      } catch (err) {
        this.logger.error(`Transition listener failed for job ${job.id}: ${String(err)}`);
      }
    }
  }

  private settle(jobId: string): void {
    this.settled.get(jobId)?.resolve();
    this.settled.delete(jobId);
  }
}
