/**
 * Job Orchestrator with Concurrency Control
 *
 * Runs download jobs through a FIFO queue with a bounded number of jobs in
 * the running state. The orchestrator is the single owner of job state:
 * runners report progress only through context.emit() and their returned
 * promise, and every counter change goes through AggregateStats.
 *
 * Key design decisions:
 * - Configurable concurrency (1-10, default: 1)
 * - Per-job error isolation (a failing job never affects another)
 * - A job fails when any of its log lines starts with "Error:"
 * - Cancellation and an optional per-job timeout, both through AbortSignal;
 *   the slot is released right away even if the runner ignores the signal
 * - No automatic retry
 * - Subscription (onJobTerminal, onLogLine) and polling (pollCompletions)
 *   APIs for front ends
 */

import {
  AggregateStatsSnapshot,
  ERROR_MARKER,
  JobOutcome,
  JobSnapshot,
  JobState,
  SearchQuery,
  USB_COPY_SUCCESS,
} from '../../shared/types';
import { AggregateStats } from './aggregateStats';
import { JobCancelledError, JobTimeoutError, PipelineError, isPipelineError } from './errors';
import { Logger } from './logger';
import { parseQuery } from './queryParser';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** What a runner gets for one job */
export interface JobContext {
  jobId: number;
  /** Aborted when the job is cancelled or times out */
  signal: AbortSignal;
  /** Appends a message to the job log */
  emit(message: string): void;
}

/** What a runner reports when it finishes without throwing */
export interface JobRunResult {
  /** Final location of the track, if one was produced */
  filePath: string | null;
}

/** Does the actual work of a job */
export interface JobRunner {
  run(query: SearchQuery, context: JobContext): Promise<JobRunResult>;
}

/** Options for the job orchestrator */
export interface JobOrchestratorOptions {
  runner: JobRunner;
  /** Maximum number of running jobs (1-10, default: 1) */
  concurrency?: number;
  /** Per-job timeout in ms (0 = no timeout) */
  jobTimeoutMs?: number;
  /** Logger instance for structured logging */
  logger?: Logger;
}

export type JobTerminalListener = (job: JobSnapshot) => void;
export type JobLogListener = (line: string) => void;

/** Internal, mutable job record */
interface JobRecord {
  id: number;
  query: SearchQuery;
  state: JobState;
  logLines: string[];
  usbCopied: boolean;
  filePath: string | null;
  submittedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  controller: AbortController | null;
  timer: ReturnType<typeof setTimeout> | null;
  /** Set when the orchestrator stops the job (cancel or timeout) */
  abortError: PipelineError | null;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const MIN_CONCURRENCY = 1;
const MAX_CONCURRENCY = 10;

// ─── Log Line Format ─────────────────────────────────────────────────────────

/**
 * Formats a job log message for the combined log stream: "<jobId>|<message>".
 */
export function formatJobLine(jobId: number, message: string): string {
  return `${jobId}|${message}`;
}

/**
 * Classifies a finished job's log.
 */
export function classifyJobLog(logLines: readonly string[]): JobOutcome {
  return {
    state: logLines.some((line) => line.startsWith(ERROR_MARKER)) ? 'failed' : 'completed',
    usbCopied: logLines.includes(USB_COPY_SUCCESS),
  };
}

/** Log line for an error that ended a job */
export function formatErrorLine(error: unknown): string {
  if (isPipelineError(error)) {
    return `${ERROR_MARKER} ${error.toUserMessage()}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `${ERROR_MARKER} ${message || 'Unknown error'}`;
}

// ─── Orchestrator ────────────────────────────────────────────────────────────

export class JobOrchestrator {
  private readonly runner: JobRunner;
  private readonly concurrency: number;
  private readonly jobTimeoutMs: number;
  private readonly logger: Logger | null;

  private nextJobId = 1;
  private readonly jobs = new Map<number, JobRecord>();
  private readonly queue: number[] = [];
  private readonly running = new Set<number>();
  private readonly stats = new AggregateStats();

  /** Terminal jobs not yet returned by pollCompletions() */
  private unpolled: number[] = [];
  private readonly terminalListeners = new Set<JobTerminalListener>();
  private readonly logListeners = new Set<JobLogListener>();
  private idleWaiters: Array<() => void> = [];

  constructor(options: JobOrchestratorOptions) {
    this.runner = options.runner;
    const rawConcurrency = Math.floor(options.concurrency ?? MIN_CONCURRENCY);
    this.concurrency = Math.max(MIN_CONCURRENCY, Math.min(MAX_CONCURRENCY, rawConcurrency));
    this.jobTimeoutMs = Math.max(0, options.jobTimeoutMs ?? 0);
    this.logger = options.logger ?? null;
  }

  getConcurrency(): number {
    return this.concurrency;
  }

  // ─── Submission ────────────────────────────────────────────────────

  /**
   * Submits a query. The job starts immediately when a slot is free and
   * nothing is waiting, otherwise it goes to the back of the queue.
   *
   * @returns A snapshot of the job right after submission
   */
  submit(rawQuery: string): JobSnapshot {
    const record: JobRecord = {
      id: this.nextJobId++,
      query: parseQuery(rawQuery),
      state: 'queued',
      logLines: [],
      usbCopied: false,
      filePath: null,
      submittedAt: Date.now(),
      startedAt: null,
      finishedAt: null,
      controller: null,
      timer: null,
      abortError: null,
    };
    this.jobs.set(record.id, record);

    if (this.queue.length === 0 && this.running.size < this.concurrency) {
      this.start(record);
    } else {
      this.queue.push(record.id);
      this.logger?.info(`Queued "${rawQuery}" (position ${this.queue.length})`, {
        jobId: record.id,
        step: 'queued',
      });
    }

    return toSnapshot(record);
  }

  /**
   * Cancels a job. A queued job is removed from the queue; a running job has
   * its signal aborted and its slot released.
   *
   * @returns false if the job does not exist or has already finished
   */
  cancel(jobId: number): boolean {
    const record = this.jobs.get(jobId);
    if (!record || record.state === 'completed' || record.state === 'failed') {
      return false;
    }

    const error = new JobCancelledError('Job cancelled', { jobId });
    if (record.state === 'queued') {
      const index = this.queue.indexOf(jobId);
      if (index >= 0) this.queue.splice(index, 1);
      record.abortError = error;
      this.finish(record);
      return true;
    }

    this.abort(record, error);
    return true;
  }

  // ─── Job Lifecycle ─────────────────────────────────────────────────

  private start(record: JobRecord): void {
    const controller = new AbortController();
    record.state = 'running';
    record.startedAt = Date.now();
    record.controller = controller;
    this.running.add(record.id);

    this.logger?.info(`Started "${record.query.rawText}"`, { jobId: record.id, step: 'running' });

    if (this.jobTimeoutMs > 0) {
      record.timer = setTimeout(() => {
        this.abort(record, new JobTimeoutError(this.jobTimeoutMs, { jobId: record.id }));
      }, this.jobTimeoutMs);
    }

    const context: JobContext = {
      jobId: record.id,
      signal: controller.signal,
      emit: (message: string) => this.appendLine(record, message),
    };

    void this.execute(record, context);
  }

  private async execute(record: JobRecord, context: JobContext): Promise<void> {
    try {
      const result = await this.runner.run(record.query, context);
      if (this.isTerminal(record)) return;
      record.filePath = result.filePath;
    } catch (error: unknown) {
      if (this.isTerminal(record)) return;
      this.logger?.logError(error, { jobId: record.id });
      this.appendLine(record, formatErrorLine(error), false);
    }
    this.finish(record);
  }

  /** Stops a running job and finalises it as failed right away */
  private abort(record: JobRecord, error: PipelineError): void {
    if (record.state !== 'running') return;
    record.abortError = error;
    record.controller?.abort(error);
    this.finish(record);
  }

  /**
   * Moves a job to its terminal state. Runs exactly once per job.
   */
  private finish(record: JobRecord): void {
    if (this.isTerminal(record)) return;

    if (record.timer) {
      clearTimeout(record.timer);
      record.timer = null;
    }
    if (record.abortError) {
      this.logger?.logPipelineError(record.abortError);
      this.appendLine(record, formatErrorLine(record.abortError), false);
    }

    const outcome = classifyJobLog(record.logLines);
    record.state = outcome.state;
    record.usbCopied = outcome.usbCopied;
    record.finishedAt = Date.now();
    record.controller = null;
    this.running.delete(record.id);
    this.stats.recordTerminal(outcome);
    this.unpolled.push(record.id);

    this.logger?.info(`Job ${outcome.state}`, { jobId: record.id, step: outcome.state });

    // Queued jobs take the freed slot before listeners can submit more work
    this.startQueued();

    const snapshot = toSnapshot(record);
    for (const listener of [...this.terminalListeners]) {
      try {
        listener(snapshot);
      } catch (error: unknown) {
        this.logger?.logError(error, { jobId: record.id, step: 'notify' });
      }
    }

    this.notifyIfIdle();
  }

  private startQueued(): void {
    while (this.running.size < this.concurrency && this.queue.length > 0) {
      const nextId = this.queue.shift();
      const next = nextId === undefined ? undefined : this.jobs.get(nextId);
      if (next && next.state === 'queued') {
        this.start(next);
      }
    }
  }

  private isTerminal(record: JobRecord): boolean {
    return record.state === 'completed' || record.state === 'failed';
  }

  /**
   * Appends a message to a job's log and forwards it to the log stream.
   * Messages arriving after the job finished are dropped.
   *
   * @param writeToLogger - false when the caller has already logged the error behind the line
   */
  private appendLine(record: JobRecord, message: string, writeToLogger: boolean = true): void {
    if (this.isTerminal(record)) return;

    const line = message.replace(/\r?\n/g, ' ');
    record.logLines.push(line);

    if (writeToLogger) {
      if (line.startsWith(ERROR_MARKER)) {
        this.logger?.error(line, { jobId: record.id });
      } else {
        this.logger?.info(line, { jobId: record.id });
      }
    }

    const streamLine = formatJobLine(record.id, line);
    for (const listener of [...this.logListeners]) {
      try {
        listener(streamLine);
      } catch (error: unknown) {
        this.logger?.logError(error, { jobId: record.id, step: 'notify' });
      }
    }
  }

  // ─── Subscriptions ─────────────────────────────────────────────────

  /**
   * Calls back with each job that reaches a terminal state.
   * @returns An unsubscribe function
   */
  onJobTerminal(listener: JobTerminalListener): () => void {
    this.terminalListeners.add(listener);
    return () => {
      this.terminalListeners.delete(listener);
    };
  }

  /**
   * Calls back with every "<jobId>|<message>" line.
   * @returns An unsubscribe function
   */
  onLogLine(listener: JobLogListener): () => void {
    this.logListeners.add(listener);
    return () => {
      this.logListeners.delete(listener);
    };
  }

  /**
   * Returns the jobs that finished since the last call, in finishing order.
   */
  pollCompletions(): JobSnapshot[] {
    const ids = this.unpolled;
    this.unpolled = [];
    const snapshots: JobSnapshot[] = [];
    for (const id of ids) {
      const record = this.jobs.get(id);
      if (record) snapshots.push(toSnapshot(record));
    }
    return snapshots;
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getStats(): AggregateStatsSnapshot {
    return this.stats.snapshot(this.queue.length, this.running.size);
  }

  getJob(jobId: number): JobSnapshot | null {
    const record = this.jobs.get(jobId);
    return record ? toSnapshot(record) : null;
  }

  /** All jobs in submission order */
  getJobs(): JobSnapshot[] {
    return [...this.jobs.values()].map(toSnapshot);
  }

  isIdle(): boolean {
    return this.queue.length === 0 && this.running.size === 0;
  }

  /**
   * Resolves once nothing is queued or running.
   */
  waitForIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

function toSnapshot(record: JobRecord): JobSnapshot {
  return {
    id: record.id,
    query: { ...record.query },
    state: record.state,
    logLines: [...record.logLines],
    usbCopied: record.usbCopied,
    filePath: record.filePath,
    submittedAt: record.submittedAt,
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
  };
}
