/**
 * Logger Service for tunedrop
 *
 * Structured logging with daily log files, levels and PipelineError
 * integration. Entries carry the job they belong to, so one job's history
 * can be pulled back out of an interleaved log.
 *
 * Levels: ERROR (job failures), WARN (recovered problems), INFO (progress)
 *
 * Default log directory: %APPDATA%/tunedrop/logs/ (or ~/.config/tunedrop/logs/)
 * One file per local day: YYYY-MM-DD.log, rotated to YYYY-MM-DD.N.log when full
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PipelineError, isPipelineError, ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Most severe first */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

export interface LogEntry {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  message: string;
  category: ErrorCategory | null;
  jobId: number | null;
  /** Pipeline step the entry was written from */
  step: string | null;
  /** Message of the underlying error, when one was wrapped */
  cause: string | null;
}

/** Optional fields for a log call */
export interface LogContext {
  category?: ErrorCategory;
  jobId?: number;
  step?: string;
  cause?: string;
}

export interface LoggerOptions {
  /** Defaults to %APPDATA%/tunedrop/logs/ */
  logDir?: string;
  /** Least severe level recorded. Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Append entries to the daily file. Defaults to true */
  writeToFile?: boolean;
  /** Rotate the daily file once it reaches this many bytes. Defaults to 10MB */
  maxFileSize?: number;
  /** Entries kept in memory. Defaults to 5000 */
  maxEntries?: number;
  /** Clock override for tests */
  getCurrentDate?: () => Date;
}

/** Counts over the in-memory entries */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  /** ERROR entries per category */
  errorsByCategory: Record<string, number>;
  /** Jobs with at least one ERROR entry, ascending */
  failedJobIds: number[];
  /** null when file logging is off */
  logFilePath: string | null;
}

export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
  jobId?: number;
  /** Keep only the most recent N matches */
  limit?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'tunedrop';
const LOG_DIR_NAME = 'logs';
const LOG_EXTENSION = '.log';
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;
const DEFAULT_MAX_ENTRIES = 5000;

/** Index is severity rank: lower is more severe */
const LEVELS: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO'];

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory:
 * %APPDATA%/tunedrop/logs on Windows, ~/.config/tunedrop/logs elsewhere.
 */
export function getDefaultLogDir(): string {
  const configRoot = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(configRoot, APP_DIR_NAME, LOG_DIR_NAME);
}

/** Daily log file name for a local date */
export function getLogFileName(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}${LOG_EXTENSION}`;
}

/**
 * Formats an entry as one line:
 * [TIMESTAMP] LEVEL [CATEGORY] message | job: N | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const head = entry.category
    ? `[${entry.timestamp}] ${entry.level} [${entry.category}] ${entry.message}`
    : `[${entry.timestamp}] ${entry.level} ${entry.message}`;

  const fields: Array<[string, string | number | null]> = [
    ['job', entry.jobId],
    ['step', entry.step],
    ['cause', entry.cause],
  ];
  return fields.reduce(
    (line, [name, value]) => (value === null || value === '' ? line : `${line} | ${name}: ${value}`),
    head,
  );
}

/** True when level is at least as severe as minLevel */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVELS.indexOf(level) <= LEVELS.indexOf(minLevel);
}

/**
 * Creates a LogEntry from a plain message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  getCurrentDate: () => Date = () => new Date(),
): LogEntry {
  return {
    timestamp: getCurrentDate().toISOString(),
    level,
    message,
    category: context?.category ?? null,
    jobId: context?.jobId ?? null,
    step: context?.step ?? null,
    cause: context?.cause ?? null,
  };
}

/**
 * Creates a LogEntry carrying a PipelineError's category, job, step and cause.
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  return createLogEntry(
    level,
    error.message,
    {
      category: error.category,
      jobId: error.jobId ?? undefined,
      step: error.step,
      cause: error.cause?.message,
    },
    getCurrentDate,
  );
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Session logger. Keeps recent entries in memory and appends every entry to
 * the daily file.
 *
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs' });
 * await logger.initialize();
 * logger.info('Searching', { jobId: 3, step: 'searching' });
 * logger.logPipelineError(new DownloadError('yt-dlp exited with code 1', { jobId: 3 }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly maxFileSize: number;
  private readonly maxEntries: number;
  private readonly getCurrentDate: () => Date;

  private entries: LogEntry[] = [];
  /** Turned off when the log directory cannot be created */
  private fileEnabled: boolean;
  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.fileEnabled = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.maxEntries = options?.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Creates the log directory. On failure file logging is switched off and
   * the reason is kept as a WARN entry.
   */
  async initialize(): Promise<void> {
    if (this.fileEnabled) {
      try {
        await fs.promises.mkdir(this.logDir, { recursive: true });
      } catch (error: unknown) {
        this.fileEnabled = false;
        const reason = error instanceof Error ? error.message : String(error);
        this.addEntry(
          createLogEntry(
            'WARN',
            `Failed to create log directory "${this.logDir}": ${reason}. File logging disabled.`,
            undefined,
            this.getCurrentDate,
          ),
        );
      }
    }
    this.initialized = true;
  }

  /** Today's log file */
  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  getLogDir(): string {
    return this.logDir;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  /**
   * Logs a PipelineError. Without an explicit level, recoverable categories
   * (metadata lookup, volume sync) go out as WARN.
   */
  logPipelineError(error: PipelineError, level?: LogLevel): void {
    const effective = level ?? (error.isFatal ? 'ERROR' : 'WARN');
    if (shouldLog(effective, this.minLevel)) {
      this.addEntry(createLogEntryFromError(error, effective, this.getCurrentDate));
    }
  }

  /**
   * Logs anything thrown. PipelineErrors keep their own category and step,
   * taking the job from context when they carry none; other values become
   * an ERROR entry with the given job and step.
   */
  logError(error: unknown, context?: { jobId?: number; step?: string }): void {
    if (isPipelineError(error)) {
      const level = error.isFatal ? 'ERROR' : 'WARN';
      if (shouldLog(level, this.minLevel)) {
        const entry = createLogEntryFromError(error, level, this.getCurrentDate);
        this.addEntry({ ...entry, jobId: entry.jobId ?? context?.jobId ?? null });
      }
      return;
    }

    if (error instanceof Error) {
      this.error(error.message, {
        ...context,
        cause: error.cause instanceof Error ? error.cause.message : undefined,
      });
    } else {
      this.error(String(error), context);
    }
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (shouldLog(level, this.minLevel)) {
      this.addEntry(createLogEntry(level, message, context, this.getCurrentDate));
    }
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) {
      this.entries.splice(0, overflow);
    }
    if (this.fileEnabled && this.initialized) {
      this.appendToFile(formatLogEntry(entry));
    }
  }

  // ─── File Output ───────────────────────────────────────────────────

  /**
   * Appends one line to today's file, rotating it first once it is full.
   * Write errors are dropped so that logging never fails a job.
   */
  private appendToFile(line: string): void {
    const filePath = this.getLogFilePath();
    try {
      const stats = fs.statSync(filePath, { throwIfNoEntry: false });
      if (stats && stats.size >= this.maxFileSize) {
        fs.renameSync(filePath, this.nextRotationPath(filePath));
      }
      fs.appendFileSync(filePath, `${line}\n`, 'utf-8');
    } catch {
      // File output is best effort; the entry is still in memory
    }
  }

  /** 2026-01-15.log → first free 2026-01-15.N.log */
  private nextRotationPath(filePath: string): string {
    const stem = filePath.slice(0, -LOG_EXTENSION.length);
    let index = 1;
    while (fs.existsSync(`${stem}.${index}${LOG_EXTENSION}`)) {
      index++;
    }
    return `${stem}.${index}${LOG_EXTENSION}`;
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  /** In-memory entries in logging order, optionally filtered */
  getEntries(filter: LogFilter = {}): LogEntry[] {
    const matches = this.entries.filter(
      (entry) =>
        (filter.level === undefined || entry.level === filter.level) &&
        (filter.category === undefined || entry.category === filter.category) &&
        (filter.jobId === undefined || entry.jobId === filter.jobId),
    );
    return filter.limit && filter.limit > 0 ? matches.slice(-filter.limit) : matches;
  }

  getErrors(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'ERROR', limit });
  }

  getWarnings(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'WARN', limit });
  }

  getSummary(): LogSummary {
    const counts: Record<LogLevel, number> = { ERROR: 0, WARN: 0, INFO: 0 };
    const errorsByCategory: Record<string, number> = {};
    const failedJobs = new Set<number>();

    for (const entry of this.entries) {
      counts[entry.level]++;
      if (entry.level !== 'ERROR') continue;
      if (entry.category) {
        errorsByCategory[entry.category] = (errorsByCategory[entry.category] ?? 0) + 1;
      }
      if (entry.jobId !== null) {
        failedJobs.add(entry.jobId);
      }
    }

    return {
      totalEntries: this.entries.length,
      errorCount: counts.ERROR,
      warnCount: counts.WARN,
      infoCount: counts.INFO,
      errorsByCategory,
      failedJobIds: [...failedJobs].sort((a, b) => a - b),
      logFilePath: this.fileEnabled ? this.getLogFilePath() : null,
    };
  }

  get size(): number {
    return this.entries.length;
  }

  /** Drops the in-memory entries; files are kept */
  clear(): void {
    this.entries = [];
  }
}
