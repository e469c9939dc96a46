/**
 * Custom Error Classes for tunedrop
 *
 * Provides categorized error types for each pipeline step,
 * enabling structured error handling, logging, and job classification.
 */

/**
 * Error categories matching the pipeline steps.
 */
export type ErrorCategory =
  | 'NoSearchResults'
  | 'NoSuitableMatch'
  | 'DownloadFailed'
  | 'ArtifactMissingAfterDownload'
  | 'MetadataLookupFailed'
  | 'TagWriteFailed'
  | 'OrganizeFailed'
  | 'VolumeSyncFailed'
  | 'JobTimeout'
  | 'JobCancelled';

/** Context accepted by every PipelineError constructor */
export interface PipelineErrorOptions {
  jobId?: number;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all tunedrop errors.
 * Extends the native Error class with additional context fields.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** The job running when the error occurred (if applicable) */
  readonly jobId: number | null;
  /** The pipeline step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  readonly cause: Error | null;
  /** Timestamp when the error was created */
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: PipelineErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.jobId = options?.jobId ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    // Ensure prototype chain works correctly
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Whether the error ends the job it occurred in.
   * Metadata and volume-sync failures are recovered inside their components.
   */
  get isFatal(): boolean {
    return this.category !== 'MetadataLookupFailed' && this.category !== 'VolumeSyncFailed';
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    jobId: number | null;
    step: string;
    timestamp: string;
    stack: string | undefined;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      jobId: this.jobId,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * Returns a user-facing message (no stack traces).
   */
  toUserMessage(): string {
    return `${this.category}: ${this.message}`;
  }
}

/**
 * The search provider returned no candidates.
 */
export class NoSearchResultsError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'NoSearchResults', { step: 'searching', ...options });
  }
}

/**
 * Every candidate scored below zero.
 */
export class NoSuitableMatchError extends PipelineError {
  /** Highest score seen, or null when there were no candidates */
  readonly bestScore: number | null;

  constructor(message: string, options?: PipelineErrorOptions & { bestScore?: number }) {
    super(message, 'NoSuitableMatch', { step: 'scoring', ...options });
    this.bestScore = options?.bestScore ?? null;
  }
}

/**
 * The download executor exited non-zero or produced no output.
 */
export class DownloadError extends PipelineError {
  /** Process exit code (if applicable) */
  readonly exitCode: number | null;

  constructor(message: string, options?: PipelineErrorOptions & { exitCode?: number }) {
    super(message, 'DownloadFailed', { step: 'downloading', ...options });
    this.exitCode = options?.exitCode ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & { exitCode: number | null } {
    return { ...super.toLogObject(), exitCode: this.exitCode };
  }
}

/**
 * The download reported success but the artifact is not on disk.
 */
export class ArtifactMissingError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ArtifactMissingAfterDownload', { step: 'downloading', ...options });
  }
}

/**
 * A MusicBrainz lookup failed. Never fatal: the resolver recovers with fallback metadata.
 */
export class MetadataLookupError extends PipelineError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;

  constructor(message: string, options?: PipelineErrorOptions & { statusCode?: number }) {
    super(message, 'MetadataLookupFailed', { step: 'resolving_metadata', ...options });
    this.statusCode = options?.statusCode ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & { statusCode: number | null } {
    return { ...super.toLogObject(), statusCode: this.statusCode };
  }
}

/**
 * Writing or verifying tags failed.
 */
export class TagWriteError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'TagWriteFailed', { step: 'writing_tags', ...options });
  }
}

/**
 * Moving the artifact into the library failed.
 */
export class OrganizeError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'OrganizeFailed', { step: 'organizing', ...options });
  }
}

/**
 * Copying onto a removable volume failed. Never fatal: logged only.
 */
export class VolumeSyncError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'VolumeSyncFailed', { step: 'syncing', ...options });
  }
}

/**
 * The job ran longer than the configured timeout.
 */
export class JobTimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: PipelineErrorOptions) {
    super(`Job exceeded timeout of ${timeoutMs}ms`, 'JobTimeout', { step: 'running', ...options });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The job was cancelled by the user.
 */
export class JobCancelledError extends PipelineError {
  constructor(message: string = 'Job cancelled', options?: PipelineErrorOptions) {
    super(message, 'JobCancelled', { step: 'running', ...options });
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Wraps a generic error in the appropriate PipelineError category.
 * If the error is already a PipelineError, it is returned as-is.
 *
 * @param error - The error to wrap
 * @param category - The error category to use
 * @param options - Additional context
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  options?: { jobId?: number; step?: string },
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'NoSearchResults':
      return new NoSearchResultsError(message, { ...options, cause });
    case 'NoSuitableMatch':
      return new NoSuitableMatchError(message, { ...options, cause });
    case 'DownloadFailed':
      return new DownloadError(message, { ...options, cause });
    case 'ArtifactMissingAfterDownload':
      return new ArtifactMissingError(message, { ...options, cause });
    case 'MetadataLookupFailed':
      return new MetadataLookupError(message, { ...options, cause });
    case 'TagWriteFailed':
      return new TagWriteError(message, { ...options, cause });
    case 'OrganizeFailed':
      return new OrganizeError(message, { ...options, cause });
    case 'VolumeSyncFailed':
      return new VolumeSyncError(message, { ...options, cause });
    case 'JobTimeout':
      return new PipelineError(message, 'JobTimeout', { ...options, cause });
    case 'JobCancelled':
      return new JobCancelledError(message, { ...options, cause });
  }
}
