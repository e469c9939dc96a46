/**
 * yt-dlp process runner.
 *
 * Runs the yt-dlp binary through child_process.execFile and reports failures
 * with enough detail (exit code, stderr, missing binary, abort) for the
 * search and download adapters to classify them.
 */

import { execFile } from 'child_process';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface YtDlpRunOptions {
  /** Aborts the process (the child is killed) */
  signal?: AbortSignal;
  /** Kill the process after this many ms (0 = no limit) */
  timeoutMs?: number;
  /** Maximum stdout/stderr size in bytes */
  maxBuffer?: number;
}

export interface YtDlpOutput {
  stdout: string;
  stderr: string;
}

/** Runs yt-dlp with the given arguments */
export type YtDlpRunner = (args: string[], options?: YtDlpRunOptions) => Promise<YtDlpOutput>;

// ─── Constants ───────────────────────────────────────────────────────────────

/** Search dumps can be large: one JSON document per result */
const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

// ─── Errors ──────────────────────────────────────────────────────────────────

/**
 * A yt-dlp invocation that did not exit cleanly.
 */
export class YtDlpProcessError extends Error {
  /** Exit code, or null when the process never ran or was killed */
  readonly exitCode: number | null;
  readonly stderr: string;
  /** The binary could not be found */
  readonly notFound: boolean;
  /** The process was stopped through the abort signal */
  readonly aborted: boolean;

  constructor(
    message: string,
    details: { exitCode?: number | null; stderr?: string; notFound?: boolean; aborted?: boolean },
  ) {
    super(message);
    this.name = 'YtDlpProcessError';
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? '';
    this.notFound = details.notFound ?? false;
    this.aborted = details.aborted ?? false;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ─── Runner ──────────────────────────────────────────────────────────────────

/**
 * Last non-empty stderr line, which is where yt-dlp puts "ERROR: ..." messages.
 */
export function lastErrorLine(stderr: string): string {
  const lines = stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1] ?? '';
}

/** The `code` of a child-process error: a number for exit codes, a string for spawn errors */
function errorCode(error: Error): string | number | null {
  if (!('code' in error)) return null;
  const { code } = error;
  return typeof code === 'string' || typeof code === 'number' ? code : null;
}

/**
 * Creates a runner bound to a yt-dlp binary path.
 *
 * @param binaryPath - Path or command name of the yt-dlp executable
 */
export function createYtDlpRunner(binaryPath: string = 'yt-dlp'): YtDlpRunner {
  return (args: string[], options: YtDlpRunOptions = {}): Promise<YtDlpOutput> =>
    new Promise<YtDlpOutput>((resolve, reject) => {
      if (options.signal?.aborted) {
        reject(new YtDlpProcessError('yt-dlp was aborted before it started', { aborted: true }));
        return;
      }

      execFile(
        binaryPath,
        args,
        {
          signal: options.signal,
          timeout: options.timeoutMs ?? 0,
          maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
          encoding: 'utf8',
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr });
            return;
          }

          const code = errorCode(error);
          if (code === 'ENOENT') {
            reject(
              new YtDlpProcessError(`yt-dlp not found at "${binaryPath}"`, { notFound: true }),
            );
            return;
          }

          if (error.name === 'AbortError' || options.signal?.aborted) {
            reject(new YtDlpProcessError('yt-dlp was aborted', { aborted: true, stderr }));
            return;
          }

          const exitCode = typeof code === 'number' ? code : null;
          const detail = lastErrorLine(stderr) || error.message;
          reject(
            new YtDlpProcessError(
              exitCode !== null ? `yt-dlp exited with code ${exitCode}: ${detail}` : detail,
              { exitCode, stderr },
            ),
          );
        },
      );
    });
}
