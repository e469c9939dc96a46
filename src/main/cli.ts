/**
 * Command-line front end.
 *
 * Parses arguments, loads settings, submits every query to the orchestrator
 * and prints the "<jobId>|<message>" stream followed by a summary. The exit
 * code is 1 when any job failed. With --save the command-line options are
 * written to settings.json first.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AppSettings } from '../shared/types';
import { JobOrchestrator, JobRunner } from './services/jobOrchestrator';
import { TrackPipeline } from './services/jobPipeline';
import { Logger } from './services/logger';
import { SettingsManager, validateSettings } from './services/settingsManager';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Settings the command line can override for one run */
export interface CliOverrides {
  concurrency?: number;
  jobTimeoutSeconds?: number;
  usbSyncEnabled?: boolean;
  fetchMetadata?: boolean;
  contentFilterEnabled?: boolean;
  embedThumbnail?: boolean;
  musicRoot?: string;
}

export interface CliConfig {
  queries: string[];
  queryFile: string | null;
  overrides: CliOverrides;
  /** Store the overrides in settings.json */
  save: boolean;
  help: boolean;
}

export type ParseResult = { ok: true; config: CliConfig } | { ok: false; error: string };

/** A runner the CLI can shut down when the run is over */
export interface ClosableRunner extends JobRunner {
  close?(): void;
}

/** Injection points for tests */
export interface CliDependencies {
  /** Writes one line to stdout */
  out?: (line: string) => void;
  /** Writes one line to stderr */
  err?: (line: string) => void;
  settingsManager?: SettingsManager;
  logger?: Logger;
  createRunner?: (settings: AppSettings, logger: Logger) => ClosableRunner;
}

// ─── Argument Parsing ────────────────────────────────────────────────────────

function parsePositiveInteger(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return Number.parseInt(value, 10);
}

/**
 * Parses CLI arguments (without the node and script entries).
 * Each positional argument is one query.
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  const config: CliConfig = { queries: [], queryFile: null, overrides: {}, save: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        config.help = true;
        break;
      case '--file':
      case '-f': {
        const next = argv[i + 1];
        if (next === undefined) return { ok: false, error: `${arg} requires a path` };
        config.queryFile = next;
        i += 1;
        break;
      }
      case '--concurrency':
      case '-c': {
        const parsed = parsePositiveInteger(argv[i + 1]);
        if (parsed === null || parsed < 1) {
          return { ok: false, error: `${arg} requires a positive integer` };
        }
        config.overrides.concurrency = parsed;
        i += 1;
        break;
      }
      case '--timeout': {
        const parsed = parsePositiveInteger(argv[i + 1]);
        if (parsed === null) {
          return { ok: false, error: '--timeout requires a number of seconds' };
        }
        config.overrides.jobTimeoutSeconds = parsed;
        i += 1;
        break;
      }
      case '--music-root': {
        const next = argv[i + 1];
        if (next === undefined) return { ok: false, error: '--music-root requires a directory' };
        config.overrides.musicRoot = next;
        i += 1;
        break;
      }
      case '--no-usb':
        config.overrides.usbSyncEnabled = false;
        break;
      case '--no-metadata':
        config.overrides.fetchMetadata = false;
        break;
      case '--no-filter':
        config.overrides.contentFilterEnabled = false;
        break;
      case '--no-thumbnail':
        config.overrides.embedThumbnail = false;
        break;
      case '--save':
        config.save = true;
        break;
      default: {
        if (arg.startsWith('-') && arg.length > 1) {
          return { ok: false, error: `Unknown option: ${arg}` };
        }
        const query = arg.trim();
        if (query) config.queries.push(query);
        break;
      }
    }
  }

  return { ok: true, config };
}

/**
 * Help text, one entry per line.
 */
export function formatHelp(): string[] {
  return [
    'tunedrop - download, tag and file songs from free-text queries',
    '',
    'Usage:',
    '  tunedrop [options] "Artist - Title" ["Artist - Title" ...]',
    '  tunedrop --file songs.txt',
    '',
    'Options:',
    '  -f, --file <path>        Read queries from a file (one per line, # for comments)',
    '  -c, --concurrency <n>    Maximum parallel jobs (1-10)',
    '      --timeout <seconds>  Per-job timeout (0 = none)',
    '      --music-root <dir>   Library root directory',
    '      --no-usb             Do not copy tracks to a removable volume',
    '      --no-metadata        Skip the MusicBrainz lookup',
    '      --no-filter          Keep profane results and names',
    '      --no-thumbnail       Do not embed the video thumbnail as cover art',
    '      --save               Store these options in settings.json',
    '  -h, --help               Show this help message',
    '',
    'Environment:',
    '  TUNEDROP_CONFIG_DIR      Directory holding settings.json',
  ];
}

/**
 * Reads queries from a list file: one per line, blank lines and lines
 * starting with '#' skipped.
 */
export async function readQueryFile(filePath: string): Promise<string[]> {
  const raw = await fs.promises.readFile(filePath, 'utf-8');
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/** Applies command-line overrides on top of saved settings */
export function applyOverrides(settings: AppSettings, overrides: CliOverrides): AppSettings {
  return validateSettings({ ...settings, ...overrides });
}

// ─── Run ─────────────────────────────────────────────────────────────────────

/**
 * Runs the CLI.
 *
 * @returns The process exit code: 0 when every job completed, 1 when any
 *          failed, 2 for usage errors
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.out ?? ((line: string): void => console.log(line));
  const err = deps.err ?? ((line: string): void => console.error(line));

  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    err(`Error: ${parsed.error}`);
    formatHelp().forEach((line) => err(line));
    return 2;
  }

  const { config } = parsed;
  if (config.help) {
    formatHelp().forEach((line) => out(line));
    return 0;
  }

  const queries = [...config.queries];
  if (config.queryFile) {
    const filePath = path.resolve(process.cwd(), config.queryFile);
    try {
      queries.push(...(await readQueryFile(filePath)));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      err(`Error: cannot read query file "${filePath}": ${message}`);
      return 2;
    }
  }

  if (queries.length === 0 && !config.save) {
    err('Error: no queries given');
    formatHelp().forEach((line) => err(line));
    return 2;
  }

  const settingsManager = deps.settingsManager ?? new SettingsManager();
  await settingsManager.initialize();
  if (config.save) {
    await settingsManager.save(config.overrides);
    out(`Saved settings to ${settingsManager.getFilePath()}`);
    if (queries.length === 0) return 0;
  }
  const settings = applyOverrides(settingsManager.get(), config.overrides);

  const logger = deps.logger ?? new Logger();
  await logger.initialize();

  const runner = deps.createRunner
    ? deps.createRunner(settings, logger)
    : new TrackPipeline({ settings, logger });

  const orchestrator = new JobOrchestrator({
    runner,
    concurrency: settings.concurrency,
    jobTimeoutMs: settings.jobTimeoutSeconds * 1000,
    logger,
  });
  const unsubscribe = orchestrator.onLogLine(out);

  try {
    logger.info(`Submitting ${queries.length} queries (concurrency ${orchestrator.getConcurrency()})`);
    for (const query of queries) {
      orchestrator.submit(query);
    }
    await orchestrator.waitForIdle();
  } finally {
    unsubscribe();
    runner.close?.();
  }

  const stats = orchestrator.getStats();
  out(
    `Done: ${stats.completed} completed, ${stats.failed} failed, ${stats.usbCopied} copied to removable volume`,
  );
  for (const job of orchestrator.getJobs()) {
    if (job.state === 'completed' && job.filePath) {
      out(`  ${job.query.rawText} -> ${job.filePath}`);
    } else if (job.state === 'failed') {
      const reason = job.logLines.filter((line) => line.startsWith('Error:')).pop() ?? 'Error';
      out(`  ${job.query.rawText} -> ${reason}`);
    }
  }

  const { failedJobIds, logFilePath } = logger.getSummary();
  if (failedJobIds.length > 0 && logFilePath) {
    out(`Details for job(s) ${failedJobIds.join(', ')} in ${logFilePath}`);
  }

  return stats.failed > 0 ? 1 : 0;
}
