/**
 * Tests for the command-line front end
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  parseArgs,
  formatHelp,
  readQueryFile,
  applyOverrides,
  runCli,
  ClosableRunner,
  CliDependencies,
} from '../../src/main/cli';
import { JobContext, JobRunResult } from '../../src/main/services/jobOrchestrator';
import { NoSearchResultsError } from '../../src/main/services/errors';
import { Logger, getLogFileName } from '../../src/main/services/logger';
import { SettingsManager, getDefaultSettings } from '../../src/main/services/settingsManager';
import { AppSettings, SearchQuery, USB_COPY_SUCCESS } from '../../src/shared/types';

// ─── Test Helpers ────────────────────────────────────────────────────────

/** Succeeds unless the query mentions "missing"; copies to a volume when it mentions "usb" */
class FakeRunner implements ClosableRunner {
  readonly close = vi.fn<() => void>();

  async run(query: SearchQuery, context: JobContext): Promise<JobRunResult> {
    context.emit(`Searching for ${query.rawText}`);
    if (query.rawText.includes('missing')) {
      throw new NoSearchResultsError(`No results for "${query.rawText}"`);
    }
    if (query.rawText.includes('usb')) {
      context.emit(USB_COPY_SUCCESS);
    }
    return { filePath: `/library/${query.rawText}.mp3` };
  }
}

describe('cli', () => {
  describe('parseArgs', () => {
    it('should collect positional queries', () => {
      expect(parseArgs(['Avicii - Levels', '  ', ' Daft Punk - Around the World '])).toEqual({
        ok: true,
        config: {
          queries: ['Avicii - Levels', 'Daft Punk - Around the World'],
          queryFile: null,
          overrides: {},
          save: false,
          help: false,
        },
      });
    });

    it('should parse every option', () => {
      const result = parseArgs([
        '-f',
        'songs.txt',
        '-c',
        '4',
        '--timeout',
        '300',
        '--music-root',
        '/srv/music',
        '--no-usb',
        '--no-metadata',
        '--no-filter',
        '--no-thumbnail',
        '--save',
        '--help',
      ]);
      expect(result).toEqual({
        ok: true,
        config: {
          queries: [],
          queryFile: 'songs.txt',
          overrides: {
            concurrency: 4,
            jobTimeoutSeconds: 300,
            musicRoot: '/srv/music',
            usbSyncEnabled: false,
            fetchMetadata: false,
            contentFilterEnabled: false,
            embedThumbnail: false,
          },
          save: true,
          help: true,
        },
      });
    });

    it('should reject bad option values', () => {
      expect(parseArgs(['--file'])).toEqual({ ok: false, error: '--file requires a path' });
      expect(parseArgs(['-c', '0'])).toEqual({ ok: false, error: '-c requires a positive integer' });
      expect(parseArgs(['--concurrency', 'two'])).toEqual({
        ok: false,
        error: '--concurrency requires a positive integer',
      });
      expect(parseArgs(['--timeout', '-5'])).toEqual({
        ok: false,
        error: '--timeout requires a number of seconds',
      });
      expect(parseArgs(['--music-root'])).toEqual({ ok: false, error: '--music-root requires a directory' });
    });

    it('should reject unknown options', () => {
      expect(parseArgs(['--verbose'])).toEqual({ ok: false, error: 'Unknown option: --verbose' });
    });

    it('should treat a lone dash as a query', () => {
      const result = parseArgs(['-']);
      expect(result.ok && result.config.queries).toEqual(['-']);
    });
  });

  describe('formatHelp', () => {
    it('should start with the program summary', () => {
      const lines = formatHelp();
      expect(lines[0]).toBe('tunedrop - download, tag and file songs from free-text queries');
      expect(lines).toContain('      --no-usb             Do not copy tracks to a removable volume');
    });
  });

  describe('applyOverrides', () => {
    it('should validate the merged settings', () => {
      const settings = applyOverrides(getDefaultSettings(), { concurrency: 40, usbSyncEnabled: false });
      expect(settings.concurrency).toBe(10);
      expect(settings.usbSyncEnabled).toBe(false);
    });
  });

  // ─── File-backed Tests ────────────────────────────────────────────────

  describe('with a temp directory', () => {
    let tempDir: string;
    let out: string[];
    let err: string[];

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tunedrop-test-'));
      out = [];
      err = [];
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    function deps(runner: ClosableRunner, seen?: AppSettings[]): CliDependencies {
      return {
        out: (line) => out.push(line),
        err: (line) => err.push(line),
        settingsManager: new SettingsManager({ settingsDir: path.join(tempDir, 'settings') }),
        logger: new Logger({ writeToFile: false }),
        createRunner: (settings) => {
          seen?.push(settings);
          return runner;
        },
      };
    }

    describe('readQueryFile', () => {
      it('should skip blank and comment lines', async () => {
        const filePath = path.join(tempDir, 'songs.txt');
        fs.writeFileSync(filePath, '# party\r\nAvicii - Levels\n\n   \n  Daft Punk - One More Time  \n#done\n');
        await expect(readQueryFile(filePath)).resolves.toEqual([
          'Avicii - Levels',
          'Daft Punk - One More Time',
        ]);
      });
    });

    describe('runCli', () => {
      it('should print help and exit 0', async () => {
        const runner = new FakeRunner();
        await expect(runCli(['--help'], deps(runner))).resolves.toBe(0);
        expect(out).toEqual(formatHelp());
        expect(err).toEqual([]);
      });

      it('should exit 2 on a usage error', async () => {
        const runner = new FakeRunner();
        await expect(runCli(['--bogus'], deps(runner))).resolves.toBe(2);
        expect(err[0]).toBe('Error: Unknown option: --bogus');
        expect(err.slice(1)).toEqual(formatHelp());
        expect(out).toEqual([]);
      });

      it('should exit 2 without queries', async () => {
        await expect(runCli([], deps(new FakeRunner()))).resolves.toBe(2);
        expect(err[0]).toBe('Error: no queries given');
      });

      it('should exit 2 when the query file cannot be read', async () => {
        const missing = path.join(tempDir, 'nope.txt');
        await expect(runCli(['-f', missing], deps(new FakeRunner()))).resolves.toBe(2);
        expect(err).toHaveLength(1);
        expect(err[0].startsWith(`Error: cannot read query file "${missing}": ENOENT`)).toBe(true);
      });

      it('should run every query and exit 0 when all complete', async () => {
        const runner = new FakeRunner();
        const code = await runCli(['Avicii - Levels', 'Daft Punk - usb mix'], deps(runner));

        expect(code).toBe(0);
        expect(out).toEqual([
          '1|Searching for Avicii - Levels',
          '2|Searching for Daft Punk - usb mix',
          '2|USB_COPY_SUCCESS',
          'Done: 2 completed, 0 failed, 1 copied to removable volume',
          '  Avicii - Levels -> /library/Avicii - Levels.mp3',
          '  Daft Punk - usb mix -> /library/Daft Punk - usb mix.mp3',
        ]);
        expect(runner.close).toHaveBeenCalledTimes(1);
      });

      it('should exit 1 when a job fails', async () => {
        const code = await runCli(['Avicii - Levels', 'missing song'], deps(new FakeRunner()));

        expect(code).toBe(1);
        expect(out).toEqual([
          '1|Searching for Avicii - Levels',
          '2|Searching for missing song',
          '2|Error: NoSearchResults: No results for "missing song"',
          'Done: 1 completed, 1 failed, 0 copied to removable volume',
          '  Avicii - Levels -> /library/Avicii - Levels.mp3',
          '  missing song -> Error: NoSearchResults: No results for "missing song"',
        ]);
      });

      it('should point at the log file when jobs fail', async () => {
        const logDir = path.join(tempDir, 'logs');
        const fixedDate = new Date('2025-02-17T14:30:00.000Z');
        const logger = new Logger({ logDir, getCurrentDate: () => fixedDate });

        const code = await runCli(['missing one', 'Avicii - Levels', 'missing two'], {
          ...deps(new FakeRunner()),
          logger,
        });

        expect(code).toBe(1);
        expect(out[out.length - 1]).toBe(
          `Details for job(s) 1, 3 in ${path.join(logDir, getLogFileName(fixedDate))}`,
        );
      });

      it('should save options without running anything', async () => {
        const runner = new FakeRunner();
        const settingsPath = path.join(tempDir, 'settings', 'settings.json');

        const code = await runCli(['--save', '-c', '3', '--no-filter'], deps(runner));

        expect(code).toBe(0);
        expect(out).toEqual([`Saved settings to ${settingsPath}`]);
        expect(JSON.parse(fs.readFileSync(settingsPath, 'utf-8'))).toMatchObject({
          concurrency: 3,
          contentFilterEnabled: false,
        });
        expect(runner.close).not.toHaveBeenCalled();
      });

      it('should run with saved options on the next call', async () => {
        const seen: AppSettings[] = [];
        await runCli(['--save', '--no-thumbnail'], deps(new FakeRunner()));
        out = [];

        const code = await runCli(['Avicii - Levels'], deps(new FakeRunner(), seen));

        expect(code).toBe(0);
        expect(seen[0]).toMatchObject({ embedThumbnail: false, contentFilterEnabled: true });
        expect(out[0]).toBe('1|Searching for Avicii - Levels');
      });

      it('should combine file queries and apply overrides', async () => {
        const filePath = path.join(tempDir, 'songs.txt');
        fs.writeFileSync(filePath, 'Queen - Bohemian Rhapsody\n');
        const seen: AppSettings[] = [];

        const code = await runCli(
          ['Avicii - Levels', '-f', filePath, '-c', '3', '--no-usb', '--music-root', tempDir],
          deps(new FakeRunner(), seen),
        );

        expect(code).toBe(0);
        expect(seen).toHaveLength(1);
        expect(seen[0]).toMatchObject({ concurrency: 3, usbSyncEnabled: false, musicRoot: tempDir });
        expect(out[out.length - 3]).toBe('Done: 2 completed, 0 failed, 0 copied to removable volume');
        expect(out.slice(-2)).toEqual([
          '  Avicii - Levels -> /library/Avicii - Levels.mp3',
          '  Queen - Bohemian Rhapsody -> /library/Queen - Bohemian Rhapsody.mp3',
        ]);
      });
    });
  });
});
