import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createYtDlpRunner, lastErrorLine, YtDlpProcessError } from '../../../src/main/services/ytDlp';

// ─── Mocks ───────────────────────────────────────────────────────────────────

type ExecFileCallback = (error: Error | null, stdout: string, stderr: string) => void;

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn<(file: string, args: string[], options: unknown, callback: ExecFileCallback) => void>(),
}));

vi.mock('child_process', () => ({ execFile: mockExecFile }));

/** Makes the next execFile call finish with the given result */
function mockExecResult(error: Error | null, stdout: string, stderr: string): void {
  mockExecFile.mockImplementationOnce((_file, _args, _options, callback) => {
    callback(error, stdout, stderr);
  });
}

describe('ytDlp', () => {
  beforeEach(() => {
    mockExecFile.mockReset();
  });

  describe('lastErrorLine', () => {
    it('should return the last non-empty line', () => {
      expect(lastErrorLine('WARNING: slow\r\nERROR: Video unavailable\n\n')).toBe('ERROR: Video unavailable');
    });

    it('should return an empty string for empty stderr', () => {
      expect(lastErrorLine('')).toBe('');
    });
  });

  describe('createYtDlpRunner', () => {
    it('should resolve with stdout and stderr', async () => {
      mockExecResult(null, '{"id":"a"}\n', '');
      const run = createYtDlpRunner('/opt/yt-dlp');

      await expect(run(['--version'])).resolves.toEqual({ stdout: '{"id":"a"}\n', stderr: '' });
      expect(mockExecFile).toHaveBeenCalledWith(
        '/opt/yt-dlp',
        ['--version'],
        expect.objectContaining({ timeout: 0, maxBuffer: 64 * 1024 * 1024, encoding: 'utf8' }),
        expect.any(Function),
      );
    });

    it('should report a missing binary', async () => {
      mockExecResult(Object.assign(new Error('spawn yt-dlp ENOENT'), { code: 'ENOENT' }), '', '');
      const run = createYtDlpRunner();

      const error: unknown = await run(['x']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(YtDlpProcessError);
      expect(error).toHaveProperty('notFound', true);
      expect(error).toHaveProperty('message', 'yt-dlp not found at "yt-dlp"');
    });

    it('should report the exit code and last stderr line', async () => {
      mockExecResult(
        Object.assign(new Error('Command failed'), { code: 1 }),
        '',
        'WARNING: slow\nERROR: Video unavailable\n',
      );
      const run = createYtDlpRunner();

      const error: unknown = await run(['x']).catch((e: unknown) => e);

      expect(error).toHaveProperty('exitCode', 1);
      expect(error).toHaveProperty('message', 'yt-dlp exited with code 1: ERROR: Video unavailable');
      expect(error).toHaveProperty('aborted', false);
    });

    it('should use the error message when stderr is empty', async () => {
      mockExecResult(new Error('stdout maxBuffer length exceeded'), '', '');
      const run = createYtDlpRunner();

      await expect(run(['x'])).rejects.toThrow('stdout maxBuffer length exceeded');
    });

    it('should report an abort', async () => {
      const abortError = new Error('The operation was aborted');
      abortError.name = 'AbortError';
      mockExecResult(abortError, '', '');
      const run = createYtDlpRunner();

      const error: unknown = await run(['x']).catch((e: unknown) => e);

      expect(error).toHaveProperty('aborted', true);
    });

    it('should not start when the signal already fired', async () => {
      const controller = new AbortController();
      controller.abort();
      const run = createYtDlpRunner();

      const error: unknown = await run(['x'], { signal: controller.signal }).catch((e: unknown) => e);

      expect(error).toHaveProperty('aborted', true);
      expect(mockExecFile).not.toHaveBeenCalled();
    });
  });
});
