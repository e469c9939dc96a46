/**
 * Tests for Settings Manager Service
 *
 * Covers validation and clamping, serialization, the SettingsManager
 * lifecycle with file persistence, and change notifications.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  SettingsManager,
  getDefaultSettingsDir,
  getDefaultSettings,
  validateConcurrency,
  validateAudioQuality,
  validateSettings,
  serializeSettings,
  deserializeSettings,
} from '../../../src/main/services/settingsManager';
import { DEFAULT_SETTINGS } from '../../../src/shared/types';

// ─── Helper ──────────────────────────────────────────────────────────────────

/** Creates a unique temporary directory for test isolation */
function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tunedrop-test-'));
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('SettingsManager', () => {
  // ─── getDefaultSettingsDir ─────────────────────────────────────────────

  describe('getDefaultSettingsDir', () => {
    const saved = { APPDATA: process.env.APPDATA, TUNEDROP_CONFIG_DIR: process.env.TUNEDROP_CONFIG_DIR };

    beforeEach(() => {
      delete process.env.APPDATA;
      delete process.env.TUNEDROP_CONFIG_DIR;
    });

    afterEach(() => {
      for (const [key, value] of Object.entries(saved)) {
        if (value === undefined) {
          delete process.env[key];
        } else {
          process.env[key] = value;
        }
      }
    });

    it('uses APPDATA if set', () => {
      process.env.APPDATA = path.join('fake', 'appdata');
      expect(getDefaultSettingsDir()).toBe(path.join('fake', 'appdata', 'tunedrop'));
    });

    it('falls back to homedir/.config if APPDATA is not set', () => {
      expect(getDefaultSettingsDir()).toBe(path.join(os.homedir(), '.config', 'tunedrop'));
    });

    it('prefers TUNEDROP_CONFIG_DIR', () => {
      process.env.APPDATA = path.join('fake', 'appdata');
      process.env.TUNEDROP_CONFIG_DIR = ' /etc/tunedrop ';
      expect(getDefaultSettingsDir()).toBe(path.resolve('/etc/tunedrop'));
    });
  });

  describe('getDefaultSettings', () => {
    it('fills in the library root and user name', () => {
      const settings = getDefaultSettings();
      expect(settings.musicRoot).toBe(path.join(os.homedir(), 'Music', 'Downloaded'));
      expect(settings.userName.length).toBeGreaterThan(0);
      expect(settings.concurrency).toBe(DEFAULT_SETTINGS.concurrency);
    });
  });

  // ─── Validation ────────────────────────────────────────────────────────

  describe('validateConcurrency', () => {
    it('clamps to 1-10 and rounds', () => {
      expect(validateConcurrency(4)).toBe(4);
      expect(validateConcurrency(0)).toBe(1);
      expect(validateConcurrency(-3)).toBe(1);
      expect(validateConcurrency(25)).toBe(10);
      expect(validateConcurrency(2.6)).toBe(3);
    });

    it('returns the default for non-numbers', () => {
      expect(validateConcurrency(NaN)).toBe(1);
      expect(validateConcurrency('4')).toBe(1);
      expect(validateConcurrency(null)).toBe(1);
    });
  });

  describe('validateAudioQuality', () => {
    it('accepts bitrates and VBR levels', () => {
      expect(validateAudioQuality('192K')).toBe(true);
      expect(validateAudioQuality('320k')).toBe(true);
      expect(validateAudioQuality('0')).toBe(true);
      expect(validateAudioQuality('10')).toBe(true);
    });

    it('rejects anything else', () => {
      expect(validateAudioQuality('11')).toBe(false);
      expect(validateAudioQuality('best')).toBe(false);
      expect(validateAudioQuality('')).toBe(false);
      expect(validateAudioQuality(192)).toBe(false);
    });
  });

  describe('validateSettings', () => {
    it('returns defaults for non-object input', () => {
      expect(validateSettings(null)).toEqual(getDefaultSettings());
      expect(validateSettings('text')).toEqual(getDefaultSettings());
      expect(validateSettings([1, 2])).toEqual(getDefaultSettings());
    });

    it('clamps numeric fields', () => {
      const settings = validateSettings({ concurrency: 50, jobTimeoutSeconds: -5, searchLimit: 500 });
      expect(settings.concurrency).toBe(10);
      expect(settings.jobTimeoutSeconds).toBe(0);
      expect(settings.searchLimit).toBe(50);

      expect(validateSettings({ jobTimeoutSeconds: 200000, searchLimit: 0 })).toMatchObject({
        jobTimeoutSeconds: 86400,
        searchLimit: 1,
      });
    });

    it('normalizes strings', () => {
      const settings = validateSettings({
        musicRoot: '  /srv/music  ',
        userName: 'al/ice\\',
        audioQuality: ' 256k ',
        ytDlpPath: '/opt/bin/yt-dlp',
      });
      expect(settings.musicRoot).toBe('/srv/music');
      expect(settings.userName).toBe('alice');
      expect(settings.audioQuality).toBe('256K');
      expect(settings.ytDlpPath).toBe('/opt/bin/yt-dlp');
    });

    it('ignores invalid values', () => {
      const settings = validateSettings({
        musicRoot: '   ',
        audioQuality: 'lossless',
        fetchMetadata: 'yes',
        contentFilterEnabled: 'off',
        ytDlpPath: 42,
      });
      const defaults = getDefaultSettings();
      expect(settings.musicRoot).toBe(defaults.musicRoot);
      expect(settings.audioQuality).toBe('192K');
      expect(settings.fetchMetadata).toBe(true);
      expect(settings.contentFilterEnabled).toBe(true);
      expect(settings.ytDlpPath).toBe('yt-dlp');
    });

    it('keeps booleans', () => {
      const settings = validateSettings({
        fetchMetadata: false,
        usePersistentCache: false,
        usbSyncEnabled: false,
        autoEject: true,
        embedThumbnail: false,
        contentFilterEnabled: false,
      });
      expect(settings).toMatchObject({
        fetchMetadata: false,
        usePersistentCache: false,
        usbSyncEnabled: false,
        autoEject: true,
        embedThumbnail: false,
        contentFilterEnabled: false,
      });
    });

    it('filters volume roots', () => {
      expect(validateSettings({ volumeRoots: ['/media/usb', '', 3, ' /mnt/stick '] }).volumeRoots).toEqual([
        '/media/usb',
        '/mnt/stick',
      ]);
    });

    it('treats a blank work directory as null', () => {
      expect(validateSettings({ workDir: '/tmp/work' }).workDir).toBe('/tmp/work');
      expect(validateSettings({ workDir: '  ' }).workDir).toBeNull();
      expect(validateSettings({ workDir: null }).workDir).toBeNull();
    });
  });

  describe('serializeSettings / deserializeSettings', () => {
    it('reads back what it writes', () => {
      const settings = { ...getDefaultSettings(), concurrency: 3 };
      expect(deserializeSettings(serializeSettings(settings))).toEqual(settings);
    });

    it('returns null for invalid JSON or non-objects', () => {
      expect(deserializeSettings('{not json')).toBeNull();
      expect(deserializeSettings('[1,2]')).toBeNull();
      expect(deserializeSettings('null')).toBeNull();
      expect(deserializeSettings('"text"')).toBeNull();
    });
  });

  // ─── SettingsManager Class ─────────────────────────────────────────────

  describe('class', () => {
    let tempDir: string;
    let manager: SettingsManager;

    beforeEach(() => {
      tempDir = createTempDir();
      manager = new SettingsManager({ settingsDir: tempDir });
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('uses defaults when there is no file', async () => {
      await manager.initialize();
      expect(manager.get()).toEqual(getDefaultSettings());
      expect(manager.getFilePath()).toBe(path.join(tempDir, 'settings.json'));
      expect(fs.existsSync(manager.getFilePath())).toBe(false);
    });

    it('loads and validates the saved file', async () => {
      fs.writeFileSync(
        path.join(tempDir, 'settings.json'),
        JSON.stringify({ concurrency: 99, userName: 'bob', unknownKey: true }),
      );
      await manager.initialize();

      expect(manager.get().concurrency).toBe(10);
      expect(manager.get().userName).toBe('bob');
    });

    it('falls back to defaults for a corrupt file', async () => {
      fs.writeFileSync(path.join(tempDir, 'settings.json'), '{ broken');
      await manager.initialize();
      expect(manager.get()).toEqual(getDefaultSettings());
    });

    it('saves partial updates to disk', async () => {
      await manager.initialize();
      const updated = await manager.save({ concurrency: 4, usbSyncEnabled: false });

      expect(updated.concurrency).toBe(4);
      const onDisk = deserializeSettings(fs.readFileSync(path.join(tempDir, 'settings.json'), 'utf-8'));
      expect(onDisk).toMatchObject({ concurrency: 4, usbSyncEnabled: false });
      expect(fs.readdirSync(tempDir)).toEqual(['settings.json']);

      const reloaded = new SettingsManager({ settingsDir: tempDir });
      await reloaded.initialize();
      expect(reloaded.get().concurrency).toBe(4);
    });

    it('returns copies', async () => {
      await manager.initialize();
      const settings = manager.get();
      settings.volumeRoots.push('/mutated');
      expect(manager.get().volumeRoots).toEqual([]);
    });
  });
});
