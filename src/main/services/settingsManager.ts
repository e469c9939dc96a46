/**
 * Settings Manager Service for tunedrop
 *
 * Loads and saves AppSettings as JSON in the per-user config directory
 * (%APPDATA%/tunedrop on Windows, ~/.config/tunedrop elsewhere, or
 * $TUNEDROP_CONFIG_DIR when set). Every value read from disk goes through
 * validateSettings: unknown keys are dropped, out-of-range numbers clamped,
 * and a corrupt file means defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { AppSettings, DEFAULT_SETTINGS } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface SettingsManagerOptions {
  /** Directory holding the settings file. Defaults to getDefaultSettingsDir() */
  settingsDir?: string;
  /** Defaults to 'settings.json' */
  fileName?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'tunedrop';
const DEFAULT_SETTINGS_FILENAME = 'settings.json';
const CONFIG_DIR_ENV = 'TUNEDROP_CONFIG_DIR';

const MAX_CONCURRENCY = 10;
const MAX_SEARCH_LIMIT = 50;
/** One day */
const MAX_JOB_TIMEOUT_SECONDS = 24 * 60 * 60;

/** Bitrate ("192K") or VBR level ("0"-"10") */
const AUDIO_QUALITY_PATTERN = /^(?:\d{2,3}[Kk]|10|\d)$/;

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Config directory: $TUNEDROP_CONFIG_DIR, else %APPDATA%/tunedrop on
 * Windows and ~/.config/tunedrop elsewhere.
 */
export function getDefaultSettingsDir(): string {
  const override = process.env[CONFIG_DIR_ENV]?.trim();
  if (override) return path.resolve(override);
  return path.join(process.env.APPDATA || path.join(os.homedir(), '.config'), APP_DIR_NAME);
}

/** Login name of the current user, or "user" when the OS can't tell */
export function getCurrentUserName(): string {
  try {
    return os.userInfo().username || 'user';
  } catch {
    return process.env.USER || process.env.USERNAME || 'user';
  }
}

/**
 * DEFAULT_SETTINGS with the per-machine fields filled in:
 * musicRoot = ~/Music/Downloaded, userName = current login name.
 */
export function getDefaultSettings(): AppSettings {
  return {
    ...DEFAULT_SETTINGS,
    volumeRoots: [...DEFAULT_SETTINGS.volumeRoots],
    musicRoot: path.join(os.homedir(), 'Music', 'Downloaded'),
    userName: getCurrentUserName(),
  };
}

/** Rounds and clamps a number into [min, max]; null for non-numbers */
function clampInteger(value: unknown, min: number, max: number): number | null {
  if (typeof value !== 'number' || isNaN(value)) return null;
  return Math.max(min, Math.min(max, Math.round(value)));
}

function nonEmptyString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Clamps to 1-10; non-numbers give the default */
export function validateConcurrency(value: unknown): number {
  return clampInteger(value, 1, MAX_CONCURRENCY) ?? DEFAULT_SETTINGS.concurrency;
}

/**
 * Validates an audio quality value: a bitrate such as "192K" or a VBR level 0-10.
 */
export function validateAudioQuality(value: unknown): boolean {
  return typeof value === 'string' && AUDIO_QUALITY_PATTERN.test(value.trim());
}

/**
 * Builds a complete AppSettings from untrusted input: every field that is
 * missing or invalid takes its default.
 */
export function validateSettings(partial: unknown): AppSettings {
  const validated = getDefaultSettings();
  if (partial === null || typeof partial !== 'object' || Array.isArray(partial)) {
    return validated;
  }

  const raw: Record<string, unknown> = Object.fromEntries(Object.entries(partial));

  const musicRoot = nonEmptyString(raw.musicRoot);
  if (musicRoot) {
    validated.musicRoot = musicRoot;
  }

  // userName becomes a directory name: no path separators
  const userName = nonEmptyString(raw.userName)?.replace(/[/\\]/g, '').trim();
  if (userName) {
    validated.userName = userName;
  }

  if (raw.concurrency !== undefined) {
    validated.concurrency = validateConcurrency(raw.concurrency);
  }

  const jobTimeoutSeconds = clampInteger(raw.jobTimeoutSeconds, 0, MAX_JOB_TIMEOUT_SECONDS);
  if (jobTimeoutSeconds !== null) {
    validated.jobTimeoutSeconds = jobTimeoutSeconds;
  }

  const searchLimit = clampInteger(raw.searchLimit, 1, MAX_SEARCH_LIMIT);
  if (searchLimit !== null) {
    validated.searchLimit = searchLimit;
  }

  if (validateAudioQuality(raw.audioQuality) && typeof raw.audioQuality === 'string') {
    validated.audioQuality = raw.audioQuality.trim().toUpperCase();
  }

  if (typeof raw.embedThumbnail === 'boolean') {
    validated.embedThumbnail = raw.embedThumbnail;
  }

  if (typeof raw.contentFilterEnabled === 'boolean') {
    validated.contentFilterEnabled = raw.contentFilterEnabled;
  }

  if (typeof raw.fetchMetadata === 'boolean') {
    validated.fetchMetadata = raw.fetchMetadata;
  }

  if (typeof raw.usePersistentCache === 'boolean') {
    validated.usePersistentCache = raw.usePersistentCache;
  }

  if (typeof raw.usbSyncEnabled === 'boolean') {
    validated.usbSyncEnabled = raw.usbSyncEnabled;
  }

  if (typeof raw.autoEject === 'boolean') {
    validated.autoEject = raw.autoEject;
  }

  // volumeRoots: string[] (non-string and blank entries dropped)
  if (Array.isArray(raw.volumeRoots)) {
    const roots: string[] = [];
    for (const entry of raw.volumeRoots) {
      const root = nonEmptyString(entry);
      if (root) roots.push(root);
    }
    validated.volumeRoots = roots;
  }

  const ytDlpPath = nonEmptyString(raw.ytDlpPath);
  if (ytDlpPath) {
    validated.ytDlpPath = ytDlpPath;
  }

  // workDir: string | null (blank means the OS temp dir)
  if (raw.workDir === null || typeof raw.workDir === 'string') {
    validated.workDir = nonEmptyString(raw.workDir);
  }

  const userAgent = nonEmptyString(raw.musicBrainzUserAgent);
  if (userAgent) {
    validated.musicBrainzUserAgent = userAgent;
  }

  return validated;
}

/** Pretty-printed JSON, as written to settings.json */
export function serializeSettings(settings: AppSettings): string {
  return JSON.stringify(settings, null, 2);
}

/**
 * Parses a settings file. Returns null unless the JSON is an object.
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(json);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch {
    return null;
  }
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Holds the current settings and keeps settings.json in step with them.
 *
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize();
 * await manager.save({ concurrency: 3, usbSyncEnabled: false });
 * ```
 */
export class SettingsManager {
  private readonly filePath: string;
  private settings: AppSettings = getDefaultSettings();

  constructor(options: SettingsManagerOptions = {}) {
    this.filePath = path.join(
      options.settingsDir ?? getDefaultSettingsDir(),
      options.fileName ?? DEFAULT_SETTINGS_FILENAME,
    );
  }

  /**
   * Reads settings.json. A missing, unreadable or corrupt file leaves the
   * defaults in place; nothing is written until the first save.
   */
  async initialize(): Promise<void> {
    let content: string | null = null;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch {
      // First run: no file yet
    }

    const parsed = content === null ? null : deserializeSettings(content);
    this.settings = parsed ? validateSettings(parsed) : getDefaultSettings();
  }

  get(): AppSettings {
    return cloneSettings(this.settings);
  }

  /**
   * Applies a partial update and persists it.
   * @returns The settings after validation
   */
  async save(updates: Partial<AppSettings>): Promise<AppSettings> {
    this.settings = validateSettings({ ...this.settings, ...updates });
    await this.persist();
    return cloneSettings(this.settings);
  }

  getFilePath(): string {
    return this.filePath;
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  /** Writes to a temp file and renames it over settings.json */
  private async persist(): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tempPath, serializeSettings(this.settings), 'utf-8');
      await fs.promises.rename(tempPath, this.filePath);
    } catch {
      // Unwritable config dir: settings stay in memory for this run
      await fs.promises.rm(tempPath, { force: true }).catch(() => undefined);
    }
  }
}

function cloneSettings(settings: AppSettings): AppSettings {
  return { ...settings, volumeRoots: [...settings.volumeRoots] };
}
