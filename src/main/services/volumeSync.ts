/**
 * Volume Sync Service
 *
 * Copies finished tracks onto a removable volume (USB stick, SD card) under
 * <volumeRoot>/Music/<artist>/, optionally ejecting the volume afterwards.
 *
 * Hardware access goes through the VolumeManager capability so the sync
 * logic can be exercised without real devices. MountedVolumeManager is the
 * default binding: it looks for mounted volumes under the usual mount roots
 * and ejects through udisksctl (Linux) or diskutil (macOS).
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { VolumeSyncError } from './errors';
import { sanitizeArtistDir } from '../utils/fileOrganizer';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Access to removable volumes */
export interface VolumeManager {
  /** Root of the first usable volume, or null when none is mounted */
  detect(): Promise<string | null>;
  /** Copies a file into destDir (created if missing, existing file replaced) */
  copy(filePath: string, destDir: string): Promise<string>;
  /** Ejects a volume; resolves to whether it succeeded */
  eject(volumeRoot: string): Promise<boolean>;
}

export type SyncResult =
  | { status: 'disabled' }
  | { status: 'no-volume' }
  | { status: 'copied'; destination: string; volumeRoot: string; ejected: boolean }
  | { status: 'error'; error: VolumeSyncError };

export interface VolumeSyncOptions {
  /** When false, trySync never touches the manager */
  enabled: boolean;
  /** Eject the volume after each successful copy */
  autoEject?: boolean;
  manager?: VolumeManager;
}

/** Where to look for volumes */
export interface VolumeSearchPath {
  path: string;
  /** 'container' paths hold one directory per mounted volume; 'volume' paths are volumes */
  kind: 'container' | 'volume';
}

/** Runs an external command; rejects on non-zero exit */
export type CommandRunner = (file: string, args: string[]) => Promise<string>;

export interface MountedVolumeManagerOptions {
  /** Mount roots to scan (treated as containers). Defaults to the platform's */
  roots?: string[];
  platform?: NodeJS.Platform;
  userName?: string;
  /** Command runner for eject (for testing) */
  runCommand?: CommandRunner;
}

// ─── Defaults ────────────────────────────────────────────────────────────────

const MUSIC_DIR_NAME = 'Music';

/**
 * Platform mount roots:
 * - Linux: /media/<user>, /run/media/<user>
 * - macOS: /Volumes
 * - Windows: drive letters D: to Z:
 */
export function getDefaultVolumeSearchPaths(
  platform: NodeJS.Platform = process.platform,
  userName: string = os.userInfo().username,
): VolumeSearchPath[] {
  if (platform === 'win32') {
    const paths: VolumeSearchPath[] = [];
    for (let code = 'D'.charCodeAt(0); code <= 'Z'.charCodeAt(0); code++) {
      paths.push({ path: `${String.fromCharCode(code)}:\\`, kind: 'volume' });
    }
    return paths;
  }
  if (platform === 'darwin') {
    return [{ path: '/Volumes', kind: 'container' }];
  }
  return [
    { path: path.posix.join('/media', userName), kind: 'container' },
    { path: path.posix.join('/run/media', userName), kind: 'container' },
  ];
}

function defaultCommandRunner(file: string, args: string[]): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    execFile(file, args, { encoding: 'utf8', timeout: 30000 }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });
}

// ─── Mounted Volume Manager ──────────────────────────────────────────────────

/**
 * VolumeManager over the host's mounted file systems.
 */
export class MountedVolumeManager implements VolumeManager {
  private readonly searchPaths: VolumeSearchPath[];
  private readonly platform: NodeJS.Platform;
  private readonly runCommand: CommandRunner;

  constructor(options: MountedVolumeManagerOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.searchPaths =
      options.roots && options.roots.length > 0
        ? options.roots.map((root): VolumeSearchPath => ({ path: root, kind: 'container' }))
        : getDefaultVolumeSearchPaths(this.platform, options.userName);
    this.runCommand = options.runCommand ?? defaultCommandRunner;
  }

  getSearchPaths(): VolumeSearchPath[] {
    return [...this.searchPaths];
  }

  /**
   * Returns the first accessible, non-empty volume. Entries of a container are
   * checked in name order; symlinks (such as macOS's link to the boot disk)
   * are skipped.
   */
  async detect(): Promise<string | null> {
    for (const searchPath of this.searchPaths) {
      if (searchPath.kind === 'volume') {
        if (await isUsableVolume(searchPath.path)) return searchPath.path;
        continue;
      }

      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(searchPath.path, { withFileTypes: true });
      } catch {
        continue;
      }

      const names = entries
        .filter((entry) => entry.isDirectory() && !entry.isSymbolicLink())
        .map((entry) => entry.name)
        .sort();

      for (const name of names) {
        const volumeRoot = path.join(searchPath.path, name);
        if (await isUsableVolume(volumeRoot)) return volumeRoot;
      }
    }
    return null;
  }

  async copy(filePath: string, destDir: string): Promise<string> {
    const destination = path.join(destDir, path.basename(filePath));
    await fs.promises.mkdir(destDir, { recursive: true });
    await fs.promises.copyFile(filePath, destination);
    const stat = await fs.promises.stat(filePath);
    await fs.promises.utimes(destination, stat.atime, stat.mtime);
    return destination;
  }

  /**
   * Ejects through udisksctl (Linux, after resolving the block device with
   * findmnt) or diskutil (macOS). Not supported on Windows.
   */
  async eject(volumeRoot: string): Promise<boolean> {
    try {
      if (this.platform === 'darwin') {
        await this.runCommand('diskutil', ['eject', volumeRoot]);
        return true;
      }
      if (this.platform === 'linux') {
        const device = (await this.runCommand('findmnt', ['-n', '-o', 'SOURCE', volumeRoot])).trim();
        if (!device) return false;
        await this.runCommand('udisksctl', ['unmount', '-b', device]);
        return true;
      }
      return false;
    } catch {
      return false;
    }
  }
}

/** A directory that exists, can be written to and has at least one entry */
async function isUsableVolume(volumeRoot: string): Promise<boolean> {
  try {
    await fs.promises.access(volumeRoot, fs.constants.W_OK);
    const entries = await fs.promises.readdir(volumeRoot);
    return entries.length > 0;
  } catch {
    return false;
  }
}

// ─── Volume Sync ─────────────────────────────────────────────────────────────

/**
 * Copies tracks onto the detected volume. trySync() never throws.
 */
export class VolumeSync {
  private readonly enabled: boolean;
  private readonly autoEject: boolean;
  private readonly manager: VolumeManager;

  constructor(options: VolumeSyncOptions) {
    this.enabled = options.enabled;
    this.autoEject = options.autoEject ?? false;
    this.manager = options.manager ?? new MountedVolumeManager();
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Copies filePath to <volumeRoot>/Music/<artist>/<fileName>.
   */
  async trySync(filePath: string, artist: string, jobId?: number): Promise<SyncResult> {
    if (!this.enabled) {
      return { status: 'disabled' };
    }

    try {
      const volumeRoot = await this.manager.detect();
      if (volumeRoot === null) {
        return { status: 'no-volume' };
      }

      const destDir = path.join(volumeRoot, MUSIC_DIR_NAME, sanitizeArtistDir(artist));
      const destination = await this.manager.copy(filePath, destDir);
      const ejected = this.autoEject ? await this.manager.eject(volumeRoot) : false;

      return { status: 'copied', destination, volumeRoot, ejected };
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return {
        status: 'error',
        error: new VolumeSyncError(`Volume copy failed: ${cause.message}`, { jobId, cause }),
      };
    }
  }
}
