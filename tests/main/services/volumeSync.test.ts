import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
  CommandRunner,
  MountedVolumeManager,
  VolumeManager,
  VolumeSync,
  getDefaultVolumeSearchPaths,
} from '../../../src/main/services/volumeSync';
import { VolumeSyncError } from '../../../src/main/services/errors';

/** In-process VolumeManager that records every call */
function createFakeManager(volumeRoot: string | null): {
  manager: VolumeManager;
  detect: Mock<VolumeManager['detect']>;
  copy: Mock<VolumeManager['copy']>;
  eject: Mock<VolumeManager['eject']>;
} {
  const detect = vi.fn<VolumeManager['detect']>(() => Promise.resolve(volumeRoot));
  const copy = vi.fn<VolumeManager['copy']>((filePath, destDir) =>
    Promise.resolve(path.join(destDir, path.basename(filePath))),
  );
  const eject = vi.fn<VolumeManager['eject']>(() => Promise.resolve(true));
  return { manager: { detect, copy, eject }, detect, copy, eject };
}

describe('volumeSync', () => {
  // ─── VolumeSync ───────────────────────────────────────────────────────

  describe('VolumeSync', () => {
    it('should not probe hardware when disabled', async () => {
      const fake = createFakeManager('/media/usb');
      const sync = new VolumeSync({ enabled: false, manager: fake.manager });

      await expect(sync.trySync('/music/song.mp3', 'Queen')).resolves.toEqual({ status: 'disabled' });
      expect(sync.isEnabled()).toBe(false);
      expect(fake.detect).not.toHaveBeenCalled();
      expect(fake.copy).not.toHaveBeenCalled();
    });

    it('should report when no volume is mounted', async () => {
      const fake = createFakeManager(null);
      const sync = new VolumeSync({ enabled: true, manager: fake.manager });

      await expect(sync.trySync('/music/song.mp3', 'Queen')).resolves.toEqual({ status: 'no-volume' });
      expect(fake.copy).not.toHaveBeenCalled();
    });

    it('should copy into Music/<artist> on the volume', async () => {
      const fake = createFakeManager('/media/usb');
      const sync = new VolumeSync({ enabled: true, manager: fake.manager });

      const result = await sync.trySync('/music/Back_in_Black.mp3', 'AC/DC');

      expect(fake.copy).toHaveBeenCalledWith('/music/Back_in_Black.mp3', path.join('/media/usb', 'Music', 'ACDC'));
      expect(result).toEqual({
        status: 'copied',
        destination: path.join('/media/usb', 'Music', 'ACDC', 'Back_in_Black.mp3'),
        volumeRoot: '/media/usb',
        ejected: false,
      });
      expect(fake.eject).not.toHaveBeenCalled();
    });

    it('should eject after copying when configured', async () => {
      const fake = createFakeManager('/media/usb');
      const sync = new VolumeSync({ enabled: true, autoEject: true, manager: fake.manager });

      const result = await sync.trySync('/music/a.mp3', 'Queen');

      expect(fake.eject).toHaveBeenCalledWith('/media/usb');
      expect(result).toHaveProperty('ejected', true);
    });

    it('should turn copy failures into a VolumeSyncError result', async () => {
      const fake = createFakeManager('/media/usb');
      fake.copy.mockImplementationOnce(() => Promise.reject(new Error('disk full')));
      const sync = new VolumeSync({ enabled: true, manager: fake.manager });

      const result = await sync.trySync('/music/a.mp3', 'Queen', 4);

      expect(result.status).toBe('error');
      if (result.status === 'error') {
        expect(result.error).toBeInstanceOf(VolumeSyncError);
        expect(result.error.message).toBe('Volume copy failed: disk full');
        expect(result.error.jobId).toBe(4);
        expect(result.error.isFatal).toBe(false);
      }
    });
  });

  // ─── Default Search Paths ─────────────────────────────────────────────

  describe('getDefaultVolumeSearchPaths', () => {
    it('should list drive letters D to Z on Windows', () => {
      const paths = getDefaultVolumeSearchPaths('win32', 'alice');
      expect(paths).toHaveLength(23);
      expect(paths[0]).toEqual({ path: 'D:\\', kind: 'volume' });
      expect(paths[22]).toEqual({ path: 'Z:\\', kind: 'volume' });
    });

    it('should use /Volumes on macOS', () => {
      expect(getDefaultVolumeSearchPaths('darwin', 'alice')).toEqual([{ path: '/Volumes', kind: 'container' }]);
    });

    it('should use the per-user media roots on Linux', () => {
      expect(getDefaultVolumeSearchPaths('linux', 'alice')).toEqual([
        { path: '/media/alice', kind: 'container' },
        { path: '/run/media/alice', kind: 'container' },
      ]);
    });
  });

  // ─── MountedVolumeManager ─────────────────────────────────────────────

  describe('MountedVolumeManager', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tunedrop-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should use configured roots as containers', () => {
      const manager = new MountedVolumeManager({ roots: ['/mnt/a'] });
      expect(manager.getSearchPaths()).toEqual([{ path: '/mnt/a', kind: 'container' }]);
    });

    it('should detect the first non-empty volume in name order', async () => {
      const mountRoot = path.join(tempDir, 'media');
      fs.mkdirSync(path.join(mountRoot, 'a-empty'), { recursive: true });
      fs.mkdirSync(path.join(mountRoot, 'c-stick'), { recursive: true });
      fs.writeFileSync(path.join(mountRoot, 'c-stick', 'readme.txt'), 'x');
      fs.mkdirSync(path.join(mountRoot, 'b-card'), { recursive: true });
      fs.writeFileSync(path.join(mountRoot, 'b-card', 'photo.jpg'), 'x');
      fs.writeFileSync(path.join(mountRoot, 'not-a-dir'), 'x');

      const manager = new MountedVolumeManager({ roots: [path.join(tempDir, 'missing'), mountRoot] });

      await expect(manager.detect()).resolves.toBe(path.join(mountRoot, 'b-card'));
    });

    it('should return null when nothing is mounted', async () => {
      const manager = new MountedVolumeManager({ roots: [path.join(tempDir, 'missing')] });
      await expect(manager.detect()).resolves.toBeNull();
    });

    it('should copy a file and keep its modification time', async () => {
      const source = path.join(tempDir, 'song.mp3');
      fs.writeFileSync(source, 'audio');
      const mtime = new Date('2020-01-02T03:04:05Z');
      fs.utimesSync(source, mtime, mtime);
      const manager = new MountedVolumeManager({ roots: [tempDir] });

      const destination = await manager.copy(source, path.join(tempDir, 'usb', 'Music', 'Queen'));

      expect(destination).toBe(path.join(tempDir, 'usb', 'Music', 'Queen', 'song.mp3'));
      expect(fs.readFileSync(destination, 'utf-8')).toBe('audio');
      expect(fs.statSync(destination).mtime.getTime()).toBe(mtime.getTime());
    });

    it('should eject on Linux through findmnt and udisksctl', async () => {
      const runCommand = vi.fn<CommandRunner>((file) => Promise.resolve(file === 'findmnt' ? '/dev/sdb1\n' : ''));
      const manager = new MountedVolumeManager({ roots: [tempDir], platform: 'linux', runCommand });

      await expect(manager.eject('/media/alice/STICK')).resolves.toBe(true);
      expect(runCommand).toHaveBeenNthCalledWith(1, 'findmnt', ['-n', '-o', 'SOURCE', '/media/alice/STICK']);
      expect(runCommand).toHaveBeenNthCalledWith(2, 'udisksctl', ['unmount', '-b', '/dev/sdb1']);
    });

    it('should eject on macOS through diskutil', async () => {
      const runCommand = vi.fn<CommandRunner>(() => Promise.resolve(''));
      const manager = new MountedVolumeManager({ roots: [tempDir], platform: 'darwin', runCommand });

      await expect(manager.eject('/Volumes/STICK')).resolves.toBe(true);
      expect(runCommand).toHaveBeenCalledWith('diskutil', ['eject', '/Volumes/STICK']);
    });

    it('should report eject failures as false', async () => {
      const runCommand = vi.fn<CommandRunner>(() => Promise.reject(new Error('busy')));
      const linux = new MountedVolumeManager({ roots: [tempDir], platform: 'linux', runCommand });
      const windows = new MountedVolumeManager({ roots: [tempDir], platform: 'win32', runCommand });

      await expect(linux.eject('/media/alice/STICK')).resolves.toBe(false);
      await expect(windows.eject('E:\\')).resolves.toBe(false);
    });
  });
});
