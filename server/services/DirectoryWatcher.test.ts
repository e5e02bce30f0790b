import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DirectoryWatcher } from './DirectoryWatcher.js';
import type { WatchEvent } from '../types/index.js';

const OPTIONS = {
  debounceMs: 20,
  stabilityThresholdMs: 50,
  pollIntervalMs: 10,
  retry: { initialDelayMs: 50, maxDelayMs: 200 },
  quiet: true,
};

describe('DirectoryWatcher', () => {
  let tmpDir: string;
  let watcher: DirectoryWatcher;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asset-watcher-test-'));
    watcher = new DirectoryWatcher(OPTIONS);
  });

  afterEach(async () => {
    await watcher.stop();
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('creates a missing directory on registration', async () => {
    const directory = path.join(tmpDir, 'images');

    expect(await watcher.register('images', directory, ['*.png'], async () => {})).toBe(true);
    expect(fs.existsSync(directory)).toBe(true);
    expect(watcher.isActive()).toBe(true);
    expect(watcher.isWatching('images')).toBe(true);
  });

  it('refuses duplicate names', async () => {
    await watcher.register('images', tmpDir, ['*.png'], async () => {});

    await expect(watcher.register('images', tmpDir, ['*.png'], async () => {})).rejects.toThrow('already registered');
  });

  it('unregisters a single directory', async () => {
    await watcher.register('images', path.join(tmpDir, 'images'), ['*.png'], async () => {});
    await watcher.register('models', path.join(tmpDir, '3d'), ['*.glb'], async () => {});

    expect(await watcher.unregister('images')).toBe(true);
    expect(await watcher.unregister('images')).toBe(false);
    expect(watcher.getRegisteredNames()).toEqual(['models']);
    expect(watcher.isActive()).toBe(true);

    await watcher.unregisterAll();
    expect(watcher.isActive()).toBe(false);
    expect(watcher.getRegisteredNames()).toEqual([]);
  });

  it('reports matching files written after registration', async () => {
    const received: WatchEvent[] = [];
    let resolveEvent: () => void = () => {};
    const delivered = new Promise<void>(resolve => {
      resolveEvent = resolve;
    });

    await watcher.register('images', tmpDir, ['*.png'], async event => {
      received.push(event);
      resolveEvent();
    });

    fs.writeFileSync(path.join(tmpDir, 'notes.txt'), 'ignored');
    fs.writeFileSync(path.join(tmpDir, 'a.png'), 'png');
    await delivered;

    expect(received).toEqual([{ type: 'add', path: path.join(tmpDir, 'a.png') }]);
  });

  it('retries a failed registration with doubling delays', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    // A regular file where a parent directory should be makes mkdir fail
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, '');
    const directory = path.join(blocker, 'images');

    expect(await watcher.register('images', directory, ['*.png'], async () => {})).toBe(false);
    expect(watcher.isWatching('images')).toBe(false);

    await vi.waitFor(() => expect(error).toHaveBeenCalledTimes(2), { timeout: 2000, interval: 10 });
    expect(error.mock.calls[0][0]).toBe('[DirectoryWatcher] Watcher "images" failed, retrying in 50ms:');
    expect(error.mock.calls[1][0]).toBe('[DirectoryWatcher] Watcher "images" failed, retrying in 100ms:');

    fs.rmSync(blocker);
    await vi.waitFor(() => expect(watcher.isWatching('images')).toBe(true), { timeout: 2000, interval: 10 });
    expect(fs.existsSync(directory)).toBe(true);
  });
});
