import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ZodError } from 'zod';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) {
      fs.rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = null;
    }
  });

  it('applies defaults and resolves directories against the root', () => {
    const config = loadConfig({ env: {} });

    expect(config.rootDir).toBe(path.resolve('output'));
    expect(config.statePath).toBe(path.resolve('.asset-engine', 'state.db'));
    expect(config.directories.map(d => [d.name, d.path, d.kind])).toEqual([
      ['images', path.resolve('output', 'images'), 'image'],
      ['models', path.resolve('output', '3d'), 'model'],
      ['textured', path.resolve('output', '3d', 'textured'), 'textured-model'],
    ]);
    expect(config.views.map(v => v.name)).toEqual([
      'session-images',
      'all-images',
      'session-models',
      'all-models',
      'textured-models',
    ]);
    expect(config.dispatcher.capacity).toBe(256);
    expect(config.watcher).toEqual({
      debounceMs: 300,
      stabilityThresholdMs: 500,
      pollIntervalMs: 100,
      retry: { initialDelayMs: 1000, maxDelayMs: 30000 },
    });
    expect(config.associations.autoLinkWindowMs).toBe(30 * 60 * 1000);
    expect(config.previews).toEqual({ totalQuota: 50, sessionQuota: 30 });
    expect(config.quiet).toBe(false);
  });

  it('reads environment overrides', () => {
    const config = loadConfig({
      env: { ASSET_ENGINE_ROOT: '/srv/output', ASSET_ENGINE_STATE: ':memory:', ASSET_ENGINE_QUIET: '1' },
    });

    expect(config.rootDir).toBe(path.resolve('/srv/output'));
    expect(config.statePath).toBe(':memory:');
    expect(config.quiet).toBe(true);
    expect(config.directories[0].path).toBe(path.resolve('/srv/output', 'images'));
  });

  it('layers file, environment and explicit overrides in that order', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asset-engine-config-'));
    const file = path.join(tmpDir, 'engine.json');
    fs.writeFileSync(file, JSON.stringify({ rootDir: '/from/file', quiet: true, dispatcher: { capacity: 8 } }));

    const config = loadConfig({
      file,
      env: { ASSET_ENGINE_ROOT: '/from/env' },
      overrides: { quiet: false },
    });

    expect(config.dispatcher.capacity).toBe(8);
    expect(config.rootDir).toBe(path.resolve('/from/env'));
    expect(config.quiet).toBe(false);
  });

  it('finds the config file through the environment', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asset-engine-config-'));
    const file = path.join(tmpDir, 'engine.json');
    fs.writeFileSync(file, JSON.stringify({ previews: { totalQuota: 4, sessionQuota: 2 } }));

    const config = loadConfig({ env: { ASSET_ENGINE_CONFIG: file } });
    expect(config.previews).toEqual({ totalQuota: 4, sessionQuota: 2 });
  });

  it('rejects a session quota above the total quota', () => {
    expect(() => loadConfig({ env: {}, overrides: { previews: { totalQuota: 2, sessionQuota: 3 } } })).toThrow(ZodError);
  });

  it('rejects views over unknown directories', () => {
    expect(() =>
      loadConfig({ env: {}, overrides: { views: [{ name: 'broken', directory: 'nowhere', scope: 'all' }] } })
    ).toThrow(ZodError);
  });

  it('rejects a config file that is not an object', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asset-engine-config-'));
    const file = path.join(tmpDir, 'engine.json');
    fs.writeFileSync(file, '[1, 2]');

    expect(() => loadConfig({ file, env: {} })).toThrow('must contain a JSON object');
  });
});
