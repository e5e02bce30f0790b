/**
 * End-to-end tests for the engine against a temp output directory
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { AssetEngine } from './AssetEngine.js';
import { DirectoryWatcher } from './DirectoryWatcher.js';
import { loadConfig } from '../config/index.js';
import { StateDatabase } from '../db/database.js';
import { NotFoundError, OutOfOrderResetError } from '../types/errors.js';
import type { Asset, UnifiedObject } from '../types/index.js';

// Seconds since epoch, as fs.utimesSync takes them
const SESSION_START_S = 1_700_000_000;
const SESSION_START = SESSION_START_S * 1000;

describe('AssetEngine', () => {
  let tmpDir: string;
  let database: StateDatabase;
  let engine: AssetEngine;

  function writeAsset(relativePath: string, mtimeSeconds: number, content = 'data'): string {
    const fullPath = path.join(tmpDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
    fs.utimesSync(fullPath, mtimeSeconds, mtimeSeconds);
    return fullPath;
  }

  function createEngine(): AssetEngine {
    const config = loadConfig({ env: {}, overrides: { rootDir: tmpDir, statePath: ':memory:', quiet: true } });
    return new AssetEngine(config, { database, watcher: null, sessionStart: SESSION_START });
  }

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asset-engine-test-'));
    database = new StateDatabase(':memory:');
    engine = createEngine();
    await engine.start();
  });

  afterEach(async () => {
    await engine.stop();
    database.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('carries a selected image through model generation and texturing', async () => {
    const discovered: Array<[Asset, boolean]> = [];
    const selections: UnifiedObject[][] = [];
    engine.subscribe({
      onAssetDiscovered: (asset, isSessionScoped) => discovered.push([asset, isSessionScoped]),
      onSelectionChanged: objects => selections.push([...objects]),
    });

    const image = writeAsset('images/a.png', SESSION_START_S + 100);
    const imageOutcome = await engine.discover(image);
    expect(imageOutcome?.isSessionAsset).toBe(true);
    expect(discovered).toEqual([[{ path: image, kind: 'image', modifiedAt: (SESSION_START_S + 100) * 1000 }, true]]);

    await engine.setSelected(image, true);
    expect(engine.getUnifiedObjects()).toEqual([
      { key: image, stage: 'image-only', image, model: null, textured: null },
    ]);

    const model = writeAsset('3d/a.glb', SESSION_START_S + 200);
    await engine.discover(model);

    expect(engine.getModelForImage(image)).toBe(model);
    expect(engine.isSelected(model)).toBe(true);
    expect(engine.getUnifiedObjects()).toEqual([
      { key: model, stage: 'has-model', image, model, textured: null },
    ]);

    await engine.markTextured(model);

    expect(engine.getUnifiedObjects()).toEqual([
      { key: model, stage: 'textured', image, model, textured: model },
    ]);
    expect(engine.isSelected(image)).toBe(true);
    expect(selections.map(objects => objects.map(o => o.stage))).toEqual([
      ['image-only'],
      ['has-model'],
      ['textured'],
    ]);
    expect(engine.getSelectionSummary()).toEqual({ 'image-only': 0, 'has-model': 0, textured: 1 });
    expect(engine.getForwardPaths()).toEqual([model]);
  });

  it('writes the whole document on every mutation', async () => {
    const image = writeAsset('images/a.png', SESSION_START_S + 100);
    const model = writeAsset('3d/a.glb', SESSION_START_S + 200);
    await engine.discover(image);
    await engine.discover(model);
    await engine.toggle(image);

    expect(database.loadState()).toEqual({
      associations: { [image]: model },
      selection: { [image]: true },
      textured: {},
    });

    await engine.toggle(image);
    expect(database.loadState().selection).toEqual({});
  });

  it('skips empty files until they are written', async () => {
    const image = writeAsset('images/pending.png', SESSION_START_S + 100, '');

    expect(await engine.discover(image)).toBeNull();
    expect(engine.getAsset(image)).toBeUndefined();
  });

  it('classifies files by their configured directory', async () => {
    const textured = writeAsset('3d/textured/textured_robot.glb', SESSION_START_S + 300);
    const model = writeAsset('3d/robot.glb', SESSION_START_S + 200);
    await engine.discover(model);
    const outcome = await engine.discover(textured);

    expect(outcome?.asset.kind).toBe('textured-model');
    expect(engine.associations.getTexturedFor(model)).toBe(textured);
  });

  it('fails fast on unknown paths and keeps running', async () => {
    await expect(engine.toggle(path.join(tmpDir, 'images', 'missing.png'))).rejects.toBeInstanceOf(NotFoundError);

    const image = writeAsset('images/a.png', SESSION_START_S + 100);
    expect(await engine.discover(image)).not.toBeNull();
    expect(await engine.toggle(image)).toBe(true);
  });

  it('removes deleted files and reports dropped associations', async () => {
    const associationChanges: Array<[string, string | null]> = [];
    engine.subscribe({ onAssociationChanged: (image, model) => associationChanges.push([image, model]) });

    const image = writeAsset('images/a.png', SESSION_START_S + 100);
    const model = writeAsset('3d/a.glb', SESSION_START_S + 200);
    await engine.discover(image);
    await engine.discover(model);
    fs.rmSync(model);

    expect(await engine.remove(model)).toBe(true);
    expect(engine.getModelForImage(image)).toBeNull();
    expect(associationChanges).toEqual([
      [image, model],
      [image, null],
    ]);
    expect(database.loadState().associations).toEqual({});
  });

  it('links manually and by heuristic pass', async () => {
    const image = writeAsset('images/castle.png', SESSION_START_S + 100);
    const other = writeAsset('images/tower.png', SESSION_START_S + 100);
    await engine.discover(image);
    await engine.discover(other);
    const model = writeAsset('3d/castle.glb', SESSION_START_S + 150);
    const unrelated = writeAsset('3d/mesh.glb', SESSION_START_S + 150);
    await engine.discover(model);
    await engine.discover(unrelated);

    expect(engine.getModelForImage(image)).toBe(model);
    await engine.unlink(image);
    expect(await engine.autoDetect()).toBe(1);
    expect(engine.getModelForImage(image)).toBe(model);

    await engine.link(other, unrelated);
    expect(engine.getAssociationStats()).toEqual({
      totalAssociations: 2,
      selectedImages: 0,
      selectedModels: 0,
      imagesWithModels: 2,
    });
  });

  it('serves views lazily and rescans session views after a reset', async () => {
    const old = writeAsset('images/old.png', SESSION_START_S - 100);
    const fresh = writeAsset('images/fresh.png', SESSION_START_S + 100);

    expect((await engine.activate('all-images')).map(a => a.path)).toEqual([old, fresh]);
    expect((await engine.activate('session-images')).map(a => a.path)).toEqual([fresh]);
    expect(engine.views.getScanCount('session-images')).toBe(1);

    expect(await engine.resetSession(SESSION_START + 200_000)).toBe(true);
    expect(engine.views.isLoaded('session-images')).toBe(false);
    expect(engine.views.isLoaded('all-images')).toBe(true);

    expect(await engine.activate('session-images')).toEqual([]);
    expect(engine.views.getScanCount('session-images')).toBe(2);
    expect(engine.views.getScanCount('all-images')).toBe(1);
  });

  it('rejects session resets that go backwards', async () => {
    await expect(engine.resetSession(SESSION_START - 1)).rejects.toBeInstanceOf(OutOfOrderResetError);
    expect(engine.getSessionStart()).toBe(SESSION_START);
  });

  it('admits previews up to the configured quotas', () => {
    const first = engine.acquirePreview(true);

    expect(first.granted).toBe(true);
    expect(engine.getPreviewStats()).toEqual({ active: 1, session: 1, historical: 0, totalQuota: 50, sessionQuota: 30 });
    if (first.granted) {
      expect(engine.releasePreview(first.handle)).toBe(true);
    }
    expect(engine.getPreviewStats().active).toBe(0);
  });

  it('lists the files in a directory newest first', async () => {
    writeAsset('images/a.png', SESSION_START_S + 100);
    writeAsset('images/b.png', SESSION_START_S + 200);

    const files = await engine.listExisting('images');
    expect(files.map(f => path.basename(f.path))).toEqual(['b.png', 'a.png']);
    expect(engine.views.isLoaded('all-images')).toBe(false);
    await expect(engine.listExisting('missing')).rejects.toThrow('Unknown directory "missing"');
  });

  it('restores what it can when a persisted path cannot be read', async () => {
    await engine.stop();
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const image = writeAsset('images/a.png', SESSION_START_S + 100);
    // A path below a regular file fails with ENOTDIR
    const unreadable = path.join(image, 'inner.png');
    database.saveState({ associations: {}, selection: { [image]: true, [unreadable]: true }, textured: {} });

    engine = createEngine();
    await engine.start();

    expect(engine.isSelected(image)).toBe(true);
    expect(database.loadState().selection).toEqual({ [image]: true });
  });

  it('restores persisted state for files that still exist', async () => {
    await engine.stop();
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const image = writeAsset('images/b.png', SESSION_START_S + 100);
    const model = writeAsset('3d/other.glb', SESSION_START_S + 200);
    const goneImage = path.join(tmpDir, 'images', 'gone.png');
    const goneModel = path.join(tmpDir, '3d', 'gone.glb');
    database.saveState({
      associations: { [image]: model, [goneImage]: goneModel },
      selection: { [image]: true, [goneImage]: true },
      textured: { [model]: model },
    });

    engine = createEngine();
    await engine.start();

    expect(engine.getModelForImage(image)).toBe(model);
    expect(engine.isSelected(image)).toBe(true);
    expect(engine.getUnifiedObjects()).toEqual([
      { key: model, stage: 'textured', image, model, textured: model },
    ]);
    expect(database.loadState()).toEqual({
      associations: { [image]: model },
      selection: { [image]: true },
      textured: { [model]: model },
    });
  });
});

describe('AssetEngine with a directory watcher', () => {
  let tmpDir: string;
  let database: StateDatabase;
  let engine: AssetEngine;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asset-engine-watch-'));
    database = new StateDatabase(':memory:');
    const config = loadConfig({ env: {}, overrides: { rootDir: tmpDir, statePath: ':memory:', quiet: true } });
    const watcher = new DirectoryWatcher({
      debounceMs: 20,
      stabilityThresholdMs: 50,
      pollIntervalMs: 10,
      retry: { initialDelayMs: 50, maxDelayMs: 200 },
      quiet: true,
    });
    engine = new AssetEngine(config, { database, watcher, sessionStart: SESSION_START });
    await engine.start();
  });

  afterEach(async () => {
    await engine.stop();
    database.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('follows a file from empty placeholder to written to deleted', async () => {
    const removed: string[] = [];
    engine.subscribe({ onAssetRemoved: assetPath => removed.push(assetPath) });
    const image = path.join(tmpDir, 'images', 'a.png');

    fs.writeFileSync(image, '');
    await new Promise(resolve => setTimeout(resolve, 300));
    expect(engine.getAsset(image)).toBeUndefined();

    fs.writeFileSync(image, 'png');
    await vi.waitFor(() => expect(engine.getAsset(image)?.kind).toBe('image'), { timeout: 5000, interval: 20 });

    fs.rmSync(image);
    await vi.waitFor(() => expect(engine.getAsset(image)).toBeUndefined(), { timeout: 5000, interval: 20 });
    expect(removed).toEqual([image]);
  });

  it('links a model written into the watched models directory', async () => {
    const image = path.join(tmpDir, 'images', 'castle.png');
    fs.writeFileSync(image, 'png');
    await vi.waitFor(() => expect(engine.getAsset(image)).toBeDefined(), { timeout: 5000, interval: 20 });

    const model = path.join(tmpDir, '3d', 'castle.glb');
    fs.writeFileSync(model, 'glb');
    await vi.waitFor(() => expect(engine.getModelForImage(image)).toBe(model), { timeout: 5000, interval: 20 });
  });
});
