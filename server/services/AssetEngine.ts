/**
 * Asset Engine
 * Wires the lifecycle components together and exposes the presentation-facing API.
 * Every state mutation is routed through the dispatcher loop; view scans and
 * preview admission run beside it.
 */

import fs from 'fs';
import path from 'path';
import type {
  Asset,
  AssetKind,
  AssociationStats,
  DiscoveryOutcome,
  EngineListeners,
  PersistedState,
  ResourceHandle,
  ResourcePoolStats,
  ScannedFile,
  SelectionSummary,
  UnifiedObject,
  ViewDefinition,
  WatchEvent,
} from '../types/index.js';
import type { DirectoryConfig, EngineConfig } from '../config/index.js';
import { closeDatabase, getDatabase, type StateDatabase } from '../db/database.js';
import { isInside, kindFromExtension, matchesPatterns } from '../utils/paths.js';
import { AssetTracker } from './AssetTracker.js';
import { AssociationManager } from './AssociationManager.js';
import { FsDirectoryScanner, isNotFound, type DirectoryScanner } from './DirectoryScanner.js';
import { DirectoryWatcher } from './DirectoryWatcher.js';
import { EventDispatcher } from './EventDispatcher.js';
import { LazyViewLoader } from './LazyViewLoader.js';
import { ResourceAdmissionController, type AdmissionResult, type EvictionCallback } from './ResourceAdmissionController.js';
import { SelectionCoordinator } from './SelectionCoordinator.js';
import { SessionClassifier } from './SessionClassifier.js';

export interface AssetEngineDeps {
  scanner?: DirectoryScanner;
  /** Supplied databases are left open on stop */
  database?: StateDatabase;
  /** Pass null to run without filesystem watching */
  watcher?: DirectoryWatcher | null;
  /** Initial session start, defaults to now */
  sessionStart?: number;
  now?: () => number;
}

export class AssetEngine {
  readonly tracker: AssetTracker;
  readonly classifier: SessionClassifier;
  readonly selection: SelectionCoordinator;
  readonly associations: AssociationManager;
  readonly dispatcher: EventDispatcher;
  readonly views: LazyViewLoader;
  readonly previews: ResourceAdmissionController;

  private readonly scanner: DirectoryScanner;
  private readonly database: StateDatabase;
  private readonly ownsDatabase: boolean;
  private readonly watcher: DirectoryWatcher | null;
  private readonly now: () => number;
  private readonly listeners: Set<Partial<EngineListeners>> = new Set();
  private started = false;
  private persistSuspended = false;

  constructor(private readonly config: EngineConfig, deps: AssetEngineDeps = {}) {
    const quiet = config.quiet;
    this.now = deps.now ?? Date.now;
    this.ownsDatabase = deps.database === undefined;
    this.database = deps.database ?? getDatabase(config.statePath);

    this.scanner = deps.scanner ?? new FsDirectoryScanner();
    this.tracker = new AssetTracker();
    this.classifier = new SessionClassifier(deps.sessionStart ?? this.now());
    this.selection = new SelectionCoordinator(this.tracker, { onMutate: () => this.persist() });
    this.associations = new AssociationManager(this.tracker, this.selection, {
      autoLinkWindowMs: config.associations.autoLinkWindowMs,
      onMutate: () => this.persist(),
      quiet,
    });

    this.dispatcher = new EventDispatcher({
      tracker: this.tracker,
      classifier: this.classifier,
      associations: this.associations,
      selection: this.selection,
      capacity: config.dispatcher.capacity,
      hooks: {
        onAssetDiscovered: (asset, isSessionAsset) => this.emit('onAssetDiscovered', l => l.onAssetDiscovered?.(asset, isSessionAsset)),
        onAssetRemoved: assetPath => this.emit('onAssetRemoved', l => l.onAssetRemoved?.(assetPath)),
      },
      quiet,
    });

    this.views = new LazyViewLoader(this.buildViewDefinitions(), {
      scanner: this.scanner,
      discover: event => this.dispatcher.discover(event),
      isSessionAsset: asset => this.classifier.isSessionAsset(asset),
      isKnown: assetPath => this.tracker.has(assetPath),
      retries: config.scan.retries,
      retryDelayMs: config.scan.retryDelayMs,
      quiet,
    });
    this.dispatcher.attachViews(this.views);

    this.previews = new ResourceAdmissionController({ ...config.previews, quiet });

    this.watcher = deps.watcher === undefined
      ? new DirectoryWatcher({ ...config.watcher, quiet })
      : deps.watcher;

    this.selection.subscribe(objects => this.emit('onSelectionChanged', l => l.onSelectionChanged?.(objects)));
    this.associations.subscribe((image, model) => this.emit('onAssociationChanged', l => l.onAssociationChanged?.(image, model)));
  }

  // ========== Lifecycle ==========

  /** Start the dispatcher, restore persisted state, then begin watching */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.dispatcher.start();
    await this.restoreState();

    if (this.watcher) {
      for (const directory of this.config.directories) {
        await this.watcher.register(
          directory.name,
          directory.path,
          directory.patterns,
          event => this.handleWatchEvent(directory, event),
          directory.recursive
        );
      }
    }

    this.log(`Started (session start ${new Date(this.classifier.sessionStart).toISOString()})`);
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    await this.watcher?.stop();
    await this.dispatcher.stop();
    this.previews.clear();
    if (this.ownsDatabase) {
      closeDatabase();
    }
    this.log('Stopped');
  }

  isRunning(): boolean {
    return this.started;
  }

  subscribe(listeners: Partial<EngineListeners>): () => void {
    this.listeners.add(listeners);
    return () => {
      this.listeners.delete(listeners);
    };
  }

  // ========== Discovery ==========

  /**
   * Feed a file through the discovery pipeline, as the watcher would.
   * Returns null for missing, empty or unclassifiable files.
   */
  async discover(filePath: string, kind?: AssetKind): Promise<DiscoveryOutcome | null> {
    const absolute = path.resolve(filePath);
    const resolvedKind = kind ?? this.resolveKind(absolute);
    if (!resolvedKind) return null;

    const stat = await statFile(absolute);
    if (!stat || stat.size === 0) return null;

    return this.dispatcher.discover({ path: absolute, kind: resolvedKind, modifiedAt: Math.floor(stat.mtimeMs) });
  }

  /** Remove an asset whose file is gone; false if it is unknown or still on disk */
  remove(filePath: string): Promise<boolean> {
    return this.dispatcher.remove(path.resolve(filePath));
  }

  // ========== Views ==========

  activate(view: string): Promise<Asset[]> {
    return this.views.activate(view);
  }

  invalidate(view: string): void {
    this.views.invalidate(view);
  }

  getViewNames(): string[] {
    return this.views.getViewNames();
  }

  /** Files currently in a configured directory, newest first, without touching any view cache */
  async listExisting(directoryName: string): Promise<ScannedFile[]> {
    const directory = this.config.directories.find(d => d.name === directoryName);
    if (!directory) {
      throw new Error(`Unknown directory "${directoryName}"`);
    }
    const files = await this.scanner.scan(directory.path, directory.patterns, directory.recursive);
    return files.reverse();
  }

  // ========== Commands ==========

  toggle(assetPath: string): Promise<boolean> {
    return this.dispatcher.submit(`toggle ${assetPath}`, () => this.selection.toggle(assetPath));
  }

  setSelected(assetPath: string, selected: boolean): Promise<boolean> {
    return this.dispatcher.submit(`select ${assetPath}`, () => this.associations.setSelected(assetPath, selected));
  }

  clearSelection(kind?: AssetKind): Promise<number> {
    return this.dispatcher.submit('clear selection', () => this.selection.clear(kind));
  }

  link(image: string, model: string): Promise<void> {
    return this.dispatcher.submit(`link ${image}`, () => this.associations.link(image, model));
  }

  unlink(image: string): Promise<boolean> {
    return this.dispatcher.submit(`unlink ${image}`, () => this.associations.unlink(image));
  }

  /** Heuristic linking pass; defaults to the first configured image and model directories */
  autoDetect(imagesDir?: string, modelsDir?: string): Promise<number> {
    const images = imagesDir ?? this.directoryFor('image');
    const models = modelsDir ?? this.directoryFor('model');
    return this.dispatcher.submit('auto-detect', () =>
      this.associations.autoDetect(path.resolve(images), path.resolve(models))
    );
  }

  markTextured(model: string, texturedPath?: string): Promise<boolean> {
    return this.dispatcher.submit(`mark textured ${model}`, () => this.associations.markTextured(model, texturedPath));
  }

  cleanupMissing(): Promise<number> {
    return this.dispatcher.submit('cleanup', () => this.associations.cleanupMissing());
  }

  /** Start a new generation batch; session views rescan on next activation */
  resetSession(newStart: number = this.now()): Promise<boolean> {
    return this.dispatcher.submit('reset session', () => {
      const moved = this.classifier.resetSession(newStart);
      if (moved) {
        this.views.invalidateScope('session');
        this.log(`Session reset to ${new Date(newStart).toISOString()}`);
      }
      return moved;
    });
  }

  // ========== Previews ==========

  acquirePreview(sessionScoped: boolean, onEvict?: EvictionCallback): AdmissionResult {
    return this.previews.acquire(sessionScoped, onEvict);
  }

  releasePreview(handle: ResourceHandle): boolean {
    return this.previews.release(handle);
  }

  touchPreview(handle: ResourceHandle): boolean {
    return this.previews.touch(handle);
  }

  getPreviewStats(): ResourcePoolStats {
    return this.previews.getStats();
  }

  // ========== Reads ==========

  getAsset(assetPath: string): Asset | undefined {
    return this.tracker.get(assetPath);
  }

  listAssets(kind: AssetKind): Asset[] {
    return this.tracker.listByKind(kind);
  }

  isSessionAsset(asset: Asset): boolean {
    return this.classifier.isSessionAsset(asset);
  }

  getSessionStart(): number {
    return this.classifier.sessionStart;
  }

  isSelected(assetPath: string): boolean {
    return this.selection.isSelected(assetPath);
  }

  getSelectedPaths(kind?: AssetKind): string[] {
    return this.selection.getSelectedPaths(kind);
  }

  getUnifiedObjects(): UnifiedObject[] {
    return this.selection.getUnifiedObjects();
  }

  getSelectionSummary(): SelectionSummary {
    return this.selection.getSummary();
  }

  getForwardPaths(): string[] {
    return this.selection.getForwardPaths();
  }

  getModelForImage(image: string): string | null {
    return this.associations.getModelForImage(image);
  }

  getImageForModel(model: string): string | null {
    return this.associations.getImageForModel(model);
  }

  getAssociationStats(): AssociationStats {
    return this.associations.getStats();
  }

  // ========== Persistence ==========

  getState(): PersistedState {
    return { ...this.associations.toRecord(), selection: this.selection.toRecord() };
  }

  /** Write the whole document */
  persist(): void {
    if (this.persistSuspended) return;
    try {
      this.database.saveState(this.getState());
    } catch (err) {
      console.error('[AssetEngine] Failed to persist state:', err);
    }
  }

  private async restoreState(): Promise<void> {
    const state = this.database.loadState();
    const paths = new Set([
      ...Object.keys(state.associations),
      ...Object.values(state.associations),
      ...Object.keys(state.selection),
      ...Object.keys(state.textured),
      ...Object.values(state.textured),
    ]);
    if (paths.size === 0) return;

    this.persistSuspended = true;
    try {
      for (const assetPath of paths) {
        try {
          await this.discover(assetPath);
        } catch (err) {
          // Left out of the tracker, so restore drops its entries as stale
          console.warn(`[AssetEngine] Could not rediscover ${assetPath}:`, err);
        }
      }
      const skipped = await this.dispatcher.submit('restore', () => {
        const stale = this.associations.restore(state);
        this.selection.restore(state.selection);
        return stale;
      });
      this.log(`Restored ${this.associations.getAssociations().length} associations (${skipped} stale entries dropped)`);
    } finally {
      this.persistSuspended = false;
    }
    this.persist();
  }

  // ========== Helpers ==========

  private async handleWatchEvent(directory: DirectoryConfig, event: WatchEvent): Promise<void> {
    if (event.type === 'unlink') {
      return this.dispatcher.offerRemoval(event.path);
    }

    const stat = await statFile(event.path);
    // Empty files are picked up again by the change event once written
    if (!stat || stat.size === 0) return;

    return this.dispatcher.offer({ path: event.path, kind: directory.kind, modifiedAt: Math.floor(stat.mtimeMs) });
  }

  /** Kind of the most specific configured directory holding the path, else by extension */
  private resolveKind(assetPath: string): AssetKind | null {
    const owners = this.config.directories
      .filter(d => isInside(assetPath, d.path, d.recursive) && matchesPatterns(assetPath, d.patterns))
      .sort((a, b) => b.path.length - a.path.length);
    return owners.length > 0 ? owners[0].kind : kindFromExtension(assetPath);
  }

  private directoryFor(kind: AssetKind): string {
    const directory = this.config.directories.find(d => d.kind === kind);
    return directory ? directory.path : this.config.rootDir;
  }

  private buildViewDefinitions(): ViewDefinition[] {
    return this.config.views.map(view => {
      const directory = this.config.directories.find(d => d.name === view.directory);
      if (!directory) {
        throw new Error(`View "${view.name}" references unknown directory "${view.directory}"`);
      }
      return {
        name: view.name,
        directory: directory.path,
        kind: directory.kind,
        patterns: directory.patterns,
        recursive: directory.recursive,
        scope: view.scope,
      };
    });
  }

  private emit(event: keyof EngineListeners, call: (listeners: Partial<EngineListeners>) => void): void {
    for (const listeners of this.listeners) {
      try {
        call(listeners);
      } catch (err) {
        console.error(`[AssetEngine] ${event} listener failed:`, err);
      }
    }
  }

  private log(message: string): void {
    if (!this.config.quiet) {
      console.log(`[AssetEngine] ${message}`);
    }
  }
}

async function statFile(filePath: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(filePath);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}
