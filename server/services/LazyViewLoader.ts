/**
 * Lazy View Loader
 * Named view caches: one full directory scan on first activation,
 * incremental appends from discovery afterwards, until invalidated.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { Asset, DiscoveryEvent, DiscoveryOutcome, ScannedFile, ViewCache, ViewDefinition, ViewScope } from '../types/index.js';
import { UnknownViewError } from '../types/errors.js';
import { isInside, matchesPatterns } from '../utils/paths.js';
import type { DirectoryScanner } from './DirectoryScanner.js';
import type { ViewSink } from './EventDispatcher.js';

export interface LazyViewLoaderOptions {
  scanner: DirectoryScanner;
  /** Feeds scanned files through the normal discovery pipeline */
  discover: (event: DiscoveryEvent) => Promise<DiscoveryOutcome>;
  isSessionAsset: (asset: Asset) => boolean;
  isKnown: (path: string) => boolean;
  retries: number;
  retryDelayMs: number;
  quiet?: boolean;
}

interface ViewState {
  definition: ViewDefinition;
  cache: ViewCache;
  paths: Set<string>;
  // Discoveries recorded while a scan is in flight
  buffered: Asset[];
  loading: Promise<Asset[]> | null;
  generation: number;
  scans: number;
}

export class LazyViewLoader implements ViewSink {
  private views: Map<string, ViewState> = new Map();

  constructor(definitions: ViewDefinition[], private readonly options: LazyViewLoaderOptions) {
    for (const definition of definitions) {
      this.views.set(definition.name, {
        definition,
        cache: { loaded: false, assets: [] },
        paths: new Set(),
        buffered: [],
        loading: null,
        generation: 0,
        scans: 0,
      });
    }
  }

  /**
   * Return the view's assets, scanning its directory only if the cache is not loaded.
   * Concurrent activations share a single scan.
   */
  async activate(name: string): Promise<Asset[]> {
    const state = this.getState(name);

    if (state.cache.loaded) {
      return [...state.cache.assets];
    }
    if (state.loading) {
      return state.loading;
    }

    const generation = state.generation;
    const loading = this.load(state, generation).finally(() => {
      if (state.generation === generation) {
        state.loading = null;
      }
    });
    state.loading = loading;
    return loading;
  }

  /** Force the next activation to rescan */
  invalidate(name: string): void {
    const state = this.getState(name);
    state.generation++;
    state.loading = null;
    state.cache = { loaded: false, assets: [] };
    state.paths.clear();
    state.buffered = [];
  }

  invalidateScope(scope: ViewScope): void {
    for (const state of this.views.values()) {
      if (state.definition.scope === scope) {
        this.invalidate(state.definition.name);
      }
    }
  }

  isLoaded(name: string): boolean {
    return this.getState(name).cache.loaded;
  }

  getCache(name: string): ViewCache {
    const { cache } = this.getState(name);
    return { loaded: cache.loaded, assets: [...cache.assets] };
  }

  /** Number of full scans performed for a view */
  getScanCount(name: string): number {
    return this.getState(name).scans;
  }

  getViewNames(): string[] {
    return [...this.views.keys()];
  }

  // ========== ViewSink ==========

  record(asset: Asset, isSessionAsset: boolean): void {
    for (const state of this.views.values()) {
      if (!this.belongs(state.definition, asset, isSessionAsset)) continue;

      if (state.cache.loaded) {
        if (state.paths.has(asset.path)) continue;
        state.paths.add(asset.path);
        insertSorted(state.cache.assets, asset);
      } else if (state.loading) {
        state.buffered.push(asset);
      }
    }
  }

  forget(path: string): void {
    for (const state of this.views.values()) {
      state.buffered = state.buffered.filter(a => a.path !== path);
      if (state.paths.delete(path)) {
        state.cache.assets = state.cache.assets.filter(a => a.path !== path);
      }
    }
  }

  // ========== Loading ==========

  private async load(state: ViewState, generation: number): Promise<Asset[]> {
    const { definition } = state;
    const files = await this.scanWithRetry(definition);
    if (!files) return [];

    state.scans++;
    const outcomes = await Promise.all(
      files.map(file => this.options.discover({ path: file.path, kind: definition.kind, modifiedAt: file.modifiedAt }))
    );

    const assets: Asset[] = [];
    const seen = new Set<string>();
    for (const asset of [...outcomes.map(o => o.asset), ...state.buffered]) {
      if (seen.has(asset.path) || !this.options.isKnown(asset.path)) continue;
      if (!this.belongs(definition, asset, this.options.isSessionAsset(asset))) continue;
      seen.add(asset.path);
      assets.push(asset);
    }
    assets.sort(compareAssets);

    // Invalidated while scanning: hand back the result without caching it
    if (state.generation !== generation) {
      return assets;
    }

    state.cache = { loaded: true, assets };
    state.paths = seen;
    state.buffered = [];
    this.log(`Loaded view "${definition.name}" (${assets.length} assets)`);
    return [...assets];
  }

  private async scanWithRetry(definition: ViewDefinition): Promise<ScannedFile[] | null> {
    const { scanner, retries, retryDelayMs } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await scanner.scan(definition.directory, definition.patterns, definition.recursive);
      } catch (err) {
        if (attempt >= retries) {
          console.error(`[LazyViewLoader] Scan of "${definition.name}" failed after ${attempt + 1} attempts:`, err);
          return null;
        }
        const delay = retryDelayMs * 2 ** attempt;
        console.warn(`[LazyViewLoader] Scan of "${definition.name}" failed, retrying in ${delay}ms`);
        await sleep(delay);
      }
    }
  }

  private belongs(definition: ViewDefinition, asset: Asset, isSessionAsset: boolean): boolean {
    if (asset.kind !== definition.kind) return false;
    if (definition.scope === 'session' && !isSessionAsset) return false;
    return isInside(asset.path, definition.directory, definition.recursive)
      && matchesPatterns(asset.path, definition.patterns);
  }

  private getState(name: string): ViewState {
    const state = this.views.get(name);
    if (!state) {
      throw new UnknownViewError(name);
    }
    return state;
  }

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(`[LazyViewLoader] ${message}`);
    }
  }
}

/** Oldest first, path breaking ties */
function compareAssets(a: Asset, b: Asset): number {
  return a.modifiedAt - b.modifiedAt || a.path.localeCompare(b.path);
}

function insertSorted(assets: Asset[], asset: Asset): void {
  let low = 0;
  let high = assets.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (compareAssets(assets[mid], asset) <= 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  assets.splice(low, 0, asset);
}
