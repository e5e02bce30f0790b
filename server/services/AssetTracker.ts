/**
 * Asset Tracker
 * Authoritative registry of known assets, keyed by absolute path
 */

import type { Asset, AssetKind } from '../types/index.js';

export interface TrackResult {
  asset: Asset;
  isNew: boolean;
}

export class AssetTracker {
  private assets: Map<string, Asset> = new Map();
  // Per-kind insertion order, oldest first
  private byKind: Record<AssetKind, Map<string, Asset>> = {
    image: new Map(),
    model: new Map(),
    'textured-model': new Map(),
  };

  /**
   * Insert an asset if its path is unknown, otherwise return the stored record unchanged
   */
  add(path: string, kind: AssetKind, modifiedAt: number): TrackResult {
    const existing = this.assets.get(path);
    if (existing) {
      return { asset: existing, isNew: false };
    }

    const asset: Asset = Object.freeze({ path, kind, modifiedAt });
    this.assets.set(path, asset);
    this.byKind[kind].set(path, asset);
    return { asset, isNew: true };
  }

  remove(path: string): boolean {
    const asset = this.assets.get(path);
    if (!asset) return false;

    this.assets.delete(path);
    this.byKind[asset.kind].delete(path);
    return true;
  }

  get(path: string): Asset | undefined {
    return this.assets.get(path);
  }

  has(path: string): boolean {
    return this.assets.has(path);
  }

  /** Insertion order (most-recent-last); reverse for newest-first */
  listByKind(kind: AssetKind): Asset[] {
    return [...this.byKind[kind].values()];
  }

  get size(): number {
    return this.assets.size;
  }

  clear(): void {
    this.assets.clear();
    for (const map of Object.values(this.byKind)) {
      map.clear();
    }
  }
}
