/**
 * Selection Coordinator
 * Single source of truth for "assets selected for the next pipeline stage".
 * Every view reads the same signals; per-view selection is a derived read.
 */

import { signal, computed, batch, type ReadonlySignal } from '@preact/signals-core';
import type { Asset, AssetKind, SelectionSummary, UnifiedObject } from '../types/index.js';
import { NotFoundError } from '../types/errors.js';
import type { AssetTracker } from './AssetTracker.js';

/** Read side of the association graph */
export interface LineageSource {
  getModelForImage(image: string): string | null;
  getImageForModel(model: string): string | null;
  /** Textured variant of a model (the model path itself when marked without one) */
  getTexturedFor(model: string): string | null;
  getModelForTextured(textured: string): string | null;
}

export type SelectionListener = (objects: readonly UnifiedObject[]) => void;

export interface SelectionCoordinatorOptions {
  /** Called after every mutation that must be persisted */
  onMutate?: () => void;
}

interface Lineage {
  image: string | null;
  model: string | null;
  textured: string | null;
}

export class SelectionCoordinator {
  private readonly selection = signal<ReadonlyMap<string, boolean>>(new Map());
  // Bumped whenever associations or textured flags change
  private readonly lineageVersion = signal(0);
  private readonly listeners: Set<SelectionListener> = new Set();
  private lastEmitted = '[]';
  private lineage: LineageSource | null = null;

  readonly selectedPaths: ReadonlySignal<string[]> = computed(() =>
    [...this.selection.value].filter(([, selected]) => selected).map(([path]) => path)
  );

  readonly objects: ReadonlySignal<UnifiedObject[]> = computed(() => {
    void this.lineageVersion.value;
    return this.computeObjects(this.selection.value);
  });

  readonly selectionCount: ReadonlySignal<number> = computed(() => this.selectedPaths.value.length);

  constructor(
    private readonly tracker: AssetTracker,
    private readonly options: SelectionCoordinatorOptions = {}
  ) {}

  attachLineage(lineage: LineageSource): void {
    this.lineage = lineage;
    this.refresh();
  }

  // ==================== Mutations ====================

  /** Returns true when the stored flag changed */
  setSelected(path: string, selected: boolean): boolean {
    if (!this.tracker.has(path)) {
      throw new NotFoundError(path);
    }
    if ((this.selection.value.get(path) ?? false) === selected) return false;

    const next = new Map(this.selection.value);
    next.set(path, selected);
    this.selection.value = next;
    this.afterMutation();
    return true;
  }

  /** Flip the flag for a path; returns the new state */
  toggle(path: string): boolean {
    const selected = !this.isSelected(path);
    this.setSelected(path, selected);
    return selected;
  }

  /** Apply one flag to many paths as a single change; unknown paths fail before anything is written */
  setMany(paths: readonly string[], selected: boolean): number {
    const unknown = paths.find(p => !this.tracker.has(p));
    if (unknown !== undefined) throw new NotFoundError(unknown);

    const next = new Map(this.selection.value);
    let changed = 0;
    for (const path of paths) {
      if ((next.get(path) ?? false) !== selected) {
        next.set(path, selected);
        changed++;
      }
    }
    if (changed > 0) {
      this.selection.value = next;
      this.afterMutation();
    }
    return changed;
  }

  /** Deselect everything, or only assets of one kind */
  clear(kind?: AssetKind): number {
    const paths = this.selectedPaths.value.filter(p => !kind || this.tracker.get(p)?.kind === kind);
    return this.setMany(paths, false);
  }

  /** Drop the entry for an asset that no longer exists */
  forget(path: string): boolean {
    if (!this.selection.value.has(path)) return false;
    const next = new Map(this.selection.value);
    next.delete(path);
    this.selection.value = next;
    this.afterMutation();
    return true;
  }

  /** Re-derive the unified view after lineage changes */
  refresh(): void {
    this.lineageVersion.value++;
    this.emitIfChanged();
  }

  /** Load persisted flags for paths the tracker knows; returns how many were applied */
  restore(record: Record<string, boolean>): number {
    let applied = 0;
    batch(() => {
      const next = new Map(this.selection.value);
      for (const [path, selected] of Object.entries(record)) {
        if (this.tracker.has(path)) {
          next.set(path, selected);
          applied++;
        }
      }
      this.selection.value = next;
    });
    this.emitIfChanged();
    return applied;
  }

  // ==================== Reads ====================

  isSelected(path: string): boolean {
    return this.selection.value.get(path) === true;
  }

  getSelectedPaths(kind?: AssetKind): string[] {
    const paths = this.selectedPaths.value;
    return kind ? paths.filter(p => this.tracker.get(p)?.kind === kind) : paths;
  }

  getUnifiedObjects(): UnifiedObject[] {
    return this.objects.value;
  }

  getSummary(): SelectionSummary {
    const summary: SelectionSummary = { 'image-only': 0, 'has-model': 0, textured: 0 };
    for (const object of this.objects.value) {
      summary[object.stage]++;
    }
    return summary;
  }

  /** Paths handed to the next pipeline stage, one per lineage */
  getForwardPaths(): string[] {
    return this.objects.value.map(object => object.key);
  }

  subscribe(listener: SelectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  toRecord(): Record<string, boolean> {
    const record: Record<string, boolean> = {};
    for (const path of this.selectedPaths.value) {
      record[path] = true;
    }
    return record;
  }

  // ==================== Internals ====================

  private afterMutation(): void {
    this.options.onMutate?.();
    this.emitIfChanged();
  }

  private emitIfChanged(): void {
    const objects = this.objects.value;
    const serialized = JSON.stringify(objects);
    if (serialized === this.lastEmitted) return;
    this.lastEmitted = serialized;

    for (const listener of this.listeners) {
      try {
        listener(objects);
      } catch (err) {
        console.error('[SelectionCoordinator] Listener failed:', err);
      }
    }
  }

  private computeObjects(selection: ReadonlyMap<string, boolean>): UnifiedObject[] {
    const objects: UnifiedObject[] = [];
    const seen = new Set<string>();

    for (const [path, selected] of selection) {
      if (!selected) continue;
      const asset = this.tracker.get(path);
      if (!asset) continue;

      const lineage = this.resolveLineage(asset);
      const lineageId = lineage.image ?? lineage.model ?? lineage.textured ?? path;
      if (seen.has(lineageId)) continue;
      seen.add(lineageId);

      objects.push({
        key: lineage.textured ?? lineage.model ?? lineage.image ?? path,
        stage: lineage.textured ? 'textured' : lineage.model ? 'has-model' : 'image-only',
        image: lineage.image,
        model: lineage.model,
        textured: lineage.textured,
      });
    }

    return objects;
  }

  private resolveLineage(asset: Asset): Lineage {
    const source = this.lineage;

    switch (asset.kind) {
      case 'image': {
        const model = source?.getModelForImage(asset.path) ?? null;
        return { image: asset.path, model, textured: model ? source?.getTexturedFor(model) ?? null : null };
      }
      case 'model':
        return {
          image: source?.getImageForModel(asset.path) ?? null,
          model: asset.path,
          textured: source?.getTexturedFor(asset.path) ?? null,
        };
      case 'textured-model': {
        const model = source?.getModelForTextured(asset.path) ?? null;
        return {
          image: model ? source?.getImageForModel(model) ?? null : null,
          model,
          textured: asset.path,
        };
      }
    }
  }
}
