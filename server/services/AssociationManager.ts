/**
 * Association Manager
 * Tracks which 3D model was generated from which image, plus textured flags.
 *
 * Auto-linking:
 * - a model and an image correlate when their stems match, or their name
 *   fragments (generator prefixes, digits and separators stripped) contain one another
 * - the model must be written no earlier than the image and within the link window
 * - a link is only created when the pairing is unambiguous in both directions
 */

import type { Asset, Association, AssociationStats, PersistedState } from '../types/index.js';
import { NotFoundError } from '../types/errors.js';
import { isInside, lowerStem, namesCorrelate, texturedBaseStem } from '../utils/paths.js';
import type { AssetTracker } from './AssetTracker.js';
import type { LineageSource, SelectionCoordinator } from './SelectionCoordinator.js';

export type AssociationListener = (image: string, model: string | null) => void;

export interface AssociationManagerOptions {
  autoLinkWindowMs: number;
  onMutate?: () => void;
  quiet?: boolean;
}

export class AssociationManager implements LineageSource {
  private imageToModel: Map<string, string> = new Map();
  private modelToImage: Map<string, string> = new Map();
  // model path -> textured variant (or the model itself)
  private texturedModels: Map<string, string> = new Map();
  private texturedToModel: Map<string, string> = new Map();
  private listeners: Set<AssociationListener> = new Set();

  constructor(
    private readonly tracker: AssetTracker,
    private readonly selection: SelectionCoordinator,
    private readonly options: AssociationManagerOptions
  ) {
    selection.attachLineage(this);
  }

  // ========== Links ==========

  /**
   * Record image -> model, replacing any previous model for the image
   * and any previous image for the model
   */
  link(image: string, model: string): void {
    this.requireKind(image, 'image');
    this.requireKind(model, 'model');

    if (this.imageToModel.get(image) === model) return;

    const previousImage = this.setLink(image, model);
    this.log(`Linked ${image} → ${model}`);

    this.afterMutation();
    if (previousImage !== null) {
      this.notify(previousImage, null);
    }
    this.notify(image, model);
  }

  /** Remove the link for an image; returns whether one existed */
  unlink(image: string): boolean {
    const model = this.imageToModel.get(image);
    if (model === undefined) return false;

    this.imageToModel.delete(image);
    this.modelToImage.delete(model);
    this.afterMutation();
    this.notify(image, null);
    return true;
  }

  getModelForImage(image: string): string | null {
    return this.imageToModel.get(image) ?? null;
  }

  getImageForModel(model: string): string | null {
    return this.modelToImage.get(model) ?? null;
  }

  getAssociations(): Association[] {
    return [...this.imageToModel].map(([imagePath, modelPath]) => ({ imagePath, modelPath }));
  }

  // ========== Textured flags ==========

  getTexturedFor(model: string): string | null {
    return this.texturedModels.get(model) ?? null;
  }

  getModelForTextured(textured: string): string | null {
    return this.texturedToModel.get(textured) ?? null;
  }

  isTextured(model: string): boolean {
    return this.texturedModels.has(model);
  }

  /**
   * Mark a model textured, optionally naming the textured variant file.
   * Forward-only: an already textured model keeps its flag.
   * Returns true when anything changed.
   */
  markTextured(model: string, texturedPath?: string): boolean {
    this.requireKind(model, 'model');
    if (texturedPath !== undefined) {
      this.requireKind(texturedPath, 'textured-model');
    }

    const current = this.texturedModels.get(model);
    const next = texturedPath ?? current ?? model;
    if (current === next) return false;

    if (current !== undefined && current !== model) {
      this.texturedToModel.delete(current);
    }
    this.texturedModels.set(model, next);
    if (next !== model) {
      this.texturedToModel.set(next, model);
    }
    this.log(`Marked textured: ${model}${next !== model ? ` (${next})` : ''}`);

    this.afterMutation();
    return true;
  }

  /**
   * Find the model a newly discovered textured variant belongs to by stem.
   * Only marks when exactly one known model matches.
   */
  detectTextured(textured: Asset): string | null {
    const baseStem = texturedBaseStem(textured.path);
    const candidates = this.tracker.listByKind('model').filter(m => lowerStem(m.path) === baseStem);
    if (candidates.length !== 1) return null;

    const model = candidates[0].path;
    this.markTextured(model, textured.path);
    return model;
  }

  /**
   * Claim an unmatched textured variant for a newly discovered model,
   * covering variants that were discovered first. Same stem rule as detectTextured.
   */
  detectTexturedForModel(model: Asset): string | null {
    if (this.texturedModels.has(model.path)) return null;

    const stem = lowerStem(model.path);
    const variants = this.tracker.listByKind('textured-model')
      .filter(t => !this.texturedToModel.has(t.path) && texturedBaseStem(t.path) === stem);
    if (variants.length !== 1) return null;
    if (this.tracker.listByKind('model').filter(m => lowerStem(m.path) === stem).length !== 1) return null;

    const textured = variants[0].path;
    this.markTextured(model.path, textured);
    return textured;
  }

  // ========== Selection passthrough ==========

  setSelected(path: string, selected: boolean): boolean {
    return this.selection.setSelected(path, selected);
  }

  // ========== Heuristic linking ==========

  /**
   * Pair unlinked images and models found under the given directories.
   * Returns the number of links created.
   */
  autoDetect(imagesDir: string, modelsDir: string): number {
    const images = this.tracker.listByKind('image')
      .filter(a => isInside(a.path, imagesDir, true) && !this.imageToModel.has(a.path));
    const models = this.tracker.listByKind('model')
      .filter(a => isInside(a.path, modelsDir, true) && !this.modelToImage.has(a.path));

    const pairs = this.findUnambiguousPairs(images, models);
    for (const [image, model] of pairs) {
      this.link(image.path, model.path);
    }

    if (pairs.length > 0) {
      this.log(`Auto-detected ${pairs.length} new associations`);
    }
    return pairs.length;
  }

  /**
   * Try to link a freshly discovered model to one unlinked image.
   * When the image is selected the model joins the selection.
   */
  autoLinkModel(model: Asset): string | null {
    if (this.modelToImage.has(model.path)) return null;

    const pair = this.findUnlinkedPairs().find(([, m]) => m.path === model.path);
    if (!pair) return null;

    const image = pair[0].path;
    this.link(image, model.path);
    this.carrySelection(image, model.path);
    return image;
  }

  /** Counterpart of autoLinkModel for an image discovered after its model */
  autoLinkImage(image: Asset): string | null {
    if (this.imageToModel.has(image.path)) return null;

    const pair = this.findUnlinkedPairs().find(([i]) => i.path === image.path);
    if (!pair) return null;

    const model = pair[1].path;
    this.link(image.path, model);
    this.carrySelection(image.path, model);
    return model;
  }

  private findUnlinkedPairs(): Array<[Asset, Asset]> {
    const images = this.tracker.listByKind('image').filter(a => !this.imageToModel.has(a.path));
    const models = this.tracker.listByKind('model').filter(a => !this.modelToImage.has(a.path));
    return this.findUnambiguousPairs(images, models);
  }

  // A selected side pulls its new partner into the selection
  private carrySelection(image: string, model: string): void {
    if (this.selection.isSelected(image)) {
      this.selection.setSelected(model, true);
    } else if (this.selection.isSelected(model)) {
      this.selection.setSelected(image, true);
    }
  }

  private findUnambiguousPairs(images: Asset[], models: Asset[]): Array<[Asset, Asset]> {
    const candidatesByImage = new Map<string, Asset[]>();
    const candidatesByModel = new Map<string, Asset[]>();

    for (const image of images) {
      for (const model of models) {
        if (!this.correlates(image, model)) continue;
        candidatesByImage.set(image.path, [...(candidatesByImage.get(image.path) ?? []), model]);
        candidatesByModel.set(model.path, [...(candidatesByModel.get(model.path) ?? []), image]);
      }
    }

    const pairs: Array<[Asset, Asset]> = [];
    for (const image of images) {
      const models = candidatesByImage.get(image.path);
      if (!models || models.length !== 1) continue;
      const model = models[0];
      if (candidatesByModel.get(model.path)?.length !== 1) continue;
      pairs.push([image, model]);
    }
    return pairs;
  }

  private correlates(image: Asset, model: Asset): boolean {
    const delta = model.modifiedAt - image.modifiedAt;
    if (delta < 0 || delta > this.options.autoLinkWindowMs) return false;
    return namesCorrelate(image.path, model.path);
  }

  // ========== Cleanup ==========

  /**
   * Drop every association or textured flag referencing a path the tracker
   * no longer knows. Returns the number of associations removed.
   */
  cleanupMissing(): number {
    const stale = [...this.imageToModel].filter(
      ([image, model]) => !this.tracker.has(image) || !this.tracker.has(model)
    );

    for (const [image, model] of stale) {
      this.imageToModel.delete(image);
      this.modelToImage.delete(model);
    }

    let texturedChanged = false;
    for (const [model, textured] of [...this.texturedModels]) {
      if (!this.tracker.has(model) || !this.tracker.has(textured)) {
        this.texturedModels.delete(model);
        this.texturedToModel.delete(textured);
        texturedChanged = true;
      }
    }

    if (stale.length > 0 || texturedChanged) {
      this.afterMutation();
    }
    for (const [image] of stale) {
      this.notify(image, null);
    }
    if (stale.length > 0) {
      this.log(`Cleaned up ${stale.length} associations with missing files`);
    }
    return stale.length;
  }

  // ========== Persistence ==========

  toRecord(): Pick<PersistedState, 'associations' | 'textured'> {
    return {
      associations: Object.fromEntries(this.imageToModel),
      textured: Object.fromEntries(this.texturedModels),
    };
  }

  /**
   * Re-create persisted links whose files are known to the tracker.
   * Returns the number of entries skipped as stale.
   */
  restore(record: Pick<PersistedState, 'associations' | 'textured'>): number {
    let skipped = 0;

    for (const [image, model] of Object.entries(record.associations)) {
      if (this.tracker.get(image)?.kind !== 'image' || this.tracker.get(model)?.kind !== 'model') {
        skipped++;
        continue;
      }
      // Persisted links override whatever auto-linking found during rediscovery
      this.setLink(image, model);
    }

    for (const [model, textured] of Object.entries(record.textured)) {
      if (!this.tracker.has(model) || !this.tracker.has(textured)) {
        skipped++;
        continue;
      }
      const current = this.texturedModels.get(model);
      if (current !== undefined && current !== model) {
        this.texturedToModel.delete(current);
      }
      this.texturedModels.set(model, textured);
      if (textured !== model) {
        this.texturedToModel.set(textured, model);
      }
    }

    this.selection.refresh();
    if (skipped > 0) {
      console.warn(`[AssociationManager] Skipped ${skipped} persisted entries with missing files`);
    }
    return skipped;
  }

  getStats(): AssociationStats {
    return {
      totalAssociations: this.imageToModel.size,
      selectedImages: this.selection.getSelectedPaths('image').length,
      selectedModels: this.selection.getSelectedPaths('model').length,
      imagesWithModels: [...this.imageToModel]
        .filter(([image, model]) => this.tracker.has(image) && this.tracker.has(model)).length,
    };
  }

  subscribe(listener: AssociationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ========== Helpers ==========

  /** Write image -> model into both maps, unlinking previous partners; returns the displaced image */
  private setLink(image: string, model: string): string | null {
    const previousModel = this.imageToModel.get(image);
    if (previousModel !== undefined && previousModel !== model) {
      this.modelToImage.delete(previousModel);
    }
    const previousImage = this.modelToImage.get(model);
    if (previousImage !== undefined && previousImage !== image) {
      this.imageToModel.delete(previousImage);
    }

    this.imageToModel.set(image, model);
    this.modelToImage.set(model, image);
    return previousImage !== undefined && previousImage !== image ? previousImage : null;
  }

  private requireKind(path: string, kind: Asset['kind']): void {
    const asset = this.tracker.get(path);
    if (!asset || asset.kind !== kind) {
      throw new NotFoundError(path);
    }
  }

  private afterMutation(): void {
    this.options.onMutate?.();
    this.selection.refresh();
  }

  private notify(image: string, model: string | null): void {
    for (const listener of this.listeners) {
      try {
        listener(image, model);
      } catch (err) {
        console.error('[AssociationManager] Listener failed:', err);
      }
    }
  }

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(`[AssociationManager] ${message}`);
    }
  }
}
