/**
 * Event Dispatcher
 * Bounded channel + one serialized consumer loop. Every mutation of tracker,
 * association and selection state runs inside this loop, one job at a time.
 *
 * Discovery pipeline (fixed order):
 *   AssetTracker.add -> SessionClassifier -> AssociationManager -> SelectionCoordinator
 */

import fs from 'fs';
import type { Asset, DiscoveryEvent, DiscoveryOutcome } from '../types/index.js';
import { BoundedChannel } from '../utils/channel.js';
import type { AssetTracker } from './AssetTracker.js';
import type { SessionClassifier } from './SessionClassifier.js';
import type { AssociationManager } from './AssociationManager.js';
import type { SelectionCoordinator } from './SelectionCoordinator.js';

interface DispatchJob {
  label: string;
  execute(): Promise<void>;
}

/** Receives incremental discoveries for loaded views */
export interface ViewSink {
  record(asset: Asset, isSessionAsset: boolean): void;
  forget(path: string): void;
}

export interface DispatcherHooks {
  onAssetDiscovered?(asset: Asset, isSessionAsset: boolean): void;
  onAssetRemoved?(path: string): void;
}

export interface EventDispatcherOptions {
  tracker: AssetTracker;
  classifier: SessionClassifier;
  associations: AssociationManager;
  selection: SelectionCoordinator;
  capacity: number;
  views?: ViewSink;
  hooks?: DispatcherHooks;
  quiet?: boolean;
  /** Confirms a path is gone before an unlink removes it */
  fileExists?: (path: string) => Promise<boolean>;
}

async function defaultFileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class EventDispatcher {
  private readonly channel: BoundedChannel<DispatchJob>;
  private loop: Promise<void> | null = null;
  private processedCount = 0;
  private views: ViewSink | undefined;
  private readonly fileExists: (path: string) => Promise<boolean>;

  constructor(private readonly options: EventDispatcherOptions) {
    this.channel = new BoundedChannel<DispatchJob>(options.capacity);
    this.views = options.views;
    this.fileExists = options.fileExists ?? defaultFileExists;
  }

  /** Start the consumer loop */
  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  /** Close the channel and wait for buffered jobs to drain */
  async stop(): Promise<void> {
    this.channel.close();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  isRunning(): boolean {
    return this.loop !== null && !this.channel.isClosed;
  }

  get processed(): number {
    return this.processedCount;
  }

  get pending(): number {
    return this.channel.size + this.channel.waiting;
  }

  attachViews(views: ViewSink): void {
    this.views = views;
  }

  // ========== Producers ==========

  /** Queue a discovery and wait until the pipeline has applied it */
  discover(event: DiscoveryEvent): Promise<DiscoveryOutcome> {
    return this.enqueue(`discover ${event.path}`, () => this.applyDiscovery(event)).result;
  }

  /**
   * Queue a discovery and return once it is accepted by the channel.
   * Blocks while the channel is full; used by the watcher.
   */
  offer(event: DiscoveryEvent): Promise<void> {
    const { accepted, result } = this.enqueue(`discover ${event.path}`, () => this.applyDiscovery(event));
    result.catch(err => console.error(`[EventDispatcher] Discovery failed for ${event.path}:`, err));
    return accepted;
  }

  /** Queue removal of a path whose file disappeared */
  remove(path: string): Promise<boolean> {
    return this.enqueue(`remove ${path}`, () => this.applyRemoval(path)).result;
  }

  offerRemoval(path: string): Promise<void> {
    const { accepted, result } = this.enqueue(`remove ${path}`, () => this.applyRemoval(path));
    result.catch(err => console.error(`[EventDispatcher] Removal failed for ${path}:`, err));
    return accepted;
  }

  /** Run an arbitrary state mutation inside the serialized loop */
  submit<T>(label: string, run: () => T | Promise<T>): Promise<T> {
    return this.enqueue(label, run).result;
  }

  private enqueue<T>(label: string, run: () => T | Promise<T>): { accepted: Promise<void>; result: Promise<T> } {
    let accepted: Promise<void> = Promise.resolve();
    const result = new Promise<T>((resolve, reject) => {
      accepted = this.channel.send({
        label,
        execute: async () => {
          try {
            resolve(await run());
          } catch (err) {
            reject(err);
          }
        },
      });
      accepted.catch(reject);
    });
    return { accepted, result };
  }

  // ========== Consumer ==========

  private async run(): Promise<void> {
    for (;;) {
      const job = await this.channel.receive();
      if (!job) break;

      try {
        await job.execute();
      } catch (err) {
        console.error(`[EventDispatcher] Job "${job.label}" failed:`, err);
      }
      this.processedCount++;
    }
  }

  private applyDiscovery(event: DiscoveryEvent): DiscoveryOutcome {
    const { tracker, classifier, associations, selection } = this.options;

    const { asset, isNew } = tracker.add(event.path, event.kind, event.modifiedAt);
    const isSessionAsset = classifier.isSessionAsset(asset);
    if (!isNew) {
      return { asset, isNew, isSessionAsset };
    }

    this.views?.record(asset, isSessionAsset);
    this.safeHook(() => this.options.hooks?.onAssetDiscovered?.(asset, isSessionAsset));

    if (asset.kind === 'image') {
      associations.autoLinkImage(asset);
    } else if (asset.kind === 'model') {
      associations.autoLinkModel(asset);
      associations.detectTexturedForModel(asset);
    } else if (asset.kind === 'textured-model') {
      associations.detectTextured(asset);
    }

    selection.refresh();
    return { asset, isNew, isSessionAsset };
  }

  private async applyRemoval(path: string): Promise<boolean> {
    const { tracker, associations, selection } = this.options;

    if (!tracker.has(path)) return false;
    if (await this.fileExists(path)) {
      this.log(`Ignoring unlink for ${path}: file still present`);
      return false;
    }

    tracker.remove(path);
    selection.forget(path);
    this.views?.forget(path);
    associations.cleanupMissing();
    this.safeHook(() => this.options.hooks?.onAssetRemoved?.(path));
    selection.refresh();
    return true;
  }

  private safeHook(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.error('[EventDispatcher] Listener failed:', err);
    }
  }

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(`[EventDispatcher] ${message}`);
    }
  }
}
