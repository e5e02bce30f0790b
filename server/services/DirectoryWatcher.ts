/**
 * Directory Watcher
 * Watches registered output directories and forwards matching file events,
 * debounced per path and delivered in order per watcher.
 */

import { FSWatcher, watch } from 'chokidar';
import fs from 'fs';
import path from 'path';
import type { WatchEvent, WatchEventType } from '../types/index.js';
import { isInside, matchesPatterns } from '../utils/paths.js';

/** Resolving the returned promise signals the event was accepted downstream */
export type WatchHandler = (event: WatchEvent) => Promise<void>;

export interface DirectoryWatcherOptions {
  debounceMs: number;
  stabilityThresholdMs: number;
  pollIntervalMs: number;
  retry: {
    initialDelayMs: number;
    maxDelayMs: number;
  };
  quiet?: boolean;
}

interface Registration {
  name: string;
  directory: string;
  patterns: readonly string[];
  recursive: boolean;
  onEvent: WatchHandler;
  watcher: FSWatcher | null;
  debounceTimers: Map<string, NodeJS.Timeout>;
  // Tail of the per-watcher delivery chain
  delivery: Promise<void>;
  retryTimer: NodeJS.Timeout | null;
  retryDelay: number;
  closed: boolean;
}

export class DirectoryWatcher {
  private registrations: Map<string, Registration> = new Map();

  constructor(private readonly options: DirectoryWatcherOptions) {}

  /**
   * Start watching a directory, creating it if missing.
   * Resolves once the first attempt finished; failures are retried with backoff.
   */
  async register(
    name: string,
    directory: string,
    patterns: readonly string[],
    onEvent: WatchHandler,
    recursive = false
  ): Promise<boolean> {
    if (this.registrations.has(name)) {
      throw new Error(`Watcher "${name}" is already registered`);
    }

    const registration: Registration = {
      name,
      directory: path.resolve(directory),
      patterns,
      recursive,
      onEvent,
      watcher: null,
      debounceTimers: new Map(),
      delivery: Promise.resolve(),
      retryTimer: null,
      retryDelay: this.options.retry.initialDelayMs,
      closed: false,
    };
    this.registrations.set(name, registration);

    return this.open(registration);
  }

  async unregister(name: string): Promise<boolean> {
    const registration = this.registrations.get(name);
    if (!registration) return false;

    this.registrations.delete(name);
    await this.close(registration);
    return true;
  }

  /** Release every watch; the watcher can be registered against again afterwards */
  async unregisterAll(): Promise<void> {
    const registrations = [...this.registrations.values()];
    this.registrations.clear();
    await Promise.all(registrations.map(r => this.close(r)));
    if (registrations.length > 0) {
      this.log('Stopped');
    }
  }

  stop(): Promise<void> {
    return this.unregisterAll();
  }

  /** True when at least one registered directory is being watched */
  isActive(): boolean {
    for (const registration of this.registrations.values()) {
      if (registration.watcher) return true;
    }
    return false;
  }

  isWatching(name: string): boolean {
    return this.registrations.get(name)?.watcher != null;
  }

  getRegisteredNames(): string[] {
    return [...this.registrations.keys()];
  }

  // ========== Watcher lifecycle ==========

  private async open(registration: Registration): Promise<boolean> {
    const { name, directory, recursive } = registration;

    try {
      await fs.promises.mkdir(directory, { recursive: true });
      const watcher = watch(directory, {
        ignored: /(^|[/\\])\../, // Ignore dotfiles
        persistent: true,
        ignoreInitial: true,
        depth: recursive ? undefined : 0,
        awaitWriteFinish: {
          stabilityThreshold: this.options.stabilityThresholdMs,
          pollInterval: this.options.pollIntervalMs,
        },
      });

      watcher
        .on('add', (filePath: string) => this.handleChange(registration, 'add', filePath))
        .on('change', (filePath: string) => this.handleChange(registration, 'change', filePath))
        .on('unlink', (filePath: string) => this.handleChange(registration, 'unlink', filePath))
        .on('error', (error: unknown) => this.handleFailure(registration, watcher, error));

      await new Promise<void>(resolve => watcher.once('ready', () => resolve()));

      if (registration.closed) {
        await watcher.close();
        return false;
      }

      registration.watcher = watcher;
      registration.retryDelay = this.options.retry.initialDelayMs;
      this.log(`Watching "${name}": ${directory}`);
      return true;
    } catch (err) {
      this.scheduleRetry(registration, err);
      return false;
    }
  }

  private handleFailure(registration: Registration, watcher: FSWatcher, error: unknown): void {
    if (registration.watcher !== watcher) return;

    registration.watcher = null;
    watcher.close().catch(err => console.error(`[DirectoryWatcher] Failed to close "${registration.name}":`, err));
    this.scheduleRetry(registration, error);
  }

  private scheduleRetry(registration: Registration, error: unknown): void {
    if (registration.closed || registration.retryTimer) return;

    const delay = registration.retryDelay;
    registration.retryDelay = Math.min(delay * 2, this.options.retry.maxDelayMs);
    console.error(`[DirectoryWatcher] Watcher "${registration.name}" failed, retrying in ${delay}ms:`, error);

    registration.retryTimer = setTimeout(() => {
      registration.retryTimer = null;
      if (registration.closed) return;
      this.open(registration).catch(err => console.error(`[DirectoryWatcher] Retry of "${registration.name}" failed:`, err));
    }, delay);
  }

  private async close(registration: Registration): Promise<void> {
    registration.closed = true;

    if (registration.retryTimer) {
      clearTimeout(registration.retryTimer);
      registration.retryTimer = null;
    }
    for (const timer of registration.debounceTimers.values()) {
      clearTimeout(timer);
    }
    registration.debounceTimers.clear();

    const watcher = registration.watcher;
    registration.watcher = null;
    if (watcher) {
      await watcher.close();
    }
    await registration.delivery;
  }

  // ========== Events ==========

  /**
   * Handle a file event with debouncing: rapid events for one path collapse
   * into the last one.
   */
  private handleChange(registration: Registration, type: WatchEventType, filePath: string): void {
    const { directory, patterns, recursive, debounceTimers } = registration;
    if (registration.closed) return;
    if (!isInside(filePath, directory, recursive) || !matchesPatterns(filePath, patterns)) return;

    const existingTimer = debounceTimers.get(filePath);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    debounceTimers.set(filePath, setTimeout(() => {
      debounceTimers.delete(filePath);
      this.deliver(registration, { type, path: filePath });
    }, this.options.debounceMs));
  }

  private deliver(registration: Registration, event: WatchEvent): void {
    registration.delivery = registration.delivery
      .then(() => {
        this.log(`${event.type}: ${path.relative(registration.directory, event.path)}`);
        return registration.onEvent(event);
      })
      .catch(err => console.error(`[DirectoryWatcher] Failed to deliver ${event.type} for ${event.path}:`, err));
  }

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(`[DirectoryWatcher] ${message}`);
    }
  }
}
