/**
 * Resource Admission Controller
 * Caps concurrently materialized preview resources (live 3D viewers).
 * Session work gets priority: at capacity, a session request evicts the
 * least-recently-used historical handle; historical requests never evict.
 *
 * acquire/release/touch are synchronous, so each call is atomic with
 * respect to every other caller on the event loop.
 */

import type { ResourceHandle, ResourcePoolStats } from '../types/index.js';
import { AdmissionRejectedError } from '../types/errors.js';

export type EvictionCallback = (handle: ResourceHandle) => void;

export type AdmissionResult =
  | { granted: true; handle: ResourceHandle; evicted: ResourceHandle | null }
  | { granted: false; error: AdmissionRejectedError };

export interface ResourceAdmissionOptions {
  totalQuota: number;
  sessionQuota: number;
  quiet?: boolean;
}

interface ActiveEntry {
  handle: ResourceHandle;
  onEvict: EvictionCallback | undefined;
}

export class ResourceAdmissionController {
  // Map order doubles as LRU order: least recently used first
  private active: Map<string, ActiveEntry> = new Map();
  private sessionCount = 0;
  private nextId = 1;

  constructor(private readonly options: ResourceAdmissionOptions) {
    if (options.sessionQuota > options.totalQuota) {
      throw new RangeError('sessionQuota cannot exceed totalQuota');
    }
  }

  acquire(sessionScoped: boolean, onEvict?: EvictionCallback): AdmissionResult {
    const { totalQuota, sessionQuota } = this.options;

    if (sessionScoped && this.sessionCount >= sessionQuota) {
      this.log(`Session preview limit reached (${this.sessionCount}/${sessionQuota})`);
      return { granted: false, error: new AdmissionRejectedError('session-quota') };
    }

    let evicted: ResourceHandle | null = null;
    if (this.active.size >= totalQuota) {
      if (!sessionScoped) {
        this.log(`Preview limit reached (${this.active.size}/${totalQuota})`);
        return { granted: false, error: new AdmissionRejectedError('total-quota') };
      }

      evicted = this.evictHistorical();
      if (!evicted) {
        return { granted: false, error: new AdmissionRejectedError('no-evictable-handle') };
      }
    }

    const handle: ResourceHandle = Object.freeze({
      id: `preview-${this.nextId++}`,
      sessionScoped,
      acquiredAt: Date.now(),
    });
    this.active.set(handle.id, { handle, onEvict });
    if (sessionScoped) this.sessionCount++;

    return { granted: true, handle, evicted };
  }

  /** Free a slot; false when the handle was already released or evicted */
  release(handle: ResourceHandle): boolean {
    const entry = this.active.get(handle.id);
    if (!entry) return false;

    this.active.delete(handle.id);
    if (entry.handle.sessionScoped) this.sessionCount--;
    return true;
  }

  /** Mark a handle as recently used */
  touch(handle: ResourceHandle): boolean {
    const entry = this.active.get(handle.id);
    if (!entry) return false;

    this.active.delete(handle.id);
    this.active.set(handle.id, entry);
    return true;
  }

  isActive(handle: ResourceHandle): boolean {
    return this.active.has(handle.id);
  }

  getActiveHandles(): ResourceHandle[] {
    return [...this.active.values()].map(entry => entry.handle);
  }

  getStats(): ResourcePoolStats {
    return {
      active: this.active.size,
      session: this.sessionCount,
      historical: this.active.size - this.sessionCount,
      totalQuota: this.options.totalQuota,
      sessionQuota: this.options.sessionQuota,
    };
  }

  /** Release everything, e.g. on shutdown */
  clear(): void {
    this.active.clear();
    this.sessionCount = 0;
  }

  private evictHistorical(): ResourceHandle | null {
    for (const [id, entry] of this.active) {
      if (entry.handle.sessionScoped) continue;

      this.active.delete(id);
      this.log(`Evicted historical preview ${id}`);
      try {
        entry.onEvict?.(entry.handle);
      } catch (err) {
        console.error(`[ResourceAdmission] Eviction callback failed for ${id}:`, err);
      }
      return entry.handle;
    }
    return null;
  }

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(`[ResourceAdmission] ${message}`);
    }
  }
}
