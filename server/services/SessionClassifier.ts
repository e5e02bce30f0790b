/**
 * Session Classifier
 * Splits assets into the current generation batch and historical output
 */

import type { Asset } from '../types/index.js';
import { OutOfOrderResetError } from '../types/errors.js';

export class SessionClassifier {
  private startedAt: number;

  constructor(startedAt: number = Date.now()) {
    this.startedAt = startedAt;
  }

  get sessionStart(): number {
    return this.startedAt;
  }

  isSessionAsset(asset: Asset): boolean {
    return asset.modifiedAt > this.startedAt;
  }

  /**
   * Move the session boundary forward. Earlier timestamps are rejected so a
   * clock regression cannot turn historical assets back into session assets.
   * Returns true when the boundary moved.
   */
  resetSession(newStart: number): boolean {
    if (!Number.isFinite(newStart) || newStart < this.startedAt) {
      throw new OutOfOrderResetError(this.startedAt, newStart);
    }
    if (newStart === this.startedAt) return false;

    this.startedAt = newStart;
    return true;
  }
}
