/**
 * Herald — Cycle Lock
 *
 * In-process guard so two cycles of the same type never overlap. Different
 * cycle types hold independent slots. Cross-process exclusion is left to
 * whatever triggers the cycles.
 */

import type { CycleType } from '../types';
import { CycleInProgressError } from '../lib/errors';

export class CycleLock {
  private readonly held = new Set<CycleType>();

  /**
   * Take the slot for a cycle type. Returns the release function.
   */
  acquire(cycleType: CycleType): () => void {
    if (this.held.has(cycleType)) {
      throw new CycleInProgressError(cycleType);
    }
    this.held.add(cycleType);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held.delete(cycleType);
    };
  }

  isHeld(cycleType: CycleType): boolean {
    return this.held.has(cycleType);
  }
}
