import { DEFAULT_SERVER_CONFIG } from "./global";
import { Signal } from "./utils/Signal";

export type EventPoolStats = {
  idle: number;
  inUse: number;
  allocated: number;
  reused: number;
  discarded: number;
};

/**
 * Capped free-list of {@link Signal}s shared by every connection of a worker.
 *
 * The event loop is the only scheduler touching it, so the bookkeeping needs
 * no lock: `acquire` and `release` run to completion between awaits.
 */
export class EventPool {
  private readonly idle: Signal[] = [];
  private readonly inUse = new Set<Signal>();
  private allocated = 0;
  private reused = 0;
  private discarded = 0;

  constructor(readonly capacity: number = DEFAULT_SERVER_CONFIG.eventPoolCapacity) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`EventPool capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  acquire(): Signal {
    const signal = this.idle.pop();
    if (signal) {
      this.reused++;
      this.inUse.add(signal);
      return signal;
    }

    this.allocated++;
    const fresh = new Signal();
    this.inUse.add(fresh);
    return fresh;
  }

  /**
   * Returns `signal` to the idle set. Signals not handed out by this pool, or
   * already released, are ignored. A signal somebody is still waiting on is
   * dropped rather than reused.
   */
  release(signal: Signal): void {
    if (!this.inUse.delete(signal)) return;

    if (signal.hasWaiters || this.idle.length >= this.capacity) {
      this.discarded++;
      return;
    }

    signal.clear();
    this.idle.push(signal);
  }

  stats(): EventPoolStats {
    return {
      idle: this.idle.length,
      inUse: this.inUse.size,
      allocated: this.allocated,
      reused: this.reused,
      discarded: this.discarded,
    };
  }
}
