/**
 * Per-key serialized execution ("lanes").
 * Tasks for one key run one at a time in submission order; different keys
 * never wait on each other.
 */

import { logger } from '@/shared/utils';

type LaneEntry = {
  run: () => Promise<void>;
  enqueuedAt: number;
};

type LaneState = {
  queue: LaneEntry[];
  active: boolean;
};

export interface KeyedMutexOptions {
  /** Log a warning when a task waited at least this long for its lane */
  warnAfterMs?: number;
}

export class KeyedMutex {
  private readonly lanes = new Map<string, LaneState>();
  private readonly warnAfterMs: number;

  constructor(options: KeyedMutexOptions = {}) {
    this.warnAfterMs = options.warnAfterMs ?? 2000;
  }

  /**
   * Run `task` once every earlier task for `key` has settled
   */
  runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const lane = this.getLane(key);
      lane.queue.push({
        enqueuedAt: Date.now(),
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
      });
      this.drain(key, lane);
    });
  }

  isLocked(key: string): boolean {
    return this.lanes.get(key)?.active ?? false;
  }

  /**
   * Number of keys with running or queued work
   */
  size(): number {
    return this.lanes.size;
  }

  private getLane(key: string): LaneState {
    const existing = this.lanes.get(key);
    if (existing) {
      return existing;
    }
    const created: LaneState = { queue: [], active: false };
    this.lanes.set(key, created);
    return created;
  }

  private drain(key: string, lane: LaneState): void {
    if (lane.active) {
      return;
    }

    const entry = lane.queue.shift();
    if (!entry) {
      if (this.lanes.get(key) === lane) {
        this.lanes.delete(key);
      }
      return;
    }

    const waitedMs = Date.now() - entry.enqueuedAt;
    if (waitedMs >= this.warnAfterMs) {
      logger.warn('Lane wait exceeded', { key, waitedMs, queueAhead: lane.queue.length });
    }

    lane.active = true;
    // run() settles the caller's promise itself and never rejects
    void entry.run().finally(() => {
      lane.active = false;
      this.drain(key, lane);
    });
  }
}
