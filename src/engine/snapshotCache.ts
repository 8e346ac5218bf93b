import { debugLog } from '@utils/debug';

export type Clock = () => number;

export type SnapshotCacheOptions = {
  ttlMs: number;
  clock?: Clock;
};

type Entry<T> = {
  value: T;
  loadedAt: number;
};

export type SnapshotReadOptions = {
  refresh?: boolean;
};

/**
 * Holds one snapshot with a time-to-live. Concurrent readers that find it stale
 * share a single in-flight load, and the snapshot is replaced as a whole only
 * when that load succeeds; a failed load leaves the previous snapshot in place
 * and rejects for the callers that were waiting on it.
 */
export class SnapshotCache<T> {
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private entry: Entry<T> | null = null;
  private inFlight: Promise<T> | null = null;
  private generation = 0;

  constructor(options: SnapshotCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs < 0) {
      throw new RangeError(`ttlMs must be a non-negative number, received ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
  }

  peek(): T | null {
    return this.entry?.value ?? null;
  }

  isFresh(): boolean {
    if (!this.entry) {
      return false;
    }
    return this.clock() - this.entry.loadedAt < this.ttlMs;
  }

  async get(load: () => Promise<T>, options?: SnapshotReadOptions): Promise<T> {
    if (!options?.refresh && this.entry && this.isFresh()) {
      return this.entry.value;
    }
    return this.refresh(load);
  }

  refresh(load: () => Promise<T>): Promise<T> {
    if (this.inFlight) {
      debugLog('snapshotCache.join-refresh');
      return this.inFlight;
    }
    const generation = this.generation;
    const pending = load().then(
      (value) => {
        if (generation === this.generation) {
          this.entry = { value, loadedAt: this.clock() };
        }
        debugLog('snapshotCache.refreshed', { generation });
        return value;
      },
      (error: unknown) => {
        debugLog('snapshotCache.refresh-failed', () => ({
          reason: error instanceof Error ? error.message : String(error),
          keptPrevious: this.entry !== null,
        }));
        throw error;
      },
    );
    const tracked = pending.finally(() => {
      if (this.inFlight === tracked) {
        this.inFlight = null;
      }
    });
    this.inFlight = tracked;
    return tracked;
  }

  invalidate(): void {
    this.generation += 1;
    this.entry = null;
    this.inFlight = null;
  }
}
