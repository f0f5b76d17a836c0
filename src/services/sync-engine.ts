/**
 * Sync Engine
 *
 * Reconciles the Catalog Store with the remote library using per-class
 * deltas. Each page is applied and flushed before its checkpoint advances,
 * so an interrupted sync can always be replayed from the stored checkpoint.
 */

import type { ClassSyncResult, EntityClass, EntityDelta, SyncMode } from '../types/index.js';
import { ENTITY_CLASSES } from '../types/index.js';
import type { CatalogStore } from './catalog-store.js';
import { withDeadline } from './deadline.js';
import { CancelledError, StoreWriteError, SyncFailedError, toRemoteError } from './errors.js';
import type { RemoteClient } from './remote-client.js';

export interface SyncEngineOptions {
  /** Upper bound on each delta request */
  requestTimeoutMs: number;
  debug?: boolean;
}

export interface SyncRunOptions {
  /** Aborting stops the sync before the next page is applied */
  signal?: AbortSignal;
}

/**
 * Service for syncing the catalog.
 *
 * Syncs of one entity class run one at a time, in call order; different
 * classes sync concurrently. Failures are not retried here: callers can
 * re-issue a sync safely because applying a delta twice changes nothing.
 */
export class SyncEngine {
  // Per-class tail of the sync chain.
  private readonly lanes = new Map<EntityClass, Promise<void>>();

  constructor(
    private readonly store: CatalogStore,
    private readonly remote: RemoteClient,
    private readonly options: SyncEngineOptions,
  ) {}

  /**
   * Fetch and apply changes to one class since its stored checkpoint.
   */
  syncIncremental(entityClass: EntityClass, options: SyncRunOptions = {}): Promise<ClassSyncResult> {
    return this.enqueue(entityClass, () => this.run(entityClass, 'incremental', options.signal));
  }

  /**
   * Fetch one class from scratch, ignoring the stored checkpoint.
   */
  syncFull(entityClass: EntityClass, options: SyncRunOptions = {}): Promise<ClassSyncResult> {
    return this.enqueue(entityClass, () => this.run(entityClass, 'full', options.signal));
  }

  /**
   * Full sync of every class. Used on first run and to rebuild a corrupt store.
   */
  syncAll(options: SyncRunOptions = {}): Promise<ClassSyncResult[]> {
    return this.syncClasses(ENTITY_CLASSES, 'full', options);
  }

  /**
   * Run the given classes concurrently. Every class is allowed to finish;
   * the first real failure (or a cancellation, if nothing else failed) is
   * thrown afterwards.
   */
  async syncClasses(
    entityClasses: readonly EntityClass[],
    mode: SyncMode,
    options: SyncRunOptions = {},
  ): Promise<ClassSyncResult[]> {
    const settled = await Promise.allSettled(
      entityClasses.map((entityClass) =>
        mode === 'full' ? this.syncFull(entityClass, options) : this.syncIncremental(entityClass, options),
      ),
    );

    const results: ClassSyncResult[] = [];
    let cancelled: unknown = null;
    let failure: unknown = null;
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else if (outcome.reason instanceof CancelledError) {
        cancelled ??= outcome.reason;
      } else {
        failure ??= outcome.reason;
      }
    }

    if (failure !== null) throw failure;
    if (cancelled !== null) throw cancelled;
    return results;
  }

  /** Whether a sync of the class is running or waiting. */
  isSyncing(entityClass: EntityClass): boolean {
    return this.lanes.has(entityClass);
  }

  private enqueue(entityClass: EntityClass, task: () => Promise<ClassSyncResult>): Promise<ClassSyncResult> {
    const previous = this.lanes.get(entityClass) ?? Promise.resolve();
    const next = previous.then(task);
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.lanes.set(entityClass, tail);

    // Prune the lane once it drains so the map does not grow.
    void tail.then(() => {
      if (this.lanes.get(entityClass) === tail) {
        this.lanes.delete(entityClass);
      }
    });

    return next;
  }

  private async run(entityClass: EntityClass, mode: SyncMode, signal?: AbortSignal): Promise<ClassSyncResult> {
    const stored = this.store.checkpoint(entityClass)?.cursor ?? null;
    const result: ClassSyncResult = {
      entityClass,
      mode,
      pages: 0,
      inserted: 0,
      updated: 0,
      unchanged: 0,
      removed: 0,
      checkpoint: stored,
    };

    let cursor = mode === 'full' ? null : stored;
    this.debug(`Starting ${mode} sync of ${entityClass} from ${cursor ?? 'the beginning'}`);

    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError(`Sync of ${entityClass} cancelled`);
      }

      const delta = await this.fetchDelta(entityClass, cursor, signal);

      // A cancel that lands during the request stops before anything is applied.
      if (signal?.aborted) {
        throw new CancelledError(`Sync of ${entityClass} cancelled`);
      }

      const applied = this.store.upsert(entityClass, delta.entities);
      const removed = this.store.remove(entityClass, delta.removed_ids);
      try {
        await this.store.flush();
        await this.store.advanceCheckpoint(entityClass, delta.checkpoint);
      } catch (error) {
        throw new StoreWriteError(entityClass, error);
      }

      result.pages++;
      result.inserted += applied.inserted;
      result.updated += applied.updated;
      result.unchanged += applied.unchanged;
      result.removed += removed;
      result.checkpoint = delta.checkpoint;

      if (!delta.has_more) break;
      cursor = delta.checkpoint;
    }

    this.debug(
      `Synced ${entityClass}: ${result.inserted} new, ${result.updated} changed, ${result.removed} removed in ${result.pages} page(s)`,
    );
    return result;
  }

  private async fetchDelta(
    entityClass: EntityClass,
    cursor: string | null,
    signal: AbortSignal | undefined,
  ): Promise<EntityDelta<EntityClass>> {
    try {
      return await withDeadline(
        (requestSignal) => this.remote.fetchDelta(entityClass, cursor, { signal: requestSignal }),
        {
          timeoutMs: this.options.requestTimeoutMs,
          signal,
          label: `Delta request for ${entityClass}`,
        },
      );
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      throw new SyncFailedError(entityClass, toRemoteError(error));
    }
  }

  private debug(message: string): void {
    if (this.options.debug) {
      console.debug(`[sync] ${message}`);
    }
  }
}
