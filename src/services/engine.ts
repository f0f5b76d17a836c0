/**
 * Engine Facade
 *
 * The one object the UI talks to. Reads go straight to the catalog;
 * playback commands funnel through the Playback Controller; syncs run
 * through the Sync Engine with bounded retry. Every failure the user
 * should hear about leaves here as exactly one notification.
 */

import type { EngineConfig } from '../config.js';
import type {
  Album,
  Artist,
  CatalogFilter,
  CatalogStats,
  ClassSyncResult,
  EntityClass,
  FailureKind,
  PlaybackState,
  PlayerStatus,
  Playlist,
  QueueEntry,
  QueueSnapshot,
  SearchResult,
  SyncMode,
  SyncStatus,
  Track,
} from '../types/index.js';
import { ENTITY_CLASSES } from '../types/index.js';
import type { CatalogStore } from './catalog-store.js';
import { sleep } from './deadline.js';
import {
  CancelledError,
  CorruptStoreError,
  errorMessage,
  isRetryable,
  RateLimitedError,
  StoreWriteError,
  SyncFailedError,
} from './errors.js';
import type { PlaybackController } from './playback-controller.js';
import type { SyncEngine } from './sync-engine.js';

// ============================================================
// Notifications and events
// ============================================================

export type NotificationLevel = 'info' | 'warning' | 'error';

export type NotificationKind = FailureKind | 'corrupt_store' | 'store_write';

export interface Notification {
  level: NotificationLevel;
  kind: NotificationKind;
  message: string;
  /** Set for playback failures */
  trackId?: string;
  /** The user has to sign in again before anything else will work */
  requiresReauth?: boolean;
  /** Playback moved on to the next queue entry */
  skipped?: boolean;
}

export type EngineEvent =
  | { type: 'syncStatus'; status: SyncStatus }
  | { type: 'playbackStateChanged'; state: PlaybackState }
  | { type: 'queueChanged'; queue: QueueSnapshot }
  | { type: 'error'; notification: Notification };

export type EngineEventHandler = (event: EngineEvent) => void;

export interface SyncNowOptions {
  /** Ignore stored checkpoints and fetch everything */
  full?: boolean;
  signal?: AbortSignal;
}

export interface EngineDeps {
  store: CatalogStore;
  sync: SyncEngine;
  controller: PlaybackController;
  config: EngineConfig;
}

/** Kind reported for a failed sync, taken from the remote failure. */
function syncFailureKind(error: unknown): NotificationKind {
  if (error instanceof StoreWriteError) return 'store_write';
  return error instanceof SyncFailedError ? error.reason.kind : 'network';
}

/**
 * Delay before retry number `attempt` (1-based): doubles from the base,
 * capped, but never shorter than a rate limit asked for.
 */
export function retryDelay(attempt: number, config: EngineConfig['sync'], error?: unknown): number {
  const backoff = Math.min(config.maxDelayMs, config.baseDelayMs * 2 ** (attempt - 1));
  const reason = error instanceof SyncFailedError ? error.reason : error;
  if (reason instanceof RateLimitedError && reason.retryAfterMs !== undefined) {
    return Math.max(backoff, reason.retryAfterMs);
  }
  return backoff;
}

/**
 * Library engine: search, play, skip and sync for the UI.
 */
export class LibraryEngine {
  private readonly store: CatalogStore;
  private readonly sync: SyncEngine;
  private readonly controller: PlaybackController;
  private readonly config: EngineConfig;
  private readonly eventHandlers = new Set<EngineEventHandler>();

  private currentSyncStatus: SyncStatus = { state: 'idle' };
  private activeSync: Promise<SyncStatus> | null = null;
  private syncAbort: AbortController | null = null;
  private pendingSkip: Promise<void> | null = null;

  constructor(deps: EngineDeps) {
    this.store = deps.store;
    this.sync = deps.sync;
    this.controller = deps.controller;
    this.config = deps.config;

    this.controller.on((event) => {
      if (event.type === 'queuechange') {
        this.emit({ type: 'queueChanged', queue: event.queue });
        return;
      }
      this.emit({ type: 'playbackStateChanged', state: event.state });
      if (event.state.status === 'failed') {
        this.handleTrackFailure(event.state);
      }
    });
  }

  /**
   * Subscribe to engine events.
   */
  on(handler: EngineEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (e) {
        console.error('[engine] Event handler error:', e);
      }
    }
  }

  private notify(notification: Notification): void {
    const log = notification.level === 'error' ? console.error : console.warn;
    log(`[engine] ${notification.message}`);
    this.emit({ type: 'error', notification });
  }

  // ============================================================
  // Lifecycle
  // ============================================================

  /**
   * Load the local catalog and bring it up to date.
   *
   * An unreadable catalog is reported once, wiped and rebuilt with a full
   * sync; so is an empty one (first run). Otherwise the catalog is usable
   * straight away and an incremental sync runs in the background.
   */
  async start(): Promise<void> {
    await this.controller.setVolume(this.config.playback.initialVolume);

    try {
      await this.store.load();
    } catch (error) {
      if (!(error instanceof CorruptStoreError)) throw error;
      this.notify({
        level: 'warning',
        kind: 'corrupt_store',
        message: `Local library could not be read and will be rebuilt: ${error.message}`,
      });
      this.store.reset();
      await this.syncNow({ full: true });
      return;
    }

    if (this.store.isEmpty()) {
      await this.syncNow({ full: true });
      return;
    }

    // Never rejects; shutdown() and settled() wait on it.
    void this.syncNow();
  }

  /**
   * Cancel any sync, stop playback and terminate the player.
   */
  async shutdown(): Promise<void> {
    this.cancelSync();
    await this.activeSync;
    await this.pendingSkip;
    await this.controller.stop();
    await this.controller.dispose();
    this.eventHandlers.clear();
  }

  /**
   * Resolves once background work started so far (sync, auto-skip, track
   * load) has finished.
   */
  async settled(): Promise<void> {
    await this.activeSync;
    await this.pendingSkip;
    await this.controller.settled();
  }

  // ============================================================
  // Catalog
  // ============================================================

  search(text: string, limit?: number): SearchResult[] {
    return this.store.search(text, limit);
  }

  tracks(filter?: CatalogFilter): Track[] {
    return this.store.query('tracks', filter);
  }

  albums(filter?: CatalogFilter): Album[] {
    return this.store.query('albums', filter);
  }

  artists(filter?: CatalogFilter): Artist[] {
    return this.store.query('artists', filter);
  }

  playlists(filter?: CatalogFilter): Playlist[] {
    return this.store.query('playlists', filter);
  }

  /** Tracks of an album, artist or playlist, in order. */
  tracksIn(entityClass: 'albums' | 'artists' | 'playlists', id: string): Track[] {
    return this.store.members(entityClass, id);
  }

  getTrack(id: string): Track | null {
    return this.store.get('tracks', id);
  }

  libraryStats(): CatalogStats {
    return this.store.stats();
  }

  // ============================================================
  // Playback
  // ============================================================

  /**
   * Queue a track right after the current one and play it.
   */
  async playNow(trackId: string): Promise<void> {
    if (!this.store.has('tracks', trackId)) {
      this.notify({
        level: 'warning',
        kind: 'not_found',
        message: `Track ${trackId} is not in the library`,
        trackId,
      });
      return;
    }
    await this.controller.playNow(trackId);
  }

  /**
   * Play an album, artist or playlist from its first track; the rest is
   * queued right behind it.
   */
  async playCollection(entityClass: 'albums' | 'artists' | 'playlists', id: string): Promise<void> {
    const [first, ...rest] = this.store.members(entityClass, id);
    if (!first) {
      this.notify({
        level: 'warning',
        kind: 'not_found',
        message: `Nothing to play in ${entityClass.slice(0, -1)} ${id}`,
      });
      return;
    }

    const started = this.controller.playNow(first.id);
    this.controller.playNext(rest.map((track) => track.id));
    await started;
  }

  /** Append tracks to the queue. Ids not in the library are skipped. */
  enqueue(trackIds: readonly string[]): QueueEntry[] {
    return this.controller.enqueue(this.knownTracks(trackIds));
  }

  /** Insert tracks right after the current one. */
  playNext(trackIds: readonly string[]): QueueEntry[] {
    return this.controller.playNext(this.knownTracks(trackIds));
  }

  removeFromQueue(seq: number): Promise<void> {
    return this.controller.removeEntry(seq);
  }

  clearQueue(): Promise<void> {
    return this.controller.clearQueue();
  }

  play(): Promise<void> {
    return this.controller.play();
  }

  skip(): Promise<void> {
    return this.controller.skip();
  }

  pause(): Promise<void> {
    return this.controller.pause();
  }

  resume(): Promise<void> {
    return this.controller.resume();
  }

  togglePause(): Promise<void> {
    return this.controller.togglePause();
  }

  stop(): Promise<void> {
    return this.controller.stop();
  }

  seek(offsetSec: number): Promise<void> {
    return this.controller.seek(offsetSec);
  }

  setVolume(percent: number): Promise<number> {
    return this.controller.setVolume(percent);
  }

  playbackState(): PlaybackState {
    return this.controller.getState();
  }

  playerStatus(): PlayerStatus {
    return this.controller.status();
  }

  queue(): QueueSnapshot {
    return this.controller.queueSnapshot();
  }

  private knownTracks(trackIds: readonly string[]): string[] {
    return trackIds.filter((id) => {
      const known = this.store.has('tracks', id);
      if (!known) this.debug(`Skipping unknown track ${id}`);
      return known;
    });
  }

  /**
   * Report a failed track once, and move on if allowed. An expired session
   * would fail every following track too, so it never auto-skips.
   */
  private handleTrackFailure(state: Extract<PlaybackState, { status: 'failed' }>): void {
    const { entry, reason } = state;
    const hasNext = this.controller.queueSnapshot().entries.some((queued) => queued.seq !== entry.seq);
    const skip = this.config.playback.autoSkipOnFailure && reason.kind !== 'auth_expired' && hasNext;
    const title = this.store.get('tracks', entry.track_id)?.title ?? entry.track_id;

    this.notify({
      level: 'error',
      kind: reason.kind,
      message: `Could not play "${title}": ${reason.message}`,
      trackId: entry.track_id,
      requiresReauth: reason.kind === 'auth_expired',
      skipped: skip,
    });

    if (!skip) return;

    // Let the failing load unwind before the next one starts.
    const skipping = Promise.resolve()
      .then(() => this.controller.skip())
      .catch((e: unknown) => {
        console.error('[engine] Auto-skip failed:', e);
      })
      .finally(() => {
        if (this.pendingSkip === skipping) this.pendingSkip = null;
      });
    this.pendingSkip = skipping;
  }

  // ============================================================
  // Sync
  // ============================================================

  syncStatus(): SyncStatus {
    return this.currentSyncStatus;
  }

  /**
   * Sync every entity class, retrying transient failures with exponential
   * backoff. Resolves with the final status and never rejects. A call made
   * while a sync is running joins that sync.
   */
  syncNow(options: SyncNowOptions = {}): Promise<SyncStatus> {
    if (this.activeSync) return this.activeSync;

    const abort = new AbortController();
    const onAbort = (): void => abort.abort();
    if (options.signal?.aborted) abort.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const run = this.runSync(options.full ? 'full' : 'incremental', abort.signal).finally(() => {
      options.signal?.removeEventListener('abort', onAbort);
      if (this.activeSync === run) {
        this.activeSync = null;
        this.syncAbort = null;
      }
    });
    this.activeSync = run;
    this.syncAbort = abort;
    return run;
  }

  /** Stop the running sync before its next page is applied. */
  cancelSync(): void {
    this.syncAbort?.abort();
  }

  private async runSync(mode: SyncMode, signal: AbortSignal): Promise<SyncStatus> {
    const { maxAttempts } = this.config.sync;
    const results: ClassSyncResult[] = [];
    let pending: EntityClass[] = [...ENTITY_CLASSES];

    for (let attempt = 1; ; attempt++) {
      this.setSyncStatus({ state: 'syncing', mode, attempt });

      const classes = pending;
      const settled = await Promise.allSettled(
        classes.map((entityClass) =>
          mode === 'full'
            ? this.sync.syncFull(entityClass, { signal })
            : this.sync.syncIncremental(entityClass, { signal }),
        ),
      );

      const failed: EntityClass[] = [];
      let cancelled = false;
      let failure: unknown = null;
      let fatal: unknown = null;
      for (const [index, outcome] of settled.entries()) {
        if (outcome.status === 'fulfilled') {
          results.push(outcome.value);
        } else if (outcome.reason instanceof CancelledError) {
          cancelled = true;
        } else {
          failed.push(classes[index]);
          failure ??= outcome.reason;
          if (!isRetryable(outcome.reason)) fatal ??= outcome.reason;
        }
      }

      if (cancelled || signal.aborted) {
        return this.setSyncStatus({ state: 'cancelled' });
      }
      if (failed.length === 0) {
        return this.setSyncStatus({ state: 'synced', results, at: Date.now() });
      }

      const terminal = fatal ?? (attempt >= maxAttempts ? failure : null);
      if (terminal !== null) {
        const kind = syncFailureKind(terminal);
        const message =
          attempt > 1
            ? `Library sync failed after ${attempt} attempts: ${errorMessage(terminal)}`
            : `Library sync failed: ${errorMessage(terminal)}`;
        this.notify({ level: 'error', kind, message, requiresReauth: kind === 'auth_expired' });
        return this.setSyncStatus({ state: 'failed', message });
      }

      const delay = retryDelay(attempt, this.config.sync, failure);
      this.setSyncStatus({ state: 'degraded', attempt, nextRetryMs: delay, message: errorMessage(failure) });
      try {
        await sleep(delay, signal);
      } catch (error) {
        if (error instanceof CancelledError) return this.setSyncStatus({ state: 'cancelled' });
        throw error;
      }
      pending = failed;
    }
  }

  private setSyncStatus(status: SyncStatus): SyncStatus {
    this.currentSyncStatus = status;
    this.debug(`Sync ${status.state}`);
    this.emit({ type: 'syncStatus', status });
    return status;
  }

  private debug(message: string): void {
    if (this.config.debug) {
      console.debug(`[engine] ${message}`);
    }
  }
}
