/**
 * Playback Controller
 *
 * Owns the play queue, the live playback state and the audio player.
 * Commands from the engine become player commands; player events are
 * queued and applied one at a time, in the order the player sent them.
 */

import type {
  AudioProcessEvent,
  FailureReason,
  PlaybackState,
  PlayerStatus,
  QueueEntry,
  QueueSnapshot,
  StreamLocation,
} from '../types/index.js';
import type { AudioProcess } from './audio-process.js';
import { withDeadline } from './deadline.js';
import {
  AuthExpiredError,
  errorMessage,
  NotFoundError,
  PlaybackLaunchError,
  RateLimitedError,
  StreamResolutionError,
} from './errors.js';
import { PlaybackQueue } from './playback-queue.js';
import type { RemoteClient } from './remote-client.js';

export interface PlaybackControllerOptions {
  resolveTimeoutMs: number;
  stallTimeoutMs: number;
  /** Cached stream URLs are reused until this long before they expire */
  streamUrlExpiryMarginMs: number;
  initialVolume?: number;
  debug?: boolean;
}

export type PlaybackControllerEvent =
  | { type: 'statechange'; state: PlaybackState }
  | { type: 'queuechange'; queue: QueueSnapshot };

export type PlaybackControllerEventHandler = (event: PlaybackControllerEvent) => void;

const MAX_CACHED_STREAM_URLS = 256;

type ActiveState = Extract<PlaybackState, { status: 'loading' | 'playing' | 'paused' | 'stalled' }>;

function isActive(state: PlaybackState): state is ActiveState {
  return (
    state.status === 'loading' || state.status === 'playing' || state.status === 'paused' || state.status === 'stalled'
  );
}

type ControlEvent =
  | { type: 'player'; event: AudioProcessEvent }
  | { type: 'stall_timeout'; generation: number };

/**
 * Map a load failure to the reason shown on the failed state.
 */
export function failureReason(error: unknown): FailureReason {
  const message = errorMessage(error);
  if (error instanceof StreamResolutionError) {
    return error.reason === 'token_expired' ? { kind: 'token_expired', message } : failureReason(error.reason);
  }
  if (error instanceof AuthExpiredError) return { kind: 'auth_expired', message };
  if (error instanceof RateLimitedError) return { kind: 'rate_limited', message };
  if (error instanceof NotFoundError) return { kind: 'not_found', message };
  if (error instanceof PlaybackLaunchError) return { kind: 'launch', message };
  return { kind: 'network', message };
}

/**
 * Drives the audio player through the queue.
 *
 * Each load gets a fresh generation number, and the player echoes a tag
 * built from it on every event. Events and async results from an older
 * generation are dropped, which is how skips and stops cancel in-flight
 * work without waiting for it.
 */
export class PlaybackController {
  private state: PlaybackState = { status: 'idle' };
  private volume: number;
  private generation = 0;
  private activeTag: string | null = null;
  private loadAbort: AbortController | null = null;
  private loading: Promise<void> | null = null;
  private stallTimer: NodeJS.Timeout | null = null;
  private readonly streamUrls = new Map<string, StreamLocation>();
  private readonly inbox: ControlEvent[] = [];
  private draining = false;
  private readonly eventHandlers = new Set<PlaybackControllerEventHandler>();
  private readonly unsubscribePlayer: () => void;

  constructor(
    private readonly remote: RemoteClient,
    private readonly player: AudioProcess,
    private readonly options: PlaybackControllerOptions,
    private readonly queue: PlaybackQueue = new PlaybackQueue(),
  ) {
    this.volume = options.initialVolume ?? 100;
    this.unsubscribePlayer = player.subscribe((event) => this.dispatch({ type: 'player', event }));
  }

  // ============================================================
  // Events
  // ============================================================

  /**
   * Subscribe to state and queue changes.
   */
  on(handler: PlaybackControllerEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  private emit(event: PlaybackControllerEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (e) {
        console.error('[playback] Event handler error:', e);
      }
    }
  }

  private setState(state: PlaybackState): void {
    this.state = state;
    this.debug(`State -> ${state.status}${state.status === 'idle' ? '' : ` (${state.entry.track_id})`}`);
    this.emit({ type: 'statechange', state: this.getState() });
  }

  private emitQueue(): void {
    this.emit({ type: 'queuechange', queue: this.queue.snapshot() });
  }

  // ============================================================
  // Queue commands
  // ============================================================

  /**
   * Put a track right after the current entry and start playing it.
   */
  playNow(trackId: string): Promise<void> {
    this.queue.insertNext([trackId]);
    const entry = this.queue.advance();
    this.emitQueue();
    return entry ? this.startEntry(entry) : Promise.resolve();
  }

  enqueue(trackIds: readonly string[]): QueueEntry[] {
    const added = this.queue.append(trackIds);
    this.emitQueue();
    return added;
  }

  playNext(trackIds: readonly string[]): QueueEntry[] {
    const added = this.queue.insertNext(trackIds);
    this.emitQueue();
    return added;
  }

  /**
   * Remove a queue entry. Removing the entry being played moves playback on
   * to the entry that followed it, or stops when there is none.
   */
  async removeEntry(seq: number): Promise<void> {
    if (!this.queue.has(seq)) return;

    const wasCurrent = this.queue.current()?.seq === seq;
    this.queue.remove(seq);
    this.emitQueue();
    if (!wasCurrent) return;

    const next = this.queue.current();
    if (next && isActive(this.state)) {
      await this.startEntry(next);
    } else {
      await this.stop();
    }
  }

  async clearQueue(): Promise<void> {
    this.queue.clear();
    this.emitQueue();
    await this.stop();
  }

  queueSnapshot(): QueueSnapshot {
    return this.queue.snapshot();
  }

  // ============================================================
  // Transport commands
  // ============================================================

  /**
   * Resume if paused; otherwise (re)start the current entry, or the head of
   * the queue when nothing is current.
   */
  async play(): Promise<void> {
    if (this.state.status === 'paused') {
      await this.resume();
      return;
    }
    if (isActive(this.state)) return;

    let entry = this.queue.current();
    if (!entry) {
      entry = this.queue.advance();
      this.emitQueue();
    }
    if (entry) {
      await this.startEntry(entry);
    }
  }

  /**
   * Drop the current entry and play the next one, or stop at the end.
   */
  async skip(): Promise<void> {
    const next = this.queue.advance();
    this.emitQueue();
    if (next) {
      await this.startEntry(next);
    } else {
      await this.stop();
    }
  }

  async pause(): Promise<void> {
    if (this.state.status !== 'playing') return;
    this.setState({ status: 'paused', entry: this.state.entry });
    await this.player.pause();
  }

  async resume(): Promise<void> {
    if (this.state.status !== 'paused') return;
    this.setState({ status: 'playing', entry: this.state.entry });
    await this.player.play();
  }

  async togglePause(): Promise<void> {
    if (this.state.status === 'paused') {
      await this.resume();
    } else {
      await this.pause();
    }
  }

  /**
   * Stop playback from any state. An in-flight load is abandoned. The
   * queue and its cursor are left as they are.
   */
  async stop(): Promise<void> {
    this.invalidate();
    if (this.state.status !== 'idle') {
      this.setState({ status: 'idle' });
    }
    try {
      await this.player.stop();
    } catch (e) {
      console.warn('[playback] Failed to stop player:', errorMessage(e));
    }
  }

  async seek(offsetSec: number): Promise<void> {
    if (!isActive(this.state) || this.state.status === 'loading') return;
    await this.player.seek(Math.max(0, offsetSec));
  }

  /** Returns the volume actually applied. */
  async setVolume(percent: number): Promise<number> {
    this.volume = Math.round(Math.min(100, Math.max(0, percent)));
    await this.player.setVolume(this.volume);
    return this.volume;
  }

  getState(): PlaybackState {
    return structuredClone(this.state);
  }

  /** Number of stream locations held for reuse. */
  get cachedStreamUrls(): number {
    return this.streamUrls.size;
  }

  status(): PlayerStatus {
    return {
      state: this.getState(),
      volume: this.volume,
      queue: this.queue.snapshot(),
    };
  }

  /**
   * Resolves once the current load attempt has either reached the player
   * or failed.
   */
  settled(): Promise<void> {
    return this.loading ?? Promise.resolve();
  }

  async dispose(): Promise<void> {
    this.invalidate();
    this.unsubscribePlayer();
    this.eventHandlers.clear();
    await this.player.dispose();
  }

  // ============================================================
  // Loading
  // ============================================================

  /** Abandon any in-flight load and stop listening to the current file. */
  private invalidate(): void {
    this.generation++;
    this.activeTag = null;
    this.loadAbort?.abort();
    this.loadAbort = null;
    this.clearStallTimer();
  }

  private startEntry(entry: QueueEntry): Promise<void> {
    this.invalidate();
    const generation = this.generation;
    const tag = `${generation}:${entry.seq}`;
    const abort = new AbortController();
    this.activeTag = tag;
    this.loadAbort = abort;
    this.setState({ status: 'loading', entry });

    const attempt = this.load(entry, tag, generation, abort.signal).finally(() => {
      if (this.loading === attempt) this.loading = null;
      if (this.loadAbort === abort) this.loadAbort = null;
    });
    this.loading = attempt;
    return attempt;
  }

  private async load(entry: QueueEntry, tag: string, generation: number, signal: AbortSignal): Promise<void> {
    let location: StreamLocation;
    try {
      location = await this.resolveStream(entry.track_id, signal);
    } catch (error) {
      if (generation !== this.generation) return;
      this.fail(entry, failureReason(error));
      return;
    }
    if (generation !== this.generation) return;

    try {
      await this.player.load(location.url, tag);
      if (generation !== this.generation) {
        // Stopped while the player was loading; make sure nothing plays.
        if (this.state.status === 'idle') await this.player.stop();
        return;
      }
      await this.player.play();
    } catch (error) {
      if (generation !== this.generation) return;
      this.fail(entry, { kind: 'launch', message: errorMessage(error) });
    }
  }

  private async resolveStream(trackId: string, signal: AbortSignal): Promise<StreamLocation> {
    const cached = this.streamUrls.get(trackId);
    if (cached && cached.expires_at - this.options.streamUrlExpiryMarginMs > Date.now()) {
      return cached;
    }
    this.streamUrls.delete(trackId);

    const location = await withDeadline(
      (requestSignal) => this.remote.resolveStreamUrl(trackId, { signal: requestSignal }),
      {
        timeoutMs: this.options.resolveTimeoutMs,
        signal,
        label: `Stream resolution for ${trackId}`,
      },
    );
    if (location.expires_at <= Date.now()) {
      throw new StreamResolutionError(trackId, 'token_expired');
    }
    this.pruneStreamUrls();
    this.streamUrls.set(trackId, location);
    return location;
  }

  /** Forget locations too close to expiry to be reused, and cap the cache. */
  private pruneStreamUrls(): void {
    const now = Date.now();
    for (const [trackId, location] of this.streamUrls) {
      if (location.expires_at - this.options.streamUrlExpiryMarginMs <= now) {
        this.streamUrls.delete(trackId);
      }
    }
    while (this.streamUrls.size >= MAX_CACHED_STREAM_URLS) {
      const oldest = this.streamUrls.keys().next();
      if (oldest.done) break;
      this.streamUrls.delete(oldest.value);
    }
  }

  private fail(entry: QueueEntry, reason: FailureReason): void {
    this.clearStallTimer();
    this.activeTag = null;
    console.warn(`[playback] ${entry.track_id} failed (${reason.kind}): ${reason.message}`);
    this.setState({ status: 'failed', entry, reason });
  }

  // ============================================================
  // Event loop
  // ============================================================

  private dispatch(event: ControlEvent): void {
    this.inbox.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      for (let next = this.inbox.shift(); next; next = this.inbox.shift()) {
        try {
          this.handle(next);
        } catch (e) {
          console.error('[playback] Failed to handle event:', e);
        }
      }
    } finally {
      this.draining = false;
    }
  }

  private handle(event: ControlEvent): void {
    if (event.type === 'stall_timeout') {
      if (event.generation !== this.generation || this.state.status !== 'stalled') return;
      const entry = this.state.entry;
      this.fail(entry, {
        kind: 'stall_timeout',
        message: `Playback stalled for more than ${this.options.stallTimeoutMs} ms`,
      });
      this.player.stop().catch((e: unknown) => {
        console.warn('[playback] Failed to stop stalled player:', errorMessage(e));
      });
      return;
    }

    const playerEvent = event.event;
    if (playerEvent.tag !== null && playerEvent.tag !== this.activeTag) {
      this.debug(`Ignoring ${playerEvent.type} for stale load ${playerEvent.tag}`);
      return;
    }

    const state = this.state;
    switch (playerEvent.type) {
      case 'started':
        if (state.status === 'loading') {
          this.setState({ status: 'playing', entry: state.entry });
        }
        break;

      case 'stalled':
        if (state.status === 'playing' || state.status === 'paused') {
          this.setState({ status: 'stalled', entry: state.entry, since: Date.now() });
          this.startStallTimer();
        }
        break;

      case 'resumed':
        if (state.status === 'stalled') {
          this.clearStallTimer();
          this.setState({ status: 'playing', entry: state.entry });
        }
        break;

      case 'finished':
        if (state.status === 'playing' || state.status === 'paused' || state.status === 'stalled') {
          // A finish for an entry the queue has already moved past is stale.
          if (this.queue.current()?.seq !== state.entry.seq) return;
          this.clearStallTimer();
          this.activeTag = null;
          this.setState({ status: 'finished', entry: state.entry });
          this.advanceAfterFinish();
        }
        break;

      case 'error':
        if (isActive(state)) {
          this.fail(state.entry, {
            kind: state.status === 'loading' ? 'launch' : 'player',
            message: playerEvent.reason,
          });
        }
        break;
    }
  }

  private advanceAfterFinish(): void {
    const next = this.queue.advance();
    this.emitQueue();
    if (next) {
      // Failures land on the state; the promise itself never rejects.
      void this.startEntry(next);
    } else {
      this.setState({ status: 'idle' });
    }
  }

  private startStallTimer(): void {
    this.clearStallTimer();
    const generation = this.generation;
    this.stallTimer = setTimeout(() => {
      this.stallTimer = null;
      this.dispatch({ type: 'stall_timeout', generation });
    }, this.options.stallTimeoutMs);
  }

  private clearStallTimer(): void {
    if (this.stallTimer) {
      clearTimeout(this.stallTimer);
      this.stallTimer = null;
    }
  }

  private debug(message: string): void {
    if (this.options.debug) {
      console.debug(`[playback] ${message}`);
    }
  }
}
