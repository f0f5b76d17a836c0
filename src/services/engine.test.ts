import { beforeEach, describe, expect, it, vi } from 'vitest';
import { resolveConfig } from '../config.js';
import { FakeAudioProcess } from '../testing/fake-audio-process.js';
import { FakeRemoteClient } from '../testing/fake-remote.js';
import { makeAlbum, makeDelta, makeTrack } from '../testing/fixtures.js';
import { CatalogStore } from './catalog-store.js';
import { LibraryEngine, retryDelay, type EngineEvent, type Notification } from './engine.js';
import { AuthExpiredError, NetworkError, NotFoundError, RateLimitedError, SyncFailedError } from './errors.js';
import { MemoryPersistence } from './persistence.js';
import { PlaybackController } from './playback-controller.js';
import { SyncEngine } from './sync-engine.js';

interface SetupOptions {
  blob?: string | null;
  autoSkip?: boolean;
  maxAttempts?: number;
}

function setup(options: SetupOptions = {}) {
  const config = resolveConfig({
    sync: { maxAttempts: options.maxAttempts ?? 3, baseDelayMs: 1, maxDelayMs: 4 },
    playback: { resolveTimeoutMs: 50, stallTimeoutMs: 1000, autoSkipOnFailure: options.autoSkip ?? true },
  });
  const persistence = new MemoryPersistence(options.blob ?? null);
  const store = new CatalogStore(persistence);
  const remote = new FakeRemoteClient();
  const player = new FakeAudioProcess({ autoStart: true });
  const sync = new SyncEngine(store, remote, { requestTimeoutMs: 100 });
  const controller = new PlaybackController(remote, player, config.playback);
  const engine = new LibraryEngine({ store, sync, controller, config });

  const events: EngineEvent[] = [];
  engine.on((event) => events.push(event));

  return {
    store,
    remote,
    player,
    engine,
    events,
    notifications: (): Notification[] => events.flatMap((e) => (e.type === 'error' ? [e.notification] : [])),
    syncStates: (): string[] => events.flatMap((e) => (e.type === 'syncStatus' ? [e.status.state] : [])),
    playbackStates: (): string[] =>
      events.flatMap((e) => (e.type === 'playbackStateChanged' ? [e.state.status] : [])),
  };
}

async function persistedLibrary(): Promise<string | null> {
  const persistence = new MemoryPersistence();
  const store = new CatalogStore(persistence);
  store.upsert('tracks', [makeTrack('t1')]);
  await store.advanceCheckpoint('tracks', 'C1');
  return persistence.current;
}

describe('LibraryEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('start', () => {
    it('runs a full sync on first run', async () => {
      const { remote, engine, syncStates } = setup();
      remote.queueDelta('tracks', makeDelta([makeTrack('t1'), makeTrack('t2'), makeTrack('t3')], 'C1'));

      await engine.start();

      expect(engine.libraryStats().tracks).toBe(3);
      expect(remote.deltaCalls.every((call) => call.checkpoint === null)).toBe(true);
      expect(syncStates()).toEqual(['syncing', 'synced']);
    });

    it('reports a corrupt catalog once and rebuilds it', async () => {
      const { remote, engine, notifications } = setup({ blob: '{oops' });
      remote.queueDelta('tracks', makeDelta([makeTrack('t1')], 'C1'));

      await engine.start();

      const reported = notifications();
      expect(reported).toHaveLength(1);
      expect(reported[0]).toMatchObject({ level: 'warning', kind: 'corrupt_store' });
      expect(reported[0].message).toMatch(/^Local library could not be read and will be rebuilt: /);
      expect(engine.getTrack('t1')?.title).toBe('Track t1');
      expect(engine.syncStatus().state).toBe('synced');
    });

    it('serves the cached catalog and syncs incrementally in the background', async () => {
      const { remote, engine } = setup({ blob: await persistedLibrary() });

      await engine.start();
      expect(engine.getTrack('t1')).not.toBeNull();

      await engine.settled();
      expect(remote.deltaCalls).toContainEqual({ entityClass: 'tracks', checkpoint: 'C1' });
      expect(engine.syncStatus().state).toBe('synced');
    });

    it('applies the configured volume', async () => {
      const { player, engine } = setup();

      await engine.start();

      expect(player.commands[0]).toBe('volume 100');
    });
  });

  describe('syncNow', () => {
    it('retries a transient failure and reports the run as degraded meanwhile', async () => {
      const { remote, engine, syncStates, notifications } = setup();
      remote.queueDelta('tracks', new NetworkError('connection reset'), makeDelta([makeTrack('t1')], 'C1'));

      const status = await engine.syncNow();

      expect(status.state).toBe('synced');
      expect(syncStates()).toEqual(['syncing', 'degraded', 'syncing', 'synced']);
      expect(notifications()).toEqual([]);
      expect(remote.deltaCalls.filter((call) => call.entityClass === 'albums')).toHaveLength(1);
      expect(engine.getTrack('t1')).not.toBeNull();
    });

    it('includes the retry delay in the degraded status', async () => {
      const { remote, engine, events } = setup();
      remote.queueDelta('tracks', new NetworkError('connection reset'));

      await engine.syncNow();

      const degraded = events.find((e) => e.type === 'syncStatus' && e.status.state === 'degraded');
      expect(degraded).toEqual({
        type: 'syncStatus',
        status: {
          state: 'degraded',
          attempt: 1,
          nextRetryMs: 1,
          message: 'Sync of tracks failed: connection reset',
        },
      });
    });

    it('does not retry an expired session and notifies exactly once', async () => {
      const { remote, engine, syncStates, notifications } = setup();
      remote.queueDelta('tracks', new AuthExpiredError('token revoked'));

      const status = await engine.syncNow();

      expect(status).toEqual({ state: 'failed', message: 'Library sync failed: Sync of tracks failed: token revoked' });
      expect(syncStates()).toEqual(['syncing', 'failed']);
      expect(notifications()).toEqual([
        {
          level: 'error',
          kind: 'auth_expired',
          message: 'Library sync failed: Sync of tracks failed: token revoked',
          requiresReauth: true,
        },
      ]);
      expect(remote.deltaCalls.filter((call) => call.entityClass === 'tracks')).toHaveLength(1);
    });

    it('gives up after the attempt cap with a single notification', async () => {
      const { remote, engine, syncStates, notifications } = setup({ maxAttempts: 3 });
      remote.queueDelta('tracks', new NetworkError('down'), new NetworkError('down'), new NetworkError('down'));

      const status = await engine.syncNow();

      expect(status.state).toBe('failed');
      expect(syncStates()).toEqual(['syncing', 'degraded', 'syncing', 'degraded', 'syncing', 'failed']);
      expect(notifications()).toEqual([
        {
          level: 'error',
          kind: 'network',
          message: 'Library sync failed after 3 attempts: Sync of tracks failed: down',
          requiresReauth: false,
        },
      ]);
    });

    it('reports a local write failure as a storage problem without retrying', async () => {
      const { store, engine, syncStates, notifications } = setup();
      vi.spyOn(store, 'flush').mockRejectedValue(new Error('disk full'));

      const status = await engine.syncNow();

      expect(status).toEqual({ state: 'failed', message: 'Library sync failed: Could not save tracks locally: disk full' });
      expect(syncStates()).toEqual(['syncing', 'failed']);
      expect(notifications()).toEqual([
        {
          level: 'error',
          kind: 'store_write',
          message: 'Library sync failed: Could not save tracks locally: disk full',
          requiresReauth: false,
        },
      ]);
    });

    it('resolves as cancelled without a notification', async () => {
      const { remote, engine, notifications } = setup();
      remote.queueDelta('tracks', 'hang');

      const running = engine.syncNow();
      engine.cancelSync();

      expect(await running).toEqual({ state: 'cancelled' });
      expect(notifications()).toEqual([]);
    });

    it('joins a sync that is already running', async () => {
      const { engine } = setup();

      const first = engine.syncNow();
      const second = engine.syncNow();

      expect(second).toBe(first);
      await first;
    });
  });

  describe('retryDelay', () => {
    const config = { maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 30_000 };

    it('doubles from the base delay up to the cap', () => {
      expect(retryDelay(1, config)).toBe(500);
      expect(retryDelay(4, config)).toBe(4000);
      expect(retryDelay(10, config)).toBe(30_000);
    });

    it('waits at least as long as a rate limit asks', () => {
      const error = new SyncFailedError('tracks', new RateLimitedError('slow down', 45_000));

      expect(retryDelay(1, config, error)).toBe(45_000);
    });
  });

  describe('playback', () => {
    it('plays a track from an empty queue', async () => {
      const { store, engine, playbackStates } = setup();
      store.upsert('tracks', [makeTrack('tX')]);

      await engine.playNow('tX');

      expect(engine.queue()).toEqual({ entries: [{ seq: 1, track_id: 'tX' }], current_seq: 1 });
      expect(playbackStates()).toEqual(['loading', 'playing']);
    });

    it('refuses a track that is not in the library', async () => {
      const { player, engine, notifications } = setup();

      await engine.playNow('nope');

      expect(notifications()).toEqual([
        { level: 'warning', kind: 'not_found', message: 'Track nope is not in the library', trackId: 'nope' },
      ]);
      expect(player.commands).toEqual([]);
    });

    it('reports a failed track and skips to the next entry', async () => {
      const { store, remote, engine, notifications } = setup();
      store.upsert('tracks', [makeTrack('t1'), makeTrack('t2')]);
      remote.setStream('t1', new NotFoundError('gone'));
      engine.enqueue(['t2']);

      await engine.playNow('t1');
      await engine.settled();

      expect(notifications()).toEqual([
        {
          level: 'error',
          kind: 'not_found',
          message: 'Could not play "Track t1": gone',
          trackId: 't1',
          requiresReauth: false,
          skipped: true,
        },
      ]);
      expect(engine.playbackState()).toEqual({ status: 'playing', entry: { seq: 1, track_id: 't2' } });
    });

    it('stays on a track that failed because the session expired', async () => {
      const { store, remote, engine, notifications } = setup();
      store.upsert('tracks', [makeTrack('t1'), makeTrack('t2')]);
      remote.setStream('t1', new AuthExpiredError('session expired'));
      engine.enqueue(['t2']);

      await engine.playNow('t1');
      await engine.settled();

      expect(notifications()).toMatchObject([{ kind: 'auth_expired', requiresReauth: true, skipped: false }]);
      expect(engine.playbackState().status).toBe('failed');
    });

    it('does not skip when auto-skip is off', async () => {
      const { store, remote, engine, notifications } = setup({ autoSkip: false });
      store.upsert('tracks', [makeTrack('t1'), makeTrack('t2')]);
      remote.setStream('t1', new NotFoundError('gone'));
      engine.enqueue(['t2']);

      await engine.playNow('t1');
      await engine.settled();

      expect(notifications()).toMatchObject([{ kind: 'not_found', skipped: false }]);
      expect(engine.playbackState().status).toBe('failed');
    });

    it('plays a whole album in order', async () => {
      const { store, engine } = setup();
      store.upsert('tracks', [makeTrack('t1'), makeTrack('t2'), makeTrack('t3')]);
      store.upsert('albums', [makeAlbum('al1', ['t2', 't3', 't1'])]);

      await engine.playCollection('albums', 'al1');

      expect(engine.queue().entries.map((entry) => entry.track_id)).toEqual(['t2', 't3', 't1']);
      expect(engine.playbackState()).toMatchObject({ status: 'playing', entry: { track_id: 't2' } });
    });

    it('drops unknown ids when enqueueing', () => {
      const { store, engine } = setup();
      store.upsert('tracks', [makeTrack('t1')]);

      expect(engine.enqueue(['t1', 'ghost'])).toEqual([{ seq: 1, track_id: 't1' }]);
    });

    it('shuts the player down', async () => {
      const { player, engine } = setup();

      await engine.shutdown();

      expect(player.disposed).toBe(true);
    });
  });
});
