/**
 * tapedeck engine
 *
 * Library sync and playback control for a terminal music-streaming client.
 */

import { loadConfig, type ConfigOverrides } from './config.js';
import type { AudioProcess } from './services/audio-process.js';
import { CatalogStore } from './services/catalog-store.js';
import { LibraryEngine } from './services/engine.js';
import { MpvProcess } from './services/mpv-process.js';
import { FilePersistence, type PersistenceAdapter } from './services/persistence.js';
import { PlaybackController } from './services/playback-controller.js';
import type { RemoteClient } from './services/remote-client.js';
import { SyncEngine } from './services/sync-engine.js';

export * from './types/index.js';
export * from './services/index.js';
export { DEFAULT_CONFIG, configFromEnv, loadConfig, resolveConfig } from './config.js';
export type { ConfigOverrides, EngineConfig, PlaybackConfig, PlayerConfig, SyncConfig } from './config.js';

export interface CreateEngineOptions {
  /** Talks to the streaming service */
  remote: RemoteClient;
  config?: ConfigOverrides;
  /** Defaults to process.env (plus `.env`) */
  env?: NodeJS.ProcessEnv;
  /** Defaults to a file at config.storePath */
  persistence?: PersistenceAdapter;
  /** Defaults to an mpv child process */
  player?: AudioProcess;
}

/**
 * Wire up an engine with the default collaborators. Call `start()` on the
 * result before using it.
 */
export function createEngine(options: CreateEngineOptions): LibraryEngine {
  const config = loadConfig(options.config, options.env);

  const store = new CatalogStore(options.persistence ?? new FilePersistence(config.storePath), {
    debug: config.debug,
  });
  const sync = new SyncEngine(store, options.remote, {
    requestTimeoutMs: config.remote.requestTimeoutMs,
    debug: config.debug,
  });
  const player =
    options.player ??
    new MpvProcess({
      mpvPath: config.player.mpvPath,
      extraArgs: config.player.extraArgs,
      debug: config.debug,
    });
  const controller = new PlaybackController(options.remote, player, {
    resolveTimeoutMs: config.playback.resolveTimeoutMs,
    stallTimeoutMs: config.playback.stallTimeoutMs,
    streamUrlExpiryMarginMs: config.playback.streamUrlExpiryMarginMs,
    initialVolume: config.playback.initialVolume,
    debug: config.debug,
  });

  return new LibraryEngine({ store, sync, controller, config });
}
