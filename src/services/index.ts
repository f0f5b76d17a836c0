/**
 * Service Layer
 *
 * Core services of the library engine.
 */

export { CatalogStore } from './catalog-store.js';
export type { CatalogStoreOptions } from './catalog-store.js';
export { SyncEngine } from './sync-engine.js';
export type { SyncEngineOptions, SyncRunOptions } from './sync-engine.js';
export { PlaybackQueue } from './playback-queue.js';
export { PlaybackController, failureReason } from './playback-controller.js';
export type {
  PlaybackControllerEvent,
  PlaybackControllerEventHandler,
  PlaybackControllerOptions,
} from './playback-controller.js';
export { LibraryEngine, retryDelay } from './engine.js';
export type {
  EngineDeps,
  EngineEvent,
  EngineEventHandler,
  Notification,
  NotificationKind,
  NotificationLevel,
  SyncNowOptions,
} from './engine.js';
export { MpvProcess, MpvEventMapper, parseMpvLine } from './mpv-process.js';
export type { MpvProcessOptions } from './mpv-process.js';
export type { AudioProcess, AudioProcessListener } from './audio-process.js';
export type { RemoteClient, RequestOptions } from './remote-client.js';
export { FilePersistence, MemoryPersistence } from './persistence.js';
export type { PersistenceAdapter } from './persistence.js';
export { withDeadline, sleep } from './deadline.js';
export * from './errors.js';
