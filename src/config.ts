/**
 * Engine Configuration
 *
 * Tunables for sync retry, playback timeouts and the player process.
 * Values come from DEFAULT_CONFIG, overridden by TAPEDECK_* environment
 * variables (a `.env` file is honoured), overridden by explicit options.
 */

import os from 'node:os';
import path from 'node:path';
import * as dotenv from 'dotenv';

export interface SyncConfig {
  /** Attempts per syncNow() call, including the first */
  maxAttempts: number;
  /** Delay before the first retry; doubles on each further retry */
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface PlaybackConfig {
  resolveTimeoutMs: number;
  /** How long a stall may last before the track is failed */
  stallTimeoutMs: number;
  /** Move on to the next queue entry when a track fails */
  autoSkipOnFailure: boolean;
  /** Resolved stream URLs are reused until this long before they expire */
  streamUrlExpiryMarginMs: number;
  /** Volume 0 - 100 applied to the player at start-up */
  initialVolume: number;
}

export interface PlayerConfig {
  mpvPath: string;
  extraArgs: string[];
}

export interface EngineConfig {
  /** Where the catalog blob is persisted */
  storePath: string;
  /** Write debug logging to the console */
  debug: boolean;
  remote: {
    /** Upper bound on a single delta request */
    requestTimeoutMs: number;
  };
  sync: SyncConfig;
  playback: PlaybackConfig;
  player: PlayerConfig;
}

export const DEFAULT_CONFIG: EngineConfig = {
  storePath: path.join(os.homedir(), '.tapedeck', 'library.json'),
  debug: false,
  remote: {
    requestTimeoutMs: 15_000,
  },
  sync: {
    maxAttempts: 5,
    baseDelayMs: 500,
    maxDelayMs: 30_000,
  },
  playback: {
    resolveTimeoutMs: 10_000,
    stallTimeoutMs: 20_000,
    autoSkipOnFailure: true,
    streamUrlExpiryMarginMs: 5 * 60 * 1000,
    initialVolume: 100,
  },
  player: {
    mpvPath: 'mpv',
    extraArgs: [],
  },
};

export interface ConfigOverrides {
  storePath?: string;
  debug?: boolean;
  remote?: Partial<EngineConfig['remote']>;
  sync?: Partial<SyncConfig>;
  playback?: Partial<PlaybackConfig>;
  player?: Partial<PlayerConfig>;
}

/** Deep copy of `base`, replacing each field the patch defines. */
function merge<T extends object>(base: T, patch?: Partial<T>): T {
  const result = structuredClone(base);
  if (!patch) return result;
  for (const key in base) {
    const value = patch[key];
    if (value !== undefined) result[key] = structuredClone(value);
  }
  return result;
}

/**
 * Merge partial overrides over a base configuration, section by section.
 * Undefined fields leave the base value in place.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, base: EngineConfig = DEFAULT_CONFIG): EngineConfig {
  return {
    storePath: overrides.storePath ?? base.storePath,
    debug: overrides.debug ?? base.debug,
    remote: merge(base.remote, overrides.remote),
    sync: merge(base.sync, overrides.sync),
    playback: merge(base.playback, overrides.playback),
    player: merge(base.player, overrides.player),
  };
}

function readInt(value: string | undefined, min = 0): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) return undefined;
  return parsed;
}

function readBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return undefined;
}

function expandHome(value: string): string {
  return value === '~' || value.startsWith('~/') ? path.join(os.homedir(), value.slice(1)) : value;
}

/**
 * Translate TAPEDECK_* variables into overrides. Malformed values are
 * ignored so the defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const storePath = env.TAPEDECK_STORE_PATH?.trim();

  return {
    storePath: storePath ? expandHome(storePath) : undefined,
    debug: readBool(env.TAPEDECK_DEBUG),
    remote: {
      requestTimeoutMs: readInt(env.TAPEDECK_REQUEST_TIMEOUT_MS, 1),
    },
    sync: {
      maxAttempts: readInt(env.TAPEDECK_SYNC_MAX_ATTEMPTS, 1),
      baseDelayMs: readInt(env.TAPEDECK_SYNC_BASE_DELAY_MS),
      maxDelayMs: readInt(env.TAPEDECK_SYNC_MAX_DELAY_MS),
    },
    playback: {
      resolveTimeoutMs: readInt(env.TAPEDECK_RESOLVE_TIMEOUT_MS, 1),
      stallTimeoutMs: readInt(env.TAPEDECK_STALL_TIMEOUT_MS, 1),
      autoSkipOnFailure: readBool(env.TAPEDECK_AUTO_SKIP),
    },
    player: {
      mpvPath: env.TAPEDECK_MPV_PATH?.trim() || undefined,
    },
  };
}

/**
 * Load configuration from the environment, reading `.env` from the working
 * directory first (existing variables win).
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  if (env === process.env) {
    dotenv.config();
  }

  return resolveConfig(overrides, resolveConfig(configFromEnv(env)));
}
