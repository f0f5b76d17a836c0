/**
 * Audio Process contract
 *
 * The external player that decodes and outputs audio. Commands are
 * fire-and-confirm; everything the player observes on its own (start,
 * buffering, end of track, errors) arrives through subscribe().
 */

import type { AudioProcessEvent } from '../types/index.js';

export type AudioProcessListener = (event: AudioProcessEvent) => void;

export interface AudioProcess {
  /**
   * Load a URL, replacing whatever was loaded. `tag` is echoed on every
   * event about this file. Rejects with PlaybackLaunchError if the player
   * cannot be started.
   */
  load(url: string, tag: string): Promise<void>;
  play(): Promise<void>;
  pause(): Promise<void>;
  stop(): Promise<void>;
  /** Seek to an absolute position in seconds */
  seek(offsetSec: number): Promise<void>;
  /** Volume 0 - 100 */
  setVolume(percent: number): Promise<void>;
  subscribe(listener: AudioProcessListener): () => void;
  /** Terminate the player process. */
  dispose(): Promise<void>;
}
