/**
 * Playback Types
 *
 * Data models for the play queue, the playback state machine, and the
 * events exchanged with the external audio player.
 */

/**
 * One slot in the play queue. The sequence number is queue-local and never
 * reused, so two entries for the same track stay distinguishable.
 */
export interface QueueEntry {
  seq: number;
  track_id: string;
}

export interface QueueSnapshot {
  entries: QueueEntry[];
  /** Sequence number of the current entry, or null if there is none */
  current_seq: number | null;
}

/** Why a track failed to play. */
export type FailureKind =
  | 'network'
  | 'token_expired'
  | 'auth_expired'
  | 'rate_limited'
  | 'not_found'
  | 'launch'
  | 'player'
  | 'stall_timeout';

export interface FailureReason {
  kind: FailureKind;
  message: string;
}

/**
 * The single live playback state, owned by the PlaybackController.
 */
export type PlaybackState =
  | { status: 'idle' }
  | { status: 'loading'; entry: QueueEntry }
  | { status: 'playing'; entry: QueueEntry }
  | { status: 'paused'; entry: QueueEntry }
  | { status: 'stalled'; entry: QueueEntry; since: number }
  | { status: 'finished'; entry: QueueEntry }
  | { status: 'failed'; entry: QueueEntry; reason: FailureReason };

export type PlaybackStatus = PlaybackState['status'];

/** Point-in-time view of the controller for status displays. */
export interface PlayerStatus {
  state: PlaybackState;
  /** Volume 0 - 100 */
  volume: number;
  queue: QueueSnapshot;
}

/**
 * Events reported by the audio player process. `tag` echoes the value passed
 * to `load()` so stale events for a replaced file can be recognised.
 */
export type AudioProcessEvent =
  | { type: 'started'; tag: string }
  | { type: 'stalled'; tag: string }
  | { type: 'resumed'; tag: string }
  | { type: 'finished'; tag: string }
  | { type: 'error'; tag: string | null; reason: string };

/** A resolved, time-limited stream location for a track. */
export interface StreamLocation {
  url: string;
  /** Unix timestamp (ms) after which the URL stops working */
  expires_at: number;
}
