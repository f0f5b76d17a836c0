/**
 * Sync Types
 *
 * Data exchanged with the remote library during incremental sync.
 */

import type { EntityClass, EntityOf } from './library.js';

/**
 * One page of changes for an entity class since a checkpoint.
 */
export interface EntityDelta<C extends EntityClass> {
  /** Created or changed records */
  entities: EntityOf<C>[];
  /** Identifiers the remote reports as deleted */
  removed_ids: string[];
  /** Cursor to store once this page is applied */
  checkpoint: string;
  /** Whether another page follows from `checkpoint` */
  has_more: boolean;
}

export type SyncMode = 'incremental' | 'full';

/** Outcome of syncing one entity class. */
export interface ClassSyncResult {
  entityClass: EntityClass;
  mode: SyncMode;
  pages: number;
  inserted: number;
  updated: number;
  unchanged: number;
  removed: number;
  checkpoint: string | null;
}

/**
 * Sync status as reported to the UI.
 */
export type SyncStatus =
  | { state: 'idle' }
  | { state: 'syncing'; mode: SyncMode; attempt: number }
  | { state: 'degraded'; attempt: number; nextRetryMs: number; message: string }
  | { state: 'synced'; results: ClassSyncResult[]; at: number }
  | { state: 'failed'; message: string }
  | { state: 'cancelled' };
