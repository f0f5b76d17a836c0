/**
 * Playback Queue
 *
 * Ordered list of tracks to play plus a cursor on the current entry.
 * Pure in-memory state: no I/O, no timers.
 */

import type { QueueEntry, QueueSnapshot } from '../types/index.js';

/**
 * The queue consumes entries as it goes: advancing past the current entry
 * drops it, so everything in the queue is either playing or still to come.
 *
 * The cursor, when set, always points at an entry that is still queued.
 * Edits that name an unknown sequence number are ignored.
 */
export class PlaybackQueue {
  private entries: QueueEntry[] = [];
  private currentSeq: number | null = null;
  private nextSeq = 1;

  /**
   * Add tracks to the end of the queue.
   */
  append(trackIds: readonly string[]): QueueEntry[] {
    const added = this.createEntries(trackIds);
    this.entries.push(...added);
    return added.map((entry) => ({ ...entry }));
  }

  /**
   * Add tracks right after the current entry, in the given order. With no
   * current entry they go to the front.
   */
  insertNext(trackIds: readonly string[]): QueueEntry[] {
    const added = this.createEntries(trackIds);
    const at = this.currentSeq === null ? 0 : this.indexOf(this.currentSeq) + 1;
    this.entries.splice(at, 0, ...added);
    return added.map((entry) => ({ ...entry }));
  }

  /**
   * Remove an entry. Removing the current entry moves the cursor to the
   * entry that followed it, or clears the cursor if it was the last.
   */
  remove(seq: number): void {
    const index = this.indexOf(seq);
    if (index < 0) return;

    this.entries.splice(index, 1);
    if (seq === this.currentSeq) {
      this.currentSeq = this.entries[index]?.seq ?? null;
    }
  }

  /**
   * Drop the current entry and move the cursor to the one after it. With no
   * current entry the cursor moves to the head of the queue.
   *
   * Returns the new current entry, or null once the queue is exhausted.
   */
  advance(): QueueEntry | null {
    if (this.currentSeq === null) {
      const head = this.entries[0];
      this.currentSeq = head?.seq ?? null;
      return head ? { ...head } : null;
    }

    this.remove(this.currentSeq);
    return this.current();
  }

  current(): QueueEntry | null {
    if (this.currentSeq === null) return null;
    const entry = this.entries[this.indexOf(this.currentSeq)];
    return entry ? { ...entry } : null;
  }

  /** Entries after the current one (or all of them, with no cursor). */
  upcoming(): QueueEntry[] {
    const start = this.currentSeq === null ? 0 : this.indexOf(this.currentSeq) + 1;
    return this.entries.slice(start).map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.entries = [];
    this.currentSeq = null;
  }

  has(seq: number): boolean {
    return this.indexOf(seq) >= 0;
  }

  get size(): number {
    return this.entries.length;
  }

  snapshot(): QueueSnapshot {
    return {
      entries: this.entries.map((entry) => ({ ...entry })),
      current_seq: this.currentSeq,
    };
  }

  private indexOf(seq: number): number {
    return this.entries.findIndex((entry) => entry.seq === seq);
  }

  private createEntries(trackIds: readonly string[]): QueueEntry[] {
    return trackIds.map((trackId) => ({ seq: this.nextSeq++, track_id: trackId }));
  }
}
