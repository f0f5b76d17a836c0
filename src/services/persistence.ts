/**
 * Persistence
 *
 * Load/save of the catalog as one opaque blob. The catalog owns the format;
 * adapters only have to hand back exactly what they were given.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

export interface PersistenceAdapter {
  /** Returns null when nothing has been saved yet. */
  load(): Promise<string | null>;
  save(blob: string): Promise<void>;
}

/**
 * Keeps the blob in memory. Used in tests and for throwaway sessions.
 */
export class MemoryPersistence implements PersistenceAdapter {
  saves = 0;

  constructor(private blob: string | null = null) {}

  async load(): Promise<string | null> {
    return this.blob;
  }

  async save(blob: string): Promise<void> {
    this.blob = blob;
    this.saves++;
  }

  get current(): string | null {
    return this.blob;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores the blob in a single file. Writes go to a temporary file first and
 * are renamed into place, so a crash mid-write leaves the previous blob.
 */
export class FilePersistence implements PersistenceAdapter {
  // Tail of the write chain; saves are applied in call order.
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  async load(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  save(blob: string): Promise<void> {
    const next = this.writeQueue.then(() => this.write(blob));
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  private async write(blob: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    const tempFile = `${this.filePath}.tmp`;
    await fs.writeFile(tempFile, blob, { encoding: 'utf8', mode: 0o600 });
    await fs.rename(tempFile, this.filePath);
  }
}
