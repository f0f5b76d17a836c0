/**
 * Catalog Store
 *
 * Local cache of the remote library (tracks, albums, artists, playlists)
 * and the per-class sync checkpoints. Reads are served from memory and never
 * touch the network; the whole catalog is persisted as one blob through a
 * PersistenceAdapter.
 */

import type {
  Album,
  Artist,
  CatalogFilter,
  CatalogStats,
  EntityClass,
  LibraryEntity,
  Playlist,
  SearchResult,
  StoredRecord,
  SyncCheckpoint,
  Track,
  UpsertResult,
} from '../types/index.js';
import { ENTITY_CLASSES } from '../types/index.js';
import { CorruptStoreError, errorMessage } from './errors.js';
import type { PersistenceAdapter } from './persistence.js';
import { isAlbum, isArtist, isCheckpoint, isPlaylist, isRecord, isTrack } from './validation.js';

const FORMAT_VERSION = 1;
const DEFAULT_SEARCH_LIMIT = 50;

type Table<T> = Map<string, StoredRecord<T>>;

interface PersistedCatalog {
  format: number;
  tables: {
    tracks: StoredRecord<Track>[];
    albums: StoredRecord<Album>[];
    artists: StoredRecord<Artist>[];
    playlists: StoredRecord<Playlist>[];
  };
  checkpoints: Partial<Record<EntityClass, SyncCheckpoint>>;
}

function includesText(needle: string, ...haystack: Array<string | undefined>): boolean {
  return haystack.some((value) => value !== undefined && value.toLowerCase().includes(needle));
}

function parseTable<T extends { id: string }>(
  entityClass: EntityClass,
  raw: unknown,
  guard: (value: unknown) => value is T,
): Table<T> {
  if (!Array.isArray(raw)) {
    throw new CorruptStoreError(`Catalog table ${entityClass} is missing`);
  }

  const table: Table<T> = new Map();
  for (const item of raw) {
    if (!isRecord(item)) {
      throw new CorruptStoreError(`Catalog table ${entityClass} holds a non-object record`);
    }
    const entity = item.entity;
    const localVersion = item.local_version;
    const updatedAt = item.updated_at;
    if (!guard(entity) || typeof localVersion !== 'number' || typeof updatedAt !== 'number') {
      throw new CorruptStoreError(`Catalog table ${entityClass} holds a malformed record`);
    }
    table.set(entity.id, { entity, local_version: localVersion, updated_at: updatedAt });
  }
  return table;
}

export interface CatalogStoreOptions {
  debug?: boolean;
}

/**
 * Service for the local library mirror.
 *
 * Writes are upserts keyed by identifier; a record only changes (and its
 * local_version only bumps) when the incoming etag differs, so replaying a
 * batch is a no-op.
 */
export class CatalogStore {
  private tracks: Table<Track> = new Map();
  private albums: Table<Album> = new Map();
  private artists: Table<Artist> = new Map();
  private playlists: Table<Playlist> = new Map();
  private checkpoints = new Map<EntityClass, SyncCheckpoint>();

  constructor(
    private readonly persistence: PersistenceAdapter,
    private readonly options: CatalogStoreOptions = {},
  ) {}

  // ============================================================
  // Persistence
  // ============================================================

  /**
   * Replace the in-memory catalog with the persisted one.
   *
   * Throws CorruptStoreError if the blob cannot be read back; the store is
   * then left empty so it can be rebuilt from a full sync.
   */
  async load(): Promise<void> {
    const blob = await this.persistence.load();
    this.reset();
    if (blob === null) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(blob);
    } catch (error) {
      throw new CorruptStoreError(`Catalog blob is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }

    if (!isRecord(parsed) || parsed.format !== FORMAT_VERSION || !isRecord(parsed.tables)) {
      throw new CorruptStoreError('Catalog blob has an unknown layout');
    }

    const tables = parsed.tables;
    const tracks = parseTable('tracks', tables.tracks, isTrack);
    const albums = parseTable('albums', tables.albums, isAlbum);
    const artists = parseTable('artists', tables.artists, isArtist);
    const playlists = parseTable('playlists', tables.playlists, isPlaylist);

    const checkpoints = new Map<EntityClass, SyncCheckpoint>();
    const rawCheckpoints: Record<string, unknown> = isRecord(parsed.checkpoints) ? parsed.checkpoints : {};
    for (const entityClass of ENTITY_CLASSES) {
      const checkpoint = rawCheckpoints[entityClass];
      if (checkpoint === undefined) continue;
      if (!isCheckpoint(checkpoint)) {
        throw new CorruptStoreError(`Checkpoint for ${entityClass} is malformed`);
      }
      checkpoints.set(entityClass, checkpoint);
    }

    this.tracks = tracks;
    this.albums = albums;
    this.artists = artists;
    this.playlists = playlists;
    this.checkpoints = checkpoints;

    this.debug(`Loaded ${tracks.size} tracks, ${albums.size} albums, ${artists.size} artists, ${playlists.size} playlists`);
  }

  /** Write the current catalog through the persistence adapter. */
  async flush(): Promise<void> {
    await this.persistence.save(this.serialize());
  }

  serialize(): string {
    const snapshot: PersistedCatalog = {
      format: FORMAT_VERSION,
      tables: {
        tracks: [...this.tracks.values()],
        albums: [...this.albums.values()],
        artists: [...this.artists.values()],
        playlists: [...this.playlists.values()],
      },
      checkpoints: Object.fromEntries(this.checkpoints),
    };
    return JSON.stringify(snapshot);
  }

  /**
   * Drop every entity and checkpoint. Only used to rebuild from a full sync.
   */
  reset(): void {
    this.tracks = new Map();
    this.albums = new Map();
    this.artists = new Map();
    this.playlists = new Map();
    this.checkpoints = new Map();
  }

  // ============================================================
  // Writes
  // ============================================================

  /**
   * Merge entities by identifier. Records whose shape does not match the
   * entity class are rejected and counted.
   */
  upsert(entityClass: 'tracks', entities: readonly Track[]): UpsertResult;
  upsert(entityClass: 'albums', entities: readonly Album[]): UpsertResult;
  upsert(entityClass: 'artists', entities: readonly Artist[]): UpsertResult;
  upsert(entityClass: 'playlists', entities: readonly Playlist[]): UpsertResult;
  upsert(entityClass: EntityClass, entities: readonly LibraryEntity[]): UpsertResult;
  upsert(entityClass: EntityClass, entities: readonly LibraryEntity[]): UpsertResult {
    switch (entityClass) {
      case 'tracks':
        return this.apply(entityClass, this.tracks, entities, isTrack);
      case 'albums':
        return this.apply(entityClass, this.albums, entities, isAlbum);
      case 'artists':
        return this.apply(entityClass, this.artists, entities, isArtist);
      case 'playlists':
        return this.apply(entityClass, this.playlists, entities, isPlaylist);
    }
  }

  private apply<T extends { id: string; etag: string }>(
    entityClass: EntityClass,
    table: Table<T>,
    entities: readonly unknown[],
    guard: (value: unknown) => value is T,
  ): UpsertResult {
    const result: UpsertResult = { inserted: 0, updated: 0, unchanged: 0, rejected: 0 };
    const now = Date.now();

    // Later copies of an id in the same batch win.
    const latest = new Map<string, T>();
    for (const entity of entities) {
      if (guard(entity)) {
        latest.set(entity.id, entity);
      } else {
        result.rejected++;
      }
    }

    for (const entity of latest.values()) {
      const existing = table.get(entity.id);
      if (!existing) {
        table.set(entity.id, { entity: structuredClone(entity), local_version: 1, updated_at: now });
        result.inserted++;
      } else if (existing.entity.etag !== entity.etag) {
        table.set(entity.id, {
          entity: structuredClone(entity),
          local_version: existing.local_version + 1,
          updated_at: now,
        });
        result.updated++;
      } else {
        result.unchanged++;
      }
    }

    if (result.rejected > 0) {
      console.warn(`[catalog] Rejected ${result.rejected} malformed ${entityClass} record(s)`);
    }
    return result;
  }

  /**
   * Delete records the remote reported as removed. Returns how many existed.
   */
  remove(entityClass: EntityClass, ids: readonly string[]): number {
    const table = this.tableFor(entityClass);
    let removed = 0;
    for (const id of ids) {
      if (table.delete(id)) removed++;
    }
    return removed;
  }

  // ============================================================
  // Checkpoints
  // ============================================================

  checkpoint(entityClass: EntityClass): SyncCheckpoint | null {
    return this.checkpoints.get(entityClass) ?? null;
  }

  /**
   * Move a class's checkpoint to `cursor` and persist the catalog.
   *
   * If persisting fails the previous checkpoint is restored and the error
   * rethrown, so a failed sync never leaves a half-committed checkpoint.
   */
  async advanceCheckpoint(entityClass: EntityClass, cursor: string): Promise<SyncCheckpoint> {
    const previous = this.checkpoints.get(entityClass);
    if (previous?.cursor === cursor) return previous;

    const next: SyncCheckpoint = {
      cursor,
      generation: (previous?.generation ?? 0) + 1,
      advanced_at: Date.now(),
    };
    this.checkpoints.set(entityClass, next);

    try {
      await this.flush();
    } catch (error) {
      if (this.checkpoints.get(entityClass) === next) {
        if (previous) {
          this.checkpoints.set(entityClass, previous);
        } else {
          this.checkpoints.delete(entityClass);
        }
      }
      throw error;
    }

    this.debug(`Checkpoint for ${entityClass} advanced to ${cursor}`);
    return next;
  }

  // ============================================================
  // Reads
  // ============================================================

  get(entityClass: 'tracks', id: string): Track | null;
  get(entityClass: 'albums', id: string): Album | null;
  get(entityClass: 'artists', id: string): Artist | null;
  get(entityClass: 'playlists', id: string): Playlist | null;
  get(entityClass: EntityClass, id: string): LibraryEntity | null;
  get(entityClass: EntityClass, id: string): LibraryEntity | null {
    const record = this.tableFor(entityClass).get(id);
    return record ? structuredClone(record.entity) : null;
  }

  /** Local bookkeeping for a record, or null if it is not cached. */
  record(entityClass: EntityClass, id: string): StoredRecord<LibraryEntity> | null {
    const record = this.tableFor(entityClass).get(id);
    return record ? structuredClone(record) : null;
  }

  has(entityClass: EntityClass, id: string): boolean {
    return this.tableFor(entityClass).has(id);
  }

  query(entityClass: 'tracks', filter?: CatalogFilter): Track[];
  query(entityClass: 'albums', filter?: CatalogFilter): Album[];
  query(entityClass: 'artists', filter?: CatalogFilter): Artist[];
  query(entityClass: 'playlists', filter?: CatalogFilter): Playlist[];
  query(entityClass: EntityClass, filter?: CatalogFilter): LibraryEntity[];
  query(entityClass: EntityClass, filter: CatalogFilter = {}): LibraryEntity[] {
    const text = filter.text?.trim().toLowerCase() ?? '';
    const { artistId, albumId } = filter;

    switch (entityClass) {
      case 'tracks':
        return this.select(this.tracks, filter, (track) =>
          (!text || includesText(text, track.title, track.artist_name, track.album_name)) &&
          (artistId === undefined || track.artist_id === artistId) &&
          (albumId === undefined || track.album_id === albumId),
        );
      case 'albums':
        return this.select(this.albums, filter, (album) =>
          (!text || includesText(text, album.title, album.artist_name)) &&
          (artistId === undefined || album.artist_id === artistId),
        );
      case 'artists':
        return this.select(this.artists, filter, (artist) => !text || includesText(text, artist.name));
      case 'playlists':
        return this.select(this.playlists, filter, (playlist) =>
          !text || includesText(text, playlist.name, playlist.description),
        );
    }
  }

  private select<T extends { id: string }>(
    table: Table<T>,
    filter: CatalogFilter,
    matches: (entity: T) => boolean,
  ): T[] {
    const ids = filter.ids ? new Set(filter.ids) : null;
    const limit = filter.limit ?? Infinity;

    const results: T[] = [];
    for (const { entity } of table.values()) {
      if (results.length >= limit) break;
      if (ids && !ids.has(entity.id)) continue;
      if (!matches(entity)) continue;
      results.push(structuredClone(entity));
    }
    return results;
  }

  /**
   * Tracks belonging to an album, artist or playlist, in membership order.
   * Track IDs that are not cached are skipped.
   */
  members(entityClass: 'albums' | 'artists' | 'playlists', id: string): Track[] {
    const container = this.tableFor(entityClass).get(id)?.entity;
    if (!container || !('track_ids' in container)) return [];

    const tracks: Track[] = [];
    for (const trackId of container.track_ids) {
      const record = this.tracks.get(trackId);
      if (record) tracks.push(structuredClone(record.entity));
    }
    return tracks;
  }

  /**
   * Search tracks by title, artist or album name.
   */
  search(text: string, limit = DEFAULT_SEARCH_LIMIT): SearchResult[] {
    return this.query('tracks', { text, limit }).map((track) => ({
      id: track.id,
      title: track.title,
      artist: track.artist_name,
      album: track.album_name,
      duration_sec: track.duration_sec,
    }));
  }

  stats(): CatalogStats {
    return {
      tracks: this.tracks.size,
      albums: this.albums.size,
      artists: this.artists.size,
      playlists: this.playlists.size,
    };
  }

  isEmpty(): boolean {
    return ENTITY_CLASSES.every((entityClass) => this.tableFor(entityClass).size === 0);
  }

  private tableFor(entityClass: EntityClass): Table<LibraryEntity> {
    switch (entityClass) {
      case 'tracks':
        return this.tracks;
      case 'albums':
        return this.albums;
      case 'artists':
        return this.artists;
      case 'playlists':
        return this.playlists;
    }
  }

  private debug(message: string): void {
    if (this.options.debug) {
      console.debug(`[catalog] ${message}`);
    }
  }
}
