/**
 * Library Types
 *
 * Data models for the locally cached mirror of the remote library:
 * tracks, albums, artists and playlists, plus their sync checkpoints.
 */

/** The four entity classes the catalog mirrors, each with its own checkpoint. */
export type EntityClass = 'tracks' | 'albums' | 'artists' | 'playlists';

export const ENTITY_CLASSES: readonly EntityClass[] = ['tracks', 'albums', 'artists', 'playlists'];

/**
 * Track metadata as served by the remote library.
 *
 * Uses a hybrid approach: denormalized names for display (artist_name,
 * album_name), with IDs for lookups (artist_id, album_id).
 */
export interface Track {
  /** Stable, remote-assigned identifier */
  id: string;
  /** Content version; a changed etag means the record changed remotely */
  etag: string;

  title: string;

  /** Reference to artist */
  artist_id: string;
  /** Artist name (denormalized) */
  artist_name: string;
  /** Reference to album */
  album_id: string;
  /** Album title (denormalized) */
  album_name: string;

  /** Duration in whole seconds */
  duration_sec: number;
  track_number?: number;
  year?: number;

  /** Opaque token the remote exchanges for a stream URL. Expires server-side. */
  stream_token: string;
}

export interface Album {
  id: string;
  etag: string;
  title: string;
  artist_id: string;
  /** Artist name (denormalized) */
  artist_name: string;
  year?: number;
  /** Track IDs in album order */
  track_ids: string[];
}

export interface Artist {
  id: string;
  etag: string;
  name: string;
  /** Track IDs credited to the artist, unordered */
  track_ids: string[];
}

/**
 * Playlists are the only user-editable entity; membership and ordering
 * both come from the remote.
 */
export interface Playlist {
  id: string;
  etag: string;
  name: string;
  description?: string;
  /** Track IDs in playlist order */
  track_ids: string[];
}

/** Maps each entity class to the record type it holds. */
export interface EntityMap {
  tracks: Track;
  albums: Album;
  artists: Artist;
  playlists: Playlist;
}

export type EntityOf<C extends EntityClass> = EntityMap[C];

export type LibraryEntity = EntityMap[EntityClass];

/**
 * An entity as held by the catalog, with its local bookkeeping.
 */
export interface StoredRecord<T> {
  entity: T;
  /** Bumped each time an upsert actually changes the record */
  local_version: number;
  /** Unix timestamp (ms) of the last effective change */
  updated_at: number;
}

/**
 * Sync progress for one entity class. The cursor is opaque to the client.
 */
export interface SyncCheckpoint {
  cursor: string;
  /** Number of times this checkpoint has advanced */
  generation: number;
  /** Unix timestamp (ms) of the last advance */
  advanced_at: number;
}

/**
 * Filter for catalog queries. All fields are optional and combine with AND.
 */
export interface CatalogFilter {
  /** Case-insensitive substring over names and titles */
  text?: string;
  /** Restrict to these identifiers */
  ids?: readonly string[];
  /** Tracks and albums only */
  artistId?: string;
  /** Tracks only */
  albumId?: string;
  limit?: number;
}

/** Result of applying one batch of entities to the catalog. */
export interface UpsertResult {
  inserted: number;
  updated: number;
  unchanged: number;
  /** Records dropped because they did not match the entity class */
  rejected: number;
}

/**
 * Lightweight track row for search results.
 */
export interface SearchResult {
  id: string;
  title: string;
  artist: string;
  album: string;
  duration_sec: number;
}

export type CatalogStats = Record<EntityClass, number>;
