/**
 * Builders for library records used across tests.
 */

import type { Album, Artist, EntityClass, EntityDelta, LibraryEntity, Playlist, Track } from '../types/index.js';

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
  return {
    id,
    etag: 'v1',
    title: `Track ${id}`,
    artist_id: 'ar1',
    artist_name: 'Test Artist',
    album_id: 'al1',
    album_name: 'Test Album',
    duration_sec: 180,
    stream_token: `token-${id}`,
    ...overrides,
  };
}

export function makeAlbum(id: string, trackIds: string[], overrides: Partial<Album> = {}): Album {
  return {
    id,
    etag: 'v1',
    title: `Album ${id}`,
    artist_id: 'ar1',
    artist_name: 'Test Artist',
    track_ids: trackIds,
    ...overrides,
  };
}

export function makeArtist(id: string, trackIds: string[], overrides: Partial<Artist> = {}): Artist {
  return {
    id,
    etag: 'v1',
    name: `Artist ${id}`,
    track_ids: trackIds,
    ...overrides,
  };
}

export function makePlaylist(id: string, trackIds: string[], overrides: Partial<Playlist> = {}): Playlist {
  return {
    id,
    etag: 'v1',
    name: `Playlist ${id}`,
    track_ids: trackIds,
    ...overrides,
  };
}

export function makeDelta(
  entities: LibraryEntity[],
  checkpoint: string,
  extra: { removed_ids?: string[]; has_more?: boolean } = {},
): EntityDelta<EntityClass> {
  return {
    entities,
    removed_ids: extra.removed_ids ?? [],
    checkpoint,
    has_more: extra.has_more ?? false,
  };
}
