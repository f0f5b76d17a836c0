/**
 * Shape checks for library data that crosses a trust boundary:
 * persisted catalog blobs and records handed over by the remote.
 */

import type { Album, Artist, EntityClass, EntityOf, Playlist, SyncCheckpoint, Track } from '../types/index.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isOptionalNumber(value: unknown): boolean {
  return value === undefined || (typeof value === 'number' && Number.isFinite(value));
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

function hasIdentity(value: Record<string, unknown>): boolean {
  return isString(value.id) && value.id.length > 0 && isString(value.etag);
}

export function isTrack(value: unknown): value is Track {
  return (
    isRecord(value) &&
    hasIdentity(value) &&
    isString(value.title) &&
    isString(value.artist_id) &&
    isString(value.artist_name) &&
    isString(value.album_id) &&
    isString(value.album_name) &&
    Number.isInteger(value.duration_sec) &&
    isString(value.stream_token) &&
    isOptionalNumber(value.track_number) &&
    isOptionalNumber(value.year)
  );
}

export function isAlbum(value: unknown): value is Album {
  return (
    isRecord(value) &&
    hasIdentity(value) &&
    isString(value.title) &&
    isString(value.artist_id) &&
    isString(value.artist_name) &&
    isOptionalNumber(value.year) &&
    isStringArray(value.track_ids)
  );
}

export function isArtist(value: unknown): value is Artist {
  return isRecord(value) && hasIdentity(value) && isString(value.name) && isStringArray(value.track_ids);
}

export function isPlaylist(value: unknown): value is Playlist {
  return (
    isRecord(value) &&
    hasIdentity(value) &&
    isString(value.name) &&
    (value.description === undefined || isString(value.description)) &&
    isStringArray(value.track_ids)
  );
}

/** Check a value against the record shape of the given entity class. */
export function matchesClass<C extends EntityClass>(entityClass: C, value: unknown): value is EntityOf<C> {
  switch (entityClass) {
    case 'tracks':
      return isTrack(value);
    case 'albums':
      return isAlbum(value);
    case 'artists':
      return isArtist(value);
    case 'playlists':
      return isPlaylist(value);
    default:
      return false;
  }
}

export function isCheckpoint(value: unknown): value is SyncCheckpoint {
  return (
    isRecord(value) &&
    isString(value.cursor) &&
    Number.isInteger(value.generation) &&
    typeof value.advanced_at === 'number'
  );
}
