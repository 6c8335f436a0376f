import { ResolutionError } from '../../utils/errors.js';
import type { ResolvedPlaylist, TrackRef } from '../../types/index.js';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: JsonRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

function coverUrlOf(entry: JsonRecord): string | undefined {
  const thumbnails = Array.isArray(entry.thumbnails) ? entry.thumbnails.filter(isRecord) : [];
  const largest = thumbnails[thumbnails.length - 1];
  return (largest && stringField(largest, 'url')) ?? stringField(entry, 'thumbnail');
}

function toTrack(entry: JsonRecord, index: number): TrackRef | null {
  // Flat entries carry the item URL; full entries carry the page URL
  const source = stringField(entry, 'url', 'webpage_url', 'original_url');
  if (!source || !/^https?:\/\//i.test(source)) {
    return null;
  }

  return {
    index,
    id: stringField(entry, 'id') ?? String(index + 1),
    title: stringField(entry, 'title', 'track', 'fulltitle') ?? `Track ${index + 1}`,
    source,
    artist: stringField(entry, 'artist', 'uploader', 'channel', 'creator'),
    coverUrl: coverUrlOf(entry),
    status: 'pending',
  };
}

/**
 * Turns `yt-dlp --dump-single-json --flat-playlist` output into a playlist.
 * A URL naming a single item yields a playlist holding just that item.
 */
export function parsePlaylistJson(jsonText: string): ResolvedPlaylist {
  let data: unknown;
  try {
    data = JSON.parse(jsonText);
  } catch (error) {
    throw new ResolutionError('malformed', 'The download engine returned unreadable playlist data.', { cause: error });
  }

  if (!isRecord(data)) {
    throw new ResolutionError('malformed', 'The download engine returned unreadable playlist data.');
  }

  const isPlaylist = data._type === 'playlist' || Array.isArray(data.entries);
  const entries = isPlaylist
    ? (Array.isArray(data.entries) ? data.entries : []).filter(isRecord)
    : [data];

  const tracks: TrackRef[] = [];
  for (const entry of entries) {
    const track = toTrack(entry, tracks.length);
    if (track) {
      tracks.push(track);
    }
  }

  return {
    title: stringField(data, 'title', 'playlist_title', 'playlist') ?? 'Unknown Playlist',
    uploader: stringField(data, 'uploader', 'channel'),
    tracks,
  };
}
