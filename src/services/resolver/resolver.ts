import { isValidPlaylistUrl } from '../../utils/validator.js';
import { DownloaderError, ResolutionError, errorMessage } from '../../utils/errors.js';
import type { MediaEngine, ResolvedPlaylist } from '../../types/index.js';

/**
 * Enumerates the tracks of a playlist without downloading any of them.
 */
export async function resolvePlaylist(url: string, engine: MediaEngine): Promise<ResolvedPlaylist> {
  const playlistUrl = url.trim();
  if (!isValidPlaylistUrl(playlistUrl)) {
    throw new ResolutionError('invalid-url', `Invalid playlist URL: ${url}`);
  }

  let playlist: ResolvedPlaylist;
  try {
    playlist = await engine.fetchPlaylist(playlistUrl);
  } catch (error) {
    // Typed errors (environment, resolution) already say what went wrong
    if (error instanceof DownloaderError) {
      throw error;
    }
    throw new ResolutionError('unreachable', `Failed to fetch playlist: ${errorMessage(error)}`, { cause: error });
  }

  if (playlist.tracks.length === 0) {
    throw new ResolutionError('empty', `No tracks found in playlist "${playlist.title}".`);
  }

  return playlist;
}
