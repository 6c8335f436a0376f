import { describe, it, expect, vi } from 'vitest';
import { resolvePlaylist } from '../../../src/services/resolver/resolver.js';
import { FatalEnvironmentError, ResolutionError } from '../../../src/utils/errors.js';
import type { MediaEngine, ResolvedPlaylist } from '../../../src/types/index.js';

function engineReturning(fetchPlaylist: MediaEngine['fetchPlaylist']): MediaEngine {
  return {
    fetchPlaylist: vi.fn(fetchPlaylist),
    downloadTrack: vi.fn(async () => ({ success: false as const, error: 'not used' })),
  };
}

const playlist: ResolvedPlaylist = {
  title: 'Road Trip',
  tracks: [{ index: 0, id: '1', title: 'One', source: 'https://soundcloud.com/someone/one', status: 'pending' }],
};

describe('resolvePlaylist', () => {
  it('should return the tracks the engine enumerates', async () => {
    const engine = engineReturning(async () => playlist);

    await expect(resolvePlaylist(' https://soundcloud.com/someone/sets/road-trip ', engine)).resolves.toBe(playlist);
    expect(engine.fetchPlaylist).toHaveBeenCalledWith('https://soundcloud.com/someone/sets/road-trip');
    expect(engine.downloadTrack).not.toHaveBeenCalled();
  });

  it('should reject invalid URLs without asking the engine', async () => {
    const engine = engineReturning(async () => playlist);

    await expect(resolvePlaylist('soundcloud playlist', engine)).rejects.toMatchObject({
      name: 'ResolutionError',
      reason: 'invalid-url',
    });
    expect(engine.fetchPlaylist).not.toHaveBeenCalled();
  });

  it('should report an empty playlist', async () => {
    const engine = engineReturning(async () => ({ title: 'Nothing', tracks: [] }));

    await expect(resolvePlaylist('https://example.com/list', engine)).rejects.toMatchObject({
      reason: 'empty',
      message: 'No tracks found in playlist "Nothing".',
    });
  });

  it('should wrap unexpected engine failures as unreachable', async () => {
    const engine = engineReturning(async () => {
      throw new Error('socket hang up');
    });

    const promise = resolvePlaylist('https://example.com/list', engine);
    await expect(promise).rejects.toBeInstanceOf(ResolutionError);
    await expect(promise).rejects.toMatchObject({
      reason: 'unreachable',
      message: 'Failed to fetch playlist: socket hang up',
    });
  });

  it('should pass environment errors through untouched', async () => {
    const missing = new FatalEnvironmentError('"yt-dlp" was not found.');
    const engine = engineReturning(async () => {
      throw missing;
    });

    await expect(resolvePlaylist('https://example.com/list', engine)).rejects.toBe(missing);
  });
});
