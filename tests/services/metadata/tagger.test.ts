import { describe, it, expect } from 'vitest';
import { buildTags, coverMimeOf } from '../../../src/services/metadata/tagger.js';
import type { TrackRef } from '../../../src/types/index.js';

describe('buildTags', () => {
  const track: TrackRef = {
    index: 2,
    id: '3',
    title: 'Third Song',
    source: 'https://soundcloud.com/someone/third-song',
    status: 'done',
  };
  const album = { title: 'Road Trip', tracks: Array.from({ length: 12 }, () => track) };

  it('should tag title, album and position', () => {
    expect(buildTags(track, album)).toEqual({
      title: 'Third Song',
      album: 'Road Trip',
      trackNumber: '3/12',
    });
  });

  it('should add the artist when known', () => {
    expect(buildTags({ ...track, artist: 'Band' }, album).artist).toBe('Band');
  });

  it('should tag the playlist uploader as album artist', () => {
    expect(buildTags(track, { ...album, uploader: 'someone' }).performerInfo).toBe('someone');
  });
});

describe('coverMimeOf', () => {
  it('should take the image type from the content type header', () => {
    expect(coverMimeOf('image/png')).toBe('image/png');
    expect(coverMimeOf('image/webp; charset=binary')).toBe('image/webp');
    expect(coverMimeOf('Image/JPEG')).toBe('image/jpeg');
  });

  it('should fall back to JPEG when the header is missing or not an image', () => {
    expect(coverMimeOf(undefined)).toBe('image/jpeg');
    expect(coverMimeOf('application/octet-stream')).toBe('image/jpeg');
  });
});
