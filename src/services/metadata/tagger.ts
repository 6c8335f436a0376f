import fs from 'fs';
import https from 'https';
import NodeID3 from 'node-id3';
import type { PlaylistJob, TrackRef } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

interface CoverArt {
  mime: string;
  data: Buffer;
}

// Image type of a cover response; JPEG when the server does not say
export function coverMimeOf(contentType: string | undefined): string {
  const mime = contentType?.split(';')[0].trim().toLowerCase();
  return mime && mime.startsWith('image/') ? mime : 'image/jpeg';
}

/**
 * Downloads cover art from URL
 */
async function downloadCoverArt(url: string): Promise<CoverArt | null> {
  return new Promise((resolve) => {
    https
      .get(url, (response) => {
        if (response.statusCode !== 200) {
          response.resume();
          resolve(null);
          return;
        }
        const mime = coverMimeOf(response.headers['content-type']);
        const chunks: Buffer[] = [];
        response.on('data', (chunk: Buffer) => chunks.push(chunk));
        response.on('end', () => resolve({ mime, data: Buffer.concat(chunks) }));
        response.on('error', () => resolve(null));
      })
      .on('error', () => resolve(null));
  });
}

type AlbumInfo = Pick<PlaylistJob, 'title' | 'uploader' | 'tracks'>;

export function buildTags(track: TrackRef, album: AlbumInfo): NodeID3.Tags {
  const tags: NodeID3.Tags = {
    title: track.title,
    album: album.title,
    trackNumber: `${track.index + 1}/${album.tracks.length}`,
  };
  if (track.artist) {
    tags.artist = track.artist;
  }
  // Album artist
  if (album.uploader) {
    tags.performerInfo = album.uploader;
  }
  return tags;
}

/**
 * Adds ID3 metadata tags to an MP3 file
 */
export async function addMetadata(filePath: string, track: TrackRef, album: AlbumInfo): Promise<boolean> {
  try {
    const tags = buildTags(track, album);

    // Download and attach cover art if available
    if (track.coverUrl) {
      const cover = await downloadCoverArt(track.coverUrl);
      if (cover) {
        tags.image = {
          mime: cover.mime,
          type: {
            id: 3,
            name: 'front cover',
          },
          description: 'Cover',
          imageBuffer: cover.data,
        };
      }
    }

    // Write tags to file
    const result = NodeID3.write(tags, filePath);

    if (result !== true) {
      logger.warn(`Failed to write metadata for: ${track.title}`);
      return false;
    }

    return true;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error(`Error adding metadata to "${track.title}": ${errorMessage}`);
    return false;
  }
}

/**
 * Tags every track of the job that finished downloading
 */
export async function addMetadataToJob(job: PlaylistJob): Promise<number> {
  const done = job.tracks.filter((track) => track.status === 'done' && track.filePath);
  logger.info(`Adding metadata to ${done.length} files...`);

  let tagged = 0;
  for (const track of done) {
    if (track.filePath && fs.existsSync(track.filePath)) {
      if (await addMetadata(track.filePath, track, job)) {
        tagged++;
      }
    }
  }

  logger.success('Metadata addition complete');
  return tagged;
}
