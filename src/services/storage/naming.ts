import path from 'path';
import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { sanitizeFilename, withSuffix } from '../../utils/validator.js';
import { logger } from '../../utils/logger.js';

export const MARKER_FILE = '.playlist.json';

const MAX_ATTEMPTS = 1000;

export interface PlaylistFolder {
  name: string;
  path: string;
  reused: boolean;
}

interface FolderMarker {
  sourceUrl: string;
  title: string;
}

async function readMarker(folderPath: string): Promise<FolderMarker | null> {
  try {
    const content = await readFile(path.join(folderPath, MARKER_FILE), 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'sourceUrl' in parsed &&
      typeof parsed.sourceUrl === 'string' &&
      'title' in parsed &&
      typeof parsed.title === 'string'
    ) {
      return { sourceUrl: parsed.sourceUrl, title: parsed.title };
    }
    return null;
  } catch {
    return null;
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Picks and creates the folder a playlist is written to. A folder left by an
 * earlier run of the same playlist is reused; a folder holding anything else
 * pushes the name to "Title (2)", "Title (3)", ...
 */
export async function preparePlaylistFolder(
  outputRoot: string,
  title: string,
  sourceUrl: string
): Promise<PlaylistFolder> {
  const baseName = sanitizeFilename(title, 'Playlist');
  await mkdir(outputRoot, { recursive: true });

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const name = withSuffix(baseName, attempt);
    const folderPath = path.join(outputRoot, name);

    if (await exists(folderPath)) {
      const marker = await readMarker(folderPath);
      if (marker?.sourceUrl === sourceUrl) {
        logger.debug(`Reusing folder ${folderPath}`);
        return { name, path: folderPath, reused: true };
      }
      continue;
    }

    await mkdir(folderPath, { recursive: true });
    const marker: FolderMarker = { sourceUrl, title };
    await writeFile(path.join(folderPath, MARKER_FILE), JSON.stringify(marker, null, 2));
    return { name, path: folderPath, reused: false };
  }

  throw new Error(`Could not find a free folder name for "${baseName}" in ${outputRoot}`);
}

/**
 * Hands out track file names that are unique within one playlist folder.
 * Names are compared case-insensitively since not every filesystem keeps
 * case apart.
 */
export class TrackNamer {
  private taken = new Set<string>();

  reserve(title: string): string {
    const baseName = sanitizeFilename(title, 'Track');

    for (let attempt = 1; ; attempt++) {
      const name = withSuffix(baseName, attempt);
      const key = name.toLowerCase();
      if (!this.taken.has(key)) {
        this.taken.add(key);
        return name;
      }
    }
  }
}
