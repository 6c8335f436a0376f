import path from 'path';
import { mkdtemp, rm } from 'fs/promises';
import { AUDIO_FORMATS } from '../../config/options.js';
import { ResolutionError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parsePlaylistJson } from '../resolver/playlist-json.js';
import { convertAudio } from './converter.js';
import { runCommand, summarizeStderr } from './process.js';
import type {
  EngineEvent,
  MediaEngine,
  RawProgress,
  ResolvedPlaylist,
  TrackDetails,
  TrackDownloadOutcome,
  TrackDownloadRequest,
} from '../../types/index.js';

export interface YtDlpOptions {
  ytDlpPath: string;
  cookiesFile?: string;
  ffmpegPath?: string;
}

export const PROGRESS_PREFIX = 'PROGRESS ';

// Printed once the item is on disk; fields yt-dlp lacks come out as "NA"
const PRINTED_FIELDS = {
  file: 'after_move:FILE %(filepath)s',
  title: 'after_move:TITLE %(title,track,fulltitle)s',
  artist: 'after_move:ARTIST %(artist,uploader,channel,creator)s',
} as const;

type PrintedField = keyof typeof PRINTED_FIELDS;

const PRINTED_PREFIXES: Record<string, PrintedField> = {
  'FILE ': 'file',
  'TITLE ': 'title',
  'ARTIST ': 'artist',
};

// Fields missing for the current stream are printed as "NA"
const PROGRESS_TEMPLATE =
  `download:${PROGRESS_PREFIX}%(progress.downloaded_bytes)s %(progress.total_bytes)s ` +
  '%(progress.total_bytes_estimate)s %(progress.fragment_index)s %(progress.fragment_count)s';

function toNumber(field: string | undefined): number | null {
  if (field === undefined || field === 'NA') return null;
  const value = Number(field);
  return Number.isFinite(value) ? value : null;
}

/**
 * Reads one line written through PROGRESS_TEMPLATE. Byte counts win;
 * fragmented streams without a size fall back to the fragment ratio.
 */
export function parseProgressLine(line: string): RawProgress | null {
  if (!line.startsWith(PROGRESS_PREFIX)) {
    return null;
  }

  const [downloaded, total, estimate, fragmentIndex, fragmentCount] = line
    .slice(PROGRESS_PREFIX.length)
    .trim()
    .split(/\s+/)
    .map(toNumber);

  const totalBytes = total ?? estimate ?? null;
  if (downloaded != null && totalBytes !== null) {
    return { kind: 'bytes', downloadedBytes: downloaded, totalBytes };
  }

  if (fragmentIndex != null && fragmentCount) {
    return { kind: 'percent', percent: (fragmentIndex / fragmentCount) * 100 };
  }

  if (downloaded != null) {
    return { kind: 'bytes', downloadedBytes: downloaded, totalBytes: null };
  }

  return null;
}

export function parsePrintedLine(line: string): { field: PrintedField; value: string } | null {
  for (const [prefix, field] of Object.entries(PRINTED_PREFIXES)) {
    if (line.startsWith(prefix)) {
      const value = line.slice(prefix.length).trim();
      return value.length > 0 && value !== 'NA' ? { field, value } : null;
    }
  }
  return null;
}

export function buildPlaylistArgs(url: string, cookiesFile?: string): string[] {
  return [
    '--flat-playlist',
    '--dump-single-json',
    '--no-warnings',
    ...(cookiesFile ? ['--cookies', cookiesFile] : []),
    '--',
    url,
  ];
}

export function buildDownloadArgs(
  sourceUrl: string,
  workDir: string,
  options: Omit<YtDlpOptions, 'ytDlpPath'> = {}
): string[] {
  return [
    '--format',
    'bestaudio/best',
    '--no-playlist',
    '--no-warnings',
    '--newline',
    '--progress',
    '--progress-template',
    PROGRESS_TEMPLATE,
    ...Object.values(PRINTED_FIELDS).flatMap((template) => ['--print', template]),
    '--no-simulate',
    '--output',
    path.join(workDir, 'source.%(ext)s'),
    ...(options.cookiesFile ? ['--cookies', options.cookiesFile] : []),
    ...(options.ffmpegPath ? ['--ffmpeg-location', options.ffmpegPath] : []),
    '--',
    sourceUrl,
  ];
}

/**
 * MediaEngine backed by the yt-dlp executable for retrieval and ffmpeg for
 * transcoding.
 */
export class YtDlpEngine implements MediaEngine {
  private ytDlpPath: string;
  private cookiesFile?: string;
  private ffmpegPath?: string;

  constructor(options: YtDlpOptions) {
    this.ytDlpPath = options.ytDlpPath;
    this.cookiesFile = options.cookiesFile;
    this.ffmpegPath = options.ffmpegPath;
  }

  async fetchPlaylist(url: string): Promise<ResolvedPlaylist> {
    const args = buildPlaylistArgs(url, this.cookiesFile);
    logger.debug(`${this.ytDlpPath} ${args.join(' ')}`);

    const result = await runCommand(this.ytDlpPath, args);
    if (result.code !== 0) {
      const detail = summarizeStderr(result.stderr) || `exit code ${result.code}`;
      throw new ResolutionError('unreachable', `Failed to fetch playlist: ${detail}`);
    }

    return parsePlaylistJson(result.stdout);
  }

  /**
   * Fetches one item into a scratch folder inside the output folder, then
   * converts it to its final name. The scratch folder is always removed.
   */
  async downloadTrack(
    request: TrackDownloadRequest,
    onEvent: (event: EngineEvent) => void
  ): Promise<TrackDownloadOutcome> {
    const workDir = await mkdtemp(path.join(request.outputDir, '.download-'));
    try {
      return await this.fetchAndConvert(request, workDir, onEvent);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async fetchAndConvert(
    request: TrackDownloadRequest,
    workDir: string,
    onEvent: (event: EngineEvent) => void
  ): Promise<TrackDownloadOutcome> {
    const args = buildDownloadArgs(request.sourceUrl, workDir, {
      cookiesFile: this.cookiesFile,
      ffmpegPath: this.ffmpegPath,
    });
    logger.debug(`${this.ytDlpPath} ${args.join(' ')}`);

    onEvent({ kind: 'phase', phase: 'downloading' });

    const printed: Partial<Record<PrintedField, string>> = {};
    const result = await runCommand(this.ytDlpPath, args, {
      onLine: (line) => {
        const progress = parseProgressLine(line);
        if (progress) {
          onEvent(progress);
          return;
        }
        const entry = parsePrintedLine(line);
        if (entry) {
          printed[entry.field] = entry.value;
        }
      },
    });

    if (result.code !== 0) {
      const detail = summarizeStderr(result.stderr) || `exit code ${result.code}`;
      return { success: false, error: `Download failed: ${detail}` };
    }

    const sourcePath = printed.file;
    if (!sourcePath) {
      return { success: false, error: 'Download failed: yt-dlp did not report the downloaded file.' };
    }

    const details: TrackDetails = { title: printed.title, artist: printed.artist };
    const fileName = request.nameFile(details);
    const filePath = path.join(request.outputDir, `${fileName}.${AUDIO_FORMATS[request.format].extension}`);

    onEvent({ kind: 'phase', phase: 'converting' });

    try {
      await this.convert(sourcePath, filePath, request);
    } catch (error) {
      await rm(filePath, { force: true });
      return { success: false, error: `Conversion failed: ${errorMessage(error)}` };
    }

    return { success: true, filePath, details };
  }

  private async convert(sourcePath: string, filePath: string, request: TrackDownloadRequest): Promise<void> {
    try {
      await convertAudio(sourcePath, filePath, request.format, request.quality);
    } catch (error) {
      // ffmpeg shares the terminal's Ctrl+C; a cancelled job still finishes this track
      if (!request.signal?.aborted) {
        throw error;
      }
      logger.debug(`Conversion interrupted, running it again: ${errorMessage(error)}`);
      await convertAudio(sourcePath, filePath, request.format, request.quality);
    }
  }
}
