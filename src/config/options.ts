import os from 'os';
import path from 'path';
import { InvalidArgumentError } from 'commander';
import type { AudioFormat, AudioFormatSpec, DownloaderConfig } from '../types/index.js';

export const AUDIO_FORMATS: Record<AudioFormat, AudioFormatSpec> = {
  mp3: { extension: 'mp3', codec: 'libmp3lame', muxer: 'mp3', lossy: true },
  m4a: { extension: 'm4a', codec: 'aac', muxer: 'ipod', lossy: true },
  opus: { extension: 'opus', codec: 'libopus', muxer: 'opus', lossy: true },
  ogg: { extension: 'ogg', codec: 'libvorbis', muxer: 'ogg', lossy: true },
  flac: { extension: 'flac', codec: 'flac', muxer: 'flac', lossy: false },
  wav: { extension: 'wav', codec: 'pcm_s16le', muxer: 'wav', lossy: false },
};

export const DEFAULT_FORMAT: AudioFormat = 'mp3';
export const DEFAULT_QUALITY = 192;
export const DEFAULT_OUTPUT_DIR = path.join(os.homedir(), 'Downloads', 'Playlists');

const MIN_QUALITY = 32;
const MAX_QUALITY = 320;

function isAudioFormat(value: string): value is AudioFormat {
  return Object.hasOwn(AUDIO_FORMATS, value);
}

export function parseFormat(value: string): AudioFormat {
  const format = value.trim().toLowerCase();
  if (!isAudioFormat(format)) {
    throw new InvalidArgumentError(`Supported formats: ${Object.keys(AUDIO_FORMATS).join(', ')}.`);
  }
  return format;
}

export function parseQuality(value: string): number {
  const quality = Number(value);
  if (!Number.isInteger(quality) || quality < MIN_QUALITY || quality > MAX_QUALITY) {
    throw new InvalidArgumentError(`Quality must be a whole number of kbps between ${MIN_QUALITY} and ${MAX_QUALITY}.`);
  }
  return quality;
}

// Shape commander hands to the action handler
export interface CliOptions {
  output: string;
  format: AudioFormat;
  quality: number;
  cookies?: string;
  ytDlp: string;
  ffmpeg?: string;
  metadata: boolean;
  verbose?: boolean;
}

export function buildConfig(options: CliOptions): DownloaderConfig {
  return {
    outputDir: path.resolve(options.output),
    format: options.format,
    quality: options.quality,
    cookiesFile: options.cookies ? path.resolve(options.cookies) : undefined,
    ytDlpPath: options.ytDlp,
    ffmpegPath: options.ffmpeg,
    // ID3 tags only exist for MP3
    metadata: options.metadata && options.format === 'mp3',
    verbose: options.verbose ?? false,
  };
}
