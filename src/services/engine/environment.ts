import { AUDIO_FORMATS } from '../../config/options.js';
import { FatalEnvironmentError } from '../../utils/errors.js';
import { listEncoders, useFfmpegBinary } from './converter.js';
import { runCommand, summarizeStderr } from './process.js';
import type { DownloaderConfig } from '../../types/index.js';

export interface EnvironmentReport {
  ytDlpVersion: string;
  encoder: string;
}

/**
 * Verifies the external tools a job needs before anything is resolved:
 * yt-dlp must run, and ffmpeg must carry an encoder for the output format.
 */
export async function checkEnvironment(
  config: Pick<DownloaderConfig, 'ytDlpPath' | 'ffmpegPath' | 'format'>
): Promise<EnvironmentReport> {
  const version = await runCommand(config.ytDlpPath, ['--version']);
  if (version.code !== 0) {
    const detail = summarizeStderr(version.stderr) || `exit code ${version.code}`;
    throw new FatalEnvironmentError(`"${config.ytDlpPath} --version" failed: ${detail}`);
  }

  if (config.ffmpegPath) {
    useFfmpegBinary(config.ffmpegPath);
  }

  const encoder = AUDIO_FORMATS[config.format].codec;
  const encoders = await listEncoders();
  if (!Object.hasOwn(encoders, encoder)) {
    throw new FatalEnvironmentError(`ffmpeg has no "${encoder}" encoder, which ${config.format} output needs.`);
  }

  return { ytDlpVersion: version.stdout.trim(), encoder };
}
