import ffmpeg from 'fluent-ffmpeg';
import { AUDIO_FORMATS } from '../../config/options.js';
import { FatalEnvironmentError } from '../../utils/errors.js';
import type { AudioFormat } from '../../types/index.js';

export function useFfmpegBinary(ffmpegPath: string): void {
  ffmpeg.setFfmpegPath(ffmpegPath);
}

/**
 * Transcodes a downloaded stream into the target audio format, dropping
 * any embedded video or artwork stream.
 */
export function convertAudio(
  inputPath: string,
  outputPath: string,
  format: AudioFormat,
  quality: number
): Promise<void> {
  const target = AUDIO_FORMATS[format];

  return new Promise<void>((resolve, reject) => {
    const command = ffmpeg(inputPath).noVideo().audioCodec(target.codec).format(target.muxer);

    if (target.lossy) {
      command.audioBitrate(quality);
    }

    command
      .on('end', () => resolve())
      .on('error', (err: Error) => reject(err))
      .save(outputPath);
  });
}

export function listEncoders(): Promise<ffmpeg.Encoders> {
  return new Promise((resolve, reject) => {
    ffmpeg.getAvailableEncoders((err: unknown, encoders: ffmpeg.Encoders) => {
      if (err) {
        reject(new FatalEnvironmentError('ffmpeg was not found. Install it or pass --ffmpeg <path>.', { cause: err }));
        return;
      }
      resolve(encoders);
    });
  });
}
