#!/usr/bin/env node

import { Command } from 'commander';
import ora from 'ora';
import {
  DEFAULT_FORMAT,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_QUALITY,
  buildConfig,
  parseFormat,
  parseQuality,
  type CliOptions,
} from './config/options.js';
import { checkEnvironment } from './services/engine/environment.js';
import { killRunningCommands } from './services/engine/process.js';
import { YtDlpEngine } from './services/engine/ytdlp.js';
import { runPlaylistJob } from './services/downloader/orchestrator.js';
import { addMetadataToJob } from './services/metadata/tagger.js';
import { ProgressView, exitCodeFor } from './ui/progress-view.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('playlist-audio-dl')
  .description('Download a playlist as audio files, one track at a time')
  .version('1.0.0');

program
  .argument('<url>', 'Playlist URL (SoundCloud, YouTube or any site yt-dlp supports)')
  .option('-o, --output <dir>', 'Folder the playlist folder is created in', DEFAULT_OUTPUT_DIR)
  .option('-f, --format <format>', 'Output audio format (mp3, m4a, opus, ogg, flac, wav)', parseFormat, DEFAULT_FORMAT)
  .option('-q, --quality <kbps>', 'Bitrate for lossy formats', parseQuality, DEFAULT_QUALITY)
  .option('--cookies <file>', 'Path to cookies.txt file for private content')
  .option('--yt-dlp <path>', 'yt-dlp executable', 'yt-dlp')
  .option('--ffmpeg <path>', 'ffmpeg executable (defaults to the one on PATH)')
  .option('--no-metadata', 'Skip adding ID3 tags to MP3 files')
  .option('--verbose', 'Print debug output')
  .action(async (url: string, options: CliOptions) => {
    const config = buildConfig(options);
    logger.setVerbose(config.verbose);

    const spinner = ora('Checking yt-dlp and ffmpeg...').start();
    logger.setSpinner(spinner);

    // First Ctrl+C stops after the current track, a second one exits at once.
    // yt-dlp runs in its own process group, so only this handler sees the signal.
    const controller = new AbortController();
    const onInterrupt = () => {
      if (controller.signal.aborted) {
        spinner.stop();
        killRunningCommands();
        process.exit(130);
      }
      controller.abort();
      logger.warn('Cancelling after the current track finishes (Ctrl+C again to quit now)');
    };
    process.on('SIGINT', onInterrupt);

    try {
      const environment = await checkEnvironment(config);
      logger.debug(`yt-dlp ${environment.ytDlpVersion}, ffmpeg encoder ${environment.encoder}`);

      const engine = new YtDlpEngine({
        ytDlpPath: config.ytDlpPath,
        cookiesFile: config.cookiesFile,
        ffmpegPath: config.ffmpegPath,
      });
      const outcome = await runPlaylistJob(url, {
        engine,
        outputDir: config.outputDir,
        format: config.format,
        quality: config.quality,
        signal: controller.signal,
        listener: new ProgressView(spinner),
      });

      if (config.metadata && outcome.job.tracks.some((track) => track.status === 'done')) {
        spinner.start('Adding metadata tags...');
        await addMetadataToJob(outcome.job);
        spinner.stop();
      }

      process.exitCode = exitCodeFor(outcome);
    } catch (error) {
      // A job that got as far as the view has already reported itself
      if (spinner.isSpinning) {
        spinner.fail(`Download failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
      }
      logger.clearSpinner();
      if (config.verbose && error instanceof Error && error.cause) {
        logger.error(`Cause: ${String(error.cause)}`);
      }
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', onInterrupt);
      logger.clearSpinner();
    }
  });

await program.parseAsync();
