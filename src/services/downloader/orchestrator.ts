import PQueue from 'p-queue';
import { logger } from '../../utils/logger.js';
import {
  FatalEnvironmentError,
  ResolutionError,
  TrackDownloadError,
  errorMessage,
} from '../../utils/errors.js';
import { resolvePlaylist } from '../resolver/resolver.js';
import { ProgressAggregator } from '../progress/aggregator.js';
import { preparePlaylistFolder, TrackNamer, type PlaylistFolder } from '../storage/naming.js';
import type {
  AudioFormat,
  FailedTrack,
  JobStatus,
  MediaEngine,
  PlaylistJob,
  ProgressSnapshot,
  TerminalJobStatus,
  TrackPhase,
  TrackRef,
} from '../../types/index.js';

export interface JobOutcome {
  job: PlaylistJob;
  status: TerminalJobStatus;
  failedTracks: FailedTrack[];
  error?: Error;
}

export interface JobListener {
  onStateChange?: (status: JobStatus, job: PlaylistJob) => void;
  onTrackStart?: (track: TrackRef, index: number, total: number) => void;
  onTrackPhase?: (track: TrackRef, phase: TrackPhase) => void;
  onProgress?: (snapshot: ProgressSnapshot) => void;
  onTrackComplete?: (track: TrackRef, index: number, total: number) => void;
  onTrackError?: (track: TrackRef, error: TrackDownloadError) => void;
  onFinish?: (outcome: JobOutcome) => void;
}

export interface JobOptions {
  engine: MediaEngine;
  outputDir: string;
  format: AudioFormat;
  quality: number;
  // Checked between tracks; the track in progress always runs to its end
  signal?: AbortSignal;
  listener?: JobListener;
}

export function createJob(sourceUrl: string): PlaylistJob {
  return {
    sourceUrl: sourceUrl.trim(),
    title: '',
    folderName: '',
    folderPath: '',
    tracks: [],
    status: 'idle',
    failedTracks: [],
  };
}

/**
 * Resolves a playlist and downloads its tracks one at a time.
 *
 * A failing track is recorded and skipped. Resolution and environment
 * errors end the job: the listener sees the failed outcome and the error is
 * rethrown.
 */
export async function runPlaylistJob(url: string, options: JobOptions): Promise<JobOutcome> {
  const { engine, listener = {}, signal } = options;
  const job = createJob(url);

  const setStatus = (status: JobStatus) => {
    job.status = status;
    listener.onStateChange?.(status, job);
  };

  const finish = (status: TerminalJobStatus, error?: Error): JobOutcome => {
    setStatus(status);
    const outcome: JobOutcome = { job, status, failedTracks: job.failedTracks, error };
    listener.onFinish?.(outcome);
    return outcome;
  };

  const fail = (error: unknown): Error => {
    const err = error instanceof Error ? error : new Error(String(error));
    finish('failed', err);
    return err;
  };

  setStatus('resolving');

  try {
    const playlist = await resolvePlaylist(url, engine);
    job.title = playlist.title;
    job.uploader = playlist.uploader;
    job.tracks = playlist.tracks;
  } catch (error) {
    if (error instanceof ResolutionError && error.reason === 'empty') {
      logger.debug(error.message);
      return finish('empty', error);
    }
    throw fail(error);
  }

  if (signal?.aborted) {
    return finish('aborted');
  }

  let folder: PlaylistFolder;
  try {
    folder = await preparePlaylistFolder(options.outputDir, job.title, job.sourceUrl);
  } catch (error) {
    throw fail(error);
  }
  job.folderName = folder.name;
  job.folderPath = folder.path;

  const total = job.tracks.length;
  const aggregator = new ProgressAggregator(total);
  const namer = new TrackNamer();
  let aborted = false;
  let halted = false;

  logger.debug(`Downloading ${total} tracks into ${folder.path}`);
  setStatus('downloading');

  const processTrack = async (track: TrackRef, index: number): Promise<void> => {
    if (halted) {
      return;
    }
    if (aborted || signal?.aborted) {
      aborted = true;
      return;
    }

    track.status = 'downloading';
    listener.onTrackStart?.(track, index, total);
    listener.onProgress?.(aggregator.beginTrack(index));

    try {
      const result = await engine.downloadTrack(
        {
          sourceUrl: track.source,
          outputDir: folder.path,
          // Flat listings may carry no title or artist; prefer what the download reports
          nameFile: (details) => {
            track.title = details.title ?? track.title;
            track.artist = details.artist ?? track.artist;
            return namer.reserve(track.title);
          },
          format: options.format,
          quality: options.quality,
          signal,
        },
        (event) => {
          if (event.kind === 'phase') {
            listener.onTrackPhase?.(track, event.phase);
          } else {
            listener.onProgress?.(aggregator.update(event));
          }
        }
      );

      if (!result.success) {
        throw new TrackDownloadError(track, result.error);
      }

      track.status = 'done';
      track.filePath = result.filePath;
    } catch (error) {
      track.status = 'failed';
      if (error instanceof FatalEnvironmentError) {
        track.error = error.message;
        halted = true;
        throw error;
      }

      const failure =
        error instanceof TrackDownloadError
          ? error
          : new TrackDownloadError(track, errorMessage(error), { cause: error });
      track.error = failure.message;
      job.failedTracks.push({ track, error: failure.message });
      logger.debug(`Track ${index + 1}/${total} failed: ${failure.message}`);
      listener.onTrackError?.(track, failure);
    }

    listener.onProgress?.(aggregator.completeTrack(index, track.status === 'done'));
    if (track.status === 'done') {
      listener.onTrackComplete?.(track, index, total);
    }
  };

  // One worker: tracks run strictly in playlist order
  const queue = new PQueue({ concurrency: 1 });
  const runs = job.tracks.map((track, index) => queue.add(() => processTrack(track, index)));

  try {
    await Promise.all(runs);
  } catch (error) {
    queue.clear();
    throw fail(error);
  }

  return finish(aborted ? 'aborted' : 'completed');
}
