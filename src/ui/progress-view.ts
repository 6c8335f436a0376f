import type { Ora } from 'ora';
import { clampPercent } from '../services/progress/aggregator.js';
import type { JobListener, JobOutcome } from '../services/downloader/orchestrator.js';
import type { TrackDownloadError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { JobStatus, PlaylistJob, ProgressSnapshot, TrackPhase, TrackRef } from '../types/index.js';

export const BAR_WIDTH = 20;

export function renderBar(percent: number, width: number = BAR_WIDTH): string {
  const filled = Math.round((clampPercent(percent) / 100) * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}]`;
}

export function formatPercent(percent: number): string {
  return `${clampPercent(percent).toFixed(1).padStart(5)}%`;
}

/**
 * Two-line progress block: the active track, then the whole playlist.
 */
export function renderProgress(snapshot: ProgressSnapshot, label = '', width: number = BAR_WIDTH): string {
  const position = `${snapshot.trackIndex + 1}/${snapshot.trackTotal}`;
  const trackLine = `Track    ${renderBar(snapshot.trackPercent, width)} ${formatPercent(snapshot.trackPercent)}  ${position}  ${label}`;
  const playlistLine = `Playlist ${renderBar(snapshot.playlistPercent, width)} ${formatPercent(snapshot.playlistPercent)}`;
  return `${trackLine.trimEnd()}\n${playlistLine}`;
}

export type SummaryLevel = 'succeed' | 'warn' | 'info' | 'fail';

export interface JobSummary {
  level: SummaryLevel;
  text: string;
  details: string[];
}

export function summarizeOutcome(outcome: JobOutcome): JobSummary {
  const { job } = outcome;
  const total = job.tracks.length;
  const done = job.tracks.filter((track) => track.status === 'done').length;
  const details = outcome.failedTracks.map(({ track, error }) => `${track.title}: ${error}`);

  switch (outcome.status) {
    case 'completed':
      if (outcome.failedTracks.length === 0) {
        return { level: 'succeed', text: `Downloaded ${done}/${total} tracks to ${job.folderPath}`, details };
      }
      return {
        level: done === 0 ? 'fail' : 'warn',
        text: `Downloaded ${done}/${total} tracks to ${job.folderPath} (${outcome.failedTracks.length} failed)`,
        details,
      };
    case 'aborted':
      return {
        level: 'warn',
        text: `Cancelled after ${done + outcome.failedTracks.length}/${total} tracks (${done} downloaded)`,
        details,
      };
    case 'empty':
      return { level: 'info', text: 'The playlist has no tracks; nothing to download', details };
    case 'failed':
      return { level: 'fail', text: `Download failed: ${outcome.error?.message ?? 'Unknown error'}`, details };
  }
}

export function exitCodeFor(outcome: JobOutcome): number {
  switch (outcome.status) {
    case 'completed': {
      if (outcome.failedTracks.length === 0) return 0;
      const anyDone = outcome.job.tracks.some((track) => track.status === 'done');
      return anyDone ? 2 : 1;
    }
    case 'empty':
      return 0;
    case 'aborted':
      return 130;
    case 'failed':
      return 1;
  }
}

/**
 * Terminal rendering of a running job. Holds the latest snapshot and puts
 * it in the spinner's text; the spinner repaints it on its own frame timer.
 */
export class ProgressView implements JobListener {
  private spinner: Ora;
  private snapshot: ProgressSnapshot | null = null;
  private label = '';

  constructor(spinner: Ora) {
    this.spinner = spinner;
  }

  onStateChange = (status: JobStatus, job: PlaylistJob): void => {
    if (status === 'resolving') {
      this.spinner.start('Resolving playlist...');
    } else if (status === 'downloading') {
      logger.success(`Found playlist "${job.title}" with ${job.tracks.length} tracks`);
      logger.info(`Saving to ${job.folderPath}`);
    }
  };

  onTrackStart = (track: TrackRef): void => {
    this.label = track.title;
    this.render();
  };

  onTrackPhase = (track: TrackRef, phase: TrackPhase): void => {
    this.label = phase === 'converting' ? `Converting: ${track.title}` : track.title;
    this.render();
  };

  onProgress = (snapshot: ProgressSnapshot): void => {
    this.snapshot = snapshot;
    this.render();
  };

  onTrackComplete = (track: TrackRef, index: number, total: number): void => {
    logger.success(`[${index + 1}/${total}] ${track.title}`);
  };

  onTrackError = (track: TrackRef, error: TrackDownloadError): void => {
    logger.error(`[${track.index + 1}/${this.snapshot?.trackTotal ?? '?'}] ${track.title} - ${error.message}`);
  };

  onFinish = (outcome: JobOutcome): void => {
    const summary = summarizeOutcome(outcome);
    this.spinner[summary.level](summary.text);
    if (summary.details.length > 0) {
      logger.warn('Failed downloads:');
      for (const detail of summary.details) {
        logger.error(`  - ${detail}`);
      }
    }
  };

  private render() {
    if (this.snapshot) {
      this.spinner.text = renderProgress(this.snapshot, this.label);
    } else {
      this.spinner.text = this.label;
    }
  }
}
