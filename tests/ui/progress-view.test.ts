import ora from 'ora';
import { describe, it, expect } from 'vitest';
import {
  ProgressView,
  exitCodeFor,
  formatPercent,
  renderBar,
  renderProgress,
  summarizeOutcome,
} from '../../src/ui/progress-view.js';
import { createJob, type JobOutcome } from '../../src/services/downloader/orchestrator.js';
import type { TrackRef, TrackStatus } from '../../src/types/index.js';

function outcomeWith(status: JobOutcome['status'], statuses: TrackStatus[], error?: Error): JobOutcome {
  const job = createJob('https://soundcloud.com/someone/sets/road-trip');
  job.title = 'Road Trip';
  job.folderPath = '/music/Road Trip';
  job.status = status;
  job.tracks = statuses.map((trackStatus, index): TrackRef => ({
    index,
    id: String(index + 1),
    title: `Song ${index + 1}`,
    source: `https://soundcloud.com/someone/song-${index + 1}`,
    status: trackStatus,
  }));
  job.failedTracks = job.tracks
    .filter((track) => track.status === 'failed')
    .map((track) => ({ track, error: 'Download failed: ERROR: gone' }));
  return { job, status, failedTracks: job.failedTracks, error };
}

describe('renderBar', () => {
  it('should fill the bar in proportion to the percentage', () => {
    expect(renderBar(30, 20)).toBe('[██████░░░░░░░░░░░░░░]');
    expect(renderBar(100, 4)).toBe('[████]');
  });

  it('should clamp out-of-range values', () => {
    expect(renderBar(-5, 4)).toBe('[░░░░]');
    expect(renderBar(250, 4)).toBe('[████]');
  });
});

describe('formatPercent', () => {
  it('should pad to a fixed width with one decimal', () => {
    expect(formatPercent(5)).toBe('  5.0%');
    expect(formatPercent(19.25)).toBe(' 19.3%');
    expect(formatPercent(100)).toBe('100.0%');
  });
});

describe('renderProgress', () => {
  it('should render the track line and the playlist line', () => {
    const text = renderProgress({ trackIndex: 2, trackTotal: 12, trackPercent: 30, playlistPercent: 19.2 }, 'Title');

    expect(text).toBe(
      'Track    [██████░░░░░░░░░░░░░░]  30.0%  3/12  Title\n' +
        'Playlist [████░░░░░░░░░░░░░░░░]  19.2%'
    );
  });

  it('should drop trailing space when there is no label', () => {
    const [trackLine] = renderProgress({ trackIndex: 0, trackTotal: 1, trackPercent: 0, playlistPercent: 0 }).split('\n');
    expect(trackLine).toBe('Track    [░░░░░░░░░░░░░░░░░░░░]   0.0%  1/1');
  });
});

describe('summarizeOutcome', () => {
  it('should report a clean completion', () => {
    expect(summarizeOutcome(outcomeWith('completed', ['done', 'done']))).toEqual({
      level: 'succeed',
      text: 'Downloaded 2/2 tracks to /music/Road Trip',
      details: [],
    });
  });

  it('should report a completion with failures distinctly', () => {
    expect(summarizeOutcome(outcomeWith('completed', ['done', 'failed', 'done']))).toEqual({
      level: 'warn',
      text: 'Downloaded 2/3 tracks to /music/Road Trip (1 failed)',
      details: ['Song 2: Download failed: ERROR: gone'],
    });
  });

  it('should fail when no track made it', () => {
    expect(summarizeOutcome(outcomeWith('completed', ['failed'])).level).toBe('fail');
  });

  it('should report cancellation, empty playlists and failed jobs', () => {
    expect(summarizeOutcome(outcomeWith('aborted', ['done', 'failed', 'pending'])).text).toBe(
      'Cancelled after 2/3 tracks (1 downloaded)'
    );
    expect(summarizeOutcome(outcomeWith('empty', [])).text).toBe('The playlist has no tracks; nothing to download');
    expect(summarizeOutcome(outcomeWith('failed', [], new Error('"yt-dlp" was not found.')))).toEqual({
      level: 'fail',
      text: 'Download failed: "yt-dlp" was not found.',
      details: [],
    });
  });
});

describe('exitCodeFor', () => {
  it('should map outcomes to process exit codes', () => {
    expect(exitCodeFor(outcomeWith('completed', ['done', 'done']))).toBe(0);
    expect(exitCodeFor(outcomeWith('completed', ['done', 'failed']))).toBe(2);
    expect(exitCodeFor(outcomeWith('completed', ['failed']))).toBe(1);
    expect(exitCodeFor(outcomeWith('empty', []))).toBe(0);
    expect(exitCodeFor(outcomeWith('aborted', ['done', 'pending']))).toBe(130);
    expect(exitCodeFor(outcomeWith('failed', [], new Error('boom')))).toBe(1);
  });
});

describe('ProgressView', () => {
  const track: TrackRef = {
    index: 0,
    id: '1',
    title: 'Song 1',
    source: 'https://soundcloud.com/someone/song-1',
    status: 'downloading',
  };

  it('should put the latest snapshot into the spinner text', () => {
    const spinner = ora({ isSilent: true });
    const view = new ProgressView(spinner);
    const snapshot = { trackIndex: 0, trackTotal: 2, trackPercent: 50, playlistPercent: 25 };

    view.onTrackStart(track);
    view.onProgress(snapshot);

    expect(spinner.text).toBe(renderProgress(snapshot, 'Song 1'));
  });

  it('should show when a track is being converted', () => {
    const spinner = ora({ isSilent: true });
    const view = new ProgressView(spinner);
    const snapshot = { trackIndex: 0, trackTotal: 2, trackPercent: 100, playlistPercent: 49.5 };

    view.onProgress(snapshot);
    view.onTrackPhase(track, 'converting');

    expect(spinner.text).toBe(renderProgress(snapshot, 'Converting: Song 1'));
  });
});
