import type { ProgressSnapshot, RawProgress } from '../../types/index.js';

// Share of its slot a track may fill on the playlist bar before it is finished
const IN_FLIGHT_CEILING = 0.99;

export function clampPercent(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

export function trackPercentOf(event: RawProgress): number | null {
  if (event.kind === 'percent') {
    return clampPercent(event.percent);
  }
  if (!event.totalBytes || event.totalBytes <= 0) {
    return null;
  }
  return clampPercent((event.downloadedBytes / event.totalBytes) * 100);
}

export function playlistPercentOf(trackIndex: number, trackPercent: number, trackTotal: number): number {
  return clampPercent(((trackIndex + trackPercent / 100) / trackTotal) * 100);
}

/**
 * Folds per-track engine progress into the two numbers the view shows.
 * The playlist value never moves backwards, and a track's slot is only
 * filled completely once the track has a terminal status.
 */
export class ProgressAggregator {
  private readonly trackTotal: number;
  private trackIndex = 0;
  private trackPercent = 0;
  private playlistPercent = 0;

  constructor(trackTotal: number) {
    if (!Number.isInteger(trackTotal) || trackTotal <= 0) {
      throw new RangeError(`Track total must be a positive integer, got ${trackTotal}`);
    }
    this.trackTotal = trackTotal;
  }

  beginTrack(index: number): ProgressSnapshot {
    this.assertIndex(index);
    this.trackIndex = index;
    this.trackPercent = 0;
    this.raisePlaylist(playlistPercentOf(index, 0, this.trackTotal));
    return this.snapshot();
  }

  update(event: RawProgress): ProgressSnapshot {
    const percent = trackPercentOf(event);
    if (percent !== null) {
      this.trackPercent = percent;
      const inFlight = Math.min(percent / 100, IN_FLIGHT_CEILING) * 100;
      this.raisePlaylist(playlistPercentOf(this.trackIndex, inFlight, this.trackTotal));
    }
    return this.snapshot();
  }

  completeTrack(index: number, succeeded: boolean): ProgressSnapshot {
    this.assertIndex(index);
    this.trackIndex = index;
    if (succeeded) {
      this.trackPercent = 100;
    }
    this.raisePlaylist(playlistPercentOf(index + 1, 0, this.trackTotal));
    return this.snapshot();
  }

  snapshot(): ProgressSnapshot {
    return {
      trackIndex: this.trackIndex,
      trackTotal: this.trackTotal,
      trackPercent: this.trackPercent,
      playlistPercent: this.playlistPercent,
    };
  }

  private raisePlaylist(value: number) {
    this.playlistPercent = Math.max(this.playlistPercent, value);
  }

  private assertIndex(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.trackTotal) {
      throw new RangeError(`Track index ${index} is outside [0, ${this.trackTotal})`);
    }
  }
}
