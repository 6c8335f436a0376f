import type { TrackRef } from '../types/index.js';

export class DownloaderError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type ResolutionFailure = 'invalid-url' | 'unreachable' | 'malformed' | 'empty';

// The playlist could not be enumerated; the whole job stops.
export class ResolutionError extends DownloaderError {
    readonly reason: ResolutionFailure;

    constructor(reason: ResolutionFailure, message: string, options?: ErrorOptions) {
        super(message, options);
        this.reason = reason;
    }
}

// One track failed; the job moves on to the next one.
export class TrackDownloadError extends DownloaderError {
    readonly track: TrackRef;

    constructor(track: TrackRef, message: string, options?: ErrorOptions) {
        super(message, options);
        this.track = track;
    }
}

// yt-dlp, ffmpeg or a required encoder is not available.
export class FatalEnvironmentError extends DownloaderError {}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
