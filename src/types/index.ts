// Per-track lifecycle
export type TrackStatus = 'pending' | 'downloading' | 'done' | 'failed';

// Track resolved from a playlist
export interface TrackRef {
    readonly index: number;
    readonly id: string;
    // Flat listings can lack these; the download fills them in
    title: string;
    readonly source: string;
    artist?: string;
    readonly coverUrl?: string;
    status: TrackStatus;
    filePath?: string;
    error?: string;
}

// Playlist as enumerated by the engine, before any payload is fetched
export interface ResolvedPlaylist {
    title: string;
    uploader?: string;
    tracks: TrackRef[];
}

export type JobStatus =
    | 'idle'
    | 'resolving'
    | 'downloading'
    | 'completed'
    | 'aborted'
    | 'empty'
    | 'failed';

export type TerminalJobStatus = Extract<JobStatus, 'completed' | 'aborted' | 'empty' | 'failed'>;

export interface FailedTrack {
    track: TrackRef;
    error: string;
}

// One run of the tool against one playlist URL
export interface PlaylistJob {
    sourceUrl: string;
    title: string;
    uploader?: string;
    folderName: string;
    folderPath: string;
    tracks: TrackRef[];
    status: JobStatus;
    failedTracks: FailedTrack[];
}

export interface ProgressSnapshot {
    trackIndex: number;
    trackTotal: number;
    trackPercent: number;
    playlistPercent: number;
}

// Raw progress reported by the engine for the active track
export type RawProgress =
    | { kind: 'bytes'; downloadedBytes: number; totalBytes: number | null }
    | { kind: 'percent'; percent: number };

export type TrackPhase = 'downloading' | 'converting';

export type EngineEvent = RawProgress | { kind: 'phase'; phase: TrackPhase };

// What the engine learns about an item while fetching it
export interface TrackDetails {
    title?: string;
    artist?: string;
}

export interface TrackDownloadRequest {
    sourceUrl: string;
    outputDir: string;
    // Final file name without extension, picked once the item's details are known
    nameFile: (details: TrackDetails) => string;
    format: AudioFormat;
    quality: number; // kbps, lossy formats only
    // Set once the job is cancelled; the track in flight still finishes
    signal?: AbortSignal;
}

export type TrackDownloadOutcome =
    | { success: true; filePath: string; details: TrackDetails }
    | { success: false; error: string };

// Boundary to the external download/transcode tools
export interface MediaEngine {
    fetchPlaylist(url: string): Promise<ResolvedPlaylist>;
    downloadTrack(
        request: TrackDownloadRequest,
        onEvent: (event: EngineEvent) => void
    ): Promise<TrackDownloadOutcome>;
}

export type AudioFormat = 'mp3' | 'm4a' | 'opus' | 'ogg' | 'flac' | 'wav';

export interface AudioFormatSpec {
    extension: string;
    codec: string;
    muxer: string;
    lossy: boolean;
}

export interface DownloaderConfig {
    outputDir: string;
    format: AudioFormat;
    quality: number;
    cookiesFile?: string;
    ytDlpPath: string;
    ffmpegPath?: string;
    metadata: boolean;
    verbose: boolean;
}
