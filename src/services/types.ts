// ── Domain ─────────────────────────────────────────────────────────

export type TrackRating = "unrated" | "thumbs-up" | "thumbs-down";

export interface Station {
    id: string;
    name: string;
    isQuickMix: boolean;
}

export interface Track {
    /** Per-playlist token; also the cache key. */
    id: string;
    /** Stable song identity across playlist fetches. */
    musicId: string;
    stationId: string;
    title: string;
    artist: string;
    album: string;
    audioUrl: string;
    durationMs: number;
    rating: TrackRating;
    /** Epoch ms until which the track is suppressed. */
    tiredUntil?: number;
}

export interface Credentials {
    username: string;
    password: string;
}

export interface SessionToken {
    authToken: string;
    userId: string;
    partnerId?: string;
}

// ── Collaborators ──────────────────────────────────────────────────

/**
 * Remote radio service. Failures surface as ApiError (station/playlist/feedback),
 * AuthError (rejected credentials) or DownloadError (audio fetch).
 */
export interface ServiceClient {
    authenticate(credentials: Credentials): Promise<SessionToken>;
    listStations(session: SessionToken): Promise<Station[]>;
    getPlaylist(session: SessionToken, stationId: string): Promise<Track[]>;
    downloadTrackAudio(url: string, signal?: AbortSignal): Promise<Buffer>;
    rateTrack(
        session: SessionToken,
        track: Track,
        rating: TrackRating
    ): Promise<void>;
    markTired(session: SessionToken, track: Track): Promise<void>;
}

export interface CredentialStore {
    load(): Promise<Credentials | null>;
    save(credentials: Credentials): Promise<void>;
    clear(): Promise<void>;
}

/**
 * Decodes and plays one blob at a time. `finished` listeners fire only when
 * audio runs to its natural end, never as a consequence of `stop()`.
 */
export interface AudioSink {
    load(bytes: Buffer, format: string): Promise<void>;
    play(): void;
    pause(): void;
    setVolume(volume: number): void;
    stop(): void;
    onFinished(listener: () => void): () => void;
}
