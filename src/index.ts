import { RadioConfig } from "./config";
import { AudioValidator, MusicMetadataValidator } from "./services/audioValidator";
import { PlaybackEngine } from "./services/playback/playbackEngine";
import { PrefetchPipeline } from "./services/prefetchPipeline";
import { SessionManager } from "./services/sessionManager";
import { TrackCache } from "./services/trackCache";
import { AudioSink, CredentialStore, ServiceClient } from "./services/types";
import { Sleeper } from "./utils/backoff";
import { createLogger, Logger } from "./utils/logger";

export * from "./config";
export * from "./services/types";
export * from "./services/audioSink";
export * from "./services/audioValidator";
export * from "./services/credentialStore";
export * from "./services/httpServiceClient";
export * from "./services/prefetchPipeline";
export * from "./services/sessionManager";
export * from "./services/trackCache";
export * from "./services/playback/commands";
export * from "./services/playback/feedbackQueue";
export * from "./services/playback/playbackEngine";
export * from "./services/playback/playbackStateMachine";
export * from "./services/playback/playlistCursor";
export * from "./services/playback/tiredRegistry";
export * from "./services/playback/volume";
export * from "./utils/backoff";
export * from "./utils/errors";
export { createLogger, withLogTiming } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";

export interface RadioCoreDeps {
    client: ServiceClient;
    credentials: CredentialStore;
    sink: AudioSink;
    validator?: AudioValidator;
    logger?: Logger;
    now?: () => number;
    sleep?: Sleeper;
    random?: () => number;
}

export interface RadioCore {
    session: SessionManager;
    cache: TrackCache;
    pipeline: PrefetchPipeline;
    engine: PlaybackEngine;
}

/** Wires the session, cache, prefetch pipeline and playback engine together. */
export function createRadioCore(config: RadioConfig, deps: RadioCoreDeps): RadioCore {
    const log = deps.logger ?? createLogger("tunewell");
    const { sleep, random } = deps;

    const session = new SessionManager({
        client: deps.client,
        credentials: deps.credentials,
        retryPolicy: config.retry.auth,
        logger: log.child("session"),
        sleep,
        random,
    });

    const cache = new TrackCache({
        directory: config.cache.directory,
        maxBytes: config.cache.maxBytes,
        logger: log.child("cache"),
        now: deps.now,
    });

    const pipeline = new PrefetchPipeline({
        client: deps.client,
        cache,
        validator: deps.validator ?? new MusicMetadataValidator(),
        retryPolicy: config.retry.download,
        lookahead: config.prefetch.lookahead,
        concurrency: config.prefetch.concurrency,
        logger: log.child("prefetch"),
        sleep,
        random,
    });

    const engine = new PlaybackEngine({
        session,
        client: deps.client,
        pipeline,
        sink: deps.sink,
        playlistRetryPolicy: config.retry.playlist,
        playlistRetryIntervalMs: config.retry.playlistRetryIntervalMs,
        tiredPeriodMs: config.tiredPeriodMs,
        initialVolume: config.volume.initial,
        volumeStep: config.volume.step,
        progressIntervalMs: config.progressIntervalMs,
        evictCompleted: config.cache.evictCompleted,
        logger: log.child("playback"),
        now: deps.now,
        sleep,
        random,
    });

    return { session, cache, pipeline, engine };
}
