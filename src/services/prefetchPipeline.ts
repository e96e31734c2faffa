/**
 * Prefetch Pipeline
 *
 * Downloads upcoming tracks into the track cache ahead of playback. Work is
 * bounded by a small lookahead window and a p-queue concurrency limit
 * (sequential by default: parallel media downloads only split bandwidth).
 * Concurrent requests for the same track share a single download.
 */

import PQueue from "p-queue";
import { AudioValidator } from "./audioValidator";
import { TrackCache } from "./trackCache";
import { ServiceClient, Track } from "./types";
import {
    BackoffPolicy,
    retryWithBackoff,
    Sleeper,
} from "../utils/backoff";
import {
    CacheError,
    classifyNetworkError,
    DecodeError,
    DownloadError,
    getErrorMessage,
} from "../utils/errors";
import { createLogger, Logger } from "../utils/logger";

export interface CacheHandle {
    readonly track: Track;
    readonly format: string;
    readonly byteLength: number;
    /** Cached bytes, re-downloading once if the entry was evicted meanwhile. */
    read(): Promise<Buffer>;
    /** Drops the eviction pin. Idempotent. */
    release(): void;
}

export type PrefetchOutcome =
    | { status: "ready"; track: Track; handle: CacheHandle }
    | { status: "skipped"; track: Track; error: DownloadError | DecodeError };

interface InFlightDownload {
    promise: Promise<PreparedAudio>;
    controller: AbortController;
}

interface PreparedAudio {
    format: string;
    byteLength: number;
    /** Present only when the cache refused the write. */
    memoryBytes?: Buffer;
}

export interface PrefetchPipelineOptions {
    client: Pick<ServiceClient, "downloadTrackAudio">;
    cache: TrackCache;
    validator: AudioValidator;
    retryPolicy: BackoffPolicy;
    /** Tracks kept ready, counting the one about to play. */
    lookahead?: number;
    concurrency?: number;
    logger?: Logger;
    sleep?: Sleeper;
    random?: () => number;
}

export class PrefetchPipeline {
    private readonly queue: PQueue;
    private readonly inFlight = new Map<string, InFlightDownload>();
    private readonly log: Logger;
    private readonly lookahead: number;
    private controller = new AbortController();

    constructor(private readonly options: PrefetchPipelineOptions) {
        this.lookahead = Math.max(1, options.lookahead ?? 2);
        this.queue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? 1) });
        this.log = options.logger ?? createLogger("prefetch");
    }

    get lookaheadDepth(): number {
        return this.lookahead;
    }

    get pendingDownloads(): number {
        return this.inFlight.size;
    }

    /** Restores the cache index from disk; safe to call before any download. */
    initialize(): Promise<void> {
        return this.options.cache.initialize();
    }

    pin(trackId: string): void {
        this.options.cache.pin(trackId);
    }

    unpin(trackId: string): void {
        this.options.cache.unpin(trackId);
    }

    /**
     * Starts background downloads for the first `lookahead` tracks. Failures
     * are logged here and reported again when the track is acquired.
     */
    prefetch(upcoming: readonly Track[]): void {
        for (const track of upcoming.slice(0, this.lookahead)) {
            this.prepare(track).catch((error) => {
                this.log.debug("Background prefetch did not complete", {
                    trackId: track.id,
                    error: getErrorMessage(error),
                });
            });
        }
    }

    /**
     * Lazily yields each upcoming track once its audio is cached, keeping the
     * lookahead window downloading ahead of the consumer.
     */
    async *ensureReady(upcoming: readonly Track[]): AsyncGenerator<PrefetchOutcome> {
        for (let index = 0; index < upcoming.length; index++) {
            this.prefetch(upcoming.slice(index));
            yield await this.acquire(upcoming[index]);
        }
    }

    /**
     * Ensures one track is cached and returns a pinned handle to it, or a
     * skipped outcome when the track cannot be fetched or decoded. Rejects with
     * a cancelled DownloadError when `cancel` or `cancelAll` runs first.
     */
    async acquire(track: Track): Promise<PrefetchOutcome> {
        const signal = this.controller.signal;
        let prepared: PreparedAudio;
        try {
            prepared = await this.prepare(track);
        } catch (error) {
            if (error instanceof DecodeError) {
                return { status: "skipped", track, error };
            }
            if (error instanceof DownloadError && error.kind !== "cancelled") {
                return { status: "skipped", track, error };
            }
            throw error;
        }

        return {
            status: "ready",
            track,
            handle: this.createHandle(track, prepared, signal),
        };
    }

    /** Drops a cached blob that turned out to be unplayable. */
    async discard(track: Track): Promise<void> {
        try {
            await this.options.cache.remove(track.id);
        } catch (error) {
            this.log.warn("Failed to discard cached track", {
                trackId: track.id,
                error,
            });
        }
    }

    /**
     * Abandons the download of one track, queued or running. Returns false
     * when nothing was in flight for it.
     */
    cancel(trackId: string): boolean {
        const download = this.inFlight.get(trackId);
        if (!download) {
            return false;
        }
        this.log.debug("Cancelling download", { trackId });
        this.inFlight.delete(trackId);
        download.controller.abort(
            new DownloadError("cancelled", "Download cancelled", { trackId })
        );
        return true;
    }

    /**
     * Abandons every in-flight and queued download. Downloads stop at their
     * next suspend point; a blob already being written finishes its write.
     */
    cancelAll(): void {
        if (this.inFlight.size > 0) {
            this.log.debug("Cancelling in-flight downloads", {
                count: this.inFlight.size,
            });
        }
        const reason = new DownloadError("cancelled", "Prefetch cancelled");
        const downloads = [...this.inFlight.values()];
        this.inFlight.clear();
        for (const download of downloads) {
            download.controller.abort(reason);
        }
        this.controller.abort(reason);
        this.controller = new AbortController();
    }

    private prepare(track: Track): Promise<PreparedAudio> {
        const entry = this.options.cache.getEntry(track.id);
        if (entry) {
            return Promise.resolve({
                format: entry.format,
                byteLength: entry.byteLength,
            });
        }

        const existing = this.inFlight.get(track.id);
        if (existing) {
            return existing.promise;
        }

        const controller = new AbortController();
        const pending = this.queue
            .add(() => this.downloadIntoCache(track, controller.signal))
            .finally(() => {
                if (this.inFlight.get(track.id)?.promise === pending) {
                    this.inFlight.delete(track.id);
                }
            });
        this.inFlight.set(track.id, { promise: pending, controller });
        return pending;
    }

    private async downloadIntoCache(
        track: Track,
        signal: AbortSignal
    ): Promise<PreparedAudio> {
        // Cancelled while still queued.
        signal.throwIfAborted();

        // Another caller may have finished the same track while this one queued.
        const entry = this.options.cache.getEntry(track.id);
        if (entry) {
            return { format: entry.format, byteLength: entry.byteLength };
        }

        const { bytes, format } = await this.downloadValidated(track, signal);
        signal.throwIfAborted();

        try {
            await this.options.cache.put(track.id, bytes, format);
            return { format, byteLength: bytes.length };
        } catch (error) {
            if (!(error instanceof CacheError)) {
                throw error;
            }
            this.log.warn("Cache write failed; holding track in memory", {
                trackId: track.id,
                error,
            });
            return { format, byteLength: bytes.length, memoryBytes: bytes };
        }
    }

    private async downloadValidated(
        track: Track,
        signal: AbortSignal
    ): Promise<{ bytes: Buffer; format: string }> {
        signal.throwIfAborted();
        this.log.debug("Downloading track", { trackId: track.id, title: track.title });

        const bytes = await retryWithBackoff(
            () => this.download(track, signal),
            {
                policy: this.options.retryPolicy,
                shouldRetry: (error) =>
                    error instanceof DownloadError && error.kind === "transient",
                onRetry: (error, attempt, delayMs) =>
                    this.log.warn("Track download failed, retrying", {
                        trackId: track.id,
                        attempt,
                        delayMs,
                        error: getErrorMessage(error),
                    }),
                signal,
                sleep: this.options.sleep,
                random: this.options.random,
            }
        );

        const inspection = await this.options.validator.inspect(bytes);
        return { bytes, format: inspection.format };
    }

    private async download(track: Track, signal: AbortSignal): Promise<Buffer> {
        let bytes: Buffer;
        try {
            bytes = await this.options.client.downloadTrackAudio(track.audioUrl, signal);
        } catch (error) {
            if (signal.aborted) {
                throw new DownloadError("cancelled", "Prefetch cancelled", {
                    trackId: track.id,
                });
            }
            throw toDownloadError(error, track);
        }

        if (bytes.length === 0) {
            throw new DownloadError("unretryable", "Track download returned no data", {
                trackId: track.id,
            });
        }
        return bytes;
    }

    private createHandle(
        track: Track,
        prepared: PreparedAudio,
        signal: AbortSignal
    ): CacheHandle {
        const cache = this.options.cache;
        let released = false;
        cache.pin(track.id);

        return {
            track,
            format: prepared.format,
            byteLength: prepared.byteLength,
            read: async () => {
                if (prepared.memoryBytes) {
                    return prepared.memoryBytes;
                }

                try {
                    const cached = await cache.get(track.id);
                    if (cached) {
                        return cached;
                    }
                } catch (error) {
                    this.log.warn("Cache read failed; downloading again", {
                        trackId: track.id,
                        error,
                    });
                }

                const { bytes, format } = await this.downloadValidated(track, signal);
                cache.put(track.id, bytes, format).catch((error) => {
                    this.log.warn("Failed to re-cache track", {
                        trackId: track.id,
                        error,
                    });
                });
                return bytes;
            },
            release: () => {
                if (!released) {
                    released = true;
                    cache.unpin(track.id);
                }
            },
        };
    }
}

function toDownloadError(error: unknown, track: Track): DownloadError {
    if (error instanceof DownloadError) {
        return error;
    }

    const failure = classifyNetworkError(error);
    return new DownloadError(
        failure === "transient" || failure === "rate-limited"
            ? "transient"
            : "unretryable",
        `Track download failed: ${getErrorMessage(error)}`,
        { trackId: track.id, failure }
    );
}
