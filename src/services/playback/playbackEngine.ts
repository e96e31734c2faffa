/**
 * Playback Engine
 *
 * Consumes one channel carrying both UI commands and the results of its own
 * background work (playlist fetches, track preparation, sink completion).
 * Every network call runs off the loop and reports back as a message, so a
 * slow service never delays a pause or a volume change. Results carry the
 * station generation or load token they were started under; stale ones are
 * released and dropped.
 */

import { PrefetchPipeline, CacheHandle } from "../prefetchPipeline";
import { SessionManager, SessionSnapshot } from "../sessionManager";
import { AudioSink, ServiceClient, Station, Track, TrackRating } from "../types";
import {
    BackoffPolicy,
    computeBackoffDelay,
    DEFAULT_BACKOFF_POLICY,
    retryWithBackoff,
    RetryOptions,
    Sleeper,
} from "../../utils/backoff";
import { AsyncQueue } from "../../utils/asyncQueue";
import {
    ApiError,
    AuthError,
    DecodeError,
    DownloadError,
    ErrorCode,
    getErrorMessage,
} from "../../utils/errors";
import { createLogger, Logger, withLogTiming } from "../../utils/logger";
import {
    NotificationLevel,
    PlayerCommand,
    StatusEvent,
    StatusListener,
} from "./commands";
import { FeedbackQueue } from "./feedbackQueue";
import { PlaybackState, PlaybackStateMachine, StopReason } from "./playbackStateMachine";
import { PlaylistCursor } from "./playlistCursor";
import { DEFAULT_TIRED_PERIOD_MS, TiredRegistry } from "./tiredRegistry";
import { VolumeControl } from "./volume";

type InternalEvent =
    | { type: "PlaylistLoaded"; generation: number; tracks: Track[] }
    | { type: "PlaylistFailed"; generation: number; error: unknown }
    | { type: "PlaylistRetryDue"; generation: number }
    | { type: "TrackReady"; loadToken: number; handle: CacheHandle; bytes: Buffer }
    | { type: "TrackUnavailable"; loadToken: number; track: Track; error: unknown }
    | { type: "TrackFinished"; loadToken: number }
    | { type: "StationsLoaded"; stations: Station[] }
    | { type: "StationsFailed"; error: unknown }
    | { type: "SessionChanged"; snapshot: SessionSnapshot };

type EngineMessage = PlayerCommand | InternalEvent;

export interface PlaybackEngineOptions {
    session: SessionManager;
    client: Pick<ServiceClient, "listStations" | "getPlaylist" | "rateTrack" | "markTired">;
    pipeline: PrefetchPipeline;
    sink: AudioSink;
    /** Bounded retries for station list and playlist fetches. */
    playlistRetryPolicy: BackoffPolicy;
    feedbackRetryPolicy?: BackoffPolicy;
    /** Wait before trying a failing station again after retries are spent. */
    playlistRetryIntervalMs?: number;
    tiredPeriodMs?: number;
    initialVolume?: number;
    volumeStep?: number;
    /** 0 disables periodic progress events. */
    progressIntervalMs?: number;
    /** Remove a track's cached audio once it plays to the end. */
    evictCompleted?: boolean;
    feedback?: FeedbackQueue;
    logger?: Logger;
    now?: () => number;
    sleep?: Sleeper;
    random?: () => number;
}

export interface PlaybackSnapshot {
    state: PlaybackState;
    stationId: string | null;
    current: Track | null;
    upcoming: string[];
    volume: number;
    muted: boolean;
    elapsedMs: number;
}

const DEFAULT_PLAYLIST_RETRY_INTERVAL_MS = 60 * 1000;

export class PlaybackEngine {
    private readonly channel = new AsyncQueue<EngineMessage>();
    private readonly listeners = new Set<StatusListener>();
    private readonly machine: PlaybackStateMachine;
    private readonly tired: TiredRegistry;
    private readonly cursor: PlaylistCursor;
    private readonly volume: VolumeControl;
    private readonly feedback: FeedbackQueue;
    private readonly log: Logger;
    private readonly now: () => number;

    private stationId: string | null = null;
    private stations: Station[] | null = null;
    private stationsInFlight = false;
    private stationGeneration = 0;
    private stationController = new AbortController();
    private fetchingGeneration: number | null = null;
    private emptyRefreshes = 0;
    private awaitingSession = false;

    private loadToken = 0;
    private activeHandle: CacheHandle | null = null;
    private activeLoadToken = -1;
    private pinnedNextId: string | null = null;

    private elapsedBeforeMs = 0;
    private playStartedAt: number | null = null;

    private retryTimer: NodeJS.Timeout | null = null;
    private progressTimer: NodeJS.Timeout | null = null;
    private started = false;

    constructor(private readonly options: PlaybackEngineOptions) {
        this.log = options.logger ?? createLogger("playback");
        this.now = options.now ?? Date.now;
        this.machine = new PlaybackStateMachine(this.log.child("state"), this.now);
        this.tired = new TiredRegistry(options.tiredPeriodMs ?? DEFAULT_TIRED_PERIOD_MS);
        this.cursor = new PlaylistCursor(this.tired);
        this.volume = new VolumeControl(options.initialVolume, options.volumeStep);
        this.feedback =
            options.feedback ??
            new FeedbackQueue({
                session: options.session,
                client: options.client,
                retryPolicy: options.feedbackRetryPolicy ?? {
                    ...DEFAULT_BACKOFF_POLICY,
                    maxAttempts: 2,
                },
                logger: this.log.child("feedback"),
                sleep: options.sleep,
                random: options.random,
            });

        this.machine.subscribe((context) => {
            this.emit({
                type: "state",
                state: context.state,
                previousState: context.previousState,
            });
        });
    }

    // ── Public surface ─────────────────────────────────────────────

    /** Queues a command for the loop. Returns false once the engine stopped. */
    send(command: PlayerCommand): boolean {
        return this.channel.push(command);
    }

    subscribe(listener: StatusListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    getState(): PlaybackState {
        return this.machine.getState();
    }

    getSnapshot(): PlaybackSnapshot {
        return {
            state: this.machine.getState(),
            stationId: this.stationId,
            current: this.cursor.current,
            upcoming: this.cursor.peek(Number.MAX_SAFE_INTEGER, this.now()).map(
                (track) => track.id
            ),
            volume: this.volume.volume,
            muted: this.volume.isMuted,
            elapsedMs: this.elapsedMs(),
        };
    }

    /** Waits for queued feedback submissions; used on orderly shutdown. */
    flushFeedback(): Promise<void> {
        return this.feedback.onIdle();
    }

    /**
     * Runs the command loop until `Quit`. Resolves after the sink has been
     * released; session and cache state are left intact.
     */
    async run(): Promise<void> {
        if (this.started) {
            throw new Error("Playback engine is already running");
        }
        this.started = true;

        const unsubscribeFinished = this.options.sink.onFinished(() => {
            this.channel.push({ type: "TrackFinished", loadToken: this.activeLoadToken });
        });
        const unsubscribeSession = this.options.session.subscribe((snapshot) => {
            this.channel.push({ type: "SessionChanged", snapshot });
        });
        this.startProgressTimer();
        this.restoreCache();
        this.refreshStations();

        try {
            for await (const message of this.channel) {
                try {
                    await this.dispatch(message);
                } catch (error) {
                    this.log.error("Playback message failed", {
                        message: message.type,
                        error,
                    });
                    this.notify("warning", `Playback error: ${getErrorMessage(error)}`);
                }
                if (this.machine.isStopped) {
                    break;
                }
            }
        } finally {
            unsubscribeFinished();
            unsubscribeSession();
            this.clearTimers();
            this.channel.close();
        }
    }

    // ── Dispatch ───────────────────────────────────────────────────

    private async dispatch(message: EngineMessage): Promise<void> {
        switch (message.type) {
            case "SelectStation":
                return this.selectStation(message.stationId);
            case "Pause":
                return this.pause();
            case "Resume":
                return this.resume();
            case "TogglePause":
                return this.machine.isPaused ? this.resume() : this.pause();
            case "VolumeUp":
                return this.changeVolume(() => this.volume.increase());
            case "VolumeDown":
                return this.changeVolume(() => this.volume.decrease());
            case "SetVolume":
                return this.changeVolume(() => this.volume.set(message.volume));
            case "Mute":
                return this.changeVolume(() => this.volume.mute());
            case "Unmute":
                return this.changeVolume(() => this.volume.unmute());
            case "ToggleMute":
                return this.changeVolume(() => this.volume.toggleMute());
            case "Skip":
                return this.skip();
            case "Tired":
                return this.markTired();
            case "ThumbsUp":
                return this.rate("thumbs-up");
            case "ThumbsDown":
                return this.rate("thumbs-down");
            case "ClearRating":
                return this.rate("unrated");
            case "RefreshStations":
                return this.refreshStations();
            case "Quit":
                return this.quit();
            case "PlaylistLoaded":
                return this.onPlaylistLoaded(message.generation, message.tracks);
            case "PlaylistFailed":
                return this.onPlaylistFailed(message.generation, message.error);
            case "PlaylistRetryDue":
                return this.onPlaylistRetryDue(message.generation);
            case "TrackReady":
                return this.onTrackReady(message.loadToken, message.handle, message.bytes);
            case "TrackUnavailable":
                return this.onTrackUnavailable(message.loadToken, message.track, message.error);
            case "TrackFinished":
                return this.onTrackFinished(message.loadToken);
            case "StationsLoaded":
                return this.onStationsLoaded(message.stations);
            case "StationsFailed":
                return this.onStationsFailed(message.error);
            case "SessionChanged":
                return this.onSessionChanged(message.snapshot);
        }
    }

    // ── Commands ───────────────────────────────────────────────────

    private selectStation(stationId: string): void {
        if (this.stations && !this.stations.some((station) => station.id === stationId)) {
            this.notify("warning", `Unknown station: ${stationId}`);
            return;
        }
        if (stationId === this.stationId && !this.machine.isIdle) {
            this.log.debug("Station already selected", { stationId });
            return;
        }

        const interrupting = this.machine.hasActiveTrack;
        this.stopOutput();
        this.options.pipeline.cancelAll();
        this.stationController.abort();
        this.stationController = new AbortController();
        this.updateNextPin(null);
        this.cursor.clear();
        this.clearRetryTimer();

        this.stationId = stationId;
        this.stationGeneration++;
        this.fetchingGeneration = null;
        this.emptyRefreshes = 0;
        this.awaitingSession = false;

        this.enterLoading(interrupting ? "Untuning" : undefined);
        this.loadNext();
    }

    private pause(): void {
        if (!this.machine.isPlaying) {
            return;
        }
        this.options.sink.pause();
        if (this.playStartedAt !== null) {
            this.elapsedBeforeMs += this.now() - this.playStartedAt;
            this.playStartedAt = null;
        }
        this.machine.transition("PAUSED");
        this.emitProgress();
    }

    private resume(): void {
        if (!this.machine.isPaused) {
            return;
        }
        this.options.sink.play();
        this.playStartedAt = this.now();
        this.machine.transition("PLAYING");
        this.emitProgress();
    }

    private changeVolume(apply: () => void): void {
        apply();
        this.options.sink.setVolume(this.volume.effective);
        this.emit({
            type: "volume",
            volume: this.volume.volume,
            muted: this.volume.isMuted,
        });
    }

    private skip(): void {
        if (this.machine.hasActiveTrack) {
            this.stopOutput();
            this.enterLoading("TrackInterrupted");
            this.loadNext();
            return;
        }
        const abandoned = this.cursor.current;
        if (this.machine.isLoading && abandoned) {
            // Its result will be stale; free the download slot for the next track.
            this.options.pipeline.cancel(abandoned.id);
            this.loadNext();
        }
    }

    private rate(rating: TrackRating): void {
        const track = this.feedbackTarget();
        if (!track) {
            return;
        }
        if (track.rating === rating) {
            this.log.debug("Rating unchanged", { trackId: track.id, rating });
            return;
        }

        track.rating = rating;
        this.emit({ type: "rating", trackId: track.id, rating });
        this.feedback.submitRating(track, rating);
    }

    private markTired(): void {
        const track = this.feedbackTarget();
        if (!track) {
            return;
        }

        const until = this.tired.mark(track, this.now());
        this.log.info("Track marked tired", {
            trackId: track.id,
            musicId: track.musicId,
            until: new Date(until).toISOString(),
        });
        this.feedback.submitTired(track);
        this.notify("info", `Won't play "${track.title}" for a while`);
        this.skip();
    }

    private quit(): void {
        this.stopOutput();
        this.options.pipeline.cancelAll();
        this.stationController.abort();
        this.updateNextPin(null);
        this.clearTimers();
        this.machine.transition("STOPPED", "UserRequest");
        this.emit({ type: "stopped", reason: "UserRequest" });
        this.channel.close();
    }

    // ── Loading ────────────────────────────────────────────────────

    /**
     * Advances the cursor and prepares the head track in the background. With
     * an empty queue it fetches the next playlist page instead.
     */
    private loadNext(): void {
        const now = this.now();
        const track = this.cursor.advance(now);
        const loadToken = ++this.loadToken;
        this.emit({ type: "track", track, stationId: this.stationId });

        if (!track) {
            this.updateNextPin(null);
            this.fetchPlaylist();
            return;
        }

        const pipeline = this.options.pipeline;
        this.background("prepare track", async () => {
            let handle: CacheHandle;
            try {
                const outcome = await pipeline.acquire(track);
                if (outcome.status === "skipped") {
                    this.channel.push({
                        type: "TrackUnavailable",
                        loadToken,
                        track,
                        error: outcome.error,
                    });
                    return;
                }
                handle = outcome.handle;
            } catch (error) {
                this.channel.push({ type: "TrackUnavailable", loadToken, track, error });
                return;
            }

            try {
                const bytes = await handle.read();
                if (!this.channel.push({ type: "TrackReady", loadToken, handle, bytes })) {
                    handle.release();
                }
            } catch (error) {
                handle.release();
                this.channel.push({ type: "TrackUnavailable", loadToken, track, error });
            }
        });

        // After the head's acquire so its download is queued first.
        this.updateNextPin(now);
        if (this.cursor.upcomingCount === 0) {
            this.fetchPlaylist();
        }
    }

    private fetchPlaylist(): void {
        const stationId = this.stationId;
        const generation = this.stationGeneration;
        if (!stationId || this.fetchingGeneration === generation) {
            return;
        }
        this.fetchingGeneration = generation;

        const { session, client } = this.options;
        const signal = this.stationController.signal;
        this.background("fetch playlist", async () => {
            try {
                const tracks = await withLogTiming(
                    this.log,
                    "playlist fetch",
                    () =>
                        retryWithBackoff(
                            () =>
                                session.withSession((token) =>
                                    client.getPlaylist(token, stationId)
                                ),
                            this.remoteRetryOptions("Playlist fetch", signal)
                        ),
                    { stationId }
                );
                this.channel.push({ type: "PlaylistLoaded", generation, tracks });
            } catch (error) {
                this.channel.push({ type: "PlaylistFailed", generation, error });
            }
        });
    }

    private restoreCache(): void {
        this.background("restore cache", async () => {
            try {
                await this.options.pipeline.initialize();
            } catch (error) {
                this.log.warn("Track cache unavailable", { error });
                this.notify(
                    "warning",
                    `Track cache unavailable (${getErrorMessage(error)}); tracks will play from memory`,
                    ErrorCode.CACHE_IO_FAILURE
                );
            }
        });
    }

    private refreshStations(): void {
        if (this.stationsInFlight) {
            return;
        }
        this.stationsInFlight = true;

        const { session, client } = this.options;
        this.background("fetch stations", async () => {
            try {
                const stations = await retryWithBackoff(
                    () => session.withSession((token) => client.listStations(token)),
                    this.remoteRetryOptions("Station list fetch")
                );
                this.channel.push({ type: "StationsLoaded", stations });
            } catch (error) {
                this.channel.push({ type: "StationsFailed", error });
            }
        });
    }

    private remoteRetryOptions(operation: string, signal?: AbortSignal): RetryOptions {
        return {
            policy: this.options.playlistRetryPolicy,
            shouldRetry: (error) => !(error instanceof AuthError),
            retryAfterMs: (error) =>
                error instanceof ApiError ? error.retryAfterMs : undefined,
            onRetry: (error, attempt, delayMs) =>
                this.log.warn(`${operation} failed, retrying`, {
                    attempt,
                    delayMs,
                    error: getErrorMessage(error),
                }),
            signal,
            sleep: this.options.sleep,
            random: this.options.random,
        };
    }

    // ── Background results ─────────────────────────────────────────

    private onPlaylistLoaded(generation: number, tracks: Track[]): void {
        if (generation !== this.stationGeneration) {
            return;
        }
        this.fetchingGeneration = null;

        const now = this.now();
        const accepted = this.cursor.enqueue(tracks, now);
        this.log.debug("Playlist page queued", {
            received: tracks.length,
            accepted: accepted.length,
        });

        const waitingForTrack = this.machine.isLoading && !this.cursor.current;
        if (accepted.length === 0) {
            this.emptyRefreshes++;
            if (waitingForTrack) {
                const delayMs = computeBackoffDelay(
                    this.options.playlistRetryPolicy,
                    this.emptyRefreshes,
                    this.options.random
                );
                this.notify("info", "Station returned no playable tracks; trying again");
                this.scheduleRetry(generation, delayMs);
            }
            return;
        }

        this.emptyRefreshes = 0;
        if (waitingForTrack) {
            this.loadNext();
        } else {
            this.updateNextPin(now);
        }
    }

    private onPlaylistFailed(generation: number, error: unknown): void {
        if (generation !== this.stationGeneration) {
            return;
        }
        this.fetchingGeneration = null;

        if (error instanceof AuthError) {
            this.awaitingSession = true;
            this.notify("blocking", error.message, error.code);
            return;
        }

        const retryMs =
            this.options.playlistRetryIntervalMs ?? DEFAULT_PLAYLIST_RETRY_INTERVAL_MS;
        this.log.warn("Playlist unavailable after retries", {
            stationId: this.stationId,
            error: getErrorMessage(error),
        });
        this.notify(
            "warning",
            `Station unavailable (${getErrorMessage(error)}); retrying in ${Math.round(
                retryMs / 1000
            )}s`,
            error instanceof ApiError ? error.code : undefined
        );
        if (this.machine.isLoading && !this.cursor.current) {
            this.scheduleRetry(generation, retryMs);
        }
    }

    private onPlaylistRetryDue(generation: number): void {
        this.retryTimer = null;
        if (generation !== this.stationGeneration) {
            return;
        }
        if (this.machine.isLoading && !this.cursor.current) {
            this.loadNext();
        }
    }

    private async onTrackReady(
        loadToken: number,
        handle: CacheHandle,
        bytes: Buffer
    ): Promise<void> {
        if (loadToken !== this.loadToken || !this.machine.isLoading) {
            handle.release();
            return;
        }

        const sink = this.options.sink;
        try {
            await sink.load(bytes, handle.format);
        } catch (error) {
            handle.release();
            this.log.warn("Audio sink rejected track", {
                trackId: handle.track.id,
                error: getErrorMessage(error),
            });
            if (error instanceof DecodeError) {
                await this.options.pipeline.discard(handle.track);
            }
            this.notify("info", `Skipping unplayable track "${handle.track.title}"`);
            this.loadNext();
            return;
        }

        this.activeHandle = handle;
        this.activeLoadToken = loadToken;
        this.elapsedBeforeMs = 0;
        this.playStartedAt = this.now();
        sink.setVolume(this.volume.effective);
        sink.play();
        this.machine.transition("PLAYING");
        this.emitProgress();
    }

    private onTrackUnavailable(loadToken: number, track: Track, error: unknown): void {
        if (loadToken !== this.loadToken) {
            return;
        }
        if (error instanceof DownloadError && error.kind === "cancelled") {
            return;
        }

        this.log.warn("Skipping track that could not be prepared", {
            trackId: track.id,
            error: getErrorMessage(error),
        });
        this.notify(
            "info",
            `Skipping "${track.title}": ${getErrorMessage(error)}`,
            error instanceof DownloadError || error instanceof DecodeError
                ? error.code
                : undefined
        );
        this.loadNext();
    }

    private onTrackFinished(loadToken: number): void {
        if (loadToken !== this.activeLoadToken || !this.machine.isPlaying) {
            return;
        }
        const completed = this.activeHandle?.track ?? null;
        this.stopOutput();
        this.enterLoading("TrackCompleted");
        if (completed && this.options.evictCompleted) {
            const pipeline = this.options.pipeline;
            this.background("evict completed track", () => pipeline.discard(completed));
        }
        this.loadNext();
    }

    private onStationsLoaded(stations: Station[]): void {
        this.stationsInFlight = false;
        this.stations = stations;
        this.emit({ type: "stations", stations });
    }

    private onStationsFailed(error: unknown): void {
        this.stationsInFlight = false;
        if (error instanceof AuthError) {
            this.notify("blocking", error.message, error.code);
            return;
        }
        this.notify(
            "warning",
            `Could not load stations: ${getErrorMessage(error)}`,
            error instanceof ApiError ? error.code : ErrorCode.SESSION_UNAVAILABLE
        );
    }

    private onSessionChanged(snapshot: SessionSnapshot): void {
        this.emit({ type: "connectivity", session: snapshot.state });
        if (snapshot.state !== "VALID") {
            return;
        }

        if (this.stations === null) {
            this.refreshStations();
        }
        if (this.awaitingSession) {
            this.awaitingSession = false;
            if (this.machine.isLoading && !this.cursor.current) {
                this.loadNext();
            }
        }
    }

    // ── Helpers ────────────────────────────────────────────────────

    private feedbackTarget(): Track | null {
        if (!this.machine.hasActiveTrack) {
            this.notify("info", "Nothing is playing");
            return null;
        }
        return this.cursor.current;
    }

    private enterLoading(reason?: StopReason): void {
        this.machine.transition("LOADING", reason);
        if (reason) {
            this.emit({ type: "stopped", reason });
        }
    }

    /** Stops the sink and drops the current track's pin and position. */
    private stopOutput(): void {
        if (!this.activeHandle) {
            return;
        }
        this.options.sink.stop();
        this.activeHandle.release();
        this.activeHandle = null;
        this.activeLoadToken = -1;
        this.elapsedBeforeMs = 0;
        this.playStartedAt = null;
    }

    /**
     * Keeps the next queued track pinned in the cache and its audio (plus the
     * rest of the lookahead window) downloading.
     */
    private updateNextPin(now: number | null): void {
        const pipeline = this.options.pipeline;
        const upcoming =
            now === null
                ? []
                : this.cursor.peek(Math.max(1, pipeline.lookaheadDepth - 1), now);
        const nextId = upcoming[0]?.id ?? null;

        if (nextId !== this.pinnedNextId) {
            if (this.pinnedNextId) {
                pipeline.unpin(this.pinnedNextId);
            }
            if (nextId) {
                pipeline.pin(nextId);
            }
            this.pinnedNextId = nextId;
        }

        if (upcoming.length > 0) {
            pipeline.prefetch(upcoming);
        }
    }

    private elapsedMs(): number {
        const running =
            this.playStartedAt === null ? 0 : this.now() - this.playStartedAt;
        return this.elapsedBeforeMs + running;
    }

    private emitProgress(): void {
        const track = this.cursor.current;
        if (!track || !this.machine.hasActiveTrack) {
            return;
        }
        this.emit({
            type: "progress",
            elapsedMs: this.elapsedMs(),
            durationMs: track.durationMs,
            paused: this.machine.isPaused,
        });
    }

    private startProgressTimer(): void {
        const intervalMs = this.options.progressIntervalMs ?? 1000;
        if (intervalMs <= 0) {
            return;
        }
        this.progressTimer = setInterval(() => this.emitProgress(), intervalMs);
        this.progressTimer.unref();
    }

    private scheduleRetry(generation: number, delayMs: number): void {
        this.clearRetryTimer();
        this.retryTimer = setTimeout(() => {
            this.channel.push({ type: "PlaylistRetryDue", generation });
        }, delayMs);
        this.retryTimer.unref();
    }

    private clearRetryTimer(): void {
        if (this.retryTimer) {
            clearTimeout(this.retryTimer);
            this.retryTimer = null;
        }
    }

    private clearTimers(): void {
        this.clearRetryTimer();
        if (this.progressTimer) {
            clearInterval(this.progressTimer);
            this.progressTimer = null;
        }
    }

    private background(label: string, task: () => Promise<void>): void {
        task().catch((error) => {
            this.log.error(`Background ${label} failed`, { error });
        });
    }

    private notify(level: NotificationLevel, message: string, code?: ErrorCode): void {
        this.emit({ type: "notification", level, message, code });
    }

    private emit(event: StatusEvent): void {
        this.listeners.forEach((listener) => {
            try {
                listener(event);
            } catch (error) {
                this.log.error("Status listener error", { error });
            }
        });
    }
}
