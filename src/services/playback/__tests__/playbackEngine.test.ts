import { promises as fsPromises } from "fs";
import os from "os";
import path from "path";
import { PlaybackEngine } from "../playbackEngine";
import { StatusEvent } from "../commands";
import { PrefetchPipeline } from "../../prefetchPipeline";
import { SessionManager } from "../../sessionManager";
import { TrackCache } from "../../trackCache";
import {
    AudioSink,
    Credentials,
    SessionToken,
    Station,
    Track,
    TrackRating,
} from "../../types";
import { ApiError, DecodeError, DownloadError, ErrorCode } from "../../../utils/errors";
import {
    instantPolicy,
    makeTrack,
    MemoryCredentialStore,
    noSleep,
    silentLogger,
    waitFor,
} from "../../../__tests__/helpers/fixtures";

const STATIONS: Station[] = [
    { id: "s1", name: "Jazz", isQuickMix: false },
    { id: "s2", name: "Rock", isQuickMix: false },
];

const CREDENTIALS: Credentials = { username: "listener", password: "test-password" };

class FakeSink implements AudioSink {
    calls: string[] = [];
    loaded: Buffer[] = [];
    volume = -1;
    private readonly listeners = new Set<() => void>();

    constructor(private readonly rejectLoad?: (bytes: Buffer) => Error | null) {}

    async load(bytes: Buffer, format: string): Promise<void> {
        this.calls.push(`load:${format}`);
        const error = this.rejectLoad?.(bytes);
        if (error) {
            throw error;
        }
        this.loaded.push(bytes);
    }

    play(): void {
        this.calls.push("play");
    }

    pause(): void {
        this.calls.push("pause");
    }

    setVolume(volume: number): void {
        this.volume = volume;
        this.calls.push(`volume:${volume}`);
    }

    stop(): void {
        this.calls.push("stop");
    }

    onFinished(listener: () => void): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Simulates the current blob playing to its end. */
    finish(): void {
        this.listeners.forEach((listener) => listener());
    }

    /** Track ids in the order their audio reached the sink. */
    get played(): string[] {
        return this.loaded.map((bytes) =>
            bytes.toString().replace("audio:https://media.test/", "").replace(".mp3", "")
        );
    }
}

interface SetupOptions {
    pages?: Record<string, Track[][]>;
    getPlaylist?: (session: SessionToken, stationId: string) => Promise<Track[]>;
    download?: (url: string, signal?: AbortSignal) => Promise<Buffer>;
    rejectLoad?: (bytes: Buffer) => Error | null;
    credentials?: Credentials | null;
    evictCompleted?: boolean;
}

describe("PlaybackEngine", () => {
    let directory: string;
    let running: Promise<void> | null = null;
    let engine: PlaybackEngine | null = null;

    beforeEach(async () => {
        directory = await fsPromises.mkdtemp(path.join(os.tmpdir(), "engine-"));
    });

    afterEach(async () => {
        if (engine && running) {
            engine.send({ type: "Quit" });
            await running;
        }
        engine = null;
        running = null;
        await fsPromises.rm(directory, { recursive: true, force: true });
    });

    function setup(options: SetupOptions = {}) {
        const pages = options.pages ?? {};
        const client = {
            authenticate: jest.fn<Promise<SessionToken>, [Credentials]>(async () => ({
                authToken: "test-token",
                userId: "user-1",
            })),
            listStations: jest.fn<Promise<Station[]>, [SessionToken]>(async () => STATIONS),
            getPlaylist: jest.fn<Promise<Track[]>, [SessionToken, string]>(
                options.getPlaylist ??
                    (async (_session, stationId) => pages[stationId]?.shift() ?? [])
            ),
            downloadTrackAudio: jest.fn<Promise<Buffer>, [string, AbortSignal?]>(
                options.download ?? (async (url) => Buffer.from(`audio:${url}`))
            ),
            rateTrack: jest.fn<Promise<void>, [SessionToken, Track, TrackRating]>(
                async () => undefined
            ),
            markTired: jest.fn<Promise<void>, [SessionToken, Track]>(async () => undefined),
        };

        const session = new SessionManager({
            client,
            credentials: new MemoryCredentialStore(
                options.credentials === undefined ? CREDENTIALS : options.credentials
            ),
            retryPolicy: instantPolicy(1),
            logger: silentLogger,
            sleep: noSleep,
        });
        const cache = new TrackCache({
            directory,
            maxBytes: 1024 * 1024,
            logger: silentLogger,
        });
        const pipeline = new PrefetchPipeline({
            client,
            cache,
            validator: { inspect: async () => ({ format: "mp3" }) },
            retryPolicy: instantPolicy(1),
            lookahead: 2,
            logger: silentLogger,
            sleep: noSleep,
        });
        const sink = new FakeSink(options.rejectLoad);

        const created = new PlaybackEngine({
            session,
            client,
            pipeline,
            sink,
            playlistRetryPolicy: {
                maxAttempts: 5,
                baseDelayMs: 1000,
                maxDelayMs: 1000,
                jitterMs: 0,
            },
            feedbackRetryPolicy: instantPolicy(1),
            playlistRetryIntervalMs: 60000,
            initialVolume: 1,
            volumeStep: 0.1,
            progressIntervalMs: 0,
            evictCompleted: options.evictCompleted,
            logger: silentLogger,
            sleep: noSleep,
            random: () => 0,
        });
        const events: StatusEvent[] = [];
        created.subscribe((event) => events.push(event));

        engine = created;
        running = created.run();

        const playing = () => {
            const snapshot = created.getSnapshot();
            return snapshot.state === "PLAYING" ? snapshot.current?.id : undefined;
        };
        const ofType = <T extends StatusEvent["type"]>(type: T) =>
            events.filter(
                (event): event is Extract<StatusEvent, { type: T }> => event.type === type
            );

        return { engine: created, client, session, cache, sink, events, playing, ofType };
    }

    it("tunes a station and plays its first track", async () => {
        const ctx = setup({ pages: { s1: [[makeTrack("a"), makeTrack("b")]] } });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");

        expect(ctx.sink.calls).toEqual(["load:mp3", "volume:1", "play"]);
        expect(ctx.sink.played).toEqual(["a"]);
        expect(ctx.client.getPlaylist).toHaveBeenCalledWith(
            { authToken: "test-token", userId: "user-1" },
            "s1"
        );
        expect(ctx.engine.getSnapshot()).toMatchObject({
            stationId: "s1",
            upcoming: ["b"],
            volume: 1,
            muted: false,
        });
    });

    it("moves to the next track when the current one finishes", async () => {
        const ctx = setup({ pages: { s1: [[makeTrack("a"), makeTrack("b")]] } });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.sink.finish();
        await waitFor(() => ctx.playing() === "b");

        expect(ctx.sink.played).toEqual(["a", "b"]);
        expect(ctx.ofType("stopped").map((event) => event.reason)).toEqual([
            "TrackCompleted",
        ]);
        expect(ctx.client.downloadTrackAudio.mock.calls.map((call) => call[0])).toEqual([
            "https://media.test/a.mp3",
            "https://media.test/b.mp3",
        ]);
        expect(ctx.cache.has("a")).toBe(true);
    });

    it("evicts a completed track's audio when configured to", async () => {
        const ctx = setup({
            pages: { s1: [[makeTrack("a"), makeTrack("b")]] },
            evictCompleted: true,
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.engine.send({ type: "Skip" });
        await waitFor(() => ctx.playing() === "b");
        expect(ctx.cache.has("a")).toBe(true);

        ctx.sink.finish();
        await waitFor(() => !ctx.cache.has("b"));

        expect(ctx.sink.played).toEqual(["a", "b"]);
        expect(ctx.cache.has("a")).toBe(true);
    });

    it("skips to the next track without sending feedback", async () => {
        const ctx = setup({ pages: { s1: [[makeTrack("a"), makeTrack("b")]] } });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.engine.send({ type: "Skip" });
        await waitFor(() => ctx.playing() === "b");
        await ctx.engine.flushFeedback();

        expect(ctx.sink.calls).toContain("stop");
        expect(ctx.ofType("stopped").map((event) => event.reason)).toEqual([
            "TrackInterrupted",
        ]);
        expect(ctx.client.rateTrack).not.toHaveBeenCalled();
        expect(ctx.client.markTired).not.toHaveBeenCalled();
    });

    it("keeps a tired song out of later playlist pages", async () => {
        const ctx = setup({
            pages: {
                s1: [
                    [makeTrack("a"), makeTrack("b")],
                    [makeTrack("a2", { musicId: "music-a" }), makeTrack("c")],
                ],
            },
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.engine.send({ type: "Tired" });
        await waitFor(() => ctx.playing() === "b");
        ctx.sink.finish();
        await waitFor(() => ctx.playing() === "c");
        await ctx.engine.flushFeedback();

        expect(ctx.sink.played).toEqual(["a", "b", "c"]);
        expect(ctx.client.markTired).toHaveBeenCalledTimes(1);
        expect(ctx.client.markTired.mock.calls[0][1].id).toBe("a");
        expect(ctx.client.downloadTrackAudio.mock.calls.map((call) => call[0])).not.toContain(
            "https://media.test/a2.mp3"
        );
        expect(ctx.ofType("notification")).toContainEqual({
            type: "notification",
            level: "info",
            message: 'Won\'t play "Title a" for a while',
            code: undefined,
        });
    });

    it("sends only rating changes to the service", async () => {
        const ctx = setup({ pages: { s1: [[makeTrack("a")]] } });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.engine.send({ type: "ClearRating" });
        ctx.engine.send({ type: "ThumbsUp" });
        ctx.engine.send({ type: "ThumbsUp" });
        ctx.engine.send({ type: "ClearRating" });
        await waitFor(() => ctx.ofType("rating").length === 2);
        await ctx.engine.flushFeedback();

        expect(ctx.ofType("rating").map((event) => event.rating)).toEqual([
            "thumbs-up",
            "unrated",
        ]);
        expect(ctx.client.rateTrack.mock.calls.map((call) => call[2])).toEqual([
            "thumbs-up",
            "unrated",
        ]);
    });

    it("accepts feedback for a paused track", async () => {
        const ctx = setup({ pages: { s1: [[makeTrack("a"), makeTrack("b")]] } });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.engine.send({ type: "Pause" });
        await waitFor(() => ctx.engine.getState() === "PAUSED");
        ctx.engine.send({ type: "ThumbsUp" });
        await waitFor(() => ctx.ofType("rating").length === 1);
        ctx.engine.send({ type: "Tired" });
        await waitFor(() => ctx.playing() === "b");
        await ctx.engine.flushFeedback();

        expect(ctx.ofType("rating")).toEqual([
            { type: "rating", trackId: "a", rating: "thumbs-up" },
        ]);
        expect(ctx.client.rateTrack).toHaveBeenCalledTimes(1);
        expect(ctx.client.rateTrack.mock.calls[0][1].id).toBe("a");
        expect(ctx.client.rateTrack.mock.calls[0][2]).toBe("thumbs-up");
        expect(ctx.client.markTired).toHaveBeenCalledTimes(1);
        expect(ctx.client.markTired.mock.calls[0][1].id).toBe("a");
        expect(ctx.sink.played).toEqual(["a", "b"]);
    });

    it("tells the user when there is nothing to rate", async () => {
        const ctx = setup();

        ctx.engine.send({ type: "ThumbsDown" });
        const notice = await waitFor(() =>
            ctx.ofType("notification").find((event) => event.message === "Nothing is playing")
        );

        expect(notice.level).toBe("info");
        expect(ctx.client.rateTrack).not.toHaveBeenCalled();
    });

    it("stays loading and warns once playlist retries are exhausted", async () => {
        const ctx = setup({
            getPlaylist: async () => {
                throw new ApiError("server-error", "Service returned 503");
            },
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        const warning = await waitFor(() =>
            ctx.ofType("notification").find((event) => event.level === "warning")
        );

        expect(warning).toEqual({
            type: "notification",
            level: "warning",
            message: "Station unavailable (Service returned 503); retrying in 60s",
            code: ErrorCode.SERVER_ERROR,
        });
        expect(ctx.client.getPlaylist).toHaveBeenCalledTimes(5);
        expect(ctx.engine.getState()).toBe("LOADING");
        expect(ctx.sink.calls).toEqual([]);
    });

    it("recovers from a few connection failures without notifying", async () => {
        let calls = 0;
        const ctx = setup({
            getPlaylist: async () => {
                calls++;
                if (calls <= 3) {
                    throw new ApiError("connection-failure", "socket hang up");
                }
                return [makeTrack("a")];
            },
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");

        expect(ctx.client.getPlaylist).toHaveBeenCalledTimes(4);
        expect(ctx.ofType("notification")).toEqual([]);
    });

    it("re-authenticates when the session expires during a playlist fetch", async () => {
        let calls = 0;
        const ctx = setup({
            getPlaylist: async () => {
                calls++;
                if (calls === 1) {
                    throw new ApiError("session-expired", "Session expired");
                }
                return [makeTrack("a")];
            },
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");

        expect(ctx.client.authenticate).toHaveBeenCalledTimes(2);
        expect(ctx.ofType("connectivity").map((event) => event.session)).toContain("EXPIRED");
        expect(ctx.ofType("notification")).toEqual([]);
    });

    it("blocks on missing credentials and recovers after login", async () => {
        const ctx = setup({ credentials: null });

        const blocking = await waitFor(() =>
            ctx.ofType("notification").find((event) => event.level === "blocking")
        );
        expect(blocking.message).toBe("No stored credentials; log in to continue");
        expect(blocking.code).toBe(ErrorCode.MISSING_CREDENTIALS);
        expect(ctx.client.listStations).not.toHaveBeenCalled();

        await ctx.session.login(CREDENTIALS);
        const loaded = await waitFor(() => ctx.ofType("stations")[0]);

        expect(loaded.stations).toEqual(STATIONS);
        expect(ctx.client.authenticate).toHaveBeenCalledTimes(1);
    });

    it("rejects a station that is not in the catalog", async () => {
        const ctx = setup();

        await waitFor(() => ctx.ofType("stations")[0]);
        ctx.engine.send({ type: "SelectStation", stationId: "s9" });
        await waitFor(() =>
            ctx.ofType("notification").find((event) => event.message === "Unknown station: s9")
        );

        expect(ctx.engine.getState()).toBe("IDLE");
        expect(ctx.client.getPlaylist).not.toHaveBeenCalled();
    });

    it("pauses and resumes the sink", async () => {
        const ctx = setup({ pages: { s1: [[makeTrack("a")]] } });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.engine.send({ type: "Pause" });
        await waitFor(() => ctx.engine.getState() === "PAUSED");
        const progress = ctx.ofType("progress");
        ctx.engine.send({ type: "TogglePause" });
        await waitFor(() => ctx.playing() === "a");

        expect(progress[progress.length - 1]).toMatchObject({
            paused: true,
            durationMs: 180000,
        });
        expect(ctx.sink.calls).toEqual(["load:mp3", "volume:1", "play", "pause", "play"]);
    });

    it("applies volume and mute to the sink", async () => {
        const ctx = setup();

        ctx.engine.send({ type: "VolumeDown" });
        ctx.engine.send({ type: "Mute" });
        await waitFor(() => ctx.ofType("volume").length === 2);

        expect(ctx.ofType("volume")).toEqual([
            { type: "volume", volume: 0.9, muted: false },
            { type: "volume", volume: 0.9, muted: true },
        ]);
        expect(ctx.sink.volume).toBe(0);
    });

    it("stops the current track when switching stations", async () => {
        const ctx = setup({
            pages: {
                s1: [[makeTrack("a"), makeTrack("b")]],
                s2: [[makeTrack("x", { stationId: "s2" })]],
            },
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.engine.send({ type: "SelectStation", stationId: "s2" });
        await waitFor(() => ctx.playing() === "x");

        expect(ctx.sink.played).toEqual(["a", "x"]);
        expect(ctx.sink.calls).toContain("stop");
        expect(ctx.ofType("stopped").map((event) => event.reason)).toEqual(["Untuning"]);
        expect(ctx.engine.getSnapshot().stationId).toBe("s2");
    });

    it("abandons a stalled download when skipping during loading", async () => {
        const signals = new Map<string, AbortSignal | undefined>();
        const ctx = setup({
            pages: { s1: [[makeTrack("a"), makeTrack("b")]] },
            download: (url, signal) => {
                signals.set(url, signal);
                if (!url.endsWith("/a.mp3")) {
                    return Promise.resolve(Buffer.from(`audio:${url}`));
                }
                return new Promise<Buffer>((_resolve, reject) => {
                    signal?.addEventListener("abort", () => reject(new Error("aborted")), {
                        once: true,
                    });
                });
            },
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => signals.has("https://media.test/a.mp3"));
        expect(ctx.engine.getState()).toBe("LOADING");
        ctx.engine.send({ type: "Skip" });
        await waitFor(() => ctx.playing() === "b");

        expect(signals.get("https://media.test/a.mp3")?.aborted).toBe(true);
        expect(ctx.sink.played).toEqual(["b"]);
        expect(ctx.ofType("notification")).toEqual([]);
    });

    it("aborts the previous station's download when switching stations", async () => {
        const signals = new Map<string, AbortSignal | undefined>();
        const ctx = setup({
            pages: {
                s1: [[makeTrack("a"), makeTrack("b")]],
                s2: [[makeTrack("x", { stationId: "s2" })]],
            },
            download: (url, signal) => {
                signals.set(url, signal);
                if (!url.endsWith("/a.mp3")) {
                    return Promise.resolve(Buffer.from(`audio:${url}`));
                }
                return new Promise<Buffer>((_resolve, reject) => {
                    signal?.addEventListener("abort", () => reject(new Error("aborted")), {
                        once: true,
                    });
                });
            },
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => signals.has("https://media.test/a.mp3"));
        ctx.engine.send({ type: "SelectStation", stationId: "s2" });
        await waitFor(() => ctx.playing() === "x");

        expect(signals.get("https://media.test/a.mp3")?.aborted).toBe(true);
        expect(signals.has("https://media.test/b.mp3")).toBe(false);
        expect(ctx.sink.played).toEqual(["x"]);
        expect(ctx.engine.getSnapshot().stationId).toBe("s2");
    });

    it("skips a track whose audio cannot be downloaded", async () => {
        const ctx = setup({
            pages: { s1: [[makeTrack("a"), makeTrack("b")]] },
            download: async (url) => {
                if (url.endsWith("/a.mp3")) {
                    throw new DownloadError("unretryable", "Audio request failed with 404");
                }
                return Buffer.from(`audio:${url}`);
            },
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "b");

        expect(ctx.sink.played).toEqual(["b"]);
        expect(ctx.ofType("notification")).toContainEqual({
            type: "notification",
            level: "info",
            message: 'Skipping "Title a": Audio request failed with 404',
            code: ErrorCode.DOWNLOAD_FAILED,
        });
    });

    it("discards cached audio the sink cannot decode", async () => {
        const ctx = setup({
            pages: { s1: [[makeTrack("a"), makeTrack("b")]] },
            rejectLoad: (bytes) =>
                bytes.toString().endsWith("/a.mp3")
                    ? new DecodeError(ErrorCode.CORRUPT_FILE, "Unreadable frame header")
                    : null,
        });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "b");

        expect(ctx.sink.played).toEqual(["b"]);
        expect(ctx.cache.has("a")).toBe(false);
        expect(ctx.ofType("notification").map((event) => event.message)).toContain(
            'Skipping unplayable track "Title a"'
        );
    });

    it("stops the loop on quit", async () => {
        const ctx = setup({ pages: { s1: [[makeTrack("a")]] } });

        ctx.engine.send({ type: "SelectStation", stationId: "s1" });
        await waitFor(() => ctx.playing() === "a");
        ctx.engine.send({ type: "Quit" });
        await running;

        expect(ctx.engine.getState()).toBe("STOPPED");
        expect(ctx.sink.calls[ctx.sink.calls.length - 1]).toBe("stop");
        expect(ctx.ofType("stopped").map((event) => event.reason)).toEqual(["UserRequest"]);
        expect(ctx.engine.send({ type: "Skip" })).toBe(false);
    });

    it("refuses to run twice", async () => {
        const ctx = setup();

        await expect(ctx.engine.run()).rejects.toThrow("Playback engine is already running");
    });
});
