/**
 * Radio Service HTTP Client
 *
 * JSON-over-HTTP binding of the ServiceClient capability. Responses are
 * validated with zod so a shape change surfaces as a malformed-response
 * ApiError instead of an undefined field deep in playback.
 *
 *   POST   /auth/login                      → { authToken, userId, partnerId? }
 *   GET    /stations                        → { stations: [...] }
 *   GET    /stations/:stationId/playlist    → { tracks: [...] }
 *   PUT    /tracks/:trackId/feedback        { rating }
 *   DELETE /tracks/:trackId/feedback
 *   POST   /tracks/:trackId/tired
 */

import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import {
    Credentials,
    ServiceClient,
    SessionToken,
    Station,
    Track,
    TrackRating,
} from "./types";
import {
    ApiError,
    AuthError,
    classifyNetworkError,
    DownloadError,
    ErrorCode,
    getErrorMessage,
    getResponseStatus,
    getRetryAfterMs,
} from "../utils/errors";
import { createLogger, Logger } from "../utils/logger";

// ── Wire schemas ───────────────────────────────────────────────────

const sessionSchema = z.object({
    authToken: z.string().min(1),
    userId: z.string().min(1),
    partnerId: z.string().optional(),
});

const stationSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    isQuickMix: z.boolean().default(false),
});

const stationListSchema = z.object({
    stations: z.array(stationSchema),
});

const ratingSchema = z.enum(["unrated", "thumbs-up", "thumbs-down"]);

const trackSchema = z.object({
    id: z.string().min(1),
    musicId: z.string().min(1),
    title: z.string(),
    artist: z.string(),
    album: z.string().default(""),
    audioUrl: z.string().url(),
    durationSec: z.number().nonnegative().default(0),
    rating: ratingSchema.default("unrated"),
    tiredUntil: z.string().datetime().optional(),
});

const playlistSchema = z.object({
    tracks: z.array(trackSchema),
});

type WireTrack = z.infer<typeof trackSchema>;

export interface HttpServiceClientOptions {
    baseUrl: string;
    timeoutMs?: number;
    /** Idle limit for audio downloads; a stalled body fails as transient. */
    downloadTimeoutMs?: number;
    logger?: Logger;
    /** Injected for tests; defaults to a fresh axios instance. */
    http?: AxiosInstance;
}

export class HttpServiceClient implements ServiceClient {
    private readonly http: AxiosInstance;
    private readonly log: Logger;
    private readonly downloadTimeoutMs: number;

    constructor(options: HttpServiceClientOptions) {
        this.http =
            options.http ??
            axios.create({
                baseURL: options.baseUrl,
                timeout: options.timeoutMs ?? 15000,
                headers: { "Content-Type": "application/json" },
            });
        this.log = options.logger ?? createLogger("service-client");
        this.downloadTimeoutMs = options.downloadTimeoutMs ?? 60000;
    }

    async authenticate(credentials: Credentials): Promise<SessionToken> {
        try {
            const res = await this.http.post("/auth/login", {
                username: credentials.username,
                password: credentials.password,
            });
            return parseResponse(sessionSchema, res.data, "login");
        } catch (error) {
            const failure = classifyNetworkError(error);
            if (failure === "unauthorized") {
                throw new AuthError(
                    ErrorCode.INVALID_CREDENTIALS,
                    "The service rejected the stored credentials"
                );
            }
            throw toApiError(error, "login");
        }
    }

    async listStations(session: SessionToken): Promise<Station[]> {
        try {
            const res = await this.http.get("/stations", {
                headers: authHeaders(session),
            });
            return parseResponse(stationListSchema, res.data, "station list").stations;
        } catch (error) {
            throw toApiError(error, "station list");
        }
    }

    async getPlaylist(session: SessionToken, stationId: string): Promise<Track[]> {
        try {
            const res = await this.http.get(
                `/stations/${encodeURIComponent(stationId)}/playlist`,
                { headers: authHeaders(session) }
            );
            const { tracks } = parseResponse(playlistSchema, res.data, "playlist");
            this.log.debug("Fetched playlist", { stationId, tracks: tracks.length });
            return tracks.map((track) => toTrack(track, stationId));
        } catch (error) {
            throw toApiError(error, "playlist");
        }
    }

    async downloadTrackAudio(url: string, signal?: AbortSignal): Promise<Buffer> {
        try {
            const res = await this.http.get<ArrayBuffer>(url, {
                baseURL: undefined,
                responseType: "arraybuffer",
                timeout: this.downloadTimeoutMs,
                signal,
            });
            return Buffer.from(res.data);
        } catch (error) {
            if (axios.isCancel(error)) {
                throw new DownloadError("cancelled", "Track download cancelled");
            }
            const failure = classifyNetworkError(error);
            throw new DownloadError(
                failure === "transient" ||
                    failure === "rate-limited" ||
                    isDroppedConnection(error)
                    ? "transient"
                    : "unretryable",
                `Track download failed: ${getErrorMessage(error)}`,
                { status: getResponseStatus(error), failure }
            );
        }
    }

    async rateTrack(
        session: SessionToken,
        track: Track,
        rating: TrackRating
    ): Promise<void> {
        const path = `/tracks/${encodeURIComponent(track.id)}/feedback`;
        try {
            if (rating === "unrated") {
                await this.http.delete(path, { headers: authHeaders(session) });
            } else {
                await this.http.put(
                    path,
                    { rating, stationId: track.stationId },
                    { headers: authHeaders(session) }
                );
            }
        } catch (error) {
            throw toApiError(error, "rating");
        }
    }

    async markTired(session: SessionToken, track: Track): Promise<void> {
        try {
            await this.http.post(
                `/tracks/${encodeURIComponent(track.id)}/tired`,
                { stationId: track.stationId },
                { headers: authHeaders(session) }
            );
        } catch (error) {
            throw toApiError(error, "tired");
        }
    }
}

function authHeaders(session: SessionToken): Record<string, string> {
    return { Authorization: `Bearer ${session.authToken}` };
}

function parseResponse<T extends z.ZodTypeAny>(
    schema: T,
    data: unknown,
    operation: string
): z.infer<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw new ApiError(
            "malformed-response",
            `Unexpected ${operation} response from service`,
            {
                issues: parsed.error.errors.map(
                    (issue) => `${issue.path.join(".")}: ${issue.message}`
                ),
            }
        );
    }
    return parsed.data;
}

function toApiError(error: unknown, operation: string): ApiError {
    if (error instanceof ApiError) {
        return error;
    }

    const status = getResponseStatus(error);
    const message = `${operation} request failed: ${getErrorMessage(error)}`;
    switch (classifyNetworkError(error)) {
        case "unauthorized":
            return new ApiError("session-expired", message, { status });
        case "rate-limited":
            return new ApiError("rate-limited", message, { status }, getRetryAfterMs(error));
        case "transient":
            return new ApiError(
                status === undefined ? "connection-failure" : "server-error",
                message,
                { status }
            );
        default:
            return new ApiError("request-rejected", message, { status });
    }
}

function toTrack(wire: WireTrack, stationId: string): Track {
    return {
        id: wire.id,
        musicId: wire.musicId,
        stationId,
        title: wire.title,
        artist: wire.artist,
        album: wire.album,
        audioUrl: wire.audioUrl,
        durationMs: Math.round(wire.durationSec * 1000),
        rating: wire.rating,
        tiredUntil: wire.tiredUntil ? Date.parse(wire.tiredUntil) : undefined,
    };
}

/** The request went out but the connection dropped or idled out before a response completed. */
function isDroppedConnection(error: unknown): boolean {
    return (
        axios.isAxiosError(error) &&
        error.response === undefined &&
        error.request !== undefined &&
        error.request !== null
    );
}
