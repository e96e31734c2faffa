import dotenv from "dotenv";
import * as path from "path";
import { z } from "zod";
import { BackoffPolicy, DEFAULT_BACKOFF_POLICY } from "./utils/backoff";
import { APP_DIR_NAME, userCacheDir, userConfigDir } from "./utils/appDirs";
import { parseEnvCsv, parseEnvFlag, parseEnvFloat, parseEnvInt } from "./utils/envParsers";
import { ConfigError } from "./utils/errors";
import { logger } from "./utils/logger";

export const DEFAULT_PLAYER_ARGS = [
    "--no-video",
    "--really-quiet",
    "--volume={volume}",
    "-",
];

const DAY_MS = 24 * 60 * 60 * 1000;

// Keys are env var names so validation issues point at what the user set.
const envSchema = z
    .object({
        TUNEWELL_API_URL: z.string().url("must be an absolute URL").optional(),
        TUNEWELL_CACHE_DIR: z.string().min(1),
        TUNEWELL_CACHE_MAX_MB: z.number().int().positive(),
        TUNEWELL_CACHE_EVICT_COMPLETED: z.boolean(),
        TUNEWELL_PREFETCH_LOOKAHEAD: z.number().int().min(1).max(4),
        TUNEWELL_PREFETCH_CONCURRENCY: z.number().int().min(1).max(4),
        TUNEWELL_DOWNLOAD_MAX_ATTEMPTS: z.number().int().min(1).max(10),
        TUNEWELL_AUTH_MAX_ATTEMPTS: z.number().int().min(1).max(10),
        TUNEWELL_PLAYLIST_MAX_ATTEMPTS: z.number().int().min(1).max(10),
        TUNEWELL_BACKOFF_BASE_MS: z.number().int().min(0),
        TUNEWELL_BACKOFF_MAX_MS: z.number().int().min(0),
        TUNEWELL_PLAYLIST_RETRY_INTERVAL_MS: z.number().int().min(1000),
        TUNEWELL_TIRED_DAYS: z.number().positive(),
        TUNEWELL_VOLUME: z.number().min(0).max(1),
        TUNEWELL_VOLUME_STEP: z.number().gt(0).max(1),
        TUNEWELL_REQUEST_TIMEOUT_MS: z.number().int().positive(),
        TUNEWELL_DOWNLOAD_TIMEOUT_MS: z.number().int().positive(),
        TUNEWELL_CREDENTIALS_PATH: z.string().min(1),
        TUNEWELL_CREDENTIALS_KEY: z.string().min(1).optional(),
        TUNEWELL_PLAYER_COMMAND: z.string().min(1),
        TUNEWELL_PLAYER_ARGS: z.array(z.string()),
        TUNEWELL_PROGRESS_INTERVAL_MS: z.number().int().min(0),
    })
    .refine((env) => env.TUNEWELL_BACKOFF_MAX_MS >= env.TUNEWELL_BACKOFF_BASE_MS, {
        path: ["TUNEWELL_BACKOFF_MAX_MS"],
        message: "must not be smaller than TUNEWELL_BACKOFF_BASE_MS",
    });

export interface RadioConfig {
    /** Service base URL; only the CLI's HTTP client needs it. */
    apiUrl?: string;
    cache: {
        directory: string;
        maxBytes: number;
        /** Drop a track's audio once it has played to the end. */
        evictCompleted: boolean;
    };
    prefetch: {
        lookahead: number;
        concurrency: number;
    };
    retry: {
        download: BackoffPolicy;
        auth: BackoffPolicy;
        playlist: BackoffPolicy;
        playlistRetryIntervalMs: number;
    };
    tiredPeriodMs: number;
    volume: {
        initial: number;
        step: number;
    };
    requestTimeoutMs: number;
    downloadTimeoutMs: number;
    credentials: {
        path: string;
        key?: string;
    };
    player: {
        command: string;
        args: string[];
    };
    progressIntervalMs: number;
}

export interface LoadConfigOptions {
    /** Read `.env` from the working directory first (default true). */
    loadDotenv?: boolean;
}

function optionalString(value: string | undefined): string | undefined {
    return value !== undefined && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Builds the runtime configuration from environment variables, applying
 * defaults and reporting every invalid key in one ConfigError.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    options: LoadConfigOptions = {}
): RadioConfig {
    if (options.loadDotenv ?? true) {
        // Populates process.env; values already set win.
        dotenv.config();
    }

    const result = envSchema.safeParse({
        TUNEWELL_API_URL: optionalString(env.TUNEWELL_API_URL),
        TUNEWELL_CACHE_DIR:
            optionalString(env.TUNEWELL_CACHE_DIR) ??
            path.join(userCacheDir(env), APP_DIR_NAME, "tracks"),
        TUNEWELL_CACHE_MAX_MB: parseEnvInt(env.TUNEWELL_CACHE_MAX_MB, 512),
        TUNEWELL_CACHE_EVICT_COMPLETED: parseEnvFlag(env.TUNEWELL_CACHE_EVICT_COMPLETED, false),
        TUNEWELL_PREFETCH_LOOKAHEAD: parseEnvInt(env.TUNEWELL_PREFETCH_LOOKAHEAD, 2),
        TUNEWELL_PREFETCH_CONCURRENCY: parseEnvInt(env.TUNEWELL_PREFETCH_CONCURRENCY, 1),
        TUNEWELL_DOWNLOAD_MAX_ATTEMPTS: parseEnvInt(env.TUNEWELL_DOWNLOAD_MAX_ATTEMPTS, 4),
        TUNEWELL_AUTH_MAX_ATTEMPTS: parseEnvInt(env.TUNEWELL_AUTH_MAX_ATTEMPTS, 4),
        TUNEWELL_PLAYLIST_MAX_ATTEMPTS: parseEnvInt(env.TUNEWELL_PLAYLIST_MAX_ATTEMPTS, 5),
        TUNEWELL_BACKOFF_BASE_MS: parseEnvInt(env.TUNEWELL_BACKOFF_BASE_MS, 500),
        TUNEWELL_BACKOFF_MAX_MS: parseEnvInt(env.TUNEWELL_BACKOFF_MAX_MS, 30000),
        TUNEWELL_PLAYLIST_RETRY_INTERVAL_MS: parseEnvInt(
            env.TUNEWELL_PLAYLIST_RETRY_INTERVAL_MS,
            60000
        ),
        TUNEWELL_TIRED_DAYS: parseEnvFloat(env.TUNEWELL_TIRED_DAYS, 30),
        TUNEWELL_VOLUME: parseEnvFloat(env.TUNEWELL_VOLUME, 1),
        TUNEWELL_VOLUME_STEP: parseEnvFloat(env.TUNEWELL_VOLUME_STEP, 0.1),
        TUNEWELL_REQUEST_TIMEOUT_MS: parseEnvInt(env.TUNEWELL_REQUEST_TIMEOUT_MS, 15000),
        TUNEWELL_DOWNLOAD_TIMEOUT_MS: parseEnvInt(env.TUNEWELL_DOWNLOAD_TIMEOUT_MS, 60000),
        TUNEWELL_CREDENTIALS_PATH:
            optionalString(env.TUNEWELL_CREDENTIALS_PATH) ??
            path.join(userConfigDir(env), APP_DIR_NAME, "credentials.json"),
        TUNEWELL_CREDENTIALS_KEY: optionalString(env.TUNEWELL_CREDENTIALS_KEY),
        TUNEWELL_PLAYER_COMMAND: optionalString(env.TUNEWELL_PLAYER_COMMAND) ?? "mpv",
        TUNEWELL_PLAYER_ARGS:
            parseEnvCsv(optionalString(env.TUNEWELL_PLAYER_ARGS)) ?? DEFAULT_PLAYER_ARGS,
        TUNEWELL_PROGRESS_INTERVAL_MS: parseEnvInt(env.TUNEWELL_PROGRESS_INTERVAL_MS, 1000),
    });

    if (!result.success) {
        const problems = result.error.errors.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
        );
        throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`, {
            problems,
        });
    }

    const values = result.data;
    const backoff = (maxAttempts: number): BackoffPolicy => ({
        maxAttempts,
        baseDelayMs: values.TUNEWELL_BACKOFF_BASE_MS,
        maxDelayMs: values.TUNEWELL_BACKOFF_MAX_MS,
        jitterMs: Math.min(
            DEFAULT_BACKOFF_POLICY.jitterMs,
            values.TUNEWELL_BACKOFF_BASE_MS
        ),
    });

    const config: RadioConfig = {
        apiUrl: values.TUNEWELL_API_URL,
        cache: {
            directory: values.TUNEWELL_CACHE_DIR,
            maxBytes: values.TUNEWELL_CACHE_MAX_MB * 1024 * 1024,
            evictCompleted: values.TUNEWELL_CACHE_EVICT_COMPLETED,
        },
        prefetch: {
            lookahead: values.TUNEWELL_PREFETCH_LOOKAHEAD,
            concurrency: values.TUNEWELL_PREFETCH_CONCURRENCY,
        },
        retry: {
            download: backoff(values.TUNEWELL_DOWNLOAD_MAX_ATTEMPTS),
            auth: backoff(values.TUNEWELL_AUTH_MAX_ATTEMPTS),
            playlist: backoff(values.TUNEWELL_PLAYLIST_MAX_ATTEMPTS),
            playlistRetryIntervalMs: values.TUNEWELL_PLAYLIST_RETRY_INTERVAL_MS,
        },
        tiredPeriodMs: Math.round(values.TUNEWELL_TIRED_DAYS * DAY_MS),
        volume: {
            initial: values.TUNEWELL_VOLUME,
            step: values.TUNEWELL_VOLUME_STEP,
        },
        requestTimeoutMs: values.TUNEWELL_REQUEST_TIMEOUT_MS,
        downloadTimeoutMs: values.TUNEWELL_DOWNLOAD_TIMEOUT_MS,
        credentials: {
            path: values.TUNEWELL_CREDENTIALS_PATH,
            key: values.TUNEWELL_CREDENTIALS_KEY,
        },
        player: {
            command: values.TUNEWELL_PLAYER_COMMAND,
            args: values.TUNEWELL_PLAYER_ARGS,
        },
        progressIntervalMs: values.TUNEWELL_PROGRESS_INTERVAL_MS,
    };

    logger.debug("Configuration loaded", {
        cacheDir: config.cache.directory,
        cacheMaxBytes: config.cache.maxBytes,
        lookahead: config.prefetch.lookahead,
        encryptedCredentials: config.credentials.key !== undefined,
    });
    return config;
}
