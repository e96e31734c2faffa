import { createLogger, Logger } from "../../utils/logger";
import { CredentialStore, Credentials, Track } from "../../services/types";
import { BackoffPolicy } from "../../utils/backoff";

export const silentLogger: Logger = createLogger("test", { level: "silent" });

export const noSleep = (): Promise<void> => Promise.resolve();

export const instantPolicy = (maxAttempts: number): BackoffPolicy => ({
    maxAttempts,
    baseDelayMs: 0,
    maxDelayMs: 0,
    jitterMs: 0,
});

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
    return {
        id,
        musicId: `music-${id}`,
        stationId: "station-1",
        title: `Title ${id}`,
        artist: `Artist ${id}`,
        album: `Album ${id}`,
        audioUrl: `https://media.test/${id}.mp3`,
        durationMs: 180000,
        rating: "unrated",
        ...overrides,
    };
}

/** Lets queued promise callbacks and timers-free async chains settle. */
export async function flushPromises(rounds = 10): Promise<void> {
    for (let i = 0; i < rounds; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
    }
}

export class MemoryCredentialStore implements CredentialStore {
    saved: Credentials[] = [];

    constructor(private credentials: Credentials | null = null) {}

    async load(): Promise<Credentials | null> {
        return this.credentials;
    }

    async save(credentials: Credentials): Promise<void> {
        this.saved.push(credentials);
        this.credentials = credentials;
    }

    async clear(): Promise<void> {
        this.credentials = null;
    }
}

/** Polls `check` until it returns a truthy value or the deadline passes. */
export async function waitFor<T>(
    check: () => T | null | undefined | false,
    timeoutMs = 3000
): Promise<T> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
        const result = check();
        if (result) {
            return result;
        }
        if (Date.now() > deadline) {
            throw new Error("Timed out waiting for condition");
        }
        await new Promise<void>((resolve) => setTimeout(resolve, 2));
    }
}
