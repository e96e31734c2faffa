import { Track } from "../types";

export const DEFAULT_TIRED_PERIOD_MS = 30 * 24 * 60 * 60 * 1000;

/**
 * Local record of songs the listener is tired of, keyed by the stable music
 * id so it survives playlist refreshes that hand out fresh track tokens. The
 * service applies the same suppression; this copy covers propagation lag.
 */
export class TiredRegistry {
    private readonly until = new Map<string, number>();

    constructor(private readonly periodMs: number = DEFAULT_TIRED_PERIOD_MS) {}

    mark(track: Track, now: number): number {
        const expiresAt = now + this.periodMs;
        this.until.set(track.musicId, expiresAt);
        track.tiredUntil = expiresAt;
        return expiresAt;
    }

    isTired(track: Track, now: number): boolean {
        if (track.tiredUntil !== undefined && track.tiredUntil > now) {
            return true;
        }

        const expiresAt = this.until.get(track.musicId);
        if (expiresAt === undefined) {
            return false;
        }
        if (expiresAt <= now) {
            this.until.delete(track.musicId);
            return false;
        }
        return true;
    }

    get size(): number {
        return this.until.size;
    }
}
