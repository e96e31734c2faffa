import { Track } from "../types";
import { TiredRegistry } from "./tiredRegistry";

/**
 * Ordered queue of the active station's tracks plus the one currently loaded.
 * Tired tracks are filtered both when queued and again when reached, since a
 * song can be marked tired while a later copy of it waits in the queue.
 */
export class PlaylistCursor {
    private queue: Track[] = [];
    private playing: Track | null = null;

    constructor(private readonly tired: TiredRegistry) {}

    get current(): Track | null {
        return this.playing;
    }

    get upcomingCount(): number {
        return this.queue.length;
    }

    /** Appends tracks, dropping tired ones and ids already present. */
    enqueue(tracks: readonly Track[], now: number): Track[] {
        const known = new Set(this.queue.map((track) => track.id));
        if (this.playing) {
            known.add(this.playing.id);
        }

        const accepted: Track[] = [];
        for (const track of tracks) {
            if (known.has(track.id) || this.tired.isTired(track, now)) {
                continue;
            }
            known.add(track.id);
            accepted.push(track);
        }
        this.queue.push(...accepted);
        return accepted;
    }

    /** Moves to the next playable track; null once the queue is exhausted. */
    advance(now: number): Track | null {
        this.playing = null;
        while (this.queue.length > 0) {
            const next = this.queue.shift();
            if (next && !this.tired.isTired(next, now)) {
                this.playing = next;
                break;
            }
        }
        return this.playing;
    }

    /** The next `count` playable tracks after the current one. */
    peek(count: number, now: number): Track[] {
        return this.queue
            .filter((track) => !this.tired.isTired(track, now))
            .slice(0, count);
    }

    clear(): void {
        this.queue = [];
        this.playing = null;
    }
}
