/**
 * Playback State Machine
 *
 * Single source of truth for the player's state. The engine drives it; the
 * status channel derives from it.
 */

import { createLogger, Logger } from "../../utils/logger";

export type PlaybackState = "IDLE" | "LOADING" | "PLAYING" | "PAUSED" | "STOPPED";

export type StopReason =
    | "Initializing"
    | "Untuning"
    | "TrackInterrupted"
    | "TrackCompleted"
    | "UserRequest"
    | "SessionTimedOut";

export interface StateContext {
    state: PlaybackState;
    previousState: PlaybackState | null;
    /** Why playback last left PLAYING/PAUSED (or never started). */
    stopReason: StopReason;
    lastTransitionTime: number;
}

// Valid state transitions - anything not listed is invalid
const VALID_TRANSITIONS: Record<PlaybackState, PlaybackState[]> = {
    IDLE: ["LOADING", "STOPPED"],
    LOADING: ["LOADING", "PLAYING", "IDLE", "STOPPED"],
    PLAYING: ["PAUSED", "LOADING", "IDLE", "STOPPED"],
    PAUSED: ["PLAYING", "LOADING", "IDLE", "STOPPED"],
    STOPPED: [],
};

export type StateListener = (context: StateContext) => void;

export class PlaybackStateMachine {
    private context: StateContext;
    private readonly listeners: Set<StateListener> = new Set();
    private readonly log: Logger;

    constructor(
        logger?: Logger,
        private readonly now: () => number = Date.now
    ) {
        this.log = logger ?? createLogger("playback-state");
        this.context = {
            state: "IDLE",
            previousState: null,
            stopReason: "Initializing",
            lastTransitionTime: this.now(),
        };
    }

    getState(): PlaybackState {
        return this.context.state;
    }

    getContext(): Readonly<StateContext> {
        return { ...this.context };
    }

    canTransition(to: PlaybackState): boolean {
        return VALID_TRANSITIONS[this.context.state].includes(to);
    }

    transition(to: PlaybackState, stopReason?: StopReason): boolean {
        if (!this.canTransition(to)) {
            this.log.warn(`Invalid transition: ${this.context.state} → ${to}`);
            return false;
        }

        const from = this.context.state;
        this.context = {
            previousState: from,
            state: to,
            stopReason: stopReason ?? this.context.stopReason,
            lastTransitionTime: this.now(),
        };

        this.log.debug(`${from} → ${to}`, stopReason ? { stopReason } : {});
        this.notify();
        return true;
    }

    subscribe(listener: StateListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private notify(): void {
        const ctx = this.getContext();
        this.listeners.forEach((fn) => {
            try {
                fn(ctx);
            } catch (err) {
                this.log.error("Listener error", { error: err });
            }
        });
    }

    get isIdle(): boolean { return this.context.state === "IDLE"; }
    get isLoading(): boolean { return this.context.state === "LOADING"; }
    get isPlaying(): boolean { return this.context.state === "PLAYING"; }
    get isPaused(): boolean { return this.context.state === "PAUSED"; }
    get isStopped(): boolean { return this.context.state === "STOPPED"; }
    /** A track is loaded into the sink. */
    get hasActiveTrack(): boolean {
        return this.context.state === "PLAYING" || this.context.state === "PAUSED";
    }
}
