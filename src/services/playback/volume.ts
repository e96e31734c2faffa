export const DEFAULT_VOLUME = 1.0;
export const DEFAULT_VOLUME_STEP = 0.1;

export function clampVolume(value: number): number {
    if (!Number.isFinite(value)) return DEFAULT_VOLUME;
    return Math.round(Math.max(0, Math.min(1, value)) * 100) / 100;
}

/**
 * Output level with a mute flag that remembers the level underneath it.
 */
export class VolumeControl {
    private level: number;
    private muted = false;

    constructor(
        initial: number = DEFAULT_VOLUME,
        private readonly step: number = DEFAULT_VOLUME_STEP
    ) {
        this.level = clampVolume(initial);
    }

    /** Level the sink should apply. */
    get effective(): number {
        return this.muted ? 0 : this.level;
    }

    get volume(): number {
        return this.level;
    }

    get isMuted(): boolean {
        return this.muted;
    }

    set(value: number): void {
        this.level = clampVolume(value);
        this.muted = false;
    }

    increase(): void {
        this.set(this.level + this.step);
    }

    decrease(): void {
        this.set(this.level - this.step);
    }

    mute(): void {
        this.muted = true;
    }

    unmute(): void {
        this.muted = false;
    }

    toggleMute(): void {
        this.muted = !this.muted;
    }
}
