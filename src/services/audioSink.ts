import { ChildProcess, spawn } from "child_process";
import { AudioSink } from "./types";
import { DecodeError, ErrorCode } from "../utils/errors";
import { createLogger, Logger } from "../utils/logger";
import { clampVolume } from "./playback/volume";

export interface SpawnedPlayerSinkOptions {
    command: string;
    /** `{volume}` expands to 0-100, `{format}` to the container tag. */
    args: string[];
    logger?: Logger;
}

const STDERR_TAIL_CHARS = 500;

function summarizeStderr(stderr: string): string {
    const trimmed = stderr.trim();
    return trimmed.length > STDERR_TAIL_CHARS
        ? trimmed.slice(-STDERR_TAIL_CHARS)
        : trimmed;
}

/**
 * Plays each blob by piping it into an external player process (mpv by
 * default). Pause and resume suspend the process; volume is passed on the
 * command line and so applies from the next track.
 */
export class SpawnedPlayerSink implements AudioSink {
    private readonly log: Logger;
    private readonly finishedListeners = new Set<() => void>();
    private child: ChildProcess | null = null;
    private loaded: { bytes: Buffer; format: string } | null = null;
    private volume = 1;
    private suspended = false;
    private generation = 0;

    constructor(private readonly options: SpawnedPlayerSinkOptions) {
        this.log = options.logger ?? createLogger("audio-sink");
    }

    get isRunning(): boolean {
        return this.child !== null;
    }

    async load(bytes: Buffer, format: string): Promise<void> {
        this.stop();
        if (bytes.length === 0) {
            throw new DecodeError(ErrorCode.CORRUPT_FILE, "Audio payload is empty");
        }
        this.loaded = { bytes, format };
    }

    play(): void {
        if (this.child) {
            if (this.suspended) {
                this.child.kill("SIGCONT");
                this.suspended = false;
            }
            return;
        }
        if (this.loaded) {
            this.start(this.loaded.bytes, this.loaded.format);
            this.loaded = null;
        }
    }

    pause(): void {
        if (this.child && !this.suspended) {
            this.child.kill("SIGSTOP");
            this.suspended = true;
        }
    }

    setVolume(volume: number): void {
        this.volume = clampVolume(volume);
    }

    stop(): void {
        this.generation++;
        this.loaded = null;
        const child = this.child;
        this.child = null;
        if (!child) {
            return;
        }
        if (this.suspended) {
            child.kill("SIGCONT");
            this.suspended = false;
        }
        child.kill("SIGTERM");
    }

    onFinished(listener: () => void): () => void {
        this.finishedListeners.add(listener);
        return () => {
            this.finishedListeners.delete(listener);
        };
    }

    private start(bytes: Buffer, format: string): void {
        const generation = this.generation;
        const volume = String(Math.round(this.volume * 100));
        const args = this.options.args.map((arg) =>
            arg.replace("{volume}", volume).replace("{format}", format)
        );

        const child = spawn(this.options.command, args, {
            stdio: ["pipe", "ignore", "pipe"],
        });
        this.child = child;

        let stderrBuffer = "";
        child.stderr?.on("data", (chunk: Buffer) => {
            stderrBuffer += chunk.toString("utf8");
        });

        // The player may exit before reading all of stdin (stop, bad input).
        child.stdin?.on("error", (error) => {
            this.log.debug("Player input closed early", { error });
        });

        child.on("error", (error) => {
            this.log.error("Audio player failed to start", {
                command: this.options.command,
                error,
            });
            this.finish(generation);
        });

        child.on("close", (code, signal) => {
            if (code !== 0 && generation === this.generation) {
                this.log.warn("Audio player exited abnormally", {
                    code,
                    signal,
                    stderr: summarizeStderr(stderrBuffer),
                });
            }
            this.finish(generation);
        });

        child.stdin?.end(bytes);
    }

    private finish(generation: number): void {
        if (generation !== this.generation) {
            return;
        }
        // Invalidate so a later "close" after "error" does not fire twice.
        this.generation++;
        this.child = null;
        this.suspended = false;
        this.finishedListeners.forEach((listener) => {
            try {
                listener();
            } catch (error) {
                this.log.error("Finished listener error", { error });
            }
        });
    }
}
