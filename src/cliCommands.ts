import { PlayerCommand, StatusEvent } from "./services/playback/commands";
import { Station } from "./services/types";

export type CliAction =
    | { kind: "command"; command: PlayerCommand }
    | { kind: "select"; ref: string }
    | { kind: "login"; username: string; password: string }
    | { kind: "logout" }
    | { kind: "help" }
    | { kind: "status" }
    | { kind: "none" }
    | { kind: "invalid"; message: string };

const SIMPLE_COMMANDS: Record<string, PlayerCommand> = {
    pause: { type: "Pause" },
    resume: { type: "Resume" },
    p: { type: "TogglePause" },
    toggle: { type: "TogglePause" },
    "+": { type: "VolumeUp" },
    "-": { type: "VolumeDown" },
    mute: { type: "Mute" },
    unmute: { type: "Unmute" },
    m: { type: "ToggleMute" },
    skip: { type: "Skip" },
    n: { type: "Skip" },
    tired: { type: "Tired" },
    t: { type: "Tired" },
    up: { type: "ThumbsUp" },
    love: { type: "ThumbsUp" },
    down: { type: "ThumbsDown" },
    ban: { type: "ThumbsDown" },
    clear: { type: "ClearRating" },
    stations: { type: "RefreshStations" },
    quit: { type: "Quit" },
    q: { type: "Quit" },
};

export const HELP_TEXT = [
    "Commands:",
    "  stations               refresh and list stations",
    "  play <number|id>       tune to a station",
    "  p | pause | resume     toggle or set pause",
    "  + | - | vol <0-100>    volume",
    "  m | mute | unmute      mute",
    "  n | skip               next track",
    "  t | tired              skip and suppress this song for a while",
    "  up | down | clear      rate the current track",
    "  login <user> <pass>    replace stored credentials",
    "  logout                 drop the session",
    "  status                 show the current track",
    "  q | quit               exit",
].join("\n");

/** Maps one line of terminal input to an action. */
export function parseCommandLine(line: string): CliAction {
    const [rawName, ...args] = line.trim().split(/\s+/);
    const name = rawName?.toLowerCase() ?? "";
    if (name.length === 0) {
        return { kind: "none" };
    }

    const simple = SIMPLE_COMMANDS[name];
    if (simple) {
        return { kind: "command", command: simple };
    }

    switch (name) {
        case "play":
        case "station": {
            const ref = args.join(" ");
            return ref
                ? { kind: "select", ref }
                : { kind: "invalid", message: `Usage: ${name} <number|id>` };
        }
        case "vol":
        case "volume": {
            const percent = Number(args[0]);
            if (args.length !== 1 || !Number.isFinite(percent) || percent < 0 || percent > 100) {
                return { kind: "invalid", message: "Usage: vol <0-100>" };
            }
            return { kind: "command", command: { type: "SetVolume", volume: percent / 100 } };
        }
        case "login": {
            const [username, ...passwordParts] = args;
            if (!username || passwordParts.length === 0) {
                return { kind: "invalid", message: "Usage: login <user> <pass>" };
            }
            return { kind: "login", username, password: passwordParts.join(" ") };
        }
        case "logout":
            return { kind: "logout" };
        case "help":
        case "?":
            return { kind: "help" };
        case "status":
            return { kind: "status" };
        default:
            return { kind: "invalid", message: `Unknown command: ${name} (try "help")` };
    }
}

/** Resolves a 1-based list position or a literal station id. */
export function resolveStationRef(ref: string, stations: readonly Station[]): string {
    if (/^\d+$/.test(ref)) {
        const station = stations[Number(ref) - 1];
        if (station) {
            return station.id;
        }
    }
    const byName = stations.find(
        (station) => station.name.toLowerCase() === ref.toLowerCase()
    );
    return byName?.id ?? ref;
}

function formatClock(ms: number): string {
    const totalSeconds = Math.max(0, Math.floor(ms / 1000));
    const minutes = Math.floor(totalSeconds / 60);
    const seconds = totalSeconds % 60;
    return `${minutes}:${String(seconds).padStart(2, "0")}`;
}

/** One line of terminal output per status event, or null to stay quiet. */
export function formatStatusEvent(event: StatusEvent): string | null {
    switch (event.type) {
        case "track":
            if (!event.track) {
                return null;
            }
            return `> "${event.track.title}" by ${event.track.artist}` +
                (event.track.album ? ` on ${event.track.album}` : "");
        case "state":
            return event.state === "PAUSED" ? "(paused)" : null;
        case "progress":
            return null;
        case "volume":
            return event.muted
                ? "Volume: muted"
                : `Volume: ${Math.round(event.volume * 100)}%`;
        case "rating":
            return event.rating === "thumbs-up"
                ? "Loved"
                : event.rating === "thumbs-down"
                  ? "Banned"
                  : "Rating cleared";
        case "connectivity":
            return event.session === "AUTHENTICATING"
                ? "Connecting..."
                : event.session === "VALID"
                  ? "Connected"
                  : null;
        case "stations":
            return event.stations
                .map((station, index) =>
                    `${String(index + 1).padStart(3)}) ${station.name}${station.isQuickMix ? " [Q]" : ""}`
                )
                .join("\n");
        case "stopped":
            return null;
        case "notification": {
            const prefix =
                event.level === "blocking" ? "!! " : event.level === "warning" ? "! " : "";
            return `${prefix}${event.message}`;
        }
    }
}

export function formatProgress(elapsedMs: number, durationMs: number): string {
    return durationMs > 0
        ? `${formatClock(elapsedMs)}/${formatClock(durationMs)}`
        : formatClock(elapsedMs);
}
