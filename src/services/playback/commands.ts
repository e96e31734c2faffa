import { ErrorCode } from "../../utils/errors";
import { SessionState } from "../sessionManager";
import { Station, Track, TrackRating } from "../types";
import { PlaybackState, StopReason } from "./playbackStateMachine";

// ── Command channel (UI → engine) ──────────────────────────────────

export type PlayerCommand =
    | { type: "SelectStation"; stationId: string }
    | { type: "Pause" }
    | { type: "Resume" }
    | { type: "TogglePause" }
    | { type: "VolumeUp" }
    | { type: "VolumeDown" }
    | { type: "SetVolume"; volume: number }
    | { type: "Mute" }
    | { type: "Unmute" }
    | { type: "ToggleMute" }
    | { type: "Skip" }
    | { type: "Tired" }
    | { type: "ThumbsUp" }
    | { type: "ThumbsDown" }
    | { type: "ClearRating" }
    | { type: "RefreshStations" }
    | { type: "Quit" };

export type PlayerCommandType = PlayerCommand["type"];

// ── Status channel (engine → UI) ───────────────────────────────────

export type NotificationLevel = "info" | "warning" | "blocking";

export type StatusEvent =
    | { type: "state"; state: PlaybackState; previousState: PlaybackState | null }
    | { type: "track"; track: Track | null; stationId: string | null }
    | { type: "progress"; elapsedMs: number; durationMs: number; paused: boolean }
    | { type: "volume"; volume: number; muted: boolean }
    | { type: "rating"; trackId: string; rating: TrackRating }
    | { type: "connectivity"; session: SessionState }
    | { type: "stations"; stations: Station[] }
    | { type: "stopped"; reason: StopReason }
    | {
          type: "notification";
          level: NotificationLevel;
          message: string;
          code?: ErrorCode;
      };

export type StatusListener = (event: StatusEvent) => void;
