#!/usr/bin/env node
import * as readline from "readline";
import { loadConfig } from "./config";
import {
    formatProgress,
    formatStatusEvent,
    HELP_TEXT,
    parseCommandLine,
    resolveStationRef,
} from "./cliCommands";
import { createRadioCore } from "./index";
import { SpawnedPlayerSink } from "./services/audioSink";
import { FileCredentialStore } from "./services/credentialStore";
import { HttpServiceClient } from "./services/httpServiceClient";
import { Station } from "./services/types";
import { ConfigError, getErrorMessage } from "./utils/errors";
import { createLogger } from "./utils/logger";

async function main(): Promise<void> {
    const config = loadConfig();
    if (!config.apiUrl) {
        throw new ConfigError("TUNEWELL_API_URL is required");
    }

    // Diagnostics go to stderr so they never interleave with the status lines.
    const log = createLogger("tunewell", { writer: console.error });
    const credentials = new FileCredentialStore({
        filePath: config.credentials.path,
        secret: config.credentials.key,
        logger: log.child("credentials"),
    });
    const client = new HttpServiceClient({
        baseUrl: config.apiUrl,
        timeoutMs: config.requestTimeoutMs,
        downloadTimeoutMs: config.downloadTimeoutMs,
        logger: log.child("service-client"),
    });
    const sink = new SpawnedPlayerSink({
        command: config.player.command,
        args: config.player.args,
        logger: log.child("audio-sink"),
    });

    const { session, engine } = createRadioCore(config, {
        client,
        credentials,
        sink,
        logger: log,
    });

    const print = (line: string) => process.stdout.write(`${line}\n`);
    let stations: Station[] = [];
    engine.subscribe((event) => {
        if (event.type === "stations") {
            stations = event.stations;
        }
        const line = formatStatusEvent(event);
        if (line !== null) {
            print(line);
        }
    });

    if (!(await credentials.load())) {
        print('No stored credentials. Use "login <user> <pass>".');
    }

    const input = readline.createInterface({ input: process.stdin, terminal: false });
    input.on("line", (line) => {
        const action = parseCommandLine(line);
        switch (action.kind) {
            case "command":
                engine.send(action.command);
                break;
            case "select":
                engine.send({
                    type: "SelectStation",
                    stationId: resolveStationRef(action.ref, stations),
                });
                break;
            case "login":
                session
                    .login({ username: action.username, password: action.password })
                    .then(() => {
                        engine.send({ type: "RefreshStations" });
                    })
                    .catch((error) => {
                        print(`!! Login failed: ${getErrorMessage(error)}`);
                    });
                break;
            case "logout":
                session.logout();
                break;
            case "help":
                print(HELP_TEXT);
                break;
            case "status": {
                const snapshot = engine.getSnapshot();
                const track = snapshot.current;
                print(
                    track
                        ? `${snapshot.state} "${track.title}" by ${track.artist} ` +
                              formatProgress(snapshot.elapsedMs, track.durationMs)
                        : snapshot.state
                );
                break;
            }
            case "invalid":
                print(action.message);
                break;
            case "none":
                break;
        }
    });
    input.on("close", () => {
        engine.send({ type: "Quit" });
    });
    process.on("SIGINT", () => {
        engine.send({ type: "Quit" });
    });

    try {
        await engine.run();
    } finally {
        input.close();
        await engine.flushFeedback();
    }
}

main().catch((error) => {
    console.error(`tunewell: ${getErrorMessage(error)}`);
    process.exitCode = 1;
});
