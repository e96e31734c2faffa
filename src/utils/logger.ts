export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

type ConsoleMethod = (...args: unknown[]) => void;

export interface LoggerOptions {
    level?: LogLevel;
    /** Route every level to one writer, e.g. stderr for the terminal front end. */
    writer?: ConsoleMethod;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVELS;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const fallback: LogLevel = env.NODE_ENV === "production" ? "warn" : "debug";
    const configured = env.LOG_LEVEL?.trim().toLowerCase();

    if (!configured) {
        return fallback;
    }

    return isLogLevel(configured) ? configured : "silent";
}

function isLogContextCandidate(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function normalizeError(error: unknown): unknown {
    if (!(error instanceof Error)) {
        return error;
    }

    return {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
}

function normalizeContext(context: LogContext): LogContext {
    const output: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        output[key] = normalizeError(value);
    }
    return output;
}

function splitArgs(args: unknown[]): {
    context: LogContext | null;
    passthrough: unknown[];
} {
    if (args.length === 0) {
        return { context: null, passthrough: [] };
    }

    const [first, ...rest] = args;
    if (!isLogContextCandidate(first)) {
        return {
            context: null,
            passthrough: args.map(normalizeError),
        };
    }

    return {
        context: normalizeContext(first),
        passthrough: rest.map(normalizeError),
    };
}

function consoleMethodFor(level: Exclude<LogLevel, "silent">): ConsoleMethod {
    switch (level) {
        case "debug":
            return console.debug;
        case "info":
            return console.info;
        case "warn":
            return console.warn;
        default:
            return console.error;
    }
}

export function createLogger(scope?: string, options: LoggerOptions = {}): Logger {
    const scoped = scope?.trim() || null;
    const level = options.level ?? resolveLogLevel();

    const emit = (
        messageLevel: Exclude<LogLevel, "silent">,
        message: string,
        args: unknown[]
    ): void => {
        if (LOG_LEVELS[messageLevel] < LOG_LEVELS[level]) {
            return;
        }

        const { context, passthrough } = splitArgs(args);
        const prefix = scoped
            ? `[${messageLevel.toUpperCase()}] [${scoped}] ${message}`
            : `[${messageLevel.toUpperCase()}] ${message}`;
        const method = options.writer ?? consoleMethodFor(messageLevel);

        if (context) {
            method(prefix, context, ...passthrough);
            return;
        }

        method(prefix, ...passthrough);
    };

    return {
        debug: (message: string, ...args: unknown[]) => emit("debug", message, args),
        info: (message: string, ...args: unknown[]) => emit("info", message, args),
        warn: (message: string, ...args: unknown[]) => emit("warn", message, args),
        error: (message: string, ...args: unknown[]) => emit("error", message, args),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            const nextScope = scoped ? `${scoped}.${trimmed}` : trimmed;
            return createLogger(nextScope, options);
        },
    };
}

export async function withLogTiming<T>(
    loggerInstance: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {}
): Promise<T> {
    const startedAt = Date.now();
    loggerInstance.debug(`${operation} started`, context);

    try {
        const result = await run();
        loggerInstance.debug(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        loggerInstance.warn(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}

export const logger = createLogger("tunewell");
