/**
 * Session Manager
 *
 * Sole owner of the authenticated session. Callers borrow a handle per call
 * and report expiry back here; nobody else keeps a copy of the token.
 */

import { CredentialStore, Credentials, ServiceClient, SessionToken } from "./types";
import { BackoffPolicy, retryWithBackoff, Sleeper } from "../utils/backoff";
import {
    ApiError,
    AppError,
    AuthError,
    classifyNetworkError,
    ErrorCode,
    getErrorMessage,
    isSessionExpired,
    isTransient,
    SessionError,
} from "../utils/errors";
import { createLogger, Logger, withLogTiming } from "../utils/logger";

export type SessionState =
    | "UNAUTHENTICATED"
    | "AUTHENTICATING"
    | "VALID"
    | "EXPIRED"
    | "FAILED";

// Valid state transitions - anything not listed is invalid
const VALID_TRANSITIONS: Record<SessionState, SessionState[]> = {
    UNAUTHENTICATED: ["AUTHENTICATING"],
    AUTHENTICATING: ["VALID", "FAILED", "UNAUTHENTICATED"],
    VALID: ["EXPIRED", "UNAUTHENTICATED"],
    EXPIRED: ["AUTHENTICATING", "UNAUTHENTICATED"],
    FAILED: ["UNAUTHENTICATED"],
};

export interface SessionHandle {
    readonly token: SessionToken;
    /** Increments on every successful authentication. */
    readonly generation: number;
}

export interface SessionSnapshot {
    state: SessionState;
    previousState: SessionState | null;
    error: string | null;
}

export type SessionListener = (snapshot: SessionSnapshot) => void;

export interface SessionManagerOptions {
    client: Pick<ServiceClient, "authenticate">;
    credentials: CredentialStore;
    retryPolicy: BackoffPolicy;
    logger?: Logger;
    sleep?: Sleeper;
    random?: () => number;
}

export class SessionManager {
    private state: SessionState = "UNAUTHENTICATED";
    private previousState: SessionState | null = null;
    private handle: SessionHandle | null = null;
    private failure: AuthError | null = null;
    private authInFlight: Promise<SessionHandle> | null = null;
    private generation = 0;
    /** Bumped by logout/login so a stale authentication result is discarded. */
    private epoch = 0;
    private readonly listeners = new Set<SessionListener>();
    private readonly log: Logger;

    constructor(private readonly options: SessionManagerOptions) {
        this.log = options.logger ?? createLogger("session");
    }

    getState(): SessionState {
        return this.state;
    }

    getSnapshot(): SessionSnapshot {
        return {
            state: this.state,
            previousState: this.previousState,
            error: this.failure?.message ?? null,
        };
    }

    subscribe(listener: SessionListener): () => void {
        this.listeners.add(listener);
        listener(this.getSnapshot());
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Resolves immediately while VALID, waits out an authentication in
     * progress, and rejects at once with the AuthError once FAILED.
     */
    currentSession(): Promise<SessionHandle> {
        switch (this.state) {
            case "VALID":
                if (this.handle) {
                    return Promise.resolve(this.handle);
                }
                break;
            case "FAILED":
                return Promise.reject(
                    this.failure ??
                        new AuthError(
                            ErrorCode.INVALID_CREDENTIALS,
                            "Credentials were rejected"
                        )
                );
            case "AUTHENTICATING":
                if (this.authInFlight) {
                    return this.authInFlight;
                }
                break;
            default:
                break;
        }
        return this.authenticate();
    }

    /**
     * Marks the given session as expired and starts re-authenticating. Reports
     * against an older generation are ignored.
     */
    reportExpired(handle: SessionHandle): void {
        if (this.state !== "VALID" || this.handle?.generation !== handle.generation) {
            return;
        }

        this.log.info("Session expired; re-authenticating", {
            generation: handle.generation,
        });
        this.handle = null;
        this.transition("EXPIRED");
        this.authenticate().catch((error) => {
            this.log.warn("Background re-authentication failed", {
                error: getErrorMessage(error),
            });
        });
    }

    /**
     * Runs `operation` with the current session. A session-expired failure is
     * reported and the operation is retried once on the fresh session.
     */
    async withSession<T>(operation: (session: SessionToken) => Promise<T>): Promise<T> {
        const first = await this.currentSession();
        try {
            return await operation(first.token);
        } catch (error) {
            if (!isSessionExpired(error)) {
                throw error;
            }
            this.reportExpired(first);
        }

        const renewed = await this.currentSession();
        try {
            return await operation(renewed.token);
        } catch (error) {
            if (isSessionExpired(error)) {
                this.reportExpired(renewed);
                throw new SessionError(
                    ErrorCode.SESSION_EXPIRED,
                    "Session expired again immediately after re-authentication"
                );
            }
            throw error;
        }
    }

    /** Stores new credentials and authenticates with them, leaving FAILED. */
    async login(credentials: Credentials): Promise<SessionHandle> {
        await this.options.credentials.save(credentials);
        this.resetToUnauthenticated();
        return this.authenticate();
    }

    /** Forgets the current session without touching stored credentials. */
    logout(): void {
        this.resetToUnauthenticated();
    }

    private resetToUnauthenticated(): void {
        this.epoch++;
        this.handle = null;
        this.failure = null;
        this.authInFlight = null;
        if (this.state !== "UNAUTHENTICATED") {
            this.forceTransition("UNAUTHENTICATED");
        }
    }

    private authenticate(): Promise<SessionHandle> {
        if (this.authInFlight) {
            return this.authInFlight;
        }

        const epoch = this.epoch;
        this.transition("AUTHENTICATING");
        const attempt = withLogTiming(this.log, "authenticate", () =>
            this.runAuthentication()
        )
            .then((token) => this.settleSuccess(epoch, token))
            .catch((error: unknown) => this.settleFailure(epoch, error))
            .finally(() => {
                if (this.authInFlight === attempt) {
                    this.authInFlight = null;
                }
            });
        this.authInFlight = attempt;
        return attempt;
    }

    private async runAuthentication(): Promise<SessionToken> {
        const credentials = await this.options.credentials.load();
        if (!credentials) {
            throw new AuthError(
                ErrorCode.MISSING_CREDENTIALS,
                "No stored credentials; log in to continue"
            );
        }

        return retryWithBackoff(
            () => this.options.client.authenticate(credentials),
            {
                policy: this.options.retryPolicy,
                shouldRetry: isTransientAuthFailure,
                retryAfterMs: (error) =>
                    error instanceof ApiError ? error.retryAfterMs : undefined,
                onRetry: (error, attempt, delayMs) =>
                    this.log.warn("Authentication attempt failed, retrying", {
                        attempt,
                        delayMs,
                        error: getErrorMessage(error),
                    }),
                sleep: this.options.sleep,
                random: this.options.random,
            }
        );
    }

    private settleSuccess(epoch: number, token: SessionToken): SessionHandle {
        if (epoch !== this.epoch) {
            throw new SessionError(
                ErrorCode.SESSION_UNAVAILABLE,
                "Authentication superseded by logout"
            );
        }

        this.generation++;
        this.handle = { token, generation: this.generation };
        this.failure = null;
        this.transition("VALID");
        return this.handle;
    }

    private settleFailure(epoch: number, error: unknown): never {
        if (epoch !== this.epoch) {
            throw error;
        }

        if (error instanceof AuthError) {
            this.failure = error;
            this.log.error("Authentication rejected", { code: error.code });
            this.transition("FAILED");
            throw error;
        }

        this.transition("UNAUTHENTICATED");
        throw new SessionError(
            ErrorCode.SESSION_UNAVAILABLE,
            `Unable to establish a session: ${getErrorMessage(error)}`
        );
    }

    private transition(to: SessionState): boolean {
        if (!VALID_TRANSITIONS[this.state].includes(to)) {
            this.log.warn(`Invalid session transition: ${this.state} → ${to}`);
            return false;
        }
        this.forceTransition(to);
        return true;
    }

    private forceTransition(to: SessionState): void {
        const from = this.state;
        this.previousState = from;
        this.state = to;
        this.log.debug(`Session ${from} → ${to}`);
        this.notify();
    }

    private notify(): void {
        const snapshot = this.getSnapshot();
        this.listeners.forEach((listener) => {
            try {
                listener(snapshot);
            } catch (error) {
                this.log.error("Session listener error", { error });
            }
        });
    }
}

function isTransientAuthFailure(error: unknown): boolean {
    if (error instanceof AppError) {
        // AuthError is FATAL; ApiError is TRANSIENT only for retryable kinds.
        return isTransient(error);
    }
    const failure = classifyNetworkError(error);
    return failure === "transient" || failure === "rate-limited";
}
