/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Authentication / session errors
    INVALID_CREDENTIALS = "INVALID_CREDENTIALS",
    MISSING_CREDENTIALS = "MISSING_CREDENTIALS",
    SESSION_EXPIRED = "SESSION_EXPIRED",
    SESSION_UNAVAILABLE = "SESSION_UNAVAILABLE",

    // Remote service errors
    RATE_LIMITED = "RATE_LIMITED",
    MALFORMED_RESPONSE = "MALFORMED_RESPONSE",
    CONNECTION_FAILURE = "CONNECTION_FAILURE",
    SERVER_ERROR = "SERVER_ERROR",
    REQUEST_REJECTED = "REQUEST_REJECTED",

    // Track download / decode errors
    DOWNLOAD_FAILED = "DOWNLOAD_FAILED",
    DOWNLOAD_CANCELLED = "DOWNLOAD_CANCELLED",
    UNSUPPORTED_FORMAT = "UNSUPPORTED_FORMAT",
    CORRUPT_FILE = "CORRUPT_FILE",

    // File system errors
    CACHE_IO_FAILURE = "CACHE_IO_FAILURE",
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    DISK_FULL = "DISK_FULL",
    PERMISSION_DENIED = "PERMISSION_DENIED",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/** Rejected or missing credentials. Terminal until the user supplies new ones. */
export class AuthError extends AppError {
    constructor(
        code: ErrorCode.INVALID_CREDENTIALS | ErrorCode.MISSING_CREDENTIALS,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(code, ErrorCategory.FATAL, message, details);
        this.name = "AuthError";
    }
}

/** Session expired or temporarily unobtainable; the session manager recovers it. */
export class SessionError extends AppError {
    constructor(
        code: ErrorCode.SESSION_EXPIRED | ErrorCode.SESSION_UNAVAILABLE,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(code, ErrorCategory.TRANSIENT, message, details);
        this.name = "SessionError";
    }
}

export type ApiErrorKind =
    | "session-expired"
    | "rate-limited"
    | "malformed-response"
    | "connection-failure"
    | "server-error"
    | "request-rejected";

const API_ERROR_CODES: Record<ApiErrorKind, ErrorCode> = {
    "session-expired": ErrorCode.SESSION_EXPIRED,
    "rate-limited": ErrorCode.RATE_LIMITED,
    "malformed-response": ErrorCode.MALFORMED_RESPONSE,
    "connection-failure": ErrorCode.CONNECTION_FAILURE,
    "server-error": ErrorCode.SERVER_ERROR,
    "request-rejected": ErrorCode.REQUEST_REJECTED,
};

const RETRYABLE_API_KINDS: ReadonlySet<ApiErrorKind> = new Set([
    "rate-limited",
    "connection-failure",
    "server-error",
]);

/** Station, playlist or feedback call failure reported by the service client. */
export class ApiError extends AppError {
    constructor(
        public readonly kind: ApiErrorKind,
        message: string,
        details?: Record<string, unknown>,
        public readonly retryAfterMs?: number
    ) {
        super(
            API_ERROR_CODES[kind],
            RETRYABLE_API_KINDS.has(kind)
                ? ErrorCategory.TRANSIENT
                : ErrorCategory.RECOVERABLE,
            message,
            details
        );
        this.name = "ApiError";
    }

    get retryable(): boolean {
        return RETRYABLE_API_KINDS.has(this.kind);
    }
}

export type DownloadErrorKind = "transient" | "unretryable" | "cancelled";

/** Per-track audio download failure. */
export class DownloadError extends AppError {
    constructor(
        public readonly kind: DownloadErrorKind,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(
            kind === "cancelled"
                ? ErrorCode.DOWNLOAD_CANCELLED
                : ErrorCode.DOWNLOAD_FAILED,
            kind === "transient"
                ? ErrorCategory.TRANSIENT
                : ErrorCategory.RECOVERABLE,
            message,
            details
        );
        this.name = "DownloadError";
    }
}

/** Track cache storage failure. Callers fall back to re-downloading. */
export class CacheError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(
            ErrorCode.CACHE_IO_FAILURE,
            ErrorCategory.RECOVERABLE,
            message,
            details
        );
        this.name = "CacheError";
    }
}

/** Corrupt or unsupported audio. Handled like an unretryable download failure. */
export class DecodeError extends AppError {
    constructor(
        code: ErrorCode.UNSUPPORTED_FORMAT | ErrorCode.CORRUPT_FILE,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(code, ErrorCategory.RECOVERABLE, message, details);
        this.name = "DecodeError";
    }
}

export class ConfigError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ErrorCode.INVALID_CONFIG, ErrorCategory.FATAL, message, details);
        this.name = "ConfigError";
    }
}

/**
 * Check if an error is transient
 */
export function isTransient(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.TRANSIENT;
    }
    return false;
}

export function isSessionExpired(error: unknown): boolean {
    return (
        (error instanceof ApiError && error.kind === "session-expired") ||
        (error instanceof SessionError &&
            error.code === ErrorCode.SESSION_EXPIRED)
    );
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

function readProperty(value: unknown, key: string): unknown {
    if (typeof value !== "object" || value === null) {
        return undefined;
    }
    return Reflect.get(value, key);
}

/** Reads `err.code` from Node and axios errors. */
export function getErrorCode(error: unknown): string | undefined {
    const code = readProperty(error, "code");
    return typeof code === "string" ? code : undefined;
}

/** Reads `err.response.status` from axios errors. */
export function getResponseStatus(error: unknown): number | undefined {
    const status = readProperty(readProperty(error, "response"), "status");
    return typeof status === "number" ? status : undefined;
}

export function getRetryAfterMs(error: unknown): number | undefined {
    const headers = readProperty(readProperty(error, "response"), "headers");
    const retryAfter = readProperty(headers, "retry-after");
    if (typeof retryAfter !== "string" && typeof retryAfter !== "number") {
        return undefined;
    }
    const parsed = Number.parseInt(String(retryAfter), 10);
    return Number.isNaN(parsed) ? undefined : parsed * 1000;
}

const TRANSIENT_NETWORK_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ECONNREFUSED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "EPIPE",
    "ERR_SOCKET_CLOSED",
]);

export type NetworkFailureClass =
    | "transient"
    | "rate-limited"
    | "unauthorized"
    | "rejected";

/**
 * Classifies a raw transport failure (axios or Node socket error).
 */
export function classifyNetworkError(error: unknown): NetworkFailureClass {
    const code = getErrorCode(error);
    const status = getResponseStatus(error);
    const message = getErrorMessage(error).toLowerCase();

    if (status === 429) {
        return "rate-limited";
    }

    if (status === 401 || status === 403) {
        return "unauthorized";
    }

    if (typeof status === "number" && status >= 500 && status <= 599) {
        return "transient";
    }

    if (typeof status === "number" && status >= 400) {
        return "rejected";
    }

    if (code && TRANSIENT_NETWORK_CODES.has(code)) {
        return "transient";
    }

    if (
        message.includes("socket hang up") ||
        message.includes("network error") ||
        message.includes("timeout")
    ) {
        return "transient";
    }

    return "rejected";
}

/**
 * Wrap a Node.js file system error in an AppError
 */
export function wrapNodeError(err: unknown, context: string): AppError {
    const code = getErrorCode(err);
    const originalError = getErrorMessage(err);

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.FILE_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `File not found: ${context}`,
            { originalError }
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            { originalError }
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            { originalError }
        );
    }

    return new CacheError(`Storage failure: ${context}`, { originalError });
}
