/**
 * Bounded exponential backoff shared by authentication, playlist fetches and
 * track downloads. Callers supply the error classification; this module only
 * decides how long to wait and when to give up.
 */

export interface BackoffPolicy {
    /** Total attempts including the first one. */
    maxAttempts: number;
    /** Delay before the second attempt (ms) */
    baseDelayMs: number;
    /** Upper bound for any single delay (ms) */
    maxDelayMs: number;
    /** Random jitter added on top of the exponential delay (ms) */
    jitterMs: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
    maxAttempts: 4,
    baseDelayMs: 500,
    maxDelayMs: 30000,
    jitterMs: 250,
};

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
    policy: BackoffPolicy;
    /** Return false to rethrow immediately. */
    shouldRetry: (error: unknown, attempt: number) => boolean;
    /** Server-provided wait (e.g. Retry-After) that replaces the computed delay. */
    retryAfterMs?: (error: unknown) => number | undefined;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    signal?: AbortSignal;
    sleep?: Sleeper;
    random?: () => number;
}

export function abortReason(signal: AbortSignal): Error {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) {
        return reason;
    }
    return new Error("Operation aborted");
}

export const sleep: Sleeper = (ms, signal) =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(abortReason(signal));
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            if (signal) {
                reject(abortReason(signal));
            }
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);

        signal?.addEventListener("abort", onAbort, { once: true });
    });

/**
 * Delay to wait after the given (1-based) failed attempt.
 */
export function computeBackoffDelay(
    policy: BackoffPolicy,
    attempt: number,
    random: () => number = Math.random,
    retryAfterMs?: number
): number {
    if (retryAfterMs !== undefined && retryAfterMs >= 0) {
        return Math.min(retryAfterMs, policy.maxDelayMs);
    }

    const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt - 1);
    const jitter = Math.floor(random() * policy.jitterMs);
    return Math.min(exponentialDelay + jitter, policy.maxDelayMs);
}

export async function retryWithBackoff<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const { policy, signal } = options;
    const wait = options.sleep ?? sleep;
    const maxAttempts = Math.max(1, policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
        signal?.throwIfAborted();

        try {
            return await operation(attempt);
        } catch (error) {
            if (signal?.aborted) {
                throw abortReason(signal);
            }

            if (attempt >= maxAttempts || !options.shouldRetry(error, attempt)) {
                throw error;
            }

            const delayMs = computeBackoffDelay(
                policy,
                attempt,
                options.random,
                options.retryAfterMs?.(error)
            );
            options.onRetry?.(error, attempt, delayMs);
            await wait(delayMs, signal);
        }
    }
}
