import PQueue from "p-queue";
import { SessionManager } from "../sessionManager";
import { ServiceClient, SessionToken, Track, TrackRating } from "../types";
import { BackoffPolicy, retryWithBackoff, Sleeper } from "../../utils/backoff";
import { ApiError, getErrorMessage } from "../../utils/errors";
import { createLogger, Logger } from "../../utils/logger";

export interface FeedbackQueueOptions {
    session: SessionManager;
    client: Pick<ServiceClient, "rateTrack" | "markTired">;
    retryPolicy: BackoffPolicy;
    logger?: Logger;
    sleep?: Sleeper;
    random?: () => number;
    onFailure?: (track: Track, action: string, error: unknown) => void;
}

/**
 * Best-effort delivery of ratings and tired marks. Submissions run one at a
 * time in issue order and never hold up playback; a failure is logged once
 * its bounded retries are spent.
 */
export class FeedbackQueue {
    private readonly queue = new PQueue({ concurrency: 1 });
    private readonly deliveries = new Set<Promise<void>>();
    private readonly log: Logger;

    constructor(private readonly options: FeedbackQueueOptions) {
        this.log = options.logger ?? createLogger("feedback");
    }

    get pending(): number {
        return this.deliveries.size;
    }

    submitRating(track: Track, rating: TrackRating): void {
        this.enqueue(track, `rate:${rating}`, (session) =>
            this.options.client.rateTrack(session, track, rating)
        );
    }

    submitTired(track: Track): void {
        this.enqueue(track, "tired", (session) =>
            this.options.client.markTired(session, track)
        );
    }

    /** Resolves once every submission so far was delivered or given up on. */
    async onIdle(): Promise<void> {
        while (this.deliveries.size > 0) {
            await Promise.all(this.deliveries);
        }
    }

    private enqueue(
        track: Track,
        action: string,
        send: (session: SessionToken) => Promise<void>
    ): void {
        const delivery: Promise<void> = this.queue
            .add(() =>
                retryWithBackoff(() => this.options.session.withSession(send), {
                    policy: this.options.retryPolicy,
                    shouldRetry: (error) => error instanceof ApiError && error.retryable,
                    sleep: this.options.sleep,
                    random: this.options.random,
                })
            )
            .then(() => {
                this.log.debug("Feedback delivered", { trackId: track.id, action });
            })
            .catch((error: unknown) => {
                this.log.warn("Feedback not delivered", {
                    trackId: track.id,
                    action,
                    error: getErrorMessage(error),
                });
                this.options.onFailure?.(track, action, error);
            })
            .finally(() => {
                this.deliveries.delete(delivery);
            });
        this.deliveries.add(delivery);
    }
}
