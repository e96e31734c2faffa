import { FeedbackQueue } from "../feedbackQueue";
import { SessionManager } from "../../sessionManager";
import { SessionToken, Track, TrackRating } from "../../types";
import { ApiError } from "../../../utils/errors";
import {
    instantPolicy,
    makeTrack,
    MemoryCredentialStore,
    noSleep,
    silentLogger,
} from "../../../__tests__/helpers/fixtures";

function setup() {
    const session = new SessionManager({
        client: {
            authenticate: async () => ({ authToken: "test-token", userId: "user-1" }),
        },
        credentials: new MemoryCredentialStore({
            username: "listener",
            password: "test-password",
        }),
        retryPolicy: instantPolicy(1),
        logger: silentLogger,
    });
    const log: string[] = [];
    const rateTrack = jest.fn<Promise<void>, [SessionToken, Track, TrackRating]>(
        async (_session, track, rating) => {
            log.push(`${track.id}:${rating}`);
        }
    );
    const markTired = jest.fn<Promise<void>, [SessionToken, Track]>(async (_session, track) => {
        log.push(`${track.id}:tired`);
    });
    const onFailure = jest.fn();
    const queue = new FeedbackQueue({
        session,
        client: { rateTrack, markTired },
        retryPolicy: instantPolicy(3),
        logger: silentLogger,
        sleep: noSleep,
        onFailure,
    });
    return { queue, rateTrack, markTired, onFailure, log };
}

describe("FeedbackQueue", () => {
    it("delivers submissions in the order they were issued", async () => {
        const { queue, rateTrack, log } = setup();
        const track = makeTrack("a");

        queue.submitRating(track, "thumbs-up");
        queue.submitRating(track, "unrated");
        queue.submitTired(track);
        await queue.onIdle();

        expect(log).toEqual(["a:thumbs-up", "a:unrated", "a:tired"]);
        expect(rateTrack.mock.calls[0][0]).toEqual({
            authToken: "test-token",
            userId: "user-1",
        });
        expect(queue.pending).toBe(0);
    });

    it("retries retryable service failures", async () => {
        const { queue, rateTrack, onFailure } = setup();
        rateTrack.mockRejectedValueOnce(new ApiError("server-error", "503"));

        queue.submitRating(makeTrack("a"), "thumbs-down");
        await queue.onIdle();

        expect(rateTrack).toHaveBeenCalledTimes(2);
        expect(onFailure).not.toHaveBeenCalled();
    });

    it("gives up on rejected requests and reports the failure", async () => {
        const { queue, markTired, onFailure } = setup();
        const error = new ApiError("request-rejected", "400");
        markTired.mockRejectedValue(error);
        const track = makeTrack("a");

        queue.submitTired(track);
        await queue.onIdle();

        expect(markTired).toHaveBeenCalledTimes(1);
        expect(onFailure).toHaveBeenCalledWith(track, "tired", error);
    });

    it("does not let one failure block later submissions", async () => {
        const { queue, rateTrack, log } = setup();
        rateTrack.mockRejectedValueOnce(new ApiError("request-rejected", "400"));

        queue.submitRating(makeTrack("a"), "thumbs-up");
        queue.submitRating(makeTrack("b"), "thumbs-up");
        await queue.onIdle();

        expect(log).toEqual(["b:thumbs-up"]);
    });
});
