import {
    BackoffPolicy,
    computeBackoffDelay,
    retryWithBackoff,
    sleep,
} from "../backoff";

const policy: BackoffPolicy = {
    maxAttempts: 4,
    baseDelayMs: 100,
    maxDelayMs: 1000,
    jitterMs: 50,
};

describe("computeBackoffDelay", () => {
    it("doubles per attempt and adds jitter", () => {
        const random = () => 0.5;

        expect(computeBackoffDelay(policy, 1, random)).toBe(125);
        expect(computeBackoffDelay(policy, 2, random)).toBe(225);
        expect(computeBackoffDelay(policy, 3, random)).toBe(425);
    });

    it("caps the delay", () => {
        expect(computeBackoffDelay(policy, 10, () => 0)).toBe(1000);
    });

    it("prefers a server retry-after hint, still capped", () => {
        expect(computeBackoffDelay(policy, 1, () => 0, 300)).toBe(300);
        expect(computeBackoffDelay(policy, 1, () => 0, 5000)).toBe(1000);
    });
});

describe("retryWithBackoff", () => {
    it("returns the first successful result", async () => {
        const operation = jest
            .fn<Promise<string>, [number]>()
            .mockRejectedValueOnce(new Error("flaky"))
            .mockResolvedValueOnce("ok");
        const wait = jest.fn(() => Promise.resolve());

        const result = await retryWithBackoff(operation, {
            policy,
            shouldRetry: () => true,
            sleep: wait,
            random: () => 0,
        });

        expect(result).toBe("ok");
        expect(operation).toHaveBeenCalledTimes(2);
        expect(operation).toHaveBeenNthCalledWith(2, 2);
        expect(wait).toHaveBeenCalledWith(100, undefined);
    });

    it("stops after maxAttempts and rethrows the last error", async () => {
        const failure = new Error("down");
        const operation = jest.fn(() => Promise.reject(failure));
        const onRetry = jest.fn();

        await expect(
            retryWithBackoff(operation, {
                policy,
                shouldRetry: () => true,
                onRetry,
                sleep: () => Promise.resolve(),
                random: () => 0,
            })
        ).rejects.toBe(failure);

        expect(operation).toHaveBeenCalledTimes(4);
        expect(onRetry.mock.calls.map((call) => call[2])).toEqual([100, 200, 400]);
    });

    it("does not retry errors the caller classifies as permanent", async () => {
        const operation = jest.fn(() => Promise.reject(new Error("bad request")));

        await expect(
            retryWithBackoff(operation, {
                policy,
                shouldRetry: () => false,
                sleep: () => Promise.resolve(),
            })
        ).rejects.toThrow("bad request");
        expect(operation).toHaveBeenCalledTimes(1);
    });

    it("uses the retry-after hint for the wait", async () => {
        const wait = jest.fn(() => Promise.resolve());
        const operation = jest
            .fn<Promise<number>, [number]>()
            .mockRejectedValueOnce(new Error("429"))
            .mockResolvedValueOnce(1);

        await retryWithBackoff(operation, {
            policy,
            shouldRetry: () => true,
            retryAfterMs: () => 750,
            sleep: wait,
        });

        expect(wait).toHaveBeenCalledWith(750, undefined);
    });

    it("rejects with the abort reason once the signal fires", async () => {
        const controller = new AbortController();
        const reason = new Error("station changed");
        const operation = jest.fn(() => {
            controller.abort(reason);
            return Promise.reject(new Error("interrupted"));
        });

        await expect(
            retryWithBackoff(operation, {
                policy,
                shouldRetry: () => true,
                signal: controller.signal,
                sleep: () => Promise.resolve(),
            })
        ).rejects.toBe(reason);
        expect(operation).toHaveBeenCalledTimes(1);
    });
});

describe("sleep", () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    it("resolves after the delay", async () => {
        jest.useFakeTimers();
        const done = jest.fn();

        const pending = sleep(500).then(done);
        await jest.advanceTimersByTimeAsync(499);
        expect(done).not.toHaveBeenCalled();

        await jest.advanceTimersByTimeAsync(1);
        await pending;
        expect(done).toHaveBeenCalled();
    });

    it("rejects early when aborted", async () => {
        const controller = new AbortController();
        const pending = sleep(60000, controller.signal);

        controller.abort(new Error("cancelled"));

        await expect(pending).rejects.toThrow("cancelled");
    });
});
