import { AsyncQueue } from "../asyncQueue";

interface Message {
    id: number;
}

describe("AsyncQueue", () => {
    it("delivers buffered items in order", async () => {
        const queue = new AsyncQueue<Message>();
        queue.push({ id: 1 });
        queue.push({ id: 2 });

        expect(queue.size).toBe(2);
        expect(await queue.next()).toEqual({ value: { id: 1 }, done: false });
        expect(await queue.next()).toEqual({ value: { id: 2 }, done: false });
    });

    it("wakes a waiting consumer when an item arrives", async () => {
        const queue = new AsyncQueue<Message>();
        const pending = queue.next();

        queue.push({ id: 7 });

        expect(await pending).toEqual({ value: { id: 7 }, done: false });
        expect(queue.size).toBe(0);
    });

    it("drains buffered items before ending after close", async () => {
        const queue = new AsyncQueue<Message>();
        queue.push({ id: 1 });
        queue.push({ id: 2 });
        queue.close();

        const seen: number[] = [];
        for await (const message of queue) {
            seen.push(message.id);
        }

        expect(seen).toEqual([1, 2]);
    });

    it("ends waiting consumers and refuses pushes once closed", async () => {
        const queue = new AsyncQueue<Message>();
        const pending = queue.next();

        queue.close();

        expect(await pending).toEqual({ value: undefined, done: true });
        expect(queue.push({ id: 3 })).toBe(false);
        expect(queue.isClosed).toBe(true);
    });
});
