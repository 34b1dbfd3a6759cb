import {describe, it, expect} from "vitest";
import {AsyncQueue} from "../src/queue.js";

describe("AsyncQueue", () => {
	it("hands out buffered items in FIFO order", async () => {
		const queue = new AsyncQueue<number>();
		queue.push(1);
		queue.push(2);
		queue.push(3);
		expect(queue.size).toBe(3);

		expect(await queue.shift()).toBe(1);
		expect(await queue.shift()).toBe(2);
		expect(await queue.shift()).toBe(3);
		expect(queue.size).toBe(0);
	});

	it("suspends consumers until an item is pushed", async () => {
		const queue = new AsyncQueue<string>();
		const first = queue.shift();
		const second = queue.shift();

		queue.push("a");
		queue.push("b");

		expect(await first).toBe("a");
		expect(await second).toBe("b");
		expect(queue.size).toBe(0);
	});

	it("passes the item to the next consumer when a wait is aborted", async () => {
		const queue = new AsyncQueue<string>();
		const controller = new AbortController();
		const abandoned = queue.shift(controller.signal);
		const waiting = queue.shift();

		controller.abort(new Error("gave up"));
		await expect(abandoned).rejects.toThrow("gave up");

		queue.push("item");
		expect(await waiting).toBe("item");
	});

	it("keeps the item buffered when the only wait is aborted", async () => {
		const queue = new AsyncQueue<string>();
		const controller = new AbortController();
		const abandoned = queue.shift(controller.signal);
		controller.abort(new Error("gave up"));
		await expect(abandoned).rejects.toThrow("gave up");

		queue.push("item");
		expect(queue.size).toBe(1);
		expect(await queue.shift()).toBe("item");
	});

	it("rejects waiters on fail but still drains buffered items", async () => {
		const queue = new AsyncQueue<string>();
		const waiting = queue.shift();
		const reason = new Error("feed ended");

		queue.fail(reason);
		await expect(waiting).rejects.toBe(reason);
		expect(queue.failed).toBe(true);

		const buffered = new AsyncQueue<string>();
		buffered.push("left");
		buffered.fail(reason);
		expect(await buffered.shift()).toBe("left");
		await expect(buffered.shift()).rejects.toBe(reason);
	});

	it("ignores pushes after failing", async () => {
		const queue = new AsyncQueue<string>();
		queue.fail(new Error("done"));
		queue.push("late");
		expect(queue.size).toBe(0);
	});

	it("drops buffered items on close", async () => {
		const queue = new AsyncQueue<string>();
		queue.push("unread");
		const reason = new Error("closed");

		queue.close(reason);
		expect(queue.size).toBe(0);
		await expect(queue.shift()).rejects.toBe(reason);
	});

	it("iterates until the queue fails", async () => {
		const queue = new AsyncQueue<number>();
		queue.push(1);
		queue.push(2);
		queue.fail(new Error("end of feed"));

		const seen: Array<number> = [];
		await expect(
			(async () => {
				for await (const item of queue.iterate()) {
					seen.push(item);
				}
			})(),
		).rejects.toThrow("end of feed");
		expect(seen).toEqual([1, 2]);
	});
});
