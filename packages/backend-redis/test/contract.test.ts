/**
 * Behavior shared by every Redis backend, run against each of them
 */

import {describe, it, expect, beforeEach, afterEach, vi} from "vitest";
import type {BroadcastBackend} from "@broadcaster/backend";

vi.mock("redis", () => import("./fake-redis.js"));

import {server} from "./fake-redis.js";
import {RedisPubSubBackend} from "../src/pubsub.js";
import {RedisStreamBackend} from "../src/stream.js";

const backends: Array<[string, () => BroadcastBackend]> = [
	["RedisPubSubBackend", () => new RedisPubSubBackend()],
	["RedisStreamBackend", () => new RedisStreamBackend({blockMs: 20})],
];

describe.each(backends)("%s contract", (_name, create) => {
	let backend: BroadcastBackend;

	beforeEach(async () => {
		server.reset();
		backend = create();
		await backend.connect();
	});

	afterEach(async () => {
		await backend.disconnect();
	});

	it("round-trips payloads exactly", async () => {
		const payloads = ["", "plain", "ünïcødé ✓", '{"json": [1, 2]}', "line\nbreak"];
		await backend.subscribe("payloads");
		for (const payload of payloads) {
			await backend.publish("payloads", payload);
		}

		for (const payload of payloads) {
			const event = await backend.receive();
			expect(event.toJSON()).toEqual({channel: "payloads", message: payload});
		}
	});

	it("publishes to a channel nobody listens to", async () => {
		await expect(backend.publish("nobody", "hello")).resolves.toBeUndefined();
	});

	it("treats unsubscribe of an unknown channel as a no-op", async () => {
		await expect(backend.unsubscribe("unknown")).resolves.toBeUndefined();
	});

	it("rejects an aborted receive with the abort reason", async () => {
		await backend.subscribe("news");
		const controller = new AbortController();
		const reason = new Error("stop waiting");
		const pending = backend.receive({signal: controller.signal});
		controller.abort(reason);

		await expect(pending).rejects.toBe(reason);
	});
});
