import {describe, it, expect} from "vitest";
import {BroadcastEvent} from "../src/event.js";

describe("BroadcastEvent", () => {
	it("carries channel and message", () => {
		const event = new BroadcastEvent("news", "hello");
		expect(event.channel).toBe("news");
		expect(event.message).toBe("hello");
	});

	it("rejects an empty channel", () => {
		expect(() => new BroadcastEvent("", "hello")).toThrow(TypeError);
	});

	it("accepts an empty message", () => {
		expect(new BroadcastEvent("news", "").message).toBe("");
	});

	it("is frozen", () => {
		const event = new BroadcastEvent("news", "hello");
		expect(Object.isFrozen(event)).toBe(true);
		expect(Reflect.set(event, "message", "changed")).toBe(false);
		expect(event.message).toBe("hello");
	});

	it("compares by value", () => {
		const event = new BroadcastEvent("news", "hello");
		expect(event.equals(new BroadcastEvent("news", "hello"))).toBe(true);
		expect(event.equals(new BroadcastEvent("news", "bye"))).toBe(false);
		expect(event.equals(new BroadcastEvent("sports", "hello"))).toBe(false);
	});

	it("serializes to a plain object", () => {
		const event = new BroadcastEvent("news", "hello");
		expect(JSON.stringify(event)).toBe('{"channel":"news","message":"hello"}');
	});
});
