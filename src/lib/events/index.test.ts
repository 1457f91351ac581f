import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type TestEvents = {
	deposited: (event: { amount: bigint }) => void;
	ping: () => void;
};

describe("TypedEmitter", () => {
	it("emit() triggers registered on() handler with correct args", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("deposited", handler);
		emitter.emit("deposited", { amount: 10n });

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith({ amount: 10n });
	});

	it("off() removes a listener", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("deposited", handler);
		emitter.off("deposited", handler);
		emitter.emit("deposited", { amount: 1n });

		expect(handler).not.toHaveBeenCalled();
		expect(emitter.listenerCount("deposited")).toBe(0);
	});

	it("once() fires handler exactly once", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.once("ping", handler);
		emitter.emit("ping");
		emitter.emit("ping");

		expect(handler).toHaveBeenCalledTimes(1);
	});

	it("emit() reports whether any listener was registered", () => {
		const emitter = new TypedEmitter<TestEvents>();
		expect(emitter.emit("ping")).toBe(false);
		emitter.on("ping", () => {});
		expect(emitter.emit("ping")).toBe(true);
	});

	it("a throwing listener is reported and later listeners still run", () => {
		const onError = vi.fn();
		const emitter = new TypedEmitter<TestEvents>(onError);
		const later = vi.fn();
		const failure = new Error("listener broke");

		emitter.on("deposited", () => {
			throw failure;
		});
		emitter.on("deposited", later);

		expect(() => emitter.emit("deposited", { amount: 5n })).not.toThrow();
		expect(onError).toHaveBeenCalledWith(failure, "deposited");
		expect(later).toHaveBeenCalledTimes(1);
	});

	it("without an error callback a throwing listener propagates", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("ping", () => {
			throw new Error("unhandled");
		});

		expect(() => emitter.emit("ping")).toThrow("unhandled");
	});

	it("removeAllListeners() clears every event", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("ping", vi.fn());
		emitter.on("deposited", vi.fn());

		emitter.removeAllListeners();

		expect(emitter.listenerCount("ping")).toBe(0);
		expect(emitter.listenerCount("deposited")).toBe(0);
	});

	describe("handlers registered more than once", () => {
		it("off() on one event leaves the same handler on another event", () => {
			const emitter = new TypedEmitter<TestEvents>();
			const handler = vi.fn();

			emitter.on("deposited", handler);
			emitter.on("ping", handler);
			emitter.off("deposited", handler);
			emitter.emit("deposited", { amount: 1n });
			emitter.emit("ping");

			expect(emitter.listenerCount("deposited")).toBe(0);
			expect(emitter.listenerCount("ping")).toBe(1);
			expect(handler).toHaveBeenCalledTimes(1);
			expect(handler).toHaveBeenCalledWith();
		});

		it("off() removes one registration at a time on the same event", () => {
			const emitter = new TypedEmitter<TestEvents>();
			const handler = vi.fn();

			emitter.on("ping", handler);
			emitter.on("ping", handler);
			emitter.off("ping", handler);
			emitter.emit("ping");

			expect(handler).toHaveBeenCalledTimes(1);

			emitter.off("ping", handler);
			emitter.emit("ping");

			expect(handler).toHaveBeenCalledTimes(1);
			expect(emitter.listenerCount("ping")).toBe(0);
			expect(emitter.trackedHandlers).toBe(0);
		});

		it("a fired once() registration no longer shadows an on() registration", () => {
			const emitter = new TypedEmitter<TestEvents>();
			const handler = vi.fn();

			emitter.on("ping", handler);
			emitter.once("ping", handler);
			emitter.emit("ping");
			emitter.off("ping", handler);
			emitter.emit("ping");

			expect(handler).toHaveBeenCalledTimes(2);
			expect(emitter.listenerCount("ping")).toBe(0);
			expect(emitter.trackedHandlers).toBe(0);
		});

		it("off() before a once() handler fires removes it", () => {
			const emitter = new TypedEmitter<TestEvents>();
			const handler = vi.fn();

			emitter.once("ping", handler);
			emitter.off("ping", handler);
			emitter.emit("ping");

			expect(handler).not.toHaveBeenCalled();
			expect(emitter.trackedHandlers).toBe(0);
		});
	});

	it("removeAllListeners(event) forgets only that event's handlers", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();
		emitter.on("ping", handler);
		emitter.on("deposited", handler);

		emitter.removeAllListeners("ping");

		expect(emitter.listenerCount("ping")).toBe(0);
		expect(emitter.trackedHandlers).toBe(1);
		emitter.off("deposited", handler);
		expect(emitter.listenerCount("deposited")).toBe(0);
		expect(emitter.trackedHandlers).toBe(0);
	});
});
