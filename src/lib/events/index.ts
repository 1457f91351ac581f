import { EventEmitter } from "eventemitter3";

/**
 * Generic typed event map -- keys are event names, values are handler signatures.
 * Example: { deposited: (e: DepositedEvent) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/** Called when a listener throws; the remaining listeners still run. */
export type ListenerErrorCallback = (error: unknown, event: string) => void;

type AnyHandler = (...args: unknown[]) => void;

/**
 * Type-safe event emitter wrapping eventemitter3.
 *
 * Listeners are isolated from each other and from the emitter: a throwing
 * listener is reported to `onListenerError` instead of propagating into
 * the code that emitted.
 *
 * @example
 * ```ts
 * type Events = { deposited: (e: DepositedEvent) => void };
 * const emitter = new TypedEmitter<Events>((error) => log(error));
 * emitter.on("deposited", (e) => audit(e));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	/** Wrappers currently registered, per event and original handler */
	private readonly guarded = new Map<string, Map<AnyHandler, AnyHandler[]>>();
	private readonly onListenerError: ListenerErrorCallback | null;

	constructor(onListenerError?: ListenerErrorCallback) {
		this.onListenerError = onListenerError ?? null;
	}

	/** Registers an event handler. */
	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, this.guard(event, handler, false));
		return this;
	}

	/**
	 * Removes a previously registered event handler. A handler registered
	 * several times for the event loses its most recent registration.
	 */
	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		const wrapped = this.forget(event, handler);
		if (wrapped) {
			this.ee.off(event, wrapped);
		}
		return this;
	}

	/** Registers a handler that is removed after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, this.guard(event, handler, true));
		return this;
	}

	/**
	 * Emits an event, invoking all registered handlers in registration order.
	 * @returns whether any listener was registered
	 */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Removes all listeners for one event, or for every event when none is given. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
			this.guarded.delete(event);
		} else {
			this.ee.removeAllListeners();
			this.guarded.clear();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	private guard(event: string, handler: AnyHandler, once: boolean): AnyHandler {
		const wrapped: AnyHandler = (...args) => {
			if (once) this.forget(event, handler, wrapped);
			try {
				handler(...args);
			} catch (error: unknown) {
				if (this.onListenerError === null) throw error;
				this.onListenerError(error, event);
			}
		};
		const byHandler = this.guarded.get(event) ?? new Map<AnyHandler, AnyHandler[]>();
		byHandler.set(handler, [...(byHandler.get(handler) ?? []), wrapped]);
		this.guarded.set(event, byHandler);
		return wrapped;
	}

	/** Drops one wrapper of `handler` for `event` (the given one, or the latest) and returns it. */
	private forget(event: string, handler: AnyHandler, wrapped?: AnyHandler): AnyHandler | undefined {
		const byHandler = this.guarded.get(event);
		const wrappers = byHandler?.get(handler);
		if (!byHandler || !wrappers) return undefined;

		const index = wrapped === undefined ? wrappers.length - 1 : wrappers.indexOf(wrapped);
		const removed = wrappers[index];
		if (index < 0 || removed === undefined) return undefined;

		const rest = wrappers.filter((_, i) => i !== index);
		if (rest.length > 0) {
			byHandler.set(handler, rest);
		} else {
			byHandler.delete(handler);
			if (byHandler.size === 0) this.guarded.delete(event);
		}
		return removed;
	}

	/** Number of handler registrations tracked for removal; zero once all are gone. */
	get trackedHandlers(): number {
		let count = 0;
		for (const byHandler of this.guarded.values()) {
			for (const wrappers of byHandler.values()) count += wrappers.length;
		}
		return count;
	}
}
