/**
 * Time utilities: injectable clock for deterministic testing.
 *
 * Ledger code reads Clock.now() instead of Date.now() so tests can pin and
 * move time without monkey-patching globals.
 */

/** Injectable time source, epoch milliseconds. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/**
 * Next value of a timestamp that must never decrease.
 * A clock that steps backwards leaves the previous value in place.
 */
export function monotonicTimestamp(previousMs: number, clock: Clock): number {
	return Math.max(previousMs, clock.now());
}
