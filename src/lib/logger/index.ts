/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Ledger quantities are bigints, which JSON cannot carry; fields are rendered
 * as decimal strings before they reach pino.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe, plus "silent". */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Field normalization ─────────────────────────────────────────────

function normalizeValue(value: unknown, seen: WeakSet<object>): unknown {
	if (typeof value === "bigint") return value.toString();
	if (typeof value !== "object" || value === null || value instanceof Error) return value;
	if (seen.has(value)) return "[Circular]";
	seen.add(value);
	if (value instanceof Map) {
		return Object.fromEntries(
			[...value.entries()].map(([k, v]) => [String(k), normalizeValue(v, seen)]),
		);
	}
	if (Array.isArray(value)) return value.map((item) => normalizeValue(item, seen));
	const result: Record<string, unknown> = {};
	for (const [key, inner] of Object.entries(value)) {
		result[key] = normalizeValue(inner, seen);
	}
	return result;
}

/** Render bigints (and Maps of them) as plain JSON-safe values. */
export function normalizeFields(obj: Record<string, unknown>): Record<string, unknown> {
	const seen = new WeakSet<object>([obj]);
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = normalizeValue(value, seen);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type PinoLevel = "info" | "warn" | "error" | "debug";

function write(pinoLogger: pino.Logger, level: PinoLevel, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[level](String(msgOrObj ?? ""));
	} else if (typeof msgOrObj === "object") {
		pinoLogger[level](normalizeFields({ ...msgOrObj }), msg ?? "");
	} else {
		pinoLogger[level](String(msgOrObj));
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			write(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			write(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			write(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			write(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(normalizeFields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ asset: "ETH", amount: 10n }, "Deposit committed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const stream = {
			write(chunk: string): boolean {
				config.destination?.write(chunk);
				return true;
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(pinoLogger);
}

/** Logger that discards everything; the default for library consumers that pass none. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
