/**
 * Engine configuration.
 *
 * Defaults cover every field; the environment may override them at startup.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface EngineConfig {
	/** Maximum number of external-provider hops while resolving one price */
	readonly maxPriceHops: number;
	/** Root logger level */
	readonly logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	maxPriceHops: 8,
	logLevel: "info",
};

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const envSchema = z.object({
	LENDING_MAX_PRICE_HOPS: z
		.string()
		.regex(/^\d+$/, "must be a positive integer")
		.transform((raw) => Number.parseInt(raw, 10))
		.refine((n) => n > 0, "must be a positive integer")
		.optional(),
	LENDING_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

interface MutableEngineConfig {
	maxPriceHops?: number;
	logLevel?: LogLevel;
}

/**
 * Reads engine overrides from environment variables.
 * Supported: LENDING_MAX_PRICE_HOPS, LENDING_LOG_LEVEL.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(
	env: Readonly<Record<string, string | undefined>> = process.env,
): Partial<EngineConfig> {
	const parsed = validate(envSchema, {
		LENDING_MAX_PRICE_HOPS: nonEmpty(env["LENDING_MAX_PRICE_HOPS"]),
		LENDING_LOG_LEVEL: nonEmpty(env["LENDING_LOG_LEVEL"]),
	});
	if (!parsed.ok) {
		const detail = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid engine environment: ${detail}`, { cause: parsed.error });
	}

	const result: MutableEngineConfig = {};
	if (parsed.value.LENDING_MAX_PRICE_HOPS !== undefined) {
		result.maxPriceHops = parsed.value.LENDING_MAX_PRICE_HOPS;
	}
	if (parsed.value.LENDING_LOG_LEVEL !== undefined) {
		result.logLevel = parsed.value.LENDING_LOG_LEVEL;
	}
	return result;
}

/** Merge overrides onto the defaults, rejecting a non-positive hop limit. */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
	const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
	if (!Number.isInteger(config.maxPriceHops) || config.maxPriceHops <= 0) {
		throw new ConfigError(`maxPriceHops must be a positive integer, got ${config.maxPriceHops}`);
	}
	return config;
}

function nonEmpty(raw: string | undefined): string | undefined {
	return raw === undefined || raw.trim().length === 0 ? undefined : raw.trim();
}
