/**
 * LendingError hierarchy: structured error classification.
 *
 * Every failure of a ledger operation is one of these. The category separates
 * rejected requests (`non_retryable`) from faults in configuration or in a
 * collaborator (`fatal`); the engine itself never retries.
 */

/** Error severity categories. */
export const ErrorCategory = {
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

interface LendingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & LendingErrorOptions;

/** Base error class for all ledger operations. */
export class LendingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "LendingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Kind of resource a NotFoundError refers to. */
export type MissingResource = "market" | "position" | "price_source" | "price_provider";

/** A referenced market, position, price source or provider does not exist. */
export class NotFoundError extends LendingError {
	readonly resource: MissingResource;

	constructor(resource: MissingResource, message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "NOT_FOUND", ErrorCategory.NonRetryable, { resource, ...rest });
		this.name = "NotFoundError";
		this.resource = resource;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Caller lacks the rights to mutate registry-level state. */
export class UnauthorizedError extends LendingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "UNAUTHORIZED", ErrorCategory.NonRetryable, rest);
		this.name = "UnauthorizedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A borrow would leave the account below a health factor of 1000 permille. */
export class InsufficientCollateralError extends LendingError {
	readonly healthFactor: bigint;

	constructor(message: string, healthFactor: bigint, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"INSUFFICIENT_COLLATERAL",
			ErrorCategory.NonRetryable,
			rest,
			"deposit more collateral or borrow less",
		);
		this.name = "InsufficientCollateralError";
		this.healthFactor = healthFactor;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			healthFactor: this.healthFactor.toString(),
		};
	}
}

/** An accumulation or multiplication left the uint256 range. */
export class OverflowError extends LendingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "OVERFLOW", ErrorCategory.NonRetryable, rest);
		this.name = "OverflowError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** An amount or price is zero where it must be positive, or outside uint256. */
export class InvalidAmountError extends LendingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_AMOUNT", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidAmountError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** An external price-source chain loops back on itself or nests too deep. */
export class PriceSourceCycleError extends LendingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "PRICE_SOURCE_CYCLE", ErrorCategory.NonRetryable, rest);
		this.name = "PriceSourceCycleError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends LendingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Unexpected failure, typically thrown by a collaborator. */
export class SystemError extends LendingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Pass LendingErrors through; wrap anything else thrown at a boundary as
 * SystemError, keeping the thrown value as `cause`.
 */
export function classifyError(error: unknown, message?: string, context: Record<string, unknown> = {}): LendingError {
	if (error instanceof LendingError) return error;
	const fallback = error instanceof Error ? error.message : String(error);
	return new SystemError(message ?? fallback, { ...context, cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isNotFoundError(e: unknown): e is NotFoundError {
	return e instanceof NotFoundError;
}

export function isUnauthorizedError(e: unknown): e is UnauthorizedError {
	return e instanceof UnauthorizedError;
}

export function isInsufficientCollateral(e: unknown): e is InsufficientCollateralError {
	return e instanceof InsufficientCollateralError;
}

export function isOverflowError(e: unknown): e is OverflowError {
	return e instanceof OverflowError;
}

export function isInvalidAmountError(e: unknown): e is InvalidAmountError {
	return e instanceof InvalidAmountError;
}

export function isPriceSourceCycleError(e: unknown): e is PriceSourceCycleError {
	return e instanceof PriceSourceCycleError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
