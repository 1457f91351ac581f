// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Ambient libraries ────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export {
	ValidationError,
	type ValidationIssue,
	isValidationError,
	validate,
} from "./lib/validation/index.js";
export { TypedEmitter, type EventMap, type ListenerErrorCallback } from "./lib/events/index.js";

// ── Price Oracle ─────────────────────────────────────────────────────
export {
	PriceOracle,
	type PriceOracleConfig,
	type PriceProvider,
	type PriceSource,
	type PriceSourceKind,
	type PriceTrail,
	externalModule,
	fixedPrice,
} from "./oracle/index.js";

// ── Market Registry ──────────────────────────────────────────────────
export {
	MarketRegistry,
	type MarketReader,
	type MarketRegistryConfig,
	type MarketInfo,
	type MarketParams,
	validateMarketParams,
} from "./market/index.js";

// ── User Positions ───────────────────────────────────────────────────
export {
	PositionStore,
	type PositionStoreConfig,
	type PositionSide,
	type UserPosition,
} from "./position/index.js";

// ── Health Factor ────────────────────────────────────────────────────
export {
	type AccountValuation,
	MAX_HEALTH_FACTOR,
	MIN_HEALTH_FACTOR,
	type ValuationDeps,
	calculateHealthFactor,
	healthFactorFromValues,
	isHealthy,
	valueAccount,
} from "./health/index.js";

// ── Ledger ───────────────────────────────────────────────────────────
export {
	type BorrowReceipt,
	type DepositReceipt,
	type GlobalConfig,
	KeyedMutex,
	type LendingContext,
	type LendingContextOptions,
	LendingPool,
	type PositionSummary,
	createLendingContext,
} from "./ledger/index.js";

// ── Events ───────────────────────────────────────────────────────────
export type {
	BorrowRejectedEvent,
	BorrowedEvent,
	DepositedEvent,
	LedgerEventType,
	LedgerEvents,
	MarketUpdatedEvent,
	PositionOpenedEvent,
	PriceSourceSetEvent,
} from "./events/index.js";
