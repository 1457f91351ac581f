/**
 * LendingContext: the explicit state handle threaded through every ledger
 * operation. Each call to createLendingContext yields isolated registries.
 */

import { type Logger, createLogger } from "../lib/logger/index.js";
import { MarketRegistry } from "../market/market-registry.js";
import { PriceOracle } from "../oracle/price-oracle.js";
import { PositionStore } from "../position/position-store.js";
import { type EngineConfig, resolveEngineConfig } from "../shared/config.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { KeyedMutex } from "./keyed-mutex.js";

/** Set once when the context is built; read-only afterwards. */
export interface GlobalConfig {
	/** Authority over market definitions and price sources */
	readonly owner: AccountId;
	/** Active price oracle */
	readonly oracle: PriceOracle;
}

export interface LendingContext {
	readonly config: GlobalConfig;
	readonly engine: EngineConfig;
	readonly markets: MarketRegistry;
	readonly positions: PositionStore;
	/** Per-account exclusion shared by every pool built on this context */
	readonly locks: KeyedMutex<AccountId>;
	readonly clock: Clock;
	readonly logger: Logger;
}

export interface LendingContextOptions {
	readonly owner: AccountId;
	readonly engine?: Partial<EngineConfig>;
	readonly clock?: Clock;
	/** Root logger; defaults to a pino logger at `engine.logLevel` */
	readonly logger?: Logger;
}

/** @throws ConfigError if the engine overrides are invalid */
export function createLendingContext(options: LendingContextOptions): LendingContext {
	const engine = resolveEngineConfig(options.engine);
	const clock = options.clock ?? SystemClock;
	const logger = options.logger ?? createLogger({ level: engine.logLevel });

	const oracle = PriceOracle.create({ owner: options.owner, maxHops: engine.maxPriceHops, logger });
	const config: GlobalConfig = Object.freeze({ owner: options.owner, oracle });

	return {
		config,
		engine,
		markets: MarketRegistry.create({ owner: options.owner, clock, logger }),
		positions: PositionStore.create({ logger }),
		locks: new KeyedMutex<AccountId>(),
		clock,
		logger,
	};
}
