/**
 * Shared test fixtures: identities, assets and a pool wired to a FakeClock
 * and a silent logger.
 */

import { LendingPool } from "../ledger/lending-pool.js";
import { type LendingContext, createLendingContext } from "../ledger/context.js";
import { silentLogger } from "../lib/logger/index.js";
import type { MarketParams } from "../market/types.js";
import { fixedPrice } from "../oracle/types.js";
import { accountId, assetId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";

export const OWNER = accountId("owner");
export const ALICE = accountId("alice");
export const BOB = accountId("bob");
export const MALLORY = accountId("mallory");

export const ASSET_X = assetId("asset-x");
export const ASSET_Y = assetId("asset-y");
export const ASSET_Z = assetId("asset-z");
export const ASSET_W = assetId("asset-w");

export function marketParams(overrides: Partial<MarketParams> = {}): MarketParams {
	return {
		depositRate: 20n,
		borrowRate: 50n,
		ltv: 800n,
		liquidationThreshold: 850n,
		...overrides,
	};
}

export interface PoolFixture {
	readonly ctx: LendingContext;
	readonly pool: LendingPool;
	readonly clock: FakeClock;
}

export function makePool(startMs = 1_000): PoolFixture {
	const clock = new FakeClock(startMs);
	const ctx = createLendingContext({ owner: OWNER, clock, logger: silentLogger() });
	return { ctx, pool: LendingPool.create(ctx), clock };
}

/**
 * ASSET_X: ltv 800, price 100. ASSET_Y: ltv 800, price 100.
 * Alice has an open, empty position.
 */
export function makeScenarioPool(): PoolFixture {
	const fixture = makePool();
	const { pool } = fixture;
	unwrap(pool.setMarket(OWNER, ASSET_X, marketParams()));
	unwrap(pool.setMarket(OWNER, ASSET_Y, marketParams()));
	unwrap(pool.setPriceSource(OWNER, ASSET_X, fixedPrice(100n)));
	unwrap(pool.setPriceSource(OWNER, ASSET_Y, fixedPrice(100n)));
	pool.openPosition(ALICE);
	return fixture;
}
