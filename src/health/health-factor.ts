/**
 * Health factor: a single solvency ratio over a multi-asset position.
 *
 * Collateral is LTV-weighted per asset, debt counts at full notional:
 *
 *   collateral = Σ deposits  amount * price * ltv / 1000   (truncated per asset)
 *   debt       = Σ borrows   amount * price
 *   hf         = collateral * 1000 / debt                  (permille)
 *
 * A debt-free position has no ratio to compute and is reported as
 * MAX_HEALTH_FACTOR. Only sums are taken over the maps, so iteration order
 * cannot change the result; every product and sum is uint256-checked.
 */

import type { MarketReader } from "../market/market-registry.js";
import type { PriceProvider } from "../oracle/types.js";
import type { UserPosition } from "../position/types.js";
import type { LendingError, OverflowError } from "../shared/errors.js";
import type { AssetId } from "../shared/identifiers.js";
import { type Result, flatMap, ok } from "../shared/result.js";
import { MAX_UINT256, PERMILLE, checkedAdd, checkedMul, checkedMulDiv } from "../shared/uint.js";

/** Reported for positions without debt. */
export const MAX_HEALTH_FACTOR = MAX_UINT256;

/** Lowest health factor a borrow may leave behind: exactly 100% weighted collateralization. */
export const MIN_HEALTH_FACTOR = PERMILLE;

/** Collaborators a valuation reads from. */
export interface ValuationDeps {
	readonly oracle: PriceProvider;
	readonly markets: MarketReader;
}

export interface AccountValuation {
	/** Σ amount * price over deposits, without LTV weighting */
	readonly depositValue: bigint;
	/** Σ amount * price * ltv / 1000 over deposits */
	readonly weightedCollateralValue: bigint;
	/** Σ amount * price over borrows */
	readonly debtValue: bigint;
}

/**
 * Values both sides of a position at current prices.
 * Each asset is priced once, so an asset held on both sides is valued consistently.
 */
export async function valueAccount(
	position: UserPosition,
	deps: ValuationDeps,
): Promise<Result<AccountValuation, LendingError>> {
	const prices = new Map<AssetId, bigint>();
	const priceOf = async (asset: AssetId): Promise<Result<bigint, LendingError>> => {
		const cached = prices.get(asset);
		if (cached !== undefined) return ok(cached);
		const priced = await deps.oracle.getPrice(asset);
		if (priced.ok) prices.set(asset, priced.value);
		return priced;
	};

	let depositValue = 0n;
	let weightedCollateralValue = 0n;
	for (const [asset, amount] of position.deposits) {
		const price = await priceOf(asset);
		if (!price.ok) return price;
		const market = deps.markets.getMarket(asset);
		if (!market.ok) return market;

		const raw = checkedMul(amount, price.value);
		if (!raw.ok) return raw;
		const weighted = checkedMulDiv(raw.value, market.value.ltv, PERMILLE);
		if (!weighted.ok) return weighted;

		const nextRaw = checkedAdd(depositValue, raw.value);
		if (!nextRaw.ok) return nextRaw;
		const nextWeighted = checkedAdd(weightedCollateralValue, weighted.value);
		if (!nextWeighted.ok) return nextWeighted;
		depositValue = nextRaw.value;
		weightedCollateralValue = nextWeighted.value;
	}

	let debtValue = 0n;
	for (const [asset, amount] of position.borrows) {
		const price = await priceOf(asset);
		if (!price.ok) return price;

		const value = checkedMul(amount, price.value);
		if (!value.ok) return value;
		const next = checkedAdd(debtValue, value.value);
		if (!next.ok) return next;
		debtValue = next.value;
	}

	return ok({ depositValue, weightedCollateralValue, debtValue });
}

/** Permille ratio of weighted collateral to debt; MAX_HEALTH_FACTOR when debt is zero. */
export function healthFactorFromValues(
	weightedCollateralValue: bigint,
	debtValue: bigint,
): Result<bigint, OverflowError> {
	if (debtValue === 0n) return ok(MAX_HEALTH_FACTOR);
	return checkedMulDiv(weightedCollateralValue, PERMILLE, debtValue);
}

export async function calculateHealthFactor(
	position: UserPosition,
	deps: ValuationDeps,
): Promise<Result<bigint, LendingError>> {
	const valuation = await valueAccount(position, deps);
	return flatMap(valuation, (v): Result<bigint, LendingError> =>
		healthFactorFromValues(v.weightedCollateralValue, v.debtValue),
	);
}

export function isHealthy(healthFactor: bigint): boolean {
	return healthFactor >= MIN_HEALTH_FACTOR;
}
