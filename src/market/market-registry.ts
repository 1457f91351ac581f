/**
 * MarketRegistry: per-asset aggregate ledger: rates, risk weights and the
 * running deposit/debt totals.
 *
 * Mutations come in two shapes. `recordDeposit`/`recordDebt` preview and
 * commit in one step. The ledger instead calls `previewDeposit`/`previewDebt`
 * and commits the result with `apply` in the same synchronous step as the
 * matching position write, so the two stores never disagree.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type LendingError, NotFoundError, UnauthorizedError } from "../shared/errors.js";
import type { AccountId, AssetId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock, monotonicTimestamp } from "../shared/time.js";
import { checkedAdd } from "../shared/uint.js";
import { validateMarketParams } from "./market-params.js";
import type { MarketInfo, MarketParams } from "./types.js";

export interface MarketRegistryConfig {
	/** Authority allowed to create or update markets */
	readonly owner: AccountId;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

/** Read side of the registry, as needed by valuation. */
export interface MarketReader {
	getMarket(asset: AssetId): Result<MarketInfo, NotFoundError>;
}

export class MarketRegistry implements MarketReader {
	private readonly owner: AccountId;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly markets = new Map<AssetId, MarketInfo>();

	private constructor(config: MarketRegistryConfig) {
		this.owner = config.owner;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? silentLogger()).child({ component: "market-registry" });
	}

	static create(config: MarketRegistryConfig): MarketRegistry {
		return new MarketRegistry(config);
	}

	// ── Market definitions ─────────────────────────────────────

	/**
	 * Creates or updates the parameters of a market.
	 * A new market starts with zero totals; an existing one keeps its totals.
	 * @returns the market as stored
	 */
	setMarket(caller: AccountId, asset: AssetId, params: MarketParams): Result<MarketInfo, LendingError> {
		if (caller !== this.owner) {
			return err(new UnauthorizedError("Only the registry owner may set markets", { caller, asset }));
		}
		const validated = validateMarketParams(params);
		if (!validated.ok) return validated;

		const existing = this.markets.get(asset);
		const info: MarketInfo = {
			...validated.value,
			totalDeposits: existing?.totalDeposits ?? 0n,
			totalDebt: existing?.totalDebt ?? 0n,
			lastTimeUpdated: monotonicTimestamp(existing?.lastTimeUpdated ?? 0, this.clock),
		};
		this.markets.set(asset, info);
		this.logger.info(
			{ asset, ltv: info.ltv, liquidationThreshold: info.liquidationThreshold, created: !existing },
			"Market set",
		);
		return ok(info);
	}

	getMarket(asset: AssetId): Result<MarketInfo, NotFoundError> {
		const info = this.markets.get(asset);
		if (!info) {
			return err(new NotFoundError("market", `No market for ${asset}`, { asset }));
		}
		return ok(info);
	}

	hasMarket(asset: AssetId): boolean {
		return this.markets.has(asset);
	}

	listMarkets(): ReadonlyArray<readonly [AssetId, MarketInfo]> {
		return [...this.markets.entries()];
	}

	// ── Totals ─────────────────────────────────────────────────

	/** Market state after adding `amount` to total deposits. Does not mutate. */
	previewDeposit(asset: AssetId, amount: bigint): Result<MarketInfo, LendingError> {
		return this.preview(asset, "totalDeposits", amount);
	}

	/** Market state after adding `amount` to total debt. Does not mutate. */
	previewDebt(asset: AssetId, amount: bigint): Result<MarketInfo, LendingError> {
		return this.preview(asset, "totalDebt", amount);
	}

	/** Commit a previewed market state. */
	apply(asset: AssetId, next: MarketInfo): void {
		this.markets.set(asset, next);
	}

	recordDeposit(asset: AssetId, amount: bigint): Result<MarketInfo, LendingError> {
		const next = this.previewDeposit(asset, amount);
		if (next.ok) this.apply(asset, next.value);
		return next;
	}

	recordDebt(asset: AssetId, amount: bigint): Result<MarketInfo, LendingError> {
		const next = this.previewDebt(asset, amount);
		if (next.ok) this.apply(asset, next.value);
		return next;
	}

	private preview(
		asset: AssetId,
		field: "totalDeposits" | "totalDebt",
		amount: bigint,
	): Result<MarketInfo, LendingError> {
		const current = this.getMarket(asset);
		if (!current.ok) return current;

		const total = checkedAdd(current.value[field], amount);
		if (!total.ok) return total;

		const lastTimeUpdated = monotonicTimestamp(current.value.lastTimeUpdated, this.clock);
		const next: MarketInfo =
			field === "totalDeposits"
				? { ...current.value, totalDeposits: total.value, lastTimeUpdated }
				: { ...current.value, totalDebt: total.value, lastTimeUpdated };
		return ok(next);
	}
}
