/**
 * LendingPool: deposit and borrow under the solvency invariant.
 *
 * Every deposit and borrow runs in an exclusive section for its account, taken
 * from the context, so a borrow's health check and its commit cannot
 * interleave with another operation on the same account, whichever pool on
 * that context runs it. Writes to the market and to the position are
 * staged as previews and applied together in one synchronous step after the
 * last await: either both become visible or neither does.
 */

import type { LedgerEvents } from "../events/ledger-events.js";
import {
	type AccountValuation,
	type ValuationDeps,
	calculateHealthFactor,
	healthFactorFromValues,
	isHealthy,
	valueAccount,
} from "../health/health-factor.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { MarketInfo, MarketParams } from "../market/types.js";
import type { PriceSource } from "../oracle/types.js";
import type { UserPosition } from "../position/types.js";
import {
	InsufficientCollateralError,
	InvalidAmountError,
	type LendingError,
} from "../shared/errors.js";
import type { AccountId, AssetId } from "../shared/identifiers.js";
import { type Result, err, map, ok } from "../shared/result.js";
import { isUint256 } from "../shared/uint.js";
import type { LendingContext } from "./context.js";

export interface DepositReceipt {
	readonly account: AccountId;
	readonly asset: AssetId;
	readonly amount: bigint;
	readonly position: UserPosition;
	readonly market: MarketInfo;
}

export interface BorrowReceipt extends DepositReceipt {
	/** Health factor of the position including this borrow */
	readonly healthFactor: bigint;
}

/** Read-only aggregate view of an account. */
export interface PositionSummary {
	/** Σ amount * price over deposits, unweighted */
	readonly totalDepositValue: bigint;
	/** Σ amount * price over borrows */
	readonly totalDebtValue: bigint;
	/** LTV-weighted health factor, permille */
	readonly healthFactor: bigint;
}

export class LendingPool {
	readonly events: TypedEmitter<LedgerEvents>;
	private readonly ctx: LendingContext;
	private readonly logger: Logger;

	private constructor(ctx: LendingContext) {
		this.ctx = ctx;
		this.logger = ctx.logger.child({ component: "lending-pool" });
		this.events = new TypedEmitter<LedgerEvents>((error, event) => {
			this.logger.error(
				{ event, error: error instanceof Error ? error.message : String(error) },
				"Ledger event listener failed",
			);
		});
	}

	static create(ctx: LendingContext): LendingPool {
		return new LendingPool(ctx);
	}

	// ── Administration ─────────────────────────────────────────

	/** Opens the caller's position; a second call returns the existing one. */
	openPosition(caller: AccountId): UserPosition {
		const existed = this.ctx.positions.hasPosition(caller);
		const position = this.ctx.positions.openPosition(caller);
		if (!existed) {
			this.events.emit("positionOpened", { account: caller, timestamp: this.ctx.clock.now() });
		}
		return position;
	}

	setMarket(caller: AccountId, asset: AssetId, params: MarketParams): Result<MarketInfo, LendingError> {
		const created = !this.ctx.markets.hasMarket(asset);
		const result = this.ctx.markets.setMarket(caller, asset, params);
		if (result.ok) {
			this.events.emit("marketUpdated", { asset, market: result.value, created });
		}
		return result;
	}

	setPriceSource(caller: AccountId, asset: AssetId, source: PriceSource): Result<PriceSource, LendingError> {
		const result = this.ctx.config.oracle.setPriceSource(caller, asset, source);
		if (result.ok) {
			this.events.emit("priceSourceSet", { asset, source, timestamp: this.ctx.clock.now() });
		}
		return result;
	}

	// ── Ledger operations ──────────────────────────────────────

	deposit(caller: AccountId, asset: AssetId, amount: bigint): Promise<Result<DepositReceipt, LendingError>> {
		return this.ctx.locks.runExclusive(caller, async () => this.commitDeposit(caller, asset, amount));
	}

	/**
	 * Borrows `amount` of `asset` if the position, including this borrow,
	 * keeps a health factor of at least 1000 permille. A rejected borrow
	 * changes nothing.
	 */
	borrow(caller: AccountId, asset: AssetId, amount: bigint): Promise<Result<BorrowReceipt, LendingError>> {
		return this.ctx.locks.runExclusive(caller, () => this.commitBorrow(caller, asset, amount));
	}

	// ── Views ──────────────────────────────────────────────────

	async calculateHealthFactor(account: AccountId): Promise<Result<bigint, LendingError>> {
		const position = this.ctx.positions.getPositions(account);
		if (!position.ok) return position;
		return calculateHealthFactor(position.value, this.valuationDeps());
	}

	async getUserPosition(account: AccountId): Promise<Result<PositionSummary, LendingError>> {
		const position = this.ctx.positions.getPositions(account);
		if (!position.ok) return position;

		const valuation = await valueAccount(position.value, this.valuationDeps());
		if (!valuation.ok) return valuation;
		return summarize(valuation.value);
	}

	// ── Internal ───────────────────────────────────────────────

	private commitDeposit(
		account: AccountId,
		asset: AssetId,
		amount: bigint,
	): Result<DepositReceipt, LendingError> {
		const invalid = checkAmount(amount, account, asset);
		if (invalid) return err(invalid);

		const market = this.ctx.markets.previewDeposit(asset, amount);
		if (!market.ok) return market;
		const position = this.ctx.positions.previewDeposit(account, asset, amount);
		if (!position.ok) return position;

		this.ctx.markets.apply(asset, market.value);
		this.ctx.positions.apply(account, position.value);

		this.logger.info({ account, asset, amount, totalDeposits: market.value.totalDeposits }, "Deposit committed");
		this.events.emit("deposited", {
			account,
			asset,
			amount,
			totalDeposits: market.value.totalDeposits,
			timestamp: market.value.lastTimeUpdated,
		});
		return ok({ account, asset, amount, position: position.value, market: market.value });
	}

	private async commitBorrow(
		account: AccountId,
		asset: AssetId,
		amount: bigint,
	): Promise<Result<BorrowReceipt, LendingError>> {
		const invalid = checkAmount(amount, account, asset);
		if (invalid) return err(invalid);

		const known = this.ctx.markets.getMarket(asset);
		if (!known.ok) return known;
		const projected = this.ctx.positions.previewBorrow(account, asset, amount);
		if (!projected.ok) return projected;

		const healthFactor = await calculateHealthFactor(projected.value, this.valuationDeps());
		if (!healthFactor.ok) return healthFactor;

		if (!isHealthy(healthFactor.value)) {
			this.logger.warn({ account, asset, amount, healthFactor: healthFactor.value }, "Borrow rejected");
			this.events.emit("borrowRejected", {
				account,
				asset,
				amount,
				healthFactor: healthFactor.value,
				timestamp: this.ctx.clock.now(),
			});
			return err(
				new InsufficientCollateralError(
					`Borrowing ${amount} of ${asset} would leave health factor at ${healthFactor.value}`,
					healthFactor.value,
					{ account, asset, amount: amount.toString() },
				),
			);
		}

		// Totals are read after the await so concurrent deposits by other accounts are kept.
		const market = this.ctx.markets.previewDebt(asset, amount);
		if (!market.ok) return market;

		this.ctx.markets.apply(asset, market.value);
		this.ctx.positions.apply(account, projected.value);

		this.logger.info(
			{ account, asset, amount, totalDebt: market.value.totalDebt, healthFactor: healthFactor.value },
			"Borrow committed",
		);
		this.events.emit("borrowed", {
			account,
			asset,
			amount,
			totalDebt: market.value.totalDebt,
			healthFactor: healthFactor.value,
			timestamp: market.value.lastTimeUpdated,
		});
		return ok({
			account,
			asset,
			amount,
			position: projected.value,
			market: market.value,
			healthFactor: healthFactor.value,
		});
	}

	private valuationDeps(): ValuationDeps {
		return { oracle: this.ctx.config.oracle, markets: this.ctx.markets };
	}
}

function checkAmount(amount: bigint, account: AccountId, asset: AssetId): InvalidAmountError | null {
	if (amount <= 0n || !isUint256(amount)) {
		return new InvalidAmountError("Amount must be a positive uint256", {
			account,
			asset,
			amount: amount.toString(),
		});
	}
	return null;
}

function summarize(valuation: AccountValuation): Result<PositionSummary, LendingError> {
	return map(healthFactorFromValues(valuation.weightedCollateralValue, valuation.debtValue), (healthFactor) => ({
		totalDepositValue: valuation.depositValue,
		totalDebtValue: valuation.debtValue,
		healthFactor,
	}));
}
