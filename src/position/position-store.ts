/**
 * PositionStore: per-account deposit and borrow balances.
 *
 * Positions are immutable snapshots: every change produces a new
 * UserPosition, so a preview can be inspected (or discarded) before `apply`
 * makes it visible.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type LendingError, NotFoundError } from "../shared/errors.js";
import type { AccountId, AssetId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { checkedAdd } from "../shared/uint.js";
import type { PositionSide, UserPosition } from "./types.js";

export interface PositionStoreConfig {
	readonly logger?: Logger;
}

const EMPTY_POSITION: UserPosition = { deposits: new Map(), borrows: new Map() };

export class PositionStore {
	private readonly positions = new Map<AccountId, UserPosition>();
	private readonly logger: Logger;

	private constructor(config: PositionStoreConfig) {
		this.logger = (config.logger ?? silentLogger()).child({ component: "position-store" });
	}

	static create(config: PositionStoreConfig = {}): PositionStore {
		return new PositionStore(config);
	}

	// ── Lifecycle ──────────────────────────────────────────────

	/**
	 * Creates an empty position for the account. Opening an existing position
	 * returns it unchanged.
	 */
	openPosition(account: AccountId): UserPosition {
		const existing = this.positions.get(account);
		if (existing) return existing;
		this.positions.set(account, EMPTY_POSITION);
		this.logger.info({ account }, "Position opened");
		return EMPTY_POSITION;
	}

	hasPosition(account: AccountId): boolean {
		return this.positions.has(account);
	}

	getPositions(account: AccountId): Result<UserPosition, NotFoundError> {
		const position = this.positions.get(account);
		if (!position) {
			return err(new NotFoundError("position", `No position for account ${account}`, { account }));
		}
		return ok(position);
	}

	/** Every account with an open position. */
	accounts(): readonly AccountId[] {
		return [...this.positions.keys()];
	}

	// ── Balances ───────────────────────────────────────────────

	/** Position after adding `amount` to the account's deposit of `asset`. Does not mutate. */
	previewDeposit(account: AccountId, asset: AssetId, amount: bigint): Result<UserPosition, LendingError> {
		return this.preview(account, "deposits", asset, amount);
	}

	/** Position after adding `amount` to the account's borrow of `asset`. Does not mutate. */
	previewBorrow(account: AccountId, asset: AssetId, amount: bigint): Result<UserPosition, LendingError> {
		return this.preview(account, "borrows", asset, amount);
	}

	/** Commit a previewed position. */
	apply(account: AccountId, next: UserPosition): void {
		this.positions.set(account, next);
	}

	recordUserDeposit(account: AccountId, asset: AssetId, amount: bigint): Result<UserPosition, LendingError> {
		const next = this.previewDeposit(account, asset, amount);
		if (next.ok) this.apply(account, next.value);
		return next;
	}

	recordUserBorrow(account: AccountId, asset: AssetId, amount: bigint): Result<UserPosition, LendingError> {
		const next = this.previewBorrow(account, asset, amount);
		if (next.ok) this.apply(account, next.value);
		return next;
	}

	private preview(
		account: AccountId,
		side: PositionSide,
		asset: AssetId,
		amount: bigint,
	): Result<UserPosition, LendingError> {
		const current = this.getPositions(account);
		if (!current.ok) return current;

		const balance = checkedAdd(current.value[side].get(asset) ?? 0n, amount);
		if (!balance.ok) return balance;

		const updated = new Map(current.value[side]);
		updated.set(asset, balance.value);
		return ok(side === "deposits" ? { ...current.value, deposits: updated } : { ...current.value, borrows: updated });
	}
}
