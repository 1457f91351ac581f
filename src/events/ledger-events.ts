/**
 * Ledger events: emitted by LendingPool after a change is committed
 * (or, for `borrowRejected`, after a borrow is turned down).
 */

import type { MarketInfo } from "../market/types.js";
import type { PriceSource } from "../oracle/types.js";
import type { AccountId, AssetId } from "../shared/identifiers.js";

export interface PositionOpenedEvent {
	readonly account: AccountId;
	readonly timestamp: number;
}

export interface MarketUpdatedEvent {
	readonly asset: AssetId;
	readonly market: MarketInfo;
	readonly created: boolean;
}

export interface PriceSourceSetEvent {
	readonly asset: AssetId;
	readonly source: PriceSource;
	readonly timestamp: number;
}

export interface DepositedEvent {
	readonly account: AccountId;
	readonly asset: AssetId;
	readonly amount: bigint;
	readonly totalDeposits: bigint;
	readonly timestamp: number;
}

export interface BorrowedEvent {
	readonly account: AccountId;
	readonly asset: AssetId;
	readonly amount: bigint;
	readonly totalDebt: bigint;
	readonly healthFactor: bigint;
	readonly timestamp: number;
}

export interface BorrowRejectedEvent {
	readonly account: AccountId;
	readonly asset: AssetId;
	readonly amount: bigint;
	/** Projected health factor the borrow would have produced */
	readonly healthFactor: bigint;
	readonly timestamp: number;
}

export type LedgerEvents = {
	positionOpened: (event: PositionOpenedEvent) => void;
	marketUpdated: (event: MarketUpdatedEvent) => void;
	priceSourceSet: (event: PriceSourceSetEvent) => void;
	deposited: (event: DepositedEvent) => void;
	borrowed: (event: BorrowedEvent) => void;
	borrowRejected: (event: BorrowRejectedEvent) => void;
};

export type LedgerEventType = keyof LedgerEvents;
