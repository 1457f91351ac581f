/** Risk and rate parameters an owner sets for one asset. */
export interface MarketParams {
	/** Deposit interest rate; stored only, no accrual */
	readonly depositRate: bigint;
	/** Borrow interest rate; stored only, no accrual */
	readonly borrowRate: bigint;
	/** Loan-to-value weight applied to this asset as collateral, permille */
	readonly ltv: bigint;
	/** Permille boundary for liquidation eligibility; stored only */
	readonly liquidationThreshold: bigint;
}

/** Per-asset aggregate ledger state. */
export interface MarketInfo extends MarketParams {
	/** Sum of every account's deposit of this asset */
	readonly totalDeposits: bigint;
	/** Sum of every account's borrow of this asset */
	readonly totalDebt: bigint;
	/** Epoch ms of the last mutation; never decreases */
	readonly lastTimeUpdated: number;
}
