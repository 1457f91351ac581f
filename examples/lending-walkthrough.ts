/**
 * Lending Walkthrough
 *
 * Two markets priced at 100 with an 80% LTV:
 * - Alice deposits 10 X and borrows 8 Y (health factor exactly 1000)
 * - A further borrow of 1 Y is rejected and leaves the ledger unchanged
 * - Prints the position summary before and after
 */

import {
	LendingPool,
	accountId,
	assetId,
	configFromEnv,
	createLendingContext,
	fixedPrice,
	unwrap,
} from "../src/index.js";

const owner = accountId("owner");
const alice = accountId("alice");
const X = assetId("X");
const Y = assetId("Y");

const ctx = createLendingContext({ owner, engine: configFromEnv() });
const pool = LendingPool.create(ctx);

pool.events.on("borrowRejected", (e) => {
	console.log(`  rejected: ${e.amount} ${e.asset} (health factor would be ${e.healthFactor})`);
});

// ── Markets and prices ──────────────────────────────────────────────

const params = { depositRate: 20n, borrowRate: 50n, ltv: 800n, liquidationThreshold: 850n };
unwrap(pool.setMarket(owner, X, params));
unwrap(pool.setMarket(owner, Y, params));
unwrap(pool.setPriceSource(owner, X, fixedPrice(100n)));
unwrap(pool.setPriceSource(owner, Y, fixedPrice(100n)));

// ── Deposit and borrow ──────────────────────────────────────────────

pool.openPosition(alice);
unwrap(await pool.deposit(alice, X, 10n));
const receipt = unwrap(await pool.borrow(alice, Y, 8n));
console.log(`Borrowed 8 Y, health factor ${receipt.healthFactor}`);

const second = await pool.borrow(alice, Y, 1n);
if (!second.ok) {
	console.log(`Second borrow failed: ${second.error.code}`);
}

const summary = unwrap(await pool.getUserPosition(alice));
console.log("Position:");
console.log(`  Deposits: ${summary.totalDepositValue}`);
console.log(`  Debt:     ${summary.totalDebtValue}`);
console.log(`  Health:   ${summary.healthFactor}`);
