import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { ALICE, ASSET_X, ASSET_Y, ASSET_Z, BOB, OWNER, makePool, marketParams } from "../__tests__/fixtures.js";
import { isHealthy } from "../health/health-factor.js";
import { fixedPrice } from "../oracle/types.js";
import type { AccountId, AssetId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import type { LendingPool } from "./lending-pool.js";

const ACCOUNTS: readonly AccountId[] = [ALICE, BOB];
const ASSETS: readonly AssetId[] = [ASSET_X, ASSET_Y, ASSET_Z];

interface Op {
	readonly kind: "deposit" | "borrow";
	readonly account: number;
	readonly asset: number;
	readonly amount: bigint;
}

const opArb: fc.Arbitrary<Op> = fc.record({
	kind: fc.constantFrom("deposit" as const, "borrow" as const),
	account: fc.integer({ min: 0, max: ACCOUNTS.length - 1 }),
	asset: fc.integer({ min: 0, max: ASSETS.length - 1 }),
	amount: fc.bigInt({ min: 1n, max: 1_000n }),
});

function setup(): ReturnType<typeof makePool> {
	const fixture = makePool();
	const { pool } = fixture;
	unwrap(pool.setMarket(OWNER, ASSET_X, marketParams({ ltv: 800n })));
	unwrap(pool.setMarket(OWNER, ASSET_Y, marketParams({ ltv: 500n, liquidationThreshold: 700n })));
	unwrap(pool.setMarket(OWNER, ASSET_Z, marketParams({ ltv: 0n, liquidationThreshold: 0n })));
	unwrap(pool.setPriceSource(OWNER, ASSET_X, fixedPrice(100n)));
	unwrap(pool.setPriceSource(OWNER, ASSET_Y, fixedPrice(37n)));
	unwrap(pool.setPriceSource(OWNER, ASSET_Z, fixedPrice(5n)));
	for (const account of ACCOUNTS) pool.openPosition(account);
	return fixture;
}

function run(pool: LendingPool, op: Op): Promise<unknown> {
	const account = ACCOUNTS[op.account] ?? ALICE;
	const asset = ASSETS[op.asset] ?? ASSET_X;
	return op.kind === "deposit" ? pool.deposit(account, asset, op.amount) : pool.borrow(account, asset, op.amount);
}

describe("LendingPool (property-based)", () => {
	it("market totals equal the sum of position balances after any interleaving", async () => {
		await fc.assert(
			fc.asyncProperty(fc.array(opArb, { maxLength: 30 }), async (ops) => {
				const { pool, ctx } = setup();
				await Promise.all(ops.map((op) => run(pool, op)));

				for (const asset of ASSETS) {
					let deposits = 0n;
					let borrows = 0n;
					for (const account of ACCOUNTS) {
						const position = unwrap(ctx.positions.getPositions(account));
						deposits += position.deposits.get(asset) ?? 0n;
						borrows += position.borrows.get(asset) ?? 0n;
					}
					const market = unwrap(ctx.markets.getMarket(asset));
					expect(market.totalDeposits).toBe(deposits);
					expect(market.totalDebt).toBe(borrows);
				}
			}),
			{ numRuns: 150 },
		);
	});

	it("no account ends below the minimum health factor", async () => {
		await fc.assert(
			fc.asyncProperty(fc.array(opArb, { maxLength: 30 }), async (ops) => {
				const { pool } = setup();
				await Promise.all(ops.map((op) => run(pool, op)));

				for (const account of ACCOUNTS) {
					const hf = unwrap(await pool.calculateHealthFactor(account));
					expect(isHealthy(hf)).toBe(true);
				}
			}),
			{ numRuns: 150 },
		);
	});
});
