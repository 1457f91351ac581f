import { beforeEach, describe, expect, it } from "vitest";
import { ALICE, ASSET_X, ASSET_Y, BOB } from "../__tests__/fixtures.js";
import { NotFoundError, OverflowError } from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import { MAX_UINT256 } from "../shared/uint.js";
import { PositionStore } from "./position-store.js";

describe("PositionStore", () => {
	let store: PositionStore;

	beforeEach(() => {
		store = PositionStore.create();
	});

	describe("openPosition", () => {
		it("creates an empty position", () => {
			const position = store.openPosition(ALICE);

			expect(position.deposits.size).toBe(0);
			expect(position.borrows.size).toBe(0);
			expect(store.hasPosition(ALICE)).toBe(true);
		});

		it("returns the existing position on a second call", () => {
			store.openPosition(ALICE);
			unwrap(store.recordUserDeposit(ALICE, ASSET_X, 10n));

			const position = store.openPosition(ALICE);

			expect(position.deposits.get(ASSET_X)).toBe(10n);
			expect(store.accounts()).toEqual([ALICE]);
		});
	});

	describe("getPositions", () => {
		it("fails NotFound for an account without a position", () => {
			const result = store.getPositions(BOB);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(NotFoundError);
				expect(result.error.resource).toBe("position");
			}
		});
	});

	describe("balances", () => {
		beforeEach(() => {
			store.openPosition(ALICE);
		});

		it("accumulates deposits per asset", () => {
			unwrap(store.recordUserDeposit(ALICE, ASSET_X, 10n));
			unwrap(store.recordUserDeposit(ALICE, ASSET_X, 5n));
			unwrap(store.recordUserDeposit(ALICE, ASSET_Y, 2n));

			const position = unwrap(store.getPositions(ALICE));
			expect([...position.deposits]).toEqual([
				[ASSET_X, 15n],
				[ASSET_Y, 2n],
			]);
			expect(position.borrows.size).toBe(0);
		});

		it("keeps borrows apart from deposits of the same asset", () => {
			unwrap(store.recordUserDeposit(ALICE, ASSET_X, 10n));
			unwrap(store.recordUserBorrow(ALICE, ASSET_X, 4n));

			const position = unwrap(store.getPositions(ALICE));
			expect(position.deposits.get(ASSET_X)).toBe(10n);
			expect(position.borrows.get(ASSET_X)).toBe(4n);
		});

		it("previews leave the stored position and earlier snapshots untouched", () => {
			const before = unwrap(store.getPositions(ALICE));
			const preview = unwrap(store.previewBorrow(ALICE, ASSET_Y, 9n));

			expect(preview.borrows.get(ASSET_Y)).toBe(9n);
			expect(before.borrows.size).toBe(0);
			expect(unwrap(store.getPositions(ALICE)).borrows.size).toBe(0);

			store.apply(ALICE, preview);
			expect(unwrap(store.getPositions(ALICE)).borrows.get(ASSET_Y)).toBe(9n);
			expect(before.borrows.size).toBe(0);
		});

		it("isolates accounts from each other", () => {
			store.openPosition(BOB);
			unwrap(store.recordUserDeposit(ALICE, ASSET_X, 10n));

			expect(unwrap(store.getPositions(BOB)).deposits.size).toBe(0);
		});

		it("fails on overflow and keeps the balance", () => {
			unwrap(store.recordUserDeposit(ALICE, ASSET_X, MAX_UINT256));
			const result = store.recordUserDeposit(ALICE, ASSET_X, 1n);

			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error).toBeInstanceOf(OverflowError);
			expect(unwrap(store.getPositions(ALICE)).deposits.get(ASSET_X)).toBe(MAX_UINT256);
		});

		it("fails NotFound when the account has no position", () => {
			const result = store.recordUserBorrow(BOB, ASSET_X, 1n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("NOT_FOUND");
		});
	});
});
