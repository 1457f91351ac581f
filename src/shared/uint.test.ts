import { describe, expect, it } from "vitest";
import { OverflowError } from "./errors.js";
import { MAX_UINT256, PERMILLE, checkedAdd, checkedMul, checkedMulDiv, isUint256 } from "./uint.js";

describe("uint256 arithmetic", () => {
	it("MAX_UINT256 is 2^256 - 1", () => {
		expect(MAX_UINT256).toBe(
			115792089237316195423570985008687907853269984665640564039457584007913129639935n,
		);
	});

	it("PERMILLE is 1000", () => {
		expect(PERMILLE).toBe(1000n);
	});

	describe("isUint256", () => {
		it("accepts the bounds", () => {
			expect(isUint256(0n)).toBe(true);
			expect(isUint256(MAX_UINT256)).toBe(true);
		});

		it("rejects negatives and values past the bound", () => {
			expect(isUint256(-1n)).toBe(false);
			expect(isUint256(MAX_UINT256 + 1n)).toBe(false);
		});
	});

	describe("checkedAdd", () => {
		it("adds within range", () => {
			expect(checkedAdd(2n, 3n)).toEqual({ ok: true, value: 5n });
		});

		it("reaches MAX_UINT256 exactly", () => {
			expect(checkedAdd(MAX_UINT256 - 1n, 1n)).toEqual({ ok: true, value: MAX_UINT256 });
		});

		it("fails past MAX_UINT256 instead of wrapping", () => {
			const r = checkedAdd(MAX_UINT256, 1n);
			expect(r.ok).toBe(false);
			if (!r.ok) {
				expect(r.error).toBeInstanceOf(OverflowError);
				expect(r.error.code).toBe("OVERFLOW");
			}
		});
	});

	describe("checkedMul", () => {
		it("multiplies within range", () => {
			expect(checkedMul(10n, 100n)).toEqual({ ok: true, value: 1000n });
		});

		it("fails when the product leaves uint256", () => {
			const r = checkedMul(1n << 200n, 1n << 100n);
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBeInstanceOf(OverflowError);
		});
	});

	describe("checkedMulDiv", () => {
		it("truncates the division", () => {
			expect(checkedMulDiv(800n, 1000n, 900n)).toEqual({ ok: true, value: 888n });
		});

		it("checks the product before dividing", () => {
			const r = checkedMulDiv(MAX_UINT256, 2n, 2n);
			expect(r.ok).toBe(false);
		});

		it("handles products far beyond 64 bits", () => {
			const amount = 10n ** 30n;
			const price = 10n ** 30n;
			expect(checkedMulDiv(amount * price, 800n, 1000n)).toEqual({
				ok: true,
				value: 8n * 10n ** 59n,
			});
		});
	});
});
