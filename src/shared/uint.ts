/**
 * Checked uint256 arithmetic on bigint.
 *
 * Every ledger quantity (amounts, prices, totals, intermediate products) is an
 * unsigned 256-bit integer. bigint itself never wraps, so the bound is enforced
 * here: leaving the range is an OverflowError, never a silent wrap.
 */

import { OverflowError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

export const MAX_UINT256 = (1n << 256n) - 1n;

/** Parts-per-thousand: 1000 permille = 100%. */
export const PERMILLE = 1000n;

export function isUint256(value: bigint): boolean {
	return value >= 0n && value <= MAX_UINT256;
}

export function checkedAdd(a: bigint, b: bigint): Result<bigint, OverflowError> {
	const sum = a + b;
	if (sum > MAX_UINT256) {
		return err(new OverflowError("uint256 addition overflow", { a: a.toString(), b: b.toString() }));
	}
	return ok(sum);
}

export function checkedMul(a: bigint, b: bigint): Result<bigint, OverflowError> {
	const product = a * b;
	if (product > MAX_UINT256) {
		return err(
			new OverflowError("uint256 multiplication overflow", { a: a.toString(), b: b.toString() }),
		);
	}
	return ok(product);
}

/**
 * `a * b / divisor` with the product range-checked before the truncating division.
 * The divisor must be non-zero.
 */
export function checkedMulDiv(a: bigint, b: bigint, divisor: bigint): Result<bigint, OverflowError> {
	const product = checkedMul(a, b);
	if (!product.ok) return product;
	return ok(product.value / divisor);
}
