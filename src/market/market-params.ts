import { type ValidationError, validate, z } from "../lib/validation/index.js";
import type { Result } from "../shared/result.js";
import { MAX_UINT256, PERMILLE } from "../shared/uint.js";
import type { MarketParams } from "./types.js";

const uint256 = z.bigint().nonnegative().max(MAX_UINT256, "must fit in uint256");
const permille = z.bigint().nonnegative().max(PERMILLE, "must not exceed 1000 permille");

const marketParamsSchema = z
	.object({
		depositRate: uint256,
		borrowRate: uint256,
		ltv: permille,
		liquidationThreshold: permille,
	})
	.refine((p) => p.ltv <= p.liquidationThreshold, {
		message: "ltv must not exceed liquidationThreshold",
		path: ["ltv"],
	});

/** Checks `0 <= ltv <= liquidationThreshold <= 1000` and the uint256 range of the rates. */
export function validateMarketParams(input: unknown): Result<MarketParams, ValidationError> {
	return validate(marketParamsSchema, input);
}
