import type { AssetId } from "../shared/identifiers.js";

/** Per-account balances. Keys are unique; iteration order carries no meaning. */
export interface UserPosition {
	readonly deposits: ReadonlyMap<AssetId, bigint>;
	readonly borrows: ReadonlyMap<AssetId, bigint>;
}

export type PositionSide = "deposits" | "borrows";
