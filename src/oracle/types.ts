import type { LendingError } from "../shared/errors.js";
import type { AssetId, ProviderRef } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

/**
 * How an asset's price is determined. Closed union: resolution matches on
 * `kind` exhaustively.
 */
export type PriceSource =
	| { readonly kind: "fixed"; readonly price: bigint }
	| { readonly kind: "external"; readonly reference: ProviderRef };

export type PriceSourceKind = PriceSource["kind"];

/** A static price set by configuration. */
export function fixedPrice(price: bigint): PriceSource {
	return { kind: "fixed", price };
}

/** Delegate lookup to the provider registered under `reference`. */
export function externalModule(reference: ProviderRef): PriceSource {
	return { kind: "external", reference };
}

/**
 * Path travelled by one price resolution across external providers.
 * `depth` counts provider hops; `visited` holds every provider already on the path.
 */
export interface PriceTrail {
	readonly depth: number;
	readonly visited: ReadonlySet<PriceProvider>;
}

/**
 * Anything that can price an asset. External modules implement this, and so
 * does PriceOracle itself, so oracles can delegate to one another.
 *
 * Implementations that delegate further should pass `trail` along.
 */
export interface PriceProvider {
	getPrice(asset: AssetId, trail?: PriceTrail): Promise<Result<bigint, LendingError>>;
}
