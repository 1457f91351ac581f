/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * An AssetId can never be passed where an AccountId is expected, even though
 * both are plain strings at runtime.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Opaque key of a fungible asset (address-like). */
export type AssetId = Brand<string, "AssetId">;
/** Verified identity of an account, as supplied by the authorization layer. */
export type AccountId = Brand<string, "AccountId">;
/** Handle under which an external price provider is registered. */
export type ProviderRef = Brand<string, "ProviderRef">;

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated AssetId from a raw string. Throws if empty. */
export function assetId(value: string): AssetId {
	return createBrandedId(value, "AssetId");
}

/** Create a validated AccountId from a raw string. Throws if empty. */
export function accountId(value: string): AccountId {
	return createBrandedId(value, "AccountId");
}

/** Create a validated ProviderRef from a raw string. Throws if empty. */
export function providerRef(value: string): ProviderRef {
	return createBrandedId(value, "ProviderRef");
}

/** Extract the raw string from any branded identifier type. */
export function idToString(id: AssetId | AccountId | ProviderRef): string {
	return id;
}
