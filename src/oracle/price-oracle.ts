/**
 * PriceOracle: resolves an asset to its current price through the source
 * registered for it.
 *
 * Fixed sources answer directly. External sources delegate to a registered
 * PriceProvider, which may itself be another PriceOracle; the trail passed
 * along the chain stops loops and runaway nesting. The active trail also
 * travels in async context, so a provider that calls back into an oracle
 * without forwarding `trail` still resolves against it.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import {
	InvalidAmountError,
	type LendingError,
	NotFoundError,
	PriceSourceCycleError,
	SystemError,
	UnauthorizedError,
	classifyError,
} from "../shared/errors.js";
import type { AccountId, AssetId, ProviderRef } from "../shared/identifiers.js";
import { type Result, err, ok, tryCatchAsync } from "../shared/result.js";
import { isUint256 } from "../shared/uint.js";
import type { PriceProvider, PriceSource, PriceTrail } from "./types.js";

const DEFAULT_MAX_HOPS = 8;

export interface PriceOracleConfig {
	/** Authority allowed to register sources and providers */
	readonly owner: AccountId;
	/** Maximum external hops per resolution (default 8) */
	readonly maxHops?: number;
	readonly logger?: Logger;
}

const EMPTY_TRAIL: PriceTrail = { depth: 0, visited: new Set() };

/** Trail of the external resolution currently awaiting a provider, shared by all oracles. */
const activeTrail = new AsyncLocalStorage<PriceTrail>();

export class PriceOracle implements PriceProvider {
	private readonly owner: AccountId;
	private readonly maxHops: number;
	private readonly logger: Logger;
	private readonly sources = new Map<AssetId, PriceSource>();
	private readonly providers = new Map<ProviderRef, PriceProvider>();

	private constructor(config: PriceOracleConfig) {
		this.owner = config.owner;
		this.maxHops = config.maxHops ?? DEFAULT_MAX_HOPS;
		this.logger = (config.logger ?? silentLogger()).child({ component: "price-oracle" });
	}

	static create(config: PriceOracleConfig): PriceOracle {
		return new PriceOracle(config);
	}

	// ── Registration ───────────────────────────────────────────

	/**
	 * Registers or overwrites the price source for an asset.
	 * @returns the source now in effect
	 */
	setPriceSource(
		caller: AccountId,
		asset: AssetId,
		source: PriceSource,
	): Result<PriceSource, LendingError> {
		if (caller !== this.owner) {
			return err(new UnauthorizedError("Only the oracle owner may set price sources", { caller, asset }));
		}
		if (source.kind === "fixed" && !isUint256(source.price)) {
			return err(
				new InvalidAmountError("Fixed price must be a uint256", {
					asset,
					price: source.price.toString(),
				}),
			);
		}
		const replaced = this.sources.has(asset);
		this.sources.set(asset, source);
		this.logger.info({ asset, kind: source.kind, replaced }, "Price source set");
		return ok(source);
	}

	/**
	 * Registers or overwrites the external provider reachable under `reference`.
	 *
	 * A provider that delegates to other providers should pass the `trail` it
	 * receives. One that calls an oracle without it is still covered: the
	 * oracle falls back to the trail of the resolution in progress.
	 */
	registerProvider(
		caller: AccountId,
		reference: ProviderRef,
		provider: PriceProvider,
	): Result<ProviderRef, LendingError> {
		if (caller !== this.owner) {
			return err(
				new UnauthorizedError("Only the oracle owner may register price providers", {
					caller,
					reference,
				}),
			);
		}
		this.providers.set(reference, provider);
		this.logger.info({ reference }, "Price provider registered");
		return ok(reference);
	}

	getPriceSource(asset: AssetId): PriceSource | undefined {
		return this.sources.get(asset);
	}

	// ── Resolution ─────────────────────────────────────────────

	async getPrice(asset: AssetId, trail?: PriceTrail): Promise<Result<bigint, LendingError>> {
		const source = this.sources.get(asset);
		if (!source) {
			return err(new NotFoundError("price_source", `No price source registered for ${asset}`, { asset }));
		}

		switch (source.kind) {
			case "fixed":
				return ok(source.price);
			case "external":
				return this.resolveExternal(asset, source.reference, trail ?? activeTrail.getStore() ?? EMPTY_TRAIL);
			default:
				return unhandledSource(source["kind"]);
		}
	}

	private async resolveExternal(
		asset: AssetId,
		reference: ProviderRef,
		trail: PriceTrail,
	): Promise<Result<bigint, LendingError>> {
		const provider = this.providers.get(reference);
		if (!provider) {
			return err(
				new NotFoundError("price_provider", `No price provider registered under ${reference}`, {
					asset,
					reference,
				}),
			);
		}
		if (provider === this || trail.visited.has(this) || trail.visited.has(provider)) {
			return err(
				new PriceSourceCycleError(`Price source chain for ${asset} loops back through ${reference}`, {
					asset,
					reference,
					depth: trail.depth,
				}),
			);
		}
		if (trail.depth >= this.maxHops) {
			return err(
				new PriceSourceCycleError(`Price source chain for ${asset} exceeds ${this.maxHops} hops`, {
					asset,
					reference,
					depth: trail.depth,
				}),
			);
		}

		const next: PriceTrail = {
			depth: trail.depth + 1,
			visited: new Set([...trail.visited, this]),
		};
		const outcome = await tryCatchAsync(() => activeTrail.run(next, () => provider.getPrice(asset, next)));
		if (!outcome.ok) {
			this.logger.warn({ asset, reference, error: outcome.error.message }, "Price provider threw");
			return err(
				classifyError(outcome.error, `Price provider ${reference} failed for ${asset}`, { asset, reference }),
			);
		}

		const priced = outcome.value;
		if (priced.ok && !isUint256(priced.value)) {
			return err(
				new SystemError(`Price provider ${reference} returned a price outside uint256`, {
					asset,
					reference,
					price: priced.value.toString(),
				}),
			);
		}
		return priced;
	}
}

function unhandledSource(kind: never): never {
	throw new Error(`Unhandled price source kind: ${String(kind)}`);
}
