export { MarketRegistry, type MarketReader, type MarketRegistryConfig } from "./market-registry.js";
export { validateMarketParams } from "./market-params.js";
export type { MarketInfo, MarketParams } from "./types.js";
