export { PriceOracle, type PriceOracleConfig } from "./price-oracle.js";
export {
	type PriceProvider,
	type PriceSource,
	type PriceSourceKind,
	type PriceTrail,
	externalModule,
	fixedPrice,
} from "./types.js";
