export {
	type AccountValuation,
	MAX_HEALTH_FACTOR,
	MIN_HEALTH_FACTOR,
	type ValuationDeps,
	calculateHealthFactor,
	healthFactorFromValues,
	isHealthy,
	valueAccount,
} from "./health-factor.js";
