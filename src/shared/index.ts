export {
	type AssetId,
	type AccountId,
	type ProviderRef,
	assetId,
	accountId,
	providerRef,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	LendingError,
	type MissingResource,
	NotFoundError,
	UnauthorizedError,
	InsufficientCollateralError,
	OverflowError,
	InvalidAmountError,
	PriceSourceCycleError,
	ConfigError,
	SystemError,
	classifyError,
	isNotFoundError,
	isUnauthorizedError,
	isInsufficientCollateral,
	isOverflowError,
	isInvalidAmountError,
	isPriceSourceCycleError,
	isConfigError,
	isSystemError,
} from "./errors.js";

export { MAX_UINT256, PERMILLE, isUint256, checkedAdd, checkedMul, checkedMulDiv } from "./uint.js";
export { type Clock, SystemClock, FakeClock, monotonicTimestamp } from "./time.js";
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveEngineConfig,
} from "./config.js";
