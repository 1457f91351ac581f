export {
	type GlobalConfig,
	type LendingContext,
	type LendingContextOptions,
	createLendingContext,
} from "./context.js";
export { KeyedMutex } from "./keyed-mutex.js";
export {
	type BorrowReceipt,
	type DepositReceipt,
	LendingPool,
	type PositionSummary,
} from "./lending-pool.js";
