export { PositionStore, type PositionStoreConfig } from "./position-store.js";
export type { PositionSide, UserPosition } from "./types.js";
