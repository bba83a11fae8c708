export { GraphStore } from "./graph-store"
export type { TransactionSnapshot, StoreStats, StoreData } from "./types"
