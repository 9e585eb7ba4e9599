export { ChainingMap, Int64Map } from "./shared/chainingmap"
export type { UpsertResult, ValueColumn } from "./shared/chainingmap"
export { FixedProbingSet, LinearProbingSet, ProbingSet, SlotState } from "./shared/probingset"
export type { InsertResult, Placement, Probe } from "./shared/probingset"
export { bucketIndex, foldHash, isInt64, mixHash } from "./shared/hashing"
export type { HashFunction } from "./shared/hashing"
export { DEFAULT_CAPACITY, DEFAULT_LOAD_FACTOR, DEFAULT_MAX_CAPACITY } from "./shared/tableoptions"
export type { FixedTableOptions, GrowingTableOptions, TableOptions } from "./shared/tableoptions"
export {
    AllocationError,
    CapacityExhaustedError,
    DestroyedTableError,
    HashTableError,
    InvalidConfigurationError,
    InvalidKeyError,
} from "./shared/tableerrors"
export type { HashTableErrorKind } from "./shared/tableerrors"
