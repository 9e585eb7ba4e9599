import { allocate, assertInt64, bucketIndex, HashFunction, mixHash, shouldGrow } from "./hashing"
import { log } from "./logging"
import {
    FixedTableConfig,
    FixedTableOptions,
    GrowingTableConfig,
    GrowingTableOptions,
    resolveFixedOptions,
    resolveGrowingOptions,
} from "./tableoptions"
import { CapacityExhaustedError, DestroyedTableError } from "./tableerrors"

export enum SlotState {
    Empty,
    Occupied,
    Deleted,
}

export type InsertResult = "inserted" | "duplicate"

// where a probe for a key ended up
export type Probe =
    | { kind: "present", slot: number }
    | { kind: "absent", slot: number }
    | { kind: "saturated" }

export type Placement = Exclude<Probe, { kind: "present" }>

type Slots = { keys: BigInt64Array, states: Uint8Array }

/**
 * Set of signed 64-bit integers stored in a flat slot array, resolving
 * collisions by linear probing.
 *
 * Removing a key turns its slot into a tombstone (`Deleted`) instead of
 * `Empty`, since an empty slot ends every probe that reaches it. Tombstones
 * are skipped by lookups and reused by inserts, and only disappear when the
 * whole table is rebuilt.
 */
export abstract class LinearProbingSet {
    private readonly hash: HashFunction
    private keys: BigInt64Array
    private states: Uint8Array
    private count: number = 0
    private tombstones: number = 0
    private destroyed: boolean = false

    protected constructor(capacity: number, protected readonly maxCapacity: number, hash: HashFunction | undefined) {
        this.hash = hash ?? mixHash
        let slots = this.allocateSlots(capacity)
        this.keys = slots.keys
        this.states = slots.states
    }

    get size(): number {
        return this.count
    }

    get capacity(): number {
        return this.keys.length
    }

    // number of Deleted slots currently in the table
    get deletedSlots(): number {
        return this.tombstones
    }

    insert(key: bigint): InsertResult {
        this.checkAlive()
        assertInt64(key)
        let probe = this.probe(key)
        if (probe.kind === "present") {
            return "duplicate"
        }
        let slot = this.place(key, probe)
        if (this.states[slot] === SlotState.Deleted) {
            this.tombstones--
        }
        this.keys[slot] = key
        this.states[slot] = SlotState.Occupied
        this.count++
        return "inserted"
    }

    contains(key: bigint): boolean {
        this.checkAlive()
        assertInt64(key)
        return this.probe(key).kind === "present"
    }

    remove(key: bigint): boolean {
        this.checkAlive()
        assertInt64(key)
        let probe = this.probe(key)
        if (probe.kind !== "present") {
            return false
        }
        this.states[probe.slot] = SlotState.Deleted
        this.count--
        this.tombstones++
        return true
    }

    destroy(): void {
        this.keys = new BigInt64Array(0)
        this.states = new Uint8Array(0)
        this.count = 0
        this.tombstones = 0
        this.destroyed = true
    }

    /**
     * Picks the slot a new key goes into, growing or compacting the table
     * first where the variant allows it.
     */
    protected abstract place(key: bigint, probe: Placement): number

    protected probe(key: bigint): Probe {
        let capacity = this.capacity
        let start = bucketIndex(this.hash, key, capacity)
        let tombstone = -1
        for (let i = 0; i < capacity; i++) {
            let slot = (start + i) % capacity
            let state = this.states[slot]
            if (state === SlotState.Empty) {
                return { kind: "absent", slot: tombstone === -1 ? slot : tombstone }
            } else if (state === SlotState.Deleted) {
                if (tombstone === -1) {
                    tombstone = slot
                }
            } else if (this.keys[slot] === key) {
                return { kind: "present", slot }
            }
        }
        return { kind: "saturated" }
    }

    protected placeAfterRebuild(key: bigint): number {
        let probe = this.probe(key)
        if (probe.kind !== "absent") {
            throw new CapacityExhaustedError(this.capacity, this.count)
        }
        return probe.slot
    }

    /**
     * Moves every occupied key into a fresh all-empty slot array. The current
     * slots stay in place if the allocation fails.
     */
    protected rebuild(capacity: number): void {
        let oldCapacity = this.capacity
        let slots: Slots
        try {
            slots = this.allocateSlots(capacity)
        } catch (e) {
            log.probing("rebuild to %d slots failed: %O", capacity, e)
            throw e
        }
        for (let i = 0; i < oldCapacity; i++) {
            if (this.states[i] !== SlotState.Occupied) {
                continue
            }
            let key = this.keys[i]
            let slot = bucketIndex(this.hash, key, capacity)
            while (slots.states[slot] !== SlotState.Empty) {
                slot = (slot + 1) % capacity
            }
            slots.keys[slot] = key
            slots.states[slot] = SlotState.Occupied
        }
        log.probing("rebuilt %d slots into %d, dropped %d tombstones", oldCapacity, capacity, this.tombstones)
        this.keys = slots.keys
        this.states = slots.states
        this.tombstones = 0
    }

    private allocateSlots(capacity: number): Slots {
        return allocate("slot array", capacity, this.maxCapacity, c => ({
            keys: new BigInt64Array(c),
            states: new Uint8Array(c),
        }))
    }

    private checkAlive(): void {
        if (this.destroyed) {
            throw new DestroyedTableError()
        }
    }
}

/**
 * Probing set that never grows. Once every slot is either occupied or a
 * tombstone, new keys are rejected with `CapacityExhaustedError`, however few
 * keys are actually stored.
 */
export class FixedProbingSet extends LinearProbingSet {
    protected readonly config: FixedTableConfig

    constructor(options: FixedTableOptions = {}) {
        let config = resolveFixedOptions("slot array", options)
        super(config.capacity, config.maxCapacity, options.hash)
        this.config = config
    }

    protected place(key: bigint, probe: Placement): number {
        if (probe.kind === "absent") {
            return probe.slot
        }
        if (this.config.compactOnExhaustion && this.deletedSlots > 0) {
            this.rebuild(this.capacity)
            return this.placeAfterRebuild(key)
        }
        log.probing("no free slot for %s (size %d, %d tombstones)", key, this.size, this.deletedSlots)
        throw new CapacityExhaustedError(this.capacity, this.size)
    }
}

/**
 * Probing set that doubles its slot array before an insert would push the
 * load above `loadFactor`.
 */
export class ProbingSet extends LinearProbingSet {
    protected readonly config: GrowingTableConfig

    constructor(options: GrowingTableOptions = {}) {
        let config = resolveGrowingOptions("slot array", options)
        super(config.capacity, config.maxCapacity, options.hash)
        this.config = config
    }

    get loadFactor(): number {
        return this.config.loadFactor
    }

    protected place(key: bigint, probe: Placement): number {
        if (shouldGrow(this.size, this.capacity, this.config.loadFactor)) {
            this.rebuild(this.capacity * 2)
            return this.placeAfterRebuild(key)
        }
        if (probe.kind === "saturated") {
            // only tombstones left, compact them away
            this.rebuild(this.capacity)
            return this.placeAfterRebuild(key)
        }
        return probe.slot
    }
}
