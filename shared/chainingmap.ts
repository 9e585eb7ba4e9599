import { allocate, assertInt64, bucketIndex, foldHash, HashFunction, shouldGrow } from "./hashing"
import { log } from "./logging"
import { GrowingTableConfig, GrowingTableOptions, resolveGrowingOptions } from "./tableoptions"
import { DestroyedTableError } from "./tableerrors"

const NIL = -1

export type UpsertResult = "inserted" | "updated"

/**
 * Value storage of the entry pool, addressed by node index.
 */
export interface ValueColumn<V> {
    get(node: number): V | undefined
    set(node: number, value: V): void
    release(node: number): void
    resized(capacity: number): ValueColumn<V>
}

class ReferenceColumn<V> implements ValueColumn<V> {
    constructor(private readonly values: (V | undefined)[]) { }

    static create<V>(capacity: number): ReferenceColumn<V> {
        return new ReferenceColumn<V>(new Array<V | undefined>(capacity))
    }

    get(node: number): V | undefined {
        return this.values[node]
    }
    set(node: number, value: V): void {
        this.values[node] = value
    }
    release(node: number): void {
        this.values[node] = undefined
    }
    resized(capacity: number): ReferenceColumn<V> {
        let values = new Array<V | undefined>(capacity)
        for (let i = 0; i < this.values.length; i++) {
            values[i] = this.values[i]
        }
        return new ReferenceColumn(values)
    }
}

class Int64Column implements ValueColumn<bigint> {
    constructor(private readonly values: BigInt64Array) { }

    get(node: number): bigint {
        return this.values[node]
    }
    set(node: number, value: bigint): void {
        this.values[node] = value
    }
    release(node: number): void {
        this.values[node] = 0n
    }
    resized(capacity: number): Int64Column {
        let values = new BigInt64Array(capacity)
        values.set(this.values)
        return new Int64Column(values)
    }
}

/**
 * Hash map from signed 64-bit keys to values of type V, resolving collisions
 * by separate chaining.
 *
 * Chain nodes live in an index-addressed pool: a bucket holds the pool index
 * of its first node and every node the index of its successor. Removed nodes
 * are put on a free list and reused.
 *
 * The map only keeps a reference to each value. It never copies, disposes or
 * otherwise takes ownership of it, neither on `remove` nor on `destroy`;
 * releasing whatever a value holds is up to the caller.
 */
export class ChainingMap<V> {
    protected readonly config: GrowingTableConfig
    private readonly hash: HashFunction

    private buckets: Int32Array
    private keys: BigInt64Array
    private next: Int32Array
    private values: ValueColumn<V>
    private freeList: number = NIL
    private used: number = 0
    private count: number = 0
    private destroyed: boolean = false

    constructor(options: GrowingTableOptions = {}) {
        this.config = resolveGrowingOptions("bucket array", options)
        this.hash = options.hash ?? foldHash
        const { capacity, maxCapacity } = this.config
        this.buckets = allocate("bucket array", capacity, maxCapacity, c => new Int32Array(c).fill(NIL))
        this.keys = allocate("entry pool", capacity, maxCapacity, c => new BigInt64Array(c))
        this.next = allocate("entry pool", capacity, maxCapacity, c => new Int32Array(c))
        this.values = allocate("entry pool", capacity, maxCapacity, c => this.createValues(c))
    }

    protected createValues(capacity: number): ValueColumn<V> {
        return ReferenceColumn.create<V>(capacity)
    }

    get size(): number {
        return this.count
    }

    get capacity(): number {
        return this.buckets.length
    }

    upsert(key: bigint, value: V): UpsertResult {
        this.checkAlive()
        assertInt64(key)
        let node = this.find(key)
        if (node !== NIL) {
            this.values.set(node, value)
            return "updated"
        }
        // both allocations happen before anything observable changes
        this.reserveNode()
        if (shouldGrow(this.count, this.capacity, this.config.loadFactor)) {
            this.grow()
        }
        node = this.takeNode()
        let index = bucketIndex(this.hash, key, this.capacity)
        this.keys[node] = key
        this.values.set(node, value)
        this.next[node] = this.buckets[index]
        this.buckets[index] = node
        this.count++
        return "inserted"
    }

    get(key: bigint): V | undefined {
        this.checkAlive()
        assertInt64(key)
        let node = this.find(key)
        return node === NIL ? undefined : this.values.get(node)
    }

    has(key: bigint): boolean {
        this.checkAlive()
        assertInt64(key)
        return this.find(key) !== NIL
    }

    remove(key: bigint): boolean {
        this.checkAlive()
        assertInt64(key)
        let index = bucketIndex(this.hash, key, this.capacity)
        let prev = NIL
        for (let node = this.buckets[index]; node !== NIL; node = this.next[node]) {
            if (this.keys[node] === key) {
                if (prev === NIL) {
                    this.buckets[index] = this.next[node]
                } else {
                    this.next[prev] = this.next[node]
                }
                this.values.release(node)
                this.next[node] = this.freeList
                this.freeList = node
                this.count--
                return true
            }
            prev = node
        }
        return false
    }

    /**
     * Drops every chain node and the bucket array. Values are not touched.
     */
    destroy(): void {
        this.buckets = new Int32Array(0)
        this.keys = new BigInt64Array(0)
        this.next = new Int32Array(0)
        this.values = this.createValues(0)
        this.freeList = NIL
        this.used = 0
        this.count = 0
        this.destroyed = true
    }

    private checkAlive(): void {
        if (this.destroyed) {
            throw new DestroyedTableError()
        }
    }

    private find(key: bigint): number {
        let index = bucketIndex(this.hash, key, this.capacity)
        for (let node = this.buckets[index]; node !== NIL; node = this.next[node]) {
            if (this.keys[node] === key) {
                return node
            }
        }
        return NIL
    }

    private reserveNode(): void {
        if (this.freeList !== NIL || this.used < this.keys.length) {
            return
        }
        let poolSize = Math.min(this.keys.length * 2, this.config.maxCapacity)
        let pool = allocate("entry pool", poolSize, this.config.maxCapacity, c => {
            let keys = new BigInt64Array(c)
            keys.set(this.keys)
            let next = new Int32Array(c)
            next.set(this.next)
            return { keys, next, values: this.values.resized(c) }
        })
        this.keys = pool.keys
        this.next = pool.next
        this.values = pool.values
        log.chaining("entry pool grown to %d nodes", poolSize)
    }

    private takeNode(): number {
        if (this.freeList !== NIL) {
            let node = this.freeList
            this.freeList = this.next[node]
            return node
        }
        return this.used++
    }

    private grow(): void {
        let oldCapacity = this.capacity
        let newCapacity = oldCapacity * 2
        let buckets: Int32Array
        try {
            buckets = allocate("bucket array", newCapacity, this.config.maxCapacity, c => new Int32Array(c).fill(NIL))
        } catch (e) {
            log.chaining("resize to %d buckets failed: %O", newCapacity, e)
            throw e
        }
        for (let i = 0; i < oldCapacity; i++) {
            let node = this.buckets[i]
            while (node !== NIL) {
                let following = this.next[node]
                let index = bucketIndex(this.hash, this.keys[node], newCapacity)
                this.next[node] = buckets[index]
                buckets[index] = node
                node = following
            }
        }
        this.buckets = buckets
        log.chaining("resized from %d to %d buckets", oldCapacity, newCapacity)
    }
}

/**
 * Chaining map whose values are signed 64-bit integers stored inline in the
 * entry pool.
 */
export class Int64Map extends ChainingMap<bigint> {
    protected override createValues(capacity: number): ValueColumn<bigint> {
        return new Int64Column(new BigInt64Array(capacity))
    }

    override upsert(key: bigint, value: bigint): UpsertResult {
        assertInt64(value, "value")
        return super.upsert(key, value)
    }
}
