import { AllocationError, InvalidKeyError } from "./tableerrors"

export type HashFunction = (key: bigint) => bigint

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

export function isInt64(value: bigint): boolean {
    return value >= INT64_MIN && value <= INT64_MAX
}

export function assertInt64(value: bigint, role: "key" | "value" = "key"): void {
    if (!isInt64(value)) {
        throw new InvalidKeyError(value, role)
    }
}

// folds the sign away, bucket = |key| mod capacity
export function foldHash(key: bigint): bigint {
    return key < 0n ? -key : key
}

// splitmix64 finalizer
export function mixHash(key: bigint): bigint {
    let x = BigInt.asUintN(64, key)
    x = BigInt.asUintN(64, ((x >> 30n) ^ x) * 0xbf58476d1ce4e5b9n)
    x = BigInt.asUintN(64, ((x >> 27n) ^ x) * 0x94d049bb133111ebn)
    return (x >> 31n) ^ x
}

export function bucketIndex(hash: HashFunction, key: bigint, capacity: number): number {
    return Number(BigInt.asUintN(64, hash(key)) % BigInt(capacity))
}

export function shouldGrow(size: number, capacity: number, loadFactor: number): boolean {
    return (size + 1) / capacity > loadFactor
}

/**
 * Obtains a backing store through `make`. Nothing is allocated when the
 * requested capacity is above `maxCapacity`; a RangeError thrown by the
 * runtime while allocating is reported the same way.
 */
export function allocate<T>(what: string, capacity: number, maxCapacity: number, make: (capacity: number) => T): T {
    if (capacity > maxCapacity) {
        throw new AllocationError(what, capacity, `exceeds maximum capacity ${maxCapacity}`)
    }
    try {
        return make(capacity)
    } catch (e) {
        if (e instanceof RangeError) {
            throw new AllocationError(what, capacity, e.message)
        }
        throw e
    }
}
