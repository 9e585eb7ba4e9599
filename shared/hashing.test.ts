import { describe, expect, test } from '@jest/globals';
import { allocate, assertInt64, bucketIndex, foldHash, isInt64, mixHash, shouldGrow } from './hashing';
import { AllocationError, InvalidKeyError } from './tableerrors';

describe('hashing', () => {
    test('fold_hash_drops_sign', () => {
        expect(foldHash(17n)).toBe(17n)
        expect(foldHash(-17n)).toBe(17n)
        expect(foldHash(-(2n ** 63n))).toBe(2n ** 63n)
    })

    test('mix_hash_known_values', () => {
        expect(mixHash(0n)).toBe(0n)
        expect(mixHash(1n)).toBe(6238072747940578789n)
        expect(mixHash(-1n)).toBe(13029008266876403067n)
    })

    test('bucket_index_depends_on_capacity', () => {
        expect(bucketIndex(mixHash, 1n, 16)).toBe(5)
        expect(bucketIndex(mixHash, 1n, 10)).toBe(9)
        expect(bucketIndex(mixHash, 17n, 16)).toBe(14)
        expect(bucketIndex(foldHash, 33n, 16)).toBe(1)
        expect(bucketIndex(foldHash, -33n, 16)).toBe(1)
    })

    test('bucket_index_wraps_negative_hashes', () => {
        expect(bucketIndex(k => k, -1n, 16)).toBe(15)
    })

    test('grow_threshold', () => {
        expect(shouldGrow(11, 16, 0.75)).toBe(false)
        expect(shouldGrow(12, 16, 0.75)).toBe(true)
        expect(shouldGrow(7, 10, 0.75)).toBe(true)
        expect(shouldGrow(6, 10, 0.75)).toBe(false)
    })

    test('int64_range', () => {
        expect(isInt64(2n ** 63n - 1n)).toBe(true)
        expect(isInt64(-(2n ** 63n))).toBe(true)
        expect(isInt64(2n ** 63n)).toBe(false)
        expect(() => assertInt64(2n ** 64n)).toThrow(InvalidKeyError)
        expect(() => assertInt64(2n ** 64n, "value")).toThrow("value 18446744073709551616 is not a signed 64-bit integer")
    })

    test('allocate_above_max_capacity', () => {
        let calls = 0
        const make = (c: number) => {
            calls++
            return new Int32Array(c)
        }
        expect(() => allocate("bucket array", 32, 16, make)).toThrow(AllocationError)
        expect(calls).toBe(0)
        expect(allocate("bucket array", 16, 16, make).length).toBe(16)
    })

    test('allocate_reports_range_errors', () => {
        expect(() => allocate("slot array", 4, 16, () => { throw new RangeError("Invalid typed array length") }))
            .toThrow("Cannot allocate slot array of capacity 4: Invalid typed array length")
        expect(() => allocate("slot array", 4, 16, () => { throw new TypeError("other") })).toThrow(TypeError)
    })
})
