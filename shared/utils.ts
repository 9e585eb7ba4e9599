export function range(limit: number): Iterable<number>;
export function range(start: number, limit: number, step?: number): Iterable<number>;
export function* range(a: number, b?: number, step: number = 1): Iterable<number> {
    let start: number
    let limit: number
    if (b === undefined) {
        start = 0
        limit = a
    } else {
        start = a
        limit = b
    }
    for (let i = start; i < limit; i += step) {
        yield i
    }
}

export function bigintRange(start: number, limit: number, step: number = 1): bigint[] {
    return Array.from(range(start, limit, step), i => BigInt(i))
}
