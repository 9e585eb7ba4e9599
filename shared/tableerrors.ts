export type HashTableErrorKind =
    | "AllocationError"
    | "InvalidConfiguration"
    | "CapacityExhausted"
    | "InvalidKey"
    | "Destroyed"

export class HashTableError extends Error {
    constructor(readonly kind: HashTableErrorKind, message: string) {
        super(message)
        this.name = kind
    }
}

// the table is left exactly as it was before the failing call
export class AllocationError extends HashTableError {
    constructor(readonly what: string, readonly requested: number, reason: string) {
        super("AllocationError", `Cannot allocate ${what} of capacity ${requested}: ${reason}`)
    }
}

export class InvalidConfigurationError extends HashTableError {
    constructor(readonly issues: string[]) {
        super("InvalidConfiguration", `Invalid table configuration: ${issues.join("; ")}`)
    }
}

export class CapacityExhaustedError extends HashTableError {
    constructor(readonly capacity: number, readonly size: number) {
        super("CapacityExhausted", `No free slot reachable in a table of capacity ${capacity} holding ${size} keys`)
    }
}

export class InvalidKeyError extends HashTableError {
    constructor(readonly value: bigint, role: "key" | "value" = "key") {
        super("InvalidKey", `${role} ${value} is not a signed 64-bit integer`)
    }
}

export class DestroyedTableError extends HashTableError {
    constructor() {
        super("Destroyed", "Table has been destroyed")
    }
}
