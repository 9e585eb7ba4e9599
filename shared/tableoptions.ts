import { z } from "zod"
import { HashFunction } from "./hashing"
import { AllocationError, InvalidConfigurationError } from "./tableerrors"

export const DEFAULT_CAPACITY = 16
export const DEFAULT_LOAD_FACTOR = 0.75
export const DEFAULT_MAX_CAPACITY = 2 ** 30

const capacitySchema = z.number().int().positive()

const tableSchema = z.object({
    capacity: capacitySchema.default(DEFAULT_CAPACITY),
    maxCapacity: capacitySchema.default(DEFAULT_MAX_CAPACITY),
})

const fixedTableSchema = tableSchema.extend({
    compactOnExhaustion: z.boolean().default(false),
})

const growingTableSchema = tableSchema.extend({
    loadFactor: z.number()
        .gt(0, "load factor must be greater than 0")
        .lt(1, "load factor must be less than 1")
        .default(DEFAULT_LOAD_FACTOR),
})

export type TableConfig = z.output<typeof tableSchema>
export type FixedTableConfig = z.output<typeof fixedTableSchema>
export type GrowingTableConfig = z.output<typeof growingTableSchema>

export interface TableOptions {
    capacity?: number
    maxCapacity?: number
    hash?: HashFunction
}

export interface FixedTableOptions extends TableOptions {
    // rebuild in place and retry once when tombstones have used up every free slot
    compactOnExhaustion?: boolean
}

export interface GrowingTableOptions extends TableOptions {
    loadFactor?: number
}

function parse<S extends z.ZodTypeAny>(schema: S, options: unknown): z.output<S> {
    const result = schema.safeParse(options)
    if (!result.success) {
        throw new InvalidConfigurationError(
            result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
        )
    }
    return result.data
}

function checkInitialCapacity(what: string, config: TableConfig): void {
    if (config.capacity > config.maxCapacity) {
        throw new AllocationError(what, config.capacity, `exceeds maximum capacity ${config.maxCapacity}`)
    }
}

export function resolveFixedOptions(what: string, options: FixedTableOptions): FixedTableConfig {
    let config = parse(fixedTableSchema, {
        capacity: options.capacity,
        maxCapacity: options.maxCapacity,
        compactOnExhaustion: options.compactOnExhaustion,
    })
    checkInitialCapacity(what, config)
    return config
}

export function resolveGrowingOptions(what: string, options: GrowingTableOptions): GrowingTableConfig {
    let config = parse(growingTableSchema, {
        capacity: options.capacity,
        maxCapacity: options.maxCapacity,
        loadFactor: options.loadFactor,
    })
    checkInitialCapacity(what, config)
    return config
}
