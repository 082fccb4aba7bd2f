/**
 * Calculator Serialization Package
 *
 * Fixed-length little-endian integer codec and the instruction payload codec
 */

export * from './calculator/instruction'
export * from './core/fixed-length'
