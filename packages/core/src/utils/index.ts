/**
 * Utility exports for the calculator core
 */

// Byte array helpers
export * from './buffer'
// Encoding utilities
export * from './encoding'
// Validation utilities
export * from './validation'
