/**
 * Calculator Core Package
 *
 * Logging, environment configuration and encoding helpers shared by
 * the workspace packages
 */

// Export environment loading
export * from './env'
// Export logger
export * from './logger'
// Export all utilities
export * from './utils'
// Export Zod namespace
export * from './zod'
