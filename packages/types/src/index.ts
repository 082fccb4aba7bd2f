/**
 * Centralized Type Definitions for the calculator program
 *
 * Single source of truth for the interfaces, types and enums used
 * across the workspace packages.
 */

export * from './calculator'
export * from './codec'
export * from './errors'
export * from './safe'
