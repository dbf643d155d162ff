/**
 * Shared type definitions for the instruction set, the subroutine model,
 * the execution engine and its injected processor.
 */

export * from './encoding'
export * from './errors'
export * from './flavour'
export * from './isa'
export * from './operations'
export * from './processor'
export * from './safe'
export * from './subroutine'
export * from './vm'
