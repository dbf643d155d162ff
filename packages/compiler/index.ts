/**
 * Program builder, compiler and session
 */

export * from './src/allocator'
export * from './src/builder'
export * from './src/compiler'
export * from './src/futures'
export * from './src/lower'
export * from './src/session'
export * from './src/transpile'
