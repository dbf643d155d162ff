export * from './src/env'
export * from './src/errors'
export * from './src/logger'
export * from './src/utils/hex'
