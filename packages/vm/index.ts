export * from './src/config'
export * from './src/executor'
export * from './src/instructions/base'
export * from './src/instructions/registry'
export * from './src/memory'
export * from './src/processors/recording'
export * from './src/vm'
