export * from './src/angle'
export * from './src/config'
export * from './src/flavours'
export * from './src/operands'
export * from './src/rotations'
export * from './src/shape'
export * from './src/subroutine'
export * from './src/unitary'
