/**
 * Subroutine codecs: the fixed-width binary form and the text assembly form
 */

export * from './src/binary/instruction'
export * from './src/binary/operand'
export * from './src/binary/subroutine'
export * from './src/core/fixed-length'
export * from './src/text/parser'
export * from './src/text/printer'
