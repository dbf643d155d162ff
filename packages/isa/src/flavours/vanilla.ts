import { CORE_OPCODES, VANILLA_GATE_OPCODES } from '../config'
import { defineFlavour } from './define'

/** Unrestricted gate set; every gate is native */
export const VANILLA_FLAVOUR = defineFlavour({
  name: 'vanilla',
  opcodes: { ...CORE_OPCODES, ...VANILLA_GATE_OPCODES },
  nativeGates: [
    'x',
    'y',
    'z',
    'h',
    's',
    'k',
    't',
    'rot_x',
    'rot_y',
    'rot_z',
    'cnot',
    'cphase',
  ],
  decompositions: {},
  maxArrayAddress: 1023,
  angleExponent: null,
  maxAngleExponent: 7,
})
