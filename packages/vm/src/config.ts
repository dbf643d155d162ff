/**
 * Execution Engine Configuration
 */

import type { EprCreateField } from '@netq/isa'

export const VM_CONFIG = {
  DEFAULT_MAX_STEPS: 1_000_000,
  DEFAULT_QUBIT_CAPACITY: 32,
  MAX_ARRAY_LENGTH: 1 << 16,
  /** Bytes per array value in classical messages */
  MESSAGE_WORD_BYTES: 4,
} as const

// Values used for create_epr argument fields left undefined
export const EPR_CREATE_DEFAULTS: Readonly<Record<EprCreateField, number>> = {
  type: 0,
  number: 1,
  randomBasisLocal: 0,
  randomBasisRemote: 0,
  minimumFidelity: 0,
  timeUnit: 0,
  maxTime: 0,
  priority: 0,
  atomic: 0,
  consecutive: 0,
  probabilityDistLocal1: 0,
  probabilityDistLocal2: 0,
  probabilityDistRemote1: 0,
  probabilityDistRemote2: 0,
  rotationXLocal1: 0,
  rotationYLocal: 0,
  rotationXLocal2: 0,
  rotationXRemote1: 0,
  rotationYRemote: 0,
  rotationXRemote2: 0,
}
