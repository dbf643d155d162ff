import type { Flavour, FlavourName } from '@netq/types'
import { NV_FLAVOUR } from './nv'
import { VANILLA_FLAVOUR } from './vanilla'

export * from './define'
export * from './nv'
export * from './vanilla'

const FLAVOURS: Readonly<Record<FlavourName, Flavour>> = {
  vanilla: VANILLA_FLAVOUR,
  nv: NV_FLAVOUR,
}

export function getFlavour(name: FlavourName): Flavour {
  return FLAVOURS[name]
}

