import { newId } from '@/domain/ids'
import type { Prng } from '@/domain/prng'
import { PLAYER_ATTRIBUTES } from '@/domain/types'
import type { NamePools, Player, PlayerAttributes } from '@/domain/types'

const rangeOf = (start: number, end: number): number[] =>
  Array.from({ length: Math.max(0, end - start) }, (_, index) => start + index)

const SOUL_VALUES = rangeOf(2, 10)
const FATE_VALUES = rangeOf(0, 100)
const FLAVOR_VALUES = rangeOf(0, 13)
const PEANUT_VALUES = [true, false] as const

const rollAttributes = (prng: Prng): PlayerAttributes => {
  const attributes = {} as PlayerAttributes
  for (const attribute of PLAYER_ATTRIBUTES) {
    attributes[attribute] = prng.next()
  }
  return attributes
}

/**
 * Draw order is fixed: attributes, soul, peanut allergy, fate, ritual, blood,
 * coffee. The ritual draw happens even with an empty pool.
 */
export const generatePlayerWithName = (prng: Prng, name: string, rituals: readonly string[] = []): Player => {
  const attributes = rollAttributes(prng)
  const soul = prng.choose(SOUL_VALUES) ?? 0
  const peanutAllergy = prng.choose(PEANUT_VALUES) ?? false
  const fate = prng.choose(FATE_VALUES) ?? 0
  const ritual = prng.choose(rituals) ?? ''
  const blood = prng.choose(FLAVOR_VALUES) ?? 0
  const coffee = prng.choose(FLAVOR_VALUES) ?? 0

  return {
    id: newId(),
    name,
    ...attributes,
    soul,
    peanutAllergy,
    fate,
    blood,
    coffee,
    ritual,
  }
}

export const generatePlayer = (prng: Prng, pools: NamePools): Player => {
  const firstName = prng.choose(pools.firstNames) ?? 'Unnamed'
  const lastName = prng.choose(pools.lastNames) ?? 'Player'
  return generatePlayerWithName(prng, `${firstName} ${lastName}`, pools.rituals)
}
