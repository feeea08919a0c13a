import { generatePlayer, generatePlayerWithName } from '@/domain/generator'
import { createPrng } from '@/domain/prng'
import { PLAYER_ATTRIBUTES } from '@/domain/types'
import { scriptedPrng } from '@/test/simFactory'

describe('player generator', () => {
  it('fills attributes from the first 26 draws in declaration order', () => {
    const prng = createPrng(42n, 4242n)
    const twin = createPrng(42n, 4242n)

    const player = generatePlayerWithName(prng, 'Test Player')
    const expected = PLAYER_ATTRIBUTES.map(() => twin.next())

    expect(PLAYER_ATTRIBUTES.map((attribute) => player[attribute])).toEqual(expected)
  })

  it('draws exactly 32 values for a named player, ritual pool or not', () => {
    const withPool = createPrng(1n, 2n)
    const withoutPool = createPrng(1n, 2n)
    const twin = createPrng(1n, 2n)

    generatePlayerWithName(withPool, 'A', ['Yoga'])
    generatePlayerWithName(withoutPool, 'B')
    for (let index = 0; index < 32; index += 1) {
      twin.next()
    }

    expect(withPool.snapshot()).toEqual(twin.snapshot())
    expect(withoutPool.snapshot()).toEqual(twin.snapshot())
  })

  it('maps the trailing draws onto soul, allergy, fate, ritual, blood and coffee', () => {
    const draws = [...Array.from({ length: 26 }, () => 0.25), 0.5, 0.7, 0.995, 0.4, 0, 0.999]
    const player = generatePlayerWithName(scriptedPrng(draws), 'Scripted', ['Meditation', 'Juggling'])

    expect(player).toMatchObject({
      name: 'Scripted',
      thwackability: 0.25,
      cinnamon: 0.25,
      soul: 6,
      peanutAllergy: false,
      fate: 99,
      ritual: 'Meditation',
      blood: 0,
      coffee: 12,
    })
  })

  it('names generated players from the pools', () => {
    const player = generatePlayer(scriptedPrng([0.6, 0.1, ...Array.from({ length: 32 }, () => 0)]), {
      firstNames: ['Ada', 'Bea'],
      lastNames: ['Cole', 'Dunn'],
      rituals: [],
    })

    expect(player.name).toBe('Bea Cole')
    expect(player.ritual).toBe('')
  })

  it('falls back to a stock name with empty pools', () => {
    const player = generatePlayer(createPrng(1n, 2n), { firstNames: [], lastNames: [], rituals: [] })

    expect(player.name).toBe('Unnamed Player')
  })
})
