import { simSaveSchema } from '@/application/contracts'
import type { SimSaveDocument } from '@/application/contracts'
import { fromSimSave, toSimSave } from '@/application/mappers/simMapper'
import { ImportError } from '@/domain/errors'
import { createGame } from '@/domain/game'
import { createPrng } from '@/domain/prng'
import { addPlayer, createSim, startDay, tick } from '@/domain/sim'
import { addRoster, makePlayer, makeTeam, testId } from '@/test/simFactory'

const quiet = { logger: { info: vi.fn(), warn: vi.fn() } }

const runningSim = () => {
  const sim = createSim({ prng: createPrng(99n, 100n), config: quiet })
  const away = addRoster(sim, { base: 100, location: 'Away', nickname: 'Visitors' })
  const home = addRoster(sim, { base: 200, location: 'Home', nickname: 'Hosts' })
  startDay(sim, { season: 4, day: 7 }, [createGame({ away: away.id, home: home.id }, testId(1))])
  for (let count = 0; count < 40; count += 1) {
    tick(sim)
  }
  return sim
}

const reload = (document: SimSaveDocument) => fromSimSave(simSaveSchema.parse(JSON.parse(JSON.stringify(document))), quiet)

describe('sim save round trip', () => {
  it('restores the database and the prng position', () => {
    const sim = runningSim()
    const document = toSimSave(sim)
    const restored = reload(document)

    expect(toSimSave(restored)).toEqual(document)
    expect(restored.database.players).toEqual(sim.database.players)
    expect(restored.database.gamesToday).toEqual(sim.database.gamesToday)
    expect(Array.from({ length: 70 }, () => restored.prng.next())).toEqual(
      Array.from({ length: 70 }, () => sim.prng.next()),
    )
  })

  it('keeps playing the same game after a reload', () => {
    const sim = runningSim()
    const restored = reload(toSimSave(sim))

    for (let count = 0; count < 25; count += 1) {
      tick(sim)
      tick(restored)
      expect(restored.database.gamesToday[0].lastUpdate).toBe(sim.database.gamesToday[0].lastUpdate)
    }
  })

  it('writes 64-bit words as decimal strings', () => {
    const sim = createSim({ prng: createPrng(18446744073709551615n, 1n), config: quiet })
    const document = toSimSave(sim)

    expect(document.rng.buffer).toHaveLength(64)
    expect(document.rng.buffer.every((word) => /^\d+$/.test(word))).toBe(true)
    expect(document.rng.state.every((word) => /^\d+$/.test(word))).toBe(true)
  })

  it('orders player and team records by id', () => {
    const sim = createSim({ config: quiet })
    addPlayer(sim, makePlayer(testId(3)))
    addPlayer(sim, makePlayer(testId(1)))
    addPlayer(sim, makePlayer(testId(2)))

    expect(Object.keys(toSimSave(sim).players)).toEqual([testId(1), testId(2), testId(3)])
  })

  it('detaches the document from the live simulation', () => {
    const sim = runningSim()
    const document = toSimSave(sim)
    tick(sim)

    expect(document.gamesToday[0]).not.toBe(sim.database.gamesToday[0])
    expect(document.players[testId(101)]).not.toBe(sim.database.players.get(testId(101)))
  })
})

describe('sim save parsing', () => {
  it('accepts legacy snake_case field names', () => {
    const document = toSimSave(runningSim())
    const { baseThirst, groundFriction, peanutAllergy, ...player } = document.players[testId(101)]
    const { rotationSlot, ...team } = document.teams[testId(100)]
    const [game] = document.gamesToday
    const { lastUpdate, atBat, teams, ...gameRest } = game
    const { runsByInning, lineupSlot, ...awayRest } = teams.away

    const legacy = {
      ...document,
      players: {
        ...document.players,
        [testId(101)]: { ...player, base_thirst: baseThirst, ground_friction: groundFriction, peanut_allergy: peanutAllergy },
      },
      teams: { ...document.teams, [testId(100)]: { ...team, rotation_slot: rotationSlot } },
      gamesToday: [
        {
          ...gameRest,
          last_update: lastUpdate,
          at_bat: atBat,
          teams: { home: teams.home, away: { ...awayRest, runs_by_inning: runsByInning, lineup_slot: lineupSlot } },
        },
      ],
    }

    const restored = fromSimSave(simSaveSchema.parse(legacy), quiet)

    expect(toSimSave(restored)).toEqual(document)
  })

  it('rejects words that do not fit in 64 bits', () => {
    const document = toSimSave(createSim({ config: quiet }))
    const result = simSaveSchema.safeParse({ ...document, rng: { ...document.rng, state: ['18446744073709551616', '1'] } })

    expect(result.success).toBe(false)
  })

  it('rejects a buffer longer than one batch', () => {
    const document = toSimSave(createSim({ config: quiet }))
    const result = simSaveSchema.safeParse({ ...document, rng: { ...document.rng, buffer: [...document.rng.buffer, '1'] } })

    expect(result.success).toBe(false)
  })

  it('reports every consistency problem in one error', () => {
    const document = toSimSave(createSim({ config: quiet }))
    const broken = {
      ...document,
      teams: {
        [testId(10)]: {
          id: testId(10),
          location: 'Ghost',
          nickname: 'Town',
          lineup: [testId(1), testId(2)],
        },
      },
    }

    let thrown: unknown
    try {
      fromSimSave(simSaveSchema.parse(broken), quiet)
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(ImportError)
    expect(thrown instanceof ImportError && thrown.message).toBe(
      `Save rejected: reference to unknown player ${testId(1)}; reference to unknown player ${testId(2)}`,
    )
  })
})

describe('sim save identifiers', () => {
  const lower = 'abcdef01-2345-4678-89ab-cdef01234567'
  const upper = lower.toUpperCase()

  it('matches a reference written in upper case to the stored player', () => {
    const document = toSimSave(createSim({ config: quiet }))
    const restored = fromSimSave(
      simSaveSchema.parse({
        ...document,
        players: { [lower]: makePlayer(lower) },
        teams: { [testId(10)]: makeTeam(testId(10), { lineup: [upper] }) },
      }),
      quiet,
    )

    expect(restored.database.teams.get(testId(10))?.lineup).toEqual([lower])
  })

  it('stores an upper-case record under its lower-case id', () => {
    const document = toSimSave(createSim({ config: quiet }))
    const restored = fromSimSave(
      simSaveSchema.parse({ ...document, players: { [upper]: makePlayer(upper) } }),
      quiet,
    )

    expect([...restored.database.players.keys()]).toEqual([lower])
    expect(restored.database.players.get(lower)?.id).toBe(lower)
  })

  it('rejects one id written in two cases', () => {
    const document = toSimSave(createSim({ config: quiet }))
    const result = simSaveSchema.safeParse({
      ...document,
      players: { [lower]: makePlayer(lower), [upper]: makePlayer(upper) },
    })

    expect(result.success).toBe(false)
    expect(result.success ? [] : result.error.issues.map((issue) => issue.message)).toEqual([
      `identifier ${lower} appears more than once`,
    ])
  })
})
