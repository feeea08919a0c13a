import type { SimSave, SimSaveDocument } from '@/application/contracts'
import type { SimConfigOverrides } from '@/domain/config'
import { createDatabase } from '@/domain/database'
import { ImportError, describeProblem } from '@/domain/errors'
import { compareIds } from '@/domain/ids'
import { checkConsistency } from '@/domain/invariants'
import { restorePrng } from '@/domain/prng'
import { createSim } from '@/domain/sim'
import type { Sim } from '@/domain/sim'

const sortedRecord = <T>(entries: Map<string, T>): Record<string, T> =>
  Object.fromEntries(
    [...entries.entries()]
      .sort(([left], [right]) => compareIds(left, right))
      .map(([key, value]): [string, T] => [key, structuredClone(value)]),
  )

export const toSimSave = (sim: Sim): SimSaveDocument => {
  const { database } = sim
  const rng = sim.prng.snapshot()

  return {
    season: database.date.season,
    day: database.date.day,
    firstNames: [...database.firstNames],
    lastNames: [...database.lastNames],
    rituals: [...database.rituals],
    players: sortedRecord(database.players),
    teams: sortedRecord(database.teams),
    gamesToday: database.gamesToday.map((game) => structuredClone(game)),
    rng: {
      state: [rng.state[0].toString(), rng.state[1].toString()],
      buffer: rng.buffer.map((value) => value.toString()),
    },
  }
}

/**
 * Rebuilds a running simulation from a parsed save. The schema only checks
 * shapes, so cross references are checked here and every problem is reported.
 */
export const fromSimSave = (save: SimSave, config?: SimConfigOverrides): Sim => {
  const database = createDatabase()
  database.date = { season: save.season, day: save.day }
  database.firstNames = save.firstNames
  database.lastNames = save.lastNames
  database.rituals = save.rituals
  database.players = new Map(Object.entries(save.players))
  database.teams = new Map(Object.entries(save.teams))
  database.gamesToday = save.gamesToday

  const problems = checkConsistency(database)
  if (problems.length > 0) {
    throw new ImportError(`Save rejected: ${problems.map(describeProblem).join('; ')}`, problems)
  }

  return createSim({
    prng: restorePrng({ state: save.rng.state, buffer: save.rng.buffer }),
    database,
    config,
  })
}
