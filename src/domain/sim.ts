import { createSimConfig } from '@/domain/config'
import type { SimConfig, SimConfigOverrides } from '@/domain/config'
import { assertConsistency, createDatabase, insertPlayer, insertTeam, startDay as startDatabaseDay } from '@/domain/database'
import type { DayRollover } from '@/domain/database'
import { isFinished } from '@/domain/game'
import { tickGame } from '@/domain/gameTick'
import { createUnseededPrng } from '@/domain/prng'
import type { Prng } from '@/domain/prng'
import type { Database, Game, NamePools, Player, PlayerId, SimDate, Team, TeamId } from '@/domain/types'

export interface Sim {
  prng: Prng
  database: Database
  config: SimConfig
}

export interface CreateSimOptions {
  prng?: Prng
  database?: Database
  config?: SimConfigOverrides
}

export const createSim = (options: CreateSimOptions = {}): Sim => ({
  prng: options.prng ?? createUnseededPrng(),
  database: options.database ?? createDatabase(),
  config: createSimConfig(options.config),
})

const debugCheck = (sim: Sim) => {
  if (sim.config.consistencyChecks) {
    assertConsistency(sim.database)
  }
}

export const addPlayer = (sim: Sim, player: Player): void => {
  insertPlayer(sim.database, player)
  debugCheck(sim)
}

export const addTeam = (sim: Sim, team: Team): void => {
  insertTeam(sim.database, team)
  debugCheck(sim)
}

export const setNamePools = (sim: Sim, pools: Partial<NamePools>): void => {
  sim.database.firstNames = [...(pools.firstNames ?? sim.database.firstNames)]
  sim.database.lastNames = [...(pools.lastNames ?? sim.database.lastNames)]
  sim.database.rituals = [...(pools.rituals ?? sim.database.rituals)]
}

/**
 * Swaps in a new day of games after checking their references. The previous
 * date and games come back to the caller for archiving.
 */
export const startDay = (sim: Sim, date: SimDate, games: Game[]): DayRollover => {
  const rollover = startDatabaseDay(sim.database, date, games)
  sim.config.logger.info(
    '[sim] started day',
    `${date.season}/${date.day}`,
    'with',
    games.length,
    'games; archived',
    rollover.previousGames.length,
  )
  debugCheck(sim)
  return rollover
}

/**
 * Resolves one event in every unfinished game today. Each game is taken out of
 * the list while it runs, so its event has the prng and database to itself,
 * then returned to the same position.
 */
export const tick = (sim: Sim): void => {
  const games = sim.database.gamesToday
  for (let index = 0; index < games.length; index += 1) {
    if (isFinished(games[index])) {
      continue
    }

    const [game] = games.splice(index, 1)
    try {
      game.lastUpdate = tickGame(game, sim.prng, sim.database, sim.config)
    } finally {
      games.splice(index, 0, game)
    }
  }

  debugCheck(sim)
}

export const players = (sim: Sim): ReadonlyMap<PlayerId, Readonly<Player>> => sim.database.players

export const teams = (sim: Sim): ReadonlyMap<TeamId, Readonly<Team>> => sim.database.teams

export const gamesToday = (sim: Sim): ReadonlyArray<Readonly<Game>> => sim.database.gamesToday

export const currentDate = (sim: Sim): Readonly<SimDate> => sim.database.date
