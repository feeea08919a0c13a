import { newId } from '@/domain/ids'
import { PREGAME_INNING } from '@/domain/inning'
import type { AwayHome, Game, GameTeam, TeamId } from '@/domain/types'

export const HOME_BASE = 4

export const createGameTeam = (id: TeamId): GameTeam => ({
  id,
  runs: 0,
  runsByInning: [],
  pitcher: null,
  lineupSlot: 0,
})

export const createGame = (teams: AwayHome<TeamId>, id = newId()): Game => ({
  id,
  winner: null,
  lastUpdate: '',
  teams: {
    away: createGameTeam(teams.away),
    home: createGameTeam(teams.home),
  },
  inning: { ...PREGAME_INNING },
  atBat: null,
  balls: 0,
  strikes: 0,
  outs: 0,
  baserunners: [],
})

export const isFinished = (game: Game): boolean => game.winner !== null

export const basesOccupied = (game: Game): Set<number> => new Set(game.baserunners.map((runner) => runner.base))

/** Bases a runner on `base` has behind them, first base up. */
export const basesBehind = (base: number): number[] =>
  Array.from({ length: Math.max(0, base - 1) }, (_, index) => index + 1)

const ordinalSuffix = (value: number): string => {
  const lastTwo = value % 100
  if (lastTwo >= 11 && lastTwo <= 13) {
    return 'th'
  }
  switch (value % 10) {
    case 1:
      return 'st'
    case 2:
      return 'nd'
    case 3:
      return 'rd'
    default:
      return 'th'
  }
}

export const describeBase = (base: number, homeBase = HOME_BASE): string => {
  if (base === homeBase) {
    return 'home'
  }
  switch (base) {
    case 1:
      return 'first base'
    case 2:
      return 'second base'
    case 3:
      return 'third base'
    case 4:
      return 'fourth base'
    default:
      return `${base}${ordinalSuffix(base)} base`
  }
}
