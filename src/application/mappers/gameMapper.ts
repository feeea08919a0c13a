import { loadTeam } from '@/domain/database'
import { basesOccupied, isFinished } from '@/domain/game'
import { inningWord, isPregame } from '@/domain/inning'
import { teamName } from '@/domain/team'
import type { Database, Game, GameTeam } from '@/domain/types'

export interface GameSideView {
  id: string
  name: string
  runs: number
  runsByInning: number[]
}

export interface GameView {
  id: string
  away: GameSideView
  home: GameSideView
  inning: string
  count: string
  outs: number
  bases: [boolean, boolean, boolean]
  lastUpdate: string
  finished: boolean
  winnerName: string | null
}

const toSideView = (side: GameTeam, database: Database): GameSideView => ({
  id: side.id,
  name: teamName(loadTeam(database, side.id)),
  runs: side.runs,
  runsByInning: [...side.runsByInning],
})

export const toGameView = (game: Game, database: Database): GameView => {
  const occupied = basesOccupied(game)
  const away = toSideView(game.teams.away, database)
  const home = toSideView(game.teams.home, database)

  return {
    id: game.id,
    away,
    home,
    inning: isPregame(game.inning) ? 'Pregame' : `${inningWord(game.inning)} ${game.inning.number}`,
    count: `${game.balls}-${game.strikes}`,
    outs: game.outs,
    bases: [occupied.has(1), occupied.has(2), occupied.has(3)],
    lastUpdate: game.lastUpdate,
    finished: isFinished(game),
    winnerName: game.winner === null ? null : game.winner === away.id ? away.name : home.name,
  }
}
