import { DatabaseError, SimInvariantError, describeProblem } from '@/domain/errors'
import type { DatabaseProblem } from '@/domain/errors'
import { checkConsistency, gameProblems, playerProblems, teamProblems } from '@/domain/invariants'
import type { Database, Game, Player, PlayerId, SimDate, Team, TeamId } from '@/domain/types'

export interface DayRollover {
  previousDate: SimDate
  previousGames: Game[]
}

export const createDatabase = (): Database => ({
  date: { season: 0, day: 0 },
  firstNames: [],
  lastNames: [],
  rituals: [],
  teams: new Map(),
  players: new Map(),
  gamesToday: [],
})

const rejectIfAny = (problems: DatabaseProblem[]) => {
  if (problems.length > 0) {
    throw new DatabaseError(problems)
  }
}

export const insertPlayer = (database: Database, player: Player): void => {
  rejectIfAny(playerProblems(player))
  database.players.set(player.id, structuredClone(player))
}

export const insertTeam = (database: Database, team: Team): void => {
  rejectIfAny(teamProblems(team, database))
  database.teams.set(team.id, structuredClone(team))
}

export const startDay = (database: Database, date: SimDate, games: Game[]): DayRollover => {
  const problems: DatabaseProblem[] = []
  const seen = new Set<string>()
  for (const game of games) {
    if (seen.has(game.id)) {
      problems.push({ kind: 'duplicate-game', gameId: game.id })
    }
    seen.add(game.id)
    problems.push(...gameProblems(game, database))
  }
  rejectIfAny(problems)

  const rollover = { previousDate: database.date, previousGames: database.gamesToday }
  database.date = { ...date }
  database.gamesToday = structuredClone(games)
  return rollover
}

// Callers must only pass ids that already passed a reference check; a miss
// here means the database went inconsistent.
export const loadPlayer = (database: Database, playerId: PlayerId): Player => {
  const player = database.players.get(playerId)
  if (!player) {
    throw new SimInvariantError(`Player ${playerId} not found`, { playerId })
  }
  return player
}

export const loadTeam = (database: Database, teamId: TeamId): Team => {
  const team = database.teams.get(teamId)
  if (!team) {
    throw new SimInvariantError(`Team ${teamId} not found`, { teamId })
  }
  return team
}

export const assertConsistency = (database: Database): void => {
  const problems = checkConsistency(database)
  if (problems.length > 0) {
    throw new SimInvariantError(`Database inconsistent: ${problems.map(describeProblem).join('; ')}`, problems)
  }
}
