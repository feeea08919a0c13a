import type { DatabaseProblem } from '@/domain/errors'
import { isNilId } from '@/domain/ids'
import { rosterPlayerIds } from '@/domain/team'
import type { Database, Game, Player, PlayerId, Team } from '@/domain/types'

export const playerProblems = (player: Player): DatabaseProblem[] => {
  const problems: DatabaseProblem[] = []
  if (isNilId(player.id)) {
    problems.push({ kind: 'nil-id', entity: 'player' })
  }
  return problems
}

export const teamProblems = (team: Team, database: Database): DatabaseProblem[] => {
  const problems: DatabaseProblem[] = []
  if (isNilId(team.id)) {
    problems.push({ kind: 'nil-id', entity: 'team' })
  }

  const roster = new Map<PlayerId, number>()
  for (const playerId of rosterPlayerIds(team)) {
    roster.set(playerId, (roster.get(playerId) ?? 0) + 1)
  }

  for (const [playerId, count] of roster) {
    if (!database.players.has(playerId)) {
      problems.push({ kind: 'bad-reference', entity: 'player', id: playerId })
    }
    if (count > 1) {
      problems.push({ kind: 'duplicate-player', playerId })
    }
  }
  return problems
}

export const gameProblems = (game: Game, database: Database): DatabaseProblem[] => {
  const problems: DatabaseProblem[] = []
  if (isNilId(game.id)) {
    problems.push({ kind: 'nil-id', entity: 'game' })
  }

  const teamIds = [game.teams.away.id, game.teams.home.id]
  if (game.winner !== null) {
    teamIds.unshift(game.winner)
  }
  for (const teamId of teamIds) {
    if (!database.teams.has(teamId)) {
      problems.push({ kind: 'bad-reference', entity: 'team', id: teamId })
    }
  }

  const playerIds: PlayerId[] = []
  if (game.atBat !== null) {
    playerIds.push(game.atBat)
  }
  playerIds.push(...game.baserunners.map((runner) => runner.playerId))
  for (const side of [game.teams.away, game.teams.home]) {
    if (side.pitcher !== null) {
      playerIds.push(side.pitcher)
    }
  }
  for (const playerId of playerIds) {
    if (!database.players.has(playerId)) {
      problems.push({ kind: 'bad-reference', entity: 'player', id: playerId })
    }
  }

  const occupied = new Set<number>()
  for (const runner of game.baserunners) {
    if (occupied.has(runner.base)) {
      problems.push({ kind: 'shared-base', gameId: game.id, base: runner.base })
    }
    occupied.add(runner.base)
  }
  return problems
}

/**
 * Runs every database invariant and reports all violations, not just the first.
 */
export const checkConsistency = (database: Database): DatabaseProblem[] => {
  const problems: DatabaseProblem[] = []

  for (const [key, player] of database.players) {
    if (key !== player.id) {
      problems.push({ kind: 'key-mismatch', entity: 'player', key, id: player.id })
    }
    problems.push(...playerProblems(player))
  }

  for (const [key, team] of database.teams) {
    if (key !== team.id) {
      problems.push({ kind: 'key-mismatch', entity: 'team', key, id: team.id })
    }
    problems.push(...teamProblems(team, database))
  }

  const gameIds = new Set<string>()
  for (const game of database.gamesToday) {
    if (gameIds.has(game.id)) {
      problems.push({ kind: 'duplicate-game', gameId: game.id })
    }
    gameIds.add(game.id)
    problems.push(...gameProblems(game, database))
  }

  return problems
}
