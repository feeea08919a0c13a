import type { GameId, PlayerId } from '@/domain/types'

export type EntityKind = 'player' | 'team' | 'game'

export type DatabaseProblem =
  | { kind: 'nil-id'; entity: EntityKind }
  | { kind: 'key-mismatch'; entity: 'player' | 'team'; key: string; id: string }
  | { kind: 'bad-reference'; entity: 'player' | 'team'; id: string }
  | { kind: 'duplicate-player'; playerId: PlayerId }
  | { kind: 'duplicate-game'; gameId: GameId }
  | { kind: 'shared-base'; gameId: GameId; base: number }

export const describeProblem = (problem: DatabaseProblem): string => {
  switch (problem.kind) {
    case 'nil-id':
      return `${problem.entity} has a nil id`
    case 'key-mismatch':
      return `${problem.entity} stored under ${problem.key} has id ${problem.id}`
    case 'bad-reference':
      return `reference to unknown ${problem.entity} ${problem.id}`
    case 'duplicate-player':
      return `player ${problem.playerId} appears more than once on a roster`
    case 'duplicate-game':
      return `game ${problem.gameId} is scheduled more than once`
    case 'shared-base':
      return `game ${problem.gameId} has two runners on base ${problem.base}`
  }
}

export class ValidationError extends Error {
  readonly details?: unknown

  constructor(message: string, details?: unknown) {
    super(message)
    this.name = 'ValidationError'
    this.details = details
  }
}

export class DatabaseError extends ValidationError {
  readonly problems: DatabaseProblem[]

  constructor(problems: DatabaseProblem[]) {
    super(problems.map(describeProblem).join('; '), problems)
    this.name = 'DatabaseError'
    this.problems = problems
  }
}

export class ImportError extends Error {
  readonly cause?: unknown

  constructor(message: string, cause?: unknown) {
    super(message)
    this.name = 'ImportError'
    this.cause = cause
  }
}

/**
 * A state the engine should never reach when every mutation went through the
 * database checks. Not meant to be caught and retried.
 */
export class SimInvariantError extends Error {
  readonly details?: unknown

  constructor(message: string, details?: unknown) {
    super(message)
    this.name = 'SimInvariantError'
    this.details = details
  }
}
