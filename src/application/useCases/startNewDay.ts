import { newDayPayloadSchema } from '@/application/contracts'
import type { SimRepository } from '@/application/simRepository'
import { ValidationError } from '@/domain/errors'
import { createGame } from '@/domain/game'
import { startDay } from '@/domain/sim'
import type { Game, SimDate } from '@/domain/types'

export interface StartNewDayResult {
  games: Game[]
  previousDate: SimDate
  previousGames: Game[]
}

export const startNewDay = async (repository: SimRepository, input: unknown): Promise<StartNewDayResult> => {
  const parsed = newDayPayloadSchema.safeParse(input)
  if (!parsed.success) {
    throw new ValidationError('Day rejected: schema validation failed', parsed.error.flatten())
  }

  return repository.transaction(async (current) => {
    if (!current) {
      throw new ValidationError('No simulation loaded')
    }

    const games = parsed.data.matchups.map((matchup) => createGame(matchup))
    const { previousDate, previousGames } = startDay(current, parsed.data.date, games)

    return {
      nextState: current,
      result: { games, previousDate, previousGames },
    }
  })
}
