import { toGameView } from '@/application/mappers/gameMapper'
import type { GameView } from '@/application/mappers/gameMapper'
import type { SimRepository } from '@/application/simRepository'
import { ValidationError } from '@/domain/errors'
import { tick } from '@/domain/sim'

export const advanceSimulation = async (repository: SimRepository): Promise<GameView[]> => {
  return repository.transaction(async (current) => {
    if (!current) {
      throw new ValidationError('No simulation loaded')
    }

    tick(current)

    return {
      nextState: current,
      result: current.database.gamesToday.map((game) => toGameView(game, current.database)),
    }
  })
}
