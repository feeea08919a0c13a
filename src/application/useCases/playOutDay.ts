import type { SimRepository } from '@/application/simRepository'
import { ValidationError } from '@/domain/errors'
import { isFinished } from '@/domain/game'
import { tick } from '@/domain/sim'
import type { GameId } from '@/domain/types'

const DEFAULT_MAX_TICKS = 10_000

export interface PlayOutDayOptions {
  maxTicks?: number
}

export interface PlayOutDayResult {
  ticks: number
  complete: boolean
  playByPlay: Record<GameId, string[]>
}

/**
 * Ticks until every game today has a winner. Tied games go to extra innings,
 * so the loop stops at `maxTicks` and reports whether the day finished.
 */
export const playOutDay = async (
  repository: SimRepository,
  options: PlayOutDayOptions = {},
): Promise<PlayOutDayResult> => {
  const maxTicks = options.maxTicks ?? DEFAULT_MAX_TICKS

  return repository.transaction(async (current) => {
    if (!current) {
      throw new ValidationError('No simulation loaded')
    }

    const games = current.database.gamesToday
    const playByPlay: Record<GameId, string[]> = Object.fromEntries(
      games.map((game): [GameId, string[]] => [game.id, []]),
    )

    let ticks = 0
    while (ticks < maxTicks && !games.every(isFinished)) {
      const running = games.filter((game) => !isFinished(game))
      tick(current)
      ticks += 1
      for (const game of running) {
        playByPlay[game.id].push(game.lastUpdate)
      }
    }

    return {
      nextState: current,
      result: { ticks, complete: games.every(isFinished), playByPlay },
    }
  })
}
