import { entitiesPayloadSchema } from '@/application/contracts'
import type { SimRepository } from '@/application/simRepository'
import { ValidationError } from '@/domain/errors'
import { addPlayer, addTeam } from '@/domain/sim'
import type { PlayerId, TeamId } from '@/domain/types'

export interface AddEntitiesResult {
  playerIds: PlayerId[]
  teamIds: TeamId[]
}

/**
 * Adds raw player and team payloads in one go. Players land first so teams in
 * the same batch can list them; any rejection leaves the saved state as it was.
 */
export const addEntities = async (repository: SimRepository, input: unknown): Promise<AddEntitiesResult> => {
  const parsed = entitiesPayloadSchema.safeParse(input)
  if (!parsed.success) {
    throw new ValidationError('Entities rejected: schema validation failed', parsed.error.flatten())
  }

  return repository.transaction(async (current) => {
    if (!current) {
      throw new ValidationError('No simulation loaded')
    }

    for (const player of parsed.data.players) {
      addPlayer(current, player)
    }
    for (const team of parsed.data.teams) {
      addTeam(current, team)
    }

    return {
      nextState: current,
      result: {
        playerIds: parsed.data.players.map((player) => player.id),
        teamIds: parsed.data.teams.map((team) => team.id),
      },
    }
  })
}
