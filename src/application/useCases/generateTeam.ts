import { generatedTeamPayloadSchema } from '@/application/contracts'
import type { SimRepository } from '@/application/simRepository'
import { ValidationError } from '@/domain/errors'
import { generatePlayer } from '@/domain/generator'
import { addPlayer, addTeam } from '@/domain/sim'
import { createTeam } from '@/domain/team'
import type { Sim } from '@/domain/sim'
import type { PlayerId, Team } from '@/domain/types'

const draft = (sim: Sim, count: number): PlayerId[] =>
  Array.from({ length: count }, () => {
    const player = generatePlayer(sim.prng, sim.database)
    addPlayer(sim, player)
    return player.id
  })

export const generateTeam = async (repository: SimRepository, input: unknown): Promise<Team> => {
  const parsed = generatedTeamPayloadSchema.safeParse(input)
  if (!parsed.success) {
    throw new ValidationError('Team rejected: schema validation failed', parsed.error.flatten())
  }

  return repository.transaction(async (current) => {
    if (!current) {
      throw new ValidationError('No simulation loaded')
    }

    const { location, nickname, shorthand, lineupSize, rotationSize } = parsed.data
    const lineup = draft(current, lineupSize)
    const rotation = draft(current, rotationSize)
    const team = createTeam({ location, nickname, shorthand, lineup, rotation })
    addTeam(current, team)

    return { nextState: current, result: team }
  })
}
