import { toGameView } from '@/application/mappers/gameMapper'
import type { GameView } from '@/application/mappers/gameMapper'
import type { SimRepository } from '@/application/simRepository'
import { addEntities } from '@/application/useCases/addEntities'
import type { AddEntitiesResult } from '@/application/useCases/addEntities'
import { advanceSimulation } from '@/application/useCases/advanceSimulation'
import { createSimulation } from '@/application/useCases/createSimulation'
import type { CreateSimulationOptions } from '@/application/useCases/createSimulation'
import { exportSave } from '@/application/useCases/exportSave'
import { generateTeam } from '@/application/useCases/generateTeam'
import { importSave } from '@/application/useCases/importSave'
import { playOutDay } from '@/application/useCases/playOutDay'
import type { PlayOutDayOptions, PlayOutDayResult } from '@/application/useCases/playOutDay'
import { startNewDay } from '@/application/useCases/startNewDay'
import type { StartNewDayResult } from '@/application/useCases/startNewDay'
import type { SimConfigOverrides } from '@/domain/config'
import type { Sim } from '@/domain/sim'
import type { Team } from '@/domain/types'

export interface SimServices {
  repository: SimRepository
  getSim(): Promise<Sim | null>
  getGames(): Promise<GameView[]>
  initialize(options?: Omit<CreateSimulationOptions, 'config'>): Promise<Sim>
  addEntities(input: unknown): Promise<AddEntitiesResult>
  generateTeam(input: unknown): Promise<Team>
  startNewDay(input: unknown): Promise<StartNewDayResult>
  advance(): Promise<GameView[]>
  playOutDay(options?: PlayOutDayOptions): Promise<PlayOutDayResult>
  exportSave(): Promise<string>
  importSave(raw: string): Promise<Sim>
}

export const createSimServices = (repository: SimRepository, config: SimConfigOverrides = {}): SimServices => ({
  repository,
  getSim: () => repository.load(),
  getGames: async () => {
    const sim = await repository.load()
    return sim ? sim.database.gamesToday.map((game) => toGameView(game, sim.database)) : []
  },
  initialize: async (options = {}) => {
    const existing = await repository.load()
    if (existing) {
      return existing
    }
    return createSimulation(repository, { ...options, config })
  },
  addEntities: (input) => addEntities(repository, input),
  generateTeam: (input) => generateTeam(repository, input),
  startNewDay: (input) => startNewDay(repository, input),
  advance: () => advanceSimulation(repository),
  playOutDay: (options) => playOutDay(repository, options),
  exportSave: () => exportSave(repository),
  importSave: (raw) => importSave(repository, raw, config),
})
