import type { SimRepository } from '@/application/simRepository'
import type { SimConfigOverrides } from '@/domain/config'
import { createPrng, createUnseededPrng } from '@/domain/prng'
import { createSim, setNamePools } from '@/domain/sim'
import type { Sim } from '@/domain/sim'
import type { NamePools } from '@/domain/types'

export interface CreateSimulationOptions {
  seed?: readonly [bigint, bigint]
  pools?: Partial<NamePools>
  config?: SimConfigOverrides
}

export const createSimulation = async (
  repository: SimRepository,
  options: CreateSimulationOptions = {},
): Promise<Sim> => {
  const prng = options.seed ? createPrng(options.seed[0], options.seed[1]) : createUnseededPrng()
  const sim = createSim({ prng, config: options.config })
  setNamePools(sim, options.pools ?? {})
  await repository.save(sim)
  return sim
}
