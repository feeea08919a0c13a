import { simSaveSchema } from '@/application/contracts'
import { toSimSave } from '@/application/mappers/simMapper'
import type { SimRepository } from '@/application/simRepository'
import { ValidationError } from '@/domain/errors'

export const exportSave = async (repository: SimRepository): Promise<string> => {
  const sim = await repository.load()
  if (!sim) {
    throw new ValidationError('No simulation exists to export')
  }

  const document = toSimSave(sim)
  const parsed = simSaveSchema.safeParse(document)
  if (!parsed.success) {
    throw new ValidationError('Current simulation is invalid for export', parsed.error.flatten())
  }

  return JSON.stringify(document)
}
