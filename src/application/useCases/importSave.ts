import { simSaveSchema } from '@/application/contracts'
import { fromSimSave } from '@/application/mappers/simMapper'
import type { SimRepository } from '@/application/simRepository'
import { createSimConfig } from '@/domain/config'
import type { SimConfigOverrides } from '@/domain/config'
import { ImportError } from '@/domain/errors'
import type { Sim } from '@/domain/sim'

const MAX_IMPORT_BYTES = 5 * 1024 * 1024

const parseSave = (raw: string, config: SimConfigOverrides): Sim => {
  if (raw.length > MAX_IMPORT_BYTES) {
    throw new ImportError('Import rejected: file exceeds 5 MB cap')
  }

  let parsedJson: unknown
  try {
    parsedJson = JSON.parse(raw)
  } catch (error) {
    throw new ImportError('Import rejected: invalid JSON', error)
  }

  const parsedSave = simSaveSchema.safeParse(parsedJson)
  if (!parsedSave.success) {
    throw new ImportError('Import rejected: schema validation failed', parsedSave.error.flatten())
  }

  return fromSimSave(parsedSave.data, config)
}

export const importSave = async (
  repository: SimRepository,
  raw: string,
  config: SimConfigOverrides = {},
): Promise<Sim> => {
  return repository.transaction(async () => {
    let nextState: Sim
    try {
      nextState = parseSave(raw, config)
    } catch (error) {
      if (error instanceof ImportError) {
        createSimConfig(config).logger.warn('[sim] import rejected', error.message)
      }
      throw error
    }

    return {
      nextState,
      result: nextState,
    }
  })
}
