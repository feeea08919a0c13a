import type { Sim } from '@/domain/sim'

export interface SimRepository {
  load(): Promise<Sim | null>
  save(sim: Sim): Promise<void>
  transaction<T>(run: (current: Sim | null) => Promise<{ nextState?: Sim; result: T }>): Promise<T>
  reset(): Promise<void>
}
