import { DEFAULT_BALLPARK } from '@/domain/ballpark'
import type { Ballpark } from '@/domain/types'

export type SimLogger = Pick<Console, 'info' | 'warn'>

export interface StealModel {
  attemptThreshold: number
  successThreshold: number
}

export interface SimConfig {
  consistencyChecks: boolean
  // Uncalibrated: there is no known formula for steal attempts or success yet.
  steal: StealModel
  ballpark: Readonly<Ballpark>
  logger: SimLogger
}

export interface SimConfigOverrides {
  consistencyChecks?: boolean
  steal?: Partial<StealModel>
  ballpark?: Readonly<Ballpark>
  logger?: SimLogger
}

export const DEFAULT_STEAL_MODEL: Readonly<StealModel> = Object.freeze({
  attemptThreshold: 0.02,
  successThreshold: 0.5,
})

export const createSimConfig = (overrides: SimConfigOverrides = {}): SimConfig => ({
  consistencyChecks: overrides.consistencyChecks ?? process.env.NODE_ENV !== 'production',
  steal: { ...DEFAULT_STEAL_MODEL, ...overrides.steal },
  ballpark: overrides.ballpark ?? DEFAULT_BALLPARK,
  logger: overrides.logger ?? console,
})
