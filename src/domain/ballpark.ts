import { NIL_ID } from '@/domain/ids'
import type { Ballpark } from '@/domain/types'

export const DEFAULT_BALLPARK: Readonly<Ballpark> = Object.freeze({
  id: NIL_ID,
  teamId: NIL_ID,
  name: '',
  nickname: '',
  ominousness: 0.5,
  forwardness: 0.5,
  obtuseness: 0.5,
  grandiosity: 0.5,
  fortification: 0.5,
  elongation: 0.5,
  inconvenience: 0.5,
  viscosity: 0.5,
  hype: 0,
  mysticism: 0.5,
  luxuriousness: 0,
  filthiness: 0,
  birds: 0,
})

export const createBallpark = (overrides: Partial<Ballpark> = {}): Ballpark => ({
  ...DEFAULT_BALLPARK,
  ...overrides,
})
