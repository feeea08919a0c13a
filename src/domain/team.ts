import { newId } from '@/domain/ids'
import type { PlayerId, Team } from '@/domain/types'

export const teamName = (team: Team): string => `${team.location} ${team.nickname}`

export const createTeam = (input: Partial<Team> & Pick<Team, 'location' | 'nickname'>): Team => ({
  id: newId(),
  shorthand: '',
  lineup: [],
  rotation: [],
  shadows: [],
  rotationSlot: 0,
  ...input,
})

export const rosterPlayerIds = (team: Team): PlayerId[] => [...team.lineup, ...team.rotation, ...team.shadows]
