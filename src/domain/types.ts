export type PlayerId = string
export type TeamId = string
export type GameId = string
export type BallparkId = string

export type TeamSelect = 'away' | 'home'
export type InningFrame = 'top' | 'mid' | 'bottom' | 'end'

export const PLAYER_ATTRIBUTES = [
  'thwackability',
  'moxie',
  'divinity',
  'musclitude',
  'patheticism',
  'buoyancy',
  'baseThirst',
  'laserlikeness',
  'groundFriction',
  'continuation',
  'indulgence',
  'martyrdom',
  'tragicness',
  'shakespearianism',
  'suppression',
  'unthwackability',
  'coldness',
  'overpowerment',
  'ruthlessness',
  'omniscience',
  'tenaciousness',
  'watchfulness',
  'anticapitalism',
  'chasiness',
  'pressurization',
  'cinnamon',
] as const

export type PlayerAttribute = (typeof PLAYER_ATTRIBUTES)[number]

export type PlayerAttributes = Record<PlayerAttribute, number>

export interface Player extends PlayerAttributes {
  id: PlayerId
  name: string
  soul: number
  peanutAllergy: boolean
  fate: number
  blood: number
  coffee: number
  ritual: string
}

export interface Team {
  id: TeamId
  location: string
  nickname: string
  shorthand: string
  lineup: PlayerId[]
  rotation: PlayerId[]
  shadows: PlayerId[]
  rotationSlot: number
}

export const BALLPARK_ATTRIBUTES = [
  'ominousness',
  'forwardness',
  'obtuseness',
  'grandiosity',
  'fortification',
  'elongation',
  'inconvenience',
  'viscosity',
  'hype',
  'mysticism',
  'luxuriousness',
  'filthiness',
] as const

export type BallparkAttribute = (typeof BALLPARK_ATTRIBUTES)[number]

export interface Ballpark extends Record<BallparkAttribute, number> {
  id: BallparkId
  teamId: TeamId
  name: string
  nickname: string
  birds: number
}

export interface SimDate {
  season: number
  day: number
}

export interface AwayHome<T> {
  away: T
  home: T
}

export interface Inning {
  frame: InningFrame
  number: number
}

export interface GameTeam {
  id: TeamId
  runs: number
  runsByInning: number[]
  pitcher: PlayerId | null
  lineupSlot: number
}

export interface Baserunner {
  playerId: PlayerId
  base: number
}

export interface Game {
  id: GameId
  winner: TeamId | null
  lastUpdate: string
  teams: AwayHome<GameTeam>
  inning: Inning
  atBat: PlayerId | null
  balls: number
  strikes: number
  outs: number
  baserunners: Baserunner[]
}

export interface NamePools {
  firstNames: string[]
  lastNames: string[]
  rituals: string[]
}

export interface Database extends NamePools {
  date: SimDate
  teams: Map<TeamId, Team>
  players: Map<PlayerId, Player>
  gamesToday: Game[]
}
