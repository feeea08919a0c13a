export * from '@/domain/types'
export { NIL_ID, compareIds, isNilId, newId } from '@/domain/ids'
export { createPrng, createUnseededPrng, restorePrng } from '@/domain/prng'
export type { Prng, PrngSnapshot } from '@/domain/prng'
export { DatabaseError, ImportError, SimInvariantError, ValidationError, describeProblem } from '@/domain/errors'
export type { DatabaseProblem, EntityKind } from '@/domain/errors'
export { DEFAULT_BALLPARK, createBallpark } from '@/domain/ballpark'
export { DEFAULT_STEAL_MODEL, createSimConfig } from '@/domain/config'
export type { SimConfig, SimConfigOverrides, SimLogger, StealModel } from '@/domain/config'
export { checkConsistency } from '@/domain/invariants'
export { createDatabase } from '@/domain/database'
export type { DayRollover } from '@/domain/database'
export * from '@/domain/outcomes'
export { PREGAME_INNING, battingSide, fieldingSide, isPregame, isTransitional, nextInning } from '@/domain/inning'
export { HOME_BASE, basesBehind, basesOccupied, createGame, describeBase, isFinished } from '@/domain/game'
export { createTeam, rosterPlayerIds, teamName } from '@/domain/team'
export { generatePlayer, generatePlayerWithName } from '@/domain/generator'
export { BALLS_NEEDED, FINAL_INNING, OUTS_NEEDED, STRIKES_NEEDED, tickGame } from '@/domain/gameTick'
export { addPlayer, addTeam, createSim, currentDate, gamesToday, players, setNamePools, startDay, teams, tick } from '@/domain/sim'
export type { CreateSimOptions, Sim } from '@/domain/sim'
export { simSaveSchema } from '@/application/contracts'
export type { SimSave, SimSaveDocument } from '@/application/contracts'
export { fromSimSave, toSimSave } from '@/application/mappers/simMapper'
export { toGameView } from '@/application/mappers/gameMapper'
export type { GameView } from '@/application/mappers/gameMapper'
export type { SimRepository } from '@/application/simRepository'
export { createSimServices } from '@/application/services'
export type { SimServices } from '@/application/services'
