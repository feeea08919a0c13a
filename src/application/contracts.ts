import { z } from 'zod'
import type { Game, Player, PlayerId, Team, TeamId } from '@/domain/types'

const MAX_U64 = (1n << 64n) - 1n
const PRNG_BUFFER_SIZE = 64

type AliasMap = Record<string, string>

// Older documents used snake_case for a few fields; map them onto the current names.
const withAliases = (aliases: AliasMap) => (value: unknown) => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value
  }

  const next: Record<string, unknown> = { ...value }
  for (const [legacy, current] of Object.entries(aliases)) {
    if (legacy in next && !(current in next)) {
      next[current] = next[legacy]
    }
    delete next[legacy]
  }
  return next
}

const idSchema = z
  .string()
  .uuid()
  .transform((id) => id.toLowerCase())

// Keys are identifiers too, so two spellings of one id must not become two entries.
const idRecord = <T extends z.ZodTypeAny>(entry: T) =>
  z
    .record(z.string(), entry)
    .superRefine((record, ctx) => {
      const seen = new Set<string>()
      for (const key of Object.keys(record)) {
        const id = key.toLowerCase()
        if (seen.has(id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `identifier ${id} appears more than once` })
        }
        seen.add(id)
      }
    })
    .transform(
      (record): Record<string, z.output<T>> =>
        Object.fromEntries(
          Object.entries(record).map(([key, value]): [string, z.output<T>] => [key.toLowerCase(), value]),
        ),
    )

const u64Schema = z
  .union([z.string().regex(/^\d+$/), z.number().int().min(0).max(Number.MAX_SAFE_INTEGER)])
  .transform((value) => BigInt(value))
  .refine((value) => value <= MAX_U64, { message: 'must fit in 64 bits' })

export const playerSchema = z.preprocess(
  withAliases({
    base_thirst: 'baseThirst',
    ground_friction: 'groundFriction',
    peanut_allergy: 'peanutAllergy',
  }),
  z.object({
    id: idSchema,
    name: z.string(),
    thwackability: z.number(),
    moxie: z.number(),
    divinity: z.number(),
    musclitude: z.number(),
    patheticism: z.number(),
    buoyancy: z.number(),
    baseThirst: z.number(),
    laserlikeness: z.number(),
    groundFriction: z.number(),
    continuation: z.number(),
    indulgence: z.number(),
    martyrdom: z.number(),
    tragicness: z.number(),
    shakespearianism: z.number(),
    suppression: z.number(),
    unthwackability: z.number(),
    coldness: z.number(),
    overpowerment: z.number(),
    ruthlessness: z.number(),
    omniscience: z.number(),
    tenaciousness: z.number(),
    watchfulness: z.number(),
    anticapitalism: z.number(),
    chasiness: z.number(),
    pressurization: z.number(),
    cinnamon: z.number(),
    soul: z.number().int().min(0),
    peanutAllergy: z.boolean(),
    fate: z.number().int().min(0),
    blood: z.number().int().min(0),
    coffee: z.number().int().min(0),
    ritual: z.string().default(''),
  }),
)

export const teamSchema = z.preprocess(
  withAliases({ rotation_slot: 'rotationSlot' }),
  z.object({
    id: idSchema,
    location: z.string(),
    nickname: z.string(),
    shorthand: z.string().default(''),
    lineup: z.array(idSchema).default([]),
    rotation: z.array(idSchema).default([]),
    shadows: z.array(idSchema).default([]),
    rotationSlot: z.number().int().min(0).default(0),
  }),
)

const gameTeamSchema = z.preprocess(
  withAliases({ runs_by_inning: 'runsByInning', lineup_slot: 'lineupSlot' }),
  z.object({
    id: idSchema,
    runs: z.number().int().min(0),
    runsByInning: z.array(z.number().int().min(0)).default([]),
    pitcher: idSchema.nullable().default(null),
    lineupSlot: z.number().int().min(0).default(0),
  }),
)

export const gameSchema = z.preprocess(
  withAliases({ last_update: 'lastUpdate', at_bat: 'atBat' }),
  z.object({
    id: idSchema,
    winner: idSchema.nullable().default(null),
    lastUpdate: z.string().default(''),
    teams: z.object({
      away: gameTeamSchema,
      home: gameTeamSchema,
    }),
    inning: z.object({
      frame: z.enum(['top', 'mid', 'bottom', 'end']),
      number: z.number().int().min(0),
    }),
    atBat: idSchema.nullable().default(null),
    balls: z.number().int().min(0).max(3),
    strikes: z.number().int().min(0).max(2),
    outs: z.number().int().min(0).max(2),
    baserunners: z
      .array(
        z.object({
          playerId: idSchema,
          base: z.number().int().min(1),
        }),
      )
      .default([]),
  }),
)

export const prngStateSchema = z.object({
  state: z.tuple([u64Schema, u64Schema]),
  buffer: z.array(u64Schema).max(PRNG_BUFFER_SIZE),
})

export const simSaveSchema = z.object({
  season: z.number().int().min(0),
  day: z.number().int().min(0),
  firstNames: z.array(z.string()).default([]),
  lastNames: z.array(z.string()).default([]),
  rituals: z.array(z.string()).default([]),
  players: idRecord(playerSchema),
  teams: idRecord(teamSchema),
  gamesToday: z.array(gameSchema).default([]),
  rng: prngStateSchema,
})

export const entitiesPayloadSchema = z.object({
  players: z.array(playerSchema).default([]),
  teams: z.array(teamSchema).default([]),
})

export const newDayPayloadSchema = z.object({
  date: z.object({
    season: z.number().int().min(0),
    day: z.number().int().min(0),
  }),
  matchups: z.array(
    z.object({
      away: idSchema,
      home: idSchema,
    }),
  ),
})

export const generatedTeamPayloadSchema = z.object({
  location: z.string().min(1),
  nickname: z.string().min(1),
  shorthand: z.string().default(''),
  lineupSize: z.number().int().min(1).max(26).default(9),
  rotationSize: z.number().int().min(1).max(10).default(5),
})

export type SimSave = z.output<typeof simSaveSchema>
export type EntitiesPayload = z.input<typeof entitiesPayloadSchema>
export type NewDayPayload = z.input<typeof newDayPayloadSchema>
export type GeneratedTeamPayload = z.input<typeof generatedTeamPayloadSchema>

/** The JSON shape written by an export; 64-bit words travel as decimal strings. */
export interface SimSaveDocument {
  season: number
  day: number
  firstNames: string[]
  lastNames: string[]
  rituals: string[]
  players: Record<PlayerId, Player>
  teams: Record<TeamId, Team>
  gamesToday: Game[]
  rng: {
    state: [string, string]
    buffer: string[]
  }
}
