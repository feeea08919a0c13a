import type { Prng } from '@/domain/prng'
import type { Ballpark, Player, SimDate } from '@/domain/types'

/**
 * Outcome model: per-decision thresholds built from batter, pitcher, fielder and
 * ballpark attributes. Every `roll*` draws once (base hits draw twice) and the
 * outcome happens when the draw is below the threshold. A NaN threshold never
 * passes, which suppresses the outcome.
 */

export interface OutcomeContext {
  date: SimDate
  ballpark: Readonly<Ballpark>
}

export type HitBases = 1 | 2 | 3

export interface BaseHitThresholds {
  triple: number
  double: number
}

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value))

const roundHalfAwayFromZero = (value: number) => Math.sign(value) * Math.round(Math.abs(value))

export const vibes = (player: Player, day: number): number => {
  const frequency = 6 + roundHalfAwayFromZero(10 * player.buoyancy)
  return Math.sin(Math.PI * ((2 / frequency) * day + 0.5))
}

const vibeMod = (player: Player, context: OutcomeContext) => 1 + 0.2 * vibes(player, context.date.day)

// Park attributes enter most formulas centred on the neutral 0.5.
const centred = (context: OutcomeContext) => {
  const park = context.ballpark
  return {
    ominousness: park.ominousness - 0.5,
    forwardness: park.forwardness - 0.5,
    obtuseness: park.obtuseness - 0.5,
    grandiosity: park.grandiosity - 0.5,
    fortification: park.fortification - 0.5,
    elongation: park.elongation - 0.5,
    inconvenience: park.inconvenience - 0.5,
    viscosity: park.viscosity - 0.5,
  }
}

export const strikeThreshold = (context: OutcomeContext, pitcher: Player, batter: Player): number => {
  const ruth = pitcher.ruthlessness * vibeMod(pitcher, context)
  return Math.min(0.86, 0.2 + 0.285 * ruth + 0.2 * context.ballpark.forwardness + 0.1 * batter.musclitude)
}

export const swingThreshold = (context: OutcomeContext, pitcher: Player, batter: Player, strike: boolean): number => {
  const batterMod = vibeMod(batter, context)
  const ruth = pitcher.ruthlessness * vibeMod(pitcher, context)

  if (strike) {
    const divinity = batter.divinity * batterMod
    const musclitude = batter.musclitude * batterMod
    const thwackability = batter.thwackability * batterMod
    const invPath = (1 - batter.patheticism) * batterMod
    const combined = (divinity + musclitude + invPath + thwackability) / 4
    return 0.6 + 0.35 * combined - 0.2 * ruth + 0.2 * centred(context).viscosity
  }

  const moxie = batter.moxie * batterMod
  const combined = (12 * ruth - 5 * moxie + 5 * batter.patheticism + 4 * context.ballpark.viscosity) / 20
  if (combined < 0) {
    return Number.NaN
  }
  return clamp(combined ** 1.5, 0.1, 0.95)
}

export const contactThreshold = (context: OutcomeContext, pitcher: Player, batter: Player, strike: boolean): number => {
  const park = centred(context)
  const parkSum = (park.fortification + 3 * park.viscosity - 6 * park.forwardness) / 10
  const batterMod = vibeMod(batter, context)
  const ruth = pitcher.ruthlessness * vibeMod(pitcher, context)

  if (strike) {
    const combined =
      ((batter.divinity + batter.musclitude + batter.thwackability - batter.patheticism) / 2) * batterMod
    if (combined < 0) {
      return Number.NaN
    }
    return Math.min(0.9, 0.78 - 0.08 * ruth + 0.16 * parkSum + 0.17 * combined ** 1.2)
  }

  const invPath = Math.max(0, (1 - batter.patheticism) * batterMod)
  return Math.min(1, 0.4 - 0.1 * ruth + 0.35 * invPath ** 1.5 + 0.14 * parkSum)
}

export const foulThreshold = (context: OutcomeContext, batter: Player): number => {
  const batterSum = ((batter.musclitude + batter.thwackability + batter.divinity) * vibeMod(batter, context)) / 3
  return 0.25 + 0.1 * context.ballpark.forwardness - 0.1 * context.ballpark.obtuseness + 0.1 * batterSum
}

export const outThreshold = (context: OutcomeContext, pitcher: Player, fielder: Player, batter: Player): number => {
  const park = centred(context)
  const thwackability = batter.thwackability * vibeMod(batter, context)
  const unthwackability = pitcher.unthwackability * vibeMod(pitcher, context)
  const omniscience = fielder.omniscience * vibeMod(fielder, context)

  return (
    0.3115 +
    0.1 * thwackability -
    0.08 * unthwackability -
    0.065 * omniscience +
    0.01 * park.grandiosity +
    0.0085 * park.obtuseness -
    0.0033 * park.ominousness -
    0.0015 * park.inconvenience -
    0.0033 * park.viscosity +
    0.01 * park.forwardness
  )
}

export const flyoutThreshold = (context: OutcomeContext, batter: Player): number =>
  0.18 + 0.3 * batter.buoyancy - 0.16 * batter.suppression - 0.1 * centred(context).ominousness

export const homeRunThreshold = (context: OutcomeContext, pitcher: Player, batter: Player): number => {
  const park = centred(context)
  const pitcherMod = vibeMod(pitcher, context)
  const divinity = batter.divinity * vibeMod(batter, context)
  const overpowerment = pitcher.overpowerment * pitcherMod
  const suppression = pitcher.suppression * pitcherMod
  const opwSupp = (10 * overpowerment + suppression) / 11
  const parkSum =
    0.4 * park.grandiosity +
    0.2 * park.fortification +
    0.08 * park.viscosity +
    0.08 * park.ominousness -
    0.24 * park.forwardness

  return 0.12 + 0.16 * divinity - 0.08 * opwSupp - 0.18 * parkSum
}

export const baseHitThresholds = (
  context: OutcomeContext,
  pitcher: Player,
  fielder: Player,
  batter: Player,
): BaseHitThresholds => {
  const park = centred(context)
  const batterMod = vibeMod(batter, context)
  const groundFriction = batter.groundFriction * batterMod
  const musclitude = batter.musclitude * batterMod
  const overpowerment = pitcher.overpowerment * vibeMod(pitcher, context)
  const chasiness = fielder.chasiness * vibeMod(fielder, context)

  const triple =
    0.05 +
    0.2 * groundFriction -
    0.04 * overpowerment -
    0.06 * chasiness +
    0.02 * park.forwardness +
    0.035 * park.grandiosity +
    0.035 * park.obtuseness -
    0.005 * park.ominousness -
    0.005 * park.viscosity
  const double =
    0.165 +
    0.2 * musclitude -
    0.04 * overpowerment -
    0.009 * chasiness +
    0.027 * park.forwardness -
    0.015 * park.elongation -
    0.01 * park.ominousness -
    0.008 * park.viscosity

  return { triple, double }
}

const passes = (prng: Prng, threshold: number) => prng.next() < threshold

export const rollStrike = (prng: Prng, context: OutcomeContext, pitcher: Player, batter: Player) =>
  passes(prng, strikeThreshold(context, pitcher, batter))

export const rollSwing = (prng: Prng, context: OutcomeContext, pitcher: Player, batter: Player, strike: boolean) =>
  passes(prng, swingThreshold(context, pitcher, batter, strike))

export const rollContact = (prng: Prng, context: OutcomeContext, pitcher: Player, batter: Player, strike: boolean) =>
  passes(prng, contactThreshold(context, pitcher, batter, strike))

export const rollFoul = (prng: Prng, context: OutcomeContext, batter: Player) =>
  passes(prng, foulThreshold(context, batter))

export const rollOut = (prng: Prng, context: OutcomeContext, pitcher: Player, fielder: Player, batter: Player) =>
  passes(prng, outThreshold(context, pitcher, fielder, batter))

export const rollFlyout = (prng: Prng, context: OutcomeContext, batter: Player) =>
  passes(prng, flyoutThreshold(context, batter))

export const rollHomeRun = (prng: Prng, context: OutcomeContext, pitcher: Player, batter: Player) =>
  passes(prng, homeRunThreshold(context, pitcher, batter))

// Both rolls are always drawn, triple checked first.
// TODO: confirm against recorded games whether doubles are checked before triples.
export const rollBaseHit = (
  prng: Prng,
  context: OutcomeContext,
  pitcher: Player,
  fielder: Player,
  batter: Player,
): HitBases => {
  const thresholds = baseHitThresholds(context, pitcher, fielder, batter)
  const tripleRoll = prng.next()
  const doubleRoll = prng.next()

  if (tripleRoll < thresholds.triple) {
    return 3
  }
  if (doubleRoll < thresholds.double) {
    return 2
  }
  return 1
}
