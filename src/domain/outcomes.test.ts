import { DEFAULT_BALLPARK, createBallpark } from '@/domain/ballpark'
import {
  baseHitThresholds,
  contactThreshold,
  flyoutThreshold,
  foulThreshold,
  homeRunThreshold,
  outThreshold,
  rollBaseHit,
  rollContact,
  rollSwing,
  strikeThreshold,
  swingThreshold,
  vibes,
} from '@/domain/outcomes'
import type { OutcomeContext } from '@/domain/outcomes'
import { makePlayer, scriptedPrng, testId } from '@/test/simFactory'

// Day 0 sits on a vibes peak for everyone, so every vibe modifier is 1.2.
const context: OutcomeContext = { date: { season: 0, day: 0 }, ballpark: DEFAULT_BALLPARK }
const average = makePlayer(testId(1))

describe('vibes', () => {
  it('peaks on day 0 whatever the buoyancy', () => {
    expect(vibes(makePlayer(testId(1), { buoyancy: 0 }), 0)).toBe(1)
    expect(vibes(makePlayer(testId(1), { buoyancy: 0.9 }), 0)).toBe(1)
  })

  it('bottoms out half a cycle later', () => {
    // buoyancy 0 gives a six day cycle
    expect(vibes(makePlayer(testId(1), { buoyancy: 0 }), 3)).toBeCloseTo(-1, 12)
  })

  it('rounds the cycle length half away from zero', () => {
    // -2.5 rounds to -3, a three day cycle
    expect(vibes(makePlayer(testId(1), { buoyancy: -0.25 }), 1.5)).toBeCloseTo(-1, 12)
  })
})

describe('thresholds for average players in a neutral park', () => {
  it('computes each decision threshold', () => {
    expect(strikeThreshold(context, average, average)).toBeCloseTo(0.521, 10)
    expect(swingThreshold(context, average, average, true)).toBeCloseTo(0.69, 10)
    expect(swingThreshold(context, average, average, false)).toBeCloseTo(0.435 ** 1.5, 10)
    expect(contactThreshold(context, average, average, true)).toBeCloseTo(0.732 + 0.17 * 0.6 ** 1.2, 10)
    expect(contactThreshold(context, average, average, false)).toBeCloseTo(0.34 + 0.35 * 0.6 ** 1.5, 10)
    expect(foulThreshold(context, average)).toBeCloseTo(0.31, 10)
    expect(outThreshold(context, average, average, average)).toBeCloseTo(0.2845, 10)
    expect(flyoutThreshold(context, average)).toBeCloseTo(0.25, 10)
    expect(homeRunThreshold(context, average, average)).toBeCloseTo(0.168, 10)

    const hits = baseHitThresholds(context, average, average, average)
    expect(hits.triple).toBeCloseTo(0.11, 10)
    expect(hits.double).toBeCloseTo(0.2556, 10)
  })

  it('caps the strike threshold', () => {
    const ace = makePlayer(testId(2), { ruthlessness: 2 })
    const slugger = makePlayer(testId(3), { musclitude: 1 })

    expect(strikeThreshold(context, ace, slugger)).toBe(0.86)
  })

  it('reads park attributes', () => {
    const forward = { ...context, ballpark: createBallpark({ forwardness: 1 }) }

    expect(foulThreshold(forward, average)).toBeCloseTo(0.36, 10)
  })
})

describe('rolls', () => {
  it('never swings at a ball when the threshold is undefined', () => {
    const patient = makePlayer(testId(2), { moxie: 1, patheticism: 0 })
    const gentle = makePlayer(testId(3), { ruthlessness: 0 })
    const park = { ...context, ballpark: createBallpark({ viscosity: 0 }) }

    expect(swingThreshold(park, gentle, patient, false)).toBeNaN()
    expect(rollSwing(scriptedPrng([0]), park, gentle, patient, false)).toBe(false)
  })

  it('never makes contact on a strike when the threshold is undefined', () => {
    const hopeless = makePlayer(testId(2), { divinity: 0, musclitude: 0, thwackability: 0, patheticism: 1 })

    expect(rollContact(scriptedPrng([0]), context, average, hopeless, true)).toBe(false)
  })

  it('draws twice for a base hit and checks triples first', () => {
    const prng = scriptedPrng([0, 0, 0.99, 0, 0.99, 0.99])

    expect(rollBaseHit(prng, context, average, average, average)).toBe(3)
    expect(rollBaseHit(prng, context, average, average, average)).toBe(2)
    expect(rollBaseHit(prng, context, average, average, average)).toBe(1)
    expect(prng.remaining()).toBe(0)
  })
})
