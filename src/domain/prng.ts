import { randomBytes } from 'node:crypto'

const BUFFER_SIZE = 64
const MAX_U64 = (1n << 64n) - 1n
// Bit pattern of 1.0: sign clear, exponent 0x3ff, empty mantissa.
const ONE_BITS = 0x3ff0_0000_0000_0000n

export interface PrngSnapshot {
  state: [bigint, bigint]
  buffer: bigint[]
}

export interface Prng {
  next(): number
  choose<T>(items: readonly T[]): T | undefined
  snapshot(): PrngSnapshot
}

const scratch = new DataView(new ArrayBuffer(8))

const toUnitInterval = (shifted: bigint): number => {
  scratch.setBigUint64(0, shifted | ONE_BITS)
  return scratch.getFloat64(0) - 1
}

const assertU64 = (value: bigint, label: string) => {
  if (value < 0n || value > MAX_U64) {
    throw new Error(`${label} must be an unsigned 64-bit integer`)
  }
}

/**
 * Runs xorshift128+ for one full batch. Outputs are the upper 52 bits of the
 * outgoing first word, ready to splice into a double's mantissa.
 */
const fillBuffer = (state: [bigint, bigint]): bigint[] => {
  const buffer: bigint[] = []
  for (let index = 0; index < BUFFER_SIZE; index += 1) {
    let s1 = state[0]
    const s0 = state[1]
    s1 ^= (s1 << 23n) & MAX_U64
    s1 ^= s1 >> 17n
    s1 ^= s0
    s1 ^= s0 >> 26n
    state[0] = s0
    state[1] = s1
    buffer.push(s0 >> 12n)
  }
  return buffer
}

const buildPrng = (state: [bigint, bigint], initialBuffer: bigint[]): Prng => {
  let buffer = initialBuffer

  // Batches are drawn from the back, matching the V8 Math.random cache.
  const next = () => {
    let shifted = buffer.pop()
    if (shifted === undefined) {
      buffer = fillBuffer(state)
      shifted = buffer.pop()
    }
    if (shifted === undefined) {
      throw new Error('prng buffer refill produced no values')
    }
    return toUnitInterval(shifted)
  }

  const choose = <T>(items: readonly T[]): T | undefined => {
    const index = Math.floor(next() * items.length)
    return index < items.length ? items[index] : undefined
  }

  const snapshot = (): PrngSnapshot => ({
    state: [state[0], state[1]],
    buffer: [...buffer],
  })

  return { next, choose, snapshot }
}

export const createPrng = (s0: bigint, s1: bigint): Prng => {
  assertU64(s0, 's0')
  assertU64(s1, 's1')
  const state: [bigint, bigint] = [s0, s1]
  return buildPrng(state, fillBuffer(state))
}

export const createUnseededPrng = (): Prng => {
  const seed = randomBytes(16)
  return createPrng(seed.readBigUInt64LE(0), seed.readBigUInt64LE(8))
}

export const restorePrng = (snapshot: PrngSnapshot): Prng => {
  const [s0, s1] = snapshot.state
  assertU64(s0, 's0')
  assertU64(s1, 's1')
  const buffer = snapshot.buffer.slice(0, BUFFER_SIZE)
  buffer.forEach((value, index) => assertU64(value, `buffer[${index}]`))
  return buildPrng([s0, s1], buffer)
}
