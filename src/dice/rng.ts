import crypto from 'crypto'

/**
 * Random sources for dice rolls.
 *
 * A `RandomSource` returns a uniform float in [0, 1), the same contract as
 * `Math.random`, so any of the methods below (or a scripted sequence in
 * tests) can drive the roller.
 *
 * @module dice/rng
 */

export type RandomSource = () => number

export type RngMethod = 'math' | 'crypto' | 'mulberry32'

const CRYPTO_RANGE = 1 << 30

/**
 * Build a random source.
 *
 * - 'crypto': Node's `crypto.randomInt`
 * - 'mulberry32': small seeded PRNG, deterministic for a given seed
 * - 'math' (default): `Math.random`
 *
 * @param seed - Only read by 'mulberry32'; falls back to the current time.
 */
export function createRandomSource(method: RngMethod = 'math', seed?: number | null): RandomSource {
  if (method === 'crypto') {
    return () => crypto.randomInt(0, CRYPTO_RANGE) / CRYPTO_RANGE
  }
  if (method === 'mulberry32') {
    let t = (seed ?? Date.now()) >>> 0
    return () => {
      t += 0x6d2b79f5
      let r = Math.imul(t ^ (t >>> 15), 1 | t)
      r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r
      return ((r ^ (r >>> 14)) >>> 0) / 4294967296
    }
  }
  return Math.random
}

/** Roll one six-sided die. */
export function rollD6(random: RandomSource = Math.random): number {
  return Math.floor(random() * 6) + 1
}
