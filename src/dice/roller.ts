import { InvalidDicePoolError, InvalidLimitError } from '../errors'
import { Edition } from './edition'
import { RandomSource, rollD6 } from './rng'

/**
 * Dice pool roller
 *
 * Rolls pools of six-sided dice the Shadowrun way: every 5 or 6 is a hit,
 * edge rerolls each 6 in further waves, SR5 caps hits at a limit, and a pool
 * where half or more of the dice show 1 glitches.
 *
 * @module dice/roller
 */

export type Outcome = 'Failure' | 'Success' | 'Critical Success'

export type Glitch = 'Glitch' | 'Critical Glitch'

export type RollParams = {
  dicePool: number
  edge: boolean
  limit?: number | null
  threshold?: number | null
}

export type RollOutcome = {
  /** One entry per reroll round; the first has `dicePool` dice. */
  waves: number[][]
  rawHits: number
  /** `rawHits` after the SR5 limit. */
  hits: number
  /** Limit that was in force, `null` outside SR5 or when none was given. */
  limit: number | null
  netHits: number | null
  outcome: Outcome | null
  glitch: Glitch | null
}

const HIT_FACE = 5
const EDGE_FACE = 6
const CRITICAL_NET_HITS = 4

/**
 * Roll `count` dice, then (with edge) reroll every 6 until a wave has none.
 */
export function rollDicePool(count: number, edge: boolean, random: RandomSource = Math.random): number[][] {
  const waves: number[][] = []
  let pool = count
  while (pool > 0) {
    const wave: number[] = []
    for (let i = 0; i < pool; i++) wave.push(rollD6(random))
    waves.push(wave)
    pool = edge ? wave.filter(d => d === EDGE_FACE).length : 0
  }
  return waves
}

function classifyOutcome(netHits: number, edition: Edition): Outcome {
  if (netHits <= 0) return 'Failure'
  if (netHits >= CRITICAL_NET_HITS && edition === 'SR4') return 'Critical Success'
  return 'Success'
}

/**
 * Score an already rolled set of waves.
 *
 * Glitch detection counts every die across all waves, rerolls included.
 */
export function scoreWaves(
  waves: number[][],
  params: Pick<RollParams, 'limit' | 'threshold'>,
  edition: Edition,
): RollOutcome {
  const dice = waves.flat()
  const rawHits = dice.filter(d => d >= HIT_FACE).length
  const ones = dice.filter(d => d === 1).length

  const limit = edition === 'SR5' && params.limit != null ? params.limit : null
  const hits = limit !== null ? Math.max(0, Math.min(rawHits, limit)) : rawHits

  const threshold = params.threshold ?? null
  const netHits = threshold !== null ? hits - threshold : null
  const outcome = netHits !== null ? classifyOutcome(netHits, edition) : null

  let glitch: Glitch | null = null
  if (dice.length > 0 && ones >= dice.length / 2) {
    glitch = hits === 0 ? 'Critical Glitch' : 'Glitch'
  }

  return { waves, rawHits, hits, limit, netHits, outcome, glitch }
}

/**
 * Roll a dice pool and score it.
 *
 * @throws {InvalidDicePoolError} When `dicePool` is not a positive integer.
 * @throws {InvalidLimitError} When a limit is given that is not a non-negative integer.
 */
export function roll(params: RollParams, edition: Edition, random: RandomSource = Math.random): RollOutcome {
  if (!Number.isInteger(params.dicePool) || params.dicePool < 1) {
    throw new InvalidDicePoolError(params.dicePool)
  }
  if (params.limit != null && (!Number.isInteger(params.limit) || params.limit < 0)) {
    throw new InvalidLimitError(params.limit)
  }
  const waves = rollDicePool(params.dicePool, params.edge, random)
  return scoreWaves(waves, params, edition)
}
