import { MalformedArgumentsError } from '../errors'
import { Edition, thresholdTable } from './edition'

/**
 * Roll command argument parsing
 *
 * Turns the whitespace-separated tokens that follow `/r` into a structured
 * request. Tokens are consumed left to right:
 *
 * ```
 * <dice>[e] [limit] [threshold] [comment...]
 * ```
 *
 * - `<dice>[e]`: mandatory pool size, a trailing `e` turns on edge
 * - `[limit]`: SR5 only, a bare number
 * - `[threshold]`: a number, `t<number>` in SR5, or a keyword such as
 *   `hard` / `ha` in SR4 and SR5
 * - everything left over is the comment
 *
 * Examples:
 * ```js
 * parseRollArgs(['8e', '4', 't2', 'Sneaking', 'in'], 'SR5')
 * // -> { dicePool: 8, edge: true, limit: 4, threshold: 2, comment: 'Sneaking in' }
 * parseRollArgs(['10', 'Average'], 'SR6')
 * // -> { dicePool: 10, edge: false, limit: null, threshold: null, comment: 'Average' }
 * ```
 *
 * @module dice/rollArgs
 */

export type RollRequest = {
  readonly dicePool: number
  readonly edge: boolean
  readonly limit: number | null
  readonly threshold: number | null
  readonly comment: string
}

const DIGITS = /^\d+$/
const INTEGER = /^[+-]?\d+$/

/**
 * Peek/consume view over a token list. The caller's array is never touched.
 */
class TokenStream {
  private index = 0

  constructor(private readonly tokens: readonly string[]) {}

  peek(): string | undefined {
    return this.tokens[this.index]
  }

  next(): string | undefined {
    const token = this.tokens[this.index]
    if (token !== undefined) this.index++
    return token
  }

  rest(): string[] {
    return this.tokens.slice(this.index)
  }
}

/**
 * Look up a difficulty keyword (`easy`, `av`, `very hard`, ...) for an edition.
 *
 * @returns The threshold, or `null` if the keyword is unknown for the edition.
 */
export function parseThreshold(keyword: string, edition: Edition): number | null {
  const table = thresholdTable(edition)
  if (!table) return null
  const key = keyword.toLowerCase().replace(/ /g, '')
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : null
}

function parseDiceToken(stream: TokenStream): { dicePool: number; edge: boolean } {
  const first = stream.next()
  if (first === undefined) throw new MalformedArgumentsError('Missing dice count')
  let raw = first
  let edge = false
  if (raw.toLowerCase().endsWith('e')) {
    edge = true
    raw = raw.slice(0, -1)
  }
  if (!INTEGER.test(raw)) throw new MalformedArgumentsError(`Invalid dice count '${first}'`)
  return { dicePool: parseInt(raw, 10), edge }
}

function parseLimitToken(stream: TokenStream, edition: Edition): number | null {
  if (edition !== 'SR5') return null
  const token = stream.peek()
  if (token === undefined || !DIGITS.test(token)) return null
  stream.next()
  return parseInt(token, 10)
}

function parseThresholdToken(stream: TokenStream, edition: Edition): number | null {
  const original = stream.peek()
  if (original === undefined) return null
  let token = original
  if (edition === 'SR5' && token.toLowerCase().startsWith('t')) token = token.slice(1)

  let threshold: number | null = null
  if (DIGITS.test(token)) threshold = parseInt(token, 10)
  else if (edition !== 'SR6') threshold = parseThreshold(token, edition)

  if (threshold !== null) stream.next()
  return threshold
}

/**
 * Parse the tokens of a roll command.
 *
 * No range checks happen here; callers bound `dicePool` themselves.
 *
 * @throws {MalformedArgumentsError} When the dice token is missing or not an integer.
 */
export function parseRollArgs(tokens: readonly string[], edition: Edition): RollRequest {
  const stream = new TokenStream(tokens)
  const { dicePool, edge } = parseDiceToken(stream)
  const limit = parseLimitToken(stream, edition)
  const threshold = parseThresholdToken(stream, edition)
  const comment = stream.rest().join(' ').trim()
  return { dicePool, edge, limit, threshold, comment }
}
