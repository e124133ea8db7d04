import { Edition } from './dice/edition'
import { RollOutcome } from './dice/roller'

/**
 * Plain-text rendering of roll results.
 *
 * Hits are shown in brackets (`[6]`), ones in parentheses (`(1)`). Each wave
 * is sorted high to low and wrapped at ten dice per line with a wider gap
 * after every fifth die. Transports that want rich markup build their own
 * text from the same `RollOutcome`.
 *
 * @module format
 */

export function formatDie(d: number): string {
  if (d >= 5) return `[${d}]`
  if (d === 1) return `(${d})`
  return String(d)
}

export function groupIntoLines(tokens: string[], perLine = 10, spacerEvery = 5): string[] {
  const lines: string[] = []
  let line = ''
  tokens.forEach((tok, i) => {
    if (i > 0 && i % spacerEvery === 0) line += '   '
    line += tok + ' '
    if ((i + 1) % perLine === 0) {
      lines.push(line.trim())
      line = ''
    }
  })
  if (line) lines.push(line.trim())
  return lines
}

export type RollReplyMeta = {
  edition: Edition
  edge: boolean
  comment: string
}

export function formatRollReply(result: RollOutcome, meta: RollReplyMeta): string {
  const parts: string[] = []

  if (meta.comment) parts.push(`📝 "${meta.comment}"\n`)

  parts.push(`🎲 ${meta.edition} Rolls:${meta.edge ? ' (Using edge!)' : ''}`)

  const blocks = result.waves.map(wave =>
    groupIntoLines([...wave].sort((a, b) => b - a).map(formatDie)).join('\n'),
  )
  parts.push(blocks.join('\n\n') + '\n')

  if (result.limit !== null && result.rawHits > result.hits) {
    parts.push(`🏹 Hits: ${result.hits} (capped from ${result.rawHits})\n`)
  } else {
    parts.push(`🏹 Hits: ${result.hits}\n`)
  }

  if (result.netHits !== null && result.outcome !== null) {
    parts.push(`🎯 Net Hits: ${result.netHits}\n`)
    parts.push(`${result.outcome}!\n`)
  }

  if (result.glitch) {
    const emoji = result.glitch === 'Critical Glitch' ? '💀' : '😵'
    parts.push(`${emoji}  ${result.glitch}!  ${emoji}`)
  }

  return parts.join('\n')
}
