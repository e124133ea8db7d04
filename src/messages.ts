/**
 * Fixed reply texts.
 *
 * @module messages
 */

export const BOT_USAGE_PROMPT = 'Usage: /r <dice>[e] [limit] [threshold] [comment]'

export const GENERIC_FAILURE = '⚠️ Something went wrong, the Maker has been notified.'

export const NPC_CREATE_USAGE = 'Usage: /npc_create <name> [-a alias] [-t template] [-u] [-s]'

export function diceNumberError(maxDice: number): string {
  return `Number of dice must be between 1 and ${maxDice}.`
}

export const HELP_TEXT = [
  'Usage: /r <dice>[e] [limit] [threshold] [comment]',
  '',
  '- <dice>: Number of dice to roll',
  '- [e]: Roll with edge (exploding dice) flag',
  '- [limit]: (SR5 only) Optional limit on hits',
  "- [threshold]: Optional threshold as number (with 't' prefix for SR5) or keyword (SR4/SR5 only)",
  '- [comment]: Optional description',
  '',
  'SR 4 Threshold keywords:',
  '- Easy (ea) - 1',
  '- Average (av) - 2',
  '- Hard (ha) - 4',
  '- Extreme (ex) - 6',
  '',
  'SR 5 Threshold keywords:',
  '- Easy (ea) - 1',
  '- Average (av) - 2',
  '- Hard (ha) - 4',
  '- Very Hard (vh) - 6',
  '- Extreme (ex) - 8',
  '',
  'Other commands:',
  '/ed <edition> - set the edition for this chat (SR4, SR5, SR6)',
  '/start - initialize your personal settings',
  '/npc_create <name> [-a alias] [-t template] [-u] [-s] - create an NPC',
  '/npc_list_templates - list NPC templates',
  '',
  'Examples:',
  '/r 10',
  '/r 10 5',
  '/r 12 6 Hard',
  '/r 8e 4 t2 Sneaking in (with Edge!)',
].join('\n')
