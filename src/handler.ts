import { enqueueLog } from './asyncLogger'
import { CommandContext } from './context'
import { ALLOWED_EDITIONS, normalizeEdition } from './dice/edition'
import { RandomSource } from './dice/rng'
import { RollRequest, parseRollArgs } from './dice/rollArgs'
import { roll } from './dice/roller'
import EditionStore from './editionStore'
import { ErrorReporter } from './errorReporter'
import { MalformedArgumentsError, TemplateNotFoundError } from './errors'
import { formatRollReply } from './format'
import {
  BOT_USAGE_PROMPT,
  GENERIC_FAILURE,
  HELP_TEXT,
  NPC_CREATE_USAGE,
  diceNumberError,
} from './messages'
import NpcRegistry, { parseNpcCreateArgs } from './npc'

/**
 * Command handler
 *
 * Maps the text of an incoming chat message to a reply. The handler knows
 * nothing about the chat platform: transports pass the raw text plus a
 * {@link CommandContext} and send back whatever text is returned.
 *
 * Recognized commands (a Telegram-style `@botname` suffix is ignored):
 * - `/r`, `/roll` -> roll a dice pool
 * - `/ed <edition>` -> set the edition for the user or chat
 * - `/start` -> initialize personal settings (private chats)
 * - `/help` -> usage text
 * - `/npc_create ...` -> create an NPC
 * - `/npc_list_templates` -> list NPC templates
 *
 * @module handler
 */

export type Reply = { text: string }

export type HandlerDeps = {
  editions: EditionStore
  npcs: NpcRegistry
  reportError: ErrorReporter
  random?: RandomSource
  maxDice?: number
  maxCommentLength?: number
}

export type CommandHandler = {
  handleText(text: string, ctx: CommandContext): Promise<Reply | null>
  greetChat(chatId: string): Promise<Reply>
}

type ParsedCommand = { name: string; args: string[]; rest: string }

/**
 * Split a message into command name, whitespace-separated arguments and the
 * raw text after the command word.
 *
 * @returns `null` when the text is not a slash command.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim()
  const match = /^\/([A-Za-z_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(trimmed)
  if (!match) return null
  const rest = (match[2] ?? '').trim()
  return {
    name: match[1].toLowerCase(),
    args: rest ? rest.split(/\s+/) : [],
    rest,
  }
}

// by code point, so emoji are never split
function truncate(text: string, max: number): string {
  const chars = Array.from(text)
  return chars.length > max ? chars.slice(0, max).join('') : text
}

function yesNo(flag: boolean): string {
  return flag ? 'yes' : 'no'
}

export function createCommandHandler(deps: HandlerDeps): CommandHandler {
  const random = deps.random ?? Math.random
  const maxDice = deps.maxDice ?? 99
  const maxCommentLength = deps.maxCommentLength ?? 50

  async function rollCommand(args: string[], ctx: CommandContext): Promise<Reply> {
    const edition = await deps.editions.getEdition(ctx)
    let request: RollRequest
    try {
      request = parseRollArgs(args, edition)
    } catch (e) {
      if (e instanceof MalformedArgumentsError) return { text: BOT_USAGE_PROMPT }
      throw e
    }
    if (request.dicePool < 1 || request.dicePool > maxDice) return { text: diceNumberError(maxDice) }

    const result = roll(request, edition, random)
    enqueueLog(
      'debug',
      `roll ${edition} pool=${request.dicePool} edge=${request.edge} hits=${result.hits} glitch=${result.glitch ?? 'none'}`,
    )
    return {
      text: formatRollReply(result, {
        edition,
        edge: request.edge,
        comment: truncate(request.comment, maxCommentLength),
      }),
    }
  }

  async function editionCommand(args: string[], ctx: CommandContext): Promise<Reply> {
    if (args.length === 0) return { text: `Usage: /ed <edition>\nAllowed: ${ALLOWED_EDITIONS}` }
    const edition = normalizeEdition(args[0])
    if (!edition) return { text: `Invalid edition. Choose from: ${ALLOWED_EDITIONS}` }
    await deps.editions.setEdition(ctx, edition)
    return {
      text:
        ctx.chatType === 'private'
          ? `✅ Your edition is now set to ${edition}.`
          : `✅ This chat's edition is now set to ${edition}.`,
    }
  }

  async function startCommand(ctx: CommandContext): Promise<Reply> {
    if (ctx.chatType !== 'private') return { text: 'Use me in a private chat with /start!' }
    const edition = await deps.editions.getEdition(ctx)
    return {
      text: `Welcome! Your user settings have been initialized to ${edition} edition.\nUse /ed <edition> to change this setting.`,
    }
  }

  async function npcCreateCommand(rest: string, ctx: CommandContext): Promise<Reply> {
    if (!rest) return { text: NPC_CREATE_USAGE }
    const npcArgs = parseNpcCreateArgs(rest)
    if (!npcArgs.name) return { text: 'Please specify the NPC name.' }

    // aliases are looked up per chat, so they mean nothing in a private chat
    const isPrivate = ctx.chatType === 'private'
    const droppedAlias = isPrivate ? npcArgs.alias : null
    if (isPrivate) npcArgs.alias = null

    let id: number
    try {
      id = await deps.npcs.addNpc(ctx.userId, isPrivate ? null : ctx.chatId, npcArgs)
    } catch (e) {
      if (e instanceof TemplateNotFoundError) {
        return {
          text: `❌ Template alias '${e.alias}' not found. Use /npc_list_templates to see the available templates.`,
        }
      }
      throw e
    }

    const lines = [
      `✅ Created NPC #${id}:`,
      `• Name: ${npcArgs.name}`,
      `• Alias: ${npcArgs.alias ?? 'none'}`,
      `• Template: ${npcArgs.template ?? 'none'}`,
      `• Unique: ${yesNo(npcArgs.isUnique)}`,
      `• Shared: ${yesNo(npcArgs.shared)}`,
    ]
    if (droppedAlias) {
      lines.push(`⚠️ I dropped alias '${droppedAlias}' because aliases only work in group/supergroup chats.`)
    }
    return { text: lines.join('\n') }
  }

  function listTemplatesCommand(): Reply {
    const templates = deps.npcs.listTemplates()
    if (templates.length === 0) return { text: '📜 You have no NPC templates available.' }
    const lines = ['📜 Available NPC Templates:']
    for (const t of templates) lines.push(`• ${t.name} (alias: ${t.alias ?? '(none)'})`)
    return { text: lines.join('\n') }
  }

  async function dispatch(command: ParsedCommand, ctx: CommandContext): Promise<Reply | null> {
    switch (command.name) {
      case 'r':
      case 'roll':
        return rollCommand(command.args, ctx)
      case 'ed':
        return editionCommand(command.args, ctx)
      case 'start':
        return startCommand(ctx)
      case 'help':
        return { text: HELP_TEXT }
      case 'npc_create':
        return npcCreateCommand(command.rest, ctx)
      case 'npc_list_templates':
        return listTemplatesCommand()
      default:
        return null
    }
  }

  return {
    async handleText(text, ctx) {
      const command = parseCommand(text)
      if (!command) return null
      try {
        return await dispatch(command, ctx)
      } catch (e) {
        await deps.reportError(`/${command.name}`, e, ctx)
        return { text: GENERIC_FAILURE }
      }
    },

    async greetChat(chatId) {
      const edition = await deps.editions.getChatEdition(chatId)
      return {
        text: `Hello! I've initialized this chat's settings to ${edition} edition.\nUse /ed <edition> to change this setting.`,
      }
    },
  }
}
