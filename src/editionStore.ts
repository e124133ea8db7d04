import { EventEmitter } from 'events'
import { z } from 'zod'
import { readJsonFile, writeJsonFile } from './config'
import { enqueueLog } from './asyncLogger'
import { CommandContext } from './context'
import { DEFAULT_EDITION, Edition } from './dice/edition'
import { storeQueue } from './queues'

const editionSchema = z.enum(['SR4', 'SR5', 'SR6'])

const settingsFileSchema = z.object({
  users: z.record(editionSchema).default({}),
  chats: z.record(editionSchema).default({}),
})

export type SettingsScope = 'user' | 'chat'

export type EditionChangedEvent = { scope: SettingsScope; id: string; edition: Edition; initialized: boolean }

export type EditionStoreOptions = {
  /** JSON file to persist to. Without one the store lives in memory only. */
  file?: string
  defaultEdition?: Edition
}

/**
 * EditionStore
 *
 * Preferred Shadowrun edition per user and per chat. Private chats use the
 * user's own setting; groups, supergroups and channels share one setting per
 * chat. Reading a scope that has no entry yet stores the default edition for
 * it, so every user or chat the bot has seen has an explicit entry.
 *
 * Events emitted:
 * - 'changed' : {@link EditionChangedEvent}, for both explicit sets and
 *   first-read initialisation
 */
export default class EditionStore extends EventEmitter {
  private readonly file?: string
  private readonly defaultEdition: Edition
  private readonly users = new Map<string, Edition>()
  private readonly chats = new Map<string, Edition>()

  constructor(opts: EditionStoreOptions = {}) {
    super()
    this.file = opts.file
    this.defaultEdition = opts.defaultEdition ?? DEFAULT_EDITION
  }

  /**
   * Load persisted settings. An invalid file is logged and ignored.
   */
  async load(): Promise<void> {
    if (!this.file) return
    const raw = await readJsonFile(this.file)
    if (raw === undefined) return
    const parsed = settingsFileSchema.safeParse(raw)
    if (!parsed.success) {
      enqueueLog('warn', `Ignoring invalid settings file ${this.file}: ${parsed.error.message}`)
      return
    }
    for (const [id, edition] of Object.entries(parsed.data.users)) this.users.set(id, edition)
    for (const [id, edition] of Object.entries(parsed.data.chats)) this.chats.set(id, edition)
  }

  async getUserEdition(userId: string): Promise<Edition> {
    return this.getOrInit('user', userId)
  }

  async getChatEdition(chatId: string): Promise<Edition> {
    return this.getOrInit('chat', chatId)
  }

  /** Edition in force for a command: the user's in private chats, the chat's elsewhere. */
  async getEdition(ctx: CommandContext): Promise<Edition> {
    return ctx.chatType === 'private' ? this.getUserEdition(ctx.userId) : this.getChatEdition(ctx.chatId)
  }

  async setEdition(ctx: CommandContext, edition: Edition): Promise<void> {
    if (ctx.chatType === 'private') await this.write('user', ctx.userId, edition, false)
    else await this.write('chat', ctx.chatId, edition, false)
  }

  private mapFor(scope: SettingsScope): Map<string, Edition> {
    return scope === 'user' ? this.users : this.chats
  }

  private async getOrInit(scope: SettingsScope, id: string): Promise<Edition> {
    const existing = this.mapFor(scope).get(id)
    if (existing) return existing
    await this.write(scope, id, this.defaultEdition, true)
    return this.defaultEdition
  }

  private async write(scope: SettingsScope, id: string, edition: Edition, initialized: boolean): Promise<void> {
    this.mapFor(scope).set(id, edition)
    const event: EditionChangedEvent = { scope, id, edition, initialized }
    this.emit('changed', event)
    await this.persist()
  }

  private async persist(): Promise<void> {
    const file = this.file
    if (!file) return
    await storeQueue.run(() =>
      writeJsonFile(file, {
        users: Object.fromEntries(this.users),
        chats: Object.fromEntries(this.chats),
      }),
    )
  }
}
