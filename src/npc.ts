import { z } from 'zod'
import { enqueueLog } from './asyncLogger'
import { readJsonFile, writeJsonFile } from './config'
import { Edition } from './dice/edition'
import { TemplateNotFoundError } from './errors'
import { storeQueue } from './queues'

/**
 * NPC registry
 *
 * Named non-player characters owned by a user (and, outside private chats,
 * by the chat they were created in). An NPC can be cloned from a template:
 * a record flagged as a template whose edition and stat block are copied
 * into the new NPC.
 *
 * @module npc
 */

const editionSchema = z.enum(['SR4', 'SR5', 'SR6'])
const statsSchema = z.record(z.union([z.number(), z.string()]))

export type NpcStats = z.infer<typeof statsSchema>

const npcRecordSchema = z.object({
  id: z.number().int().positive(),
  ownerUserId: z.string().nullable(),
  ownerChatId: z.string().nullable(),
  name: z.string(),
  alias: z.string().nullable(),
  template: z.boolean(),
  isUnique: z.boolean(),
  shared: z.boolean(),
  edition: editionSchema.nullable(),
  stats: statsSchema,
})

export type NpcRecord = z.infer<typeof npcRecordSchema>

const registryFileSchema = z.object({
  nextId: z.number().int().positive(),
  npcs: z.array(npcRecordSchema),
})

export const templateSeedSchema = z.array(
  z.object({
    name: z.string().min(1),
    alias: z.string().min(1),
    edition: editionSchema.optional(),
    stats: statsSchema.default({}),
  }),
)

export type NpcTemplateSeed = z.input<typeof templateSeedSchema>[number]

export type NpcCreateArgs = {
  name: string
  alias: string | null
  template: string | null
  isUnique: boolean
  shared: boolean
}

function takeOption(text: string, flag: string): { value: string | null; rest: string } {
  const match = new RegExp(`-${flag}\\s+(\\S+)`).exec(text)
  if (!match) return { value: null, rest: text }
  return { value: match[1], rest: text.slice(0, match.index) + text.slice(match.index + match[0].length) }
}

function takeFlag(text: string, flag: string): { set: boolean; rest: string } {
  const pattern = new RegExp(`(\\s|^)-${flag}(\\s|$)`, 'g')
  if (!new RegExp(pattern.source).test(text)) return { set: false, rest: text }
  return { set: true, rest: text.replace(pattern, ' ') }
}

/**
 * Parse the text after `/npc_create`:
 *
 * ```
 * <name> [-a alias] [-t template] [-u] [-s]
 * ```
 *
 * Options may appear anywhere; what is left is the name, trimmed and
 * stripped of surrounding quotes. An empty name is returned as `''` for the
 * caller to reject.
 */
export function parseNpcCreateArgs(text: string): NpcCreateArgs {
  const alias = takeOption(text, 'a')
  const template = takeOption(alias.rest, 't')
  const unique = takeFlag(template.rest, 'u')
  const shared = takeFlag(unique.rest, 's')
  const name = shared.rest
    .trim()
    .replace(/^"+|"+$/g, '')
    .replace(/^'+|'+$/g, '')
  return {
    name,
    alias: alias.value,
    template: template.value,
    isUnique: unique.set,
    shared: shared.set,
  }
}

export type NpcRegistryOptions = {
  /** JSON file to persist to. Without one the registry lives in memory only. */
  file?: string
  /** JSON file of template seeds, see `templates/npc-templates.json`. */
  templatesFile?: string
}

export default class NpcRegistry {
  private readonly file?: string
  private readonly templatesFile?: string
  private npcs: NpcRecord[] = []
  private nextId = 1

  constructor(opts: NpcRegistryOptions = {}) {
    this.file = opts.file
    this.templatesFile = opts.templatesFile
  }

  /**
   * Load the persisted registry, then add any seed template whose alias is
   * not already a template.
   */
  async load(): Promise<void> {
    if (this.file) {
      const raw = await readJsonFile(this.file)
      if (raw !== undefined) {
        const parsed = registryFileSchema.safeParse(raw)
        if (parsed.success) {
          this.npcs = parsed.data.npcs
          const maxId = this.npcs.reduce((max, n) => Math.max(max, n.id), 0)
          this.nextId = Math.max(parsed.data.nextId, maxId + 1)
        } else {
          enqueueLog('warn', `Ignoring invalid NPC registry ${this.file}: ${parsed.error.message}`)
        }
      }
    }
    if (this.templatesFile) {
      const raw = await readJsonFile(this.templatesFile)
      if (raw === undefined) return
      const seeds = templateSeedSchema.safeParse(raw)
      if (!seeds.success) {
        enqueueLog('warn', `Ignoring invalid NPC templates ${this.templatesFile}: ${seeds.error.message}`)
        return
      }
      await this.seedTemplates(seeds.data)
    }
  }

  /**
   * Register templates. Aliases that already name a template are skipped.
   *
   * @returns Number of templates added.
   */
  async seedTemplates(seeds: NpcTemplateSeed[]): Promise<number> {
    let added = 0
    for (const seed of templateSeedSchema.parse(seeds)) {
      if (this.findTemplate(seed.alias)) continue
      this.npcs.push({
        id: this.nextId++,
        ownerUserId: null,
        ownerChatId: null,
        name: seed.name,
        alias: seed.alias,
        template: true,
        isUnique: false,
        shared: true,
        edition: seed.edition ?? null,
        stats: seed.stats,
      })
      added++
    }
    if (added > 0) await this.persist()
    return added
  }

  findTemplate(alias: string): NpcRecord | undefined {
    return this.npcs.find(n => n.template && n.alias === alias)
  }

  listTemplates(): NpcRecord[] {
    return this.npcs.filter(n => n.template)
  }

  get(id: number): NpcRecord | undefined {
    return this.npcs.find(n => n.id === id)
  }

  /**
   * Create an NPC, cloning edition and stats from `args.template` when set.
   *
   * @param chatId - `null` for NPCs created in private chats.
   * @returns The new NPC's id.
   * @throws {TemplateNotFoundError} When the template alias is unknown.
   */
  async addNpc(userId: string, chatId: string | null, args: NpcCreateArgs): Promise<number> {
    let edition: Edition | null = null
    let stats: NpcStats = {}
    if (args.template) {
      const template = this.findTemplate(args.template)
      if (!template) throw new TemplateNotFoundError(args.template)
      edition = template.edition
      stats = { ...template.stats }
    }
    const record: NpcRecord = {
      id: this.nextId++,
      ownerUserId: userId,
      ownerChatId: chatId,
      name: args.name,
      alias: args.alias,
      template: false,
      isUnique: args.isUnique,
      shared: args.shared,
      edition,
      stats,
    }
    this.npcs.push(record)
    await this.persist()
    return record.id
  }

  private async persist(): Promise<void> {
    const file = this.file
    if (!file) return
    const ok = await storeQueue.run(() => writeJsonFile(file, { nextId: this.nextId, npcs: this.npcs }))
    if (!ok) enqueueLog('warn', `NPC registry kept in memory only; writing ${file} failed`)
  }
}
