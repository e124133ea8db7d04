import path from 'path'
import { enqueueLog } from './asyncLogger'
import { createRandomSource } from './dice/rng'
import EditionStore, { EditionChangedEvent } from './editionStore'
import { createErrorReporter } from './errorReporter'
import { CommandHandler, createCommandHandler } from './handler'
import NpcRegistry from './npc'
import { RuntimeConfig } from './runtimeConfig'

/**
 * Wiring shared by the console bot and the CLI: stores backed by files in
 * `paths.dataDir`, the error reporter and the command handler.
 *
 * @module services
 */

export type Services = {
  config: RuntimeConfig
  editions: EditionStore
  npcs: NpcRegistry
  handler: CommandHandler
}

export function settingsFile(config: RuntimeConfig): string {
  return path.join(config.paths.dataDir, 'settings.json')
}

export function npcFile(config: RuntimeConfig): string {
  return path.join(config.paths.dataDir, 'npcs.json')
}

export async function createServices(config: RuntimeConfig): Promise<Services> {
  const editions = new EditionStore({ file: settingsFile(config), defaultEdition: config.dice.defaultEdition })
  const npcs = new NpcRegistry({ file: npcFile(config), templatesFile: config.paths.npcTemplates })
  await editions.load()
  await npcs.load()

  editions.on('changed', (ev: EditionChangedEvent) => {
    enqueueLog('info', `${ev.initialized ? 'Initialized' : 'Set'} ${ev.scope} ${ev.id} edition to ${ev.edition}`)
  })

  const handler = createCommandHandler({
    editions,
    npcs,
    reportError: createErrorReporter({
      webhookUrl: config.errorReporting.webhookUrl,
      timeoutMs: config.errorReporting.timeoutMs,
    }),
    random: createRandomSource(config.rng.method, config.rng.seed),
    maxDice: config.dice.maxDice,
    maxCommentLength: config.dice.maxCommentLength,
  })

  return { config, editions, npcs, handler }
}
