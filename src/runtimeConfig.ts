import fs from 'fs'
import { z } from 'zod'

/**
 * Runtime configuration schema
 *
 * `config.json` in the working directory is optional. Every key has a
 * default, so an empty object (or a missing file) yields a complete config.
 * This module does no logging so the logger itself can read its settings
 * from here.
 *
 * Example:
 * ```json
 * {
 *   "paths": { "dataDir": "data" },
 *   "dice": { "maxDice": 60, "defaultEdition": "SR4" },
 *   "rng": { "method": "crypto" },
 *   "errorReporting": { "webhookUrl": "https://hooks.example.test/errors" }
 * }
 * ```
 *
 * @module runtimeConfig
 */

export const runtimeConfigSchema = z.object({
  paths: z
    .object({
      dataDir: z.string().default('data'),
      logsDir: z.string().default('logs'),
      npcTemplates: z.string().default('templates/npc-templates.json'),
    })
    .default({}),
  dice: z
    .object({
      maxDice: z.number().int().positive().default(99),
      maxCommentLength: z.number().int().positive().default(50),
      defaultEdition: z.enum(['SR4', 'SR5', 'SR6']).default('SR5'),
    })
    .default({}),
  rng: z
    .object({
      method: z.enum(['math', 'crypto', 'mulberry32']).default('math'),
      seed: z.number().int().nullable().default(null),
    })
    .default({}),
  logging: z
    .object({
      level: z.string().optional(),
      dailyRotate: z.boolean().default(true),
      maxSize: z.string().default('20m'),
      maxFiles: z.string().default('14d'),
      console: z.boolean().optional(),
    })
    .default({}),
  errorReporting: z
    .object({
      webhookUrl: z.string().url().optional(),
      timeoutMs: z.number().int().positive().default(5000),
    })
    .default({}),
})

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>

export const DEFAULT_CONFIG_PATH = 'config.json'

/**
 * Validate a parsed `config.json` value, filling in defaults.
 */
export function parseRuntimeConfig(raw: unknown): RuntimeConfig {
  return runtimeConfigSchema.parse(raw ?? {})
}

/**
 * Synchronously load `config.json`. A missing file yields the defaults; an
 * unreadable or invalid one yields the defaults plus a warning for the
 * caller to log.
 */
export function loadRuntimeConfigSync(cfgPath = DEFAULT_CONFIG_PATH): { config: RuntimeConfig; warning?: string } {
  if (!fs.existsSync(cfgPath)) return { config: parseRuntimeConfig({}) }
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(cfgPath, 'utf8'))
    const result = runtimeConfigSchema.safeParse(raw)
    if (result.success) return { config: result.data }
    return {
      config: parseRuntimeConfig({}),
      warning: `Invalid config ${cfgPath}: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
    }
  } catch (e) {
    return {
      config: parseRuntimeConfig({}),
      warning: `Failed to read config ${cfgPath}: ${e instanceof Error ? e.message : String(e)}`,
    }
  }
}
