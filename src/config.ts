import fs from 'fs/promises';
import fsSync from 'fs';
import path from 'path';
import { describeError, enqueueLog } from './asyncLogger';
import { DEFAULT_CONFIG_PATH, RuntimeConfig, runtimeConfigSchema } from './runtimeConfig';

/**
 * JSON file helpers
 *
 * Read and write the JSON files the bot keeps on disk (`config.json`, the
 * settings file, the NPC registry). Missing files and I/O or parse errors
 * produce logged warnings and safe results instead of exceptions, so a
 * broken file never takes a command down.
 *
 * @module config
 */

/**
 * Read and parse a JSON file.
 *
 * @returns The parsed value, or `undefined` when the file is missing or
 * cannot be read or parsed.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    if (!fsSync.existsSync(filePath)) return undefined;
    const raw = await fs.readFile(filePath, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (e) {
    enqueueLog('warn', `Failed to read ${filePath}: ${describeError(e)}`);
    return undefined;
  }
}

/**
 * Write a value as indented JSON. The file is written next to its target
 * and renamed into place so readers never see a half-written file.
 *
 * @returns True if the file was written.
 */
export async function writeJsonFile(filePath: string, value: unknown): Promise<boolean> {
  const tmp = `${filePath}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmp, JSON.stringify(value, null, 2), 'utf8');
    await fs.rename(tmp, filePath);
    return true;
  } catch (e) {
    enqueueLog('warn', `Failed to write ${filePath}: ${describeError(e)}`);
    return false;
  }
}

/**
 * Load and validate `config.json`, falling back to defaults (with a logged
 * warning) when it is invalid.
 */
export async function loadRuntimeConfig(cfgPath = DEFAULT_CONFIG_PATH): Promise<RuntimeConfig> {
  const raw = await readJsonFile(cfgPath);
  const result = runtimeConfigSchema.safeParse(raw ?? {});
  if (result.success) {
    if (raw !== undefined) enqueueLog('info', `Loaded runtime config from ${cfgPath}`);
    return result.data;
  }
  enqueueLog('warn', `Invalid config ${cfgPath}, using defaults: ${result.error.message}`);
  return runtimeConfigSchema.parse({});
}
