#!/usr/bin/env node
import { describeError, enqueueLog } from './asyncLogger';
import { loadRuntimeConfig } from './config';
import { CommandContext } from './context';
import { normalizeEdition } from './dice/edition';
import { createRandomSource } from './dice/rng';
import { parseRollArgs } from './dice/rollArgs';
import { roll } from './dice/roller';
import EditionStore from './editionStore';
import { MalformedArgumentsError } from './errors';
import { formatRollReply } from './format';
import { BOT_USAGE_PROMPT, diceNumberError } from './messages';
import NpcRegistry from './npc';
import { npcFile, settingsFile } from './services';

/**
 * Command-line interface
 *
 * One-shot rolls, edition settings maintenance and starting the console
 * bot. Library modules do the work; this file only parses argv and prints.
 *
 * @module cli
 */

function printUsage() {
  console.log('Shadowrun dice bot CLI');
  console.log('Usage: sr-dice-bot <command> [args]');
  console.log('Commands:');
  console.log('  roll [--edition E] <dice>[e] [limit] [threshold] [comment]   Roll once and print');
  console.log('  edition get <id> [--chat]                                    Show a user (or chat) edition');
  console.log('  edition set <id> <edition> [--chat]                          Change a user (or chat) edition');
  console.log('  templates                                                    List NPC templates');
  console.log('  start                                                        Start the console bot');
  console.log('  help, -h, --help                                             Show this help');
}

/** Remove `--name value` from args, returning the value. */
function takeOption(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i < 0) return undefined;
  const value = args[i + 1];
  args.splice(i, 2);
  return value;
}

/** Remove a boolean `--name` flag from args. */
function takeFlag(args: string[], name: string): boolean {
  const i = args.indexOf(name);
  if (i < 0) return false;
  args.splice(i, 1);
  return true;
}

/**
 * Execute a CLI command.
 *
 * @param argv - Typically `process.argv.slice(2)`.
 * @returns Exit code: 0 success, 1 failure, 2 usage error.
 */
export async function runCLI(argv: string[]): Promise<number> {
  const args = [...argv];
  if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  const cmd = args.shift();
  const config = await loadRuntimeConfig();

  if (cmd === 'roll') {
    const editionArg = takeOption(args, '--edition');
    const edition = editionArg === undefined ? config.dice.defaultEdition : normalizeEdition(editionArg);
    if (!edition) {
      console.error(`Unknown edition: ${editionArg}`);
      return 2;
    }
    try {
      const request = parseRollArgs(args, edition);
      if (request.dicePool < 1 || request.dicePool > config.dice.maxDice) {
        console.error(diceNumberError(config.dice.maxDice));
        return 2;
      }
      const result = roll(request, edition, createRandomSource(config.rng.method, config.rng.seed));
      console.log(formatRollReply(result, { edition, edge: request.edge, comment: request.comment }));
      return 0;
    } catch (e) {
      if (e instanceof MalformedArgumentsError) {
        console.error(BOT_USAGE_PROMPT);
        return 2;
      }
      throw e;
    }
  }

  if (cmd === 'edition') {
    const isChat = takeFlag(args, '--chat');
    const [action, id, value] = args;
    if ((action !== 'get' && action !== 'set') || !id || (action === 'set' && !value)) {
      console.error('Usage: edition get <id> [--chat] | edition set <id> <edition> [--chat]');
      return 2;
    }
    const ctx: CommandContext = isChat
      ? { userId: id, chatId: id, chatType: 'group' }
      : { userId: id, chatId: id, chatType: 'private' };
    const store = new EditionStore({ file: settingsFile(config), defaultEdition: config.dice.defaultEdition });
    await store.load();
    if (action === 'get') {
      console.log(`${isChat ? 'chat' : 'user'} ${id}: ${await store.getEdition(ctx)}`);
      return 0;
    }
    const edition = normalizeEdition(value);
    if (!edition) {
      console.error(`Unknown edition: ${value}`);
      return 2;
    }
    await store.setEdition(ctx, edition);
    console.log(`${isChat ? 'chat' : 'user'} ${id}: ${edition}`);
    return 0;
  }

  if (cmd === 'templates') {
    const registry = new NpcRegistry({ file: npcFile(config), templatesFile: config.paths.npcTemplates });
    await registry.load();
    const templates = registry.listTemplates();
    if (templates.length === 0) console.log('No NPC templates available');
    for (const t of templates) console.log(`${t.alias ?? '(none)'} -> ${t.name}${t.edition ? ` [${t.edition}]` : ''}`);
    return 0;
  }

  if (cmd === 'start') {
    try {
      const bot = await import('./bot');
      await bot.start();
      return 0;
    } catch (e) {
      enqueueLog('error', 'CLI start failed: ' + describeError(e));
      console.error('Failed to start bot:', describeError(e));
      return 1;
    }
  }

  console.error('Unknown command:', cmd);
  printUsage();
  return 2;
}

async function main() {
  try {
    const code = await runCLI(process.argv.slice(2));
    // `start` keeps the process alive on its own
    if (process.argv[2] !== 'start' || code !== 0) process.exit(code);
  } catch (err) {
    console.error('CLI error:', err);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
