/**
 * Application entry point
 *
 * Re-exports the console bot's `start` as the default export and the dice
 * core for library use. Run directly, it hands known subcommands to the CLI
 * and otherwise starts the console bot.
 *
 * @module index
 */

import { start } from './bot';
import { runCLI } from './cli';
import logger from './logger';

export default start;

export { parseRollArgs, parseThreshold } from './dice/rollArgs';
export type { RollRequest } from './dice/rollArgs';
export { roll, rollDicePool, scoreWaves } from './dice/roller';
export type { Glitch, Outcome, RollOutcome, RollParams } from './dice/roller';
export { DEFAULT_EDITION, normalizeEdition } from './dice/edition';
export type { Edition } from './dice/edition';
export { createRandomSource } from './dice/rng';
export type { RandomSource } from './dice/rng';
export {
  BotError,
  InvalidDicePoolError,
  InvalidLimitError,
  MalformedArgumentsError,
  TemplateNotFoundError,
} from './errors';
export { createCommandHandler } from './handler';
export { createServices } from './services';

const CLI_COMMANDS = new Set(['roll', 'edition', 'templates', 'help', '-h', '--help']);

if (require.main === module) {
  const argv = process.argv.slice(2);
  if (argv.length > 0 && CLI_COMMANDS.has(argv[0])) {
    runCLI(argv)
      .then(code => process.exit(code))
      .catch(err => {
        logger.error('CLI error: ' + String(err));
        process.exit(1);
      });
  } else {
    start().catch(err => {
      logger.error('Uncaught error starting bot: ' + String(err));
      process.exit(1);
    });
  }
}
