/**
 * Console bot
 *
 * Runs the command handler against stdin: every line is treated as a message
 * from a local user in a private chat and the reply is printed to stdout.
 * Chat platform transports use the same handler through `createServices`;
 * this module is the one that ships with the package so the bot can be
 * exercised without network access.
 *
 * Important exports:
 * - start(): load config, build the services and read commands until EOF
 * - shutdown(...): test-friendly shutdown wrapper
 *
 * @module bot
 */

import * as readline from 'readline';
import logger from './logger';
import { describeError, enqueueLog } from './asyncLogger';
import { loadRuntimeConfig } from './config';
import { CommandContext } from './context';
import { answerQueue, loggingQueue, storeQueue } from './queues';
import { createServices } from './services';

export const CONSOLE_CONTEXT: CommandContext = {
  userId: 'console',
  chatId: 'console',
  chatType: 'private',
};

type Closable = Pick<readline.Interface, 'close'>;

export type ConsoleStreams = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
};

/**
 * Start the console bot. Resolves once the services are ready; the process
 * keeps reading input (stdin by default) until it closes or a signal arrives.
 * Lines are answered one at a time, in the order they were read.
 */
export async function start(streams: ConsoleStreams = {}): Promise<void> {
  const config = await loadRuntimeConfig();
  const { handler } = await createServices(config);

  const rl = readline.createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout,
  });
  let closing = false;
  const shutdownHandler = async (exitCode = 0) => {
    if (closing) return;
    closing = true;
    await shutdown(rl, { exitCode });
  };

  rl.on('line', line => {
    answerQueue.push(async () => {
      const reply = await handler.handleText(line, CONSOLE_CONTEXT);
      if (reply) console.log(reply.text);
      else if (line.trim()) console.log('Unknown command. Try /help');
    });
  });
  rl.on('close', () => void shutdownHandler(0));
  process.once('SIGINT', () => void shutdownHandler(0));
  process.once('SIGTERM', () => void shutdownHandler(0));

  enqueueLog('info', 'Console bot ready; type /help for commands');
}

/**
 * Close the input, wait for pending replies, store writes and log writes,
 * then close the logger.
 *
 * @param options.skipExit - Leave the process running (tests).
 */
export async function shutdown(
  rl: Closable,
  options: { exitCode?: number; skipExit?: boolean } = {},
): Promise<void> {
  const { exitCode = 0, skipExit = false } = options;
  try {
    enqueueLog('info', 'Shutting down');
    rl.close();
    await answerQueue.drain();
    await storeQueue.drain();
    enqueueLog('info', 'Shutdown complete');
    await loggingQueue.drain();
    logger.close();
  } catch (err) {
    logger.error('Error during shutdown: ' + describeError(err));
  } finally {
    if (!skipExit) process.exit(exitCode);
  }
}
