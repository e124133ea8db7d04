import logger from './logger';
import { describeError, enqueueLog } from './asyncLogger';
import { CommandContext } from './context';

/**
 * Error reporting
 *
 * Unexpected failures inside command handlers are logged with their stack
 * and, when `errorReporting.webhookUrl` is set in `config.json`, posted as a
 * JSON report to that webhook (for example a chat channel the maintainers
 * watch). The stack is split into fenced chunks of at most 1024 characters
 * so each fits one embed field of the common chat webhooks.
 *
 * Report body:
 * {
 *   "title": "Error in /r",
 *   "user": "42",
 *   "chat": "-100123",
 *   "error": "boom",
 *   "fields": [{ "name": "Traceback", "value": "```text\n...\n```" }]
 * }
 *
 * @module errorReporter
 */

export type ReportField = { name: string; value: string };

export type ErrorReport = {
  title: string;
  user: string;
  chat: string;
  error: string;
  fields: ReportField[];
};

/** Posts a JSON body and resolves with the HTTP status. */
export type PostJson = (url: string, body: string, timeoutMs: number) => Promise<number>;

export type ErrorReporter = (where: string, error: unknown, ctx?: CommandContext) => Promise<{ ok: boolean; reason?: string }>;

const FENCE_PREFIX = '```text\n';
const FENCE_SUFFIX = '\n```';
const MAX_FIELD_LEN = 1024;

/**
 * Split a stack trace into fenced report fields.
 */
export function chunkTraceback(tb: string, maxFieldLen = MAX_FIELD_LEN): ReportField[] {
  const chunkSize = maxFieldLen - (FENCE_PREFIX.length + FENCE_SUFFIX.length);
  const fields: ReportField[] = [];
  for (let idx = 0; idx < tb.length; idx += chunkSize) {
    const n = idx / chunkSize;
    fields.push({
      name: n === 0 ? 'Traceback' : `Traceback (cont. ${n})`,
      value: `${FENCE_PREFIX}${tb.slice(idx, idx + chunkSize)}${FENCE_SUFFIX}`,
    });
  }
  return fields;
}

export function buildErrorReport(where: string, error: unknown, ctx?: CommandContext): ErrorReport {
  const tb = error instanceof Error && error.stack ? error.stack : 'No traceback available';
  return {
    title: `Error in ${where}`,
    user: ctx?.userId ?? 'unknown',
    chat: ctx?.chatId ?? 'unknown',
    error: describeError(error),
    fields: chunkTraceback(tb),
  };
}

export const postJson: PostJson = async (url, body, timeoutMs) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal: controller.signal,
    });
    return res.status;
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Create the reporter used by the command handler. Never throws: delivery
 * problems are logged and returned as `{ ok: false, reason }`.
 */
export function createErrorReporter(
  opts: { webhookUrl?: string; timeoutMs?: number; post?: PostJson } = {},
): ErrorReporter {
  const timeoutMs = opts.timeoutMs ?? 5000;
  const post = opts.post ?? postJson;

  return async (where, error, ctx) => {
    const report = buildErrorReport(where, error, ctx);
    logger.error(`${report.title} (user ${report.user}, chat ${report.chat}): ${report.error}`);
    if (error instanceof Error && error.stack) logger.error(error.stack);

    if (!opts.webhookUrl) return { ok: false, reason: 'disabled' };
    try {
      const status = await post(opts.webhookUrl, JSON.stringify(report), timeoutMs);
      const ok = status === 200 || status === 201 || status === 204;
      enqueueLog(ok ? 'info' : 'warn', `Error report for ${where} ${ok ? 'delivered' : `rejected (${status})`}`);
      return ok ? { ok } : { ok, reason: `status ${status}` };
    } catch (e) {
      enqueueLog('warn', 'Failed to deliver error report: ' + describeError(e));
      return { ok: false, reason: describeError(e) };
    }
  };
}
