import { loadConfig, type AppConfig } from '../utils/config.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { normalizeTicketKey } from '../tracker/format.js';
import { errorMessage } from '../utils/errors.js';
import { exitWithError, outputSuccess, renderTextBlock, type OutputFormat } from '../utils/cli.js';
import { closeSession, openSession, type Session } from '../rag/session.js';

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  ticketKey: (input: string) => string;
}

/**
 * Load configuration for a command. Configuration errors are fatal and
 * reported before any work starts.
 */
export function commandContext(): CommandContext {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    exitWithError(errorMessage(error));
  }
  const projectKey = config.tracker.projectKey;
  return {
    config,
    logger: createLogger(config.logLevel),
    ticketKey: (input) => normalizeTicketKey(input, projectKey),
  };
}

/**
 * Open a session for the duration of `work` and close it afterwards,
 * whether or not the work succeeds.
 */
export async function withSession<T>(ctx: CommandContext, work: (session: Session) => Promise<T>): Promise<T> {
  const session = await openSession(ctx.config, ctx.logger);
  try {
    return await work(session);
  } finally {
    closeSession(session);
  }
}

/**
 * Print per-ticket results in the requested format.
 */
export function outputResults<R extends { ticketKey: string; text: string; status: 'ok' | 'error' }>(
  format: OutputFormat,
  heading: string,
  results: R[],
  extra: Record<string, unknown> = {},
): void {
  if (format === 'text') {
    for (const result of results) {
      console.log(renderTextBlock(`${heading} for ${result.ticketKey}`, result.text));
    }
    return;
  }
  outputSuccess({
    ...extra,
    results,
    failed: results.filter((r) => r.status === 'error').map((r) => r.ticketKey),
  });
}
