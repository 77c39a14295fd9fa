import { Command } from 'commander';
import { loadProjectContext } from '../context/documents.js';
import { reviewTicket } from '../review/pipeline.js';
import { exitWithError, parseFormat } from '../utils/cli.js';
import { errorMessage } from '../utils/errors.js';
import type { ReviewResult } from '../types.js';
import { commandContext, outputResults, withSession } from './shared.js';

export const reviewCommand = new Command('review')
  .description('Analyze, refine and validate acceptance criteria against the project context')
  .argument('<keys...>', 'Ticket keys to review')
  .option('--comment', 'Post the validated analysis as a ticket comment')
  .option('-f, --format <format>', 'Output format: json or text', parseFormat, 'json')
  .action(async (keys: string[], options: { comment?: boolean; format: 'json' | 'text' }) => {
    const ctx = commandContext();
    try {
      const context = loadProjectContext(ctx.config.documents, ctx.logger);
      const results = await withSession(ctx, async (session) => {
        const reviewed: ReviewResult[] = [];
        for (const key of keys.map(ctx.ticketKey)) {
          reviewed.push(await reviewTicket(session, context, key, { comment: options.comment }));
        }
        return reviewed;
      });
      outputResults(options.format, 'Review', results);
    } catch (error) {
      exitWithError(errorMessage(error));
    }
  });
