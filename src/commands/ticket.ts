import { Command } from 'commander';
import { createTracker } from '../rag/session.js';
import { extractTicket } from '../tracker/fields.js';
import { formatTicketDump, parseCommentInput } from '../tracker/format.js';
import { exitWithError, outputSuccess } from '../utils/cli.js';
import { errorMessage } from '../utils/errors.js';
import { commandContext } from './shared.js';

export const ticketCommand = new Command('ticket')
  .description('Read and comment on tracker tickets');

// Show
ticketCommand
  .command('show')
  .description('Show a ticket as the review pipeline sees it')
  .argument('<key>', 'Ticket key (or bare number with PROJECT_KEY set)')
  .option('--raw', 'Print the plain-text dump instead of JSON')
  .action(async (key: string, options: { raw?: boolean }) => {
    const ctx = commandContext();
    try {
      const tracker = createTracker(ctx.config);
      const raw = await tracker.getIssue(ctx.ticketKey(key));
      const { ticket, skipped } = extractTicket(raw, {
        acceptanceCriteriaField: ctx.config.tracker.acceptanceCriteriaField,
      });
      if (options.raw) {
        console.log(formatTicketDump(ticket));
        return;
      }
      outputSuccess({ ticket, skipped, dump: formatTicketDump(ticket) });
    } catch (error) {
      exitWithError(errorMessage(error));
    }
  });

// Comment
ticketCommand
  .command('comment')
  .description("Add a comment to a ticket, given as 'ISSUE-KEY|COMMENT'")
  .argument('<input>', "Ticket key and comment separated by '|'")
  .action(async (input: string) => {
    const ctx = commandContext();
    try {
      const { key: rawKey, comment } = parseCommentInput(input);
      const key = ctx.ticketKey(rawKey);
      const tracker = createTracker(ctx.config);
      const commentId = await tracker.addComment(key, comment);
      outputSuccess({ ticketKey: key, commentId, message: `Successfully added comment to ${key}` });
    } catch (error) {
      exitWithError(errorMessage(error));
    }
  });
