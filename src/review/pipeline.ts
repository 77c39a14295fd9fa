import { extractTicket } from '../tracker/fields.js';
import { formatTicketDump } from '../tracker/format.js';
import { errorMessage } from '../utils/errors.js';
import { dedupeSections } from './cleanup.js';
import { analyzerMessages, enhancerMessages, validatorMessages } from './prompts.js';
import type { ProjectContext } from '../context/documents.js';
import type { Session } from '../rag/session.js';
import type { ReviewResult } from '../types.js';

export interface ReviewOptions {
  comment?: boolean;
}

/**
 * Analyze, refine and validate acceptance criteria for one ticket, each
 * stage reading the previous stage's output. Optionally posts the final
 * text as a comment. Failures come back as an error result.
 */
export async function reviewTicket(
  session: Session,
  context: ProjectContext,
  ticketKey: string,
  options: ReviewOptions = {},
): Promise<ReviewResult> {
  const { tracker, chat, logger, config } = session;
  let stage = 'fetch';

  try {
    const raw = await tracker.getIssue(ticketKey);
    const { ticket } = extractTicket(raw, {
      acceptanceCriteriaField: config.tracker.acceptanceCriteriaField,
    });

    stage = 'analyze';
    const analysis = await chat.complete(analyzerMessages(context, formatTicketDump(ticket)));
    stage = 'refine';
    const refined = await chat.complete(enhancerMessages(ticket.key, analysis));
    stage = 'validate';
    const validated = dedupeSections(await chat.complete(validatorMessages(ticket.key, context, refined)));

    if (!validated) {
      throw new Error('No valid analysis sections found');
    }

    let commented = false;
    if (options.comment) {
      stage = 'comment';
      await tracker.addComment(ticket.key, validated);
      commented = true;
      logger.info(`Added comment to ${ticket.key}`);
    }

    return {
      status: 'ok',
      ticketKey: ticket.key,
      stages: { analysis, refined, validated },
      commented,
      text: validated,
    };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Error reviewing ticket ${ticketKey} (${stage}): ${message}`);
    return {
      status: 'error',
      ticketKey,
      error: message,
      text: `Error reviewing ticket ${ticketKey}: ${message}`,
    };
  }
}
