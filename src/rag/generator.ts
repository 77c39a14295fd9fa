import { extractTicket } from '../tracker/fields.js';
import { errorMessage } from '../utils/errors.js';
import { classificationMessages, criteriaMessages, retrievalQuery } from './prompts.js';
import type { ChatModel } from '../llm/chat.js';
import type { Session } from './session.js';
import { TICKET_CATEGORIES, type AnalysisResult, type ScoredChunk, type TicketRecord } from '../types.js';

type Stage = 'fetch' | 'classify' | 'generate';

/**
 * Map a classification reply onto a known category, ignoring case and
 * surrounding whitespace. Anything else is kept as the literal reply.
 */
export function normalizeCategory(reply: string): string {
  const trimmed = reply.trim();
  const lowered = trimmed.toLowerCase();
  return TICKET_CATEGORIES.find((c) => c.toLowerCase() === lowered) ?? trimmed;
}

export async function classifyTicket(chat: ChatModel, ticket: TicketRecord): Promise<string> {
  const reply = await chat.complete(classificationMessages(ticket));
  return normalizeCategory(reply);
}

/**
 * Related chunks for `ticket`, best first. Retrieval problems degrade to
 * no context rather than failing the analysis.
 */
export async function retrieveContext(session: Session, ticket: TicketRecord): Promise<ScoredChunk[]> {
  try {
    const embedding = await session.embedder.embedQuery(retrievalQuery(ticket));
    return await session.index.query(embedding, session.config.retrieval.topK);
  } catch (error) {
    session.logger.warn(`Retrieving context for ${ticket.key} failed, continuing without: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * Classify the ticket, then propose acceptance criteria grounded on the
 * knowledge base. Never throws: failures come back as an error result.
 */
export async function analyzeTicket(session: Session, ticketKey: string): Promise<AnalysisResult> {
  const { tracker, chat, logger, config } = session;
  let stage: Stage = 'fetch';

  try {
    const raw = await tracker.getIssue(ticketKey);
    const { ticket, skipped } = extractTicket(raw, {
      acceptanceCriteriaField: config.tracker.acceptanceCriteriaField,
    });
    for (const field of skipped) {
      logger.warn(`Ignoring field ${field.field} of ${field.ticketKey}: ${field.reason}`);
    }

    const context = await retrieveContext(session, ticket);
    const relatedContext = context.map((c) => c.text).join('\n');

    stage = 'classify';
    const category = await classifyTicket(chat, ticket);
    logger.info(`Classified ${ticket.key} as ${category}`);

    stage = 'generate';
    const recommendation = await chat.complete(criteriaMessages(ticket, category, relatedContext));

    return {
      status: 'ok',
      ticketKey: ticket.key,
      category,
      recommendation,
      context,
      text: recommendation,
    };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Error analyzing ticket ${ticketKey} (${stage}): ${message}`);
    return {
      status: 'error',
      ticketKey,
      error: message,
      text: `Error analyzing ticket ${ticketKey}: ${message}`,
    };
  }
}

/**
 * Analyze tickets one after another. A failed ticket never stops the rest.
 */
export async function analyzeTickets(session: Session, ticketKeys: string[]): Promise<AnalysisResult[]> {
  const results: AnalysisResult[] = [];
  for (const key of ticketKeys) {
    results.push(await analyzeTicket(session, key));
  }
  return results;
}
