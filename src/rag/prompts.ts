import { TICKET_CATEGORIES, type TicketRecord } from '../types.js';
import type { ChatMessage } from '../llm/chat.js';

export const MAX_CRITERIA = 4;

export const ANALYZER_SYSTEM_PROMPT = `You are a ticket analyzer for an embedded systems engineering team.
You analyze tracker tickets and propose precise acceptance criteria,
based on the team's Definition of Done and on context from related tickets.`;

export function retrievalQuery(ticket: TicketRecord): string {
  return `Based on the ticket '${ticket.summary}', what should be the acceptance criteria?`;
}

export function classificationMessages(ticket: TicketRecord): ChatMessage[] {
  const categories = TICKET_CATEGORIES.map((c) => `- ${c}`).join('\n');
  return [
    { role: 'system', content: ANALYZER_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Based on the ticket information, classify this ticket into one of these categories:
${categories}

Ticket Information:
- Summary: ${ticket.summary}
- Description: ${ticket.description}
- Type: ${ticket.type}

Provide ONLY the category name, nothing else.`,
    },
  ];
}

export function criteriaMessages(ticket: TicketRecord, category: string, relatedContext: string): ChatMessage[] {
  return [
    { role: 'system', content: ANALYZER_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Based on the following information, provide up to ${MAX_CRITERIA} specific acceptance criteria for this ticket.

Ticket Classification: ${category}

Ticket Information:
- Key: ${ticket.key}
- Type: ${ticket.type}
- Summary: ${ticket.summary}
- Description: ${ticket.description}
${ticket.acceptanceCriteria ? `- Existing Acceptance Criteria: ${ticket.acceptanceCriteria}\n` : ''}
Related Context:
${relatedContext || 'None'}

Format your response as follows:

Ticket Type: ${category}

Acceptance Criteria (max ${MAX_CRITERIA}):
1. [First criterion]
   - Verification: [How to verify this criterion]

2. [Second criterion]
   - Verification: [How to verify this criterion]

[etc., up to ${MAX_CRITERIA} criteria]`,
    },
  ];
}
