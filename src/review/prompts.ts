import type { ChatMessage } from '../llm/chat.js';
import type { ProjectContext } from '../context/documents.js';
import { TICKET_CATEGORIES } from '../types.js';

const OUTPUT_FORMAT = `Provide your answer in this format:

**Ticket Type:**
[Select one: ${TICKET_CATEGORIES.join(', ')}]

**DoD Analysis:**
[Which parts of the Definition of Done apply to this ticket and why]

**Proposed Acceptance Criteria:**
1. [DoD item being addressed]
   - Testing method: [How to verify this criterion]
   - Done when: [Specific, measurable completion state]

**Missing Information:**
[Details needed to meet the Definition of Done that the ticket does not give]`;

export function analyzerMessages(context: ProjectContext, ticketDump: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content: `You are a product owner assistant who breaks down epics and user stories into acceptance criteria.

Project Context:
${context.background}

Private Context:
${context.privateContext || 'None'}

Definition of Done:
${context.dod}`,
    },
    {
      role: 'user',
      content: `Analyze this ticket and propose acceptance criteria that align with the Definition of Done.
Also name any dependencies or risks.

Ticket Information:
${ticketDump}

${OUTPUT_FORMAT}`,
    },
  ];
}

export function enhancerMessages(ticketKey: string, analysis: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content: 'You are an experienced Scrum Master who makes user stories and acceptance criteria clear and effective.',
    },
    {
      role: 'user',
      content: `Review the initial analysis of ${ticketKey} below. Refine the acceptance criteria so that each one is clear, measurable and testable. Keep the same format.

${analysis}`,
    },
  ];
}

export function validatorMessages(ticketKey: string, context: ProjectContext, refined: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content: 'You are a quality assurance specialist who checks that stories meet the team Definition of Done.',
    },
    {
      role: 'user',
      content: `Validate the refined acceptance criteria for ${ticketKey} against the Definition of Done below. Fix or drop criteria that do not comply and return the final version in the same format.

Definition of Done:
${context.dod}

Refined analysis:
${refined}`,
    },
  ];
}
