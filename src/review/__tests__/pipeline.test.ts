import { describe, it, expect, afterEach } from 'vitest';
import { reviewTicket } from '../pipeline.js';
import { FakeTracker, ScriptedChat, createTestSession, issue } from '../../rag/__tests__/fakes.js';
import type { ProjectContext } from '../../context/documents.js';
import type { Session } from '../../rag/session.js';

const context: ProjectContext = {
  background: 'Motor controller firmware.',
  dod: '- Unit tests pass\n- Code reviewed',
  privateContext: '',
};

const tracker = () =>
  new FakeTracker([
    issue('ES-2754', {
      summary: 'Add CAN bus watchdog',
      description: 'Reset the bus after 100 ms of silence',
      issuetype: { name: 'Story' },
      status: { name: 'To Do' },
    }),
  ]);

const VALIDATED = '**Ticket Type:**\nGeneral feature development\n\n**Ticket Type:**\n**Proposed Acceptance Criteria:**\n1. Bus resets';

let session: Session | undefined;

afterEach(() => {
  session?.index.close();
  session = undefined;
});

describe('reviewTicket', () => {
  it('chains analysis, refinement and validation', async () => {
    const chat = new ScriptedChat(['first draft', 'refined draft', VALIDATED]);
    session = createTestSession({ tracker: tracker(), chat });

    const result = await reviewTicket(session, context, 'ES-2754');

    expect(result).toEqual({
      status: 'ok',
      ticketKey: 'ES-2754',
      stages: { analysis: 'first draft', refined: 'refined draft', validated: expect.any(String) },
      commented: false,
      text: '**Ticket Type:**\nGeneral feature development\n**Proposed Acceptance Criteria:**\n1. Bus resets',
    });
    expect(chat.requests[0][0].content).toContain('Motor controller firmware.');
    expect(chat.requests[0][1].content).toContain('Issue Key: ES-2754');
    expect(chat.requests[1][1].content).toContain('first draft');
    expect(chat.requests[2][1].content).toContain('refined draft');
    expect(chat.requests[2][1].content).toContain('- Code reviewed');
  });

  it('posts the validated text as a comment when asked', async () => {
    const fakeTracker = tracker();
    session = createTestSession({ tracker: fakeTracker, chat: new ScriptedChat(['a', 'b', VALIDATED]) });

    const result = await reviewTicket(session, context, 'ES-2754', { comment: true });

    expect(result).toMatchObject({ status: 'ok', commented: true });
    expect(fakeTracker.comments).toEqual([{ key: 'ES-2754', body: result.text }]);
  });

  it('fails when validation leaves nothing', async () => {
    session = createTestSession({ tracker: tracker(), chat: new ScriptedChat(['a', 'b', '\n\n']) });

    const result = await reviewTicket(session, context, 'ES-2754', { comment: true });

    expect(result.text).toBe('Error reviewing ticket ES-2754: No valid analysis sections found');
  });

  it('reports a missing ticket', async () => {
    session = createTestSession({ tracker: tracker() });

    const result = await reviewTicket(session, context, 'ES-1');

    expect(result).toMatchObject({ status: 'error', ticketKey: 'ES-1' });
    expect(result.text).toBe('Error reviewing ticket ES-1: Fetch issue ES-1 failed (404): Issue does not exist');
  });
});
