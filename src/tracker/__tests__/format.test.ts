import { describe, it, expect } from 'vitest';
import { formatTicketDump, isTicketKey, normalizeTicketKey, parseCommentInput } from '../format.js';
import type { TicketRecord } from '../../types.js';

describe('normalizeTicketKey', () => {
  it('strips quotes and uppercases', () => {
    expect(normalizeTicketKey(' "es-2754" ')).toBe('ES-2754');
  });

  it('prefixes a bare number with the project key', () => {
    expect(normalizeTicketKey('2754', 'ES')).toBe('ES-2754');
  });

  it('leaves a bare number alone without a project key', () => {
    expect(normalizeTicketKey('2754')).toBe('2754');
  });
});

describe('isTicketKey', () => {
  it('accepts project-number keys only', () => {
    expect(isTicketKey('ES-2754')).toBe(true);
    expect(isTicketKey('AB_2-1')).toBe(true);
    expect(isTicketKey('2754')).toBe(false);
    expect(isTicketKey('ES-1 OR project = ES')).toBe(false);
  });
});

describe('formatTicketDump', () => {
  const ticket: TicketRecord = {
    key: 'ES-2754',
    summary: 'Add CAN bus watchdog',
    description: '',
    type: 'Story',
    links: [],
  };

  it('prints None for missing parent, links and description', () => {
    expect(formatTicketDump(ticket)).toBe(
      [
        'Issue Key: ES-2754',
        'Summary: Add CAN bus watchdog',
        'Description: None',
        'Status: Unknown',
        'Type: Story',
        'Parent Epic: None',
        'Linked Issues: None',
      ].join('\n'),
    );
  });

  it('lists parent and links', () => {
    const dump = formatTicketDump({
      ...ticket,
      status: 'In Progress',
      parent: { key: 'ES-2700', summary: 'Watchdogs' },
      links: [
        { relation: 'blocks', key: 'ES-2800' },
        { relation: 'is tested by', key: 'ES-2801' },
      ],
    });
    expect(dump.split('\n').slice(3)).toEqual([
      'Status: In Progress',
      'Type: Story',
      'Parent Epic: ES-2700 - Watchdogs',
      'Linked Issues:',
      '  blocks: ES-2800',
      '  is tested by: ES-2801',
    ]);
  });
});

describe('parseCommentInput', () => {
  it('splits on the first pipe only', () => {
    expect(parseCommentInput('ES-1| Looks good | ship it ')).toEqual({ key: 'ES-1', comment: 'Looks good | ship it' });
  });

  it('requires a separator', () => {
    expect(() => parseCommentInput('ES-1 looks good')).toThrow("Input should be in format 'ISSUE-KEY|COMMENT'");
  });

  it('requires a key and a comment', () => {
    expect(() => parseCommentInput('|comment')).toThrow('non-empty key and comment');
    expect(() => parseCommentInput('ES-1|  ')).toThrow('non-empty key and comment');
  });
});
