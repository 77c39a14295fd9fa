import type { TicketRecord } from '../types.js';

export const TICKET_KEY_PATTERN = /^[A-Z][A-Z0-9_]*-\d+$/;

export function isTicketKey(value: string): boolean {
  return TICKET_KEY_PATTERN.test(value);
}

/**
 * Normalize a ticket identifier from the command line.
 * Strips surrounding quotes and whitespace; a bare number gets the
 * project prefix when one is configured ("2754" -> "ES-2754").
 */
export function normalizeTicketKey(input: string, projectKey?: string): string {
  const key = input.trim().replace(/^['"]+|['"]+$/g, '').trim();
  if (projectKey && /^\d+$/.test(key)) {
    return `${projectKey}-${key}`;
  }
  return key.toUpperCase();
}

/**
 * Render the plain-text issue dump used in prompts and `ticket show`.
 */
export function formatTicketDump(ticket: TicketRecord): string {
  const parent = ticket.parent ? `${ticket.parent.key} - ${ticket.parent.summary}` : 'None';
  const lines = [
    `Issue Key: ${ticket.key}`,
    `Summary: ${ticket.summary}`,
    `Description: ${ticket.description || 'None'}`,
    `Status: ${ticket.status ?? 'Unknown'}`,
    `Type: ${ticket.type}`,
    `Parent Epic: ${parent}`,
  ];

  if (ticket.links.length === 0) {
    lines.push('Linked Issues: None');
  } else {
    lines.push('Linked Issues:');
    for (const link of ticket.links) {
      lines.push(`  ${link.relation}: ${link.key}`);
    }
  }

  return lines.join('\n');
}

export interface CommentInput {
  key: string;
  comment: string;
}

/**
 * Split `KEY|COMMENT` on the first pipe. The comment may itself contain pipes.
 */
export function parseCommentInput(input: string): CommentInput {
  const separator = input.indexOf('|');
  if (separator === -1) {
    throw new Error("Input should be in format 'ISSUE-KEY|COMMENT'");
  }
  const key = input.slice(0, separator).trim();
  const comment = input.slice(separator + 1).trim();
  if (!key || !comment) {
    throw new Error("Input should be in format 'ISSUE-KEY|COMMENT' with a non-empty key and comment");
  }
  return { key, comment };
}
