/**
 * Presence-checked reads of tracker issue fields.
 * Missing fields are 'absent'; wrong shapes are 'malformed' with a reason.
 */

import { z } from 'zod';
import { IssueLinkSchema, NamedSchema, ParentSchema, type RawIssue } from './schema.js';
import type { LinkedIssue, Presence, SkippedField, TicketRecord } from '../types.js';

export function readField<T>(
  fields: Record<string, unknown>,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Presence<T> {
  const value = fields[name];
  if (value === undefined || value === null) {
    return { kind: 'absent' };
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return { kind: 'malformed', reason: first ? first.message : 'unexpected shape' };
  }
  return { kind: 'present', value: parsed.data };
}

export function valueOr<T>(presence: Presence<T>, fallback: T): T {
  return presence.kind === 'present' ? presence.value : fallback;
}

/**
 * Text fields arrive as plain strings (REST v2) or as rich-text documents
 * (REST v3). Rich text is flattened to its text nodes, one block per line.
 */
const RichTextSchema: z.ZodType<string, z.ZodTypeDef, unknown> = z.union([
  z.string(),
  z
    .object({ type: z.literal('doc'), content: z.array(z.unknown()) })
    .transform((doc) => flattenRichText(doc.content)),
]);

function flattenRichText(nodes: unknown[]): string {
  const blocks: string[] = [];
  for (const node of nodes) {
    const text = collectText(node).trim();
    if (text) blocks.push(text);
  }
  return blocks.join('\n');
}

function collectText(node: unknown): string {
  if (typeof node !== 'object' || node === null) return '';
  if ('text' in node && typeof node.text === 'string') return node.text;
  if ('content' in node && Array.isArray(node.content)) {
    return node.content.map(collectText).join('');
  }
  return '';
}

export interface ExtractOptions {
  acceptanceCriteriaField: string;
}

export interface ExtractedTicket {
  ticket: TicketRecord;
  skipped: SkippedField[];
}

/**
 * Map a raw issue onto a TicketRecord. Never throws for field-level
 * problems; each malformed field is reported in `skipped` instead.
 */
export function extractTicket(raw: RawIssue, options: ExtractOptions): ExtractedTicket {
  const { fields } = raw;
  const skipped: SkippedField[] = [];

  const take = <T>(name: string, presence: Presence<T>, fallback: T): T => {
    if (presence.kind === 'malformed') {
      skipped.push({ ticketKey: raw.key, field: name, reason: presence.reason });
    }
    return valueOr(presence, fallback);
  };

  const summary = take('summary', readField(fields, 'summary', z.string()), '');
  const description = take('description', readField(fields, 'description', RichTextSchema), '');
  const type = take('issuetype', readField(fields, 'issuetype', NamedSchema), { name: 'Unknown' }).name;
  const status = readField(fields, 'status', NamedSchema);
  const parent = readField(fields, 'parent', ParentSchema);
  const criteria = take(
    options.acceptanceCriteriaField,
    readField(fields, options.acceptanceCriteriaField, RichTextSchema),
    '',
  );
  const links = take('issuelinks', readField(fields, 'issuelinks', z.array(IssueLinkSchema)), []);

  const ticket: TicketRecord = {
    key: raw.key,
    summary,
    description,
    type,
    links: links.flatMap(toLinkedIssues),
  };
  if (criteria) ticket.acceptanceCriteria = criteria;
  if (status.kind === 'present') ticket.status = status.value.name;
  if (parent.kind === 'present') {
    ticket.parent = { key: parent.value.key, summary: parent.value.fields.summary };
  }

  return { ticket, skipped };
}

function toLinkedIssues(link: z.infer<typeof IssueLinkSchema>): LinkedIssue[] {
  const result: LinkedIssue[] = [];
  if (link.outwardIssue) {
    result.push({ relation: link.type.outward, key: link.outwardIssue.key });
  }
  if (link.inwardIssue) {
    result.push({ relation: link.type.inward, key: link.inwardIssue.key });
  }
  return result;
}
