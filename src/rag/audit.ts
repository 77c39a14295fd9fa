import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ProcessedTicketSet } from './session.js';

export function formatAuditReport(processed: ProcessedTicketSet): string {
  const keys = [...processed.keys].sort();
  return [
    `Tickets in knowledge base for ${processed.rootKey}`,
    `Generation: ${processed.generation}`,
    '=========================',
    ...keys,
    '',
    `Total Tickets: ${keys.length}`,
    '',
  ].join('\n');
}

/**
 * Overwrite the audit file with the current generation's ticket keys.
 */
export async function writeAuditFile(path: string, processed: ProcessedTicketSet): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatAuditReport(processed), 'utf-8');
}
