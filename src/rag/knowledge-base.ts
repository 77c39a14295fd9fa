import { readDefinitionOfDone } from '../context/documents.js';
import { extractTicket } from '../tracker/fields.js';
import type { RawIssue } from '../tracker/schema.js';
import { KnowledgeBaseError, errorMessage } from '../utils/errors.js';
import { generationId } from '../utils/id.js';
import { chunkText } from './chunker.js';
import { writeAuditFile } from './audit.js';
import type { Session } from './session.js';
import type { Chunk, ChunkSource, IndexEntry, KnowledgeBaseSummary, SkippedField } from '../types.js';

interface TextUnit {
  text: string;
  source: ChunkSource;
  ticketKey?: string;
}

/**
 * Build the knowledge base for `rootKey`: the root ticket, every ticket
 * whose parent or epic link is the root, and the Definition of Done.
 * Replaces whatever the index held before. After a failure the index
 * state is unknown.
 */
export async function buildKnowledgeBase(session: Session, rootKey: string): Promise<KnowledgeBaseSummary> {
  const { tracker, embedder, index, logger, config } = session;

  let root: RawIssue;
  let children: RawIssue[];
  try {
    root = await tracker.getIssue(rootKey);
    children = await tracker.searchChildren(rootKey);
  } catch (error) {
    throw new KnowledgeBaseError(rootKey, `Could not fetch tickets for ${rootKey}: ${errorMessage(error)}`, { cause: error });
  }

  // Always holds the root; a missing root already failed above.
  const issues = uniqueByKey([root, ...children]);
  logger.info(`Found ${issues.length} related tickets for ${rootKey}`);

  const units: TextUnit[] = [];
  const keys = new Set<string>();
  const skippedFields: SkippedField[] = [];

  for (const issue of issues) {
    const { ticket, skipped } = extractTicket(issue, {
      acceptanceCriteriaField: config.tracker.acceptanceCriteriaField,
    });
    for (const field of skipped) {
      logger.warn(`Skipping field ${field.field} of ${field.ticketKey}: ${field.reason}`);
    }
    skippedFields.push(...skipped);

    units.push({ text: ticket.description, source: 'description', ticketKey: ticket.key });
    if (ticket.acceptanceCriteria) {
      units.push({ text: ticket.acceptanceCriteria, source: 'acceptance_criteria', ticketKey: ticket.key });
    }
    keys.add(ticket.key);
  }

  const dod = readDefinitionOfDone(config.documents, logger);
  if (dod) {
    units.push({ text: dod, source: 'definition_of_done' });
  }

  const chunks = units.flatMap((unit) => toChunks(unit, session));
  const embeddings = chunks.length > 0 ? await embedder.embedDocuments(chunks.map((c) => c.text)) : [];
  if (embeddings.length !== chunks.length) {
    throw new KnowledgeBaseError(rootKey, `Expected ${chunks.length} embeddings, received ${embeddings.length}`);
  }
  const entries: IndexEntry[] = chunks.map((chunk, i) => ({ chunk, embedding: embeddings[i] }));

  const generation = generationId(rootKey);
  const builtAt = new Date().toISOString();
  const ticketKeys = [...keys].sort();
  await index.replace(entries, { generation, rootKey, ticketKeys, builtAt });

  session.processed = { generation, rootKey, keys };
  try {
    await writeAuditFile(config.documents.auditPath, session.processed);
  } catch (error) {
    logger.error(`Could not write audit file ${config.documents.auditPath}: ${errorMessage(error)}`);
  }

  logger.info(`Built knowledge base from ${keys.size} tickets (${entries.length} chunks)`);
  return {
    generation,
    rootKey,
    ticketKeys,
    chunkCount: entries.length,
    skippedFields,
    builtAt,
  };
}

function toChunks(unit: TextUnit, session: Session): Chunk[] {
  const { chunkSize, chunkOverlap } = session.config.retrieval;
  return [...chunkText(unit.text, { chunkSize, chunkOverlap })].map((text, chunkIndex) => ({
    text,
    metadata: {
      source: unit.source,
      ...(unit.ticketKey && { ticketKey: unit.ticketKey }),
      chunkIndex,
    },
  }));
}

function uniqueByKey(issues: RawIssue[]): RawIssue[] {
  const seen = new Set<string>();
  return issues.filter((issue) => {
    if (seen.has(issue.key)) return false;
    seen.add(issue.key);
    return true;
  });
}
