/**
 * Row parsers for the knowledge-base tables.
 */

import type { Row } from '@libsql/client';
import type { ChunkSource, ScoredChunk } from '../types.js';

const CHUNK_SOURCES: readonly ChunkSource[] = ['description', 'acceptance_criteria', 'definition_of_done'];

function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

function readOptionalString(row: Row, column: string): string | undefined {
  const value = row[column];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new Error(`Column ${column} is not numeric`);
}

function readSource(row: Row): ChunkSource {
  const value = readString(row, 'source');
  const source = CHUNK_SOURCES.find((s) => s === value);
  if (!source) {
    throw new Error(`Unknown chunk source '${value}'`);
  }
  return source;
}

/**
 * Parse a row from a vector search into a ScoredChunk.
 * Converts cosine distance to similarity score (1 - distance).
 */
export function parseSearchRow(row: Row): ScoredChunk {
  const ticketKey = readOptionalString(row, 'ticket_key');
  return {
    text: readString(row, 'text'),
    metadata: {
      source: readSource(row),
      ...(ticketKey && { ticketKey }),
      chunkIndex: readNumber(row, 'chunk_index'),
    },
    score: 1 - readNumber(row, 'distance'),
  };
}

export interface KnowledgeBaseMeta {
  generation: string;
  rootKey: string;
  ticketKeys: string[];
  chunkCount: number;
  dimensions: number;
  annIndex: boolean;
  builtAt: string;
}

export function parseMetaRow(row: Row): KnowledgeBaseMeta {
  const keys: unknown = JSON.parse(readString(row, 'ticket_keys'));
  return {
    generation: readString(row, 'generation'),
    rootKey: readString(row, 'root_key'),
    ticketKeys: Array.isArray(keys) ? keys.filter((k): k is string => typeof k === 'string') : [],
    chunkCount: readNumber(row, 'chunk_count'),
    dimensions: readNumber(row, 'dimensions'),
    annIndex: readNumber(row, 'ann_index') === 1,
    builtAt: readString(row, 'built_at'),
  };
}

export function readCount(row: Row | undefined): number {
  return row ? readNumber(row, 'count') : 0;
}
