import type { Client, ResultSet } from '@libsql/client';
import { parseSearchRow } from './parsers.js';
import { CHUNKS_TABLE, VECTOR_INDEX } from './schema.js';
import type { ScoredChunk } from '../types.js';

export interface VectorSearchOptions {
  limit: number;
  useAnnIndex: boolean;
}

const MAX_LIMIT = 100;

function isMissingIndexError(error: unknown): boolean {
  const msg = error instanceof Error ? error.message : String(error);
  return msg.includes('vector_top_k') || msg.includes('vector index') || msg.includes('no such index');
}

/**
 * Nearest chunks to `queryEmbedding` by cosine distance, closest first.
 * Uses the ANN index when present and falls back to a full scan.
 */
export async function performVectorSearch(
  client: Client,
  queryEmbedding: number[],
  options: VectorSearchOptions,
): Promise<ScoredChunk[]> {
  const safeLimit = Number.isFinite(options.limit) && options.limit >= 1
    ? Math.min(Math.floor(options.limit), MAX_LIMIT)
    : 3;
  const embeddingJson = JSON.stringify(queryEmbedding);
  let result: ResultSet | undefined;

  if (options.useAnnIndex) {
    try {
      // k must be a literal, not a bound parameter
      result = await client.execute({
        sql: `
          SELECT
            c.text, c.source, c.ticket_key, c.chunk_index,
            vector_distance_cos(c.embedding, vector32(?)) AS distance
          FROM vector_top_k('${VECTOR_INDEX}', vector32(?), ${safeLimit}) AS v
          JOIN ${CHUNKS_TABLE} c ON c.rowid = v.id
          ORDER BY distance ASC
          LIMIT ?
        `,
        args: [embeddingJson, embeddingJson, safeLimit],
      });
    } catch (error) {
      if (!isMissingIndexError(error)) throw error;
    }
  }

  if (!result) {
    result = await client.execute({
      sql: `
        SELECT
          text, source, ticket_key, chunk_index,
          vector_distance_cos(embedding, vector32(?)) AS distance
        FROM ${CHUNKS_TABLE}
        ORDER BY distance ASC, rowid ASC
        LIMIT ?
      `,
      args: [embeddingJson, safeLimit],
    });
  }

  return result.rows.map((row) => parseSearchRow(row));
}
