import type { Client, InStatement } from '@libsql/client';
import {
  CHUNKS_TABLE,
  CREATE_CHUNKS_INDEXES,
  CREATE_META_TABLE,
  CREATE_VECTOR_INDEX,
  DROP_CHUNKS_TABLE,
  DROP_META_TABLE,
  DROP_VECTOR_INDEX,
  META_TABLE,
  createChunksTable,
} from '../db/schema.js';
import { parseMetaRow, readCount, type KnowledgeBaseMeta } from '../db/parsers.js';
import { performVectorSearch } from '../db/search.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { IndexEntry, ScoredChunk } from '../types.js';

export interface VectorIndexOptions {
  annIndex: boolean;
  logger?: Logger;
}

export interface ReplaceMeta {
  generation: string;
  rootKey: string;
  ticketKeys: string[];
  builtAt: string;
}

function chunkId(entry: IndexEntry): string {
  const { ticketKey, source, chunkIndex } = entry.chunk.metadata;
  return `${ticketKey ?? 'reference'}:${source}:${chunkIndex}`;
}

/**
 * Knowledge-base storage in a libSQL database. Contents are only ever
 * replaced wholesale; there is no incremental merge.
 */
export class VectorIndex {
  private readonly client: Client;
  private readonly annIndex: boolean;
  private readonly logger: Logger;

  constructor(client: Client, options: VectorIndexOptions) {
    this.client = client;
    this.annIndex = options.annIndex;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Drop the previous knowledge base and write `entries` in one atomic batch.
   */
  async replace(entries: IndexEntry[], meta: ReplaceMeta): Promise<void> {
    const dimensions = entries[0]?.embedding.length ?? 0;
    const mismatch = entries.find((e) => e.embedding.length !== dimensions);
    if (mismatch) {
      throw new Error(
        `Embedding dimension mismatch: expected ${dimensions}, got ${mismatch.embedding.length} for ${chunkId(mismatch)}`,
      );
    }

    const statements: InStatement[] = [DROP_VECTOR_INDEX, DROP_CHUNKS_TABLE, DROP_META_TABLE, CREATE_META_TABLE];

    if (dimensions > 0) {
      statements.push(createChunksTable(dimensions));
      statements.push(...CREATE_CHUNKS_INDEXES.split(';').filter((s) => s.trim()));
      for (const entry of entries) {
        statements.push({
          sql: `INSERT INTO ${CHUNKS_TABLE} (id, text, source, ticket_key, chunk_index, embedding)
                VALUES (?, ?, ?, ?, ?, vector32(?))`,
          args: [
            chunkId(entry),
            entry.chunk.text,
            entry.chunk.metadata.source,
            entry.chunk.metadata.ticketKey ?? null,
            entry.chunk.metadata.chunkIndex,
            JSON.stringify(entry.embedding),
          ],
        });
      }
    }

    statements.push({
      sql: `INSERT INTO ${META_TABLE} (generation, root_key, ticket_keys, chunk_count, dimensions, ann_index, built_at)
            VALUES (?, ?, ?, ?, ?, 0, ?)`,
      args: [meta.generation, meta.rootKey, JSON.stringify(meta.ticketKeys), entries.length, dimensions, meta.builtAt],
    });

    await this.client.batch(statements, 'write');

    if (this.annIndex && dimensions > 0) {
      try {
        await this.client.execute(CREATE_VECTOR_INDEX);
        await this.client.execute({
          sql: `UPDATE ${META_TABLE} SET ann_index = 1 WHERE generation = ?`,
          args: [meta.generation],
        });
      } catch (error) {
        this.logger.warn(`Could not create vector index, queries will scan: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Up to `k` chunks, most similar first. An index that was never built
   * or holds no chunks yields an empty list.
   */
  async query(embedding: number[], k: number): Promise<ScoredChunk[]> {
    const meta = await this.metadata();
    if (!meta || meta.chunkCount === 0) {
      return [];
    }
    if (embedding.length !== meta.dimensions) {
      throw new Error(`Query embedding has ${embedding.length} dimensions, index has ${meta.dimensions}`);
    }
    return performVectorSearch(this.client, embedding, { limit: k, useAnnIndex: meta.annIndex });
  }

  async metadata(): Promise<KnowledgeBaseMeta | null> {
    if (!(await this.tableExists(META_TABLE))) return null;
    const result = await this.client.execute(`SELECT * FROM ${META_TABLE} LIMIT 1`);
    const row = result.rows[0];
    return row ? parseMetaRow(row) : null;
  }

  async count(): Promise<number> {
    if (!(await this.tableExists(CHUNKS_TABLE))) return 0;
    const result = await this.client.execute(`SELECT COUNT(*) AS count FROM ${CHUNKS_TABLE}`);
    return readCount(result.rows[0]);
  }

  close(): void {
    this.client.close();
  }

  private async tableExists(name: string): Promise<boolean> {
    const result = await this.client.execute({
      sql: "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
      args: [name],
    });
    return result.rows.length > 0;
  }
}
