import OpenAI from 'openai';

/**
 * Maps text to fixed-size vectors. Documents are embedded in batches;
 * queries one at a time.
 */
export interface Embedder {
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface OpenAiEmbedderOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 100;
const MAX_CACHE_SIZE = 100;

export class OpenAiEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly batchSize: number;
  private readonly queryCache = new Map<string, number[]>();

  constructor(options: OpenAiEmbedderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl && { baseURL: options.baseUrl }),
      maxRetries: 0,
    });
    this.model = options.model;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embeddings.create({ model: this.model, input: batch });
      // The API may return items out of order; index says where each belongs.
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((item) => item.embedding));
    }
    return vectors;
  }

  /**
   * Results are cached in memory (LRU, up to MAX_CACHE_SIZE entries).
   */
  async embedQuery(text: string): Promise<number[]> {
    const cached = this.queryCache.get(text);
    if (cached) {
      // Move to end for LRU freshness
      this.queryCache.delete(text);
      this.queryCache.set(text, cached);
      return cached;
    }

    const [embedding] = await this.embedDocuments([text]);
    if (!embedding) {
      throw new Error('Embedding response contained no vectors');
    }

    if (this.queryCache.size >= MAX_CACHE_SIZE) {
      const oldest = this.queryCache.keys().next();
      if (!oldest.done) this.queryCache.delete(oldest.value);
    }
    this.queryCache.set(text, embedding);
    return embedding;
  }
}
