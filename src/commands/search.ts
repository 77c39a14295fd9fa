import { Command } from 'commander';
import { createEmbedder, openIndex } from '../rag/session.js';
import { exitWithError, outputSuccess } from '../utils/cli.js';
import { errorMessage } from '../utils/errors.js';
import { commandContext } from './shared.js';

export const searchCommand = new Command('search')
  .description('Semantic search over the knowledge base')
  .argument('<query>', 'Search query')
  .option('--limit <n>', 'Max results', '3')
  .action(async (query: string, options: { limit: string }) => {
    const ctx = commandContext();
    const limit = parseInt(options.limit, 10);
    if (!Number.isInteger(limit) || limit < 1) {
      exitWithError(`Invalid --limit '${options.limit}'`);
    }

    try {
      const embedder = createEmbedder(ctx.config);
      const index = await openIndex(ctx.config, ctx.logger);
      try {
        const embedding = await embedder.embedQuery(query);
        const results = await index.query(embedding, limit);
        outputSuccess(results);
      } finally {
        index.close();
      }
    } catch (error) {
      exitWithError(`Search failed: ${errorMessage(error)}`);
    }
  });
