import { Command } from 'commander';
import { openIndex } from '../rag/session.js';
import { configExists } from '../utils/config.js';
import { exitWithError, outputSuccess } from '../utils/cli.js';
import { errorMessage } from '../utils/errors.js';
import { commandContext } from './shared.js';

export const statusCommand = new Command('status')
  .description('Show the knowledge base currently stored')
  .action(async () => {
    const ctx = commandContext();
    try {
      const index = await openIndex(ctx.config, ctx.logger);
      try {
        const meta = await index.metadata();
        const chunks = await index.count();
        outputSuccess({
          configFile: configExists(ctx.config.cwd),
          url: ctx.config.store.url.replace(/\/\/.*:.*@/, '//***@'),
          built: meta !== null,
          chunks,
          ...(meta && {
            generation: meta.generation,
            rootKey: meta.rootKey,
            tickets: meta.ticketKeys,
            dimensions: meta.dimensions,
            annIndex: meta.annIndex,
            builtAt: meta.builtAt,
          }),
        });
      } finally {
        index.close();
      }
    } catch (error) {
      exitWithError(`Status failed: ${errorMessage(error)}`);
    }
  });
