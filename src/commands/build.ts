import { Command } from 'commander';
import { buildKnowledgeBase } from '../rag/knowledge-base.js';
import { exitWithError, outputSuccess } from '../utils/cli.js';
import { errorMessage } from '../utils/errors.js';
import { commandContext, withSession } from './shared.js';

export const buildCommand = new Command('build')
  .description('Build the knowledge base from a parent ticket and its children')
  .argument('<root>', 'Parent ticket key (e.g. ES-2700 or 2700)')
  .action(async (root: string) => {
    const ctx = commandContext();
    try {
      const summary = await withSession(ctx, (session) => buildKnowledgeBase(session, ctx.ticketKey(root)));
      outputSuccess(summary);
    } catch (error) {
      exitWithError(errorMessage(error));
    }
  });
