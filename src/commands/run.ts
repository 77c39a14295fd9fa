import { Command } from 'commander';
import { buildKnowledgeBase } from '../rag/knowledge-base.js';
import { analyzeTickets } from '../rag/generator.js';
import { exitWithError, parseFormat } from '../utils/cli.js';
import { errorMessage } from '../utils/errors.js';
import { commandContext, outputResults, withSession } from './shared.js';

export const runCommand = new Command('run')
  .description('Build the knowledge base from a parent ticket, then analyze target tickets')
  .argument('<root>', 'Parent ticket key')
  .argument('<targets...>', 'Ticket keys to analyze')
  .option('-f, --format <format>', 'Output format: json or text', parseFormat, 'json')
  .action(async (root: string, targets: string[], options: { format: 'json' | 'text' }) => {
    const ctx = commandContext();
    try {
      const { knowledgeBase, results } = await withSession(ctx, async (session) => {
        const knowledgeBase = await buildKnowledgeBase(session, ctx.ticketKey(root));
        const results = await analyzeTickets(session, targets.map(ctx.ticketKey));
        return { knowledgeBase, results };
      });
      outputResults(options.format, 'Analysis', results, { knowledgeBase });
    } catch (error) {
      exitWithError(errorMessage(error));
    }
  });
