import { Command } from 'commander';
import { analyzeTickets } from '../rag/generator.js';
import { exitWithError, parseFormat } from '../utils/cli.js';
import { errorMessage } from '../utils/errors.js';
import { commandContext, outputResults, withSession } from './shared.js';

export const analyzeCommand = new Command('analyze')
  .description('Propose acceptance criteria for tickets using the current knowledge base')
  .argument('<targets...>', 'Ticket keys to analyze')
  .option('-f, --format <format>', 'Output format: json or text', parseFormat, 'json')
  .action(async (targets: string[], options: { format: 'json' | 'text' }) => {
    const ctx = commandContext();
    try {
      const keys = targets.map(ctx.ticketKey);
      const results = await withSession(ctx, (session) => analyzeTickets(session, keys));
      outputResults(options.format, 'Analysis', results);
    } catch (error) {
      exitWithError(errorMessage(error));
    }
  });
