#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';
import { runCommand } from './commands/run.js';
import { buildCommand } from './commands/build.js';
import { analyzeCommand } from './commands/analyze.js';
import { searchCommand } from './commands/search.js';
import { statusCommand } from './commands/status.js';
import { ticketCommand } from './commands/ticket.js';
import { contextCommand } from './commands/context.js';
import { reviewCommand } from './commands/review.js';

// Read version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')));

const program = new Command();

program
  .name('criteria-rag')
  .description('Propose acceptance criteria for tracker tickets from a knowledge base of related tickets')
  .version(packageJson.version);

program.addCommand(runCommand);
program.addCommand(buildCommand);
program.addCommand(analyzeCommand);
program.addCommand(searchCommand);
program.addCommand(statusCommand);
program.addCommand(ticketCommand);
program.addCommand(contextCommand);
program.addCommand(reviewCommand);

await program.parseAsync();
