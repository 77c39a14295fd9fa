import { Command } from 'commander';
import { loadProjectContext, readDefinitionOfDone } from '../context/documents.js';
import { findSection, parseSections } from '../context/sections.js';
import { exitWithError, outputSuccess } from '../utils/cli.js';
import { errorMessage } from '../utils/errors.js';
import { readFileSync } from 'fs';
import { commandContext } from './shared.js';

export const contextCommand = new Command('context')
  .description('Show the project context used by the review pipeline')
  .option('--section <name>', 'Print one section of the context document')
  .option('--dod', 'Print the Definition of Done used for the knowledge base')
  .action((options: { section?: string; dod?: boolean }) => {
    const ctx = commandContext();
    const docs = ctx.config.documents;
    try {
      if (options.dod) {
        const dod = readDefinitionOfDone(docs, ctx.logger);
        if (dod === null) exitWithError('No Definition of Done found');
        outputSuccess({ dod });
        return;
      }

      if (options.section) {
        const sections = parseSections(readFileSync(docs.contextPath, 'utf-8'));
        const body = findSection(sections, options.section);
        if (body === undefined) {
          exitWithError(`Section '${options.section}' not found. Available: ${[...sections.keys()].join(', ')}`);
        }
        outputSuccess({ section: options.section, body });
        return;
      }

      outputSuccess(loadProjectContext(docs, ctx.logger));
    } catch (error) {
      exitWithError(errorMessage(error));
    }
  });
