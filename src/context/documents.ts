import { existsSync, readFileSync } from 'fs';
import { basename } from 'path';
import { findSection, parseSections } from './sections.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { DocumentsConfig } from '../utils/config.js';

export const NO_BACKGROUND = 'No background information available';
export const BACKGROUND_HEADING = 'Background';
export const DOD_HEADING = 'Definition of Done';

const PRIVATE_CONTEXT_LIMIT = 1000;

export interface ProjectContext {
  background: string;
  dod: string;
  privateContext: string;
}

function readOptional(path: string, logger: Logger): string | null {
  if (!existsSync(path)) return null;
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    logger.warn(`Could not read ${basename(path)}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Background, Definition of Done and private notes from the project's
 * context documents. Background is taken from the public document first,
 * then the private one. The DoD section is required.
 */
export function loadProjectContext(docs: DocumentsConfig, logger: Logger = silentLogger): ProjectContext {
  const publicText = readOptional(docs.contextPath, logger);
  if (publicText === null) {
    throw new Error(`${basename(docs.contextPath)} not found`);
  }
  const publicSections = parseSections(publicText);

  const dod = findSection(publicSections, DOD_HEADING);
  if (!dod) {
    throw new Error(`${DOD_HEADING} section not found in ${basename(docs.contextPath)}`);
  }

  const privateText = readOptional(docs.privateContextPath, logger) ?? '';
  const background =
    findSection(publicSections, BACKGROUND_HEADING) ??
    findSection(parseSections(privateText), BACKGROUND_HEADING) ??
    NO_BACKGROUND;

  return {
    background,
    dod,
    privateContext: privateText.slice(0, PRIVATE_CONTEXT_LIMIT),
  };
}

/**
 * The Definition of Done text for the knowledge base: the DoD file read
 * whole, else the DoD section of the context document, else null.
 */
export function readDefinitionOfDone(docs: DocumentsConfig, logger: Logger = silentLogger): string | null {
  const file = readOptional(docs.dodPath, logger);
  if (file !== null && file.trim()) return file;

  const contextText = readOptional(docs.contextPath, logger);
  if (contextText !== null) {
    const section = findSection(parseSections(contextText), DOD_HEADING);
    if (section) return section;
  }

  logger.warn(`No Definition of Done found at ${basename(docs.dodPath)} or in ${basename(docs.contextPath)}`);
  return null;
}
