import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { NO_BACKGROUND, loadProjectContext, readDefinitionOfDone } from '../documents.js';
import type { DocumentsConfig } from '../../utils/config.js';

let dir: string;
let docs: DocumentsConfig;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'criteria-docs-'));
  docs = {
    dodPath: join(dir, 'definition_of_done.txt'),
    contextPath: join(dir, 'README.md'),
    privateContextPath: join(dir, 'non-public.md'),
    auditPath: join(dir, 'processed_tickets.txt'),
  };
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('loadProjectContext', () => {
  it('reads background and DoD from the public document', () => {
    writeFileSync(docs.contextPath, '## Background\nMotor controllers.\n## Definition of Done\n- Reviewed');
    expect(loadProjectContext(docs)).toEqual({
      background: 'Motor controllers.',
      dod: '- Reviewed',
      privateContext: '',
    });
  });

  it('takes background from the private document when the public one has none', () => {
    writeFileSync(docs.contextPath, '## Definition of Done\n- Reviewed');
    writeFileSync(docs.privateContextPath, '## Background\nInternal notes.');
    const context = loadProjectContext(docs);
    expect(context.background).toBe('Internal notes.');
    expect(context.privateContext).toBe('## Background\nInternal notes.');
  });

  it('uses a placeholder when no background exists', () => {
    writeFileSync(docs.contextPath, '## Definition of Done\n- Reviewed');
    expect(loadProjectContext(docs).background).toBe(NO_BACKGROUND);
  });

  it('truncates private context to 1000 characters', () => {
    writeFileSync(docs.contextPath, '## Definition of Done\n- Reviewed');
    writeFileSync(docs.privateContextPath, 'x'.repeat(1500));
    expect(loadProjectContext(docs).privateContext).toHaveLength(1000);
  });

  it('fails without a context document', () => {
    expect(() => loadProjectContext(docs)).toThrow('README.md not found');
  });

  it('fails without a Definition of Done section', () => {
    writeFileSync(docs.contextPath, '## Background\nMotor controllers.');
    expect(() => loadProjectContext(docs)).toThrow('Definition of Done section not found in README.md');
  });
});

describe('readDefinitionOfDone', () => {
  it('prefers the DoD file', () => {
    writeFileSync(docs.dodPath, 'All tests green\n');
    writeFileSync(docs.contextPath, '## Definition of Done\n- Reviewed');
    expect(readDefinitionOfDone(docs)).toBe('All tests green\n');
  });

  it('falls back to the context document section when the file is blank', () => {
    writeFileSync(docs.dodPath, '   \n');
    writeFileSync(docs.contextPath, '## Definition of Done\n- Reviewed');
    expect(readDefinitionOfDone(docs)).toBe('- Reviewed');
  });

  it('returns null when neither source exists', () => {
    expect(readDefinitionOfDone(docs)).toBeNull();
  });
});
