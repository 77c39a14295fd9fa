import { describe, it, expect } from 'vitest';
import { findSection, parseSections } from '../sections.js';

const DOC = [
  '# Project',
  'Intro',
  '## Background',
  'We build firmware.',
  '### Details',
  'More.',
  '## Definition of Done',
  '- Tests pass',
  '```',
  '# Not a heading',
  '```',
].join('\n');

describe('parseSections', () => {
  it('includes subsections in a section body', () => {
    const sections = parseSections(DOC);
    expect(sections.get('Background')).toBe('We build firmware.\n### Details\nMore.');
    expect(sections.get('Details')).toBe('More.');
  });

  it('ignores headings inside fenced code', () => {
    const sections = parseSections(DOC);
    expect(sections.has('Not a heading')).toBe(false);
    expect(sections.get('Definition of Done')).toBe('- Tests pass\n```\n# Not a heading\n```');
  });

  it('keeps the first of two identical headings', () => {
    const sections = parseSections('## Notes\nfirst\n## Notes\nsecond');
    expect(sections.get('Notes')).toBe('first');
  });
});

describe('findSection', () => {
  const sections = parseSections(DOC);

  it('matches headings ignoring case', () => {
    expect(findSection(sections, 'background')).toBe('We build firmware.\n### Details\nMore.');
  });

  it('falls back to a prefix match', () => {
    expect(findSection(sections, 'definition')).toBe('- Tests pass\n```\n# Not a heading\n```');
  });

  it('returns undefined when nothing matches', () => {
    expect(findSection(sections, 'Glossary')).toBeUndefined();
  });
});
