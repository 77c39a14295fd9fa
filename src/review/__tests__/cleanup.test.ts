import { describe, it, expect } from 'vitest';
import { dedupeSections } from '../cleanup.js';

describe('dedupeSections', () => {
  it('drops blank lines and repeated headings but keeps content', () => {
    const output = [
      '**Ticket Type:**',
      'Bug Fix',
      '',
      '**DoD Analysis:**',
      '  Unit tests apply  ',
      '**Ticket Type:**',
      'Bug Fix',
    ].join('\n');

    expect(dedupeSections(output)).toBe(
      ['**Ticket Type:**', 'Bug Fix', '**DoD Analysis:**', 'Unit tests apply', 'Bug Fix'].join('\n'),
    );
  });

  it('returns an empty string for blank output', () => {
    expect(dedupeSections('\n  \n')).toBe('');
  });
});
