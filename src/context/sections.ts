/**
 * Markdown section parsing. A document is read once into a map from
 * heading text to the body beneath it.
 */

export type SectionMap = Map<string, string>;

const HEADING = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const FENCE = /^\s*(```|~~~)/;

interface OpenSection {
  title: string;
  level: number;
  lines: string[];
}

/**
 * Each heading's body runs until the next heading of the same or a higher
 * level, so a section includes its subsections. Headings inside fenced
 * code blocks are ignored. The first of two identical headings wins.
 */
export function parseSections(markdown: string): SectionMap {
  const sections: SectionMap = new Map();
  const open: OpenSection[] = [];
  let inFence = false;

  const close = (section: OpenSection): void => {
    if (!sections.has(section.title)) {
      sections.set(section.title, section.lines.join('\n').trim());
    }
  };

  for (const line of markdown.split(/\r?\n/)) {
    if (FENCE.test(line)) inFence = !inFence;
    const match = inFence ? null : HEADING.exec(line);

    if (match) {
      const level = match[1].length;
      while (open.length > 0 && open[open.length - 1].level >= level) {
        const done = open.pop();
        if (done) close(done);
      }
      for (const parent of open) parent.lines.push(line);
      open.push({ title: match[2], level, lines: [] });
      continue;
    }

    for (const section of open) section.lines.push(line);
  }

  while (open.length > 0) {
    const done = open.pop();
    if (done) close(done);
  }

  return sections;
}

/**
 * Look up a section by heading, ignoring case. An exact match wins;
 * otherwise the first heading that starts with `name`.
 */
export function findSection(sections: SectionMap, name: string): string | undefined {
  const wanted = name.trim().toLowerCase();
  let prefixMatch: string | undefined;
  for (const [title, body] of sections) {
    const normalized = title.toLowerCase();
    if (normalized === wanted) return body;
    if (prefixMatch === undefined && normalized.startsWith(wanted)) prefixMatch = body;
  }
  return prefixMatch;
}
