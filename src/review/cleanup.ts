/**
 * Drop blank lines and repeated bold section headings (`**Heading:**`)
 * from model output, keeping the first occurrence of each heading.
 * Content lines are never dropped.
 */
export function dedupeSections(output: string): string {
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const raw of output.trim().split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;

    if (line.length > 4 && line.startsWith('**') && line.endsWith('**')) {
      if (seen.has(line)) continue;
      seen.add(line);
    }
    kept.push(line);
  }

  return kept.join('\n');
}
