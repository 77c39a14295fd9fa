let lastStamp = '';
let sequence = 0;

/**
 * Knowledge-base generation id: `KB-<root>-<UTC timestamp>`, e.g.
 * `KB-ES-2700-20260102T030405678Z`. Builds within the same millisecond
 * get a `-<n>` suffix.
 */
export function generationId(rootKey: string, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:.]/g, '');
  sequence = stamp === lastStamp ? sequence + 1 : 0;
  lastStamp = stamp;
  return `KB-${rootKey}-${stamp}${sequence > 0 ? `-${sequence}` : ''}`;
}
