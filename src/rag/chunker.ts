/**
 * Fixed-size sliding-window chunker with a separator preference.
 */

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
  separator?: string;
}

export const DEFAULT_CHUNK_OPTIONS: Required<ChunkOptions> = {
  chunkSize: 500,
  chunkOverlap: 50,
  separator: '\n',
};

/**
 * Split text into chunks of at most `chunkSize` characters. Each chunk ends
 * right after the last separator inside its window, or is cut hard at
 * `chunkSize`. The next chunk repeats the last `chunkOverlap` characters
 * of the one before it.
 *
 * Trailing whitespace is dropped from every chunk. Leading whitespace is
 * dropped only where a chunk does not begin inside an overlap.
 *
 * The result is lazy; every iteration starts again from the beginning.
 * Empty or whitespace-only text yields nothing.
 */
export function chunkText(text: string, options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): Iterable<string> {
  const { chunkSize, chunkOverlap } = options;
  const separator = options.separator ?? DEFAULT_CHUNK_OPTIONS.separator;

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap must be in [0, chunkSize), got ${chunkOverlap}`);
  }

  return {
    [Symbol.iterator]: () => slide(text, chunkSize, chunkOverlap, separator),
  };
}

function* slide(text: string, size: number, overlap: number, separator: string): Generator<string> {
  if (!text.trim()) return;

  let start = 0;
  let previousEnd = 0;
  let fresh = true;

  while (start < text.length) {
    let end = Math.min(start + size, text.length);

    if (end < text.length && separator) {
      const cut = text.slice(start, end).lastIndexOf(separator);
      // A break inside the repeated overlap would only re-emit the previous tail.
      if (cut > 0 && start + cut + separator.length > previousEnd) {
        end = start + cut + separator.length;
      }
    }

    const window = text.slice(start, end).trimEnd();
    const piece = fresh ? window.trimStart() : window;
    // An overlap-only window adds nothing new.
    if (piece && (fresh || window.length > overlap)) yield piece;
    if (end >= text.length) return;

    previousEnd = end;
    const next = start + window.length - overlap;
    if (overlap > 0 && piece.length > overlap) {
      start = next;
      fresh = false;
    } else {
      start = end;
      fresh = true;
    }
  }
}
