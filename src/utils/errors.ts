/**
 * Error types shared by commands and pipeline stages.
 */

/** Missing credentials or invalid settings. Fatal before any work starts. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class TrackerError extends Error {
  readonly status?: number;
  readonly operation: string;

  constructor(operation: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TrackerError';
    this.operation = operation;
    this.status = options?.status;
  }
}

export class KnowledgeBaseError extends Error {
  readonly rootKey: string;

  constructor(rootKey: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KnowledgeBaseError';
    this.rootKey = rootKey;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
