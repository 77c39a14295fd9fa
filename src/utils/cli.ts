// Every command prints exactly one `{ success, data | error }` line on stdout.

import { InvalidArgumentError } from 'commander';
import type { CliResponse } from '../types.js';

export function errorResponse(message: string): CliResponse {
  return { success: false, error: message };
}

/** `data` is left out of the envelope entirely when undefined. */
export function successResponse<T>(data?: T): CliResponse<T> {
  return data === undefined ? { success: true } : { success: true, data };
}

function printEnvelope(response: CliResponse): void {
  console.log(JSON.stringify(response));
}

/**
 * Print the failure envelope and end the process with status 1.
 */
export function exitWithError(message: string): never {
  printEnvelope(errorResponse(message));
  process.exit(1);
}

export function outputSuccess<T>(data?: T): void {
  printEnvelope(successResponse(data));
}

export type OutputFormat = 'json' | 'text';

export function parseFormat(value: string): OutputFormat {
  if (value === 'json' || value === 'text') return value;
  throw new InvalidArgumentError(`Unknown format '${value}' (expected json or text)`);
}

const RULE = '='.repeat(50);

/**
 * Human-readable block for one ticket's result.
 */
export function renderTextBlock(title: string, body: string): string {
  return [RULE, title, RULE, body, RULE].join('\n');
}
