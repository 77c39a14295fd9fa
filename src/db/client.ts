import { createClient, type Client } from '@libsql/client';
import type { StoreConfig } from '../utils/config.js';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';

/**
 * Open the vector store database. Local `file:` databases get their
 * directory created and WAL mode enabled.
 */
export async function openStore(config: StoreConfig, cwd: string = process.cwd()): Promise<Client> {
  let url = config.url;
  if (url.startsWith('file:')) {
    const path = resolve(cwd, url.slice('file:'.length));
    mkdirSync(dirname(path), { recursive: true });
    url = `file:${path}`;
  }

  const client = createClient({
    url,
    ...(config.authToken && { authToken: config.authToken }),
  });

  // Enable WAL mode for better concurrent read/write performance (local files only)
  if (url.startsWith('file:')) {
    await client.execute('PRAGMA journal_mode=WAL');
  }

  return client;
}
