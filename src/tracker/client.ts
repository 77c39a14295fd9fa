import type { z } from 'zod';
import {
  CommentResponseSchema,
  ErrorBodySchema,
  RawIssueSchema,
  SearchResponseSchema,
  type RawIssue,
} from './schema.js';
import { TrackerError, errorMessage } from '../utils/errors.js';
import { isTicketKey } from './format.js';
import type { TrackerCredentials } from '../utils/config.js';

/**
 * Read/write surface the pipeline needs from a ticket tracker.
 */
export interface Tracker {
  getIssue(key: string): Promise<RawIssue>;
  searchChildren(rootKey: string): Promise<RawIssue[]>;
  addComment(key: string, body: string): Promise<string>;
}

const PAGE_SIZE = 50;
const API_PREFIX = '/rest/api/2';

const normalizeBaseUrl = (value: string): string => {
  const trimmed = value.trim();
  return trimmed.endsWith('/') ? trimmed.slice(0, -1) : trimmed;
};

/**
 * Jira REST v2 client over fetch with basic auth (email + API token).
 */
export class JiraClient implements Tracker {
  private readonly baseUrl: string;
  private readonly authHeader: string;

  constructor(credentials: TrackerCredentials) {
    this.baseUrl = normalizeBaseUrl(credentials.server);
    if (!/^https?:\/\//i.test(this.baseUrl)) {
      throw new TrackerError('configure', 'JIRA_SERVER must start with http:// or https://');
    }
    const token = Buffer.from(`${credentials.email}:${credentials.apiToken}`, 'utf8').toString('base64');
    this.authHeader = `Basic ${token}`;
  }

  private async request<T>(
    operation: string,
    pathname: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init?: { method?: string; body?: unknown },
  ): Promise<T> {
    const url = `${this.baseUrl}${API_PREFIX}${pathname}`;
    let response: Response;
    try {
      response = await fetch(url, {
        method: init?.method ?? 'GET',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: this.authHeader,
        },
        body: init?.body === undefined ? undefined : JSON.stringify(init.body),
      });
    } catch (error) {
      throw new TrackerError(operation, `Tracker unreachable: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw new TrackerError(
        operation,
        `${operation} failed (${response.status})${detail ? `: ${detail}` : ''}`,
        { status: response.status },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TrackerError(operation, `${operation} returned invalid JSON`, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TrackerError(operation, `${operation} returned an unexpected response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async getIssue(key: string): Promise<RawIssue> {
    return this.request(`Fetch issue ${key}`, `/issue/${encodeURIComponent(key)}`, RawIssueSchema);
  }

  /**
   * All issues whose parent or epic link is `rootKey`, across result pages.
   */
  async searchChildren(rootKey: string): Promise<RawIssue[]> {
    // The key is spliced into JQL unquoted.
    if (!isTicketKey(rootKey)) {
      throw new TrackerError(`Search children of ${rootKey}`, `Invalid ticket key '${rootKey}'`);
    }
    const jql = `parent = ${rootKey} OR "Epic Link" = ${rootKey}`;
    const issues: RawIssue[] = [];
    let startAt = 0;

    for (;;) {
      const params = new URLSearchParams({
        jql,
        startAt: String(startAt),
        maxResults: String(PAGE_SIZE),
      });
      const page = await this.request(`Search children of ${rootKey}`, `/search?${params.toString()}`, SearchResponseSchema);
      issues.push(...page.issues);
      startAt += page.issues.length;
      if (page.issues.length === 0 || startAt >= page.total) break;
    }

    return issues;
  }

  async addComment(key: string, body: string): Promise<string> {
    const created = await this.request(
      `Comment on ${key}`,
      `/issue/${encodeURIComponent(key)}/comment`,
      CommentResponseSchema,
      { method: 'POST', body: { body } },
    );
    return created.id;
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  if (!text) return '';
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const messages = [...parsed.data.errorMessages, ...Object.values(parsed.data.errors)];
      if (messages.length > 0) return messages.join('; ');
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }
  return text.slice(0, 200);
}
