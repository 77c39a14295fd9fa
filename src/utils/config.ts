import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { parse } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

export const CONFIG_DIR = '.criteria-rag';
export const ENV_FILE = join(CONFIG_DIR, '.env');

const optionalString = z
  .string()
  .transform((v) => v.trim())
  .optional()
  .transform((v) => (v ? v : undefined));

const intSetting = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const booleanSetting = (fallback: boolean) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => ['true', '1', 'yes'].includes(v.trim().toLowerCase()));

const EnvSchema = z.object({
  JIRA_SERVER: optionalString,
  JIRA_EMAIL: optionalString,
  JIRA_API_TOKEN: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  CHAT_MODEL: z.string().default('gpt-4-turbo-preview'),
  CHAT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  CRITERIA_DB_URL: z.string().default(`file:${CONFIG_DIR}/vector_store.db`),
  CRITERIA_DB_AUTH_TOKEN: optionalString,
  VECTOR_ANN_INDEX: booleanSetting(true),
  CHUNK_SIZE: intSetting(500, 1),
  CHUNK_OVERLAP: intSetting(50, 0),
  RETRIEVAL_TOP_K: intSetting(3, 1),
  ACCEPTANCE_CRITERIA_FIELD: z.string().default('customfield_10006'),
  PROJECT_KEY: optionalString,
  DOD_PATH: z.string().default('definition_of_done.txt'),
  CONTEXT_PATH: z.string().default('README.md'),
  PRIVATE_CONTEXT_PATH: z.string().default('non-public.md'),
  AUDIT_PATH: z.string().default(join(CONFIG_DIR, 'processed_tickets.txt')),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface TrackerConfig {
  server?: string;
  email?: string;
  apiToken?: string;
  acceptanceCriteriaField: string;
  projectKey?: string;
}

export interface ModelConfig {
  apiKey?: string;
  baseUrl?: string;
  chatModel: string;
  temperature: number;
  embeddingModel: string;
}

export interface StoreConfig {
  url: string;
  authToken?: string;
  annIndex: boolean;
}

export interface RetrievalConfig {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
}

export interface DocumentsConfig {
  dodPath: string;
  contextPath: string;
  privateContextPath: string;
  auditPath: string;
}

export interface AppConfig {
  cwd: string;
  tracker: TrackerConfig;
  models: ModelConfig;
  store: StoreConfig;
  retrieval: RetrievalConfig;
  documents: DocumentsConfig;
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve configuration from .criteria-rag/.env and the environment.
 * Environment variables win over the file.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const envPath = join(cwd, ENV_FILE);
  const fileValues = existsSync(envPath) ? parse(readFileSync(envPath, 'utf-8')) : {};

  const merged: Record<string, string | undefined> = { ...fileValues };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') merged[key] = value;
  }

  const result = EnvSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const values = result.data;

  if (values.CHUNK_OVERLAP >= values.CHUNK_SIZE) {
    throw new ConfigError(
      `CHUNK_OVERLAP (${values.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${values.CHUNK_SIZE})`,
    );
  }

  return {
    cwd,
    tracker: {
      server: values.JIRA_SERVER,
      email: values.JIRA_EMAIL,
      apiToken: values.JIRA_API_TOKEN,
      acceptanceCriteriaField: values.ACCEPTANCE_CRITERIA_FIELD,
      projectKey: values.PROJECT_KEY,
    },
    models: {
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL,
      chatModel: values.CHAT_MODEL,
      temperature: values.CHAT_TEMPERATURE,
      embeddingModel: values.EMBEDDING_MODEL,
    },
    store: {
      url: values.CRITERIA_DB_URL,
      authToken: values.CRITERIA_DB_AUTH_TOKEN,
      annIndex: values.VECTOR_ANN_INDEX,
    },
    retrieval: {
      chunkSize: values.CHUNK_SIZE,
      chunkOverlap: values.CHUNK_OVERLAP,
      topK: values.RETRIEVAL_TOP_K,
    },
    documents: {
      dodPath: resolve(cwd, values.DOD_PATH),
      contextPath: resolve(cwd, values.CONTEXT_PATH),
      privateContextPath: resolve(cwd, values.PRIVATE_CONTEXT_PATH),
      auditPath: resolve(cwd, values.AUDIT_PATH),
    },
    logLevel: values.LOG_LEVEL,
  };
}

export interface TrackerCredentials {
  server: string;
  email: string;
  apiToken: string;
}

export function requireTrackerCredentials(config: TrackerConfig): TrackerCredentials {
  const { server, email, apiToken } = config;
  if (!server || !email || !apiToken) {
    throw new ConfigError(
      `JIRA_SERVER, JIRA_EMAIL and JIRA_API_TOKEN must be set (environment or ${ENV_FILE})`,
    );
  }
  return { server, email, apiToken };
}

export function requireModelApiKey(config: ModelConfig): string {
  if (config.apiKey) return config.apiKey;
  // Local OpenAI-compatible servers accept any key.
  if (config.baseUrl) return 'not-needed';
  throw new ConfigError(`OPENAI_API_KEY must be set (environment or ${ENV_FILE})`);
}

export function configExists(cwd: string = process.cwd()): boolean {
  return existsSync(join(cwd, ENV_FILE));
}
