import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CONFIG_DIR, ENV_FILE, configExists, loadConfig, requireModelApiKey, requireTrackerCredentials } from '../config.js';
import { ConfigError } from '../errors.js';

let cwd: string;

beforeEach(() => {
  cwd = mkdtempSync(join(tmpdir(), 'criteria-config-'));
});

afterEach(() => {
  rmSync(cwd, { recursive: true, force: true });
});

function writeEnvFile(contents: string): void {
  mkdirSync(join(cwd, CONFIG_DIR), { recursive: true });
  writeFileSync(join(cwd, ENV_FILE), contents);
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ cwd, env: {} });
    expect(config.retrieval).toEqual({ chunkSize: 500, chunkOverlap: 50, topK: 3 });
    expect(config.models.chatModel).toBe('gpt-4-turbo-preview');
    expect(config.models.temperature).toBe(0.7);
    expect(config.store).toEqual({ url: 'file:.criteria-rag/vector_store.db', authToken: undefined, annIndex: true });
    expect(config.tracker.acceptanceCriteriaField).toBe('customfield_10006');
    expect(config.documents.contextPath).toBe(join(cwd, 'README.md'));
    expect(config.logLevel).toBe('info');
  });

  it('reads the env file and lets the environment win', () => {
    writeEnvFile('JIRA_SERVER=https://file.example.test\nPROJECT_KEY=ES\nRETRIEVAL_TOP_K=5\n');
    const config = loadConfig({ cwd, env: { JIRA_SERVER: 'https://env.example.test', VECTOR_ANN_INDEX: 'false' } });

    expect(configExists(cwd)).toBe(true);
    expect(config.tracker.server).toBe('https://env.example.test');
    expect(config.tracker.projectKey).toBe('ES');
    expect(config.retrieval.topK).toBe(5);
    expect(config.store.annIndex).toBe(false);
  });

  it('ignores empty environment values', () => {
    writeEnvFile('CHAT_MODEL=gpt-4o\n');
    expect(loadConfig({ cwd, env: { CHAT_MODEL: '' } }).models.chatModel).toBe('gpt-4o');
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ cwd, env: { CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' } })).toThrow(
      'CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100)',
    );
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ cwd, env: { LOG_LEVEL: 'verbose' } })).toThrow(ConfigError);
    expect(() => loadConfig({ cwd, env: { CHUNK_SIZE: 'big' } })).toThrow(/CHUNK_SIZE/);
  });
});

describe('credential checks', () => {
  it('requires all tracker credentials', () => {
    const config = loadConfig({ cwd, env: { JIRA_SERVER: 'https://tracker.example.test', JIRA_EMAIL: 'dev@example.test' } });
    expect(() => requireTrackerCredentials(config.tracker)).toThrow(ConfigError);
  });

  it('returns tracker credentials when complete', () => {
    const config = loadConfig({
      cwd,
      env: { JIRA_SERVER: 'https://tracker.example.test', JIRA_EMAIL: 'dev@example.test', JIRA_API_TOKEN: 'test-secret' },
    });
    expect(requireTrackerCredentials(config.tracker)).toEqual({
      server: 'https://tracker.example.test',
      email: 'dev@example.test',
      apiToken: 'test-secret',
    });
  });

  it('requires a model key unless a base URL is set', () => {
    expect(() => requireModelApiKey(loadConfig({ cwd, env: {} }).models)).toThrow(ConfigError);
    const local = loadConfig({ cwd, env: { OPENAI_BASE_URL: 'http://localhost:8000/v1' } });
    expect(requireModelApiKey(local.models)).toBe('not-needed');
  });
});
