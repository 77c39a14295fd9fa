import { openStore } from '../db/client.js';
import { OpenAiEmbedder, type Embedder } from '../embed/model.js';
import { OpenAiChatModel, type ChatModel } from '../llm/chat.js';
import { JiraClient, type Tracker } from '../tracker/client.js';
import { requireModelApiKey, requireTrackerCredentials, type AppConfig } from '../utils/config.js';
import type { Logger } from '../utils/logger.js';
import { VectorIndex } from './vector-index.js';

/**
 * Ticket keys in the current knowledge-base generation.
 */
export interface ProcessedTicketSet {
  generation: string;
  rootKey: string;
  keys: ReadonlySet<string>;
}

/**
 * Everything one command run works with. Owns the index handle; passed
 * explicitly to build and analyze.
 */
export interface Session {
  config: AppConfig;
  tracker: Tracker;
  embedder: Embedder;
  chat: ChatModel;
  index: VectorIndex;
  logger: Logger;
  processed: ProcessedTicketSet | null;
}

export function createTracker(config: AppConfig): Tracker {
  return new JiraClient(requireTrackerCredentials(config.tracker));
}

export function createEmbedder(config: AppConfig): Embedder {
  return new OpenAiEmbedder({
    apiKey: requireModelApiKey(config.models),
    model: config.models.embeddingModel,
    baseUrl: config.models.baseUrl,
  });
}

export function createChatModel(config: AppConfig): ChatModel {
  return new OpenAiChatModel({
    apiKey: requireModelApiKey(config.models),
    model: config.models.chatModel,
    temperature: config.models.temperature,
    baseUrl: config.models.baseUrl,
  });
}

export async function openIndex(config: AppConfig, logger: Logger): Promise<VectorIndex> {
  const client = await openStore(config.store, config.cwd);
  return new VectorIndex(client, { annIndex: config.store.annIndex, logger });
}

/**
 * Open a session against the configured tracker, models and store.
 * Credentials are checked before anything is opened.
 */
export async function openSession(config: AppConfig, logger: Logger): Promise<Session> {
  const tracker = createTracker(config);
  const embedder = createEmbedder(config);
  const chat = createChatModel(config);
  const index = await openIndex(config, logger);
  return { config, tracker, embedder, chat, index, logger, processed: null };
}

export function closeSession(session: Session): void {
  session.index.close();
}
