/**
 * Chat model abstraction over the OpenAI Chat Completions API.
 */

import OpenAI from 'openai';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatModel {
  complete(messages: ChatMessage[]): Promise<string>;
}

export interface OpenAiChatModelOptions {
  apiKey: string;
  model: string;
  temperature: number;
  baseUrl?: string;
  maxTokens?: number;
}

export class OpenAiChatModel implements ChatModel {
  private readonly client: OpenAI;
  private readonly options: OpenAiChatModelOptions;

  constructor(options: OpenAiChatModelOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl && { baseURL: options.baseUrl }),
      maxRetries: 0,
    });
    this.options = options;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages,
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens ?? 1500,
    });

    const content = response.choices[0]?.message?.content;
    if (content === null || content === undefined) {
      throw new Error(`Model ${this.options.model} returned no content`);
    }
    return content;
  }
}
