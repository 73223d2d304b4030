/**
 * OpenAI-backed language model.
 * The API key, base URL and model id come from loadConfig().
 */

import OpenAI from 'openai';
import type { ChatMessage, CompletionOptions, LanguageModel } from './types.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

export interface OpenAIModelOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
}

function toMessageParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * The client is created on first use, so commands that never compile
 * (listing tables, reading history) work without an API key.
 */
export class OpenAIModel implements LanguageModel {
  readonly id: string;
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIModelOptions = {}) {
    this.id = options.model ?? DEFAULT_MODEL;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new Error('OpenAI API key is not configured. Set OPENAI_API_KEY in your shell.');
      }
      this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseUrl, maxRetries: 0 });
    }
    return this.client;
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions): Promise<string> {
    const response = await this.getClient().chat.completions.create(
      {
        model: this.id,
        messages: messages.map(toMessageParam),
        temperature: 0.1,
        max_tokens: 2048,
      },
      { signal: options.signal, timeout: options.timeoutMs },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned empty response.');
    }
    return content;
  }
}
