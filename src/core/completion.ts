/**
 * Dossier - Completion Backends
 *
 * A completion backend turns a list of chat messages into text, either in one
 * piece or as a stream of fragments. Two providers are supported: any
 * OpenAI-compatible chat completions endpoint, and Anthropic's Messages API.
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';

import { ConfigError, type Provider, type ResolvedConfig } from './config.js';

// ============================================================================
// Types
// ============================================================================

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
}

export interface CompletionBackend {
  readonly provider: string;
  /** Single-shot completion. Resolves with the full response text. */
  complete(request: CompletionRequest): Promise<string>;
  /** Incremental completion. Yields text fragments until the provider signals stop. */
  stream(request: CompletionRequest): AsyncIterable<string>;
}

// ============================================================================
// OpenAI-compatible
// ============================================================================

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAICompletionBackend implements CompletionBackend {
  readonly provider = 'openai';

  constructor(private readonly client: OpenAI) {}

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature,
      stream: false,
    });
    return response.choices[0]?.message?.content ?? '';
  }

  async *stream(request: CompletionRequest): AsyncIterable<string> {
    const stream = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature,
      stream: true,
    });

    for await (const chunk of stream) {
      const choice = chunk.choices[0];
      if (!choice) continue;
      const text = choice.delta?.content;
      if (text) {
        yield text;
      }
      if (choice.finish_reason === 'stop') break;
    }
  }
}

// ============================================================================
// Anthropic
// ============================================================================

const ANTHROPIC_MAX_TOKENS = 8192;

function splitSystem(messages: ChatMessage[]): { system: string | undefined; messages: Anthropic.MessageParam[] } {
  const system: string[] = [];
  const rest: Anthropic.MessageParam[] = [];
  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content);
    } else {
      rest.push({ role: message.role, content: message.content });
    }
  }
  return { system: system.length > 0 ? system.join('\n\n') : undefined, messages: rest };
}

export class AnthropicCompletionBackend implements CompletionBackend {
  readonly provider = 'anthropic';

  constructor(private readonly client: Anthropic) {}

  async complete(request: CompletionRequest): Promise<string> {
    const { system, messages } = splitSystem(request.messages);
    const response = await this.client.messages.create({
      model: request.model,
      max_tokens: ANTHROPIC_MAX_TOKENS,
      ...(system ? { system } : {}),
      messages,
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    });

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
  }

  async *stream(request: CompletionRequest): AsyncIterable<string> {
    const { system, messages } = splitSystem(request.messages);
    const stream = this.client.messages.stream({
      model: request.model,
      max_tokens: ANTHROPIC_MAX_TOKENS,
      ...(system ? { system } : {}),
      messages,
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    });

    for await (const event of stream) {
      if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
        yield event.delta.text;
      } else if (event.type === 'message_stop') {
        break;
      }
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Build the backend for the configured provider. Throws ConfigError when the
 * provider's API key is missing. SDK retries are disabled: a failed call is
 * handled by the caller's fallback, never retried.
 */
export function createCompletionBackend(
  config: Pick<ResolvedConfig, 'provider' | 'openaiApiKey' | 'openaiBaseUrl' | 'anthropicApiKey' | 'requestTimeoutMs'>
): CompletionBackend {
  const provider: Provider = config.provider;

  if (provider === 'anthropic') {
    if (!config.anthropicApiKey) {
      throw new ConfigError(
        'ANTHROPIC_API_KEY is not configured. Set it in the environment or run "dossier config set anthropic_api_key <key>".'
      );
    }
    return new AnthropicCompletionBackend(
      new Anthropic({ apiKey: config.anthropicApiKey, timeout: config.requestTimeoutMs, maxRetries: 0 })
    );
  }

  if (!config.openaiApiKey) {
    throw new ConfigError(
      'OPENAI_API_KEY is not configured. Set it in the environment or run "dossier config set openai_api_key <key>".'
    );
  }
  return new OpenAICompletionBackend(
    new OpenAI({
      apiKey: config.openaiApiKey,
      ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
      timeout: config.requestTimeoutMs,
      maxRetries: 0,
    })
  );
}
