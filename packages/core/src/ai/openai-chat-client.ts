/**
 * OpenAI-compatible chat client
 *
 * Sends structured turns to any chat completions endpoint through the
 * `openai` package. `baseUrl` points it at a local server, the diagnostic
 * echo server included.
 */

import OpenAI from 'openai';
import type { ModelConfig } from '@turnweaver/shared';
import type { SecureLogger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { getSecret } from '../config/loader.js';
import type { GenerationOutcome, StructuredModelClient } from '../interception/types.js';
import type { StructuredTurn } from '../structuring/types.js';
import { InvalidResponseError, ModelUnavailableError, RateLimitError } from './errors.js';

// Local endpoints accept any key; the SDK refuses to start without one
const PLACEHOLDER_API_KEY = 'no-key';

export interface OpenAIChatClientOptions {
  config: ModelConfig;
  apiKey?: string;
  logger?: SecureLogger;
}

export function mapTurns(turns: readonly StructuredTurn[]): OpenAI.ChatCompletionMessageParam[] {
  return turns.map((turn): OpenAI.ChatCompletionMessageParam => {
    switch (turn.role) {
      case 'system':
        return { role: 'system', content: turn.text };
      case 'assistant':
        return { role: 'assistant', content: turn.text };
      case 'user':
        return { role: 'user', content: turn.text };
    }
  });
}

export class OpenAIChatClient implements StructuredModelClient {
  private readonly client: OpenAI;
  private readonly config: ModelConfig;
  private readonly logger: SecureLogger;

  constructor(options: OpenAIChatClientOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createNoopLogger();
    this.client = new OpenAI({
      apiKey: options.apiKey ?? PLACEHOLDER_API_KEY,
      timeout: this.config.requestTimeoutMs,
      ...(this.config.baseUrl ? { baseURL: this.config.baseUrl } : {}),
    });
  }

  async generate(turns: readonly StructuredTurn[]): Promise<GenerationOutcome> {
    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.config.model,
      messages: mapTurns(turns),
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(params);
    } catch (error) {
      throw this.mapError(error);
    }

    const message = response.choices[0]?.message;
    if (!message) {
      throw new InvalidResponseError('no choices in completion');
    }

    this.logger.debug('Chat completion received', {
      model: response.model,
      messageCount: params.messages.length,
      totalTokens: response.usage?.total_tokens,
    });

    // Reasoning models behind compatible servers add this outside the official schema
    const reasoning =
      'reasoning_content' in message && typeof message.reasoning_content === 'string'
        ? message.reasoning_content
        : undefined;

    return {
      content: message.content ?? '',
      model: response.model || this.config.model,
      ...(reasoning ? { reasoning } : {}),
    };
  }

  private mapError(error: unknown): Error {
    if (error instanceof OpenAI.APIError) {
      if (error.status === 429) {
        return new RateLimitError(error);
      }
      if (error.status === 502 || error.status === 503 || error.status === 504) {
        return new ModelUnavailableError(error.status, error);
      }
      return new InvalidResponseError(error.message, error.status, error);
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}

/** Client for the configured endpoint, reading the API key from `config.apiKeyEnv`. */
export function createOpenAIChatClient(config: ModelConfig, logger?: SecureLogger): OpenAIChatClient {
  return new OpenAIChatClient({ config, apiKey: getSecret(config.apiKeyEnv), logger });
}
