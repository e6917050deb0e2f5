/**
 * Model Client - Public Exports
 */

export {
  OpenAIChatClient,
  createOpenAIChatClient,
  mapTurns,
  type OpenAIChatClientOptions,
} from './openai-chat-client.js';
export {
  ModelClientError,
  RateLimitError,
  ModelUnavailableError,
  InvalidResponseError,
} from './errors.js';
