/**
 * @turnweaver/core
 *
 * Rebuilds flattened chat prompts as role-tagged turns for multi-message
 * chat APIs, with the host-side interception point, an OpenAI-compatible
 * model client and a diagnostic echo server.
 */

// Main entry point
export {
  TurnWeaver,
  createTurnWeaver,
  type TurnWeaverOptions,
  type HostCollaborators,
} from './turnweaver.js';

// Configuration
export {
  loadConfig,
  mergeConfigs,
  getSecret,
  requireSecret,
  type LoadConfigOptions,
} from './config/loader.js';

// Logging
export {
  createLogger,
  createNoopLogger,
  routeOutputs,
  type LogRouting,
  type SecureLogger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';
export { createDiagnosticLog, type DiagnosticLog } from './logging/verbose.js';

// Structured history
export * from './structuring/index.js';

// Interception
export * from './interception/index.js';

// Model client
export * from './ai/index.js';

// Diagnostics
export {
  createEchoServer,
  startEchoServer,
  parseRequestBody,
  summarizeMessages,
  safePreview,
  CHAT_COMPLETION_PATHS,
  type EchoServerOptions,
  type RecordedRequest,
} from './diagnostics/echo-server.js';

// Utilities
export { toErrorMessage } from './utils/errors.js';
export { sanitizeForLogging, sanitizeRecord } from './utils/sanitize.js';
export { VERSION } from './version.js';
