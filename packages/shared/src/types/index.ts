/**
 * Shared Types - Main Export
 */

export {
  CoreConfigSchema,
  LoggingConfigSchema,
  StructuringConfigSchema,
  HostConfigSchema,
  ModelConfigSchema,
  DiagnosticsConfigSchema,
  ConfigSchema,
  PartialConfigSchema,
  type CoreConfig,
  type LoggingConfig,
  type StructuringConfig,
  type HostConfig,
  type ModelConfig,
  type DiagnosticsConfig,
  type Config,
  type PartialConfig,
} from './config.js';
