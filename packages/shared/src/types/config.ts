/**
 * Configuration Types for turnweaver
 *
 * - Secret values are never stored in config, only references (env vars)
 * - Paths are validated to prevent path traversal
 * - Every field has a default so an empty document is a valid config
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z.string()
  .min(1)
  .max(4096)
  .refine(
    (path) => !path.includes('..') && !path.includes('\0'),
    { message: 'Path contains forbidden characters' }
  );

// Environment variable reference (for secrets)
const EnvVarRefSchema = z.string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'Must be a valid environment variable name');

// Core configuration
export const CoreConfigSchema = z.object({
  environment: z.enum(['development', 'staging', 'production']).default('development'),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

const LogFormatSchema = z.enum(['json', 'pretty']);

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  // stdout outputs without a format of their own use this one
  format: LogFormatSchema.default('pretty'),

  output: z.array(z.discriminatedUnion('type', [
    z.object({
      type: z.literal('file'),
      path: SafePathSchema,
    }),
    z.object({
      type: z.literal('stdout'),
      format: LogFormatSchema.optional(),
    }),
  ])).default([{ type: 'stdout' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Runtime switches for the structured-history extension.
 * Read once when the extension starts; never mutated while requests are in flight.
 */
export const StructuringConfigSchema = z.object({
  enabled: z.boolean().default(true),
  applyGroup: z.boolean().default(true),
  applyPrivate: z.boolean().default(true),
  applyRewrite: z.boolean().default(true),
  mergeConsecutive: z.boolean().default(true),
  // 0 keeps the host's own window size
  maxContextSizeOverride: z.number().int().min(0).max(1000).default(0),
  fallbackToOriginal: z.boolean().default(true),
  verbose: z.boolean().default(false),
  splitAssistantSpeaker: z.boolean().default(false),
  visibilityLevel: z.number().int().min(0).max(10).default(1),
});

export type StructuringConfig = z.infer<typeof StructuringConfigSchema>;

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

// What the surrounding chat host contributes
export const HostConfigSchema = z.object({
  maxContextSize: z.number().int().positive().max(1000).default(30),
  botNickname: z.string().min(1).default('assistant'),
  timeLocale: z.enum(['en', 'zh']).default('en'),
  timezone: z.string()
    .min(1)
    .refine(isKnownTimeZone, { message: 'Unknown IANA time zone' })
    .default('UTC'),
});

export type HostConfig = z.infer<typeof HostConfigSchema>;

// OpenAI-compatible chat endpoint used for structured requests
export const ModelConfigSchema = z.object({
  model: z.string().default('gpt-4o-mini'),
  apiKeyEnv: EnvVarRefSchema.default('OPENAI_API_KEY'),
  baseUrl: z.string().url().optional(),
  maxTokens: z.number().int().positive().max(200000).default(1024),
  temperature: z.number().min(0).max(2).default(0.7),
  requestTimeoutMs: z.number().int().positive().max(300000).default(60000),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

// Local request-recording stub
export const DiagnosticsConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(10030),
  logsDir: SafePathSchema.default('./mock_openai_logs'),
});

export type DiagnosticsConfig = z.infer<typeof DiagnosticsConfigSchema>;

// Complete configuration
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  core: CoreConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  structuring: StructuringConfigSchema.default({}),
  host: HostConfigSchema.default({}),
  model: ModelConfigSchema.default({}),
  diagnostics: DiagnosticsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging. Sections are made partial one by one:
 * `deepPartial()` stops at the `.default({})` wrappers above. Missing fields
 * stay missing here; defaults are applied once by `ConfigSchema`.
 */
export const PartialConfigSchema = z.object({
  version: z.string(),
  core: CoreConfigSchema.partial(),
  logging: LoggingConfigSchema.partial(),
  structuring: StructuringConfigSchema.partial(),
  host: HostConfigSchema.partial(),
  model: ModelConfigSchema.partial(),
  diagnostics: DiagnosticsConfigSchema.partial(),
}).partial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
