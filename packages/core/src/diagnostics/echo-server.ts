/**
 * Diagnostic Echo Server
 *
 * A local stand-in for an OpenAI-compatible chat completions endpoint. Every
 * POST is written to disk as received and summarised in the log; chat
 * completion paths get a fixed `mock response` back, streamed or not.
 * Point `model.baseUrl` at it to see exactly which turns a host sends.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type { DiagnosticsConfig } from '@turnweaver/shared';
import type { SecureLogger } from '../logging/logger.js';
import { sanitizeRecord } from '../utils/sanitize.js';

export const CHAT_COMPLETION_PATHS: readonly string[] = ['/chat/completions', '/v1/chat/completions'];

const MOCK_CONTENT = 'mock response';
const DEFAULT_MODEL = 'mock-model';
const PREVIEW_LIMIT = 100;

export type RecordedPayload = Record<string, unknown>;

export interface RecordedRequest {
  timestamp: string;
  method: string;
  path: string;
  headers: Record<string, unknown>;
  payload: RecordedPayload;
}

export interface EchoServerOptions {
  logsDir: string;
  logger: SecureLogger;
  /** Injectable for tests */
  now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** Local time as `YYYY-MM-DDTHH:MM:SS`. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Local time as `YYYYMMDD_HHMMSS_ffffff`; the last group is microseconds. */
export function formatFileStamp(date: Date, micros = date.getMilliseconds() * 1000): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    `_${pad(micros, 6)}`
  );
}

/**
 * Decode a request body. A JSON object is kept as is, any other JSON value is
 * wrapped as `_raw`, and text that is not JSON at all as `_raw_text`. An
 * empty body counts as `{}`.
 */
export function parseRequestBody(raw: string | undefined): RecordedPayload {
  const text = raw ? raw : '{}';
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { _raw_text: text };
  }
  return isRecord(parsed) ? parsed : { _raw: parsed };
}

/** Single-line preview: newlines escaped, cut at `limit` with an ellipsis. */
export function safePreview(value: unknown, limit = PREVIEW_LIMIT): string {
  let text: string;
  if (value === undefined || value === null || value === '') {
    text = '';
  } else if (typeof value === 'string') {
    text = value;
  } else {
    text = JSON.stringify(value);
  }
  text = text.replace(/\n/g, '\\n');
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/** Count line, role distribution and one preview line per message. */
export function summarizeMessages(messages: readonly unknown[]): string {
  const roleCounts = new Map<string, number>();
  const lines: string[] = [];

  messages.forEach((message, index) => {
    const entry = isRecord(message) ? message : {};
    const role = entry.role === undefined ? 'unknown' : String(entry.role);
    roleCounts.set(role, (roleCounts.get(role) ?? 0) + 1);
    const preview = safePreview(entry.content ?? '');
    lines.push(`  ${pad(index + 1)}. role=${role.padEnd(9)} content=${preview}`);
  });

  const roles = [...roleCounts].map(([role, count]) => `${role}:${count}`).join(', ') || 'none';
  return [`Messages: total=${messages.length} | roles=${roles}`, ...lines].join('\n');
}

function completionId(created: number): string {
  return `chatcmpl-mock-${created}`;
}

export function buildCompletion(model: string, created: number): Record<string, unknown> {
  return {
    id: completionId(created),
    object: 'chat.completion',
    created,
    model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: MOCK_CONTENT },
        finish_reason: 'stop',
      },
    ],
    usage: { prompt_tokens: 100, completion_tokens: 2, total_tokens: 102 },
  };
}

/** The full SSE body: three completion chunks, then the `[DONE]` sentinel. */
export function buildCompletionStream(model: string, created: number): string {
  const chunk = (delta: Record<string, unknown>, finishReason: string | null) => ({
    id: completionId(created),
    object: 'chat.completion.chunk',
    created,
    model,
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  });

  const chunks = [
    chunk({ role: 'assistant', content: 'mock' }, null),
    chunk({ content: ' response' }, null),
    chunk({}, 'stop'),
  ];

  return chunks.map((c) => `data: ${JSON.stringify(c)}\n\n`).join('') + 'data: [DONE]\n\n';
}

/**
 * Writes each request under its own `request_<stamp>.json`. Requests within
 * the same millisecond get consecutive microsecond values so no file is
 * overwritten.
 */
class RequestRecorder {
  private readonly logsDir: string;
  private lastMicros = 0;

  constructor(logsDir: string) {
    this.logsDir = resolve(logsDir);
  }

  async record(entry: RecordedRequest, at: Date): Promise<string> {
    await mkdir(this.logsDir, { recursive: true });

    let micros = at.getTime() * 1000;
    if (micros <= this.lastMicros) {
      micros = this.lastMicros + 1;
    }
    this.lastMicros = micros;

    const stamp = formatFileStamp(at, micros % 1_000_000);
    const file = join(this.logsDir, `request_${stamp}.json`);
    await writeFile(file, JSON.stringify(entry, null, 2), 'utf-8');
    return file;
  }
}

export function createEchoServer(options: EchoServerOptions): FastifyInstance {
  const { logger } = options;
  const now = options.now ?? (() => new Date());
  const recorder = new RequestRecorder(options.logsDir);

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: 10 * 1_048_576,
  });

  // Bodies are recorded even when they are not valid JSON, so parse them ourselves
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  const handle = async (request: FastifyRequest, reply: FastifyReply) => {
    const at = now();
    const payload = parseRequestBody(typeof request.body === 'string' ? request.body : undefined);
    const file = await recorder.record(
      {
        timestamp: formatLocalTimestamp(at),
        method: request.method,
        path: request.url,
        headers: sanitizeRecord(request.headers),
        payload,
      },
      at
    );

    logger.info('Request recorded', {
      method: request.method,
      path: request.url,
      file,
      model: payload.model,
      stream: payload.stream ?? false,
    });
    if (Array.isArray(payload.messages)) {
      logger.info(summarizeMessages(payload.messages));
    } else if (payload.messages !== undefined) {
      logger.warn('Request messages is not an array', { type: typeof payload.messages });
    }

    const pathname = request.url.split('?')[0] ?? request.url;
    if (!CHAT_COMPLETION_PATHS.includes(pathname)) {
      return reply.code(404).send({
        error: {
          message: `Only these paths are supported: ${[...CHAT_COMPLETION_PATHS].sort().join(', ')}`,
          type: 'invalid_request_error',
        },
      });
    }

    const model = payload.model === undefined ? DEFAULT_MODEL : String(payload.model);
    const created = Math.floor(at.getTime() / 1000);

    if (payload.stream) {
      return reply
        .header('content-type', 'text/event-stream')
        .header('cache-control', 'no-cache')
        .send(buildCompletionStream(model, created));
    }

    return reply.send(buildCompletion(model, created));
  };

  app.post('*', handle);

  return app;
}

/** Build the server from config and start listening. */
export async function startEchoServer(
  config: DiagnosticsConfig,
  logger: SecureLogger
): Promise<FastifyInstance> {
  const app = createEchoServer({ logsDir: config.logsDir, logger });
  await app.listen({ host: config.host, port: config.port });

  logger.info('Echo server started', {
    url: `http://${config.host}:${config.port}`,
    logsDir: resolve(config.logsDir),
    paths: CHAT_COMPLETION_PATHS.join(', '),
  });
  return app;
}
