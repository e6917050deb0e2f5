/**
 * Logger for turnweaver
 *
 * pino underneath; every context object passes through `sanitizeRecord`
 * before it is written, so secrets under sensitive keys never reach a sink.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LoggingConfig } from '@turnweaver/shared';
import { sanitizeRecord } from '../utils/sanitize.js';

export type LogLevel = LoggingConfig['level'];

export interface LogContext {
  conversationId?: string;
  component?: string;
  [key: string]: unknown;
}

export interface SecureLogger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  child(context: LogContext): SecureLogger;
  level: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Where each configured output goes. JSON on stdout is pino's own default
 * sink and needs no worker thread, so it is reported as a flag rather than a
 * transport target.
 */
export interface LogRouting {
  stdoutJson: boolean;
  targets: pino.TransportTargetOptions[];
}

export function routeOutputs(config: LoggingConfig): LogRouting {
  const routing: LogRouting = { stdoutJson: false, targets: [] };

  for (const output of config.output) {
    if (output.type === 'file') {
      routing.targets.push({
        target: 'pino/file',
        options: { destination: output.path, mkdir: true },
        level: config.level,
      });
    } else if ((output.format ?? config.format) === 'pretty') {
      routing.targets.push({
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
        level: config.level,
      });
    } else {
      routing.stdoutJson = true;
    }
  }

  return routing;
}

class SecureLoggerImpl implements SecureLogger {
  constructor(
    private readonly pino: PinoLogger,
    private readonly bindings: LogContext = {}
  ) {}

  get level(): LogLevel {
    const level = this.pino.level;
    return isLogLevel(level) ? level : 'info';
  }

  private context(extra?: LogContext): Record<string, unknown> {
    return sanitizeRecord({ ...this.bindings, ...extra });
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.context(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.context(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.context(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.context(context), msg);
  }

  child(context: LogContext): SecureLogger {
    return new SecureLoggerImpl(this.pino, { ...this.bindings, ...context });
  }
}

export function createLogger(config: LoggingConfig): SecureLogger {
  const options: LoggerOptions = {
    name: 'turnweaver',
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  const { stdoutJson, targets } = routeOutputs(config);

  // No outputs at all also lands here: plain JSON on stdout
  if (targets.length === 0) {
    return new SecureLoggerImpl(pino(options));
  }

  if (stdoutJson) {
    targets.push({ target: 'pino/file', options: { destination: 1 }, level: config.level });
  }
  return new SecureLoggerImpl(pino(options, pino.transport({ targets })));
}

/**
 * A logger that discards everything; the default for collaborators built
 * without one.
 */
export function createNoopLogger(): SecureLogger {
  const noop: SecureLogger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
