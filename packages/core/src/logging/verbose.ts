import type { LogContext, SecureLogger } from './logger.js';

export type DiagnosticLog = (msg: string, context?: LogContext) => void;

/**
 * Structuring diagnostics are debug noise unless the `verbose` switch is on,
 * in which case they are promoted to info.
 */
export function createDiagnosticLog(logger: SecureLogger, verbose: boolean): DiagnosticLog {
  return verbose
    ? (msg, context) => logger.info(msg, context)
    : (msg, context) => logger.debug(msg, context);
}
