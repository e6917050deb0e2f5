/**
 * Extracts a readable message from an unknown error value.
 * Use in log fields: `logger.warn('...', { error: toErrorMessage(err) })`
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
