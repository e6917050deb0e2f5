/**
 * Log and record sanitisation: strips secrets from strings and from values
 * stored under sensitive keys.
 */

const SECRET_PATTERNS: { regex: RegExp; replacement: string }[] = [
  { regex: /sk-[a-zA-Z0-9-_]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  {
    regex: /api[_-]?key["\s:=]+["']?[a-zA-Z0-9-_]{16,}["']?/gi,
    replacement: '[REDACTED_API_KEY]',
  },
  { regex: /bearer\s+[a-zA-Z0-9-_.]+/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  { regex: /password["\s:=]+["']?[^"'\s]{1,}["']?/gi, replacement: '[REDACTED_PASSWORD]' },
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization', 'cookie'];

export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(input)) {
    return input.map(sanitizeForLogging);
  }

  if (typeof input === 'object') {
    return sanitizeRecord(input);
  }

  return input;
}

export function sanitizeRecord(input: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((s) => lowerKey.includes(s))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = sanitizeForLogging(value);
    }
  }
  return sanitized;
}
