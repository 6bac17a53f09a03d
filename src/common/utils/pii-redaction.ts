import { isRecord } from './object.utils';

const HARD_REDACT_KEYS = new Set([
  'access_token',
  'accesstoken',
  'api_key',
  'apikey',
  'authorization',
  'cookie',
  'password',
  'secret',
  'token',
]);

const REDACTED_LITERAL = '[REDACTED]';

/**
 * Returns a deep copy of `value` with credential-like keys replaced and
 * bearer tokens / URL credentials stripped from strings.
 */
export function redactSensitiveData(value: unknown): unknown {
  return redactRecursive(value, undefined, new WeakSet<object>());
}

function redactRecursive(value: unknown, key: string | undefined, visited: WeakSet<object>): unknown {
  if (key !== undefined && shouldHardRedact(normalizeKey(key))) {
    return REDACTED_LITERAL;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactRecursive(item, undefined, visited));
  }

  if (isRecord(value)) {
    if (visited.has(value)) {
      return '[CIRCULAR]';
    }

    visited.add(value);
    const output: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      output[childKey] = redactRecursive(childValue, childKey, visited);
    }
    return output;
  }

  if (typeof value === 'string') {
    return redactUrlCredentials(redactBearerToken(value));
  }

  return value;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[^a-z0-9_]/g, '');
}

function shouldHardRedact(normalizedKey: string): boolean {
  if (normalizedKey.length === 0) {
    return false;
  }

  return HARD_REDACT_KEYS.has(normalizedKey) || normalizedKey.includes('secret');
}

function redactBearerToken(value: string): string {
  return value.replace(/\bBearer\s+[A-Za-z0-9\-._~+/]+=*/gi, 'Bearer [REDACTED]');
}

function redactUrlCredentials(value: string): string {
  return value.replace(/(https?:\/\/)[^\s/@:]+:[^\s/@]+@/gi, '$1[REDACTED]@');
}
