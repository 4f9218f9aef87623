const SENSITIVE_KEYS = ['accesstoken', 'api_key', 'apikey', 'authorization', 'token', 'secret', 'password', 'cookie'];

export const REDACTED = '•••';

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => normalized.includes(sensitive));
}

function redactString(value: string): string {
  return /^Bearer\s+/i.test(value) ? `Bearer ${REDACTED}` : value;
}

/** Copies `value` for logging with secret-looking fields and bearer strings masked. */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item));
  }

  if (typeof value === 'string') {
    return redactString(value);
  }

  if (value && typeof value === 'object') {
    const output: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      output[key] = isSensitiveKey(key) ? REDACTED : redactSecrets(item);
    }
    return output;
  }

  return value;
}
