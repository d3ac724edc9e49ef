/**
 * Sanitization helpers for safe logging.
 *
 * Never log raw provider configs or credential records; they carry API keys.
 * Use sanitizeForLog() before passing any such object to the logger.
 */

const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'apiKey',
  'apiKeys',
  'authorization',
  'token',
  'secret',
]);

/**
 * Returns a shallow copy of `obj` with any sensitive fields replaced by
 * the string `'***'`.
 */
export function sanitizeForLog(obj: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = SENSITIVE_KEYS.has(key) && value !== undefined ? '***' : value;
  }
  return out;
}

/** Short, non-reversible hint of a key for diagnostics: length only. */
export function describeSecret(secret: string | undefined): string {
  return secret ? `<${secret.length} chars>` : '<unset>';
}
