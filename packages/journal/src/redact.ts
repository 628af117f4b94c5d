const SENSITIVE_KEYS = /^(authorization|password|secret|token|api[_-]?key|access[_-]?token|refresh[_-]?token|credential|client[_-]?secret)$/i;
const SENSITIVE_VALUES = /Bearer\s|eyJ[A-Za-z0-9_-]{10,}\.|-----BEGIN\s+(?:RSA\s+|EC\s+|OPENSSH\s+)?PRIVATE\s+KEY/;

export const REDACTED = "[REDACTED]";

/**
 * Copies a journal payload with secret-looking keys and values replaced.
 */
export function redactPayload(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return SENSITIVE_VALUES.test(value) ? REDACTED : value;
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(redactPayload);
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    result[k] = SENSITIVE_KEYS.test(k) && typeof v === "string" ? REDACTED : redactPayload(v);
  }
  return result;
}
