/**
 * Denylist-based redaction for logs and run diagnostics.
 *
 * The inference API key travels through config objects and request
 * options; anything logged or written to run_summary.json goes through
 * `redact` first.
 */

/** Key fragments that must never appear in output. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'authorization',
  'credential',
  'private_key',
];

const SECRET_VALUE_PATTERNS: readonly RegExp[] = [
  /hf_[a-zA-Z0-9]{20,}/,                 // Hugging Face token
  /sk-[a-zA-Z0-9_-]{32,}/,               // OpenAI-style key
  /Bearer\s+[a-zA-Z0-9._-]{16,}/,
  /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/,
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/, // Email (PII)
];

const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

/**
 * Deep-redact a value: denylisted keys are masked, and string values
 * matching a secret pattern are masked whole. Returns a new value.
 */
export function redact(value: unknown): unknown {
  if (value === null || value === undefined) return value;

  if (typeof value === 'string') {
    return SECRET_VALUE_PATTERNS.some((p) => p.test(value)) ? REDACTED : value;
  }

  if (typeof value !== 'object') return value;

  if (Array.isArray(value)) {
    return value.map((item) => redact(item));
  }

  return redactRecord(value);
}

export function redactRecord(record: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(record)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(inner);
  }
  return out;
}

/**
 * Replace inline secrets inside free text (error messages, prompts).
 */
export function redactString(input: string): string {
  let result = input;
  for (const pattern of SECRET_VALUE_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, 'g'), REDACTED);
  }
  return result.replace(/[a-zA-Z0-9_]+_(?:key|token|secret)\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
}
