/**
 * Redaction of values before they are written to logs
 *
 * The logging aspect prints arguments and results. Anything that passes
 * through it is rendered with formatForLog(), which:
 *
 * - masks values stored under sensitive keys (`password`, `token`, ...)
 * - runs strings through @redactpii/node, then rewrites the sensitive
 *   patterns it may miss (emails, card numbers, keys, ...)
 * - truncates long renderings
 *
 * ## Adding New Patterns
 *
 * To add a new sensitive pattern, add it to SENSITIVE_PATTERNS:
 * ```typescript
 * { pattern: /your-regex/g, replacement: '[LABEL]' }
 * ```
 */

import { Redactor } from '@redactpii/node';

const redactor = new Redactor();

function redactPii(text: string): string {
  try {
    return redactor.redact(text);
  } catch {
    // Pattern-based redaction still applies
    return text;
  }
}

/**
 * Regex patterns for sensitive text, each with a label for what was removed
 */
const SENSITIVE_PATTERNS = [
  // Email addresses
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  // Credit card numbers (before phone numbers, which would match their tail)
  { pattern: /\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}/g, replacement: '[CREDIT_CARD]' },
  // SSN
  { pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '[SSN]' },
  // Phone numbers
  { pattern: /(\+\d{1,2}[-.\s]?)?\(?\d{3}\)?[-.\s]\d{3}[-.\s]\d{4}\b/g, replacement: '[PHONE]' },
  // API keys (common patterns)
  { pattern: /sk_live_[a-zA-Z0-9]+/g, replacement: '[API_KEY]' },
  { pattern: /sk_test_[a-zA-Z0-9]+/g, replacement: '[API_KEY]' },
  { pattern: /api[_-]?key['":\s]*[a-zA-Z0-9_-]{20,}/gi, replacement: '[API_KEY]' },
  // JWT tokens
  { pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[JWT]' },
  // IP addresses
  { pattern: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, replacement: '[IP_ADDRESS]' },
  // Passwords in common contexts
  { pattern: /password['":\s]*[^\s,}"']+/gi, replacement: 'password: [REDACTED]' },
];

/**
 * Object keys whose values are never logged
 */
export const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'apikey',
  'authorization',
  'cookie',
];

export const REDACTED = '[REDACTED]';

export const MAX_LOGGED_LENGTH = 200;

/**
 * Check if an object key holds sensitive data (case-insensitive, ignores `_` and `-`)
 */
export function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase().replace(/[_-]/g, '');
  return SENSITIVE_KEYS.some(sensitive => normalized.includes(sensitive));
}

/**
 * Replace sensitive patterns in a string
 */
export function redactText(text: string): string {
  let redacted = redactPii(text);
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    redacted = redacted.replace(pattern, replacement);
  }
  return redacted;
}

/**
 * Copy a value with sensitive keys masked and sensitive text rewritten
 */
export function redactValue(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') {
    return redactText(value);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof Error) {
    return redactText(`${value.name}: ${value.message}`);
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  let result: unknown;
  if (Array.isArray(value)) {
    result = value.map(item => redactValue(item, seen));
  } else if (value instanceof Set) {
    result = [...value].map(item => redactValue(item, seen));
  } else if (value instanceof Map) {
    result = redactEntries(value.entries(), seen);
  } else {
    result = redactEntries(Object.entries(value), seen);
  }

  // Only ancestors count as cycles; shared references are rendered again
  seen.delete(value);
  return result;
}

function redactEntries(entries: Iterable<[unknown, unknown]>, seen: WeakSet<object>): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, entry] of entries) {
    const name = String(key);
    copy[name] = isSensitiveKey(name) ? REDACTED : redactValue(entry, seen);
  }
  return copy;
}

/**
 * Render a value for a log line
 */
export function formatForLog(value: unknown, redact = true): string {
  const prepared = redact ? redactValue(value) : value;

  let rendered: string;
  if (prepared === undefined) {
    rendered = 'undefined';
  } else if (typeof prepared === 'string') {
    rendered = JSON.stringify(prepared);
  } else if (typeof prepared === 'function' || typeof prepared === 'symbol' || typeof prepared === 'bigint') {
    rendered = String(prepared);
  } else {
    try {
      rendered = JSON.stringify(prepared) ?? String(prepared);
    } catch {
      rendered = String(prepared);
    }
  }

  return rendered.length > MAX_LOGGED_LENGTH
    ? `${rendered.slice(0, MAX_LOGGED_LENGTH)}...`
    : rendered;
}
