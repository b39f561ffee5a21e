/**
 * Sensitive Data Redaction Utility
 *
 * Keeps key material out of log lines. Requests to the wallet server carry
 * extended private keys, mnemonics and passwords.
 *
 * Usage:
 *   import { redactObject, REDACTED } from '../utils/redact';
 *   log.info('Request body', redactObject(req.body));
 */

/** Placeholder value for redacted content */
export const REDACTED = '[REDACTED]';

/** Fields that should always be redacted (case-insensitive) */
const SENSITIVE_FIELDS = new Set([
  'password',
  'passphrase',
  'secret',
  'token',
  'authorization',
  'masterkey',
  'master',
  'privatekey',
  'xprv',
  'seed',
  'mnemonic',
]);

/** Patterns that indicate sensitive data */
const SENSITIVE_PATTERNS = [/password/i, /secret/i, /private[_-]?key/i, /master[_-]?key/i, /mnemonic/i, /seed/i, /xprv/i];

/** Extended private keys in base58 (mainnet, testnet) */
const XPRV_PATTERN = /\b[xt]prv[1-9A-HJ-NP-Za-km-z]{100,112}\b/g;

function isSensitiveField(fieldName: string): boolean {
  if (SENSITIVE_FIELDS.has(fieldName.toLowerCase())) {
    return true;
  }
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(fieldName));
}

/**
 * Redact a single value
 *
 * @example
 * redact('tprv8Z...');  // '[REDACTED]'
 * redact(undefined);    // '[NOT SET]'
 */
export function redact(value: unknown): string {
  if (value === null || value === undefined || value === '') {
    return '[NOT SET]';
  }
  return REDACTED;
}

/**
 * Redact sensitive fields from an object, recursing into nested objects
 *
 * @example
 * redactObject({ name: 'savings', masterKey: 'tprv8Z...' });
 * // { name: 'savings', masterKey: '[REDACTED]' }
 */
export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveField(key)) {
      result[key] = redact(value);
    } else if (isPlainRecord(value)) {
      result[key] = redactObject(value);
    } else if (typeof value === 'string') {
      result[key] = redactString(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Replace extended private keys embedded in free text
 */
export function redactString(value: string): string {
  return value.replace(XPRV_PATTERN, REDACTED);
}

/**
 * Create a safe error object for logging
 */
export function safeError(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return {
      message: redactString(error.message),
      name: error.name,
      stack: error.stack ? redactString(error.stack) : undefined,
    };
  }
  return { message: redactString(String(error)) };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
