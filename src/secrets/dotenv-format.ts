/**
 * Dotenv text ⇄ mapping, for plaintext that enters (`encrypt`) or leaves
 * (`decrypt`, `edit`, `load --format dotenv`) the store.
 */
import { parse } from 'dotenv';
import { ValidationError } from '@/core/errors.js';
import type { SecretMapping } from '@/core/types.js';

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Valid variable names are identifier tokens: no `=`, no whitespace, no newlines. */
export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

/** @throws ValidationError for names that are not identifier tokens. */
export function assertValidKey(key: string): void {
  if (!isValidKey(key)) {
    throw new ValidationError(
      `Invalid variable name "${key.replace(/[\r\n]/g, ' ')}": use letters, digits and underscores, not starting with a digit`,
      { key },
    );
  }
}

/** @throws ValidationError for values that cannot be stored (NUL bytes). */
export function assertValidValue(key: string, value: string): void {
  if (value.includes('\0')) {
    throw new ValidationError(`Value of "${key}" contains a NUL byte`, { key });
  }
}

/**
 * Parse dotenv text into a mapping. Later duplicates win, as in dotenv.
 *
 * @throws ValidationError when a variable name is not an identifier token
 */
export function parseDotenv(text: string): Record<string, string> {
  const parsed = parse(text);
  const mapping: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    assertValidKey(key);
    assertValidValue(key, value);
    mapping[key] = value;
  }
  return mapping;
}

const UNQUOTED_SAFE = /^[^\s'"`#][^\r\n#]*$/;

function quoteValue(key: string, value: string): string {
  if (value === '') return '';
  if (UNQUOTED_SAFE.test(value) && value.trimEnd() === value) return value;
  if (!/['\r\n]/.test(value)) return `'${value}'`;
  if (!/["\\]/.test(value)) return `"${value.replace(/\n/g, '\\n').replace(/\r/g, '\\r')}"`;
  if (!/[`\r]/.test(value)) return `\`${value}\``;
  throw new ValidationError(`Value of "${key}" cannot be represented in dotenv format`, { key });
}

/**
 * Format a mapping as dotenv text that `parseDotenv` reads back unchanged.
 */
export function formatDotenv(mapping: SecretMapping): string {
  return Object.entries(mapping)
    .map(([key, value]) => `${key}=${quoteValue(key, value)}\n`)
    .join('');
}
