/**
 * Rendering a Session for shells and other programs.
 */
import type { Session } from '@/core/types.js';
import { formatDotenv } from '@/secrets/dotenv-format.js';
import type { SessionFormat } from './types.js';

/** Single-quote a string for POSIX shells. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render variables in `format`:
 * - `shell`: `export NAME='value'` lines, for `eval "$(envkeep load)"`
 * - `dotenv`: dotenv text
 * - `json`: a JSON object
 */
export function formatSession(session: Session, format: SessionFormat): string {
  switch (format) {
    case 'shell':
      return Object.entries(session.variables)
        .map(([key, value]) => `export ${key}=${shellQuote(value)}\n`)
        .join('');
    case 'dotenv':
      return formatDotenv(session.variables);
    case 'json':
      return `${JSON.stringify(session.variables, null, 2)}\n`;
  }
}

/** A copy of `env` with the session's variables layered on top. */
export function bindSession(
  session: Session,
  env: Readonly<Record<string, string | undefined>>,
): Record<string, string | undefined> {
  return { ...env, ...session.variables };
}
