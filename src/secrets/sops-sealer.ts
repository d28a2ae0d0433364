/**
 * `sops/dotenv` document format, delegated to the `sops` binary with age recipients.
 *
 * Plaintext goes to sops on stdin and comes back on stdout; it is never
 * written to disk. Decryption points `SOPS_AGE_KEY_FILE` at the scoped
 * secret's key file.
 */
import { CommandFailedError, DecryptionError, IntegrityError, ValidationError } from '@/core/errors.js';
import type { ScopedSecret, SecretDocument, SecretMapping } from '@/core/types.js';
import type { CommandRunner } from '@/infrastructure/command-runner.js';
import { summarizeStderr } from '@/infrastructure/command-runner.js';
import { isAgeIdentifier } from '@/keys/age-backend.js';
import { createLogger } from '@/observability/logger.js';
import { assertValidKey, assertValidValue } from './dotenv-format.js';
import type { DocumentSealer } from './types.js';

const logger = createLogger({ name: 'sops-sealer' });

export const SOPS_FORMAT = 'sops/dotenv';

const SOPS = 'sops';
const DOTENV_ARGS = ['--input-type', 'dotenv', '--output-type', 'dotenv'] as const;
const RECIPIENT_LINE = /^sops_age__list_\d+__map_recipient=(.+)$/;
const METADATA_PREFIX = 'sops_';

export interface SopsSealerOptions {
  runner: CommandRunner;
  /** Per-invocation timeout. Default: 60_000 */
  timeoutMs?: number;
}

// ─── sops dotenv dialect ────────────────────────────────────────
// sops reads values literally up to the end of the line and writes newlines as `\n`.

/** Serialize a mapping in the dialect sops reads. */
export function formatSopsDotenv(mapping: SecretMapping): string {
  return Object.entries(mapping)
    .map(([key, value]) => {
      assertValidKey(key);
      assertValidValue(key, value);
      if (value.includes('\r') || value.includes('\\n')) {
        throw new ValidationError(`Value of "${key}" cannot be represented in the sops dotenv format`, { key });
      }
      return `${key}=${value.replace(/\n/g, '\\n')}\n`;
    })
    .join('');
}

/** Parse decrypted sops dotenv output, skipping blank lines and comments. */
export function parseSopsDotenv(text: string): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (const line of text.split('\n')) {
    if (line.trim() === '' || line.startsWith('#')) continue;
    const separator = line.indexOf('=');
    if (separator <= 0) {
      throw new IntegrityError('Decrypted sops output contains a line without "="');
    }
    const key = line.slice(0, separator);
    assertValidKey(key);
    mapping[key] = line.slice(separator + 1).replace(/\\n/g, '\n');
  }
  return mapping;
}

function classifyDecryptFailure(exitCode: number | null, stderr: string): Error {
  const lower = stderr.toLowerCase();
  if (lower.includes('no identity matched') || lower.includes('0 successful groups')) {
    return new DecryptionError('The key is not a recipient of this sops document');
  }
  if (lower.includes('mac mismatch') || lower.includes('error unmarshalling') || lower.includes('message authentication failed')) {
    return new IntegrityError('sops document failed verification');
  }
  return new CommandFailedError(SOPS, exitCode, summarizeStderr(stderr));
}

/**
 * Create a sealer that shells out to sops.
 */
export function createSopsSealer(options: SopsSealerOptions): DocumentSealer {
  const { runner } = options;
  const timeoutMs = options.timeoutMs ?? 60_000;

  function parse(text: string): SecretDocument {
    const lines = text.split('\n');
    const recipients = lines
      .map((line) => RECIPIENT_LINE.exec(line)?.[1]?.trim())
      .filter((r): r is string => r !== undefined && r !== '');
    if (!lines.some((line) => line.startsWith('sops_mac=')) || recipients.length === 0) {
      throw new IntegrityError('Not a sops dotenv document (missing sops metadata)');
    }
    return { format: SOPS_FORMAT, recipients, ciphertext: text };
  }

  return {
    format: SOPS_FORMAT,

    parse,

    async seal(mapping, recipients) {
      if (recipients.length === 0) {
        throw new ValidationError('At least one recipient identifier is required to encrypt');
      }
      const unique = [...new Set(recipients)];
      for (const recipient of unique) {
        if (!isAgeIdentifier(recipient)) {
          throw new ValidationError(`"${recipient}" is not an age public identifier`, { recipient });
        }
      }

      const result = await runner.run(
        SOPS,
        ['--encrypt', ...DOTENV_ARGS, '--age', unique.join(','), '/dev/stdin'],
        { input: formatSopsDotenv(mapping), timeoutMs },
      );
      if (result.exitCode !== 0) {
        throw new CommandFailedError(SOPS, result.exitCode, summarizeStderr(result.stderr));
      }
      logger.debug('sops encrypted document', { component: 'sops-sealer', recipients: unique.length });
      return parse(result.stdout.toString('utf-8'));
    },

    async open(document: SecretDocument, secret: ScopedSecret) {
      const body = document.ciphertext
        .split('\n')
        .filter((line) => line.trim() !== '')
        .join('\n');
      if (!body.split('\n').some((line) => line.startsWith(METADATA_PREFIX))) {
        throw new IntegrityError('Not a sops dotenv document (missing sops metadata)');
      }

      const keyFile = await secret.filePath();
      const result = await runner.run(SOPS, ['--decrypt', ...DOTENV_ARGS, '/dev/stdin'], {
        input: `${body}\n`,
        env: { SOPS_AGE_KEY_FILE: keyFile },
        timeoutMs,
      });
      if (result.exitCode !== 0) {
        throw classifyDecryptFailure(result.exitCode, result.stderr);
      }

      const plaintext = result.stdout.toString('utf-8');
      result.stdout.fill(0);
      return parseSopsDotenv(plaintext);
    },
  };
}
