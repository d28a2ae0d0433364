/**
 * age key backend: keypairs from `age-keygen`, paired with the sops document format.
 * Secret material only crosses the process boundary on stdin/stdout.
 */
import { CommandFailedError, GenerationError, ValidationError, toError } from '@/core/errors.js';
import type { CommandRunner } from '@/infrastructure/command-runner.js';
import { summarizeStderr } from '@/infrastructure/command-runner.js';
import { createLogger } from '@/observability/logger.js';
import { parseKeyFile } from './key-file.js';
import type { KeyBackend } from './types.js';

const logger = createLogger({ name: 'age-backend' });

const AGE_KEYGEN = 'age-keygen';
const AGE_IDENTIFIER_PATTERN = /^age1[02-9ac-hj-np-z]{58}$/;

export function isAgeIdentifier(identifier: string): boolean {
  return AGE_IDENTIFIER_PATTERN.test(identifier);
}

export interface AgeKeyBackendOptions {
  runner: CommandRunner;
}

export function createAgeKeyBackend(options: AgeKeyBackendOptions): KeyBackend {
  const { runner } = options;

  async function derivePublicIdentifier(secretMaterial: Buffer): Promise<string> {
    const result = await runner.run(AGE_KEYGEN, ['-y'], { input: Buffer.concat([secretMaterial, Buffer.from('\n')]) });
    if (result.exitCode !== 0) {
      throw new ValidationError(`Key material is not an age identity: ${summarizeStderr(result.stderr)}`);
    }
    const identifier = result.stdout.toString('utf-8').trim();
    if (!isAgeIdentifier(identifier)) {
      throw new ValidationError('age-keygen returned an unrecognized public identifier');
    }
    return identifier;
  }

  return {
    name: 'age',
    requiredTools: [AGE_KEYGEN, 'sops'],

    async generate() {
      let stdout: Buffer;
      try {
        const result = await runner.run(AGE_KEYGEN, []);
        if (result.exitCode !== 0) {
          throw new CommandFailedError(AGE_KEYGEN, result.exitCode, summarizeStderr(result.stderr));
        }
        stdout = result.stdout;
      } catch (error: unknown) {
        throw new GenerationError('age', toError(error));
      }

      try {
        const parsed = parseKeyFile(stdout);
        if (!parsed) {
          throw new GenerationError('age', new Error('age-keygen produced no secret key'));
        }
        const publicIdentifier = parsed.publicIdentifier ?? (await derivePublicIdentifier(parsed.secretMaterial));
        logger.debug('Generated age keypair', { component: 'age-backend', publicIdentifier });
        return { publicIdentifier, secretMaterial: parsed.secretMaterial };
      } finally {
        stdout.fill(0);
      }
    },

    derivePublicIdentifier,

    isValidIdentifier: isAgeIdentifier,
  };
}
