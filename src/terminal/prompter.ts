/**
 * Terminal prompts: hidden passphrase entry and yes/no confirmation.
 * Prompts go to stderr by default so stdout stays clean for command output.
 */
import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';
import { PromptTimeoutError, ValidationError } from '@/core/errors.js';
import type { PassphrasePrompter } from './types.js';

export interface TerminalPrompterOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
  /** Give up after this many ms without an answer. Default: 120_000 */
  timeoutMs?: number;
}

export interface StaticPrompterOptions {
  passphrase: string;
  /** Answer to every confirmation. Default: false */
  confirm?: boolean;
}

const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Create a prompter reading from a terminal (or any stream, in tests).
 */
export function createTerminalPrompter(options?: TerminalPrompterOptions): PassphrasePrompter {
  const input = options?.input ?? process.stdin;
  const output = options?.output ?? process.stderr;
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  function ask(message: string, hidden: boolean): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let muted = false;
      let settled = false;
      const sink = new Writable({
        write(chunk: Buffer | string, _encoding, callback): void {
          if (!muted) output.write(chunk);
          callback();
        },
      });
      const rl = createInterface({ input, output: sink, terminal: input.isTTY === true });

      const timer = setTimeout(() => {
        settled = true;
        rl.close();
        if (hidden) output.write('\n');
        reject(new PromptTimeoutError(timeoutMs));
      }, timeoutMs);

      rl.on('close', () => {
        clearTimeout(timer);
        if (!settled) {
          settled = true;
          reject(new ValidationError('Input closed before an answer was given'));
        }
      });

      rl.question(message, (answer) => {
        settled = true;
        clearTimeout(timer);
        muted = false;
        if (hidden) output.write('\n');
        rl.close();
        resolve(answer);
      });
      muted = hidden;
    });
  }

  return {
    async passphrase(message, passphraseOptions) {
      const first = await ask(`${message}: `, true);
      if (first === '') {
        throw new ValidationError('Passphrase must not be empty');
      }
      if (passphraseOptions?.confirm) {
        const second = await ask('Confirm passphrase: ', true);
        if (second !== first) {
          throw new ValidationError('Passphrases do not match');
        }
      }
      return first;
    },

    async confirm(message) {
      const answer = await ask(`${message} [y/N] `, false);
      return /^y(es)?$/i.test(answer.trim());
    },
  };
}

/**
 * Prompter with fixed answers, for `ENVKEEP_VAULT_PASSPHRASE` and tests.
 */
export function createStaticPrompter(options: StaticPrompterOptions): PassphrasePrompter {
  return {
    async passphrase() {
      return options.passphrase;
    },
    async confirm() {
      return options.confirm ?? false;
    },
  };
}
