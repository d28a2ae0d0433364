/**
 * E2E test helpers.
 * Runs the CLI in-process against a throwaway envkeep home.
 */
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { runCli } from '@/cli/commands.js';
import { createScratchSpace } from '@/infrastructure/scratch-space.js';
import type { PassphrasePrompter } from '@/terminal/types.js';
import { createTestCommandRunner, createTestHome, createTestIo, createTestPrompter } from '@/testing/helpers/index.js';
import type { TestHome } from '@/testing/helpers/index.js';

export interface CliRun {
  code: number;
  stdout: string;
  stderr: string;
}

/** One user's machine: an envkeep home, a working directory and a vault passphrase. */
export interface Workstation {
  home: TestHome;
  workDir: string;
  secretsDir: string;
  run(argv: string[], options?: { prompter?: PassphrasePrompter }): Promise<CliRun>;
}

export async function createWorkstation(passphrase = 'test-passphrase'): Promise<Workstation> {
  const home = await createTestHome('envkeep-e2e-');
  const workDir = join(home.path, 'work');
  await mkdir(workDir);
  const defaultPrompter = createTestPrompter({ passphrases: [passphrase], confirm: true });

  return {
    home,
    workDir,
    secretsDir: join(home.path, 'secrets'),

    async run(argv, options) {
      const { io, stdout, stderr } = createTestIo({ env: { ENVKEEP_HOME: home.path }, cwd: workDir });
      const code = await runCli(argv, io, {
        runner: createTestCommandRunner(),
        prompter: options?.prompter ?? defaultPrompter,
        scratch: createScratchSpace({ root: home.path }),
      });
      return { code, stdout: stdout(), stderr: stderr() };
    },
  };
}
