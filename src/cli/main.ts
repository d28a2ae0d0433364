#!/usr/bin/env node
/**
 * envkeep executable.
 *
 * Usage: envkeep <command> [options]   (envkeep help)
 */
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { installScratchCleanup } from '@/infrastructure/scratch-space.js';
import { createLogger } from '@/observability/logger.js';
import { runCli } from './commands.js';

const logger = createLogger({ name: 'main' });

async function main(): Promise<void> {
  installScratchCleanup();
  process.exitCode = await runCli(
    process.argv.slice(2),
    { stdout: process.stdout, stderr: process.stderr, env: process.env, cwd: process.cwd() },
    { color: process.stderr.isTTY },
  );
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (invoked === undefined) return false;
  return realpathSync(invoked) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    logger.fatal('envkeep crashed', {
      component: 'main',
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  });
}
