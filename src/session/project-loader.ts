/**
 * Per-project loader script: sourcing `.envkeep.local.sh` exports the
 * project's secrets into the current shell.
 */
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { hasErrnoCode } from '@/core/errors.js';
import { atomicWriteFile } from '@/infrastructure/atomic-fs.js';
import { shellQuote } from './format.js';
import type { ProjectLoaderResult } from './types.js';

export const PROJECT_LOADER_FILE = '.envkeep.local.sh';

/** Script body for a document. */
export function projectLoaderScript(documentPath: string): string {
  return [
    '# Loads this project\'s secrets into the current shell: source ./.envkeep.local.sh',
    '# Generated by envkeep init-project. Do not commit.',
    `eval "$(envkeep load --format shell ${shellQuote(documentPath)})"`,
    '',
  ].join('\n');
}

async function readOptional(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error: unknown) {
    if (hasErrnoCode(error, 'ENOENT')) return '';
    throw error;
  }
}

/**
 * Write the loader into `directory` and make sure .gitignore lists it.
 */
export async function writeProjectLoader(directory: string, documentPath: string): Promise<ProjectLoaderResult> {
  const loaderPath = join(directory, PROJECT_LOADER_FILE);
  await atomicWriteFile(loaderPath, projectLoaderScript(documentPath), { mode: 0o644 });

  const gitignorePath = join(directory, '.gitignore');
  const gitignore = await readOptional(gitignorePath);
  const listed = gitignore.split('\n').some((line) => {
    const entry = line.trim();
    return entry === PROJECT_LOADER_FILE || entry === `/${PROJECT_LOADER_FILE}`;
  });
  if (listed) return { loaderPath, gitignoreUpdated: false };

  const separator = gitignore === '' || gitignore.endsWith('\n') ? '' : '\n';
  await atomicWriteFile(gitignorePath, `${gitignore}${separator}${PROJECT_LOADER_FILE}\n`, { mode: 0o644 });
  return { loaderPath, gitignoreUpdated: true };
}
