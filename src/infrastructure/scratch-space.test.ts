import { readFile, readdir, stat } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestHome } from '@/testing/helpers/index.js';
import type { TestHome } from '@/testing/helpers/index.js';
import { cleanupScratchSync, createScratchSpace, liveScratchDirectories } from './scratch-space.js';

let home: TestHome;

beforeEach(async () => {
  home = await createTestHome();
});

afterEach(async () => {
  await home.cleanup();
});

describe('createScratchSpace', () => {
  it('allocates private directories and files', async () => {
    const directory = await createScratchSpace({ root: home.path }).allocate('key');

    const file = await directory.writeFile('key.txt', 'test-secret');

    expect(directory.path.startsWith(`${home.path}/envkeep-key-`)).toBe(true);
    expect((await stat(directory.path)).mode & 0o777).toBe(0o700);
    expect((await stat(file)).mode & 0o777).toBe(0o600);
    expect(await readFile(file, 'utf-8')).toBe('test-secret');
    expect(liveScratchDirectories()).toContain(directory.path);
    await directory.dispose();
  });

  it('removes the directory on dispose, once', async () => {
    const directory = await createScratchSpace({ root: home.path }).allocate('edit');
    await directory.writeFile('secrets.env', 'API_KEY=test-secret\n');

    await directory.dispose();
    await directory.dispose();

    expect(directory.disposed).toBe(true);
    expect(await readdir(home.path)).toEqual([]);
    expect(liveScratchDirectories()).not.toContain(directory.path);
    await expect(directory.writeFile('late.txt', 'x')).rejects.toThrow('already disposed');
  });

  it('removes every live directory synchronously on cleanup', async () => {
    const scratch = createScratchSpace({ root: home.path });
    const first = await scratch.allocate('key');
    const second = await scratch.allocate('vault');

    cleanupScratchSync();

    expect(await readdir(home.path)).toEqual([]);
    expect(liveScratchDirectories()).not.toContain(first.path);
    expect(liveScratchDirectories()).not.toContain(second.path);
  });
});
