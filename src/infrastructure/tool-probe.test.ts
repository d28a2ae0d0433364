import { describe, expect, it } from 'vitest';
import { ToolUnavailableError } from '@/core/errors.js';
import { commandResult, createTestCommandRunner } from '@/testing/helpers/index.js';
import { createToolProbe, installHint } from './tool-probe.js';

describe('createToolProbe', () => {
  it('reports the first line of --version for installed tools', async () => {
    const runner = createTestCommandRunner({ sops: () => commandResult('sops 3.8.1 (latest)\nextra\n') });
    const probe = createToolProbe({ runner, platform: 'linux' });

    expect(await probe.probe(['sops', 'age-keygen'])).toEqual([
      { tool: 'sops', available: true, version: 'sops 3.8.1 (latest)' },
      { tool: 'age-keygen', available: false },
    ]);
    expect(runner.calls[0]?.args).toEqual(['--version']);
  });

  it('throws ToolUnavailableError with an install hint for the first missing tool', async () => {
    const probe = createToolProbe({ runner: createTestCommandRunner(), platform: 'darwin' });

    const error: unknown = await probe.requireAll(['keepassxc-cli']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolUnavailableError);
    expect(error).toMatchObject({
      exitCode: 3,
      message: 'Required tool "keepassxc-cli" is not installed (install with: brew install keepassxc)',
    });
  });

  it('needs nothing when no tools are required', async () => {
    const probe = createToolProbe({ runner: createTestCommandRunner() });
    expect(await probe.requireAll([])).toEqual([]);
  });
});

describe('installHint', () => {
  it('names the package for the platform', () => {
    expect(installHint('age-keygen', 'linux')).toBe(
      'install with your package manager, e.g. sudo apt install age (or dnf/yum)',
    );
    expect(installHint('sops', 'win32')).toBe('install the "sops" package for your platform');
  });
});
