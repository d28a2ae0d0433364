/**
 * ToolProbe — verifies external binaries are installed before a flow relies on them.
 * Installation itself is left to the user; a missing tool yields an install hint.
 */
import { ToolUnavailableError } from '@/core/errors.js';
import type { CommandRunner } from './command-runner.js';

export interface ToolStatus {
  tool: string;
  available: boolean;
  /** First line of `<tool> --version`, when available. */
  version?: string;
}

export interface ToolProbe {
  probe(tools: readonly string[]): Promise<ToolStatus[]>;
  /** Probe and throw ToolUnavailableError for the first missing tool. */
  requireAll(tools: readonly string[]): Promise<ToolStatus[]>;
}

/** OS package providing each binary. */
const PACKAGE_FOR_TOOL: Readonly<Record<string, string>> = {
  'age-keygen': 'age',
  sops: 'sops',
  'keepassxc-cli': 'keepassxc',
};

/** Installation hint for a tool on the given platform. */
export function installHint(tool: string, platform: NodeJS.Platform): string {
  const pkg = PACKAGE_FOR_TOOL[tool] ?? tool;
  switch (platform) {
    case 'darwin':
      return `install with: brew install ${pkg}`;
    case 'linux':
      return `install with your package manager, e.g. sudo apt install ${pkg} (or dnf/yum)`;
    default:
      return `install the "${pkg}" package for your platform`;
  }
}

/**
 * Create a ToolProbe that runs `<tool> --version` through the given runner.
 */
export function createToolProbe(deps: { runner: CommandRunner; platform?: NodeJS.Platform }): ToolProbe {
  const platform = deps.platform ?? process.platform;

  async function probeOne(tool: string): Promise<ToolStatus> {
    try {
      const result = await deps.runner.run(tool, ['--version'], { timeoutMs: 5_000 });
      const version = result.stdout.toString('utf-8').split('\n')[0]?.trim();
      return { tool, available: true, version: version === '' ? undefined : version };
    } catch (error: unknown) {
      if (error instanceof ToolUnavailableError) {
        return { tool, available: false };
      }
      throw error;
    }
  }

  async function probe(tools: readonly string[]): Promise<ToolStatus[]> {
    const statuses: ToolStatus[] = [];
    for (const tool of tools) {
      statuses.push(await probeOne(tool));
    }
    return statuses;
  }

  return {
    probe,

    async requireAll(tools) {
      const statuses = await probe(tools);
      const missing = statuses.find((s) => !s.available);
      if (missing) {
        throw new ToolUnavailableError(missing.tool, installHint(missing.tool, platform));
      }
      return statuses;
    },
  };
}
