/**
 * Command-line parsing for `envkeep`.
 */
import { UsageError } from '@/core/errors.js';
import { CUSTODY_MODES, isCustodyMode } from '@/core/types.js';
import type { CustodyMode } from '@/core/types.js';
import { SESSION_FORMATS } from '@/session/types.js';
import type { SessionFormat } from '@/session/types.js';
import type { SetupFlow } from '@/setup/types.js';

// ─── Parsed Shapes ──────────────────────────────────────────────

export interface GlobalOptions {
  configPath?: string;
  custody?: CustodyMode;
}

export type Command =
  | { type: 'help' }
  | { type: 'generate-key'; createVault: boolean }
  | { type: 'restore-key' }
  | { type: 'backup-key'; createVault: boolean }
  | { type: 'encrypt'; plainFile: string; output?: string; removePlain: boolean }
  | { type: 'decrypt'; document: string }
  | { type: 'edit'; document: string }
  | { type: 'set'; document: string; key: string; value: string }
  | { type: 'unset'; document: string; key: string }
  | { type: 'load'; document?: string; format: SessionFormat }
  | { type: 'run'; document?: string; command: string; args: string[] }
  | { type: 'rotate'; add?: string; document?: string }
  | { type: 'setup'; flow?: SetupFlow; createVault: boolean; force: boolean }
  | { type: 'init-project'; directory?: string; document?: string };

export interface ParsedCli {
  global: GlobalOptions;
  command: Command;
}

// ─── Tokenizing ─────────────────────────────────────────────────

type FlagKind = 'boolean' | 'value';

interface SplitArgs {
  positionals: string[];
  flags: Map<string, string | true>;
  /** Everything after `--`. */
  rest: string[] | undefined;
}

const GLOBAL_FLAGS: Readonly<Record<string, FlagKind>> = {
  '--config': 'value',
  '--custody': 'value',
};

const ALIASES: Readonly<Record<string, string>> = {
  '-o': '--output',
  '-f': '--format',
  '-h': '--help',
};

function split(argv: readonly string[], commandFlags: Readonly<Record<string, FlagKind>>): SplitArgs {
  const known: Record<string, FlagKind> = { ...GLOBAL_FLAGS, ...commandFlags, '--help': 'boolean' };
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i] ?? '';
    if (raw === '--') {
      return { positionals, flags, rest: argv.slice(i + 1) };
    }
    if (!raw.startsWith('-') || raw === '-') {
      positionals.push(raw);
      continue;
    }

    const eq = raw.indexOf('=');
    const name = ALIASES[eq === -1 ? raw : raw.slice(0, eq)] ?? (eq === -1 ? raw : raw.slice(0, eq));
    const kind = known[name];
    if (kind === undefined) {
      throw new UsageError(`Unknown option "${raw}"`);
    }
    if (kind === 'boolean') {
      if (eq !== -1) throw new UsageError(`Option "${name}" takes no value`);
      flags.set(name, true);
      continue;
    }
    const value = eq !== -1 ? raw.slice(eq + 1) : argv[++i];
    if (value === undefined || value === '') {
      throw new UsageError(`Option "${name}" requires a value`);
    }
    flags.set(name, value);
  }
  return { positionals, flags, rest: undefined };
}

function stringFlag(args: SplitArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function expectPositionals(command: string, args: SplitArgs, min: number, max: number, usage: string): string[] {
  if (args.positionals.length < min || args.positionals.length > max) {
    throw new UsageError(`Usage: envkeep ${command} ${usage}`.trimEnd());
  }
  if (args.rest !== undefined && command !== 'run') {
    throw new UsageError(`"--" is only accepted by "envkeep run"`);
  }
  return args.positionals;
}

function parseGlobal(args: SplitArgs): GlobalOptions {
  const global: GlobalOptions = {};
  const configPath = stringFlag(args, '--config');
  if (configPath !== undefined) global.configPath = configPath;

  const custody = stringFlag(args, '--custody');
  if (custody !== undefined) {
    if (!isCustodyMode(custody)) {
      throw new UsageError(`--custody must be one of: ${CUSTODY_MODES.join(', ')}`);
    }
    global.custody = custody;
  }
  return global;
}

function parseFormat(value: string | undefined): SessionFormat {
  if (value === undefined) return 'shell';
  const format = SESSION_FORMATS.find((f) => f === value);
  if (!format) {
    throw new UsageError(`--format must be one of: ${SESSION_FORMATS.join(', ')}`);
  }
  return format;
}

// ─── Commands ───────────────────────────────────────────────────

const COMMAND_FLAGS: Readonly<Record<string, Readonly<Record<string, FlagKind>>>> = {
  help: {},
  'generate-key': { '--create-vault': 'boolean' },
  'restore-key': { '--from-vault': 'boolean' },
  'backup-key': { '--to-vault': 'boolean', '--create-vault': 'boolean' },
  encrypt: { '--output': 'value', '--remove-plain': 'boolean' },
  decrypt: {},
  edit: {},
  set: {},
  unset: {},
  load: { '--format': 'value' },
  run: { '--doc': 'value' },
  rotate: { '--add': 'value', '--doc': 'value' },
  setup: { '--new': 'boolean', '--restore': 'boolean', '--create-vault': 'boolean', '--force': 'boolean' },
  'init-project': { '--doc': 'value' },
};

/** Index of the command name, skipping global options and their values. */
function commandIndex(argv: readonly string[]): number {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--') return -1;
    if (!arg.startsWith('-')) return i;
    if (GLOBAL_FLAGS[arg] === 'value') i++;
  }
  return -1;
}

/**
 * Parse `argv` (without node and script) into global options and one command.
 *
 * @throws UsageError
 */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const first = commandIndex(argv);
  if (first === -1) {
    const args = split(argv, {});
    return { global: parseGlobal(args), command: { type: 'help' } };
  }

  const name = argv[first] ?? '';
  const flagsForCommand = COMMAND_FLAGS[name];
  if (flagsForCommand === undefined) {
    throw new UsageError(`Unknown command "${name}". Run "envkeep help" for usage`);
  }
  const args = split([...argv.slice(0, first), ...argv.slice(first + 1)], flagsForCommand);
  const global = parseGlobal(args);
  if (args.flags.has('--help')) return { global, command: { type: 'help' } };

  const has = (flag: string): boolean => args.flags.get(flag) === true;

  switch (name) {
    case 'help':
      return { global, command: { type: 'help' } };

    case 'generate-key':
      expectPositionals(name, args, 0, 0, '[--create-vault]');
      return { global, command: { type: 'generate-key', createVault: has('--create-vault') } };

    case 'restore-key':
      expectPositionals(name, args, 0, 0, '--from-vault');
      if (!has('--from-vault')) throw new UsageError('Usage: envkeep restore-key --from-vault');
      return { global, command: { type: 'restore-key' } };

    case 'backup-key':
      expectPositionals(name, args, 0, 0, '--to-vault [--create-vault]');
      if (!has('--to-vault')) throw new UsageError('Usage: envkeep backup-key --to-vault [--create-vault]');
      return { global, command: { type: 'backup-key', createVault: has('--create-vault') } };

    case 'encrypt': {
      const [plainFile = ''] = expectPositionals(name, args, 1, 1, '<plainfile> [-o <out>] [--remove-plain]');
      const output = stringFlag(args, '--output');
      return {
        global,
        command: {
          type: 'encrypt',
          plainFile,
          removePlain: has('--remove-plain'),
          ...(output !== undefined ? { output } : {}),
        },
      };
    }

    case 'decrypt':
    case 'edit': {
      const [document = ''] = expectPositionals(name, args, 1, 1, '<doc>');
      return { global, command: { type: name, document } };
    }

    case 'set': {
      const [document = '', key = '', value = ''] = expectPositionals(name, args, 3, 3, '<doc> <key> <value>');
      return { global, command: { type: 'set', document, key, value } };
    }

    case 'unset': {
      const [document = '', key = ''] = expectPositionals(name, args, 2, 2, '<doc> <key>');
      return { global, command: { type: 'unset', document, key } };
    }

    case 'load': {
      const [document] = expectPositionals(name, args, 0, 1, '[doc] [--format shell|dotenv|json]');
      const format = parseFormat(stringFlag(args, '--format'));
      return { global, command: { type: 'load', format, ...(document !== undefined ? { document } : {}) } };
    }

    case 'run': {
      expectPositionals(name, args, 0, 0, '[--doc <doc>] -- <command> [args...]');
      const [command, ...rest] = args.rest ?? [];
      if (command === undefined) {
        throw new UsageError('Usage: envkeep run [--doc <doc>] -- <command> [args...]');
      }
      const document = stringFlag(args, '--doc');
      return { global, command: { type: 'run', command, args: rest, ...(document !== undefined ? { document } : {}) } };
    }

    case 'rotate': {
      expectPositionals(name, args, 0, 0, '[--add <identifier>] [--doc <doc>]');
      const add = stringFlag(args, '--add');
      const document = stringFlag(args, '--doc');
      return {
        global,
        command: {
          type: 'rotate',
          ...(add !== undefined ? { add } : {}),
          ...(document !== undefined ? { document } : {}),
        },
      };
    }

    case 'setup': {
      expectPositionals(name, args, 0, 0, '[--new|--restore] [--custody <mode>] [--create-vault] [--force]');
      if (has('--new') && has('--restore')) {
        throw new UsageError('--new and --restore cannot be combined');
      }
      const flow: SetupFlow | undefined = has('--new') ? 'new' : has('--restore') ? 'restore' : undefined;
      return {
        global,
        command: {
          type: 'setup',
          createVault: has('--create-vault'),
          force: has('--force'),
          ...(flow !== undefined ? { flow } : {}),
        },
      };
    }

    case 'init-project': {
      const [directory] = expectPositionals(name, args, 0, 1, '[dir] [--doc <doc>]');
      const document = stringFlag(args, '--doc');
      return {
        global,
        command: {
          type: 'init-project',
          ...(directory !== undefined ? { directory } : {}),
          ...(document !== undefined ? { document } : {}),
        },
      };
    }

    default:
      throw new UsageError(`Unknown command "${name}". Run "envkeep help" for usage`);
  }
}

export const USAGE = `Usage: envkeep <command> [options]

Keys
  generate-key [--create-vault]          Generate a key (stored per custody mode)
  backup-key --to-vault [--create-vault] Copy the on-disk key into the vault
  restore-key --from-vault               Write the vault's key to the key file
  rotate [--add <identifier>] [--doc <doc>]
                                         Replace the key, or add a recipient

Documents
  encrypt <plainfile> [-o <out>] [--remove-plain]
  decrypt <doc>                          Print the decrypted dotenv text
  edit <doc>                             Edit in $VISUAL / $EDITOR
  set <doc> <key> <value>
  unset <doc> <key>

Sessions
  load [doc] [--format shell|dotenv|json]
  run [--doc <doc>] -- <command> [args...]
  init-project [dir] [--doc <doc>]       Write .envkeep.local.sh for a project

Setup
  setup [--new|--restore] [--custody on-disk|vault-only] [--create-vault] [--force]

Global options
  --config <path>      Config file (default: $ENVKEEP_HOME/config.json)
  --custody <mode>     on-disk or vault-only (default: from config)
`;
