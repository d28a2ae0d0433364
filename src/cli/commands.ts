/**
 * Command handlers for the `envkeep` CLI.
 * Each handler returns the process exit code; failures propagate to `runCli`,
 * which prints one `envkeep: <message>` line and maps the error to an exit code.
 */
import { readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { CommandFailedError, ExitCode, ValidationError, hasErrnoCode, toError } from '@/core/errors.js';
import { CustodyMode } from '@/core/types.js';
import { activeIdentifiers, registerIdentifier } from '@/config/identifier-registry.js';
import { expandHome } from '@/config/paths.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import { formatDotenv, parseDotenv } from '@/secrets/dotenv-format.js';
import { bindSession, formatSession } from '@/session/format.js';
import { writeProjectLoader } from '@/session/project-loader.js';
import { createSetupOrchestrator } from '@/setup/orchestrator.js';
import type { SetupFlow } from '@/setup/types.js';
import type { Command } from './args.js';
import { USAGE, parseCliArgs } from './args.js';
import type { CliContext, CliIo, CliOverrides } from './context.js';
import { createCliContext } from './context.js';
import { errorLine, exitCodeFor } from './exit-codes.js';

const logger: Logger = createLogger({ name: 'cli' });

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const GREEN = '\x1b[32m';
const DIM = '\x1b[2m';

const ENCRYPTED_SUFFIX = '.enc';

function write(stream: NodeJS.WritableStream, text: string): void {
  stream.write(text.endsWith('\n') ? text : `${text}\n`);
}

function fromCwd(ctx: CliContext, path: string): string {
  return resolve(ctx.io.cwd, expandHome(path));
}

// ─── Keys ───────────────────────────────────────────────────────

async function generateKey(ctx: CliContext, createVault: boolean): Promise<number> {
  const keypair = await ctx.keyStore.generate();
  try {
    await ctx.keyStore.store(keypair, ctx.custody, { createVault });
    const config = registerIdentifier(await ctx.configStore.read(), keypair.publicIdentifier);
    await ctx.configStore.write(config);
    write(ctx.io.stdout, keypair.publicIdentifier);
    return ExitCode.Ok;
  } finally {
    keypair.secretMaterial.fill(0);
  }
}

async function backupKey(ctx: CliContext, createVault: boolean): Promise<number> {
  const identifier = await ctx.keyStore.backup({ createVault });
  write(ctx.io.stderr, `Backed up ${identifier} to ${ctx.vault.location}`);
  return ExitCode.Ok;
}

async function restoreKey(ctx: CliContext): Promise<number> {
  if (ctx.custody === CustodyMode.VaultOnly) {
    throw new ValidationError('restore-key writes the key file and is only available under on-disk custody', {
      custody: ctx.custody,
    });
  }
  const identifier = await ctx.keyStore.restore();
  const config = registerIdentifier(await ctx.configStore.read(), identifier);
  await ctx.configStore.write(config);
  write(ctx.io.stderr, `Restored ${identifier} to ${ctx.paths.keyFile}`);
  return ExitCode.Ok;
}

/** Documents under the secrets directory, for rotation without `--doc`. */
async function listDocuments(secretsDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(secretsDir);
  } catch (error: unknown) {
    if (hasErrnoCode(error, 'ENOENT')) return [];
    throw error;
  }
  return names
    .filter((name) => name.endsWith(ENCRYPTED_SUFFIX))
    .sort()
    .map((name) => join(secretsDir, name));
}

async function rotate(ctx: CliContext, add: string | undefined, document: string | undefined): Promise<number> {
  const documentPaths =
    document !== undefined ? [ctx.resolveDocument(document)] : await listDocuments(ctx.paths.secretsDir);

  if (add !== undefined) {
    const active = await ctx.keyStore.addRecipient(add, { mode: ctx.custody, documentPaths });
    write(ctx.io.stderr, `Recipients of ${documentPaths.length} document(s): ${active.join(', ')}`);
    return ExitCode.Ok;
  }

  const keypair = await ctx.keyStore.generate();
  try {
    const report = await ctx.keyStore.rotate(keypair, { mode: ctx.custody, documentPaths });
    write(
      ctx.io.stderr,
      `Rotated ${report.previousIdentifier} → ${report.newIdentifier} (${report.documents.length} document(s))`,
    );
    write(ctx.io.stdout, report.newIdentifier);
    return ExitCode.Ok;
  } finally {
    keypair.secretMaterial.fill(0);
  }
}

// ─── Documents ──────────────────────────────────────────────────

async function encrypt(ctx: CliContext, plainFile: string, output: string | undefined, removePlain: boolean): Promise<number> {
  const plainPath = fromCwd(ctx, plainFile);
  const outputPath = output !== undefined ? fromCwd(ctx, output) : `${plainPath}${ENCRYPTED_SUFFIX}`;
  const recipients = activeIdentifiers(await ctx.configStore.read());
  if (recipients.length === 0) {
    throw new ValidationError('No active identifiers are registered; run "envkeep setup" or "envkeep generate-key" first');
  }

  const text = await readFile(plainPath, 'utf-8');
  const document = await ctx.codec.encryptDocument(parseDotenv(text), recipients);
  await ctx.documents.write(outputPath, document);
  logger.info('Encrypted document', { component: 'cli', documentPath: outputPath, recipients: recipients.length });

  if (removePlain) {
    await writeFile(plainPath, Buffer.alloc(Buffer.byteLength(text, 'utf-8')), { flag: 'r+' });
    await rm(plainPath);
  }
  write(ctx.io.stderr, `Wrote ${outputPath}`);
  return ExitCode.Ok;
}

async function decrypt(ctx: CliContext, document: string): Promise<number> {
  const path = ctx.resolveDocument(document);
  const sealed = await ctx.documents.read(path);
  const mapping = await ctx.keyStore.withSecret(ctx.custody, (secret) => ctx.codec.decryptDocument(sealed, secret));
  ctx.io.stdout.write(formatDotenv(mapping));
  return ExitCode.Ok;
}

/** Split `$VISUAL`/`$EDITOR` into a command and its arguments (`code --wait`). */
export function editorCommand(env: Readonly<Record<string, string | undefined>>): { command: string; args: string[] } {
  const configured = [env['VISUAL'], env['EDITOR']].find((value) => value !== undefined && value.trim() !== '');
  const [command = 'vi', ...args] = (configured ?? 'vi').trim().split(/\s+/);
  return { command, args };
}

async function edit(ctx: CliContext, document: string): Promise<number> {
  const path = ctx.resolveDocument(document);
  const { command, args } = editorCommand(ctx.io.env);

  await ctx.keyStore.withSecret(ctx.custody, (secret) =>
    ctx.documents.edit(path, secret, async (variables) => {
      const staging = await ctx.scratch.allocate('edit');
      try {
        const file = await staging.writeFile('secrets.env', formatDotenv(Object.fromEntries(variables)));
        const exitCode = await ctx.runner.runInteractive(command, [...args, file]);
        if (exitCode !== 0) {
          throw new CommandFailedError(command, exitCode, 'editor did not exit cleanly; document left unchanged');
        }
        const edited = parseDotenv(await readFile(file, 'utf-8'));
        variables.clear();
        for (const [key, value] of Object.entries(edited)) {
          variables.set(key, value);
        }
      } finally {
        await staging.dispose();
      }
    }),
  );
  write(ctx.io.stderr, `Saved ${path}`);
  return ExitCode.Ok;
}

async function setValue(ctx: CliContext, document: string, key: string, value: string): Promise<number> {
  const path = ctx.resolveDocument(document);
  await ctx.keyStore.withSecret(ctx.custody, (secret) =>
    ctx.documents.edit(path, secret, (variables) => {
      variables.set(key, value);
    }),
  );
  return ExitCode.Ok;
}

async function unsetValue(ctx: CliContext, document: string, key: string): Promise<number> {
  const path = ctx.resolveDocument(document);
  await ctx.keyStore.withSecret(ctx.custody, (secret) =>
    ctx.documents.edit(path, secret, (variables) => {
      variables.delete(key);
    }),
  );
  return ExitCode.Ok;
}

// ─── Sessions ───────────────────────────────────────────────────

async function load(ctx: CliContext, command: Extract<Command, { type: 'load' }>): Promise<number> {
  const result = await ctx.sessionLoader.load(command.document);
  if (!result.ok) throw result.error;
  ctx.io.stdout.write(formatSession(result.value, command.format));
  return ExitCode.Ok;
}

async function run(ctx: CliContext, command: Extract<Command, { type: 'run' }>): Promise<number> {
  const result = await ctx.sessionLoader.load(command.document);
  if (!result.ok) throw result.error;
  const exitCode = await ctx.runner.runInteractive(command.command, command.args, {
    cwd: ctx.io.cwd,
    env: bindSession(result.value, ctx.io.env),
  });
  return exitCode ?? ExitCode.Unexpected;
}

async function initProject(ctx: CliContext, directory: string | undefined, document: string | undefined): Promise<number> {
  const target = fromCwd(ctx, directory ?? '.');
  const result = await writeProjectLoader(target, ctx.resolveDocument(document));
  write(ctx.io.stderr, `Wrote ${result.loaderPath}${result.gitignoreUpdated ? ' (added to .gitignore)' : ''}`);
  return ExitCode.Ok;
}

// ─── Setup ──────────────────────────────────────────────────────

async function chooseFlow(ctx: CliContext, flow: SetupFlow | undefined): Promise<SetupFlow> {
  if (flow !== undefined) return flow;
  if (!(await ctx.vault.exists())) return 'new';
  const restore = await ctx.prompter.confirm(`Found a vault at ${ctx.vault.location}. Restore the key from it?`);
  return restore ? 'restore' : 'new';
}

async function setup(ctx: CliContext, command: Extract<Command, { type: 'setup' }>, color: boolean): Promise<number> {
  const flow = await chooseFlow(ctx, command.flow);
  const orchestrator = createSetupOrchestrator({
    keyStore: ctx.keyStore,
    vault: ctx.vault,
    documents: ctx.documents,
    codec: ctx.codec,
    configStore: ctx.configStore,
    prompter: ctx.prompter,
    toolProbe: ctx.toolProbe,
    requiredTools: ctx.requiredTools,
    onTransition: (state) => {
      write(ctx.io.stderr, color ? `  ${GREEN}✓${RESET} ${state}` : `  ✓ ${state}`);
    },
  });

  const result = await orchestrator.run({
    flow,
    custody: ctx.custody,
    documentPath: ctx.paths.defaultDocument,
    createVault: command.createVault,
    force: command.force,
  });
  if (!result.ok) throw result.error;

  const report = result.value;
  const detail = `${report.custody}, ${report.documentPath}`;
  write(ctx.io.stderr, color ? `Setup complete ${DIM}(${detail})${RESET}` : `Setup complete (${detail})`);
  write(ctx.io.stdout, report.publicIdentifier);
  return ExitCode.Ok;
}

// ─── Entry ──────────────────────────────────────────────────────

export interface RunCliOptions extends CliOverrides {
  /** Colorize progress lines. Default: false */
  color?: boolean;
}

async function dispatch(ctx: CliContext, command: Command, options: RunCliOptions): Promise<number> {
  switch (command.type) {
    case 'help':
      ctx.io.stdout.write(USAGE);
      return ExitCode.Ok;
    case 'generate-key':
      return generateKey(ctx, command.createVault);
    case 'backup-key':
      return backupKey(ctx, command.createVault);
    case 'restore-key':
      return restoreKey(ctx);
    case 'rotate':
      return rotate(ctx, command.add, command.document);
    case 'encrypt':
      return encrypt(ctx, command.plainFile, command.output, command.removePlain);
    case 'decrypt':
      return decrypt(ctx, command.document);
    case 'edit':
      return edit(ctx, command.document);
    case 'set':
      return setValue(ctx, command.document, command.key, command.value);
    case 'unset':
      return unsetValue(ctx, command.document, command.key);
    case 'load':
      return load(ctx, command);
    case 'run':
      return run(ctx, command);
    case 'init-project':
      return initProject(ctx, command.directory, command.document);
    case 'setup':
      return setup(ctx, command, options.color ?? false);
  }
}

/**
 * Parse `argv`, run one command and return the process exit code.
 * Never throws: every failure becomes a stderr line and a non-zero code.
 */
export async function runCli(argv: readonly string[], io: CliIo, options: RunCliOptions = {}): Promise<number> {
  try {
    const { global, command } = parseCliArgs(argv);
    if (command.type === 'help') {
      io.stdout.write(USAGE);
      return ExitCode.Ok;
    }
    const ctx = await createCliContext(global, io, options);
    return await dispatch(ctx, command, options);
  } catch (error: unknown) {
    const exitCode = exitCodeFor(error);
    if (exitCode === ExitCode.Unexpected) {
      logger.error('Unexpected failure', { component: 'cli', error: toError(error).message });
    }
    write(io.stderr, errorLine(error));
    return exitCode;
  }
}
