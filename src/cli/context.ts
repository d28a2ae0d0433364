/**
 * Wiring for one CLI invocation: config → paths → backend, vault, key store,
 * codec and loaders. Collaborators that touch the terminal or spawn processes
 * can be replaced, so the whole command surface runs in tests.
 */
import { resolve } from 'node:path';
import type { CustodyMode } from '@/core/types.js';
import { createFileConfigStore } from '@/config/config-store.js';
import {
  configFilePath,
  expandHome,
  resolveDocumentPath,
  resolveEnvkeepHome,
  resolvePaths,
} from '@/config/paths.js';
import type { ConfigStore, EnvkeepConfig, ResolvedPaths } from '@/config/types.js';
import type { CommandRunner } from '@/infrastructure/command-runner.js';
import { createCommandRunner } from '@/infrastructure/command-runner.js';
import type { ScratchSpace } from '@/infrastructure/scratch-space.js';
import { createScratchSpace } from '@/infrastructure/scratch-space.js';
import type { ToolProbe } from '@/infrastructure/tool-probe.js';
import { createToolProbe } from '@/infrastructure/tool-probe.js';
import { createAgeKeyBackend } from '@/keys/age-backend.js';
import { createKeyStore } from '@/keys/key-store.js';
import { createNativeKeyBackend } from '@/keys/native-backend.js';
import type { KeyBackend, KeyStore } from '@/keys/types.js';
import { createSecretCodec } from '@/secrets/codec.js';
import { createDocumentStore } from '@/secrets/document-store.js';
import { createNativeSealer } from '@/secrets/native-sealer.js';
import { createSopsSealer } from '@/secrets/sops-sealer.js';
import type { DocumentStore, SecretCodec } from '@/secrets/types.js';
import { createSessionLoader } from '@/session/session-loader.js';
import type { SessionLoader } from '@/session/types.js';
import { createStaticPrompter, createTerminalPrompter } from '@/terminal/prompter.js';
import type { PassphrasePrompter } from '@/terminal/types.js';
import { createFileVault } from '@/vault/file-vault.js';
import { createKeePassXcVault } from '@/vault/keepassxc-vault.js';
import type { VaultAdapter } from '@/vault/types.js';
import type { GlobalOptions } from './args.js';

/** Env var supplying the vault passphrase without a prompt. */
export const VAULT_PASSPHRASE_ENV_VAR = 'ENVKEEP_VAULT_PASSPHRASE';

type Env = Readonly<Record<string, string | undefined>>;

/** Process surface a command reads from and writes to. */
export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: Env;
  cwd: string;
}

/** Collaborators a caller may substitute. */
export interface CliOverrides {
  runner?: CommandRunner;
  prompter?: PassphrasePrompter;
  scratch?: ScratchSpace;
}

export interface CliContext {
  io: CliIo;
  config: EnvkeepConfig;
  paths: ResolvedPaths;
  /** `--custody` when given, otherwise the configured mode. */
  custody: CustodyMode;
  configStore: ConfigStore;
  runner: CommandRunner;
  prompter: PassphrasePrompter;
  scratch: ScratchSpace;
  backend: KeyBackend;
  codec: SecretCodec;
  documents: DocumentStore;
  vault: VaultAdapter;
  keyStore: KeyStore;
  toolProbe: ToolProbe;
  sessionLoader: SessionLoader;
  /** Binaries the configured backend and vault call. */
  requiredTools: readonly string[];
  resolveDocument(document: string | undefined): string;
}

function createPrompter(io: CliIo, config: EnvkeepConfig): PassphrasePrompter {
  const terminal = createTerminalPrompter({ output: io.stderr, timeoutMs: config.promptTimeoutMs });
  const fromEnv = io.env[VAULT_PASSPHRASE_ENV_VAR];
  if (fromEnv === undefined || fromEnv === '') return terminal;

  const fixed = createStaticPrompter({ passphrase: fromEnv });
  return { passphrase: fixed.passphrase, confirm: terminal.confirm };
}

function createVault(config: EnvkeepConfig, deps: { prompter: PassphrasePrompter; runner: CommandRunner; scratch: ScratchSpace }): VaultAdapter {
  const path = resolve(expandHome(config.vault.path));
  switch (config.vault.kind) {
    case 'file':
      return createFileVault({ path, prompter: deps.prompter });
    case 'keepassxc':
      return createKeePassXcVault({ path, prompter: deps.prompter, runner: deps.runner, scratch: deps.scratch });
  }
}

/**
 * Read configuration and build every collaborator for one invocation.
 *
 * @throws ConfigError when the config file is present but invalid
 */
export async function createCliContext(
  global: GlobalOptions,
  io: CliIo,
  overrides?: CliOverrides,
): Promise<CliContext> {
  const home = resolveEnvkeepHome(io.env);
  const configPath = global.configPath !== undefined ? resolve(io.cwd, expandHome(global.configPath)) : configFilePath(home);
  const configStore = createFileConfigStore({ path: configPath, home, env: io.env });
  const config = await configStore.read();
  const paths = { ...resolvePaths(config, home, io.env), configFile: configPath };
  const custody = global.custody ?? config.custody;

  const runner = overrides?.runner ?? createCommandRunner();
  const prompter = overrides?.prompter ?? createPrompter(io, config);
  const scratch = overrides?.scratch ?? createScratchSpace();

  const native = config.backend === 'native';
  const backend = native ? createNativeKeyBackend() : createAgeKeyBackend({ runner });
  const codec = createSecretCodec(native ? createNativeSealer() : createSopsSealer({ runner }));
  const documents = createDocumentStore(codec);
  const vault = createVault(config, { prompter, runner, scratch });

  const keyStore = createKeyStore({
    backend,
    vault,
    vaultEntry: { entryName: config.vault.entryName, attachmentName: config.vault.attachmentName },
    keyFile: paths.keyFile,
    configStore,
    codec,
    documents,
    scratch,
  });

  const resolveDocument = (document: string | undefined): string => resolveDocumentPath(paths, document, io.cwd);
  const sessionLoader = createSessionLoader({
    keyStore,
    documents,
    codec,
    configStore,
    resolveDocument,
    ...(global.custody !== undefined ? { custodyOverride: global.custody } : {}),
  });

  const requiredTools = [
    ...backend.requiredTools,
    ...(config.vault.kind === 'keepassxc' ? ['keepassxc-cli'] : []),
  ];

  return {
    io,
    config,
    paths,
    custody,
    configStore,
    runner,
    prompter,
    scratch,
    backend,
    codec,
    documents,
    vault,
    keyStore,
    toolProbe: createToolProbe({ runner }),
    sessionLoader,
    requiredTools,
    resolveDocument,
  };
}
