/**
 * SetupOrchestrator — first-run and restore flows as explicit state machines.
 * Each transition has one guard; the first failing guard halts the flow.
 */
import { DocumentNotFoundError, ValidationError, VaultMissingError, toError } from '@/core/errors.js';
import { err, ok } from '@/core/result.js';
import { CustodyMode } from '@/core/types.js';
import type { Keypair } from '@/core/types.js';
import { activeIdentifiers, registerIdentifier } from '@/config/identifier-registry.js';
import type { ConfigStore, EnvkeepConfig } from '@/config/types.js';
import type { ToolProbe, ToolStatus } from '@/infrastructure/tool-probe.js';
import type { KeyStore } from '@/keys/types.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { DocumentStore, SecretCodec } from '@/secrets/types.js';
import type { PassphrasePrompter } from '@/terminal/types.js';
import type { VaultAdapter } from '@/vault/types.js';
import { SetupHaltedError } from './errors.js';
import type { SetupOptions, SetupOrchestrator, SetupReport, SetupState } from './types.js';

export interface SetupOrchestratorDeps {
  keyStore: KeyStore;
  vault: VaultAdapter;
  documents: DocumentStore;
  codec: SecretCodec;
  configStore: ConfigStore;
  prompter: PassphrasePrompter;
  toolProbe: ToolProbe;
  /** Binaries the configured backend and vault need. */
  requiredTools: readonly string[];
  /** Called after each completed transition. */
  onTransition?: (state: SetupState) => void;
  clock?: () => Date;
  logger?: Logger;
}

export function createSetupOrchestrator(deps: SetupOrchestratorDeps): SetupOrchestrator {
  const { keyStore, vault, documents, codec, configStore, prompter, toolProbe } = deps;
  const clock = deps.clock ?? ((): Date => new Date());
  const logger = deps.logger ?? createLogger({ name: 'setup' });

  async function recordIdentifier(identifier: string, custody: CustodyMode): Promise<EnvkeepConfig> {
    const config = registerIdentifier({ ...(await configStore.read()), custody }, identifier, clock());
    await configStore.write(config);
    return config;
  }

  async function verifyDocument(documentPath: string, custody: CustodyMode): Promise<void> {
    const document = await documents.read(documentPath);
    await keyStore.withSecret(custody, (secret) => codec.decryptDocument(document, secret));
  }

  return {
    async run(options: SetupOptions) {
      const { flow, custody, documentPath } = options;
      const states: SetupState[] = ['Init'];
      let lastState: SetupState = 'Init';

      async function transition<T>(next: SetupState, guard: () => Promise<T>): Promise<T> {
        let value: T;
        try {
          value = await guard();
        } catch (error: unknown) {
          throw new SetupHaltedError(lastState, next, toError(error));
        }
        lastState = next;
        states.push(next);
        logger.info('Setup transition', { component: 'setup', flow, state: next });
        deps.onTransition?.(next);
        return value;
      }

      let keypair: Keypair | undefined;
      try {
        const tools: ToolStatus[] = await transition('ToolsVerified', () => toolProbe.requireAll(deps.requiredTools));

        let publicIdentifier: string;
        let documentCreated = false;

        if (flow === 'new') {
          keypair = await transition('KeyReady', async () => {
            if (custody === CustodyMode.OnDisk && !options.createVault && !(await vault.exists())) {
              // Nothing is written until the vault backup can follow.
              throw new VaultMissingError(vault.location);
            }
            const generated = await keyStore.generate();
            if (custody === CustodyMode.OnDisk) {
              await keyStore.store(generated, CustodyMode.OnDisk);
              await recordIdentifier(generated.publicIdentifier, custody);
            }
            return generated;
          });
          const fresh = keypair;
          publicIdentifier = fresh.publicIdentifier;

          const config = await transition('VaultBacked', async () => {
            await keyStore.store(fresh, CustodyMode.VaultOnly, { createVault: options.createVault ?? false });
            return recordIdentifier(fresh.publicIdentifier, custody);
          });

          documentCreated = await transition('DocumentReady', async () => {
            if (await documents.exists(documentPath)) {
              const overwrite = options.force === true || (await prompter.confirm(`Overwrite existing ${documentPath}?`));
              if (!overwrite) {
                throw new ValidationError(
                  `Kept existing ${documentPath}; it is not encrypted for the new key. Re-run with --force to replace it, or use --restore`,
                  { documentPath },
                );
              }
            }
            const document = await codec.encryptDocument(options.initialVariables ?? {}, activeIdentifiers(config));
            await documents.write(documentPath, document);
            return true;
          });
        } else {
          publicIdentifier = await transition('KeyRestored', async () => {
            if (!(await vault.exists())) throw new VaultMissingError(vault.location);
            const identifier =
              custody === CustodyMode.OnDisk
                ? await keyStore.restore()
                : await keyStore.withSecret(CustodyMode.VaultOnly, async (secret) => secret.publicIdentifier);
            await recordIdentifier(identifier, custody);
            return identifier;
          });

          await transition('DocumentPresentCheck', async () => {
            if (!(await documents.exists(documentPath))) throw new DocumentNotFoundError(documentPath);
          });
        }

        await transition('Tested', () => verifyDocument(documentPath, custody));
        await transition('Complete', async () => undefined);

        const report: SetupReport = { flow, custody, publicIdentifier, documentPath, states, documentCreated, tools };
        return ok(report);
      } catch (error: unknown) {
        if (error instanceof SetupHaltedError) {
          logger.warn('Setup halted', {
            component: 'setup',
            flow,
            lastState: error.lastState,
            failedStep: error.failedStep,
          });
          return err(error);
        }
        throw error;
      } finally {
        keypair?.secretMaterial.fill(0);
      }
    },
  };
}
