import type { CustodyMode, SecretMapping } from '@/core/types.js';
import type { Result } from '@/core/result.js';
import type { ToolStatus } from '@/infrastructure/tool-probe.js';
import type { SetupHaltedError } from './errors.js';

export type SetupFlow = 'new' | 'restore';

/**
 * New:     Init → ToolsVerified → KeyReady → VaultBacked → DocumentReady → Tested → Complete
 * Restore: Init → ToolsVerified → KeyRestored → DocumentPresentCheck → Tested → Complete
 */
export type SetupState =
  | 'Init'
  | 'ToolsVerified'
  | 'KeyReady'
  | 'VaultBacked'
  | 'DocumentReady'
  | 'KeyRestored'
  | 'DocumentPresentCheck'
  | 'Tested'
  | 'Complete';

export interface SetupOptions {
  flow: SetupFlow;
  custody: CustodyMode;
  documentPath: string;
  /** Allow the new flow to create the vault database. */
  createVault?: boolean;
  /** Overwrite an existing document without asking. */
  force?: boolean;
  /** Variables for a newly created document. Default: none */
  initialVariables?: SecretMapping;
}

export interface SetupReport {
  flow: SetupFlow;
  custody: CustodyMode;
  publicIdentifier: string;
  documentPath: string;
  /** States passed through, in order. */
  states: readonly SetupState[];
  documentCreated: boolean;
  tools: readonly ToolStatus[];
}

export interface SetupOrchestrator {
  run(options: SetupOptions): Promise<Result<SetupReport, SetupHaltedError>>;
}
