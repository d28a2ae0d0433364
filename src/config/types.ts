import type { z } from 'zod';
import type { envkeepConfigSchema, identifierRecordSchema, vaultConfigSchema } from './schema.js';

// ─── Configuration ──────────────────────────────────────────────

export type VaultConfig = z.infer<typeof vaultConfigSchema>;
export type IdentifierRecord = z.infer<typeof identifierRecordSchema>;

/** Config file contents after validation. Paths may still start with `~`. */
export type EnvkeepConfig = z.infer<typeof envkeepConfigSchema>;

export type KeyBackendKind = EnvkeepConfig['backend'];

/** Persistence seam for the config file; tests use an in-memory store. */
export interface ConfigStore {
  readonly path: string;
  read(): Promise<EnvkeepConfig>;
  write(config: EnvkeepConfig): Promise<void>;
}

/** Where everything lives once config, environment and CLI flags are combined. */
export interface ResolvedPaths {
  home: string;
  configFile: string;
  keyFile: string;
  secretsDir: string;
  defaultDocument: string;
}
