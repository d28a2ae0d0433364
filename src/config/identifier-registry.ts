/**
 * Identifier registry — which public identifiers may encrypt new documents.
 * Pure functions over EnvkeepConfig; persistence goes through ConfigStore.
 */
import type { EnvkeepConfig, IdentifierRecord } from './types.js';

/** Identifiers currently active for encryption, in registration order. */
export function activeIdentifiers(config: EnvkeepConfig): string[] {
  return config.identifiers.filter((r) => r.active).map((r) => r.identifier);
}

/**
 * Register an identifier as active. Re-activates a retired record instead of duplicating it.
 */
export function registerIdentifier(config: EnvkeepConfig, identifier: string, now: Date = new Date()): EnvkeepConfig {
  const existing = config.identifiers.find((r) => r.identifier === identifier);
  if (existing?.active) return config;

  const identifiers: IdentifierRecord[] = existing
    ? config.identifiers.map((r) =>
        r.identifier === identifier ? { identifier, active: true, addedAt: r.addedAt } : r,
      )
    : [...config.identifiers, { identifier, active: true, addedAt: now.toISOString() }];

  return { ...config, identifiers };
}

/** Mark identifiers inactive (kept in the list with a retirement timestamp). */
export function retireIdentifiers(
  config: EnvkeepConfig,
  retired: readonly string[],
  now: Date = new Date(),
): EnvkeepConfig {
  const toRetire = new Set(retired);
  return {
    ...config,
    identifiers: config.identifiers.map((r) =>
      toRetire.has(r.identifier) && r.active ? { ...r, active: false, retiredAt: now.toISOString() } : r,
    ),
  };
}
