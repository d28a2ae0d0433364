/**
 * Zod schemas for validating the envkeep configuration file.
 * These schemas mirror the TypeScript types in config/types.ts,
 * providing runtime validation of what is read from disk.
 */
import { z } from 'zod';

// ─── Vault Config ───────────────────────────────────────────────

/**
 * Schema for the vault the key is backed up to.
 * `file` is the built-in scrypt/AES-GCM vault, `keepassxc` drives keepassxc-cli.
 */
export const vaultConfigSchema = z.object({
  kind: z.enum(['file', 'keepassxc']),
  path: z.string().min(1, 'Vault path cannot be empty'),
  entryName: z.string().min(1, 'Vault entry name cannot be empty').default('envkeep-encryption-key'),
  attachmentName: z.string().min(1, 'Attachment name cannot be empty').default('key.txt'),
});

// ─── Identifier Registry ────────────────────────────────────────

/**
 * One public identifier trusted to encrypt documents.
 * Retired identifiers stay listed (inactive) as a rotation record.
 */
export const identifierRecordSchema = z.object({
  identifier: z.string().min(1, 'Identifier cannot be empty'),
  active: z.boolean(),
  addedAt: z.string().datetime({ message: 'addedAt must be an ISO-8601 timestamp' }),
  retiredAt: z.string().datetime({ message: 'retiredAt must be an ISO-8601 timestamp' }).optional(),
});

// ─── Root Config ────────────────────────────────────────────────

/**
 * Schema for the complete config file.
 * Identifiers must be unique across the registry.
 */
export const envkeepConfigSchema = z
  .object({
    version: z.literal(1),
    backend: z.enum(['native', 'sops-age']).default('native'),
    custody: z.enum(['on-disk', 'vault-only']).default('on-disk'),
    keyFile: z.string().min(1, 'Key file path cannot be empty'),
    secretsDir: z.string().min(1, 'Secrets directory cannot be empty'),
    defaultDocument: z.string().min(1).default('secrets.env.enc'),
    vault: vaultConfigSchema,
    identifiers: z.array(identifierRecordSchema).default([]),
    promptTimeoutMs: z.number().int().positive('Prompt timeout must be a positive integer').default(120_000),
  })
  .refine(
    (data) => new Set(data.identifiers.map((r) => r.identifier)).size === data.identifiers.length,
    { message: 'Identifiers must be unique', path: ['identifiers'] },
  );
