/**
 * Key file text format, shared by the key file on disk and the vault attachment:
 *
 *   # created: 2026-01-01T00:00:00.000Z
 *   # public key: <identifier>
 *   <secret identity line>
 */
import type { Keypair } from '@/core/types.js';

export interface ParsedKeyFile {
  /** From the `# public key:` comment, when present. */
  publicIdentifier: string | undefined;
  secretMaterial: Buffer;
}

const PUBLIC_KEY_COMMENT = /^#\s*public key:\s*(\S+)\s*$/i;

/**
 * Parse key file content. Returns null when there is no secret line.
 * Only the first identity is used.
 */
export function parseKeyFile(content: Buffer): ParsedKeyFile | null {
  let publicIdentifier: string | undefined;
  for (const rawLine of content.toString('utf-8').split('\n')) {
    const line = rawLine.trim();
    if (line === '') continue;
    if (line.startsWith('#')) {
      publicIdentifier ??= PUBLIC_KEY_COMMENT.exec(line)?.[1];
      continue;
    }
    return { publicIdentifier, secretMaterial: Buffer.from(line, 'utf-8') };
  }
  return null;
}

/** Render a keypair as key file content. The caller zeroes the returned buffer. */
export function formatKeyFile(keypair: Keypair, createdAt: Date = new Date()): Buffer {
  return Buffer.concat([
    Buffer.from(`# created: ${createdAt.toISOString()}\n# public key: ${keypair.publicIdentifier}\n`, 'utf-8'),
    keypair.secretMaterial,
    Buffer.from('\n', 'utf-8'),
  ]);
}
