// ─── Branded ID Types ────────────────────────────────────────────
// Branded types keep a session id from being passed where a public identifier is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type SessionId = Brand<string, 'SessionId'>;

// ─── Custody ────────────────────────────────────────────────────

/**
 * Where the secret half of the keypair may durably live.
 * - `on-disk`: a 0600 key file on the local filesystem.
 * - `vault-only`: only inside the vault; fetched into memory per operation.
 */
export type CustodyMode = 'on-disk' | 'vault-only';

export const CustodyMode = {
  OnDisk: 'on-disk',
  VaultOnly: 'vault-only',
} as const satisfies Record<string, CustodyMode>;

export const CUSTODY_MODES: readonly CustodyMode[] = [CustodyMode.OnDisk, CustodyMode.VaultOnly];

export function isCustodyMode(value: string): value is CustodyMode {
  return (CUSTODY_MODES as readonly string[]).includes(value);
}

// ─── Keys ───────────────────────────────────────────────────────

/** Public identifier plus the secret line of an identity. */
export interface Keypair {
  /** Recipient identifier documents are sealed to (safe to print and log). */
  readonly publicIdentifier: string;
  /** Secret identity line, UTF-8 encoded. Never logged. */
  readonly secretMaterial: Buffer;
}

/**
 * Secret material bound to one scope. Obtained from `KeyStore.resolve` and
 * released exactly once; after release the bytes are zeroed and any
 * materialized file is gone.
 */
export interface ScopedSecret {
  readonly publicIdentifier: string;
  /** The secret identity line. Throws once released. */
  readonly secretMaterial: Buffer;
  /**
   * Path of a key file holding this identity, for tools that only accept paths.
   * For on-disk custody this is the key file itself; for vault-only custody it is
   * a 0600 file inside a scratch directory removed on release.
   */
  filePath(): Promise<string>;
  readonly released: boolean;
  release(): Promise<void>;
}

// ─── Documents ──────────────────────────────────────────────────

/** Plain variable name → value mapping, as it exists only in memory. */
export type SecretMapping = Readonly<Record<string, string>>;

/** Format marker recorded in the at-rest document. */
export type DocumentFormat = 'envkeep/v1' | 'sops/dotenv';

/** An encrypted document: opaque ciphertext plus non-secret structure. */
export interface SecretDocument {
  readonly format: DocumentFormat;
  /** Public identifiers able to decrypt this document. */
  readonly recipients: readonly string[];
  /** Serialized at-rest text, written to disk verbatim. */
  readonly ciphertext: string;
}

// ─── Session ────────────────────────────────────────────────────

/** Decrypted variables handed to one caller for one invocation. Never persisted. */
export interface Session {
  readonly id: SessionId;
  readonly documentPath: string;
  readonly loadedAt: Date;
  readonly variables: SecretMapping;
}
