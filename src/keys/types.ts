/**
 * Types for key custody: generating keypairs, resolving the secret half for
 * one operation, and moving it between the key file and the vault.
 */
import type { CustodyMode, Keypair, ScopedSecret } from '@/core/types.js';

// ─── Backends ───────────────────────────────────────────────────

/** Produces keypairs for one identity scheme (built-in X25519 or age). */
export interface KeyBackend {
  readonly name: string;
  /** Binaries that must be on PATH for this backend. */
  readonly requiredTools: readonly string[];
  /** @throws GenerationError */
  generate(): Promise<Keypair>;
  derivePublicIdentifier(secretMaterial: Buffer): Promise<string>;
  isValidIdentifier(identifier: string): boolean;
}

// ─── Key Store ──────────────────────────────────────────────────

export interface RotateOptions {
  mode: CustodyMode;
  /** Documents to re-encrypt for the new identifier. */
  documentPaths: readonly string[];
}

export interface RotationReport {
  previousIdentifier: string;
  newIdentifier: string;
  documents: readonly string[];
}

export interface AddRecipientOptions {
  mode: CustodyMode;
  documentPaths: readonly string[];
}

export interface StoreOptions {
  /** Create the vault database if it does not exist (vault-only custody). */
  createVault?: boolean;
}

export interface KeyStore {
  /** Fresh keypair from the backend; nothing is persisted. */
  generate(): Promise<Keypair>;

  /**
   * Locate the secret for `mode` and scope it to the caller.
   * On-disk: KeyNotFoundError, PermissionError. Vault-only: vault errors.
   */
  resolve(mode: CustodyMode): Promise<ScopedSecret>;

  /** Resolve, run `fn`, release, even when `fn` throws. */
  withSecret<T>(mode: CustodyMode, fn: (secret: ScopedSecret) => Promise<T>): Promise<T>;

  /** Scope a keypair that is only in memory (a freshly generated one). */
  scope(keypair: Keypair): ScopedSecret;

  /** Persist a keypair in the location `mode` designates. KeyExistsError on-disk if a key is already there. */
  store(keypair: Keypair, mode: CustodyMode, options?: StoreOptions): Promise<void>;

  /** Copy the on-disk key into the vault. Returns its identifier. */
  backup(options?: StoreOptions): Promise<string>;

  /** Write the vault's key to the key file. Returns its identifier. */
  restore(): Promise<string>;

  /** Replace the current key with `newKeypair`, re-encrypting documents first. */
  rotate(newKeypair: Keypair, options: RotateOptions): Promise<RotationReport>;

  /** Add another identifier as a recipient of the documents. Returns the active identifiers. */
  addRecipient(identifier: string, options: AddRecipientOptions): Promise<readonly string[]>;
}
