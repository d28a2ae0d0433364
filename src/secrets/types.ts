/**
 * Types for encrypted secret documents.
 * A document is a dotenv-style NAME=value mapping sealed for one or more public
 * identifiers. The plaintext mapping exists only in memory, between a decrypt
 * and the matching re-encrypt.
 */
import type { DocumentFormat, ScopedSecret, SecretDocument, SecretMapping } from '@/core/types.js';

/** Receives a mutable copy of the variables; the original document is never touched. */
export type DocumentMutator = (variables: Map<string, string>) => void | Promise<void>;

export interface EditOptions {
  /** Seal the result for these identifiers instead of the document's current recipients. */
  recipients?: readonly string[];
}

// ─── Codec backend ──────────────────────────────────────────────

/**
 * Encrypt/decrypt primitive for one at-rest format.
 * Implementations: the built-in `envkeep/v1` sealer and the sops subprocess adapter.
 */
export interface DocumentSealer {
  readonly format: DocumentFormat;
  /** Parse at-rest text. Throws IntegrityError when it is not a well-formed document. */
  parse(text: string): SecretDocument;
  seal(mapping: SecretMapping, recipients: readonly string[]): Promise<SecretDocument>;
  /**
   * Decrypt fully or fail: DecryptionError when `secret` is not a recipient,
   * IntegrityError when verification fails.
   */
  open(document: SecretDocument, secret: ScopedSecret): Promise<SecretMapping>;
}

// ─── Codec ──────────────────────────────────────────────────────

export interface SecretCodec {
  readonly format: DocumentFormat;

  parse(text: string): SecretDocument;

  /** Seal a mapping for one identifier or a set of them. */
  encryptDocument(mapping: SecretMapping, publicIdentifier: string | readonly string[]): Promise<SecretDocument>;

  decryptDocument(document: SecretDocument, secret: ScopedSecret): Promise<SecretMapping>;

  /** Decrypt, apply `mutator` to a copy, re-encrypt. Returns a new document. */
  editInPlace(
    document: SecretDocument,
    secret: ScopedSecret,
    mutator: DocumentMutator,
    options?: EditOptions,
  ): Promise<SecretDocument>;

  /** Set one variable, overwriting an existing value. */
  setField(document: SecretDocument, secret: ScopedSecret, key: string, value: string): Promise<SecretDocument>;

  /** Remove one variable; removing an absent one leaves the mapping unchanged. */
  removeField(document: SecretDocument, secret: ScopedSecret, key: string): Promise<SecretDocument>;
}

// ─── Document store ─────────────────────────────────────────────

/** Reads and writes document files; mutations are locked and atomic. */
export interface DocumentStore {
  exists(path: string): Promise<boolean>;
  /** Throws DocumentNotFoundError when absent. */
  read(path: string): Promise<SecretDocument>;
  /** Atomically write a document, replacing any existing file. */
  write(path: string, document: SecretDocument): Promise<void>;
  /** Locked read → editInPlace → atomic write. Returns the stored document. */
  edit(path: string, secret: ScopedSecret, mutator: DocumentMutator, options?: EditOptions): Promise<SecretDocument>;
  /** Locked replace of an existing document. */
  replace(path: string, document: SecretDocument): Promise<void>;
}
