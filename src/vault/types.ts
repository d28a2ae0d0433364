/**
 * Types for the vault adapter — an external encrypted attachment store gated by
 * a master passphrase. The vault is the sole durable copy of the key in
 * vault-only custody.
 */

/** Where the key lives inside the vault. */
export interface VaultSlot {
  entryName: string;
  attachmentName: string;
}

/** A named binary attachment inside a vault entry. */
export interface VaultEntry extends VaultSlot {
  payload: Buffer;
}

export interface ImportOptions {
  /**
   * Create the vault database when it does not exist yet.
   * Without it a missing database is a VaultMissingError, never an implicit first run.
   */
  createIfMissing?: boolean;
}

export interface VaultAdapter {
  /** Human-readable location (path) for messages. */
  readonly location: string;

  /** Whether the vault database exists. Needs no passphrase. */
  exists(): Promise<boolean>;

  /**
   * Read an attachment.
   * Throws AuthenticationError before any lookup, EntryNotFoundError after it,
   * VaultMissingError when there is no database.
   */
  exportAttachment(entryName: string, attachmentName: string): Promise<Buffer>;

  /** Write (or overwrite) an attachment. Throws WriteError rather than truncating. */
  importAttachment(
    entryName: string,
    attachmentName: string,
    payload: Buffer,
    options?: ImportOptions,
  ): Promise<void>;

  /** Remove an attachment; removing one that is absent is not an error. */
  removeAttachment(entryName: string, attachmentName: string): Promise<void>;
}
