// Vault adapters — the passphrase-gated store holding the key backup
export type { ImportOptions, VaultAdapter, VaultEntry, VaultSlot } from './types.js';

export { createFileVault } from './file-vault.js';
export type { FileVaultOptions } from './file-vault.js';
export { createKeePassXcVault } from './keepassxc-vault.js';
export type { KeePassXcVaultOptions } from './keepassxc-vault.js';
export { createMemoryVault } from './memory-vault.js';
export type { MemoryVault, MemoryVaultOptions } from './memory-vault.js';
