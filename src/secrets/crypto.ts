/**
 * Cryptographic primitives for the built-in backend, on Node.js `crypto` only.
 *
 * - AES-256-GCM sealing of byte payloads (documents, wrapped file keys, vault bodies)
 * - X25519 identities encoded as `ekpub1…` / `EK-SECRET-KEY-…`
 * - HKDF-SHA256 key wrapping for document recipients
 * - scrypt passphrase derivation for the file vault
 */
import {
  createCipheriv,
  createDecipheriv,
  createPrivateKey,
  createPublicKey,
  diffieHellman,
  generateKeyPairSync,
  hkdfSync,
  randomBytes,
  scryptSync,
} from 'node:crypto';
import type { KeyObject } from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // 96-bit IV recommended for GCM
const AUTH_TAG_LENGTH = 16; // 128-bit tag
export const KEY_LENGTH = 32;

// ─── AES-256-GCM ────────────────────────────────────────────────

export interface EncryptedPayload {
  encryptedValue: string; // base64
  iv: string; // base64
  authTag: string; // base64
}

/**
 * Encrypt bytes with AES-256-GCM. `aad` is authenticated but not encrypted.
 */
export function sealBytes(plaintext: Buffer, key: Buffer, aad?: Buffer): EncryptedPayload {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  if (aad) cipher.setAAD(aad);
  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  return {
    encryptedValue: encrypted.toString('base64'),
    iv: iv.toString('base64'),
    authTag: cipher.getAuthTag().toString('base64'),
  };
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode canonical padded base64, or return null. `Buffer.from` alone skips
 * stray characters and ignores the unused bits before `=` padding.
 */
export function decodeBase64(text: string): Buffer | null {
  if (text.length % 4 !== 0 || !BASE64_PATTERN.test(text)) return null;
  const bytes = Buffer.from(text, 'base64');
  return bytes.toString('base64') === text ? bytes : null;
}

/**
 * Decrypt an AES-256-GCM payload.
 * Throws if the auth tag does not verify (tampered, truncated, or wrong key).
 */
export function openBytes(payload: EncryptedPayload, key: Buffer, aad?: Buffer): Buffer {
  const iv = decodeBase64(payload.iv);
  const authTag = decodeBase64(payload.authTag);
  const encrypted = decodeBase64(payload.encryptedValue);
  if (!iv || !authTag || iv.length !== IV_LENGTH || authTag.length !== AUTH_TAG_LENGTH) {
    throw new Error('Malformed IV or authentication tag');
  }
  if (!encrypted) {
    throw new Error('Malformed ciphertext encoding');
  }

  const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);
  if (aad) decipher.setAAD(aad);

  return Buffer.concat([decipher.update(encrypted), decipher.final()]);
}

// ─── X25519 Identities ──────────────────────────────────────────

export const IDENTIFIER_PREFIX = 'ekpub1';
export const SECRET_PREFIX = 'EK-SECRET-KEY-';

// DER headers for raw 32-byte X25519 keys
const PKCS8_PREFIX = Buffer.from('302e020100300506032b656e04220420', 'hex');
const SPKI_PREFIX = Buffer.from('302a300506032b656e032100', 'hex');

const IDENTIFIER_PATTERN = /^ekpub1[A-Za-z0-9_-]{43}$/;
const SECRET_PATTERN = /^EK-SECRET-KEY-[A-Za-z0-9_-]{43}$/;

export interface X25519Identity {
  publicIdentifier: string;
  secretLine: string;
}

/** True for a canonically encoded `ekpub1…` identifier. */
export function isNativeIdentifier(identifier: string): boolean {
  if (!IDENTIFIER_PATTERN.test(identifier)) return false;
  const encoded = identifier.slice(IDENTIFIER_PREFIX.length);
  return Buffer.from(encoded, 'base64url').toString('base64url') === encoded;
}

/** Generate a fresh X25519 identity. */
export function generateIdentity(): X25519Identity {
  const { privateKey, publicKey } = generateKeyPairSync('x25519');
  const rawPrivate = privateKey.export({ type: 'pkcs8', format: 'der' }).subarray(PKCS8_PREFIX.length);
  const rawPublic = publicKey.export({ type: 'spki', format: 'der' }).subarray(SPKI_PREFIX.length);
  return {
    publicIdentifier: IDENTIFIER_PREFIX + rawPublic.toString('base64url'),
    secretLine: SECRET_PREFIX + rawPrivate.toString('base64url'),
  };
}

/** Parse a secret identity line into a private KeyObject, or null when malformed. */
export function privateKeyFromSecret(secretMaterial: Buffer): KeyObject | null {
  const line = secretMaterial.toString('utf-8').trim();
  if (!SECRET_PATTERN.test(line)) return null;
  const raw = Buffer.from(line.slice(SECRET_PREFIX.length), 'base64url');
  try {
    return createPrivateKey({ key: Buffer.concat([PKCS8_PREFIX, raw]), format: 'der', type: 'pkcs8' });
  } finally {
    raw.fill(0);
  }
}

/** Build a public KeyObject from 32 raw bytes. */
export function publicKeyFromRaw(raw: Buffer): KeyObject {
  return createPublicKey({ key: Buffer.concat([SPKI_PREFIX, raw]), format: 'der', type: 'spki' });
}

/** Parse a public identifier into a KeyObject, or null when malformed. */
export function publicKeyFromIdentifier(identifier: string): KeyObject | null {
  if (!isNativeIdentifier(identifier)) return null;
  return publicKeyFromRaw(Buffer.from(identifier.slice(IDENTIFIER_PREFIX.length), 'base64url'));
}

/** Identifier for a private key. */
export function identifierForPrivateKey(privateKey: KeyObject): string {
  const rawPublic = createPublicKey(privateKey).export({ type: 'spki', format: 'der' }).subarray(SPKI_PREFIX.length);
  return IDENTIFIER_PREFIX + rawPublic.toString('base64url');
}

/** Raw 32-byte public key for an identifier KeyObject (used as HKDF salt material). */
export function rawPublicKey(publicKey: KeyObject): Buffer {
  return publicKey.export({ type: 'spki', format: 'der' }).subarray(SPKI_PREFIX.length);
}

/** Generate an ephemeral X25519 keypair for one recipient stanza. */
export function generateEphemeral(): { privateKey: KeyObject; publicKey: KeyObject } {
  return generateKeyPairSync('x25519');
}

/**
 * Derive the key-wrapping key for a recipient stanza:
 * HKDF-SHA256(X25519(priv, pub), salt = ephemeralPublic ‖ recipientPublic).
 */
export function deriveWrapKey(
  privateKey: KeyObject,
  publicKey: KeyObject,
  ephemeralPublic: Buffer,
  recipientPublic: Buffer,
): Buffer {
  const shared = diffieHellman({ privateKey, publicKey });
  try {
    const salt = Buffer.concat([ephemeralPublic, recipientPublic]);
    return Buffer.from(hkdfSync('sha256', shared, salt, 'envkeep/v1 file key', KEY_LENGTH));
  } finally {
    shared.fill(0);
  }
}

// ─── Passphrase KDF ─────────────────────────────────────────────

export interface ScryptParams {
  /** CPU/memory cost, a power of two. */
  N: number;
  r: number;
  p: number;
}

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = { N: 2 ** 15, r: 8, p: 1 };

/** Derive a 32-byte key from a passphrase with scrypt. */
export function derivePassphraseKey(passphrase: string, salt: Buffer, params: ScryptParams): Buffer {
  return scryptSync(passphrase, salt, KEY_LENGTH, {
    N: params.N,
    r: params.r,
    p: params.p,
    maxmem: 256 * params.N * params.r,
  });
}

/** Random bytes for salts and file keys. */
export function randomKey(length: number = KEY_LENGTH): Buffer {
  return randomBytes(length);
}
