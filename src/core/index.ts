// Core module — shared types, errors and Result
export type {
  DocumentFormat,
  Keypair,
  ScopedSecret,
  SecretDocument,
  SecretMapping,
  Session,
  SessionId,
} from './types.js';
export { CustodyMode, CUSTODY_MODES, isCustodyMode } from './types.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, attempt, unwrap } from './result.js';

export {
  EnvkeepError,
  ExitCode,
  ToolUnavailableError,
  GenerationError,
  KeyNotFoundError,
  KeyExistsError,
  EntryNotFoundError,
  VaultMissingError,
  DocumentNotFoundError,
  AuthenticationError,
  DecryptionError,
  IntegrityError,
  PermissionError,
  RotationIncompleteError,
  WriteError,
  PromptTimeoutError,
  CommandFailedError,
  ValidationError,
  UsageError,
  SessionLoadError,
  hasErrnoCode,
  toError,
} from './errors.js';
