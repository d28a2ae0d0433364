/**
 * Base error class for all envkeep errors.
 * Extends Error with a machine-readable code, a process exit code, and structured context.
 *
 * Messages and context must never carry key material, passphrases or secret values.
 */
export class EnvkeepError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    exitCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'EnvkeepError';
    this.code = params.code;
    this.exitCode = params.exitCode ?? 1;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Process exit codes surfaced by the CLI. */
export const ExitCode = {
  Ok: 0,
  Unexpected: 1,
  Usage: 2,
  ToolMissing: 3,
  NotFound: 4,
  Authentication: 5,
  Decryption: 6,
  Write: 7,
  Permission: 8,
  Rotation: 9,
  PromptTimeout: 10,
  Config: 11,
  AlreadyExists: 12,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Thrown when an external collaborator (binary) is not installed. */
export class ToolUnavailableError extends EnvkeepError {
  constructor(tool: string, hint?: string, cause?: Error) {
    super({
      message: hint
        ? `Required tool "${tool}" is not installed (${hint})`
        : `Required tool "${tool}" is not installed`,
      code: 'TOOL_UNAVAILABLE',
      exitCode: ExitCode.ToolMissing,
      cause,
      context: { tool },
    });
    this.name = 'ToolUnavailableError';
  }
}

/** Thrown when the key backend cannot produce a fresh keypair. */
export class GenerationError extends EnvkeepError {
  constructor(backend: string, cause?: Error) {
    super({
      message: `Key generation failed using the ${backend} backend`,
      code: 'GENERATION_FAILED',
      exitCode: ExitCode.ToolMissing,
      cause,
      context: { backend },
    });
    this.name = 'GenerationError';
  }
}

/** Thrown when no key material exists at the configured location. */
export class KeyNotFoundError extends EnvkeepError {
  constructor(location: string) {
    super({
      message: `No encryption key found at ${location}`,
      code: 'KEY_NOT_FOUND',
      exitCode: ExitCode.NotFound,
      context: { location },
    });
    this.name = 'KeyNotFoundError';
  }
}

/** Thrown when key material would be overwritten by generate/restore. */
export class KeyExistsError extends EnvkeepError {
  constructor(location: string) {
    super({
      message: `An encryption key already exists at ${location}; use "rotate" to replace it`,
      code: 'KEY_EXISTS',
      exitCode: ExitCode.AlreadyExists,
      context: { location },
    });
    this.name = 'KeyExistsError';
  }
}

/** Thrown when a vault entry or attachment does not exist (only after authentication). */
export class EntryNotFoundError extends EnvkeepError {
  constructor(entryName: string, attachmentName: string) {
    super({
      message: `Vault entry "${entryName}" has no attachment "${attachmentName}"`,
      code: 'ENTRY_NOT_FOUND',
      exitCode: ExitCode.NotFound,
      context: { entryName, attachmentName },
    });
    this.name = 'EntryNotFoundError';
  }
}

/** Thrown when the vault database is absent and the caller did not ask to create it. */
export class VaultMissingError extends EnvkeepError {
  constructor(location: string) {
    super({
      message: `Vault database not found at ${location}`,
      code: 'VAULT_MISSING',
      exitCode: ExitCode.NotFound,
      context: { location },
    });
    this.name = 'VaultMissingError';
  }
}

/** Thrown when a secret document file does not exist. */
export class DocumentNotFoundError extends EnvkeepError {
  constructor(path: string) {
    super({
      message: `Secret document not found: ${path}`,
      code: 'DOCUMENT_NOT_FOUND',
      exitCode: ExitCode.NotFound,
      context: { path },
    });
    this.name = 'DocumentNotFoundError';
  }
}

/**
 * Thrown when the vault master passphrase is rejected.
 * Deliberately carries no entry name: a wrong passphrase must look the same
 * whether or not the requested entry exists.
 */
export class AuthenticationError extends EnvkeepError {
  constructor(location: string, cause?: Error) {
    super({
      message: `Vault authentication failed for ${location}`,
      code: 'AUTHENTICATION_FAILED',
      exitCode: ExitCode.Authentication,
      cause,
      context: { location },
    });
    this.name = 'AuthenticationError';
  }
}

/** Thrown when the supplied key is not one the document was sealed for. */
export class DecryptionError extends EnvkeepError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({
      message,
      code: 'DECRYPTION_FAILED',
      exitCode: ExitCode.Decryption,
      cause,
      context,
    });
    this.name = 'DecryptionError';
  }
}

/** Thrown when authenticated ciphertext fails verification (tampering, truncation, corruption). */
export class IntegrityError extends EnvkeepError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({
      message,
      code: 'INTEGRITY_FAILED',
      exitCode: ExitCode.Decryption,
      cause,
      context,
    });
    this.name = 'IntegrityError';
  }
}

/** Thrown when key material sits in a file readable by group or others. */
export class PermissionError extends EnvkeepError {
  constructor(path: string, mode: number) {
    const octal = (mode & 0o777).toString(8).padStart(3, '0');
    super({
      message: `Key file ${path} has unsafe permissions ${octal}; run "chmod 600 ${path}"`,
      code: 'UNSAFE_PERMISSIONS',
      exitCode: ExitCode.Permission,
      context: { path, mode: octal },
    });
    this.name = 'PermissionError';
  }
}

/** Thrown when a rotation stops before the old key could be safely retired. */
export class RotationIncompleteError extends EnvkeepError {
  constructor(step: string, message: string, cause?: Error) {
    super({
      message: `Key rotation incomplete at "${step}": ${message}`,
      code: 'ROTATION_INCOMPLETE',
      exitCode: ExitCode.Rotation,
      cause,
      context: { step },
    });
    this.name = 'RotationIncompleteError';
  }
}

/** Thrown when a file could not be fully written. The previous file is left untouched. */
export class WriteError extends EnvkeepError {
  constructor(path: string, message: string, cause?: Error) {
    super({
      message: `Failed to write ${path}: ${message}`,
      code: 'WRITE_FAILED',
      exitCode: ExitCode.Write,
      cause,
      context: { path },
    });
    this.name = 'WriteError';
  }
}

/** Thrown when an interactive prompt receives no answer in time. */
export class PromptTimeoutError extends EnvkeepError {
  constructor(timeoutMs: number) {
    super({
      message: `No input received within ${timeoutMs}ms`,
      code: 'PROMPT_TIMEOUT',
      exitCode: ExitCode.PromptTimeout,
      context: { timeoutMs },
    });
    this.name = 'PromptTimeoutError';
  }
}

/** Thrown when an external tool exits with an unrecognized failure. */
export class CommandFailedError extends EnvkeepError {
  constructor(tool: string, exitCode: number | null, summary: string) {
    super({
      message: `"${tool}" failed (exit ${exitCode === null ? 'signal' : exitCode.toString()}): ${summary}`,
      code: 'COMMAND_FAILED',
      exitCode: ExitCode.Unexpected,
      context: { tool, toolExitCode: exitCode },
    });
    this.name = 'CommandFailedError';
  }
}

/** Thrown when input validation fails. */
export class ValidationError extends EnvkeepError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      exitCode: ExitCode.Usage,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when the command line cannot be parsed. */
export class UsageError extends EnvkeepError {
  constructor(message: string) {
    super({
      message,
      code: 'USAGE_ERROR',
      exitCode: ExitCode.Usage,
    });
    this.name = 'UsageError';
  }
}

/**
 * Single error surfaced by the session loader, whatever link in the
 * key → document → decrypt chain failed. The original failure is the `cause`.
 */
export class SessionLoadError extends EnvkeepError {
  public override readonly cause: Error;

  constructor(documentPath: string, cause: Error) {
    super({
      message: `Could not load secrets from ${documentPath}: ${cause.message}`,
      code: 'SESSION_LOAD_FAILED',
      exitCode: cause instanceof EnvkeepError ? cause.exitCode : ExitCode.Unexpected,
      cause,
      context: { documentPath, causeCode: cause instanceof EnvkeepError ? cause.code : undefined },
    });
    this.name = 'SessionLoadError';
    this.cause = cause;
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** True when `error` is a Node.js system error with the given errno code (e.g. ENOENT). */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
