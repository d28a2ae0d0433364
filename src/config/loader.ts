/**
 * Configuration loader — reads the JSON config file, resolves environment
 * variable placeholders and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { EnvkeepError, ExitCode, hasErrnoCode, toError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { envkeepConfigSchema } from './schema.js';
import type { EnvkeepConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends EnvkeepError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      exitCode: ExitCode.Config,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Recursively resolves environment variable placeholders in a parsed config.
 * Only whole-string placeholders (`"${VAR_NAME}"`) are replaced.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  // Numbers, booleans, null — return as-is
  return obj;
}

/** Validate an already-parsed config object. */
export function parseEnvkeepConfig(
  raw: unknown,
  filePath: string,
): Result<EnvkeepConfig, ConfigError> {
  const validation = envkeepConfigSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    return err(
      new ConfigError(
        first
          ? `Configuration validation failed: ${first.path || '(root)'}: ${first.message}`
          : 'Configuration validation failed',
        { filePath, issues },
      ),
    );
  }
  return ok(validation.data);
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Loads and validates the envkeep configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadEnvkeepConfig(
  filePath: string,
  env: Env = process.env,
): Promise<Result<EnvkeepConfig, ConfigError>> {
  // 1. Read the file
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (hasErrnoCode(error, 'ENOENT')) {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorMessage: toError(error).message,
      }),
    );
  }

  // 2. Parse JSON
  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  // 3. Resolve environment variables
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: toError(error).message,
      }),
    );
  }

  // 4. Validate with Zod
  return parseEnvkeepConfig(resolved, filePath);
}
