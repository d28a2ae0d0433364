import type { Result } from '@/core/result.js';
import type { SessionLoadError } from '@/core/errors.js';
import type { Session } from '@/core/types.js';

/** Output formats for `envkeep load`. */
export type SessionFormat = 'shell' | 'dotenv' | 'json';

export const SESSION_FORMATS: readonly SessionFormat[] = ['shell', 'dotenv', 'json'];

export interface SessionLoader {
  /**
   * Decrypt a document into a Session: the default document, or `customPath`.
   * All-or-nothing; any failure in the chain comes back as a SessionLoadError.
   */
  load(customPath?: string): Promise<Result<Session, SessionLoadError>>;
}

export interface ProjectLoaderResult {
  loaderPath: string;
  /** True when the loader file name was appended to .gitignore. */
  gitignoreUpdated: boolean;
}
