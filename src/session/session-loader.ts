/**
 * SessionLoader — key → document → decrypt, producing decrypted variables for
 * one invocation. Custody mode is read from configuration on every load.
 */
import { nanoid } from 'nanoid';
import { SessionLoadError, toError } from '@/core/errors.js';
import { attempt } from '@/core/result.js';
import type { CustodyMode, Session, SessionId } from '@/core/types.js';
import type { ConfigStore } from '@/config/types.js';
import type { KeyStore } from '@/keys/types.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { DocumentStore, SecretCodec } from '@/secrets/types.js';
import type { SessionLoader } from './types.js';

export interface SessionLoaderDeps {
  keyStore: KeyStore;
  documents: DocumentStore;
  codec: SecretCodec;
  configStore: ConfigStore;
  /** Map the optional document argument to a path. */
  resolveDocument: (customPath: string | undefined) => string;
  /** Custody mode forced by the caller (`--custody`); otherwise the configured one. */
  custodyOverride?: CustodyMode;
  clock?: () => Date;
  logger?: Logger;
}

export function createSessionLoader(deps: SessionLoaderDeps): SessionLoader {
  const clock = deps.clock ?? ((): Date => new Date());
  const logger = deps.logger ?? createLogger({ name: 'session-loader' });

  return {
    async load(customPath) {
      const documentPath = deps.resolveDocument(customPath);

      const result = await attempt(
        async (): Promise<Session> => {
          const config = await deps.configStore.read();
          const custody = deps.custodyOverride ?? config.custody;
          // The document is read first so a missing file never triggers a vault prompt.
          const document = await deps.documents.read(documentPath);
          const variables = await deps.keyStore.withSecret(custody, (secret) =>
            deps.codec.decryptDocument(document, secret),
          );
          return {
            id: nanoid() as SessionId,
            documentPath,
            loadedAt: clock(),
            variables: Object.freeze({ ...variables }),
          };
        },
        (thrown) => new SessionLoadError(documentPath, toError(thrown)),
      );

      if (result.ok) {
        logger.debug('Session loaded', {
          component: 'session-loader',
          documentPath,
          sessionId: result.value.id,
          variables: Object.keys(result.value.variables).length,
        });
      } else {
        logger.warn('Session load failed', {
          component: 'session-loader',
          documentPath,
          cause: result.error.cause.name,
        });
      }
      return result;
    },
  };
}
