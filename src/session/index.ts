// Sessions — decrypted variables for one invocation
export type { ProjectLoaderResult, SessionFormat, SessionLoader } from './types.js';
export { SESSION_FORMATS } from './types.js';
export { createSessionLoader } from './session-loader.js';
export type { SessionLoaderDeps } from './session-loader.js';
export { bindSession, formatSession, shellQuote } from './format.js';
export { PROJECT_LOADER_FILE, projectLoaderScript, writeProjectLoader } from './project-loader.js';
