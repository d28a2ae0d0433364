/**
 * envkeep library entry point: the modules behind the CLI, for programs that
 * load secrets without shelling out.
 */
export * from './core/index.js';
export * from './config/index.js';
export * from './infrastructure/index.js';
export * from './keys/index.js';
export * from './observability/index.js';
export * from './secrets/index.js';
export * from './session/index.js';
export * from './setup/index.js';
export * from './terminal/index.js';
export * from './vault/index.js';
export { runCli } from './cli/commands.js';
export type { RunCliOptions } from './cli/commands.js';
export type { CliIo, CliOverrides } from './cli/context.js';
