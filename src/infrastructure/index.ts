// Atomic writes and advisory locks
export { atomicWriteFile, pathExists, withFileLock } from './atomic-fs.js';
export type { AtomicWriteOptions } from './atomic-fs.js';

// External processes
export { createCommandRunner, summarizeStderr } from './command-runner.js';
export type { CommandResult, CommandRunner, RunOptions } from './command-runner.js';
export { createToolProbe, installHint } from './tool-probe.js';
export type { ToolProbe, ToolStatus } from './tool-probe.js';

// Scratch directories for plaintext that must touch disk
export {
  cleanupScratchSync,
  createScratchSpace,
  installScratchCleanup,
  liveScratchDirectories,
} from './scratch-space.js';
export type { ScratchDirectory, ScratchSpace, ScratchSpaceOptions } from './scratch-space.js';
