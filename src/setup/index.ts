// Setup — first-run and restore flows
export type { SetupFlow, SetupOptions, SetupOrchestrator, SetupReport, SetupState } from './types.js';
export { SetupHaltedError } from './errors.js';
export { createSetupOrchestrator } from './orchestrator.js';
export type { SetupOrchestratorDeps } from './orchestrator.js';
