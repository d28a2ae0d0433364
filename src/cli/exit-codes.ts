/**
 * Mapping from thrown errors to process exit codes and one-line messages.
 */
import { EnvkeepError, ExitCode, SessionLoadError, toError } from '@/core/errors.js';
import { SetupHaltedError } from '@/setup/errors.js';

/** The failure a wrapper error stands for. */
export function rootCause(error: unknown): Error {
  if (error instanceof SessionLoadError || error instanceof SetupHaltedError) {
    return rootCause(error.cause);
  }
  return toError(error);
}

/** Exit code for a failure: the EnvkeepError's own code, otherwise 1. */
export function exitCodeFor(error: unknown): number {
  const cause = rootCause(error);
  return cause instanceof EnvkeepError ? cause.exitCode : ExitCode.Unexpected;
}

/** `envkeep: <message>` line for stderr. */
export function errorLine(error: unknown): string {
  const top = toError(error);
  if (top instanceof SetupHaltedError) {
    return `envkeep: setup stopped at ${top.failedStep} (after ${top.lastState}): ${rootCause(top).message}`;
  }
  return `envkeep: ${rootCause(top).message}`;
}
