import { EnvkeepError, ExitCode } from '@/core/errors.js';
import type { SetupState } from './types.js';

/**
 * A setup guard failed. `lastState` is the last state reached; `failedStep`
 * the transition that did not complete. There is no fallback to the other flow.
 */
export class SetupHaltedError extends EnvkeepError {
  public readonly lastState: SetupState;
  public readonly failedStep: SetupState;
  public override readonly cause: Error;

  constructor(lastState: SetupState, failedStep: SetupState, cause: Error) {
    super({
      message: `Setup stopped before ${failedStep}: ${cause.message}`,
      code: 'SETUP_HALTED',
      exitCode: cause instanceof EnvkeepError ? cause.exitCode : ExitCode.Unexpected,
      cause,
      context: { lastState, failedStep },
    });
    this.name = 'SetupHaltedError';
    this.lastState = lastState;
    this.failedStep = failedStep;
    this.cause = cause;
  }
}
