import { GroupId, LockSpec } from '@condition-gate/api/harness';
import { GateError, errorMessage } from '@condition-gate/util';
import { InjectionError } from 'typed-inject';

/**
 * Invalid declarations or options. Raised before any entry runs, except for run-time
 * privilege problems of a probe, which fail the entry that needed it.
 */
export class ConfigError extends GateError {}

/**
 * A host probe failed unexpectedly. The entry is ignored, never run.
 */
export class ProbeError extends GateError {}

export class LockTimeoutError extends GateError {
  constructor(
    public readonly lock: Readonly<LockSpec>,
    public readonly lockFile: string,
  ) {
    super(`lock "${lock.name}" not acquired within ${lock.timeoutSeconds}s (lock file ${lockFile})`);
  }
}

export class DeadlineExceededError extends GateError {
  constructor(public readonly deadlineMs: number) {
    super(`timeout: run deadline of ${deadlineMs}ms exceeded`);
  }
}

export class GroupSetupError extends GateError {
  constructor(
    public readonly group: GroupId,
    public readonly setupError: unknown,
  ) {
    // Inner stacks stay in the log, not in every entry's failure message.
    super(`setup of group "${group}" failed: ${setupError instanceof GateError ? setupError.ownMessage : errorMessage(setupError)}`);
  }
}

export function retrieveCause(error: unknown): unknown {
  if (error instanceof InjectionError) {
    return error.cause;
  } else {
    return error;
  }
}
