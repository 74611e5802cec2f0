export enum OutcomeStatus {
  Passed = 'passed',
  Failed = 'failed',
  Ignored = 'ignored',
}

export type Outcome = FailedOutcome | IgnoredOutcome | PassedOutcome;

export interface PassedOutcome {
  status: OutcomeStatus.Passed;
}

export interface FailedOutcome {
  status: OutcomeStatus.Failed;
  /**
   * The failure message, verbatim from the thrown error or the reported failure.
   */
  message: string;
}

export interface IgnoredOutcome {
  status: OutcomeStatus.Ignored;
  /**
   * Human-readable reason, e.g. "because variable DATABASE_URL not found"
   */
  reason: string;
}

export function passedOutcome(): PassedOutcome {
  return Object.freeze({ status: OutcomeStatus.Passed });
}

export function failedOutcome(message: string): FailedOutcome {
  return Object.freeze({ status: OutcomeStatus.Failed, message });
}

export function ignoredOutcome(reason: string): IgnoredOutcome {
  return Object.freeze({ status: OutcomeStatus.Ignored, reason });
}

/**
 * Test bodies may return an outcome to decide their result at run time, for example to ignore themselves.
 */
export function isOutcome(value: unknown): value is Outcome {
  if (typeof value !== 'object' || value === null || !('status' in value)) {
    return false;
  }
  switch (value.status) {
    case OutcomeStatus.Passed:
      return true;
    case OutcomeStatus.Failed:
      return 'message' in value && typeof value.message === 'string';
    case OutcomeStatus.Ignored:
      return 'reason' in value && typeof value.reason === 'string';
    default:
      return false;
  }
}
