import { failedOutcome, Outcome } from '@condition-gate/api/harness';

import { Deadline } from './deadline.js';
import { EntryExecutor, EntryExecutorDecorator } from './entry-executor.js';
import { EntryRun } from './entry-run.js';

/**
 * Fails entries that were still queued when the run deadline passed.
 */
export class DeadlineDecorator extends EntryExecutorDecorator {
  constructor(
    inner: EntryExecutor,
    private readonly deadline: Deadline,
  ) {
    super(inner);
  }

  public override execute(run: EntryRun): Promise<Outcome> {
    if (this.deadline.isExpired()) {
      return Promise.resolve(failedOutcome(this.deadline.error().message));
    }
    return super.execute(run);
  }
}
