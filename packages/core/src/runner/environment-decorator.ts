import { failedOutcome, Outcome } from '@condition-gate/api/harness';
import { errorMessage } from '@condition-gate/util';

import { GroupLifecycle } from '../environment/index.js';

import { Deadline } from './deadline.js';
import { EntryExecutor, EntryExecutorDecorator } from './entry-executor.js';
import { EntryRun } from './entry-run.js';

/**
 * Makes sure the mock environment of the entry's group is live before the body runs.
 */
export class EnvironmentDecorator extends EntryExecutorDecorator {
  constructor(
    inner: EntryExecutor,
    private readonly groupOf: (run: EntryRun) => GroupLifecycle | undefined,
    private readonly deadline: Deadline,
  ) {
    super(inner);
  }

  public override async execute(run: EntryRun): Promise<Outcome> {
    const group = this.groupOf(run);
    if (group) {
      try {
        await this.deadline.race(group.acquire());
      } catch (error) {
        return failedOutcome(errorMessage(error));
      }
    }
    return super.execute(run);
  }
}
