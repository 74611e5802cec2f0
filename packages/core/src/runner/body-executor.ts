import { EntryState, failedOutcome, isOutcome, Outcome, passedOutcome } from '@condition-gate/api/harness';
import { errorMessage } from '@condition-gate/util';

import { EntryExecutor } from './entry-executor.js';
import { EntryRun } from './entry-run.js';

/**
 * Runs the test body. A throw or rejection fails the entry with the error's message.
 */
export class BodyExecutor implements EntryExecutor {
  public async execute(run: EntryRun): Promise<Outcome> {
    run.transition(EntryState.Running);
    const { name, group } = run.entry;
    try {
      const result = await run.entry.body({ name, group });
      return isOutcome(result) ? result : passedOutcome();
    } catch (error) {
      return failedOutcome(errorMessage(error));
    }
  }
}
