import { EntryState, failedOutcome, ignoredOutcome, Outcome } from '@condition-gate/api/harness';
import { I, errorMessage } from '@condition-gate/util';

import { GroupLifecycle } from '../environment/index.js';
import { PredicateEvaluator } from '../predicates/index.js';

import { Deadline } from './deadline.js';
import { EntryExecutor, EntryExecutorDecorator } from './entry-executor.js';
import { EntryRun } from './entry-run.js';

/**
 * Evaluates the entry's predicates. A closed gate ignores the entry without taking its lock or running its body.
 */
export class GateDecorator extends EntryExecutorDecorator {
  constructor(
    inner: EntryExecutor,
    private readonly evaluator: I<PredicateEvaluator>,
    private readonly groupOf: (run: EntryRun) => GroupLifecycle | undefined,
    private readonly deadline: Deadline,
  ) {
    super(inner);
  }

  public override async execute(run: EntryRun): Promise<Outcome> {
    run.transition(EntryState.Evaluating);
    try {
      const group = this.groupOf(run);
      if (group?.eager) {
        await this.deadline.race(group.acquire());
      }
      const result = await this.deadline.race(this.evaluator.evaluateAll(run.entry.predicates));
      if (!result.gate) {
        if (group) {
          // A failed setup fails every entry of the group, gated ones included.
          await this.deadline.race(group.acquire());
        }
        return ignoredOutcome(result.reason);
      }
    } catch (error) {
      return failedOutcome(errorMessage(error));
    }
    return super.execute(run);
  }
}
