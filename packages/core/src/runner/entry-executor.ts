import { Outcome } from '@condition-gate/api/harness';

import { EntryRun } from './entry-run.js';

export interface EntryExecutor {
  execute(run: EntryRun): Promise<Outcome>;
}

export class EntryExecutorDecorator implements EntryExecutor {
  constructor(protected readonly inner: EntryExecutor) {}

  public execute(run: EntryRun): Promise<Outcome> {
    return this.inner.execute(run);
  }
}
