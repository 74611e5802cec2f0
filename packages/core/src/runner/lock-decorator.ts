import { failedOutcome, Outcome } from '@condition-gate/api/harness';
import { I, errorMessage } from '@condition-gate/util';
import log4js from 'log4js';

import { FileLock, LockHandle } from '../locking/index.js';

import { Deadline } from './deadline.js';
import { EntryExecutor, EntryExecutorDecorator } from './entry-executor.js';
import { EntryRun } from './entry-run.js';

/**
 * Holds the entry's named lock while the rest of the chain runs. The lock is released on every exit path.
 */
export class LockDecorator extends EntryExecutorDecorator {
  private readonly log = log4js.getLogger(LockDecorator.name);

  constructor(
    inner: EntryExecutor,
    private readonly fileLock: I<FileLock>,
    private readonly deadline: Deadline,
  ) {
    super(inner);
  }

  public override async execute(run: EntryRun): Promise<Outcome> {
    const { lock, name } = run.entry;
    if (!lock) {
      return super.execute(run);
    }
    let handle: LockHandle;
    try {
      handle = await this.fileLock.acquire(lock, this.deadline);
    } catch (error) {
      this.log.debug('Test "%s" did not get lock "%s"', name, lock.name);
      return failedOutcome(errorMessage(error));
    }
    try {
      return await super.execute(run);
    } finally {
      await handle.release();
    }
  }
}
