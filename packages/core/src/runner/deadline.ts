import { ExpirableTask, I } from '@condition-gate/util';

import { DeadlineExceededError } from '../errors.js';
import { Timer } from '../utils/timer.js';

/**
 * The global run deadline. Measured from the moment the run started; a `deadlineMs` of 0 never expires.
 */
export class Deadline {
  private readonly startedAt: number;

  constructor(
    public readonly deadlineMs: number,
    private readonly timer: I<Timer>,
  ) {
    this.startedAt = timer.elapsedMs();
  }

  public get enabled(): boolean {
    return this.deadlineMs > 0;
  }

  public remainingMs(): number {
    if (!this.enabled) {
      return Number.POSITIVE_INFINITY;
    }
    return Math.max(0, this.deadlineMs - (this.timer.elapsedMs() - this.startedAt));
  }

  public isExpired(): boolean {
    return this.remainingMs() === 0;
  }

  public error(): DeadlineExceededError {
    return new DeadlineExceededError(this.deadlineMs);
  }

  /**
   * Rejects with a {@link DeadlineExceededError} when the deadline passes before the promise settles.
   */
  public async race<T>(promise: Promise<T>): Promise<T> {
    if (!this.enabled) {
      return promise;
    }
    const result = await ExpirableTask.timeout(promise, this.remainingMs());
    if (result === ExpirableTask.TimeoutExpired) {
      throw this.error();
    }
    return result;
  }
}
