import { canTransition, EntryState, Outcome, OutcomeStatus, TestEntry } from '@condition-gate/api/harness';
import { Logger } from '@condition-gate/api/logging';
import { GateError } from '@condition-gate/util';

const terminalStates: Readonly<Record<OutcomeStatus, EntryState>> = Object.freeze({
  [OutcomeStatus.Passed]: EntryState.Passed,
  [OutcomeStatus.Failed]: EntryState.Failed,
  [OutcomeStatus.Ignored]: EntryState.Ignored,
});

/**
 * The state of one entry during a run.
 */
export class EntryRun {
  private current = EntryState.Registered;

  constructor(
    public readonly entry: TestEntry,
    private readonly log: Logger,
  ) {}

  public get state(): EntryState {
    return this.current;
  }

  /**
   * @throws {GateError} on a transition the life cycle does not allow, which is a bug in the runner
   */
  public transition(to: EntryState): void {
    if (!canTransition(this.current, to)) {
      throw new GateError(`Test "${this.entry.name}" cannot move from ${this.current} to ${to}`);
    }
    this.log.debug('Test "%s": %s -> %s', this.entry.name, this.current, to);
    this.current = to;
  }

  public finish(outcome: Outcome): void {
    this.transition(terminalStates[outcome.status]);
  }
}
