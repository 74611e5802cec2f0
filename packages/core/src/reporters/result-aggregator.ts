import { EntryResult, Outcome, OutcomeStatus, RunSummary, TestEntry } from '@condition-gate/api/harness';
import { GateError } from '@condition-gate/util';

/**
 * Collects exactly one result per entry and finalises them into an immutable summary in registration order.
 */
export class ResultAggregator {
  private readonly results: Array<EntryResult | undefined>;
  private passed = 0;
  private failed = 0;
  private ignored = 0;

  constructor(private readonly entryCount: number) {
    this.results = new Array<EntryResult | undefined>(entryCount).fill(undefined);
  }

  public get total(): number {
    return this.passed + this.failed + this.ignored;
  }

  public record(entry: TestEntry, outcome: Outcome, durationMs: number): EntryResult {
    if (this.results[entry.index] !== undefined) {
      throw new GateError(`Test "${entry.name}" already has a result`);
    }
    const result: EntryResult = Object.freeze({ name: entry.name, outcome, durationMs });
    this.results[entry.index] = result;
    switch (outcome.status) {
      case OutcomeStatus.Passed:
        this.passed++;
        break;
      case OutcomeStatus.Failed:
        this.failed++;
        break;
      case OutcomeStatus.Ignored:
        this.ignored++;
        break;
    }
    return result;
  }

  public finalize(elapsedMs: number): RunSummary {
    const results = this.results.filter((result): result is EntryResult => result !== undefined);
    if (results.length !== this.entryCount) {
      throw new GateError(`Only ${results.length} of ${this.entryCount} tests have a result`);
    }
    return Object.freeze({
      passed: this.passed,
      failed: this.failed,
      ignored: this.ignored,
      total: this.total,
      elapsedMs,
      results: Object.freeze(results),
    });
  }
}

/**
 * 0 when nothing failed, 1 otherwise. Ignored entries never fail a run.
 */
export function exitCodeFor(summary: Pick<RunSummary, 'failed'>): number {
  return summary.failed === 0 ? 0 : 1;
}
