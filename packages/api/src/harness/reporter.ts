import { EntryResult, RunSummary } from './run-summary.js';

export interface Reporter {
  onRunStart?(total: number): void;
  /**
   * Called in completion order, which may differ from registration order when entries run concurrently.
   */
  onEntryResult?(result: EntryResult): void;
  onRunComplete?(summary: RunSummary): Promise<void> | void;
  wrapUp?(): Promise<void> | void;
}
