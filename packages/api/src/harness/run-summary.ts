import { Outcome, OutcomeStatus } from './outcome.js';

export interface EntryResult {
  readonly name: string;
  readonly outcome: Outcome;
  readonly durationMs: number;
}

export interface RunSummary {
  readonly passed: number;
  readonly failed: number;
  readonly ignored: number;
  readonly total: number;
  readonly elapsedMs: number;
  /**
   * One result per registered entry, in registration order.
   */
  readonly results: readonly EntryResult[];
}

export interface JsonEntryReport {
  name: string;
  status: OutcomeStatus;
  reason?: string;
  message?: string;
  durationMs: number;
}

export interface JsonRunReport {
  results: JsonEntryReport[];
  passed: number;
  failed: number;
  ignored: number;
  total: number;
  elapsedMs: number;
}
