import fs from 'node:fs/promises';
import path from 'node:path';

import { GateOptions } from '@condition-gate/api/core';
import { JsonEntryReport, JsonRunReport, OutcomeStatus, Reporter, RunSummary } from '@condition-gate/api/harness';
import { Logger } from '@condition-gate/api/logging';
import { commonTokens, tokens } from '@condition-gate/api/plugin';

export function toJsonReport(summary: RunSummary): JsonRunReport {
  return {
    results: summary.results.map(({ name, outcome, durationMs }): JsonEntryReport => {
      switch (outcome.status) {
        case OutcomeStatus.Passed:
          return { name, status: outcome.status, durationMs };
        case OutcomeStatus.Failed:
          return { name, status: outcome.status, message: outcome.message, durationMs };
        case OutcomeStatus.Ignored:
          return { name, status: outcome.status, reason: outcome.reason, durationMs };
      }
    }),
    passed: summary.passed,
    failed: summary.failed,
    ignored: summary.ignored,
    total: summary.total,
    elapsedMs: summary.elapsedMs,
  };
}

export class JsonReporter implements Reporter {
  public static inject = tokens(commonTokens.options, commonTokens.logger);
  private report: JsonRunReport | undefined;

  constructor(
    private readonly options: Pick<GateOptions, 'jsonReporter'>,
    private readonly log: Logger,
  ) {}

  public onRunComplete(summary: RunSummary): void {
    this.report = toJsonReport(summary);
  }

  public async wrapUp(): Promise<void> {
    if (!this.report) {
      return;
    }
    const { fileName } = this.options.jsonReporter;
    await fs.mkdir(path.dirname(fileName), { recursive: true });
    await fs.writeFile(fileName, JSON.stringify(this.report, null, 2), 'utf8');
    this.log.info('Wrote JSON report to %s', path.resolve(fileName));
  }
}
