import { EntryResult, OutcomeStatus, Reporter, RunSummary } from '@condition-gate/api/harness';
import { tokens } from '@condition-gate/api/plugin';

import { coreTokens } from '../di/core-tokens.js';

import { Writer } from './writer.js';

export function renderClearText(summary: RunSummary): string {
  const lines = [`running ${summary.total} ${summary.total === 1 ? 'test' : 'tests'}`, ...summary.results.map(renderResultLine)];
  const failures = summary.results.flatMap(({ name, outcome }) =>
    outcome.status === OutcomeStatus.Failed ? [`    ${name}: ${outcome.message.replace(/\n/g, '\n        ')}`] : [],
  );
  if (failures.length) {
    lines.push('', 'failures:', ...failures);
  }
  lines.push(
    '',
    `test result: ${summary.failed === 0 ? 'ok' : 'FAILED'}. ${summary.passed} passed; ${summary.failed} failed; ${summary.ignored} ignored; ${summary.total} total; finished in ${(summary.elapsedMs / 1000).toFixed(2)}s`,
  );
  return `${lines.join('\n')}\n`;
}

function renderResultLine({ name, outcome }: EntryResult): string {
  switch (outcome.status) {
    case OutcomeStatus.Passed:
      return `${name} ... ok`;
    case OutcomeStatus.Failed:
      return `${name} ... FAILED`;
    case OutcomeStatus.Ignored:
      return `${name} ... ignored, ${outcome.reason}`;
  }
}

export class ClearTextReporter implements Reporter {
  public static inject = tokens(coreTokens.writer);

  constructor(private readonly write: Writer) {}

  public onRunComplete(summary: RunSummary): void {
    this.write(renderClearText(summary));
  }
}
