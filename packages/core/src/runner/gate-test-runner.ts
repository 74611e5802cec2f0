import { GateOptions } from '@condition-gate/api/core';
import { failedOutcome, Outcome, Reporter, RunSummary, TestEntry } from '@condition-gate/api/harness';
import { Logger } from '@condition-gate/api/logging';
import { commonTokens, tokens } from '@condition-gate/api/plugin';
import { I, errorMessage } from '@condition-gate/util';
import { from, lastValueFrom, mergeMap, toArray } from 'rxjs';

import { coreTokens } from '../di/core-tokens.js';
import { FileLock } from '../locking/index.js';
import { PredicateEvaluator } from '../predicates/index.js';
import { TestRegistry } from '../registry/index.js';
import { ResultAggregator } from '../reporters/result-aggregator.js';
import { Timer } from '../utils/timer.js';

import { BodyExecutor } from './body-executor.js';
import { Deadline } from './deadline.js';
import { DeadlineDecorator } from './deadline-decorator.js';
import { EntryExecutor } from './entry-executor.js';
import { EntryRun } from './entry-run.js';
import { EnvironmentDecorator } from './environment-decorator.js';
import { GateDecorator } from './gate-decorator.js';
import { LockDecorator } from './lock-decorator.js';

/**
 * Runs the entries of a registry, at most `concurrency` at a time, and reports their results.
 */
export class GateTestRunner {
  public static inject = tokens(commonTokens.options, commonTokens.logger, coreTokens.predicateEvaluator, coreTokens.fileLock, coreTokens.timer);

  constructor(
    private readonly options: Pick<GateOptions, 'concurrency' | 'deadlineMs'>,
    private readonly log: Logger,
    private readonly evaluator: I<PredicateEvaluator>,
    private readonly fileLock: I<FileLock>,
    private readonly timer: I<Timer>,
  ) {}

  public async run(registry: TestRegistry, reporter: Reporter): Promise<RunSummary> {
    const { entries } = registry;
    const startedAt = this.timer.elapsedMs();
    const deadline = new Deadline(this.options.deadlineMs, this.timer);
    const executor = this.createExecutor(registry, deadline);
    const aggregator = new ResultAggregator(entries.length);
    this.beginGroups(registry);

    this.log.info('Running %d test(s) with a concurrency of %d', entries.length, this.options.concurrency);
    reporter.onRunStart?.(entries.length);
    await lastValueFrom(
      from(entries).pipe(
        mergeMap(async (entry) => {
          const { outcome, durationMs } = await this.runEntry(entry, executor, registry);
          const result = aggregator.record(entry, outcome, durationMs);
          reporter.onEntryResult?.(result);
        }, this.options.concurrency),
        toArray(),
      ),
    );
    const summary = aggregator.finalize(this.timer.elapsedMs() - startedAt);
    await reporter.onRunComplete?.(summary);
    await reporter.wrapUp?.();
    return summary;
  }

  private createExecutor(registry: TestRegistry, deadline: Deadline): EntryExecutor {
    const groupOf = (run: EntryRun) => registry.groupOf(run.entry);
    return new DeadlineDecorator(
      new GateDecorator(new LockDecorator(new EnvironmentDecorator(new BodyExecutor(), groupOf, deadline), this.fileLock, deadline), this.evaluator, groupOf, deadline),
      deadline,
    );
  }

  private beginGroups(registry: TestRegistry) {
    const pending = new Map<string, number>();
    registry.entries.forEach(({ group }) => {
      if (group !== undefined) {
        pending.set(group, (pending.get(group) ?? 0) + 1);
      }
    });
    registry.groups.forEach((group, id) => group.begin(pending.get(id) ?? 0));
  }

  private async runEntry(entry: TestEntry, executor: EntryExecutor, registry: TestRegistry): Promise<{ outcome: Outcome; durationMs: number }> {
    const run = new EntryRun(entry, this.log);
    const startedAt = this.timer.elapsedMs();
    let outcome: Outcome;
    try {
      outcome = await executor.execute(run);
    } catch (error) {
      this.log.error(`Unexpected error while running test "${entry.name}".`, error);
      outcome = failedOutcome(errorMessage(error));
    }
    const durationMs = this.timer.elapsedMs() - startedAt;
    try {
      run.finish(outcome);
    } finally {
      // Skipped and failed entries count too, the last one of a group tears its environment down.
      await registry.groupOf(entry)?.complete();
    }
    return { outcome, durationMs };
  }
}
