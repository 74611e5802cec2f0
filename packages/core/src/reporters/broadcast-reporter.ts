import { GateOptions, ReporterName } from '@condition-gate/api/core';
import { EntryResult, Reporter, RunSummary } from '@condition-gate/api/harness';
import { Logger, LoggerFactoryMethod } from '@condition-gate/api/logging';
import { commonTokens, tokens } from '@condition-gate/api/plugin';

import { coreTokens } from '../di/core-tokens.js';

import { ClearTextReporter } from './clear-text-reporter.js';
import { JsonReporter } from './json-reporter.js';
import { Writer } from './writer.js';

/**
 * Forwards every event to the configured reporters. A failing reporter is logged and does not stop the others.
 */
export class BroadcastReporter implements Required<Reporter> {
  public static inject = tokens(commonTokens.options, coreTokens.writer, commonTokens.getLogger, commonTokens.logger);

  public readonly reporters: ReadonlyMap<ReporterName, Reporter>;

  constructor(
    options: Pick<GateOptions, 'jsonReporter' | 'reporters'>,
    writer: Writer,
    getLogger: LoggerFactoryMethod,
    private readonly log: Logger,
  ) {
    this.reporters = new Map(
      options.reporters.map((name): [ReporterName, Reporter] => {
        switch (name) {
          case 'clear-text':
            return [name, new ClearTextReporter(writer)];
          case 'json':
            return [name, new JsonReporter(options, getLogger(JsonReporter.name))];
        }
      }),
    );
  }

  public onRunStart(total: number): void {
    this.broadcast('onRunStart', (reporter) => reporter.onRunStart?.(total));
  }

  public onEntryResult(result: EntryResult): void {
    this.broadcast('onEntryResult', (reporter) => reporter.onEntryResult?.(result));
  }

  public async onRunComplete(summary: RunSummary): Promise<void> {
    await this.broadcastAsync('onRunComplete', (reporter) => reporter.onRunComplete?.(summary));
  }

  public async wrapUp(): Promise<void> {
    await this.broadcastAsync('wrapUp', (reporter) => reporter.wrapUp?.());
  }

  private broadcast(eventName: keyof Reporter, act: (reporter: Reporter) => void): void {
    this.reporters.forEach((reporter, name) => {
      try {
        act(reporter);
      } catch (error) {
        this.handleError(error, eventName, name);
      }
    });
  }

  private async broadcastAsync(eventName: keyof Reporter, act: (reporter: Reporter) => Promise<void> | void | undefined): Promise<void> {
    await Promise.all(
      [...this.reporters].map(async ([name, reporter]) => {
        try {
          await act(reporter);
        } catch (error) {
          this.handleError(error, eventName, name);
        }
      }),
    );
  }

  private handleError(error: unknown, eventName: string, reporterName: string) {
    this.log.error(`An error occurred during '${eventName}' on reporter '${reporterName}'.`, error);
  }
}
