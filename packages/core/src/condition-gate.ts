import { PartialGateOptions } from '@condition-gate/api/core';
import { RunSummary } from '@condition-gate/api/harness';
import { commonTokens } from '@condition-gate/api/plugin';
import { createInjector } from 'typed-inject';

import { loadOptions } from './config/index.js';
import { coreTokens, provideLogger } from './di/index.js';
import { ConfigError, retrieveCause } from './errors.js';
import { FileLock } from './locking/index.js';
import { LogConfigurator } from './logging/index.js';
import { PredicateEvaluator } from './predicates/index.js';
import { NodeProbes, Probes } from './probes/index.js';
import { TestRegistry } from './registry/index.js';
import { BroadcastReporter, exitCodeFor, stdoutWriter, Writer } from './reporters/index.js';
import { GateTestRunner } from './runner/index.js';
import { Timer } from './utils/timer.js';

export interface ConditionGateCollaborators {
  /**
   * Replaces the probes of the local host, e.g. to pin the environment the predicates see.
   */
  probes?: Probes;
  writer?: Writer;
}

/**
 * The main class. It provides a single `run()` function which runs the entries of a registry:
 * gated ones are ignored, the others run under their locks and group environments.
 */
export class ConditionGate {
  /**
   * @param cliOptions The options, they take precedence over environment variables and defaults.
   * @param collaborators Replacements for the host probes and the output of the clear-text report.
   * @param injectorFactory The injector factory, for testing purposes only
   */
  constructor(
    private readonly cliOptions: PartialGateOptions = {},
    private readonly collaborators: ConditionGateCollaborators = {},
    private readonly injectorFactory = createInjector,
  ) {}

  public async run(registry: TestRegistry): Promise<RunSummary> {
    const rootInjector = this.injectorFactory();
    const loggerProvider = provideLogger(rootInjector);
    try {
      const options = loadOptions(this.cliOptions);
      LogConfigurator.configure(options.logLevel);
      const timer = new Timer();
      const optionsProvider = loggerProvider.provideValue(commonTokens.options, options).provideValue(coreTokens.timer, timer);
      const probes: Probes = this.collaborators.probes ?? optionsProvider.injectClass(NodeProbes);
      const runInjector = optionsProvider
        .provideValue(coreTokens.probes, probes)
        .provideValue(coreTokens.writer, this.collaborators.writer ?? stdoutWriter)
        .provideClass(coreTokens.predicateEvaluator, PredicateEvaluator)
        .provideClass(coreTokens.fileLock, FileLock)
        .provideClass(coreTokens.reporter, BroadcastReporter);
      const runner = runInjector.injectClass(GateTestRunner);
      const summary = await runner.run(registry, runInjector.resolve(coreTokens.reporter));

      const log = loggerProvider.resolve(commonTokens.getLogger)(ConditionGate.name);
      log.info('Done in %s: %d passed, %d failed, %d ignored.', timer.humanReadableElapsed(), summary.passed, summary.failed, summary.ignored);
      return summary;
    } catch (error) {
      const log = loggerProvider.resolve(commonTokens.getLogger)(ConditionGate.name);
      const cause = retrieveCause(error);
      if (cause instanceof ConfigError) {
        log.error(cause.message);
      } else {
        log.error('Unexpected error occurred while running tests', error);
        if (!log.isTraceEnabled()) {
          log.info('Still having trouble figuring out what went wrong? Run again with `logLevel: "trace"` to get some more info.');
        }
      }
      throw cause;
    } finally {
      await rootInjector.dispose();
      await LogConfigurator.shutdown();
    }
  }
}

/**
 * Runs the registry and resolves the process exit code: 0 when nothing failed, 1 otherwise.
 */
export async function runTests(registry: TestRegistry, options?: PartialGateOptions): Promise<number> {
  const summary = await new ConditionGate(options).run(registry);
  return exitCodeFor(summary);
}
