import { GateOptions } from '@condition-gate/api/core';
import { EntryResult, Outcome, OutcomeStatus, passedOutcome, RunSummary, TestEntry } from '@condition-gate/api/harness';
import { Logger, LogLevel } from '@condition-gate/api/logging';
import sinon from 'sinon';

export function logger(): sinon.SinonStubbedInstance<Logger> {
  return {
    isTraceEnabled: sinon.stub(),
    isDebugEnabled: sinon.stub(),
    isInfoEnabled: sinon.stub(),
    isWarnEnabled: sinon.stub(),
    isErrorEnabled: sinon.stub(),
    isFatalEnabled: sinon.stub(),
    trace: sinon.stub(),
    debug: sinon.stub(),
    info: sinon.stub(),
    warn: sinon.stub(),
    error: sinon.stub(),
    fatal: sinon.stub(),
  };
}

export function gateOptions(overrides?: Partial<GateOptions>): GateOptions {
  return {
    concurrency: 4,
    lockDirectory: '/tmp/condition-gate-test-locks',
    lockPollIntervalMs: 10,
    staleLockMs: 0,
    probeTimeoutMs: 500,
    deadlineMs: 0,
    logLevel: LogLevel.Off,
    reporters: ['clear-text'],
    jsonReporter: { fileName: 'reports/condition-gate.json' },
    ...overrides,
  };
}

export function testEntry(overrides?: Partial<TestEntry>): TestEntry {
  return {
    index: 0,
    name: 'test entry',
    predicates: [],
    body: () => undefined,
    ...overrides,
  };
}

export function entryResult(name: string, outcome: Outcome = passedOutcome(), durationMs = 1): EntryResult {
  return { name, outcome, durationMs };
}

export function runSummary(results: EntryResult[], elapsedMs = 120): RunSummary {
  const count = (status: OutcomeStatus) => results.filter(({ outcome }) => outcome.status === status).length;
  return {
    passed: count(OutcomeStatus.Passed),
    failed: count(OutcomeStatus.Failed),
    ignored: count(OutcomeStatus.Ignored),
    total: results.length,
    elapsedMs,
    results,
  };
}
