import { failedOutcome, ignoredOutcome, passedOutcome } from '@condition-gate/api/harness';
import { GateError } from '@condition-gate/util';
import { expect } from 'chai';

import { exitCodeFor, ResultAggregator } from '../../../src/reporters/index.js';
import { factory } from '../../helpers/index.js';

describe(ResultAggregator.name, () => {
  it('should order results by registration, not by completion', () => {
    const sut = new ResultAggregator(3);
    sut.record(factory.testEntry({ index: 2, name: 'c' }), ignoredOutcome('because variable X not found'), 1);
    sut.record(factory.testEntry({ index: 0, name: 'a' }), passedOutcome(), 2);
    sut.record(factory.testEntry({ index: 1, name: 'b' }), failedOutcome('boom'), 3);

    const summary = sut.finalize(42);

    expect(summary).deep.eq({
      passed: 1,
      failed: 1,
      ignored: 1,
      total: 3,
      elapsedMs: 42,
      results: [
        { name: 'a', outcome: passedOutcome(), durationMs: 2 },
        { name: 'b', outcome: failedOutcome('boom'), durationMs: 3 },
        { name: 'c', outcome: ignoredOutcome('because variable X not found'), durationMs: 1 },
      ],
    });
  });

  it('should count recorded results', () => {
    const sut = new ResultAggregator(2);
    sut.record(factory.testEntry({ index: 1 }), passedOutcome(), 1);
    expect(sut.total).eq(1);
  });

  it('should return the recorded result', () => {
    const sut = new ResultAggregator(1);
    const result = sut.record(factory.testEntry({ name: 'a' }), passedOutcome(), 5);
    expect(result).deep.eq({ name: 'a', outcome: passedOutcome(), durationMs: 5 });
    expect(result).frozen;
  });

  it('should refuse a second result for the same entry', () => {
    const sut = new ResultAggregator(1);
    sut.record(factory.testEntry({ name: 'a' }), passedOutcome(), 1);
    expect(() => sut.record(factory.testEntry({ name: 'a' }), failedOutcome('boom'), 1))
      .throws(GateError)
      .with.property('message', 'Test "a" already has a result');
  });

  it('should refuse to finalize while results are missing', () => {
    const sut = new ResultAggregator(2);
    sut.record(factory.testEntry({ index: 0 }), passedOutcome(), 1);
    expect(() => sut.finalize(1)).throws('Only 1 of 2 tests have a result');
  });

  it('should produce an immutable summary', () => {
    const summary = new ResultAggregator(0).finalize(0);
    expect(summary).frozen;
    expect(summary.results).frozen;
  });
});

describe(exitCodeFor.name, () => {
  it('should be 0 when nothing failed', () => {
    expect(exitCodeFor({ failed: 0 })).eq(0);
  });

  it('should be 1 when an entry failed', () => {
    expect(exitCodeFor({ failed: 2 })).eq(1);
  });
});
