import { EntryState, failedOutcome, ignoredOutcome, passedOutcome } from '@condition-gate/api/harness';
import { expect } from 'chai';
import sinon from 'sinon';

import { EntryRun } from '../../../src/runner/index.js';
import { factory } from '../../helpers/index.js';

describe(EntryRun.name, () => {
  it('should start registered', () => {
    expect(new EntryRun(factory.testEntry(), factory.logger()).state).eq(EntryState.Registered);
  });

  it('should follow the life cycle and log the transitions', () => {
    const log = factory.logger();
    const sut = new EntryRun(factory.testEntry({ name: 'alpha' }), log);
    sut.transition(EntryState.Evaluating);
    sut.transition(EntryState.Running);
    sut.finish(passedOutcome());
    expect(sut.state).eq(EntryState.Passed);
    sinon.assert.calledWithExactly(log.debug, 'Test "%s": %s -> %s', 'alpha', EntryState.Running, EntryState.Passed);
  });

  it('should map outcomes to terminal states', () => {
    const ignored = new EntryRun(factory.testEntry(), factory.logger());
    ignored.transition(EntryState.Evaluating);
    ignored.finish(ignoredOutcome('because of reasons'));
    expect(ignored.state).eq(EntryState.Ignored);

    const abandoned = new EntryRun(factory.testEntry(), factory.logger());
    abandoned.finish(failedOutcome('timeout: run deadline of 10ms exceeded'));
    expect(abandoned.state).eq(EntryState.Failed);
  });

  it('should refuse illegal transitions', () => {
    const sut = new EntryRun(factory.testEntry({ name: 'beta' }), factory.logger());
    expect(() => sut.transition(EntryState.Running)).throws('Test "beta" cannot move from registered to running');
    expect(() => sut.finish(passedOutcome())).throws('Test "beta" cannot move from registered to passed');
  });
});
