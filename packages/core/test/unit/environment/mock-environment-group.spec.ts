import { MockEnvironment, PartialSetupError } from '@condition-gate/api/harness';
import { expect } from 'chai';
import sinon from 'sinon';

import { MockEnvironmentGroup } from '../../../src/environment/index.js';
import { GroupSetupError } from '../../../src/errors.js';
import { factory } from '../../helpers/index.js';

interface FakeServer {
  port: number;
}

describe(MockEnvironmentGroup.name, () => {
  let setup: sinon.SinonStub<[], Promise<FakeServer>>;
  let teardown: sinon.SinonStub<[FakeServer], Promise<void>>;
  let environment: MockEnvironment<FakeServer>;
  let sut: MockEnvironmentGroup<FakeServer>;

  beforeEach(() => {
    setup = sinon.stub<[], Promise<FakeServer>>().resolves({ port: 8080 });
    teardown = sinon.stub<[FakeServer], Promise<void>>().resolves();
    environment = { setup, teardown };
    sut = new MockEnvironmentGroup('web', environment, factory.logger());
  });

  it('should set up once for concurrent acquirers', async () => {
    sut.begin(3);
    await Promise.all([sut.acquire(), sut.acquire(), sut.acquire()]);
    sinon.assert.calledOnce(setup);
    expect(sut.handle()).deep.eq({ port: 8080 });
  });

  it('should tear down with the handle once the last entry completed', async () => {
    sut.begin(2);
    await sut.acquire();
    await sut.complete();
    sinon.assert.notCalled(teardown);
    await sut.complete();
    sinon.assert.calledOnceWithExactly(teardown, { port: 8080 });
  });

  it('should count entries that never acquired', async () => {
    sut.begin(3);
    await sut.acquire();
    await sut.complete();
    await sut.complete();
    await sut.complete();
    sinon.assert.calledOnce(setup);
    sinon.assert.calledOnce(teardown);
  });

  it('should neither set up nor tear down when no entry needed the environment', async () => {
    sut.begin(2);
    await sut.complete();
    await sut.complete();
    sinon.assert.notCalled(setup);
    sinon.assert.notCalled(teardown);
  });

  it('should reject every acquirer with a GroupSetupError when setup fails', async () => {
    setup.rejects(new Error('port 8080 in use'));
    sut.begin(2);
    await expect(sut.acquire()).rejectedWith(GroupSetupError, 'setup of group "web" failed: port 8080 in use');
    await expect(sut.acquire()).rejectedWith(GroupSetupError);
    sinon.assert.calledOnce(setup);
    await sut.complete();
    await sut.complete();
    sinon.assert.notCalled(teardown);
  });

  it('should tear down the partial handle of a partial setup failure', async () => {
    setup.rejects(new PartialSetupError('database started, cache failed', { port: 5432 }));
    sut.begin(1);
    await expect(sut.acquire()).rejectedWith(GroupSetupError);
    await sut.complete();
    sinon.assert.calledOnceWithExactly(teardown, { port: 5432 });
  });

  it('should log setup failures with their inner error', async () => {
    const log = factory.logger();
    sut = new MockEnvironmentGroup('web', environment, log);
    const error = new PartialSetupError('database started, cache failed', { port: 5432 }, new Error('ECONNREFUSED'));
    setup.rejects(error);
    sut.begin(1);
    await expect(sut.acquire()).rejectedWith(GroupSetupError, 'setup of group "web" failed: database started, cache failed');
    sinon.assert.calledOnceWithExactly(log.error, 'Setup of the mock environment of group "web" failed.', error);
  });

  it('should log teardown failures', async () => {
    const log = factory.logger();
    sut = new MockEnvironmentGroup('web', environment, log);
    const error = new Error('already stopped');
    teardown.rejects(error);
    sut.begin(1);
    await sut.acquire();
    await sut.complete();
    sinon.assert.calledWithExactly(log.error, 'Teardown of the mock environment of group "web" failed.', error);
  });

  it('should only hand out the handle while the environment is live', async () => {
    sut.begin(1);
    expect(() => sut.handle()).throws('Mock environment of group "web" is not set up');
    await sut.acquire();
    await sut.complete();
    expect(() => sut.handle()).throws('Mock environment of group "web" is not set up');
  });

  it('should set up again in the next run', async () => {
    sut.begin(1);
    await sut.acquire();
    await sut.complete();
    sut.begin(1);
    await sut.acquire();
    await sut.complete();
    sinon.assert.calledTwice(setup);
    sinon.assert.calledTwice(teardown);
  });

  it('should default to a lazy environment', () => {
    expect(sut.eager).false;
    expect(new MockEnvironmentGroup('db', { ...environment, eager: true }, factory.logger()).eager).true;
  });
});
