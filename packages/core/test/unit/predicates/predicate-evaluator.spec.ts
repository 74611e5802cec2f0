import { closedGate, openGate, PredicateKind } from '@condition-gate/api/predicates';
import { expect } from 'chai';
import sinon from 'sinon';

import { ConfigError, ProbeError } from '../../../src/errors.js';
import {
  cpuCoreAtLeast,
  envAbsent,
  envPresent,
  executableAnyPresent,
  executablePresent,
  filePresent,
  httpReachable,
  httpsReachable,
  icmpReachable,
  ignoreIf,
  isGroup,
  isRoot,
  isUser,
  memAtLeast,
  pathPresent,
  physicalCoreAtLeast,
  PredicateEvaluator,
  swapAtLeast,
  tcpReachable,
  timezoneOffsetEquals,
} from '../../../src/predicates/index.js';
import { factory, FakeProbes } from '../../helpers/index.js';

describe(PredicateEvaluator.name, () => {
  let probes: FakeProbes;
  let sut: PredicateEvaluator;

  beforeEach(() => {
    probes = new FakeProbes();
    sut = new PredicateEvaluator(probes, { probeTimeoutMs: 500 }, factory.logger());
  });

  describe('environment variables', () => {
    it('should open when every variable is set, even to an empty value', async () => {
      probes.environment.set('HOME', '/home/tester');
      probes.environment.set('EMPTY', '');
      expect(await sut.evaluate(envPresent('HOME', 'EMPTY'))).deep.eq(openGate());
    });

    it('should name the one missing variable', async () => {
      expect(await sut.evaluate(envPresent('NOTHING_DEFINED_XYZ'))).deep.eq(closedGate('because variable NOTHING_DEFINED_XYZ not found'));
    });

    it('should list every missing variable', async () => {
      probes.environment.set('B', '1');
      expect(await sut.evaluate(envPresent('A', 'B', 'C'))).deep.eq(closedGate('because following variables not found: A, C'));
    });

    it('should close an absent-check for variables that are set', async () => {
      probes.environment.set('CI', 'true');
      expect(await sut.evaluate(envAbsent('CI'))).deep.eq(closedGate('because variable CI was found'));
      expect(await sut.evaluate(envAbsent('LOCAL_ONLY'))).deep.eq(openGate());
    });
  });

  describe('files and paths', () => {
    beforeEach(() => {
      probes.paths.set('/etc/hostname', 'file');
      probes.paths.set('/var/lib', 'directory');
    });

    it('should require files not to be directories', async () => {
      expect(await sut.evaluate(filePresent('/etc/hostname'))).deep.eq(openGate());
      expect(await sut.evaluate(filePresent('/var/lib'))).deep.eq(closedGate('because file not found: /var/lib'));
    });

    it('should list every missing file', async () => {
      expect(await sut.evaluate(filePresent('/etc/hostname', '/no/such/file', '/no/other'))).deep.eq(
        closedGate('because following files not found: /no/such/file, /no/other'),
      );
    });

    it('should accept any kind of path for path predicates', async () => {
      expect(await sut.evaluate(pathPresent('/etc/hostname', '/var/lib'))).deep.eq(openGate());
      expect(await sut.evaluate(pathPresent('/no/such/dir'))).deep.eq(closedGate('because path not found: /no/such/dir'));
    });
  });

  describe('network', () => {
    it('should probe http targets with their scheme', async () => {
      probes.reachableUrls.add('https://example.test');
      expect(await sut.evaluate(httpsReachable('example.test'))).deep.eq(openGate());
      expect(await sut.evaluate(httpReachable('example.test'))).deep.eq(closedGate('because http://example.test did not respond'));
    });

    it('should pass the probe timeout to network probes', async () => {
      const tcpProbe = sinon.spy(probes, 'tcpReachable');
      await sut.evaluate(tcpReachable('localhost:5432'));
      sinon.assert.calledWithExactly(tcpProbe, 'localhost', 5432, 500);
    });

    it('should list every unreachable link', async () => {
      expect(await sut.evaluate(httpReachable('a.test', 'b.test/health'))).deep.eq(
        closedGate('because following links did not respond: http://a.test, http://b.test/health'),
      );
    });

    it('should name sockets that refused', async () => {
      probes.reachableSockets.add('localhost:80');
      expect(await sut.evaluate(tcpReachable('localhost'))).deep.eq(openGate());
      expect(await sut.evaluate(tcpReachable('localhost:81', '[::1]:82'))).deep.eq(
        closedGate('because following sockets failed to connect: localhost:81, [::1]:82'),
      );
      expect(await sut.evaluate(tcpReachable('localhost:81'))).deep.eq(closedGate('because failed to connect socket localhost:81'));
    });

    it('should name ips that did not answer', async () => {
      probes.reachableIps.add('127.0.0.1');
      expect(await sut.evaluate(icmpReachable('127.0.0.1'))).deep.eq(openGate());
      expect(await sut.evaluate(icmpReachable('10.0.0.1'))).deep.eq(closedGate('because ip 10.0.0.1 did not respond'));
      expect(await sut.evaluate(icmpReachable('10.0.0.1', '10.0.0.2'))).deep.eq(closedGate('because following ips did not respond: 10.0.0.1, 10.0.0.2'));
    });
  });

  describe('identity', () => {
    it('should compare the user name', async () => {
      expect(await sut.evaluate(isUser('tester'))).deep.eq(openGate());
      expect(await sut.evaluate(isUser('admin'))).deep.eq(closedGate('because this case should run with user admin'));
    });

    it('should look at every group of the user', async () => {
      expect(await sut.evaluate(isGroup('staff'))).deep.eq(openGate());
      expect(await sut.evaluate(isGroup('wheel'))).deep.eq(closedGate('because this case should run with a user in group wheel'));
    });

    it('should require uid 0 for root', async () => {
      expect(await sut.evaluate(isRoot())).deep.eq(closedGate('because this case should run with root'));
      probes.user = { uid: 0, username: 'root', groups: ['root'] };
      expect(await sut.evaluate(isRoot())).deep.eq(openGate());
    });
  });

  describe('resources', () => {
    it('should compare core counts', async () => {
      expect(await sut.evaluate(cpuCoreAtLeast(4))).deep.eq(openGate());
      expect(await sut.evaluate(cpuCoreAtLeast(100000))).deep.eq(closedGate('because the cpu cores are less than 100000'));
      expect(await sut.evaluate(physicalCoreAtLeast(3))).deep.eq(closedGate('because the physical cpu cores are less than 3'));
    });

    it('should compare memory and swap in bytes, reporting the size as written', async () => {
      expect(await sut.evaluate(memAtLeast('8GB'))).deep.eq(openGate());
      expect(await sut.evaluate(memAtLeast('8GiB'))).deep.eq(closedGate('because the memory is less than 8GiB'));
      expect(await sut.evaluate(swapAtLeast('3 GB'))).deep.eq(closedGate('because the swap is less than 3 GB'));
    });
  });

  describe('executables', () => {
    beforeEach(() => {
      probes.executables.add('git');
    });

    it('should require every executable', async () => {
      expect(await sut.evaluate(executablePresent('git'))).deep.eq(openGate());
      expect(await sut.evaluate(executablePresent('git', 'docker', 'kubectl'))).deep.eq(
        closedGate('because following executables not found: docker, kubectl'),
      );
      expect(await sut.evaluate(executablePresent('docker'))).deep.eq(closedGate('because executable not found: docker'));
    });

    it('should require any one executable for the any-of form', async () => {
      expect(await sut.evaluate(executableAnyPresent('docker', 'git'))).deep.eq(openGate());
      expect(await sut.evaluate(executableAnyPresent('docker', 'podman'))).deep.eq(closedGate('because none of executables can be found: docker || podman'));
    });
  });

  describe('timezone', () => {
    it('should open when the local offset is one of the offsets', async () => {
      expect(await sut.evaluate(timezoneOffsetEquals('+8', 'CET'))).deep.eq(openGate());
    });

    it('should list the offsets as written', async () => {
      probes.offsetMinutes = -300;
      expect(await sut.evaluate(timezoneOffsetEquals('+8', 'CET'))).deep.eq(
        closedGate('because the test case does not run in following timezones: +8, CET'),
      );
    });
  });

  describe('custom checks', () => {
    it('should use the returned reason verbatim', async () => {
      expect(await sut.evaluate(ignoreIf(() => 'because the staging database is down'))).deep.eq(closedGate('because the staging database is down'));
      expect(await sut.evaluate(ignoreIf(async () => undefined))).deep.eq(openGate());
    });
  });

  describe('probe failures', () => {
    it('should ignore with a diagnostic reason when a probe fails', async () => {
      sinon.stub(probes, 'totalSwap').rejects(new ProbeError('swap size is not available on aix'));
      expect(await sut.evaluate(swapAtLeast('1GB'))).deep.eq(closedGate(`because probe ${PredicateKind.SwapAtLeast} failed: swap size is not available on aix`));
    });

    it('should rethrow configuration errors raised by a probe', async () => {
      sinon.stub(probes, 'icmpReachable').rejects(new ConfigError('icmp probe of 10.0.0.1 is not permitted for this user'));
      await expect(sut.evaluate(icmpReachable('10.0.0.1'))).rejectedWith(ConfigError, 'not permitted');
    });
  });

  describe(PredicateEvaluator.prototype.evaluateAll.name, () => {
    it('should open for no predicates', async () => {
      expect(await sut.evaluateAll([])).deep.eq(openGate());
    });

    it('should stop at the first closed gate', async () => {
      const later = sinon.stub().returns(undefined);
      const result = await sut.evaluateAll([envPresent('MISSING_ONE'), envPresent('MISSING_TWO'), ignoreIf(later)]);
      expect(result).deep.eq(closedGate('because variable MISSING_ONE not found'));
      sinon.assert.notCalled(later);
    });

    it('should give the same result for the same environment', async () => {
      const predicates = [envPresent('HOME'), cpuCoreAtLeast(2)];
      expect(await sut.evaluateAll(predicates)).deep.eq(await sut.evaluateAll(predicates));
    });
  });
});
