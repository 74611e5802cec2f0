import { GateOptions } from '@condition-gate/api/core';
import { Logger } from '@condition-gate/api/logging';
import { commonTokens, tokens } from '@condition-gate/api/plugin';
import { closedGate, GateResult, openGate, Predicate, PredicateKind } from '@condition-gate/api/predicates';
import { errorMessage } from '@condition-gate/util';

import { coreTokens } from '../di/core-tokens.js';
import { ConfigError } from '../errors.js';
import { Probes } from '../probes/index.js';

import { formatSocketAddress } from './socket-address.js';

/**
 * Evaluates predicates against the host probes. A closed gate is a normal result, not an error.
 */
export class PredicateEvaluator {
  public static inject = tokens(coreTokens.probes, commonTokens.options, commonTokens.logger);

  constructor(
    private readonly probes: Probes,
    private readonly options: Pick<GateOptions, 'probeTimeoutMs'>,
    private readonly log: Logger,
  ) {}

  /**
   * The conjunction of the predicates in declaration order. Stops at the first closed gate, its reason is the skip reason.
   */
  public async evaluateAll(predicates: readonly Predicate[]): Promise<GateResult> {
    for (const predicate of predicates) {
      const result = await this.evaluate(predicate);
      if (!result.gate) {
        return result;
      }
    }
    return openGate();
  }

  public async evaluate(predicate: Predicate): Promise<GateResult> {
    try {
      const result = await this.check(predicate);
      if (this.log.isTraceEnabled()) {
        this.log.trace('Predicate %s: %s', predicate.kind, result.gate ? 'open' : result.reason);
      }
      return result;
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      this.log.debug('Probe for predicate %s failed', predicate.kind, error);
      return closedGate(`because probe ${predicate.kind} failed: ${errorMessage(error)}`);
    }
  }

  private async check(predicate: Predicate): Promise<GateResult> {
    const timeoutMs = this.options.probeTimeoutMs;
    switch (predicate.kind) {
      case PredicateKind.EnvPresent:
        return missing(
          predicate.names.filter((name) => this.probes.env(name) === undefined),
          (name) => `variable ${name} not found`,
          'variables not found',
        );
      case PredicateKind.EnvAbsent:
        return missing(
          predicate.names.filter((name) => this.probes.env(name) !== undefined),
          (name) => `variable ${name} was found`,
          'variables were found',
        );
      case PredicateKind.FilePresent:
        return missing(
          await filterAsync(predicate.paths, async (path) => {
            const kind = await this.probes.stat(path);
            return kind === undefined || kind === 'directory';
          }),
          (path) => `file not found: ${path}`,
          'files not found',
        );
      case PredicateKind.PathPresent:
        return missing(
          await filterAsync(predicate.paths, async (path) => (await this.probes.stat(path)) === undefined),
          (path) => `path not found: ${path}`,
          'paths not found',
        );
      case PredicateKind.HttpReachable:
        return missing(
          await filterAsync(
            predicate.targets.map((target) => `${predicate.scheme}://${target}`),
            async (url) => !(await this.probes.httpReachable(url, timeoutMs)),
          ),
          (url) => `${url} did not respond`,
          'links did not respond',
        );
      case PredicateKind.TcpReachable:
        return missing(
          (await filterAsync(predicate.addresses, async ({ host, port }) => !(await this.probes.tcpReachable(host, port, timeoutMs)))).map(
            formatSocketAddress,
          ),
          (address) => `failed to connect socket ${address}`,
          'sockets failed to connect',
        );
      case PredicateKind.IcmpReachable:
        return missing(
          await filterAsync(predicate.hosts, async (host) => !(await this.probes.icmpReachable(host, timeoutMs))),
          (ip) => `ip ${ip} did not respond`,
          'ips did not respond',
        );
      case PredicateKind.IsUser: {
        const { username } = await this.probes.currentUser();
        return username === predicate.user ? openGate() : closedGate(`because this case should run with user ${predicate.user}`);
      }
      case PredicateKind.IsGroup: {
        const { groups } = await this.probes.currentUser();
        return groups.includes(predicate.group) ? openGate() : closedGate(`because this case should run with a user in group ${predicate.group}`);
      }
      case PredicateKind.IsRoot: {
        const { uid } = await this.probes.currentUser();
        return uid === 0 ? openGate() : closedGate('because this case should run with root');
      }
      case PredicateKind.CpuCoreAtLeast:
        return this.probes.logicalCores() >= predicate.cores ? openGate() : closedGate(`because the cpu cores are less than ${predicate.cores}`);
      case PredicateKind.PhysicalCoreAtLeast:
        return (await this.probes.physicalCores()) >= predicate.cores
          ? openGate()
          : closedGate(`because the physical cpu cores are less than ${predicate.cores}`);
      case PredicateKind.MemAtLeast:
        return this.probes.totalMemory() >= predicate.size.bytes ? openGate() : closedGate(`because the memory is less than ${predicate.size.text}`);
      case PredicateKind.SwapAtLeast:
        return (await this.probes.totalSwap()) >= predicate.size.bytes ? openGate() : closedGate(`because the swap is less than ${predicate.size.text}`);
      case PredicateKind.ExecutablePresent:
        return missing(
          await filterAsync(predicate.names, async (name) => !(await this.probes.findExecutable(name))),
          (name) => `executable not found: ${name}`,
          'executables not found',
        );
      case PredicateKind.ExecutableAnyPresent: {
        for (const name of predicate.names) {
          if (await this.probes.findExecutable(name)) {
            return openGate();
          }
        }
        return closedGate(`because none of executables can be found: ${predicate.names.join(' || ')}`);
      }
      case PredicateKind.TimezoneOffsetEquals: {
        const current = this.probes.utcOffsetMinutes();
        return predicate.offsets.some(({ minutes }) => minutes === current)
          ? openGate()
          : closedGate(`because the test case does not run in following timezones: ${predicate.offsets.map(({ text }) => text).join(', ')}`);
      }
      case PredicateKind.CustomIgnoreIf: {
        const reason = await predicate.check();
        return typeof reason === 'string' ? closedGate(reason) : openGate();
      }
    }
  }
}

function missing(names: readonly string[], one: (name: string) => string, several: string): GateResult {
  if (names.length === 0) {
    return openGate();
  }
  if (names.length === 1) {
    return closedGate(`because ${one(names[0])}`);
  }
  return closedGate(`because following ${several}: ${names.join(', ')}`);
}

/**
 * Runs the checks side by side, keeping declaration order in the result.
 */
async function filterAsync<T>(items: readonly T[], predicate: (item: T) => Promise<boolean>): Promise<T[]> {
  const matches = await Promise.all(items.map(predicate));
  return items.filter((_, index) => matches[index]);
}
