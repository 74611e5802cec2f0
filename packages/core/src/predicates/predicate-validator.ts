import net from 'node:net';

import { Predicate, PredicateKind } from '@condition-gate/api/predicates';

import { ConfigError } from '../errors.js';

import { assertPort } from './socket-address.js';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Checks a predicate for well-formedness. Predicates created by the factories always pass,
 * this guards the ones written as plain objects.
 */
export function assertValidPredicate(predicate: Predicate): void {
  switch (predicate.kind) {
    case PredicateKind.EnvPresent:
    case PredicateKind.EnvAbsent:
      assertNames(predicate.kind, predicate.names, 'variable names');
      break;
    case PredicateKind.FilePresent:
    case PredicateKind.PathPresent:
      assertNames(predicate.kind, predicate.paths, 'paths');
      break;
    case PredicateKind.ExecutablePresent:
    case PredicateKind.ExecutableAnyPresent:
      assertNames(predicate.kind, predicate.names, 'executables');
      break;
    case PredicateKind.HttpReachable:
      if (predicate.scheme !== 'http' && predicate.scheme !== 'https') {
        throw invalid(predicate.kind, `scheme should be http or https, but was "${String(predicate.scheme)}"`);
      }
      assertNames(predicate.kind, predicate.targets, 'targets');
      predicate.targets.forEach((target) => assertHttpTarget(predicate.scheme, target));
      break;
    case PredicateKind.TcpReachable:
      if (!Array.isArray(predicate.addresses) || predicate.addresses.length === 0) {
        throw invalid(predicate.kind, 'at least one socket address is required');
      }
      predicate.addresses.forEach(({ host, port }) => {
        if (typeof host !== 'string' || host.trim() === '') {
          throw invalid(predicate.kind, 'host should not be empty');
        }
        assertPort(port, `${host}:${port}`);
      });
      break;
    case PredicateKind.IcmpReachable:
      assertNames(predicate.kind, predicate.hosts, 'ips');
      predicate.hosts.forEach((host) => {
        if (net.isIP(host) === 0) {
          throw invalid(predicate.kind, `"${host}" is not an ip address`);
        }
      });
      break;
    case PredicateKind.IsUser:
      assertName(predicate.kind, predicate.user, 'user name');
      break;
    case PredicateKind.IsGroup:
      assertName(predicate.kind, predicate.group, 'group name');
      break;
    case PredicateKind.IsRoot:
      break;
    case PredicateKind.CpuCoreAtLeast:
    case PredicateKind.PhysicalCoreAtLeast:
      if (!Number.isInteger(predicate.cores) || predicate.cores < 1) {
        throw invalid(predicate.kind, `core count should be a positive integer, but was ${predicate.cores}`);
      }
      break;
    case PredicateKind.MemAtLeast:
    case PredicateKind.SwapAtLeast:
      if (!Number.isFinite(predicate.size.bytes) || predicate.size.bytes < 0) {
        throw invalid(predicate.kind, `size should be a non-negative number of bytes, but was ${predicate.size.bytes}`);
      }
      break;
    case PredicateKind.TimezoneOffsetEquals:
      if (!Array.isArray(predicate.offsets) || predicate.offsets.length === 0) {
        throw invalid(predicate.kind, 'at least one timezone is required');
      }
      predicate.offsets.forEach(({ minutes, text }) => {
        if (!Number.isInteger(minutes) || minutes < -12 * 60 || minutes > 14 * 60) {
          throw invalid(predicate.kind, `offset "${text}" is out of range`);
        }
      });
      break;
    case PredicateKind.CustomIgnoreIf:
      if (typeof predicate.check !== 'function') {
        throw invalid(predicate.kind, 'check should be a function');
      }
      break;
    default:
      predicate satisfies never;
      throw new ConfigError(`Unknown predicate kind "${String(Reflect.get(predicate, 'kind'))}"`);
  }
}

function assertNames(kind: PredicateKind, names: readonly string[], what: string) {
  if (!Array.isArray(names) || names.length === 0) {
    throw invalid(kind, `at least one of ${what} is required`);
  }
  names.forEach((name) => assertName(kind, name, what));
}

function assertName(kind: PredicateKind, name: string, what: string) {
  if (typeof name !== 'string' || name.trim() === '') {
    throw invalid(kind, `${what} should not be empty`);
  }
}

function assertHttpTarget(scheme: string, target: string) {
  if (SCHEME_PATTERN.test(target)) {
    throw invalid(PredicateKind.HttpReachable, `target "${target}" should not contain a scheme`);
  }
  if (!URL.canParse(`${scheme}://${target}`)) {
    throw invalid(PredicateKind.HttpReachable, `target "${target}" is not a valid link`);
  }
}

function invalid(kind: PredicateKind, message: string): ConfigError {
  return new ConfigError(`Invalid ${kind} predicate: ${message}`);
}
