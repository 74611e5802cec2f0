import {
  CpuCoreAtLeastPredicate,
  CustomIgnoreIfPredicate,
  EnvAbsentPredicate,
  EnvPresentPredicate,
  ExecutableAnyPresentPredicate,
  ExecutablePresentPredicate,
  FilePresentPredicate,
  HttpReachablePredicate,
  IcmpReachablePredicate,
  IgnoreCheck,
  IsGroupPredicate,
  IsRootPredicate,
  IsUserPredicate,
  MemAtLeastPredicate,
  PathPresentPredicate,
  PhysicalCoreAtLeastPredicate,
  Predicate,
  PredicateKind,
  SocketAddress,
  SwapAtLeastPredicate,
  TcpReachablePredicate,
  TimezoneOffsetEqualsPredicate,
} from '@condition-gate/api/predicates';

import { parseByteSize } from './byte-size.js';
import { assertValidPredicate } from './predicate-validator.js';
import { parseSocketAddress } from './socket-address.js';
import { parseTimezoneOffset } from './timezone-offset.js';

function create<T extends Predicate>(predicate: T): Readonly<T> {
  assertValidPredicate(predicate);
  return Object.freeze(predicate);
}

/** Runs only when every variable is set, an empty value counts as set. */
export function envPresent(...names: string[]): Readonly<EnvPresentPredicate> {
  return create({ kind: PredicateKind.EnvPresent, names: Object.freeze([...names]) });
}

export function envAbsent(...names: string[]): Readonly<EnvAbsentPredicate> {
  return create({ kind: PredicateKind.EnvAbsent, names: Object.freeze([...names]) });
}

/** Runs only when every path exists and is not a directory. */
export function filePresent(...paths: string[]): Readonly<FilePresentPredicate> {
  return create({ kind: PredicateKind.FilePresent, paths: Object.freeze([...paths]) });
}

export function pathPresent(...paths: string[]): Readonly<PathPresentPredicate> {
  return create({ kind: PredicateKind.PathPresent, paths: Object.freeze([...paths]) });
}

/**
 * Runs only when a HEAD request to every target gets a response, whatever its status.
 * @param targets host, optional port and path, e.g. `localhost:8080/health`
 */
export function httpReachable(...targets: string[]): Readonly<HttpReachablePredicate> {
  return create({ kind: PredicateKind.HttpReachable, scheme: 'http', targets: Object.freeze([...targets]) });
}

export function httpsReachable(...targets: string[]): Readonly<HttpReachablePredicate> {
  return create({ kind: PredicateKind.HttpReachable, scheme: 'https', targets: Object.freeze([...targets]) });
}

/**
 * @param addresses `host:port` strings (port 80 when left out) or socket addresses
 */
export function tcpReachable(...addresses: Array<SocketAddress | string>): Readonly<TcpReachablePredicate> {
  return create({
    kind: PredicateKind.TcpReachable,
    addresses: Object.freeze(addresses.map((address) => (typeof address === 'string' ? parseSocketAddress(address) : Object.freeze({ ...address })))),
  });
}

/** IP literals only, host names are rejected. */
export function icmpReachable(...ips: string[]): Readonly<IcmpReachablePredicate> {
  return create({ kind: PredicateKind.IcmpReachable, hosts: Object.freeze(ips.map((ip) => ip.trim())) });
}

export function isUser(user: string): Readonly<IsUserPredicate> {
  return create({ kind: PredicateKind.IsUser, user });
}

export function isGroup(group: string): Readonly<IsGroupPredicate> {
  return create({ kind: PredicateKind.IsGroup, group });
}

export function isRoot(): Readonly<IsRootPredicate> {
  return create({ kind: PredicateKind.IsRoot });
}

export function cpuCoreAtLeast(cores: number): Readonly<CpuCoreAtLeastPredicate> {
  return create({ kind: PredicateKind.CpuCoreAtLeast, cores });
}

export function physicalCoreAtLeast(cores: number): Readonly<PhysicalCoreAtLeastPredicate> {
  return create({ kind: PredicateKind.PhysicalCoreAtLeast, cores });
}

/**
 * @param size a size like `16GB` or `2 GiB`, or a number of bytes
 */
export function memAtLeast(size: number | string): Readonly<MemAtLeastPredicate> {
  return create({ kind: PredicateKind.MemAtLeast, size: parseByteSize(size) });
}

export function swapAtLeast(size: number | string): Readonly<SwapAtLeastPredicate> {
  return create({ kind: PredicateKind.SwapAtLeast, size: parseByteSize(size) });
}

/** Runs only when every executable is found on the PATH. Names containing a path separator are checked directly. */
export function executablePresent(...names: string[]): Readonly<ExecutablePresentPredicate> {
  return create({ kind: PredicateKind.ExecutablePresent, names: Object.freeze([...names]) });
}

export function executableAnyPresent(...names: string[]): Readonly<ExecutableAnyPresentPredicate> {
  return create({ kind: PredicateKind.ExecutableAnyPresent, names: Object.freeze([...names]) });
}

/**
 * @param timezones offsets in hours east of UTC (`+8`, `-3.5`, `0`) or abbreviations (`CET`, `JST`)
 */
export function timezoneOffsetEquals(...timezones: Array<number | string>): Readonly<TimezoneOffsetEqualsPredicate> {
  return create({ kind: PredicateKind.TimezoneOffsetEquals, offsets: Object.freeze(timezones.map(parseTimezoneOffset)) });
}

/**
 * Ignores the entry with the returned reason. Returning nothing lets it run.
 */
export function ignoreIf(check: IgnoreCheck): Readonly<CustomIgnoreIfPredicate> {
  return create({ kind: PredicateKind.CustomIgnoreIf, check });
}
