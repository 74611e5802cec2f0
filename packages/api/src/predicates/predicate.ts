export enum PredicateKind {
  EnvPresent = 'env-present',
  EnvAbsent = 'env-absent',
  FilePresent = 'file-present',
  PathPresent = 'path-present',
  HttpReachable = 'http-reachable',
  TcpReachable = 'tcp-reachable',
  IcmpReachable = 'icmp-reachable',
  IsUser = 'is-user',
  IsGroup = 'is-group',
  IsRoot = 'is-root',
  CpuCoreAtLeast = 'cpu-core-at-least',
  PhysicalCoreAtLeast = 'physical-core-at-least',
  MemAtLeast = 'mem-at-least',
  SwapAtLeast = 'swap-at-least',
  ExecutablePresent = 'executable-present',
  ExecutableAnyPresent = 'executable-any-present',
  TimezoneOffsetEquals = 'timezone-offset-equals',
  CustomIgnoreIf = 'custom-ignore-if',
}

export type HttpScheme = 'http' | 'https';

export interface SocketAddress {
  host: string;
  port: number;
}

export interface ByteQuantity {
  bytes: number;
  /**
   * The quantity as it was written, used in skip reasons.
   */
  text: string;
}

export interface TimezoneOffset {
  minutes: number;
  text: string;
}

/**
 * Returns a skip reason to ignore the entry, or nothing to let it run.
 */
export type IgnoreCheck = () => Promise<string | undefined | void> | string | undefined | void;

export interface EnvPresentPredicate {
  kind: PredicateKind.EnvPresent;
  names: readonly string[];
}

export interface EnvAbsentPredicate {
  kind: PredicateKind.EnvAbsent;
  names: readonly string[];
}

export interface FilePresentPredicate {
  kind: PredicateKind.FilePresent;
  paths: readonly string[];
}

export interface PathPresentPredicate {
  kind: PredicateKind.PathPresent;
  paths: readonly string[];
}

export interface HttpReachablePredicate {
  kind: PredicateKind.HttpReachable;
  scheme: HttpScheme;
  /**
   * Host with optional port and path, without the scheme, e.g. `127.0.0.1:8000/health`
   */
  targets: readonly string[];
}

export interface TcpReachablePredicate {
  kind: PredicateKind.TcpReachable;
  addresses: readonly SocketAddress[];
}

export interface IcmpReachablePredicate {
  kind: PredicateKind.IcmpReachable;
  hosts: readonly string[];
}

export interface IsUserPredicate {
  kind: PredicateKind.IsUser;
  user: string;
}

export interface IsGroupPredicate {
  kind: PredicateKind.IsGroup;
  group: string;
}

export interface IsRootPredicate {
  kind: PredicateKind.IsRoot;
}

export interface CpuCoreAtLeastPredicate {
  kind: PredicateKind.CpuCoreAtLeast;
  cores: number;
}

export interface PhysicalCoreAtLeastPredicate {
  kind: PredicateKind.PhysicalCoreAtLeast;
  cores: number;
}

export interface MemAtLeastPredicate {
  kind: PredicateKind.MemAtLeast;
  size: ByteQuantity;
}

export interface SwapAtLeastPredicate {
  kind: PredicateKind.SwapAtLeast;
  size: ByteQuantity;
}

export interface ExecutablePresentPredicate {
  kind: PredicateKind.ExecutablePresent;
  names: readonly string[];
}

export interface ExecutableAnyPresentPredicate {
  kind: PredicateKind.ExecutableAnyPresent;
  names: readonly string[];
}

export interface TimezoneOffsetEqualsPredicate {
  kind: PredicateKind.TimezoneOffsetEquals;
  /**
   * The local offset must equal one of these.
   */
  offsets: readonly TimezoneOffset[];
}

export interface CustomIgnoreIfPredicate {
  kind: PredicateKind.CustomIgnoreIf;
  check: IgnoreCheck;
}

export type Predicate =
  | CpuCoreAtLeastPredicate
  | CustomIgnoreIfPredicate
  | EnvAbsentPredicate
  | EnvPresentPredicate
  | ExecutableAnyPresentPredicate
  | ExecutablePresentPredicate
  | FilePresentPredicate
  | HttpReachablePredicate
  | IcmpReachablePredicate
  | IsGroupPredicate
  | IsRootPredicate
  | IsUserPredicate
  | MemAtLeastPredicate
  | PathPresentPredicate
  | PhysicalCoreAtLeastPredicate
  | SwapAtLeastPredicate
  | TcpReachablePredicate
  | TimezoneOffsetEqualsPredicate;
