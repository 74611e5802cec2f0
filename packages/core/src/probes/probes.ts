export type PathKind = 'directory' | 'file' | 'other';

export interface UserIdentity {
  uid: number;
  username: string;
  /**
   * Names of the primary and supplementary groups of the effective user.
   */
  groups: readonly string[];
}

/**
 * Everything the predicates need to know about the host. Replaced by fakes in tests.
 */
export interface Probes {
  env(name: string): string | undefined;
  /**
   * Resolves `undefined` when nothing exists at the path.
   */
  stat(path: string): Promise<PathKind | undefined>;
  httpReachable(url: string, timeoutMs: number): Promise<boolean>;
  tcpReachable(host: string, port: number, timeoutMs: number): Promise<boolean>;
  icmpReachable(host: string, timeoutMs: number): Promise<boolean>;
  currentUser(): Promise<UserIdentity>;
  logicalCores(): number;
  physicalCores(): Promise<number>;
  totalMemory(): number;
  totalSwap(): Promise<number>;
  findExecutable(nameOrPath: string): Promise<boolean>;
  /**
   * Minutes east of UTC of the local timezone, right now.
   */
  utcOffsetMinutes(): number;
}
