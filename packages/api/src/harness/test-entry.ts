import { Predicate } from '../predicates/index.js';

import { Outcome } from './outcome.js';

export const DEFAULT_LOCK_TIMEOUT_SECONDS = 60;

export type GroupId = string;

/**
 * Anything that identifies a group, usually the typed group returned when the group was defined.
 */
export interface GroupReference {
  readonly id: GroupId;
}

export interface LockSpec {
  /**
   * The mutual exclusion domain. Entries sharing a name never run at the same time, across processes too.
   */
  name: string;
  timeoutSeconds: number;
}

export interface TestContext {
  readonly name: string;
  readonly group?: GroupId;
}

/**
 * Completing normally means passed, throwing (or rejecting) means failed.
 * Returning an {@link Outcome} decides the result explicitly.
 */
export type TestBody = (context: TestContext) => Outcome | Promise<Outcome | void> | void;

export interface TestEntry {
  /**
   * Position in the registry, which is also the position in the report.
   */
  readonly index: number;
  readonly name: string;
  readonly predicates: readonly Predicate[];
  readonly lock?: Readonly<LockSpec>;
  readonly group?: GroupId;
  readonly body: TestBody;
}

export interface TestDeclaration {
  name: string;
  predicates?: readonly Predicate[];
  /**
   * A lock name, or a full lock spec. The timeout defaults to {@link DEFAULT_LOCK_TIMEOUT_SECONDS}.
   */
  lock?: Partial<LockSpec> | string;
  group?: GroupId | GroupReference;
  body: TestBody;
}
