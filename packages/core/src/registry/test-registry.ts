import {
  DEFAULT_LOCK_TIMEOUT_SECONDS,
  GroupId,
  LockSpec,
  MockEnvironment,
  TestDeclaration,
  TestEntry,
} from '@condition-gate/api/harness';
import { Logger } from '@condition-gate/api/logging';
import log4js from 'log4js';

import { GroupLifecycle, MockEnvironmentGroup } from '../environment/index.js';
import { ConfigError } from '../errors.js';
import { assertValidPredicate } from '../predicates/index.js';

/**
 * The named test entries of a run, in registration order. Entries are validated and frozen when added.
 */
export class TestRegistry {
  private readonly entryList: TestEntry[] = [];
  private readonly names = new Set<string>();
  private readonly groupMap = new Map<GroupId, GroupLifecycle>();

  constructor(private readonly log: Logger = log4js.getLogger(TestRegistry.name)) {}

  public get entries(): readonly TestEntry[] {
    return this.entryList;
  }

  public get groups(): ReadonlyMap<GroupId, GroupLifecycle> {
    return this.groupMap;
  }

  /**
   * Defines a group of entries sharing one mock environment. Use the returned group in declarations
   * and to read the environment's handle from test bodies.
   */
  public defineGroup<THandle>(id: GroupId, environment: MockEnvironment<THandle>): MockEnvironmentGroup<THandle> {
    if (typeof id !== 'string' || id.trim() === '') {
      throw new ConfigError('Group id should not be empty');
    }
    if (this.groupMap.has(id)) {
      throw new ConfigError(`Group "${id}" is already defined`);
    }
    if (typeof environment.setup !== 'function' || typeof environment.teardown !== 'function') {
      throw new ConfigError(`Mock environment of group "${id}" should have a setup and a teardown function`);
    }
    const group = new MockEnvironmentGroup(id, environment, log4js.getLogger(MockEnvironmentGroup.name));
    this.groupMap.set(id, group);
    return group;
  }

  public add(declaration: TestDeclaration): TestEntry {
    const { name, body } = declaration;
    if (typeof name !== 'string' || name.trim() === '') {
      throw new ConfigError('Test name should not be empty');
    }
    if (this.names.has(name)) {
      throw new ConfigError(`Test "${name}" is already registered`);
    }
    if (typeof body !== 'function') {
      throw new ConfigError(`Test "${name}" should have a body function`);
    }
    const predicates = Object.freeze([...(declaration.predicates ?? [])]);
    predicates.forEach((predicate) => {
      try {
        assertValidPredicate(predicate);
      } catch (error) {
        throw error instanceof ConfigError ? new ConfigError(`Test "${name}": ${error.message}`) : error;
      }
    });
    const entry: TestEntry = Object.freeze({
      index: this.entryList.length,
      name,
      predicates,
      lock: this.normalizeLock(name, declaration.lock),
      group: this.resolveGroup(name, declaration.group),
      body,
    });
    this.names.add(name);
    this.entryList.push(entry);
    this.log.debug('Registered test "%s"', name);
    return entry;
  }

  public groupOf(entry: TestEntry): GroupLifecycle | undefined {
    return entry.group === undefined ? undefined : this.groupMap.get(entry.group);
  }

  private normalizeLock(testName: string, lock: TestDeclaration['lock']): Readonly<LockSpec> | undefined {
    if (lock === undefined) {
      return undefined;
    }
    const spec = typeof lock === 'string' ? { name: lock } : lock;
    if (typeof spec.name !== 'string' || spec.name.trim() === '') {
      throw new ConfigError(`Test "${testName}": lock name should not be empty`);
    }
    const timeoutSeconds = spec.timeoutSeconds ?? DEFAULT_LOCK_TIMEOUT_SECONDS;
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new ConfigError(`Test "${testName}": lock timeout should be a positive number of seconds, but was ${timeoutSeconds}`);
    }
    return Object.freeze({ name: spec.name, timeoutSeconds });
  }

  private resolveGroup(testName: string, group: TestDeclaration['group']): GroupId | undefined {
    if (group === undefined) {
      return undefined;
    }
    const id = typeof group === 'string' ? group : group.id;
    if (!this.groupMap.has(id)) {
      throw new ConfigError(`Test "${testName}": group "${id}" is not defined`);
    }
    return id;
  }
}
