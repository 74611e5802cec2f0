import { GroupId, GroupReference, MockEnvironment, PartialSetupError } from '@condition-gate/api/harness';
import { Logger } from '@condition-gate/api/logging';
import { GateError } from '@condition-gate/util';

import { GroupSetupError } from '../errors.js';

/**
 * What the runner needs from a group, whatever the type of its handle.
 */
export interface GroupLifecycle extends GroupReference {
  readonly eager: boolean;
  /**
   * Starts a run in which `pendingEntries` entries of this group will complete.
   */
  begin(pendingEntries: number): void;
  /**
   * Makes sure the environment is set up. Only the first call runs `setup`, the others share its result.
   * Rejects with a `GroupSetupError` when setup failed.
   */
  acquire(): Promise<void>;
  /**
   * One entry of the group is done, whatever its outcome. The last one tears the environment down.
   */
  complete(): Promise<void>;
}

type Live<THandle> = { handle: THandle };

/**
 * One mock environment shared by the entries of a group: set up lazily by the first entry that needs it and
 * torn down once, after the last entry of the group completed.
 */
export class MockEnvironmentGroup<THandle> implements GroupLifecycle {
  private pending = 0;
  private setupTask: Promise<THandle> | undefined;
  private live: Live<THandle> | undefined;
  private partial: Live<THandle> | undefined;

  constructor(
    public readonly id: GroupId,
    private readonly environment: MockEnvironment<THandle>,
    private readonly log: Logger,
  ) {}

  public get eager(): boolean {
    return this.environment.eager ?? false;
  }

  /**
   * The handle returned by `setup`, for test bodies of the group.
   */
  public handle(): THandle {
    if (!this.live) {
      throw new GateError(`Mock environment of group "${this.id}" is not set up`);
    }
    return this.live.handle;
  }

  public begin(pendingEntries: number): void {
    if (this.pending > 0) {
      throw new GateError(`Group "${this.id}" is already part of a running run`);
    }
    this.pending = pendingEntries;
    this.setupTask = undefined;
    this.live = undefined;
    this.partial = undefined;
  }

  public async acquire(): Promise<void> {
    this.setupTask ??= this.setup();
    await this.setupTask;
  }

  public async complete(): Promise<void> {
    this.pending--;
    if (this.pending === 0) {
      await this.teardown();
    }
  }

  private async setup(): Promise<THandle> {
    this.log.debug('Setting up mock environment of group "%s"', this.id);
    try {
      const handle = await this.environment.setup();
      this.live = { handle };
      return handle;
    } catch (error) {
      this.log.error(`Setup of the mock environment of group "${this.id}" failed.`, error);
      if (error instanceof PartialSetupError) {
        this.partial = { handle: error.handle };
      }
      throw new GroupSetupError(this.id, error);
    }
  }

  private async teardown(): Promise<void> {
    if (!this.setupTask) {
      this.log.debug('Mock environment of group "%s" was never needed', this.id);
      return;
    }
    // A failed setup already reached the entries through acquire().
    await this.setupTask.catch(() => undefined);
    const target = this.live ?? this.partial;
    this.live = undefined;
    this.partial = undefined;
    this.setupTask = undefined;
    if (!target) {
      return;
    }
    this.log.debug('Tearing down mock environment of group "%s"', this.id);
    try {
      await this.environment.teardown(target.handle);
    } catch (error) {
      this.log.error(`Teardown of the mock environment of group "${this.id}" failed.`, error);
    }
  }
}
