import fs, { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import { GateOptions } from '@condition-gate/api/core';
import { LockSpec } from '@condition-gate/api/harness';
import { Logger } from '@condition-gate/api/logging';
import { commonTokens, tokens } from '@condition-gate/api/plugin';
import { GateError, isErrnoException } from '@condition-gate/util';

import { LockTimeoutError } from '../errors.js';
import { Deadline } from '../runner/deadline.js';

export interface LockPayload {
  pid: number;
  createdAt: string;
  name: string;
}

export interface LockHandle {
  readonly name: string;
  readonly lockFile: string;
  release(): Promise<void>;
}

type FileLockOptions = Pick<GateOptions, 'lockDirectory' | 'lockPollIntervalMs' | 'staleLockMs'>;

/**
 * Injective and safe as a file name: everything `encodeURIComponent` leaves alone except `! ' ( ) * . ~` is
 * alphanumeric, `-` or `_`, and those are escaped too.
 */
export function encodeLockName(name: string): string {
  return encodeURIComponent(name).replace(/[!'()*.~]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * A named lock held by exclusively creating `<lockDirectory>/<encoded name>.lock`.
 * Works across processes on one host, as long as the lock directory is on a local file system.
 */
export class FileLock {
  public static inject = tokens(commonTokens.options, commonTokens.logger);

  constructor(
    private readonly options: FileLockOptions,
    private readonly log: Logger,
  ) {}

  public lockFileFor(name: string): string {
    return path.join(this.options.lockDirectory, `${encodeLockName(name)}.lock`);
  }

  /**
   * Polls until the lock is free. Rejects with a `LockTimeoutError` after the timeout of the lock spec
   * and with a `DeadlineExceededError` when the run deadline passes first.
   */
  public async acquire(lock: Readonly<LockSpec>, deadline?: Deadline): Promise<LockHandle> {
    const lockFile = this.lockFileFor(lock.name);
    await fs.mkdir(this.options.lockDirectory, { recursive: true });
    const startedAt = Date.now();
    const timeoutMs = lock.timeoutSeconds * 1000;
    let waiting = false;
    for (;;) {
      if (await this.tryCreate(lockFile, lock.name)) {
        this.log.debug('Acquired lock "%s"', lock.name);
        return this.createHandle(lock.name, lockFile);
      }
      if (await this.reclaimStale(lockFile, lock.name)) {
        continue;
      }
      if (deadline?.isExpired()) {
        throw deadline.error();
      }
      const elapsedMs = Date.now() - startedAt;
      if (elapsedMs >= timeoutMs) {
        throw new LockTimeoutError(lock, lockFile);
      }
      if (!waiting) {
        waiting = true;
        this.log.debug('Waiting for lock "%s" (%s)', lock.name, lockFile);
      }
      await delay(Math.min(this.options.lockPollIntervalMs, timeoutMs - elapsedMs, deadline?.remainingMs() ?? Number.POSITIVE_INFINITY));
    }
  }

  private async tryCreate(lockFile: string, name: string): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await fs.open(lockFile, 'wx');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return false;
      }
      throw new GateError(`Unable to create lock file ${lockFile}`, error);
    }
    try {
      const payload: LockPayload = { pid: process.pid, createdAt: new Date().toISOString(), name };
      await handle.writeFile(JSON.stringify(payload), 'utf8');
    } finally {
      await handle.close();
    }
    return true;
  }

  private createHandle(name: string, lockFile: string): LockHandle {
    let released = false;
    return {
      name,
      lockFile,
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        await fs.rm(lockFile, { force: true });
        this.log.debug('Released lock "%s"', name);
      },
    };
  }

  /**
   * Removes a lock file older than `staleLockMs`, left behind by a holder that crashed. Off when `staleLockMs` is 0.
   * Only the holder of `<lock file>.reclaim` removes a lock file it does not own, after inspecting it again,
   * so a fresh lock created since the first inspection is never removed.
   */
  private async reclaimStale(lockFile: string, name: string): Promise<boolean> {
    if (this.options.staleLockMs <= 0) {
      return false;
    }
    const inspected = await inspectLock(lockFile);
    if (!inspected) {
      // Released in the meantime, try again right away.
      return true;
    }
    if (!this.isStale(inspected)) {
      return false;
    }
    const guardFile = `${lockFile}.reclaim`;
    if (!(await this.tryCreate(guardFile, name))) {
      await this.removeStaleGuard(guardFile);
      return false;
    }
    try {
      const current = await inspectLock(lockFile);
      if (!current) {
        return true;
      }
      if (!this.isStale(current)) {
        return false;
      }
      this.log.warn('Removing stale lock file %s (held by pid %s since %s)', lockFile, current.pid ?? 'unknown', new Date(current.createdAt).toISOString());
      await fs.rm(lockFile, { force: true });
      return true;
    } finally {
      await fs.rm(guardFile, { force: true });
    }
  }

  /**
   * A guard outlives `staleLockMs` only when its holder crashed while reclaiming.
   */
  private async removeStaleGuard(guardFile: string): Promise<void> {
    const guard = await inspectLock(guardFile);
    if (guard && this.isStale(guard)) {
      this.log.warn('Removing stale reclaim guard %s', guardFile);
      await fs.rm(guardFile, { force: true });
    }
  }

  private isStale({ createdAt }: LockInspection): boolean {
    return Date.now() - createdAt > this.options.staleLockMs;
  }
}

interface LockInspection {
  createdAt: number;
  pid: number | undefined;
}

async function inspectLock(lockFile: string): Promise<LockInspection | undefined> {
  const payload = await readLockPayload(lockFile);
  const createdAt = payload ? Date.parse(payload.createdAt) : Number.NaN;
  if (Number.isFinite(createdAt)) {
    return { createdAt, pid: payload?.pid };
  }
  try {
    return { createdAt: (await fs.stat(lockFile)).mtimeMs, pid: payload?.pid };
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw new GateError(`Unable to inspect lock file ${lockFile}`, error);
  }
}

export async function readLockPayload(lockFile: string): Promise<LockPayload | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(lockFile, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw new GateError(`Unable to read lock file ${lockFile}`, error);
  }
  return parseLockPayload(raw);
}

function parseLockPayload(raw: string): LockPayload | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // Written but not filled yet.
    return undefined;
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'pid' in parsed &&
    typeof parsed.pid === 'number' &&
    'createdAt' in parsed &&
    typeof parsed.createdAt === 'string' &&
    'name' in parsed &&
    typeof parsed.name === 'string'
  ) {
    return { pid: parsed.pid, createdAt: parsed.createdAt, name: parsed.name };
  }
  return undefined;
}
