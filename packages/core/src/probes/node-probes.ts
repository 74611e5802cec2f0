import { execFile } from 'node:child_process';
import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';

import { Logger } from '@condition-gate/api/logging';
import { commonTokens, tokens } from '@condition-gate/api/plugin';
import { isErrnoException } from '@condition-gate/util';
import { request } from 'undici';

import { ConfigError, ProbeError } from '../errors.js';

import { PathKind, Probes, UserIdentity } from './probes.js';

const PRIVILEGE_ERROR_PATTERN = /operation not permitted|permission denied|must be root/i;
const SWAP_TOTAL_PATTERN = /^SwapTotal:\s+(\d+)\s*kB$/m;
const DARWIN_SWAP_PATTERN = /total\s*=\s*([\d.]+)M/;

interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Probes the host this process runs on.
 */
export class NodeProbes implements Probes {
  public static inject = tokens(commonTokens.logger);

  constructor(
    private readonly log: Logger,
    private readonly environment: NodeJS.ProcessEnv = process.env,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  public env(name: string): string | undefined {
    return this.environment[name];
  }

  public async stat(location: string): Promise<PathKind | undefined> {
    try {
      const stats = await fs.stat(location);
      if (stats.isDirectory()) {
        return 'directory';
      }
      return stats.isFile() ? 'file' : 'other';
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return undefined;
      }
      throw new ProbeError(`Unable to stat ${location}`, error);
    }
  }

  public async httpReachable(url: string, timeoutMs: number): Promise<boolean> {
    try {
      const { statusCode, body } = await request(url, {
        method: 'HEAD',
        headersTimeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
      });
      await body.dump();
      this.log.trace('HEAD %s responded with %d', url, statusCode);
      return true;
    } catch (error) {
      this.log.trace('HEAD %s got no response: %s', url, error);
      return false;
    }
  }

  public tcpReachable(host: string, port: number, timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const socket = net.createConnection({ host, port });
      let settled = false;
      const finish = (result: boolean) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.removeAllListeners();
        socket.destroy();
        resolve(result);
      };
      const timer = setTimeout(() => finish(false), timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('error', () => finish(false));
    });
  }

  /**
   * Sends a single echo request with the system `ping`, which holds the privileges raw sockets need.
   */
  public async icmpReachable(host: string, timeoutMs: number): Promise<boolean> {
    const seconds = String(Math.max(1, Math.ceil(timeoutMs / 1000)));
    const ipv6 = net.isIPv6(host);
    let command = 'ping';
    let args: string[];
    switch (this.platform) {
      case 'win32':
        args = ['-n', '1', '-w', String(timeoutMs), host];
        break;
      case 'darwin':
        command = ipv6 ? 'ping6' : 'ping';
        args = ipv6 ? ['-c', '1', host] : ['-c', '1', '-t', seconds, host];
        break;
      default:
        args = ['-c', '1', '-W', seconds, host];
    }
    const { exitCode, stdout, stderr } = await this.run(command, args, timeoutMs + 1000);
    if (exitCode !== 0 && PRIVILEGE_ERROR_PATTERN.test(stderr)) {
      throw new ConfigError(`icmp probe of ${host} is not permitted for this user: ${stderr.trim()}`);
    }
    this.log.trace('%s %s exited with %d: %s', command, args.join(' '), exitCode, stdout.trim());
    return exitCode === 0;
  }

  public async currentUser(): Promise<UserIdentity> {
    const info = os.userInfo();
    const uid = process.geteuid?.() ?? info.uid;
    return {
      uid,
      username: info.username,
      groups: await this.groupNames(info.username, process.getgroups?.() ?? [info.gid]),
    };
  }

  public logicalCores(): number {
    return os.availableParallelism();
  }

  public async physicalCores(): Promise<number> {
    if (this.platform === 'linux') {
      const cpuInfo = await this.readOptionalFile('/proc/cpuinfo');
      const cores = cpuInfo === undefined ? 0 : countPhysicalCores(cpuInfo);
      return cores > 0 ? cores : os.cpus().length;
    }
    if (this.platform === 'darwin') {
      const { exitCode, stdout } = await this.run('sysctl', ['-n', 'hw.physicalcpu']);
      const cores = Number.parseInt(stdout.trim(), 10);
      if (exitCode === 0 && cores > 0) {
        return cores;
      }
    }
    return os.cpus().length;
  }

  public totalMemory(): number {
    return os.totalmem();
  }

  public async totalSwap(): Promise<number> {
    if (this.platform === 'linux') {
      const memInfo = await this.readOptionalFile('/proc/meminfo');
      const match = memInfo === undefined ? null : SWAP_TOTAL_PATTERN.exec(memInfo);
      return match ? Number(match[1]) * 1024 : 0;
    }
    if (this.platform === 'darwin') {
      const { exitCode, stdout } = await this.run('sysctl', ['-n', 'vm.swapusage']);
      const match = DARWIN_SWAP_PATTERN.exec(stdout);
      if (exitCode === 0 && match) {
        return Math.round(Number(match[1]) * 1024 * 1024);
      }
    }
    throw new ProbeError(`swap size is not available on ${this.platform}`);
  }

  public async findExecutable(nameOrPath: string): Promise<boolean> {
    if (nameOrPath.includes('/') || nameOrPath.includes(path.sep)) {
      return this.isExecutable(nameOrPath);
    }
    const directories = (this.environment.PATH ?? '').split(path.delimiter).filter(Boolean);
    const extensions = this.platform === 'win32' ? this.windowsPathExtensions() : [''];
    for (const directory of directories) {
      for (const extension of extensions) {
        if (await this.isExecutable(path.join(directory, nameOrPath + extension))) {
          return true;
        }
      }
    }
    return false;
  }

  public utcOffsetMinutes(): number {
    return -new Date().getTimezoneOffset();
  }

  private async isExecutable(candidate: string): Promise<boolean> {
    try {
      const stats = await fs.stat(candidate);
      if (!stats.isFile()) {
        return false;
      }
      await fs.access(candidate, fsConstants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  private windowsPathExtensions(): string[] {
    const extensions = (this.environment.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean);
    return ['', ...extensions];
  }

  private async groupNames(username: string, groupIds: readonly number[]): Promise<string[]> {
    const groupFile = await this.readOptionalFile('/etc/group');
    const names = new Set<string>();
    for (const line of (groupFile ?? '').split('\n')) {
      const [name, , gid, members = ''] = line.trim().split(':');
      if (!name || gid === undefined) {
        continue;
      }
      if (groupIds.includes(Number(gid)) || members.split(',').includes(username)) {
        names.add(name);
      }
    }
    return [...names];
  }

  private async readOptionalFile(fileName: string): Promise<string | undefined> {
    try {
      return await fs.readFile(fileName, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw new ProbeError(`Unable to read ${fileName}`, error);
    }
  }

  private run(command: string, args: string[], timeoutMs = 5000): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve, reject) => {
      execFile(command, args, { timeout: timeoutMs, encoding: 'utf8' }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
        } else if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
        } else if (error.killed) {
          resolve({ exitCode: -1, stdout, stderr });
        } else {
          reject(new ProbeError(`Unable to run ${command}`, error));
        }
      });
    });
  }
}

/**
 * Counts distinct (physical id, core id) pairs of a Linux `/proc/cpuinfo`.
 */
export function countPhysicalCores(cpuInfo: string): number {
  const cores = new Set<string>();
  for (const block of cpuInfo.split(/\n\s*\n/)) {
    const physicalId = /^physical id\s*:\s*(\d+)/m.exec(block);
    const coreId = /^core id\s*:\s*(\d+)/m.exec(block);
    if (physicalId && coreId) {
      cores.add(`${physicalId[1]}:${coreId[1]}`);
    }
  }
  return cores.size;
}
