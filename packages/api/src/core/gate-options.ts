import { LogLevel } from '../logging/index.js';

export type ReporterName = 'clear-text' | 'json';

export interface JsonReporterOptions {
  fileName: string;
}

export interface GateOptions {
  /**
   * Maximum number of entries executing at the same time.
   */
  concurrency: number;
  /**
   * Directory holding one file per held lock. Shared by every runner on the host that uses the same directory.
   */
  lockDirectory: string;
  lockPollIntervalMs: number;
  /**
   * Lock files older than this are considered orphaned and removed. 0 disables reclamation.
   */
  staleLockMs: number;
  /**
   * Upper bound for a single network probe (http, tcp, icmp).
   */
  probeTimeoutMs: number;
  /**
   * Global run deadline. Entries that did not start running before it passes fail with a timeout. 0 disables the deadline.
   */
  deadlineMs: number;
  logLevel: LogLevel;
  reporters: ReporterName[];
  jsonReporter: JsonReporterOptions;
}

export type PartialGateOptions = Partial<Omit<GateOptions, 'jsonReporter'>> & {
  jsonReporter?: Partial<JsonReporterOptions>;
};
