import os from 'node:os';
import path from 'node:path';

import { GateOptions, PartialGateOptions, ReporterName } from '@condition-gate/api/core';
import { isLogLevel, LogLevel } from '@condition-gate/api/logging';
import { z, ZodIssue } from 'zod';

import { ConfigError } from '../errors.js';

// Largest delay a Node.js timer accepts.
const MAX_TIMER_MS = 2_147_483_647;
const REPORTER_NAMES: readonly ReporterName[] = Object.freeze(['clear-text', 'json']);
const LOG_LEVEL_EXPECTATION = `should be one of ${Object.values(LogLevel).join(', ')}`;

export const optionsEnvironmentVariables = Object.freeze({
  concurrency: 'CONDITION_GATE_CONCURRENCY',
  lockDirectory: 'CONDITION_GATE_LOCK_DIR',
  deadlineMs: 'CONDITION_GATE_DEADLINE_MS',
  logLevel: 'CONDITION_GATE_LOG_LEVEL',
} as const);

function integerBetween(min: number) {
  const expectation = `should be an integer between ${min} and ${MAX_TIMER_MS}`;
  return z.number().int(expectation).min(min, expectation).max(MAX_TIMER_MS, expectation);
}

const nonEmptyString = z.string().refine((value) => value.trim() !== '', 'should not be empty');

const logLevelSchema = z.custom<LogLevel>((value) => typeof value === 'string' && isLogLevel(value), LOG_LEVEL_EXPECTATION);

const reporterNameSchema = z.custom<ReporterName>(
  (value) => REPORTER_NAMES.some((name) => name === value),
  `should be one of ${REPORTER_NAMES.join(', ')}`,
);

export const gateOptionsSchema = z.object({
  concurrency: integerBetween(1),
  lockDirectory: nonEmptyString,
  lockPollIntervalMs: integerBetween(1),
  staleLockMs: integerBetween(0),
  probeTimeoutMs: integerBetween(1),
  deadlineMs: integerBetween(0),
  logLevel: logLevelSchema,
  reporters: z.array(reporterNameSchema),
  jsonReporter: z.object({ fileName: nonEmptyString }),
});

const environmentInteger = z
  .string()
  .regex(/^\d+$/, 'should be a non-negative integer')
  .transform((value) => Number(value));

const environmentSchema = z.object({
  [optionsEnvironmentVariables.concurrency]: environmentInteger.optional(),
  [optionsEnvironmentVariables.lockDirectory]: z.string().optional(),
  [optionsEnvironmentVariables.deadlineMs]: environmentInteger.optional(),
  [optionsEnvironmentVariables.logLevel]: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(logLevelSchema)
    .optional(),
});

export function defaultOptions(): GateOptions {
  return {
    concurrency: os.availableParallelism(),
    lockDirectory: path.join(os.tmpdir(), 'condition-gate-locks'),
    lockPollIntervalMs: 100,
    staleLockMs: 0,
    probeTimeoutMs: 3000,
    deadlineMs: 0,
    logLevel: LogLevel.Information,
    reporters: ['clear-text'],
    jsonReporter: { fileName: 'reports/condition-gate.json' },
  };
}

/**
 * Merges explicit options over environment variables over defaults, and validates the result.
 */
export function loadOptions(partial: PartialGateOptions = {}, env: NodeJS.ProcessEnv = process.env): GateOptions {
  const defaults = defaultOptions();
  const fromEnv = parseEnvironment(env);
  return validateOptions({
    concurrency: partial.concurrency ?? fromEnv.CONDITION_GATE_CONCURRENCY ?? defaults.concurrency,
    lockDirectory: partial.lockDirectory ?? fromEnv.CONDITION_GATE_LOCK_DIR ?? defaults.lockDirectory,
    lockPollIntervalMs: partial.lockPollIntervalMs ?? defaults.lockPollIntervalMs,
    staleLockMs: partial.staleLockMs ?? defaults.staleLockMs,
    probeTimeoutMs: partial.probeTimeoutMs ?? defaults.probeTimeoutMs,
    deadlineMs: partial.deadlineMs ?? fromEnv.CONDITION_GATE_DEADLINE_MS ?? defaults.deadlineMs,
    logLevel: partial.logLevel ?? fromEnv.CONDITION_GATE_LOG_LEVEL ?? defaults.logLevel,
    reporters: partial.reporters ?? defaults.reporters,
    jsonReporter: { ...defaults.jsonReporter, ...partial.jsonReporter },
  });
}

/**
 * Returns a frozen copy of the options, or throws a `ConfigError` naming the first invalid option.
 */
export function validateOptions(options: GateOptions): GateOptions {
  const validated = gateOptionsSchema.safeParse(options);
  if (!validated.success) {
    const [issue] = validated.error.issues;
    throw new ConfigError(`Config option "${issuePath(issue)}" ${issue.message}, but was ${formatValue(valueAt(options, issue.path))}.`);
  }
  return Object.freeze(validated.data);
}

function parseEnvironment(env: NodeJS.ProcessEnv) {
  // Unset and blank variables fall through to the defaults.
  const present: Record<string, string> = Object.fromEntries(
    Object.values(optionsEnvironmentVariables).flatMap((variable): Array<[string, string]> => {
      const value = env[variable]?.trim();
      return value ? [[variable, value]] : [];
    }),
  );
  const validated = environmentSchema.safeParse(present);
  if (!validated.success) {
    const [issue] = validated.error.issues;
    throw new ConfigError(`Environment variable ${issuePath(issue)} ${issue.message}, but was ${formatValue(valueAt(present, issue.path))}.`);
  }
  return validated.data;
}

function issuePath(issue: ZodIssue): string {
  return issue.path.map(String).join('.');
}

function valueAt(input: unknown, keys: ReadonlyArray<PropertyKey>): unknown {
  return keys.reduce<unknown>((current, key) => (typeof current === 'object' && current !== null ? Reflect.get(current, key) : undefined), input);
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}
