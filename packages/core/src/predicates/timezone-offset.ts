import { TimezoneOffset } from '@condition-gate/api/predicates';

import { ConfigError } from '../errors.js';

import timezones from './timezones.json' with { type: 'json' };

const MIN_OFFSET_MINUTES = -12 * 60;
const MAX_OFFSET_MINUTES = 14 * 60;
const HOURS_PATTERN = /^[+-]?\d+(?:\.\d+)?$/;

const namedOffsets = new Map<string, number>(Object.entries(timezones.offsets));
const ambiguousNames = new Map<string, readonly string[]>(Object.entries(timezones.ambiguous));

/**
 * Parses `+8`, `-3.5`, `0` (hours east of UTC) or an abbreviation such as `CET` into minutes east of UTC.
 * Hours given as numbers are taken as they are.
 */
export function parseTimezoneOffset(value: string | number): TimezoneOffset {
  const text = String(value).trim();
  const name = text.toUpperCase();
  const named = namedOffsets.get(name);
  if (named !== undefined) {
    return Object.freeze({ minutes: named, text: name });
  }
  const alternatives = ambiguousNames.get(name);
  if (alternatives) {
    throw new ConfigError(`Timezone ${name} is ambiguous, use one of ${alternatives.join(', ')} instead`);
  }
  if (!HOURS_PATTERN.test(text)) {
    throw new ConfigError(`Timezone "${text}" is not a known abbreviation nor an offset in hours`);
  }
  const minutes = Number(text) * 60;
  if (!Number.isInteger(minutes) || minutes < MIN_OFFSET_MINUTES || minutes > MAX_OFFSET_MINUTES) {
    throw new ConfigError(`Timezone offset "${text}" should be whole minutes between -12 and +14 hours`);
  }
  return Object.freeze({ minutes, text });
}
