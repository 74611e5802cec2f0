import { ByteQuantity } from '@condition-gate/api/predicates';

import { ConfigError } from '../errors.js';

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*([a-z]*)$/i;

const unitMultipliers: ReadonlyMap<string, number> = new Map([
  ['', 1],
  ['b', 1],
  ['k', 1e3],
  ['kb', 1e3],
  ['m', 1e6],
  ['mb', 1e6],
  ['g', 1e9],
  ['gb', 1e9],
  ['t', 1e12],
  ['tb', 1e12],
  ['p', 1e15],
  ['pb', 1e15],
  ['kib', 1024],
  ['mib', 1024 ** 2],
  ['gib', 1024 ** 3],
  ['tib', 1024 ** 4],
  ['pib', 1024 ** 5],
]);

/**
 * Parses sizes like `512MB`, `1.5 GiB` or `100`. Decimal units are powers of 1000, binary units powers of 1024.
 * A plain number is a count of bytes.
 */
export function parseByteSize(value: string | number): ByteQuantity {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`Size ${value} should be a non-negative number of bytes`);
    }
    return Object.freeze({ bytes: Math.round(value), text: `${value} B` });
  }
  const text = value.trim();
  const match = SIZE_PATTERN.exec(text);
  const multiplier = match ? unitMultipliers.get(match[2].toLowerCase()) : undefined;
  if (!match || multiplier === undefined) {
    throw new ConfigError(`Size "${value}" is not correct, expected a number with an optional unit like 512MB or 2GiB`);
  }
  return Object.freeze({ bytes: Math.round(Number(match[1]) * multiplier), text });
}
