import { TARGET_TOKEN } from 'typed-inject';

export const commonTokens = Object.freeze({
  getLogger: 'getLogger',
  logger: 'logger',
  options: 'options',
  target: TARGET_TOKEN,
} as const);

export function tokens<TS extends string[]>(...tokens: TS): TS {
  return tokens;
}
