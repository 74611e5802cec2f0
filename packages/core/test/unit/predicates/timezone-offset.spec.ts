import { expect } from 'chai';

import { ConfigError } from '../../../src/errors.js';
import { parseTimezoneOffset } from '../../../src/predicates/index.js';

describe(parseTimezoneOffset.name, () => {
  it('should parse signed hours', () => {
    expect(parseTimezoneOffset('+8')).deep.eq({ minutes: 480, text: '+8' });
    expect(parseTimezoneOffset('-5')).deep.eq({ minutes: -300, text: '-5' });
    expect(parseTimezoneOffset('0').minutes).eq(0);
  });

  it('should parse half hours', () => {
    expect(parseTimezoneOffset('5.5').minutes).eq(330);
    expect(parseTimezoneOffset('-3.5').minutes).eq(-210);
  });

  it('should take numbers as hours', () => {
    expect(parseTimezoneOffset(9)).deep.eq({ minutes: 540, text: '9' });
  });

  it('should parse known abbreviations, case-insensitive', () => {
    expect(parseTimezoneOffset('CET')).deep.eq({ minutes: 60, text: 'CET' });
    expect(parseTimezoneOffset('jst')).deep.eq({ minutes: 540, text: 'JST' });
    expect(parseTimezoneOffset('NZDT').minutes).eq(780);
    expect(parseTimezoneOffset('NST').minutes).eq(-210);
  });

  it('should reject ambiguous abbreviations, naming the alternatives', () => {
    expect(() => parseTimezoneOffset('PST')).throws(ConfigError, 'Timezone PST is ambiguous, use one of +8, -8 instead');
    expect(() => parseTimezoneOffset('IST')).throws(ConfigError, 'use one of +5.5, +2, +1 instead');
  });

  it('should reject offsets out of range', () => {
    expect(() => parseTimezoneOffset('+15')).throws(ConfigError, 'between -12 and +14 hours');
    expect(() => parseTimezoneOffset('-13')).throws(ConfigError);
  });

  it('should reject unknown names', () => {
    expect(() => parseTimezoneOffset('Mars/Olympus')).throws(ConfigError, 'Timezone "Mars/Olympus" is not a known abbreviation');
  });
});
