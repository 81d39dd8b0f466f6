/**
 * Quartz Cron Tests
 */

import { describe, it, expect } from 'vitest';
import { parseQuartzCron, isValidQuartzCron } from '../quartz.js';

describe('parseQuartzCron', () => {
  it('parses a daily seconds-first expression', () => {
    expect(parseQuartzCron('00 00 03 * * ?')).toEqual({
      seconds: '00',
      minutes: '00',
      hours: '03',
      dayOfMonth: '*',
      month: '*',
      dayOfWeek: '?',
    });
  });

  it('parses the optional year field', () => {
    expect(parseQuartzCron('0 15 10 ? * MON-FRI 2030')).toEqual({
      seconds: '0',
      minutes: '15',
      hours: '10',
      dayOfMonth: '?',
      month: '*',
      dayOfWeek: 'MON-FRI',
      year: '2030',
    });
  });

  it('tolerates surrounding and repeated whitespace', () => {
    expect(parseQuartzCron('  0  0/5 *  * * ? ')?.minutes).toBe('0/5');
  });

  it('rejects classic five-field expressions', () => {
    expect(parseQuartzCron('0 3 * * *')).toBeNull();
  });

  it('rejects too many fields', () => {
    expect(parseQuartzCron('0 0 3 * * ? 2030 extra')).toBeNull();
  });

  it('rejects out-of-range values', () => {
    expect(parseQuartzCron('60 0 3 * * ?')).toBeNull();
    expect(parseQuartzCron('0 0 24 * * ?')).toBeNull();
    expect(parseQuartzCron('0 0 3 32 * ?')).toBeNull();
    expect(parseQuartzCron('0 0 3 ? 13 *')).toBeNull();
    expect(parseQuartzCron('0 0 3 ? * 8')).toBeNull();
  });

  it('requires exactly one unspecified day field', () => {
    expect(parseQuartzCron('0 0 3 * * *')).toBeNull();
    expect(parseQuartzCron('0 0 3 ? * ?')).toBeNull();
    expect(parseQuartzCron('0 0 3 1 * MON')).toBeNull();
  });

  it('rejects zero and malformed steps', () => {
    expect(parseQuartzCron('0 */0 * * * ?')).toBeNull();
    expect(parseQuartzCron('0 1/2/3 * * * ?')).toBeNull();
  });
});

describe('isValidQuartzCron', () => {
  it.each([
    '0 0 12 * * ?',
    '0 0/5 14,18 * * ?',
    '0 10,44 14 ? 3 WED',
    '0 15 10 L * ?',
    '0 15 10 L-2 * ?',
    '0 15 10 15W * ?',
    '0 15 10 ? * 6L',
    '0 15 10 ? * 6#3',
    '0 15 10 ? * FRI#2',
    '0 0 0 ? JAN-MAR SUN',
  ])('accepts %s', expression => {
    expect(isValidQuartzCron(expression)).toBe(true);
  });

  it.each([
    '',
    'not a cron',
    '0 0 12 * * ? 1969',
    '0 15 10 ? * 6#6',
    '0 15 10 ? * 9L',
    '0 0 1-2-3 * * ?',
  ])('rejects %s', expression => {
    expect(isValidQuartzCron(expression)).toBe(false);
  });
});
