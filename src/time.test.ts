import { describe, expect, it } from 'vitest';
import { DAY_MS, addDays, formatTimeLeft, parseStoredTime, toStoredTime } from './time';

describe('parseStoredTime', () => {
  it('treats a timestamp without zone as UTC', () => {
    expect(parseStoredTime('2025-03-01 12:30:00').toISOString()).toBe('2025-03-01T12:30:00.000Z');
  });

  it('honours an explicit offset', () => {
    expect(parseStoredTime('2025-03-01T12:30:00+03:00').toISOString()).toBe('2025-03-01T09:30:00.000Z');
  });

  it.each([
    ['2025-01-01T12:00:00+0000', '2025-01-01T12:00:00.000Z'],
    ['2025-01-01T12:00:00+0300', '2025-01-01T09:00:00.000Z'],
    ['2025-01-01 12:00:00-0130', '2025-01-01T13:30:00.000Z'],
  ])('accepts the compact offset in %s', (value, expected) => {
    expect(parseStoredTime(value).toISOString()).toBe(expected);
  });

  it('reads a bare date as midnight UTC', () => {
    expect(parseStoredTime('2025-03-01').toISOString()).toBe('2025-03-01T00:00:00.000Z');
  });

  it('reads back what toStoredTime wrote', () => {
    const date = new Date('2025-06-15T08:00:00.123Z');
    expect(parseStoredTime(toStoredTime(date))).toEqual(date);
  });

  it('rejects garbage', () => {
    expect(() => parseStoredTime('not a date')).toThrow('Invalid stored timestamp: not a date');
  });
});

describe('formatTimeLeft', () => {
  const now = new Date('2025-01-01T00:00:00.000Z');
  const after = (ms: number) => new Date(now.getTime() + ms);

  it.each([
    [DAY_MS + 2 * 3600000 + 3 * 60000, '1 дн. 2 ч. 3 мин.'],
    [2 * 3600000 + 5 * 60000 + 7000, '2 ч. 5 мин. 7 сек.'],
    [90000, '1 мин. 30 сек.'],
    [1500, '2 сек.'],
  ])('formats %i ms as "%s"', (ms, expected) => {
    expect(formatTimeLeft(after(ms), now)).toBe(expected);
  });

  it('says the window is over at and after the expiry instant', () => {
    expect(formatTimeLeft(now, now)).toBe('истекло');
    expect(formatTimeLeft(after(-1), now)).toBe('истекло');
  });
});

describe('addDays', () => {
  it('adds whole days in milliseconds', () => {
    expect(addDays(new Date('2025-01-31T10:00:00.000Z'), 30).toISOString()).toBe('2025-03-02T10:00:00.000Z');
  });
});
