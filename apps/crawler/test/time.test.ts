import { describe, expect, it } from 'vitest';
import { formatTimeRange, parseClassTime, parseTimeToMinutes } from '../src/time';

describe('parseTimeToMinutes', () => {
  it('converts 12-hour clock times to minutes from midnight', () => {
    expect(parseTimeToMinutes('08:30 AM')).toBe(510);
    expect(parseTimeToMinutes('03:00 PM')).toBe(900);
    expect(parseTimeToMinutes('9:05am')).toBe(545);
  });

  it('handles noon and midnight', () => {
    expect(parseTimeToMinutes('12:00 PM')).toBe(720);
    expect(parseTimeToMinutes('12:15 AM')).toBe(15);
  });

  it('rejects out-of-range and malformed times', () => {
    expect(parseTimeToMinutes('13:00 PM')).toBeNull();
    expect(parseTimeToMinutes('0:30 AM')).toBeNull();
    expect(parseTimeToMinutes('12:60 PM')).toBeNull();
    expect(parseTimeToMinutes('noon')).toBeNull();
  });
});

describe('parseClassTime', () => {
  it('parses days and a time range', () => {
    expect(parseClassTime('M W 08:30 AM-10:45 AM')).toEqual({
      days: ['M', 'W'],
      dayNames: ['Monday', 'Wednesday'],
      startTime: '08:30 AM',
      endTime: '10:45 AM',
      startMinutes: 510,
      endMinutes: 645,
      durationMinutes: 135
    });
  });

  it('accepts glued day letters and times without a space before AM/PM', () => {
    const interval = parseClassTime('TR 01:30PM - 03:20PM');
    expect(interval?.days).toEqual(['T', 'R']);
    expect(interval?.dayNames).toEqual(['Tuesday', 'Thursday']);
    expect(interval?.startTime).toBe('01:30PM');
    expect(interval?.endTime).toBe('03:20PM');
    expect(interval?.durationMinutes).toBe(110);
  });

  it('returns null for TBA and empty input', () => {
    expect(parseClassTime('TBA')).toBeNull();
    expect(parseClassTime('  ')).toBeNull();
  });

  it('returns null without a leading day run', () => {
    expect(parseClassTime('08:30 AM-10:45 AM')).toBeNull();
  });

  it('returns null when the time range does not parse', () => {
    expect(parseClassTime('M W')).toBeNull();
    expect(parseClassTime('M W 13:00 PM-14:00 PM')).toBeNull();
  });

  it('keeps a negative duration when the range ends before it starts', () => {
    expect(parseClassTime('F 11:00 AM-10:00 AM')?.durationMinutes).toBe(-60);
  });
});

describe('formatTimeRange', () => {
  it('joins start and end with a spaced dash', () => {
    const interval = parseClassTime('M W 08:30 AM-10:45 AM');
    expect(interval && formatTimeRange(interval)).toBe('08:30 AM - 10:45 AM');
  });
});
