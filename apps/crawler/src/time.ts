import type { TimeInterval } from './types';

export const DAY_NAMES: Record<string, string> = {
  M: 'Monday',
  T: 'Tuesday',
  W: 'Wednesday',
  R: 'Thursday',
  F: 'Friday',
  S: 'Saturday',
  U: 'Sunday'
};

export const TIME_RANGE_PATTERN = /(\d{1,2}:\d{2}\s*[AP]M)\s*-\s*(\d{1,2}:\d{2}\s*[AP]M)/i;

/**
 * Parse "03:00 PM" -> 900 minutes from midnight (15 * 60)
 * @returns null for anything that is not a valid 12-hour clock time
 */
export function parseTimeToMinutes(timeStr: string): number | null {
  const match = timeStr.trim().match(/^(\d{1,2}):(\d{2})\s*(AM|PM)$/i);
  if (!match) return null;

  let hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours < 1 || hours > 12 || minutes > 59) return null;

  // Convert to 24-hour format
  const period = match[3].toUpperCase();
  if (period === 'PM' && hours !== 12) hours += 12;
  if (period === 'AM' && hours === 12) hours = 0;

  return hours * 60 + minutes;
}

/**
 * Parse a class time string into structured data.
 *
 * "M W 08:30 AM-10:45 AM" -> days [M, W], 510 - 645, 135 minutes.
 * Returns null for "TBA", a missing day run or a missing/invalid time range.
 * A range that ends before it starts still parses; duration is then negative.
 */
export function parseClassTime(classTime: string): TimeInterval | null {
  const text = classTime.trim();
  if (!text || text.toUpperCase() === 'TBA') return null;

  const daysMatch = text.match(/^([MTWRFSU\s]+)/);
  if (!daysMatch) return null;

  const days = [...daysMatch[1]].filter(letter => letter in DAY_NAMES);
  if (days.length === 0) return null;

  const timeMatch = text.match(TIME_RANGE_PATTERN);
  if (!timeMatch) return null;

  const startTime = timeMatch[1].trim();
  const endTime = timeMatch[2].trim();
  const startMinutes = parseTimeToMinutes(startTime);
  const endMinutes = parseTimeToMinutes(endTime);
  if (startMinutes === null || endMinutes === null) return null;

  return {
    days,
    dayNames: days.map(day => DAY_NAMES[day]),
    startTime,
    endTime,
    startMinutes,
    endMinutes,
    durationMinutes: endMinutes - startMinutes
  };
}

export function formatTimeRange(interval: TimeInterval): string {
  return `${interval.startTime} - ${interval.endTime}`;
}
