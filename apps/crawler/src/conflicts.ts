import type { Conflict, CourseSection, SectionRef, TimeInterval } from './types';
import { formatTimeRange } from './time';

function toRef(section: CourseSection): SectionRef {
  return {
    crn: section.crn,
    course: section.course,
    professor: section.professor
  };
}

/**
 * Days both intervals meet on, in the order of the first interval's days
 */
function sharedDays(a: TimeInterval, b: TimeInterval): string[] {
  const other = new Set(b.days);
  return [...new Set(a.days)].filter(day => other.has(day));
}

/**
 * Find every pair of sections that meet on a shared day at overlapping times.
 *
 * Intervals are half-open: a class ending at 10:00 and one starting at 10:00
 * do not conflict. Sections without parsed time data are skipped. Pairs come
 * out with i ascending, then j ascending.
 */
export function detectConflicts(sections: CourseSection[]): Conflict[] {
  const conflicts: Conflict[] = [];

  for (let i = 0; i < sections.length; i++) {
    const time1 = sections[i].timeData;
    if (!time1) continue;

    for (let j = i + 1; j < sections.length; j++) {
      const time2 = sections[j].timeData;
      if (!time2) continue;

      const days = sharedDays(time1, time2);
      if (days.length === 0) continue;

      if (time1.startMinutes < time2.endMinutes && time1.endMinutes > time2.startMinutes) {
        conflicts.push({
          course1: toRef(sections[i]),
          course2: toRef(sections[j]),
          conflictingDays: days,
          time1: formatTimeRange(time1),
          time2: formatTimeRange(time2)
        });
      }
    }
  }

  return conflicts;
}
