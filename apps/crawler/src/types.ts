/**
 * Type definitions for the section planner crawler
 */

// ===== Course Sections =====

export type SectionFormat = 'Online' | 'Hybrid' | 'In-Person' | 'Unknown';

/**
 * One section of a course as extracted from the listings page.
 * `professor` and `classTime` fall back to "TBA", `format` to "Unknown".
 */
export interface CourseSection {
  course: string;                 // e.g., "MATH 1A"
  crn: string;                    // 5-digit CRN, or "N/A"
  professor: string;              // e.g., "Clare Nguyen"
  classTime: string;              // e.g., "M W 08:30 AM-10:45 AM"
  format: SectionFormat;
  timeData?: TimeInterval;
  ratings?: Rating;
}

/**
 * Parsed meeting pattern of a section
 */
export interface TimeInterval {
  days: string[];                 // e.g., ["M", "W"]
  dayNames: string[];             // e.g., ["Monday", "Wednesday"]
  startTime: string;              // e.g., "08:30 AM"
  endTime: string;                // e.g., "10:45 AM"
  startMinutes: number;           // minutes from midnight
  endMinutes: number;
  durationMinutes: number;        // endMinutes - startMinutes, not validated
}

// ===== Ratings =====

export interface Rating {
  rating?: number;                // 0-5, one decimal
  numRatings?: number;
  difficulty?: number;            // 0-5
  url?: string;                   // public profile page
}

// ===== Conflicts =====

export interface SectionRef {
  crn: string;
  course: string;
  professor: string;
}

export interface Conflict {
  course1: SectionRef;
  course2: SectionRef;
  conflictingDays: string[];
  time1: string;                  // e.g., "08:30 AM - 10:45 AM"
  time2: string;
}

// ===== Crawl Output =====

export interface CourseSearchResult {
  course: string;
  sections: CourseSection[];
}

export interface RunData {
  term: string;                   // e.g., "W2026"
  termName: string;               // e.g., "Winter 2026"
  updatedAt: string;
  version: number;
  courses: Record<string, CourseSection[]>;
  conflicts: Conflict[];
}
