/**
 * Utility functions for the section planner crawler
 */

/**
 * Get integer config from environment variable
 */
export function getIntConfig(key: string): number | null {
  const value = process.env[key];
  if (value == null || value.trim() === '') return null;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    console.error(`Invalid integer config value provided for ${key}: ${value}`);
    return null;
  }
  return parsed;
}

/**
 * Get string config from environment variable
 */
export function getStringConfig(key: string): string | null {
  const value = process.env[key]?.trim();
  return value ? value : null;
}

/**
 * Get boolean config from environment variable ("true"/"1"/"yes" are true)
 */
export function getBooleanConfig(key: string): boolean | null {
  const value = getStringConfig(key);
  if (value == null) return null;
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

/**
 * Get comma-separated list config from environment variable
 */
export function getListConfig(key: string): string[] | null {
  const value = getStringConfig(key);
  if (value == null) return null;
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Collapse runs of whitespace (including non-breaking spaces) and trim
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export interface CourseInput {
  department: string;
  courseCode: string;
}

/**
 * Split user course input like "math 1a" into department and course code
 * @returns null when the input has no course code part
 */
export function parseCourseInput(input: string): CourseInput | null {
  const parts = input.trim().toUpperCase().split(/\s+/);
  if (parts.length < 2 || !parts[0]) return null;

  return {
    department: parts[0],
    courseCode: parts.slice(1).join(' ')
  };
}

/**
 * Term codes are letter(s) followed by a 4-digit year, e.g. "W2026"
 */
export function isValidTermCode(term: string): boolean {
  return /^[A-Z]+\d{4}$/.test(term);
}

/**
 * Get human-readable term name
 * @param term - e.g., "W2026", "SU2026"
 * @returns e.g., "Winter 2026"; unknown codes are returned unchanged
 */
export function getTermName(term: string): string {
  const match = term.match(/^([A-Z]+)(\d{4})$/);
  if (!match) return term;

  const seasons: Record<string, string> = {
    W: 'Winter',
    S: 'Spring',
    SP: 'Spring',
    F: 'Fall',
    SU: 'Summer',
    M: 'Summer'
  };

  const season = seasons[match[1]];
  return season ? `${season} ${match[2]}` : term;
}
