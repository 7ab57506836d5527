import type { CourseSection, Rating } from './types';
import type { ListingsFetcher } from './fetcher';
import type { RatingResolver } from './ratings';
import { parseCourseListings } from './scraper';
import { parseClassTime } from './time';

export interface CourseSearchOptions {
  fetcher: ListingsFetcher;
  resolver?: RatingResolver;
  department: string;
  courseCode: string;
  term: string;
  withRatings?: boolean;
}

/**
 * Fetch the department listings and pull out one course's sections
 * @param department - e.g., "MATH"
 * @param courseCode - e.g., "1A"
 * @param term - e.g., "W2026"
 */
export async function searchCourse(
  fetcher: ListingsFetcher,
  department: string,
  courseCode: string,
  term: string
): Promise<CourseSection[]> {
  const $ = await fetcher.fetchListings(department, term);
  return parseCourseListings($, `${department} ${courseCode}`);
}

/**
 * Distinct professors in first-seen order, without "TBA"
 */
export function collectProfessors(sections: CourseSection[]): string[] {
  const professors: string[] = [];
  for (const section of sections) {
    if (section.professor !== 'TBA' && !professors.includes(section.professor)) {
      professors.push(section.professor);
    }
  }
  return professors;
}

/**
 * Look up each professor once, one request at a time, and attach the result.
 * A professor without a rating only leaves their own sections unrated.
 */
export async function attachRatings(
  sections: CourseSection[],
  resolver: RatingResolver
): Promise<CourseSection[]> {
  const professors = collectProfessors(sections);
  const ratings = new Map<string, Rating>();

  console.log(`  Fetching ratings for ${professors.length} professor(s)...`);
  for (const [i, professor] of professors.entries()) {
    const rating = await resolver.getProfessorRating(professor);
    if (rating) {
      ratings.set(professor, rating);
      console.log(`    [${i + 1}/${professors.length}] ✓ ${professor}: ${rating.rating ?? 'N/A'}/5.0`);
    } else {
      console.log(`    [${i + 1}/${professors.length}] ✗ ${professor}`);
    }
  }
  console.log(`  ✓ Rated ${ratings.size}/${professors.length} professor(s)`);

  return sections.map(section => {
    const rating = ratings.get(section.professor);
    return rating ? { ...section, ratings: rating } : { ...section };
  });
}

/**
 * Attach parsed time data wherever the class time parses
 */
export function attachTimeData(sections: CourseSection[]): CourseSection[] {
  return sections.map(section => {
    const timeData = parseClassTime(section.classTime);
    return timeData ? { ...section, timeData } : { ...section };
  });
}

/**
 * Best-rated first; unrated sections (no rating, or 0) last in their
 * original order
 */
export function sortByRating(sections: CourseSection[]): CourseSection[] {
  const score = (section: CourseSection): number => section.ratings?.rating ?? 0;

  return sections
    .map((section, index) => ({ section, index }))
    .sort((a, b) => {
      const aRated = score(a.section) > 0;
      const bRated = score(b.section) > 0;
      if (aRated !== bRated) return aRated ? -1 : 1;
      return score(b.section) - score(a.section) || a.index - b.index;
    })
    .map(({ section }) => section);
}

/**
 * Full search for one course: listings, ratings, time data, sorted by rating
 */
export async function runCourseSearch(options: CourseSearchOptions): Promise<CourseSection[]> {
  const { fetcher, resolver, department, courseCode, term, withRatings = true } = options;

  let sections = await searchCourse(fetcher, department, courseCode, term);
  if (sections.length === 0) return [];

  if (withRatings && resolver) {
    sections = await attachRatings(sections, resolver);
  }

  return sortByRating(attachTimeData(sections));
}
