import asyncPool from 'tiny-async-pool';
import * as path from 'path';
import { ListingsFetcher } from './fetcher';
import { RatingResolver, DEFAULT_SCHOOL_ID } from './ratings';
import { createHttpClient } from './http';
import { runCourseSearch } from './search';
import { detectConflicts } from './conflicts';
import { ResultWriter } from './writer';
import { toError } from './errors';
import type { CourseSection, CourseSearchResult } from './types';
import {
  getBooleanConfig,
  getIntConfig,
  getListConfig,
  getStringConfig,
  getTermName,
  isValidTermCode,
  parseCourseInput
} from './utils';
import type { CourseInput } from './utils';

export * from './types';
export * from './time';
export * from './names';
export * from './conflicts';
export * from './extractors';
export * from './scraper';
export * from './fetcher';
export * from './ratings';
export * from './http';
export * from './errors';
export * from './search';
export * from './writer';
export * from './utils';

/**
 * Configuration from environment variables
 */
const COURSES = getListConfig('COURSES') ?? [];
const TERM = (getStringConfig('TERM') ?? 'W2026').toUpperCase();
const CONCURRENCY = getIntConfig('CONCURRENCY') ?? 2;
const MAX_RETRIES = getIntConfig('MAX_RETRIES') ?? 3;
const RETRY_DELAY_SECONDS = getIntConfig('RETRY_DELAY_SECONDS') ?? 2;
const REQUEST_TIMEOUT_MS = getIntConfig('REQUEST_TIMEOUT_MS') ?? 15000;
const SCHOOL_ID = getStringConfig('SCHOOL_ID') ?? DEFAULT_SCHOOL_ID;
const FETCH_RATINGS = getBooleanConfig('FETCH_RATINGS') ?? true;
const SELECTED_CRNS = getListConfig('SELECTED_CRNS') ?? [];
const OUTPUT_DIR = getStringConfig('OUTPUT_DIR') ?? path.join(__dirname, '..', 'data');

function logSection(section: CourseSection, index: number): void {
  console.log(`  Section ${index + 1}:`);
  console.log(`    CRN: ${section.crn}`);
  console.log(`    Professor: ${section.professor}`);

  const ratings = section.ratings;
  if (ratings?.rating !== undefined) {
    const count = ratings.numRatings ? ` (${ratings.numRatings} ratings)` : '';
    console.log(`    Rating: ${ratings.rating}/5.0${count}`);
  }
  if (ratings?.difficulty !== undefined) {
    console.log(`    Difficulty: ${ratings.difficulty}/5.0`);
  }

  console.log(`    Class Time: ${section.classTime}`);
  console.log(`    Format: ${section.format}`);
}

/**
 * Main entry point for the section planner crawler
 */
export async function main(): Promise<void> {
  console.log('🚀 Section Planner Crawler\n');
  console.log(`Configuration:`);
  console.log(`  - TERM: ${TERM}`);
  console.log(`  - CONCURRENCY: ${CONCURRENCY}`);
  console.log(`  - MAX_RETRIES: ${MAX_RETRIES}`);
  console.log(`  - FETCH_RATINGS: ${FETCH_RATINGS}`);
  console.log(`  - OUTPUT_DIR: ${OUTPUT_DIR}\n`);

  if (!isValidTermCode(TERM)) {
    throw new Error(`Invalid term format '${TERM}'. Use letter(s) followed by 4 digits, e.g. W2026`);
  }

  const courses: CourseInput[] = [];
  for (const input of COURSES) {
    const parsed = parseCourseInput(input);
    if (parsed) {
      courses.push(parsed);
    } else {
      console.warn(`⚠️  Skipping '${input}': use a format like 'MATH 1A'`);
    }
  }

  if (courses.length === 0) {
    console.error('❌ No courses to search. Set COURSES, e.g. COURSES="MATH 1A,PHYS 4B"');
    return;
  }

  const client = createHttpClient(REQUEST_TIMEOUT_MS);
  const fetcher = new ListingsFetcher(client, {
    maxRetries: MAX_RETRIES,
    baseDelaySeconds: RETRY_DELAY_SECONDS,
    timeoutMs: REQUEST_TIMEOUT_MS
  });
  const resolver = new RatingResolver(client, { schoolId: SCHOOL_ID, timeoutMs: REQUEST_TIMEOUT_MS });

  console.log(`📅 Searching ${courses.length} course(s) for ${getTermName(TERM)}...\n`);

  const results: CourseSearchResult[] = [];
  let failed = 0;

  const searches = asyncPool(CONCURRENCY, courses, async ({ department, courseCode }: CourseInput) => {
    const course = `${department} ${courseCode}`;
    try {
      const sections = await runCourseSearch({
        fetcher,
        resolver,
        department,
        courseCode,
        term: TERM,
        withRatings: FETCH_RATINGS
      });
      return { course, sections, error: null };
    } catch (error) {
      return { course, sections: [], error: toError(error) };
    }
  });

  for await (const result of searches) {
    if (result.error) {
      failed++;
      console.error(`\n❌ Failed to search ${result.course}: ${result.error.message}`);
      continue;
    }

    results.push({ course: result.course, sections: result.sections });
    console.log(`\n${'='.repeat(60)}`);
    if (result.sections.length === 0) {
      console.log(`No sections found for ${result.course} in ${TERM}.`);
      continue;
    }
    console.log(`${result.course}: ${result.sections.length} section(s), sorted by rating`);
    console.log('='.repeat(60));
    result.sections.forEach(logSection);
  }

  const allSections = results.flatMap(result => result.sections);
  const selected = SELECTED_CRNS.length > 0
    ? allSections.filter(section => SELECTED_CRNS.includes(section.crn))
    : [];
  const conflicts = detectConflicts(selected);

  if (SELECTED_CRNS.length > 0) {
    console.log(`\n🗓️  Checking ${selected.length} selected section(s) for conflicts...`);
    if (conflicts.length === 0) {
      console.log('  ✓ No conflicts');
    }
    for (const conflict of conflicts) {
      console.log(
        `  ⚠️  ${conflict.course1.course} (${conflict.course1.crn}) ${conflict.time1} overlaps ` +
        `${conflict.course2.course} (${conflict.course2.crn}) ${conflict.time2} on ${conflict.conflictingDays.join(' ')}`
      );
    }
  }

  const writer = new ResultWriter();
  writer.writeRunData(writer.buildRunData(TERM, results, conflicts), OUTPUT_DIR);

  console.log(`\n✨ Done: ${results.length} searched, ${failed} failed\n`);
}

// Run the crawler
if (require.main === module) {
  main().catch(error => {
    console.error('\n❌ Fatal error:', error);
    process.exit(1);
  });
}
