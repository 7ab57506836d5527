import * as fs from 'fs';
import * as path from 'path';
import type { Conflict, CourseSearchResult, RunData } from './types';
import { getTermName } from './utils';

export const OUTPUT_VERSION = 1;

/**
 * Builds and writes the JSON output of a crawl run
 */
export class ResultWriter {
  /**
   * Collect search results into the output document
   */
  buildRunData(term: string, results: CourseSearchResult[], conflicts: Conflict[]): RunData {
    const courses: RunData['courses'] = {};
    for (const result of results) {
      courses[result.course] = result.sections;
    }

    return {
      term,
      termName: getTermName(term),
      updatedAt: new Date().toISOString(),
      version: OUTPUT_VERSION,
      courses,
      conflicts
    };
  }

  /**
   * Write run data to {outputDir}/{term}.json
   * @returns Path of the written file
   */
  writeRunData(data: RunData, outputDir: string): string {
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
    }

    const filePath = path.join(outputDir, `${data.term}.json`);
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
    console.log(`✓ Wrote ${filePath}`);
    return filePath;
  }
}
