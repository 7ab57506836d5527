import type { CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode, Element, Text } from 'domhandler';
import type { CourseSection } from './types';
import { extractSectionFromElement, extractSectionFromRow } from './extractors';
import { normalizeText } from './utils';

/**
 * One way of finding a course's sections in a listings document.
 * Strategies return an empty list when they do not apply.
 */
export interface ExtractionStrategy {
  name: string;
  extract($: CheerioAPI, courseCode: string): CourseSection[];
}

function pushIfFound(sections: CourseSection[], section: CourseSection | null): void {
  if (section) sections.push(section);
}

function extractFromCandidate($: CheerioAPI, element: Element, courseCode: string): CourseSection | null {
  return element.name === 'tr'
    ? extractSectionFromRow($, element, courseCode)
    : extractSectionFromElement(element, courseCode);
}

/**
 * Rows of every table whose cell text mentions the course code
 */
export const tableRowsStrategy: ExtractionStrategy = {
  name: 'tables',
  extract($, courseCode) {
    const needle = courseCode.toUpperCase();
    const sections: CourseSection[] = [];

    $('table').each((_, table) => {
      $(table).find('tr').each((_, row) => {
        const cells = $(row).children('td, th').toArray();
        if (cells.length === 0) return;

        const rowText = cells.map(cell => normalizeText($(cell).text())).join(' ');
        if (!rowText.toUpperCase().includes(needle)) return;

        pushIfFound(sections, extractSectionFromRow($, row, courseCode));
      });
    });

    return sections;
  }
};

/**
 * Table-less layouts: blocks classed like course/section/listing,
 * or bare rows when nothing is classed that way
 */
export const classMatchedElementsStrategy: ExtractionStrategy = {
  name: 'class-matched elements',
  extract($, courseCode) {
    if ($('table').length > 0) return [];

    const needle = courseCode.toUpperCase();
    let candidates = $('div, tr')
      .filter((_, el) => /course|section|listing/i.test($(el).attr('class') ?? ''))
      .toArray();
    if (candidates.length === 0) {
      candidates = $('tr').toArray();
    }

    // Prefer the innermost block when listing wrappers nest
    const candidateSet = new Set(candidates);
    candidates = candidates.filter(
      el => !$(el).find('*').toArray().some(descendant => candidateSet.has(descendant))
    );

    const sections: CourseSection[] = [];
    for (const element of candidates) {
      if (!normalizeText($(element).text()).toUpperCase().includes(needle)) continue;
      pushIfFound(sections, extractFromCandidate($, element, courseCode));
    }
    return sections;
  }
};

function closestContainer(node: AnyNode): Element | null {
  let current = node.parent;
  while (current) {
    if (isTag(current) && ['tr', 'div', 'li'].includes(current.name)) return current;
    current = current.parent;
  }
  return null;
}

function collectTextNodes(node: AnyNode, out: Text[]): void {
  if (isText(node)) {
    out.push(node);
    return;
  }
  if (isTag(node) && (node.name === 'script' || node.name === 'style')) return;
  if (hasChildren(node)) {
    node.children.forEach(child => collectTextNodes(child, out));
  }
}

/**
 * Last resort: every text node mentioning the course code, extracted from its
 * nearest enclosing row, block or list item
 */
export const textSearchStrategy: ExtractionStrategy = {
  name: 'text search',
  extract($, courseCode) {
    const needle = courseCode.toUpperCase();
    const textNodes: Text[] = [];
    $.root().toArray().forEach(root => collectTextNodes(root, textNodes));

    const seen = new Set<Element>();
    const sections: CourseSection[] = [];
    for (const node of textNodes) {
      if (!normalizeText(node.data).toUpperCase().includes(needle)) continue;

      const container = closestContainer(node);
      if (!container || seen.has(container)) continue;
      seen.add(container);

      pushIfFound(sections, extractFromCandidate($, container, courseCode));
    }
    return sections;
  }
};

export const DEFAULT_STRATEGIES: ExtractionStrategy[] = [
  tableRowsStrategy,
  classMatchedElementsStrategy,
  textSearchStrategy
];

/**
 * Keep the first section per CRN. "N/A" sections are all kept.
 */
export function dedupeByCrn(sections: CourseSection[]): CourseSection[] {
  const seen = new Set<string>();
  return sections.filter(section => {
    if (section.crn === 'N/A') return true;
    if (seen.has(section.crn)) return false;
    seen.add(section.crn);
    return true;
  });
}

/**
 * Parse course sections for one course out of a listings document
 * @param courseCode - Full course code, e.g. "MATH 1A"
 * @returns Sections in document order; empty when the course is not listed
 */
export function parseCourseListings(
  $: CheerioAPI,
  courseCode: string,
  strategies: ExtractionStrategy[] = DEFAULT_STRATEGIES
): CourseSection[] {
  if (!normalizeText($.root().text()).toUpperCase().includes(courseCode.toUpperCase())) {
    console.warn(`  ⚠️  Course code '${courseCode}' not found in page text`);
  }

  for (const strategy of strategies) {
    const sections = strategy.extract($, courseCode);
    if (sections.length > 0) {
      const unique = dedupeByCrn(sections);
      console.log(`  ✓ Found ${unique.length} section(s) of ${courseCode} via ${strategy.name}`);
      return unique;
    }
  }

  console.log(`  ✗ No sections of ${courseCode} found`);
  return [];
}
