import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import type { CourseSection, SectionFormat } from './types';
import { DAY_NAMES, TIME_RANGE_PATTERN } from './time';
import { normalizeText } from './utils';

export const CRN_PATTERN = /\b(\d{5})\b/;

const NAME_LAST_FIRST = /^([A-Z][a-z]+(?:-[A-Z][a-z]+)?),\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)$/;
const NAME_FIRST_LAST = /^[A-Z][a-z]+\s+[A-Z][a-z]+$/;
const NAME_FIRST_M_LAST = /^[A-Z][a-z]+\s+[A-Z]\.\s+[A-Z][a-z]+$/;
const NAME_IN_TEXT = /\b([A-Z][a-z]+,?\s+[A-Z][a-z]+)\b/g;
const DAYS_AND_TIME_IN_TEXT = /\b([MTWRFSU](?:[\s·]*[MTWRFSU])*)\s+(\d{1,2}:\d{2}\s*[AaPp][Mm]\s*-\s*\d{1,2}:\d{2}\s*[AaPp][Mm])/;
const PROFILE_LINK = /\/(directory|profile)\//i;

// Words that show up in capitalized listing cells but never in a name
const NOISE_WORDS = new Set([
  'view', 'footnote', 'footnotes', 'class', 'meets', 'campus', 'online', 'hybrid',
  'tba', 'tbd', 'am', 'pm', 'open', 'closed', 'full', 'wl', 'waitlist',
  'lecture', 'lab', 'section', 'room', 'math', 'calculus',
  'introduction', 'principles', 'fundamentals', 'equations', 'algebra', 'statistics',
  'programming', 'physics', 'chemistry', 'biology', 'seminar', 'topics',
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'
]);

function hasNoiseWord(text: string): boolean {
  return text
    .toLowerCase()
    .split(/[^a-z]+/)
    .some(word => NOISE_WORDS.has(word));
}

/**
 * Whether a cell's text looks like an instructor name
 */
export function looksLikeName(text: string): boolean {
  if (/\d/.test(text) || hasNoiseWord(text)) return false;

  if (NAME_LAST_FIRST.test(text) || NAME_FIRST_LAST.test(text) || NAME_FIRST_M_LAST.test(text)) {
    return true;
  }

  const words = text.split(/\s+/);
  return words.length >= 2 && words.length <= 4 && words.every(word => /^[A-Z]/.test(word));
}

/**
 * Text of a node with a space between every text fragment,
 * so "<b>12345</b>Clare" reads "12345 Clare"
 */
export function spacedText(node: AnyNode): string {
  const fragments: string[] = [];
  const walk = (current: AnyNode): void => {
    if (isText(current)) {
      fragments.push(current.data);
    } else if (hasChildren(current)) {
      current.children.forEach(walk);
    }
  };
  walk(node);
  return normalizeText(fragments.join(' '));
}

function detectRowFormat($: CheerioAPI, row: Cheerio<Element>, rowTextLower: string): SectionFormat {
  const hybridMarker = row
    .find('span')
    .filter((_, el) => /skittle.*hybrid/i.test($(el).attr('class') ?? ''));

  if (hybridMarker.length > 0 || rowTextLower.includes('hybrid')) return 'Hybrid';
  if (rowTextLower.includes('fully online') || rowTextLower.includes('online class')) return 'Online';
  if (rowTextLower.includes('fully on-campus') || rowTextLower.includes('on-campus')) return 'In-Person';
  if (rowTextLower.includes('online')) return 'Online';
  return 'Unknown';
}

/**
 * Column indexes whose header cell is a course title column
 */
function titleColumns($: CheerioAPI, row: Cheerio<Element>): Set<number> {
  const columns = new Set<number>();
  row
    .closest('table')
    .find('tr')
    .first()
    .children('th')
    .each((index, header) => {
      if (/\btitle\b/i.test($(header).text())) columns.add(index);
    });
  return columns;
}

/**
 * Extract one section from a listings table row, first match wins per field.
 * @param courseCode - Full course code, e.g. "MATH 1A"
 * @returns null when the row has no CRN
 */
export function extractSectionFromRow(
  $: CheerioAPI,
  rowElement: Element,
  courseCode: string
): CourseSection | null {
  const row = $(rowElement);
  const cells = row.children('td, th').toArray();
  const cellTexts = cells.map(cell => normalizeText($(cell).text()));
  const rowTextLower = cellTexts.join(' ').toLowerCase();
  const courseCodeUpper = courseCode.toUpperCase();
  const skipColumns = titleColumns($, row);

  let crn: string | null = null;
  let days: string | null = null;
  let time: string | null = null;
  let professor: string | null = null;

  for (let i = 0; i < cells.length; i++) {
    const $cell = $(cells[i]);
    const text = cellTexts[i];

    if (!crn) {
      const crnMatch = text.match(CRN_PATTERN);
      if (crnMatch) crn = crnMatch[1];
    }

    if (!days) {
      const daysText = $cell.find('.days').first().text().replace(/·/g, '');
      const letters = [...daysText].filter(letter => letter in DAY_NAMES);
      if (letters.length > 0) days = letters.join(' ');
    }

    if (!time) {
      if (TIME_RANGE_PATTERN.test(text)) {
        time = text;
      } else if (text.toUpperCase().includes('TBA')) {
        time = 'TBA';
      }
    }

    if (!professor) {
      const profileLink = $cell
        .find('a')
        .filter((_, a) => PROFILE_LINK.test($(a).attr('href') ?? ''))
        .first();

      if (profileLink.length > 0) {
        professor = normalizeText(profileLink.text()) || null;
      } else if (
        text &&
        crn &&
        !skipColumns.has(i) &&
        !text.includes(crn) &&
        !text.toUpperCase().includes(courseCodeUpper) &&
        looksLikeName(text)
      ) {
        professor = text;
      }
    }
  }

  if (!crn) return null;

  let classTime = 'TBA';
  if (time) {
    classTime = days ? `${days} ${time}` : time;
  }

  return {
    course: courseCode,
    crn,
    professor: professor ?? 'TBA',
    classTime,
    format: detectRowFormat($, row, rowTextLower)
  };
}

function findNameInText(text: string): string | null {
  const pattern = new RegExp(NAME_IN_TEXT.source, 'g');
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    if (!hasNoiseWord(match[1])) return match[1];
    // "Lecture Jordan Rivera": the second word may start the real name
    pattern.lastIndex = match.index + match[1].search(/\s/) + 1;
  }
  return null;
}

function findClassTimeInText(text: string): string | null {
  const withDays = text.match(DAYS_AND_TIME_IN_TEXT);
  if (withDays) {
    const days = [...withDays[1]].filter(letter => letter in DAY_NAMES).join(' ');
    return `${days} ${withDays[2]}`;
  }

  const timeOnly = text.match(TIME_RANGE_PATTERN);
  return timeOnly ? timeOnly[0] : null;
}

function detectTextFormat(text: string): SectionFormat {
  if (/\bhybrid\b/i.test(text)) return 'Hybrid';
  if (/\bonline\b/i.test(text)) return 'Online';
  if (/\bin-person\b|\bon-campus\b/i.test(text)) return 'In-Person';
  return 'Unknown';
}

/**
 * Regex-only extraction from an arbitrary element, for pages without a
 * recognizable table layout.
 * @returns null when neither a CRN nor a professor name was found
 */
export function extractSectionFromElement(element: Element, courseCode: string): CourseSection | null {
  const text = spacedText(element);

  const crnMatch = text.match(CRN_PATTERN);
  const crn = crnMatch ? crnMatch[1] : null;
  const professor = findNameInText(text);

  if (!crn && !professor) return null;

  return {
    course: courseCode,
    crn: crn ?? 'N/A',
    professor: professor ?? 'TBA',
    classTime: findClassTimeInText(text) ?? 'TBA',
    format: detectTextFormat(text)
  };
}
