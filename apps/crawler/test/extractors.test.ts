import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import { describe, expect, it } from 'vitest';
import {
  extractSectionFromElement,
  extractSectionFromRow,
  looksLikeName,
  spacedText
} from '../src/extractors';
import { readFixture } from './helpers';

function elements($: CheerioAPI, selector: string): Element[] {
  return $(selector).toArray().filter(isTag);
}

function firstElement(html: string, selector: string): Element {
  const element = elements(cheerio.load(html), selector)[0];
  if (!element) throw new Error(`No element matches ${selector}`);
  return element;
}

describe('looksLikeName', () => {
  it('accepts common name layouts', () => {
    expect(looksLikeName('Clare Nguyen')).toBe(true);
    expect(looksLikeName('Nguyen, Clare')).toBe(true);
    expect(looksLikeName('Clare M. Nguyen')).toBe(true);
    expect(looksLikeName('Mary Ann De Silva')).toBe(true);
  });

  it('rejects listing noise', () => {
    expect(looksLikeName('View Footnotes')).toBe(false);
    expect(looksLikeName('Room S43')).toBe(false);
    expect(looksLikeName('Calculus')).toBe(false);
    expect(looksLikeName('Fully Online')).toBe(false);
    expect(looksLikeName('staff')).toBe(false);
    expect(looksLikeName('Differential Equations')).toBe(false);
  });
});

describe('spacedText', () => {
  it('separates adjacent text fragments', () => {
    expect(spacedText(firstElement('<p><b>12345</b>Clare</p>', 'p'))).toBe('12345 Clare');
  });
});

describe('extractSectionFromRow', () => {
  const $ = cheerio.load(readFixture('listings-table.html'));
  const rows = elements($, 'tr');

  it('reads a row with a profile link and a days cell', () => {
    expect(extractSectionFromRow($, rows[1], 'MATH 1A')).toEqual({
      course: 'MATH 1A',
      crn: '12345',
      professor: 'Clare Nguyen',
      classTime: 'M T W R F 08:30 AM-09:20 AM',
      format: 'In-Person'
    });
  });

  it('falls back to a name-shaped cell and detects hybrid sections', () => {
    expect(extractSectionFromRow($, rows[2], 'MATH 1A')).toEqual({
      course: 'MATH 1A',
      crn: '23456',
      professor: 'Rivera, Jordan',
      classTime: 'T R 01:30 PM-03:20 PM',
      format: 'Hybrid'
    });
  });

  it('keeps TBA times and detects online sections', () => {
    expect(extractSectionFromRow($, rows[3], 'MATH 1A')).toEqual({
      course: 'MATH 1A',
      crn: '34567',
      professor: 'Morgan Lee',
      classTime: 'TBA',
      format: 'Online'
    });
  });

  it('does not take the title column for the instructor', () => {
    const html =
      '<table><tr><th>CRN</th><th>Course</th><th>Title</th><th>Instructor</th></tr>' +
      '<tr><td>12345</td><td>MATH 2B 01Y</td><td>Linear Spaces</td><td>Clare Nguyen</td></tr></table>';
    const row$ = cheerio.load(html);
    expect(extractSectionFromRow(row$, elements(row$, 'tr')[1], 'MATH 2B')).toEqual({
      course: 'MATH 2B',
      crn: '12345',
      professor: 'Clare Nguyen',
      classTime: 'TBA',
      format: 'Unknown'
    });
  });

  it('returns null for a row without a CRN', () => {
    expect(extractSectionFromRow($, rows[0], 'MATH 1A')).toBeNull();
  });

  it('defaults the professor to TBA', () => {
    const html = '<table><tr><td>56789</td><td>MATH 1A 03Y</td><td>View Footnotes</td></tr></table>';
    const row$ = cheerio.load(html);
    expect(extractSectionFromRow(row$, elements(row$, 'tr')[0], 'MATH 1A')).toEqual({
      course: 'MATH 1A',
      crn: '56789',
      professor: 'TBA',
      classTime: 'TBA',
      format: 'Unknown'
    });
  });
});

describe('extractSectionFromElement', () => {
  it('pulls CRN, name, days and time out of free text', () => {
    const element = firstElement(
      '<div class="listing"><b>34567</b>Clare Nguyen<span>M W 10:00 AM-11:50 AM</span><span>Online</span></div>',
      'div'
    );
    expect(extractSectionFromElement(element, 'MATH 1A')).toEqual({
      course: 'MATH 1A',
      crn: '34567',
      professor: 'Clare Nguyen',
      classTime: 'M W 10:00 AM-11:50 AM',
      format: 'Online'
    });
  });

  it('skips capitalized noise before the name', () => {
    const element = firstElement('<div>12345 Online Class Jordan Rivera</div>', 'div');
    expect(extractSectionFromElement(element, 'MATH 1A')?.professor).toBe('Jordan Rivera');
  });

  it('finds a name right after a capitalized noise word', () => {
    const element = firstElement('<div>45678 Lecture Jordan Rivera M W 09:00 AM-10:15 AM</div>', 'div');
    expect(extractSectionFromElement(element, 'MATH 1A')).toEqual({
      course: 'MATH 1A',
      crn: '45678',
      professor: 'Jordan Rivera',
      classTime: 'M W 09:00 AM-10:15 AM',
      format: 'Unknown'
    });
  });

  it('uses N/A when only a name is present', () => {
    const element = firstElement('<div>Staff listing for Morgan Lee</div>', 'div');
    expect(extractSectionFromElement(element, 'MATH 1A')).toEqual({
      course: 'MATH 1A',
      crn: 'N/A',
      professor: 'Morgan Lee',
      classTime: 'TBA',
      format: 'Unknown'
    });
  });

  it('returns null with neither CRN nor name', () => {
    expect(extractSectionFromElement(firstElement('<div>No sections available</div>', 'div'), 'MATH 1A')).toBeNull();
  });
});
