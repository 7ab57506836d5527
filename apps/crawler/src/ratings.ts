import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import type { Rating } from './types';
import type { HttpClient } from './http';
import { matchProfessorName } from './names';
import { toError } from './errors';

export const RATINGS_SEARCH_URL = 'https://www.ratemyprofessors.com/search/professors';
export const DEFAULT_SCHOOL_ID = '1967';

export interface RatingResolverOptions {
  searchUrl?: string;
  schoolId?: string;
  timeoutMs?: number;
}

/**
 * Build the ratings search URL for a professor at a school
 */
export function buildRatingsSearchUrl(
  professorName: string,
  schoolId: string = DEFAULT_SCHOOL_ID,
  searchUrl: string = RATINGS_SEARCH_URL
): string {
  return `${searchUrl}/${schoolId}?q=${encodeURIComponent(professorName)}`;
}

/**
 * "4.3" -> 4.3. Anything that is not a plain number in 0-5 is dropped.
 */
export function parseScore(text: string): number | undefined {
  const trimmed = text.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) return undefined;

  const value = parseFloat(trimmed);
  if (value < 0 || value > 5) return undefined;
  return Math.round(value * 10) / 10;
}

function parseCount(text: string): number | undefined {
  const match = text.match(/(\d+)/);
  return match ? parseInt(match[1], 10) : undefined;
}

function byClass(tag: string, fragment: string): string {
  return `${tag}[class*="${fragment}" i]`;
}

function ownText($: CheerioAPI, element: Element): string {
  return $(element)
    .contents()
    .toArray()
    .filter((node: AnyNode) => isText(node))
    .map(node => $(node).text())
    .join('')
    .trim();
}

function cardName($: CheerioAPI, card: Cheerio<Element>): string | null {
  const named = card.find(byClass('div', 'CardName')).first();
  if (named.length > 0) return named.text().trim();

  const fallback = card
    .find('div')
    .toArray()
    .map(div => ownText($, div))
    .find(text => /[A-Z]/i.test(text));
  return fallback ?? null;
}

function profileUrl(card: Cheerio<Element>, origin: string): string | undefined {
  const href = card.attr('href');
  if (!href) return undefined;
  if (href.startsWith('/professor/')) return `${origin}${href}`;
  if (href.startsWith('http')) return href;
  return undefined;
}

/**
 * Difficulty from labelled feedback items; falls back to any feedback number
 * whose parent mentions difficulty
 */
function findDifficulty<T extends AnyNode>(
  $: CheerioAPI,
  scope: Cheerio<T>,
  itemSelector: string,
  numberSelector: string
): number | undefined {
  for (const item of scope.find(itemSelector).toArray()) {
    if (!$(item).text().toLowerCase().includes('difficulty')) continue;
    const value = parseScore($(item).find(numberSelector).first().text());
    if (value !== undefined) return value;
  }

  for (const numberEl of scope.find(numberSelector).toArray()) {
    if (!$(numberEl).parent().text().toLowerCase().includes('difficulty')) continue;
    const value = parseScore($(numberEl).text());
    if (value !== undefined) return value;
  }

  return undefined;
}

function extractFromCard($: CheerioAPI, card: Cheerio<Element>): Rating {
  return {
    rating: parseScore(card.find(byClass('div', 'CardNumRating__CardNumRatingNumber')).first().text()),
    numRatings: parseCount(card.find(byClass('div', 'CardNumRating__CardNumRatingCount')).first().text()),
    difficulty: findDifficulty(
      $,
      card,
      byClass('div', 'CardFeedback__CardFeedbackItem'),
      byClass('div', 'CardFeedback__CardFeedbackNumber')
    )
  };
}

/**
 * Same three fields from the full profile page layout
 */
function extractFromProfilePage($: CheerioAPI): Rating {
  const root = $.root();
  const numberSelector = byClass('div', 'FeedbackItem__FeedbackNumber');

  let difficulty = findDifficulty(
    $,
    root,
    `${byClass('div', 'FeedbackItem__')}:not([class*="CardFeedback" i])`,
    numberSelector
  );
  if (difficulty === undefined) {
    // Difficulty is the second number on the profile page
    const numbers = root.find(numberSelector);
    if (numbers.length >= 2) difficulty = parseScore(numbers.eq(1).text());
  }

  return {
    rating: parseScore(root.find(byClass('div', 'RatingValue__Numerator')).first().text()),
    numRatings: parseCount(root.find('a[href="#ratingsList"]').first().text()),
    difficulty
  };
}

/**
 * Pick the result card for a professor out of a ratings search page and read
 * its scores.
 * @returns null when no card matches by first and last name, or nothing
 *          could be read from the matched card or the profile layout
 */
export function parseProfessorRating(
  html: string,
  professorName: string,
  origin: string = new URL(RATINGS_SEARCH_URL).origin
): Rating | null {
  const $ = cheerio.load(html);

  let cards: Element[] = $(byClass('a', 'TeacherCard')).toArray().filter(isTag);
  if (cards.length === 0) {
    cards = $('a[href*="/professor/" i]').toArray().filter(isTag);
  }
  if (cards.length === 0) {
    console.warn(`    ⚠️  No result cards found for '${professorName}'`);
    return null;
  }

  const match = cards.find(card => {
    const name = cardName($, $(card));
    return name !== null && matchProfessorName(professorName, name);
  });
  if (!match) {
    console.log(`    ✗ No exact match for '${professorName}'`);
    return null;
  }

  const card = $(match);
  const fromCard = extractFromCard($, card);
  const fromProfile = extractFromProfilePage($);

  const rating = fromCard.rating ?? fromProfile.rating;
  const numRatings = fromCard.numRatings ?? fromProfile.numRatings;
  const difficulty = fromCard.difficulty ?? fromProfile.difficulty;
  if (rating === undefined && numRatings === undefined && difficulty === undefined) {
    return null;
  }

  const result: Rating = {};
  if (rating !== undefined) result.rating = rating;
  if (numRatings !== undefined) result.numRatings = numRatings;
  if (difficulty !== undefined) result.difficulty = difficulty;
  const url = profileUrl(card, origin);
  if (url) result.url = url;
  return result;
}

/**
 * Looks up professor ratings. A miss or a failed request is "no rating",
 * never an error.
 */
export class RatingResolver {
  private readonly searchUrl: string;
  private readonly schoolId: string;
  private readonly timeoutMs: number;

  constructor(private readonly client: HttpClient, options: RatingResolverOptions = {}) {
    this.searchUrl = options.searchUrl ?? RATINGS_SEARCH_URL;
    this.schoolId = options.schoolId ?? DEFAULT_SCHOOL_ID;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async getProfessorRating(professorName: string): Promise<Rating | null> {
    const url = buildRatingsSearchUrl(professorName, this.schoolId, this.searchUrl);

    try {
      const response = await this.client.get(url, { timeoutMs: this.timeoutMs });
      if (response.status !== 200) {
        console.warn(`    ✗ HTTP ${response.status} for ${professorName}`);
        return null;
      }
      return parseProfessorRating(response.data, professorName, new URL(this.searchUrl).origin);
    } catch (error) {
      console.warn(`    ✗ Rating lookup failed for ${professorName}: ${toError(error).message}`);
      return null;
    }
  }
}
