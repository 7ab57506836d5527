import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { HttpClient } from './http';
import { FetchError, InvalidPageError, toError } from './errors';
import { delay } from './utils';

export const LISTINGS_URL = 'https://www.deanza.edu/schedule/listings.html';

const MIN_PAGE_LENGTH = 100;

export interface FetcherOptions {
  listingsUrl?: string;
  maxRetries?: number;
  baseDelaySeconds?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Build the listings URL for a department and term
 * @param department - e.g., "MATH"
 * @param term - e.g., "W2026"
 */
export function buildListingsUrl(department: string, term: string, baseUrl: string = LISTINGS_URL): string {
  return `${baseUrl}?dept=${department}&t=${term}`;
}

/**
 * Check a listings response and parse it.
 * Throws when the page is not a usable listings page.
 */
export function validateListingsPage(status: number, statusText: string, body: string): CheerioAPI {
  if (status !== 200) {
    throw new InvalidPageError(`HTTP ${status}: ${statusText}`);
  }

  if (!body || body.length < MIN_PAGE_LENGTH) {
    throw new InvalidPageError('Received empty or invalid page content');
  }

  const pageLower = body.toLowerCase();
  if (pageLower.includes('cloudflare') && pageLower.includes('checking your browser')) {
    throw new InvalidPageError('Stuck on bot challenge page');
  }
  if (pageLower.includes('error') && pageLower.includes('403')) {
    throw new InvalidPageError('Access denied (403). The website may be blocking requests.');
  }

  const $ = cheerio.load(body);
  const title = $('title').first().text().trim();
  if (title && title.toLowerCase().includes('error')) {
    throw new InvalidPageError(`Error page detected: ${title}`);
  }

  return $;
}

/**
 * Fetches schedule listings pages, retrying on bad status, truncated bodies,
 * challenge interstitials and error pages.
 */
export class ListingsFetcher {
  private readonly listingsUrl: string;
  private readonly maxRetries: number;
  private readonly baseDelaySeconds: number;
  private readonly timeoutMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly client: HttpClient, options: FetcherOptions = {}) {
    this.listingsUrl = options.listingsUrl ?? LISTINGS_URL;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.baseDelaySeconds = options.baseDelaySeconds ?? 2;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Fetch the listings page for a department and term
   * @param department - Department code (e.g., "MATH")
   * @param term - Term code (e.g., "W2026")
   * @returns Parsed document of the listings page
   */
  async fetchListings(department: string, term: string): Promise<CheerioAPI> {
    const url = buildListingsUrl(department, term, this.listingsUrl);
    let lastError: Error = new Error('No attempts made');

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const response = await this.client.get(url, { timeoutMs: this.timeoutMs });
        const $ = validateListingsPage(response.status, response.statusText, response.data);
        console.log(`  ✓ Fetched listings for ${department} ${term} (attempt ${attempt + 1})`);
        return $;
      } catch (error) {
        lastError = toError(error);
        console.warn(`  ⚠️  Fetch attempt ${attempt + 1} failed: ${lastError.message}`);
      }

      if (attempt < this.maxRetries - 1) {
        const waitSeconds = (attempt + 1) * this.baseDelaySeconds;
        console.log(`    Waiting ${waitSeconds}s before retry...`);
        await this.sleep(waitSeconds * 1000);
      }
    }

    throw new FetchError(
      `Failed to fetch listings after ${this.maxRetries} attempts: ${lastError.message}`,
      this.maxRetries,
      lastError
    );
  }
}
