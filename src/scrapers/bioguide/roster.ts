import * as cheerio from 'cheerio';
import { BIOGUIDE_CONFIG } from './constants';

// Resolves relative hrefs so the query string can be read with URLSearchParams
const HREF_BASE = BIOGUIDE_CONFIG.URLS.ROOT;

function firstQueryValue(href: string): string | null {
  const url = new URL(href, HREF_BASE);
  for (const [, value] of url.searchParams) {
    return value;
  }
  return null;
}

/**
 * Bioguide IDs linked from one page of search results, in document order.
 */
export function extractBioguideIds(html: string): string[] {
  const $ = cheerio.load(html);
  const ids = new Set<string>();

  $(BIOGUIDE_CONFIG.SELECTORS.MEMBER_LINK).each((_, link) => {
    const href = $(link).attr('href');
    if (!href) return;

    const id = firstQueryValue(href)?.trim().toUpperCase();
    if (id) {
      ids.add(id);
    }
  });

  return [...ids];
}

/**
 * Last page number advertised by the pagination control. Results without
 * a pagination control fit on a single page.
 */
export function extractFinalPageNumber(html: string): number {
  const $ = cheerio.load(html);

  let link = $(BIOGUIDE_CONFIG.SELECTORS.FINAL_PAGE_LINK).first();
  if (link.length === 0) {
    const links = $(BIOGUIDE_CONFIG.SELECTORS.PAGE_LINK);
    if (links.length === 0) return 1;

    link = links.last();
    // The trailing link is a "next" arrow when the control has no skip-to-last entry
    if (link.text().trim() === '>' && links.length > 1) {
      link = links.eq(links.length - 2);
    }
  }

  const href = link.attr('href');
  if (!href) return 1;

  const page = Number.parseInt(new URL(href, HREF_BASE).searchParams.get('page') ?? '', 10);
  return Number.isInteger(page) && page > 0 ? page : 1;
}
