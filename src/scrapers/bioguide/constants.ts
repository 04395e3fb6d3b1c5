const BASE_URL = (process.env.BIOGUIDE_BASE_URL || 'https://bioguideretro.congress.gov').replace(
  /\/+$/,
  ''
);

// Configuration constants for Bioguide scraping
export const BIOGUIDE_CONFIG = {
  URLS: {
    BASE_URL,
    ROOT: `${BASE_URL}/`,
    SEARCH_RESULTS: `${BASE_URL}/Home/SearchResults`,
    MEMBER_XML: `${BASE_URL}/Static_Files/data`,
  },
  SELECTORS: {
    VERIFICATION_TOKEN: 'input[name="__RequestVerificationToken"]',
    MEMBER_LINK: 'div.row > div > a.red',
    FINAL_PAGE_LINK: 'ul.pagination > li.page-item.PagedList-skipToLast > a.page-link',
    PAGE_LINK: 'ul.pagination > li.page-item > a.page-link',
  },
  // Bioguide IDs are one capital letter followed by six digits
  BIOGUIDE_ID_LENGTH: 7,
  INDEX_PATH: process.env.BIOGUIDE_INDEX_PATH,
  // Member document retries wait 2s, 4s, ...
  BACKOFF_UNIT_MS: 2000,
  // Executive terms are listed alongside legislative ones in member documents
  EXCLUDED_POSITIONS: ['vice president', 'president'],
  // Congress 0 searches include members who went on to the presidency unless a position is given
  CONTINENTAL_CONGRESS_POSITIONS: ['ContCong', 'Delegate'],
} as const;
