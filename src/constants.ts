import { availableParallelism } from 'node:os';

// Configuration constants shared by every scraper
export const SCRAPING_CONFIG = {
  USER_AGENT: 'congress-bioguide/0.1 (+https://bioguideretro.congress.gov)',
  TIMEOUTS: {
    REQUEST: Number(process.env.REQUEST_TIMEOUT) || 30000,
  },
  MAX_REQUEST_ATTEMPTS: 3,
  MAX_CONCURRENT_REQUESTS: Number(process.env.MAX_CONCURRENT_REQUESTS) || availableParallelism(),
  OUTPUT_DIR: 'out',
  CACHE_MAX_AGE_HOURS: 24,
} as const;
