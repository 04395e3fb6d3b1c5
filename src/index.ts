#!/usr/bin/env node
import { z } from 'zod';
import { getCacheInfo, saveData, shouldUseCachedData } from './cache';
import { normalizeCongress } from './congress/calendar';
import { CongressScraper } from './scraper';
import { createGovInfoConfig } from './scrapers/govinfo';
import type { ScrapeCongressOptions, SearchCriteria } from './scrapers/bioguide/types';
import {
  congressesResultSchema,
  congressMembersResultSchema,
  membersResultSchema,
  reviveCongresses,
  reviveCongressMembers,
  reviveMembers,
  scrapeResultSchema,
} from './schemas';
import type { ScrapeResult } from './types';

const directoryResultSchema = scrapeResultSchema(z.array(z.record(z.unknown())));

function printUsage(): void {
  console.log('\nAvailable scripts:');
  console.log('  congress [number|year]      - Members of one Congress (default: current)');
  console.log('  range <start> [end]         - Members of every Congress in a range');
  console.log('  member <bioguide-id>        - One member by Bioguide ID');
  console.log('  search [filters]            - Members matching a search');
  console.log('  directory [number|year]     - GovInfo congressional directory (needs GOVINFO_API_KEY)');
  console.log('  cross-reference [number|year] - Bioguide members paired with directory entries');
  console.log('  member-directory <bioguide-id> - One member paired with their directory entry');
  console.log('\nOptions:');
  console.log('  --force-refresh             - Ignore cache and fetch fresh data');
  console.log('  --scrape                    - Crawl search results even when the roster index has the Congress');
  console.log('  --skip-errors               - Leave out members whose documents cannot be fetched');
  console.log('  --concurrency N             - Parallel member document requests');
  console.log('\nSearch filters:');
  console.log('  --last-name, --first-name, --position, --state, --party, --congress');
  console.log('\nExamples:');
  console.log('  npm run dev congress 116');
  console.log('  npm run dev congress 2019 --skip-errors');
  console.log('  npm run dev range 1 3');
  console.log('  npm run dev search --last-name Lincoln --position Representative');
}

function flagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  return value === undefined || value.startsWith('--') ? undefined : value;
}

function parseInteger(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`${label} must be a number, got "${value}"`);
  }
  return parsed;
}

function searchCriteria(args: readonly string[]): SearchCriteria {
  const lastName = flagValue(args, '--last-name');
  const firstName = flagValue(args, '--first-name');
  const position = flagValue(args, '--position');
  const state = flagValue(args, '--state');
  const party = flagValue(args, '--party');
  const congress = parseInteger(flagValue(args, '--congress'), '--congress');

  return {
    ...(lastName && { lastName }),
    ...(firstName && { firstName }),
    ...(position && { position }),
    ...(state && { state }),
    ...(party && { party }),
    ...(congress !== undefined && { congress }),
  };
}

function logCacheHit(filename: string): void {
  console.log('Using cached data from previous scraping...');
  const cacheAge = getCacheInfo(filename);
  if (cacheAge) {
    console.log(`Cache created: ${cacheAge}`);
  }
}

/**
 * Returns cached data when it is fresh, otherwise runs `fetch` and saves
 * its result under out/.
 */
async function cached<T>(
  filename: string,
  forceRefresh: boolean,
  load: (filename: string) => ScrapeResult<T> | null,
  fetch: () => Promise<ScrapeResult<T>>
): Promise<ScrapeResult<T>> {
  const cachedResult = forceRefresh ? null : load(filename);
  if (cachedResult) {
    logCacheHit(filename);
    return cachedResult;
  }
  if (forceRefresh) {
    console.log('Force refresh requested - ignoring cache');
  }

  const result = await fetch();
  const outputPath = saveData(filename, result);
  console.log(`Results saved to ${outputPath}`);
  return result;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const scriptName = args[0] || 'congress';
  const positional = args[1]?.startsWith('--') ? undefined : args[1];
  const forceRefresh = args.includes('--force-refresh');

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.log('\nInterrupted, stopping...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const concurrency = parseInteger(flagValue(args, '--concurrency'), '--concurrency');
  const options: ScrapeCongressOptions = {
    signal: controller.signal,
    onMemberError: args.includes('--skip-errors') ? 'skip' : 'abort',
    ...(args.includes('--scrape') && { scrape: true }),
    ...(concurrency !== undefined && { maxConcurrentRequests: concurrency }),
  };

  const apiKey = process.env.GOVINFO_API_KEY;
  const scraper = new CongressScraper({
    govInfo: apiKey ? createGovInfoConfig(apiKey) : null,
  });

  try {
    console.log('Initializing HTTP client...');
    await scraper.initialize();

    switch (scriptName.toLowerCase()) {
      case 'congress': {
        const congress = normalizeCongress(parseInteger(positional, 'Congress'));
        const result = await cached(
          `congress-${congress}.json`,
          forceRefresh,
          (filename) => {
            const check = shouldUseCachedData(filename, congressesResultSchema);
            return check.useCache ? reviveCongresses(check.cachedData) : null;
          },
          async () => {
            const scraped = await scraper.scrapeCongress(congress, options);
            return { ...scraped, data: [scraped.data] };
          }
        );
        const [record] = result.data;
        console.log(`Congress ${congress}: ${record?.members.length ?? 0} members`);
        console.log('\nSample data:');
        console.log(JSON.stringify(record?.members.slice(0, 2) ?? [], null, 2));
        break;
      }

      case 'range': {
        const start = parseInteger(positional, 'Range start');
        if (start === undefined) {
          throw new Error('range needs a start Congress or year');
        }
        const endArg = args[2]?.startsWith('--') ? undefined : args[2];
        const end = parseInteger(endArg, 'Range end');
        const result = await cached(
          `congresses-${start}-${end ?? 'current'}.json`,
          forceRefresh,
          (filename) => {
            const check = shouldUseCachedData(filename, congressesResultSchema);
            return check.useCache ? reviveCongresses(check.cachedData) : null;
          },
          () => scraper.scrapeCongressRange(start, end, options)
        );
        for (const congress of result.data) {
          console.log(`Congress ${congress.number} (${congress.startYear}-${congress.endYear}): ${congress.members.length} members`);
        }
        console.log(`Unique members across range: ${scraper.mergeMembers(result.data).length}`);
        break;
      }

      case 'member': {
        if (!positional) {
          throw new Error('member needs a Bioguide ID');
        }
        const id = positional.toUpperCase();
        const result = await cached(
          `member-${id}.json`,
          forceRefresh,
          (filename) => {
            const check = shouldUseCachedData(filename, membersResultSchema);
            return check.useCache ? reviveMembers(check.cachedData) : null;
          },
          async () => {
            const scraped = await scraper.scrapeMember(id);
            return { ...scraped, data: [scraped.data] };
          }
        );
        console.log(JSON.stringify(result.data[0], null, 2));
        break;
      }

      case 'search': {
        const criteria = searchCriteria(args);
        const result = await scraper.searchMembers(criteria, options);
        console.log(`Found ${result.data.length} members`);
        const outputPath = saveData('search-results.json', result);
        console.log(`Results saved to ${outputPath}`);
        break;
      }

      case 'directory': {
        const congress = normalizeCongress(parseInteger(positional, 'Congress'));
        const result = await cached(
          `directory-${congress}.json`,
          forceRefresh,
          (filename) => {
            const check = shouldUseCachedData(filename, directoryResultSchema);
            return check.useCache ? check.cachedData : null;
          },
          () =>
            scraper.scrapeDirectory(congress, {
              signal: controller.signal,
              ...(options.onMemberError && { onGranuleError: options.onMemberError }),
              ...(concurrency !== undefined && { maxConcurrentRequests: concurrency }),
            })
        );
        console.log(`Congress ${congress}: ${result.data.length} directory entries`);
        break;
      }

      case 'cross-reference': {
        const congress = normalizeCongress(parseInteger(positional, 'Congress'));
        const result = await cached(
          `cross-reference-${congress}.json`,
          forceRefresh,
          (filename) => {
            const check = shouldUseCachedData(filename, congressMembersResultSchema);
            return check.useCache ? reviveCongressMembers(check.cachedData) : null;
          },
          () => scraper.scrapeCrossReferenced(congress, options)
        );
        const matched = result.data.filter((m) => m.bioguide && m.directory).length;
        console.log(`Congress ${congress}: ${result.data.length} members, ${matched} matched in both sources`);
        break;
      }

      case 'member-directory': {
        if (!positional) {
          throw new Error('member-directory needs a Bioguide ID');
        }
        const id = positional.toUpperCase();
        const result = await cached(
          `member-directory-${id}.json`,
          forceRefresh,
          (filename) => {
            const check = shouldUseCachedData(filename, congressMembersResultSchema);
            return check.useCache ? reviveCongressMembers(check.cachedData) : null;
          },
          async () => {
            const scraped = await scraper.scrapeMemberDirectory(id);
            return { ...scraped, data: [scraped.data] };
          }
        );
        console.log(JSON.stringify(result.data[0]?.directory ?? null, null, 2));
        break;
      }

      default:
        console.error(`Unknown script: ${scriptName}`);
        printUsage();
        process.exitCode = 1;
    }
  } catch (error) {
    console.error('Error:', error);
    process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    console.log('Closing HTTP client...');
    await scraper.close();
  }
}

if (require.main === module) {
  main().catch(console.error);
}

export * from './congress/calendar';
export { crossReferenceDirectory, directoryBioguideId } from './cross-reference';
export * from './errors';
export * from './records';
export { CongressScraper } from './scraper';
export * from './scrapers/bioguide';
export * from './scrapers/govinfo';
export * from './types';
