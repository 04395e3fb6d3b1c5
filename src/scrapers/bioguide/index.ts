export { BIOGUIDE_CONFIG } from './constants';
export {
  MemberDocumentFetcher,
  memberDocumentUrl,
  parseMemberDocument,
  sanitizeXml,
} from './member-document';
export { fixLastNameCasing, parseFirstNames } from './names';
export { PARTIES, POSITIONS, STATES, validateSearchCriteria } from './options';
export { extractBioguideIds, extractFinalPageNumber } from './roster';
export { RosterIndex } from './roster-index';
export { BioguideScraper, type BioguideScraperOptions } from './scraper';
export { SearchSession } from './search-session';
export { mergeTerms } from './terms';
export * from './types';
