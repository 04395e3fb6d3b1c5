export { createGovInfoConfig, directoryTerm, formatApiDate, GovInfoDirectoryClient } from './client';
export { GOVINFO_CONFIG } from './constants';
export * from './types';
