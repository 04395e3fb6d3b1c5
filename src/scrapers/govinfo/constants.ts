// Configuration constants for the GovInfo API
export const GOVINFO_CONFIG = {
  URLS: {
    BASE_URL: (process.env.GOVINFO_API_URL || 'https://api.govinfo.gov').replace(/\/+$/, ''),
  },
  COLLECTION: 'CDIR',
  // Collections are filtered by last-modified date; this start covers everything
  MODIFIED_SINCE: '1970-01-01T00:00:00Z',
  PAGE_SIZE: 100,
  // The API refuses offsets past 10000
  MAX_OFFSET: 10000,
  MEMBER_GRANULE_CLASS: 'CONGRESSMEMBERSTATE',
  MEMBER_SUB_GRANULE_CLASSES: ['SENATOR', 'REPRESENTATIVE', 'DELEGATE', 'RESIDENTCOMMISSIONER'],
} as const;
