declare namespace NodeJS {
  interface ProcessEnv {
    BIOGUIDE_BASE_URL?: string;
    BIOGUIDE_INDEX_PATH?: string;
    GOVINFO_API_KEY?: string;
    GOVINFO_API_URL?: string;
    REQUEST_TIMEOUT?: string;
    MAX_CONCURRENT_REQUESTS?: string;
  }
}
