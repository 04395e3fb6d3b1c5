import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { z } from 'zod';
import { SCRAPING_CONFIG } from './constants';

export interface CacheOptions {
  maxAgeHours?: number; // Default: 24 hours
  forceRefresh?: boolean; // Force refresh even if cache exists
  outputDir?: string; // Default: out/ under the working directory
}

export function outputPath(filename: string, outputDir?: string): string {
  return join(outputDir ?? join(process.cwd(), SCRAPING_CONFIG.OUTPUT_DIR), filename);
}

/**
 * Check if cached data exists and is still valid
 */
export function isCacheValid(
  filePath: string,
  maxAgeHours: number = SCRAPING_CONFIG.CACHE_MAX_AGE_HOURS
): boolean {
  if (!existsSync(filePath)) {
    return false;
  }

  const stats = statSync(filePath);
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  const fileAge = Date.now() - stats.mtime.getTime();

  return fileAge < maxAgeMs;
}

/**
 * Load cached data from the output directory. Returns null when the file is
 * missing or does not match `schema`.
 */
export function loadCachedData<S extends z.ZodTypeAny>(
  filename: string,
  schema: S,
  outputDir?: string
): z.infer<S> | null {
  const filePath = outputPath(filename, outputDir);

  if (!existsSync(filePath)) {
    return null;
  }

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    console.warn(`Failed to parse cached data from ${filePath}:`, error);
    return null;
  }

  const parsed = schema.safeParse(content);
  if (!parsed.success) {
    console.warn(`Cached data in ${filePath} has an unexpected shape:`, parsed.error.message);
    return null;
  }
  return parsed.data;
}

/**
 * Check if we should use cached data
 */
export function shouldUseCachedData<S extends z.ZodTypeAny>(
  filename: string,
  schema: S,
  options: CacheOptions = {}
): { useCache: true; cachedData: z.infer<S> } | { useCache: false; cachedData: null } {
  const { maxAgeHours = SCRAPING_CONFIG.CACHE_MAX_AGE_HOURS, forceRefresh = false } = options;

  if (forceRefresh) {
    return { useCache: false, cachedData: null };
  }

  if (!isCacheValid(outputPath(filename, options.outputDir), maxAgeHours)) {
    return { useCache: false, cachedData: null };
  }

  const cachedData = loadCachedData(filename, schema, options.outputDir);
  if (cachedData === null) {
    return { useCache: false, cachedData: null };
  }

  return { useCache: true, cachedData };
}

export function saveData(filename: string, data: unknown, outputDir?: string): string {
  const filePath = outputPath(filename, outputDir);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
  return filePath;
}

/**
 * Get cache info for display
 */
export function getCacheInfo(filename: string, outputDir?: string): string | null {
  const filePath = outputPath(filename, outputDir);

  if (!existsSync(filePath)) {
    return null;
  }

  const ageMs = Date.now() - statSync(filePath).mtime.getTime();
  const ageHours = Math.floor(ageMs / (60 * 60 * 1000));
  const ageMinutes = Math.floor((ageMs % (60 * 60 * 1000)) / (60 * 1000));

  if (ageHours > 0) {
    return `${ageHours}h ${ageMinutes}m ago`;
  }
  return `${ageMinutes}m ago`;
}
