import { z } from 'zod';

export interface GovInfoConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
}

// --- /collections/{collection}/{start}/{end} ---

export const packageSchema = z
  .object({
    packageId: z.string().min(1),
    dateIssued: z.string(),
  })
  .passthrough();

export type GovInfoPackage = z.infer<typeof packageSchema>;

export const collectionPageSchema = z
  .object({
    count: z.number().int().nonnegative(),
    packages: z.array(packageSchema),
  })
  .passthrough();

// --- /packages/{packageId}/granules ---

export const granuleSchema = z
  .object({
    granuleId: z.string().min(1),
    granuleClass: z.string().optional(),
  })
  .passthrough();

export type GovInfoGranule = z.infer<typeof granuleSchema>;

export const granulesPageSchema = z
  .object({
    count: z.number().int().nonnegative(),
    granules: z.array(granuleSchema),
  })
  .passthrough();

// --- /packages/{packageId}/granules/{granuleId}/summary ---

export const granuleSummarySchema = z
  .object({
    subGranuleClass: z.string().optional(),
  })
  .passthrough();

export type GranuleSummary = z.infer<typeof granuleSummarySchema>;

export interface DirectoryOptions {
  maxConcurrentRequests?: number;
  signal?: AbortSignal;
  onGranuleError?: 'abort' | 'skip';
}
