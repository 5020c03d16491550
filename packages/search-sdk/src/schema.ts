import { z } from 'zod';
import type { PageSize } from './types.js';

export const ALL_LOCATIONS = 'All Locations';
export const PAGE_SIZE_OPTIONS = [10, 25, 50, 100] as const satisfies readonly PageSize[];
export const MIN_DAYS_BACK = 1;
export const MAX_DAYS_BACK = 30;

const pageSizeSchema = z.union([z.literal(10), z.literal(25), z.literal(50), z.literal(100)]);

export const searchCriteriaSchema = z.object({
  daysBack: z.number().int().min(MIN_DAYS_BACK).max(MAX_DAYS_BACK),
  location: z.string().optional(),
  remoteOnly: z.boolean().optional(),
  limit: pageSizeSchema,
  offset: z.number().int().nonnegative(),
});

export const jobRecordSchema = z.object({
  title: z.string(),
  company: z.string(),
  location: z.string(),
  postedDate: z.string(),
  description: z.string(),
  applyUrl: z.string(),
  employmentType: z.string(),
  remote: z.boolean(),
  salary: z.string(),
  industry: z.string(),
});

export function isPageSize(value: number): value is PageSize {
  return PAGE_SIZE_OPTIONS.some((option) => option === value);
}
