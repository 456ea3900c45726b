import { z } from 'zod';

import type { ValueOf } from '../types/value-of';

export const SEARCH_MODE = {
  NAME: 'name',
  EXTENSION: 'extension',
  CONTENT: 'content',
} as const;

export type SearchMode = ValueOf<typeof SEARCH_MODE>;

export const searchModeSchema = z.enum(
  Object.values(SEARCH_MODE) as [SearchMode, ...SearchMode[]],
);

// Zero means "no constraint" for every numeric field.
export const searchCriteriaSchema = z.object({
  keyword: z.string().default(''),
  searchMode: searchModeSchema.default(SEARCH_MODE.NAME),
  caseSensitive: z.boolean().default(false),
  minSizeBytes: z.number().nonnegative().default(0),
  maxSizeBytes: z.number().nonnegative().default(0),
  minAgeDays: z.number().nonnegative().default(0),
});

export type SearchCriteria = z.output<typeof searchCriteriaSchema>;
export type SearchCriteriaInput = z.input<typeof searchCriteriaSchema>;

export const TEXT_CONTENT_EXTENSIONS: ReadonlySet<string> = new Set([
  '.txt',
  '.log',
  '.csv',
  '.json',
  '.xml',
  '.py',
  '.html',
  '.css',
  '.js',
  '.md',
  '.ts',
]);
