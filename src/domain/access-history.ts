import { z } from 'zod';

export const accessHistorySchema = z.object({
  recentPaths: z.array(z.string()),
  frequencyCounts: z.record(z.number().int().nonnegative()),
});

export type AccessHistory = z.infer<typeof accessHistorySchema>;

export const emptyAccessHistory = (): AccessHistory => ({
  recentPaths: [],
  frequencyCounts: {},
});
