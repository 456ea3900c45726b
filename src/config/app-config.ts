import path from 'node:path';

import { z } from 'zod';

import { hashAlgorithmSchema } from '../application/services/fingerprint';
import type { HashAlgorithm } from '../application/services/fingerprint';
import { parseSize, parseSizeThreshold } from '../utils/parse-size-threshold';
import { getAppDataDir } from './app-dirs';
import { APP_NAME, DEFAULT_DIGEST_CONCURRENCY, DEFAULT_DUPLICATE_MIN_SIZE } from './constants';

export type AppConfig = {
  historyPath: string;
  hashAlgorithm: HashAlgorithm;
  digestConcurrency: number;
  duplicateMinSizeBytes: number;
};

const envSchema = z.object({
  SMART_FILES_HISTORY: z.string().min(1).optional(),
  SMART_FILES_HASH: hashAlgorithmSchema.default('md5'),
  SMART_FILES_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(DEFAULT_DIGEST_CONCURRENCY),
  SKIP_ITEMS_SMALLER_THAN: z
    .string()
    .optional()
    .superRefine((value, context) => {
      if (value !== undefined && parseSize(value) === undefined) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected a size like "1MB", got "${value}"`,
        });
      }
    }),
});

export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    historyPath: path.resolve(
      values.SMART_FILES_HISTORY ?? path.join(getAppDataDir(APP_NAME, env), 'history.json'),
    ),
    hashAlgorithm: values.SMART_FILES_HASH,
    digestConcurrency: values.SMART_FILES_CONCURRENCY,
    duplicateMinSizeBytes: parseSizeThreshold(env) ?? DEFAULT_DUPLICATE_MIN_SIZE,
  };
};
