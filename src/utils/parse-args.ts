import { hashAlgorithmSchema } from '../application/services/fingerprint';
import type { HashAlgorithm } from '../application/services/fingerprint';
import { searchModeSchema } from '../domain/search-criteria';
import type { SearchMode } from '../domain/search-criteria';
import { parseSize } from './parse-size-threshold';

export type ParsedArgs = {
  command: string | null;
  positional: string[];
  outputPath: string | null;
  keyword: string;
  mode: SearchMode;
  caseSensitive: boolean;
  minSizeBytes: number | undefined;
  maxSizeBytes: number | undefined;
  minAgeDays: number | undefined;
  limit: number | undefined;
  algorithm: HashAlgorithm | undefined;
};

/**
 * Splits CLI arguments into the command, positionals and known options.
 * Throws when an option is missing its value or the value is malformed.
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const [command, ...rest] = args;
  const parsed: ParsedArgs = {
    command: command ?? null,
    positional: [],
    outputPath: null,
    keyword: '',
    mode: 'name',
    caseSensitive: false,
    minSizeBytes: undefined,
    maxSizeBytes: undefined,
    minAgeDays: undefined,
    limit: undefined,
    algorithm: undefined,
  };

  let index = 0;
  while (index < rest.length) {
    const token = rest[index];
    const value = rest[index + 1];
    if (!token) {
      index += 1;
      continue;
    }
    if (token === '--case-sensitive') {
      parsed.caseSensitive = true;
      index += 1;
      continue;
    }
    if (token.startsWith('-') && value === undefined) {
      throw new Error(`Missing value for ${token}`);
    }
    switch (token) {
      case '--output':
      case '-o':
        parsed.outputPath = value ?? null;
        break;
      case '--keyword':
      case '-k':
        parsed.keyword = value ?? '';
        break;
      case '--mode':
        parsed.mode = searchModeSchema.parse(value);
        break;
      case '--min-size':
        parsed.minSizeBytes = requireSize(token, value);
        break;
      case '--max-size':
        parsed.maxSizeBytes = requireSize(token, value);
        break;
      case '--min-age':
        parsed.minAgeDays = requireNumber(token, value);
        break;
      case '--limit':
        parsed.limit = requireNumber(token, value);
        break;
      case '--algorithm':
        parsed.algorithm = hashAlgorithmSchema.parse(value);
        break;
      default:
        parsed.positional.push(token);
        index += 1;
        continue;
    }
    index += 2;
  }

  return parsed;
};

const requireSize = (flag: string, value: string | undefined): number => {
  const size = value === undefined ? undefined : parseSize(value);
  if (size === undefined) {
    throw new Error(`${flag} expects a size such as 10MB, got "${value ?? ''}"`);
  }
  return size;
};

const requireNumber = (flag: string, value: string | undefined): number => {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${flag} expects a non-negative number, got "${value ?? ''}"`);
  }
  return parsed;
};
