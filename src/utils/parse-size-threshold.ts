const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*(KB|MB|GB|TB|B)?$/;

const MULTIPLIERS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
  TB: 1024 * 1024 * 1024 * 1024,
};

/**
 * Parse a human size such as "100MB", "1GB", "500KB" or "1024" (bytes).
 * @returns Size in bytes, or undefined if the value is not a size
 */
export const parseSize = (value: string): number | undefined => {
  const match = value.trim().toUpperCase().match(SIZE_PATTERN);
  if (!match) {
    return undefined;
  }

  const amount = Number.parseFloat(match[1] ?? '0');
  const unit = match[2] ?? 'B';

  if (Number.isNaN(amount) || amount < 0) {
    return undefined;
  }

  return Math.floor(amount * (MULTIPLIERS[unit] ?? 1));
};

/**
 * Size floor for duplicate scans taken from SKIP_ITEMS_SMALLER_THAN.
 * @returns Size in bytes, or undefined if not set or invalid
 */
export const parseSizeThreshold = (env: NodeJS.ProcessEnv = process.env): number | undefined => {
  const envValue = env.SKIP_ITEMS_SMALLER_THAN;
  if (!envValue) {
    return undefined;
  }
  return parseSize(envValue);
};
