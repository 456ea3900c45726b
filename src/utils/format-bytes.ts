const UNITS = ['KB', 'MB', 'GB', 'TB'] as const;

/**
 * Binary units: whole bytes below 1 KB, otherwise the largest unit the value
 * reaches with two decimals.
 */
export const formatBytes = (bytes: number): string => {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  let scaled = bytes / 1024;
  let unitIndex = 0;
  while (scaled >= 1024 && unitIndex < UNITS.length - 1) {
    scaled /= 1024;
    unitIndex += 1;
  }
  return `${scaled.toFixed(2)} ${UNITS[unitIndex] ?? 'TB'}`;
};
