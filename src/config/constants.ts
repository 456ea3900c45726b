const KIB = 1024;
const MIB = 1024 * KIB;

export const DIGEST_CHUNK_SIZE = 64 * KIB;
export const DEFAULT_DUPLICATE_MIN_SIZE = MIB;
export const DEFAULT_LARGE_FILE_MIN_SIZE = 100 * MIB;
export const DEFAULT_OLD_FILE_MIN_AGE_DAYS = 365;
export const DEFAULT_SCAN_RESULT_LIMIT = 50;
export const DEFAULT_DIGEST_CONCURRENCY = 4;

export const RECENT_HISTORY_LIMIT = 50;
export const DEFAULT_FREQUENT_LIMIT = 20;
export const DEFAULT_SUGGESTION_LIMIT = 10;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const APP_NAME = 'smart-files';
