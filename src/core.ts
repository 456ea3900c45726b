export { SmartFiles, createSmartFiles } from './application/smart-files';
export type { SmartFilesOptions } from './application/smart-files';
export type { DiskSpace, FileStats, FileSystemEntry, FileSystemPort } from './application/ports/file-system.port';
export type { HistoryPort } from './application/ports/history.port';
export type { ProcessedStatus, ScanProgressPort } from './application/ports/scan-progress.port';
export type { HashAlgorithm } from './application/services/fingerprint';
export type { BulkDeleteResult } from './application/services/file-operations';
export type { AccessHistory } from './domain/access-history';
export { FILE_CATEGORY, categorize, groupByCategory } from './domain/file-category';
export type { FileCategory } from './domain/file-category';
export type { DuplicateGroup, DuplicateReport, FileDescriptor } from './domain/file-descriptor';
export { FS_ERROR_CODE, FileOperationError } from './domain/file-operation-error';
export type { FsErrorCode, OperationResult } from './domain/file-operation-error';
export { SEARCH_MODE } from './domain/search-criteria';
export type { SearchCriteria, SearchCriteriaInput, SearchMode } from './domain/search-criteria';
export { loadConfig } from './config/app-config';
export type { AppConfig } from './config/app-config';
export { formatBytes } from './utils/format-bytes';
