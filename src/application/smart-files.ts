import type { DiskSpace, FileSystemPort } from './ports/file-system.port';
import type { HistoryPort } from './ports/history.port';
import { AccessHistoryStore } from './services/access-history-store';
import { DuplicateDetector } from './services/duplicate-detector';
import type { DuplicateScanOptions } from './services/duplicate-detector';
import { FileOperations } from './services/file-operations';
import type { BulkDeleteResult } from './services/file-operations';
import { FingerprintEngine } from './services/fingerprint';
import type { DigestOptions } from './services/fingerprint';
import { MetadataResolver } from './services/metadata-resolver';
import { SearchService } from './services/search-service';
import type { SearchOptions } from './services/search-service';
import { SizeAgeScanner } from './services/size-age-scanner';
import type { LargeFileOptions, OldFileOptions } from './services/size-age-scanner';
import { SuggestionEngine } from './services/suggestion-engine';
import { TreeWalker } from './services/tree-walker';
import type { WalkOptions } from './services/tree-walker';
import type { DuplicateReport, FileDescriptor } from '../domain/file-descriptor';
import type { OperationResult } from '../domain/file-operation-error';
import type { SearchCriteriaInput } from '../domain/search-criteria';
import { JsonHistoryFile } from '../infrastructure/json-history-file';
import { NodeFileSystem } from '../infrastructure/node-file-system';

export type SmartFilesOptions = {
  historyPath: string;
  fileSystem?: FileSystemPort;
  historyFile?: HistoryPort;
  /** Defaults applied to duplicate scans when a call leaves them out. */
  duplicateDefaults?: Pick<DuplicateScanOptions, 'algorithm' | 'minSizeBytes' | 'concurrency'>;
};

/**
 * The operations a front end (CLI, GUI, service) calls. Scans are async and
 * take an AbortSignal, checked between entries.
 */
export class SmartFiles {
  public readonly history: AccessHistoryStore;
  private readonly walker: TreeWalker;
  private readonly resolver: MetadataResolver;
  private readonly fingerprint: FingerprintEngine;
  private readonly duplicates: DuplicateDetector;
  private readonly scanner: SizeAgeScanner;
  private readonly searchService: SearchService;
  private readonly operations: FileOperations;
  private readonly suggestions: SuggestionEngine;
  private readonly duplicateDefaults: SmartFilesOptions['duplicateDefaults'];

  public constructor(options: SmartFilesOptions) {
    const fileSystem = options.fileSystem ?? new NodeFileSystem();
    const historyFile = options.historyFile ?? new JsonHistoryFile(fileSystem, options.historyPath);

    this.walker = new TreeWalker(fileSystem);
    this.resolver = new MetadataResolver(fileSystem);
    this.fingerprint = new FingerprintEngine(fileSystem);
    this.duplicates = new DuplicateDetector(fileSystem, this.walker, this.fingerprint);
    this.scanner = new SizeAgeScanner(fileSystem, this.walker, this.resolver);
    this.searchService = new SearchService(fileSystem, this.walker, this.resolver);
    this.operations = new FileOperations(fileSystem, this.resolver);
    this.history = new AccessHistoryStore(historyFile, fileSystem, this.resolver);
    this.suggestions = new SuggestionEngine(this.history, this.resolver, this.operations);
    this.duplicateDefaults = options.duplicateDefaults;
  }

  public walk(root: string, options?: WalkOptions): AsyncGenerator<string> {
    return this.walker.walk(root, options);
  }

  public resolve(targetPath: string): Promise<FileDescriptor | null> {
    return this.resolver.resolve(targetPath);
  }

  public listDirectory(targetPath: string): Promise<OperationResult<FileDescriptor[]>> {
    return this.operations.listDirectory(targetPath);
  }

  public search(root: string, criteria: SearchCriteriaInput, options?: SearchOptions): Promise<FileDescriptor[]> {
    return this.searchService.search(root, criteria, options);
  }

  public digest(targetPath: string, options?: DigestOptions): Promise<string | null> {
    return this.fingerprint.digest(targetPath, options);
  }

  public findDuplicates(root: string, options: DuplicateScanOptions = {}): Promise<Map<string, string[]>> {
    return this.duplicates.findDuplicates(root, { ...this.duplicateDefaults, ...options });
  }

  public duplicateReport(root: string, options: DuplicateScanOptions = {}): Promise<DuplicateReport> {
    return this.duplicates.scan(root, { ...this.duplicateDefaults, ...options });
  }

  public findLargeFiles(root: string, options?: LargeFileOptions): Promise<FileDescriptor[]> {
    return this.scanner.findLargeFiles(root, options);
  }

  public findOldFiles(root: string, options?: OldFileOptions): Promise<FileDescriptor[]> {
    return this.scanner.findOldFiles(root, options);
  }

  public recordAccess(targetPath: string): Promise<void> {
    return this.history.recordAccess(targetPath);
  }

  public recentItems(): Promise<FileDescriptor[]> {
    return this.history.recentItems();
  }

  public frequentItems(limit?: number): Promise<FileDescriptor[]> {
    return this.history.frequentItems(limit);
  }

  public contextualSuggestions(currentPath: string, limit?: number): Promise<FileDescriptor[]> {
    return this.suggestions.suggest(currentPath, limit);
  }

  public copyItem(source: string, destinationDir: string): Promise<OperationResult<string>> {
    return this.operations.copyItem(source, destinationDir);
  }

  public moveItem(source: string, destinationDir: string): Promise<OperationResult<string>> {
    return this.operations.moveItem(source, destinationDir);
  }

  public deleteItem(targetPath: string): Promise<OperationResult<string>> {
    return this.operations.deleteItem(targetPath);
  }

  public deleteItems(paths: readonly string[]): Promise<BulkDeleteResult[]> {
    return this.operations.deleteItems(paths);
  }

  public createFolder(parentDir: string, name: string): Promise<OperationResult<string>> {
    return this.operations.createFolder(parentDir, name);
  }

  public renameItem(targetPath: string, newName: string): Promise<OperationResult<string>> {
    return this.operations.renameItem(targetPath, newName);
  }

  public diskSpace(targetPath: string): Promise<OperationResult<DiskSpace>> {
    return this.operations.diskSpace(targetPath);
  }
}

export const createSmartFiles = (options: SmartFilesOptions): SmartFiles => new SmartFiles(options);
