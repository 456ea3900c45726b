import type { Readable } from 'node:stream';

import type { EntryType } from '../../domain/file-descriptor';

export type FileSystemEntry = {
  name: string;
  path: string;
  type: EntryType;
};

export type FileStats = {
  isDirectory: boolean;
  isFile: boolean;
  sizeBytes: number;
  modifiedAt: Date;
};

export type DiskSpace = {
  totalBytes: number;
  freeBytes: number;
};

export interface FileSystemPort {
  exists(path: string): Promise<boolean>;
  canRead(path: string): Promise<boolean>;
  canWrite(path: string): Promise<boolean>;
  listEntries(path: string): Promise<FileSystemEntry[]>;
  /** Follows symlinks. */
  stat(path: string): Promise<FileStats>;
  openReadStream(path: string, chunkSize: number, signal?: AbortSignal): Readable;
  readFile(path: string): Promise<string>;
  ensureDirectory(path: string): Promise<void>;
  makeDirectory(path: string): Promise<void>;
  /** Write to a sibling temp file then rename over the target. */
  writeFileAtomic(path: string, contents: string): Promise<void>;
  copy(source: string, destination: string): Promise<void>;
  rename(source: string, destination: string): Promise<void>;
  remove(path: string): Promise<void>;
  diskSpace(path: string): Promise<DiskSpace>;
}
