import type { ValueOf } from '../types/value-of';
import type { FileCategory } from './file-category';

export const ENTRY_TYPE = {
  FILE: 'file',
  DIRECTORY: 'directory',
  SYMLINK: 'symlink',
  OTHER: 'other',
} as const;

export type EntryType = ValueOf<typeof ENTRY_TYPE>;

/**
 * Point-in-time snapshot of one filesystem entry. It may be stale by the time it
 * is consumed, so anything acting on it must re-check that the path still exists.
 */
export type FileDescriptor = Readonly<{
  path: string;
  name: string;
  isDirectory: boolean;
  /** 0 for directories. */
  sizeBytes: number;
  /** null for directories. */
  formattedSize: string | null;
  modifiedAt: Date;
  category: FileCategory;
  icon: string;
}>;

export type DuplicateGroup = Readonly<{
  digest: string;
  sizeBytes: number;
  /** Distinct paths in first-seen traversal order, always at least two. */
  paths: readonly string[];
}>;

export type DuplicateReport = {
  generatedAt: string;
  root: string;
  groups: DuplicateGroup[];
  filesScanned: number;
  filesHashed: number;
  hashErrors: number;
  /** Sum of size × (members - 1) over all groups. */
  wastedBytes: number;
};
