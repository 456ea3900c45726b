import path from 'node:path';

import { z } from 'zod';

import type { ValueOf } from '../types/value-of';
import extensionTable from './file-extensions.json';

export const FILE_CATEGORY = {
  DIRECTORY: 'directory',
  DOCUMENT: 'document',
  IMAGE: 'image',
  AUDIO: 'audio',
  VIDEO: 'video',
  ARCHIVE: 'archive',
  EXECUTABLE: 'executable',
  SOURCE: 'source',
  TEMPORARY: 'temporary',
  OTHER: 'other',
} as const;

export type FileCategory = ValueOf<typeof FILE_CATEGORY>;

export const fileCategorySchema = z.enum(
  Object.values(FILE_CATEGORY) as [FileCategory, ...FileCategory[]],
);

export const CATEGORY_ICON: Record<FileCategory, string> = {
  [FILE_CATEGORY.DIRECTORY]: '📁',
  [FILE_CATEGORY.DOCUMENT]: '📄',
  [FILE_CATEGORY.IMAGE]: '🖼️',
  [FILE_CATEGORY.AUDIO]: '🎵',
  [FILE_CATEGORY.VIDEO]: '🎬',
  [FILE_CATEGORY.ARCHIVE]: '📦',
  [FILE_CATEGORY.EXECUTABLE]: '⚙️',
  [FILE_CATEGORY.SOURCE]: '🧾',
  [FILE_CATEGORY.TEMPORARY]: '🗑️',
  [FILE_CATEGORY.OTHER]: '❓',
};

const extensionTableSchema = z.record(fileCategorySchema, z.array(z.string().startsWith('.')));

const buildExtensionLookup = (): Map<string, FileCategory> => {
  const table = extensionTableSchema.parse(extensionTable);
  const lookup = new Map<string, FileCategory>();
  for (const [category, extensions] of Object.entries(table)) {
    const parsedCategory = fileCategorySchema.parse(category);
    for (const extension of extensions ?? []) {
      lookup.set(extension.toLowerCase(), parsedCategory);
    }
  }
  return lookup;
};

const extensionLookup = buildExtensionLookup();

/**
 * Lower-cased extension including the leading dot, or '' when the name has none.
 */
export const extensionOf = (name: string): string => path.extname(name).toLowerCase();

export const categorize = (name: string, isDirectory: boolean): FileCategory => {
  if (isDirectory) {
    return FILE_CATEGORY.DIRECTORY;
  }
  return extensionLookup.get(extensionOf(name)) ?? FILE_CATEGORY.OTHER;
};

/**
 * Bucket items by category, keeping buckets and their members in first-seen order.
 */
export const groupByCategory = <T extends { category: FileCategory }>(
  items: readonly T[],
): Map<FileCategory, T[]> => {
  const groups = new Map<FileCategory, T[]>();
  for (const item of items) {
    const existing = groups.get(item.category) ?? [];
    existing.push(item);
    groups.set(item.category, existing);
  }
  return groups;
};
