import path from 'node:path';

import type { AccessHistoryStore } from './access-history-store';
import type { FileOperations } from './file-operations';
import type { MetadataResolver } from './metadata-resolver';
import { extensionOf } from '../../domain/file-category';
import type { FileDescriptor } from '../../domain/file-descriptor';
import { DEFAULT_SUGGESTION_LIMIT } from '../../config/constants';

export const frequentChildDirectories = (
  currentPath: string,
  frequentDirectories: readonly FileDescriptor[],
): FileDescriptor[] =>
  frequentDirectories.filter((item) => item.isDirectory && path.dirname(item.path) === currentPath);

export const frequentSiblingDirectories = (
  currentPath: string,
  frequentDirectories: readonly FileDescriptor[],
): FileDescriptor[] => {
  const parent = path.dirname(currentPath);
  if (parent === currentPath) {
    return [];
  }
  return frequentDirectories.filter(
    (item) => item.isDirectory && path.dirname(item.path) === parent && item.path !== currentPath,
  );
};

/**
 * Most common extension among recently accessed files directly inside
 * currentPath. Ties go to the extension seen first in recency order.
 */
export const dominantRecentExtension = (
  currentPath: string,
  recentItems: readonly FileDescriptor[],
): string | undefined => {
  const counts = new Map<string, number>();
  for (const item of recentItems) {
    if (!item.isDirectory && path.dirname(item.path) === currentPath) {
      const extension = extensionOf(item.name);
      counts.set(extension, (counts.get(extension) ?? 0) + 1);
    }
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [extension, count] of counts) {
    if (count > bestCount) {
      best = extension;
      bestCount = count;
    }
  }
  return best;
};

export const sameExtensionFiles = (
  extension: string | undefined,
  listing: readonly FileDescriptor[],
): FileDescriptor[] => {
  if (extension === undefined) {
    return [];
  }
  return listing.filter((item) => !item.isDirectory && extensionOf(item.name) === extension);
};

/**
 * Dedupe by path (first occurrence wins) and order by access count, highest
 * first; unknown paths count as 0 and ties keep candidate order.
 */
export const rankSuggestions = (
  candidates: readonly FileDescriptor[],
  frequencyCounts: ReadonlyMap<string, number>,
  limit: number,
): FileDescriptor[] => {
  const unique = new Map<string, FileDescriptor>();
  for (const candidate of candidates) {
    if (!unique.has(candidate.path)) {
      unique.set(candidate.path, candidate);
    }
  }
  return [...unique.values()]
    .sort((left, right) => (frequencyCounts.get(right.path) ?? 0) - (frequencyCounts.get(left.path) ?? 0))
    .slice(0, Math.max(0, limit));
};

/**
 * Best-effort ranking of paths likely to matter from the current location:
 * frequently visited children, files sharing the extension most used here
 * recently, and frequently visited siblings. Not exhaustive.
 */
export class SuggestionEngine {
  public constructor(
    private readonly history: AccessHistoryStore,
    private readonly resolver: MetadataResolver,
    private readonly fileOperations: FileOperations,
  ) { }

  public async suggest(currentPath: string, limit = DEFAULT_SUGGESTION_LIMIT): Promise<FileDescriptor[]> {
    const location = path.resolve(currentPath);
    const snapshot = await this.history.snapshot();

    const frequentDirectories: FileDescriptor[] = [];
    for (const entryPath of snapshot.frequencyCounts.keys()) {
      const descriptor = await this.resolver.resolve(entryPath);
      if (descriptor?.isDirectory) {
        frequentDirectories.push(descriptor);
      }
    }

    const recentItems = await this.history.recentItems();
    const extension = dominantRecentExtension(location, recentItems);
    let listing: FileDescriptor[] = [];
    if (extension !== undefined) {
      const listed = await this.fileOperations.listDirectory(location);
      listing = listed.ok ? listed.value : [];
    }

    const candidates = [
      ...frequentChildDirectories(location, frequentDirectories),
      ...sameExtensionFiles(extension, listing),
      ...frequentSiblingDirectories(location, frequentDirectories),
    ];
    return rankSuggestions(candidates, snapshot.frequencyCounts, limit);
  }
}
