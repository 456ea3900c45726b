import path from 'node:path';

import type { FileSystemEntry, FileSystemPort } from '../ports/file-system.port';
import type { ScanProgressPort } from '../ports/scan-progress.port';
import { ENTRY_TYPE } from '../../domain/file-descriptor';
import { getLogger } from '../../utils/get-logger';

export type WalkOptions = {
  signal?: AbortSignal;
  progress?: ScanProgressPort;
};

type DirectoryListing =
  | { ok: true; entries: FileSystemEntry[] }
  | { ok: false; reason: string };

/**
 * Lazily enumerates every entry below a root, depth first, parents before
 * children. The root itself is not yielded. Unreadable directories are
 * skipped, and symlinked directories are reported but not descended into.
 * Each call starts a fresh traversal.
 */
export class TreeWalker {
  private readonly logger = getLogger('tree-walker');

  public constructor(private readonly fileSystem: FileSystemPort) { }

  public async *walkEntries(root: string, options: WalkOptions = {}): AsyncGenerator<FileSystemEntry> {
    const { signal, progress } = options;
    const pending: string[] = [path.resolve(root)];

    while (pending.length > 0) {
      signal?.throwIfAborted();
      const directory = pending.pop();
      if (directory === undefined) {
        break;
      }

      const listing = await this.readDirectory(directory);
      if (!listing.ok) {
        this.logger.debug(`Skipping directory: path=${directory}, reason=${listing.reason}`);
        continue;
      }
      progress?.updateCurrent(directory, listing.entries.length);

      const subdirectories: string[] = [];
      for (const entry of listing.entries) {
        signal?.throwIfAborted();
        yield entry;
        if (entry.type === ENTRY_TYPE.DIRECTORY) {
          subdirectories.push(entry.path);
        }
      }
      // reversed so that pop() visits subdirectories in listing order
      for (let index = subdirectories.length - 1; index >= 0; index -= 1) {
        const subdirectory = subdirectories[index];
        if (subdirectory !== undefined) {
          pending.push(subdirectory);
        }
      }
    }
  }

  public async *walk(root: string, options: WalkOptions = {}): AsyncGenerator<string> {
    for await (const entry of this.walkEntries(root, options)) {
      yield entry.path;
    }
  }

  private async readDirectory(directory: string): Promise<DirectoryListing> {
    if (!(await this.fileSystem.canRead(directory))) {
      return { ok: false, reason: 'not readable' };
    }
    try {
      return { ok: true, entries: await this.fileSystem.listEntries(directory) };
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }
}
