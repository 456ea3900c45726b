import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import type { HistoryPort } from '../ports/history.port';
import type { MetadataResolver } from './metadata-resolver';
import type { AccessHistory } from '../../domain/access-history';
import type { FileDescriptor } from '../../domain/file-descriptor';
import { DEFAULT_FREQUENT_LIMIT, RECENT_HISTORY_LIMIT } from '../../config/constants';
import { getLogger } from '../../utils/get-logger';
import { SerialQueue } from '../../utils/serial-queue';

export type AccessHistorySnapshot = {
  recentPaths: readonly string[];
  /** Insertion ordered, so equal counts keep first-access order. */
  frequencyCounts: ReadonlyMap<string, number>;
};

/**
 * Owns the recent/frequent access history and is the only writer of its
 * document. Every operation runs through one queue, so concurrent access
 * events and reads never interleave. Paths that no longer exist are pruned
 * whenever the history is read.
 */
export class AccessHistoryStore {
  private readonly logger = getLogger('access-history');
  private readonly queue = new SerialQueue();
  private recentPaths: string[] = [];
  private frequencyCounts = new Map<string, number>();
  private loaded = false;

  public constructor(
    private readonly historyFile: HistoryPort,
    private readonly fileSystem: FileSystemPort,
    private readonly resolver: MetadataResolver,
    private readonly recentLimit = RECENT_HISTORY_LIMIT,
  ) { }

  public load(): Promise<void> {
    return this.queue.run(() => this.loadFromDisk());
  }

  public save(): Promise<void> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      await this.persist();
    });
  }

  public recordAccess(targetPath: string): Promise<void> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      const absolutePath = path.resolve(targetPath);
      if (!(await this.fileSystem.exists(absolutePath))) {
        this.logger.debug(`Ignoring access to missing path=${absolutePath}`);
        return;
      }

      this.recentPaths = [absolutePath, ...this.recentPaths.filter((entry) => entry !== absolutePath)].slice(
        0,
        this.recentLimit,
      );
      this.frequencyCounts.set(absolutePath, (this.frequencyCounts.get(absolutePath) ?? 0) + 1);
      try {
        await this.persist();
      } catch (error) {
        // in-memory state keeps the access; the next successful write persists it
        this.logger.error(
          { path: absolutePath, error: error instanceof Error ? error.message : error },
          'Failed to save access history',
        );
      }
    });
  }

  public recentItems(): Promise<FileDescriptor[]> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      await this.prune();
      return this.describe(this.recentPaths);
    });
  }

  public frequentItems(limit = DEFAULT_FREQUENT_LIMIT): Promise<FileDescriptor[]> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      await this.prune();
      const ranked = [...this.frequencyCounts.entries()]
        .sort(([, left], [, right]) => right - left)
        .map(([entryPath]) => entryPath);
      return this.describe(ranked, limit);
    });
  }

  public snapshot(): Promise<AccessHistorySnapshot> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      await this.prune();
      return {
        recentPaths: [...this.recentPaths],
        frequencyCounts: new Map(this.frequencyCounts),
      };
    });
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.loadFromDisk();
    }
  }

  private async loadFromDisk(): Promise<void> {
    const history = await this.historyFile.load();
    this.recentPaths = history.recentPaths.slice(0, this.recentLimit);
    this.frequencyCounts = new Map(Object.entries(history.frequencyCounts));
    this.loaded = true;
    await this.prune();
    this.logger.debug(
      `History loaded: recent=${this.recentPaths.length}, frequent=${this.frequencyCounts.size}`,
    );
  }

  private async prune(): Promise<void> {
    const recent: string[] = [];
    for (const entryPath of this.recentPaths) {
      if (await this.fileSystem.exists(entryPath)) {
        recent.push(entryPath);
      }
    }
    this.recentPaths = recent;

    const counts = new Map<string, number>();
    for (const [entryPath, count] of this.frequencyCounts) {
      if (await this.fileSystem.exists(entryPath)) {
        counts.set(entryPath, count);
      }
    }
    this.frequencyCounts = counts;
  }

  private async persist(): Promise<void> {
    const document: AccessHistory = {
      recentPaths: [...this.recentPaths],
      frequencyCounts: Object.fromEntries(this.frequencyCounts),
    };
    await this.historyFile.save(document);
  }

  private async describe(paths: readonly string[], limit = Number.POSITIVE_INFINITY): Promise<FileDescriptor[]> {
    const descriptors: FileDescriptor[] = [];
    for (const entryPath of paths) {
      if (descriptors.length >= limit) {
        break;
      }
      const descriptor = await this.resolver.resolve(entryPath);
      if (descriptor) {
        descriptors.push(descriptor);
      }
    }
    return descriptors;
  }
}
