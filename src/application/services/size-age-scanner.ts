import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import type { MetadataResolver } from './metadata-resolver';
import type { TreeWalker, WalkOptions } from './tree-walker';
import { scanRegularFiles } from './scan-outcomes';
import type { ScannedFile } from './scan-outcomes';
import type { FileDescriptor } from '../../domain/file-descriptor';
import {
  DEFAULT_LARGE_FILE_MIN_SIZE,
  DEFAULT_OLD_FILE_MIN_AGE_DAYS,
  DEFAULT_SCAN_RESULT_LIMIT,
  MS_PER_DAY,
} from '../../config/constants';
import { getLogger } from '../../utils/get-logger';

export type LargeFileOptions = WalkOptions & {
  minSizeBytes?: number;
  limit?: number;
};

export type OldFileOptions = WalkOptions & {
  minAgeDays?: number;
  limit?: number;
  /** Reference time for the cutoff; defaults to the scan start. */
  now?: Date;
};

/**
 * Large and old file discovery. Age is always judged by modification time.
 */
export class SizeAgeScanner {
  private readonly logger = getLogger('size-age-scanner');

  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly walker: TreeWalker,
    private readonly resolver: MetadataResolver,
  ) { }

  public async findLargeFiles(root: string, options: LargeFileOptions = {}): Promise<FileDescriptor[]> {
    const { minSizeBytes = DEFAULT_LARGE_FILE_MIN_SIZE, limit = DEFAULT_SCAN_RESULT_LIMIT, signal, progress } = options;

    const matches = await this.collect(root, { signal, progress }, (file) => file.sizeBytes >= minSizeBytes);
    matches.sort((left, right) => right.sizeBytes - left.sizeBytes);
    const descriptors = await this.describe(matches.slice(0, Math.max(0, limit)));

    this.logger.info(`Large file scan finished: root=${root}, matches=${matches.length}, returned=${descriptors.length}`);
    return descriptors;
  }

  public async findOldFiles(root: string, options: OldFileOptions = {}): Promise<FileDescriptor[]> {
    const { minAgeDays = DEFAULT_OLD_FILE_MIN_AGE_DAYS, limit = DEFAULT_SCAN_RESULT_LIMIT, signal, progress } = options;
    const cutoff = (options.now ?? new Date()).getTime() - minAgeDays * MS_PER_DAY;

    const matches = await this.collect(root, { signal, progress }, (file) => file.modifiedAt.getTime() < cutoff);
    matches.sort((left, right) => left.modifiedAt.getTime() - right.modifiedAt.getTime());
    const descriptors = await this.describe(matches.slice(0, Math.max(0, limit)));

    this.logger.info(`Old file scan finished: root=${root}, matches=${matches.length}, returned=${descriptors.length}`);
    return descriptors;
  }

  private async collect(
    root: string,
    options: WalkOptions,
    predicate: (file: ScannedFile) => boolean,
  ): Promise<ScannedFile[]> {
    const matches: ScannedFile[] = [];
    for await (const file of scanRegularFiles(this.walker, this.fileSystem, root, options)) {
      if (predicate(file)) {
        matches.push(file);
        options.progress?.addProcessed(path.basename(file.path), file.sizeBytes, 'matched');
      }
    }
    return matches;
  }

  // files deleted since the walk resolve to null and are dropped
  private async describe(files: ScannedFile[]): Promise<FileDescriptor[]> {
    const descriptors: FileDescriptor[] = [];
    for (const file of files) {
      const descriptor = await this.resolver.resolve(file.path);
      if (descriptor) {
        descriptors.push(descriptor);
      }
    }
    return descriptors;
  }
}
