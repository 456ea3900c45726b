import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import type { FingerprintEngine, HashAlgorithm } from './fingerprint';
import type { TreeWalker, WalkOptions } from './tree-walker';
import { scanRegularFiles } from './scan-outcomes';
import type { DuplicateGroup, DuplicateReport } from '../../domain/file-descriptor';
import { DEFAULT_DIGEST_CONCURRENCY, DEFAULT_DUPLICATE_MIN_SIZE } from '../../config/constants';
import { getLogger } from '../../utils/get-logger';
import { runWithConcurrency } from '../../utils/run-with-concurrency';

export type DuplicateScanOptions = WalkOptions & {
  algorithm?: HashAlgorithm;
  minSizeBytes?: number;
  concurrency?: number;
};

/**
 * Two-phase duplicate search: bucket regular files by exact size, then digest
 * only the buckets holding two or more files and group those by digest.
 */
export class DuplicateDetector {
  private readonly logger = getLogger('duplicate-detector');

  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly walker: TreeWalker,
    private readonly fingerprint: FingerprintEngine,
  ) { }

  public async scan(root: string, options: DuplicateScanOptions = {}): Promise<DuplicateReport> {
    const {
      algorithm = 'md5',
      minSizeBytes = DEFAULT_DUPLICATE_MIN_SIZE,
      concurrency = DEFAULT_DIGEST_CONCURRENCY,
      signal,
      progress,
    } = options;
    const absoluteRoot = path.resolve(root);

    const sizeBuckets = new Map<number, string[]>();
    let filesScanned = 0;
    for await (const file of scanRegularFiles(this.walker, this.fileSystem, absoluteRoot, { signal, progress })) {
      filesScanned += 1;
      if (file.sizeBytes < minSizeBytes) {
        continue;
      }
      const bucket = sizeBuckets.get(file.sizeBytes) ?? [];
      bucket.push(file.path);
      sizeBuckets.set(file.sizeBytes, bucket);
    }

    const groups: DuplicateGroup[] = [];
    let filesHashed = 0;
    let hashErrors = 0;

    for (const [sizeBytes, paths] of sizeBuckets) {
      if (paths.length < 2) {
        continue;
      }
      signal?.throwIfAborted();

      const digests = await runWithConcurrency(
        paths.map((filePath) => () => this.fingerprint.digest(filePath, { algorithm, signal })),
        concurrency,
      );

      const byDigest = new Map<string, string[]>();
      paths.forEach((filePath, index) => {
        const digest = digests[index];
        if (!digest) {
          hashErrors += 1;
          progress?.addProcessed(path.basename(filePath), sizeBytes, 'skipped');
          return;
        }
        filesHashed += 1;
        const members = byDigest.get(digest) ?? [];
        members.push(filePath);
        byDigest.set(digest, members);
      });

      for (const [digest, members] of byDigest) {
        if (members.length >= 2) {
          groups.push({ digest, sizeBytes, paths: members });
          progress?.addProcessed(path.basename(members[0] ?? digest), sizeBytes * members.length, 'matched');
        }
      }
    }

    const wastedBytes = groups.reduce((sum, group) => sum + group.sizeBytes * (group.paths.length - 1), 0);
    this.logger.info(
      `Duplicate scan finished: root=${absoluteRoot}, files=${filesScanned}, hashed=${filesHashed}, groups=${groups.length}, errors=${hashErrors}`,
    );

    return {
      generatedAt: new Date().toISOString(),
      root: absoluteRoot,
      groups,
      filesScanned,
      filesHashed,
      hashErrors,
      wastedBytes,
    };
  }

  /**
   * Digest → member paths, in group discovery order.
   */
  public async findDuplicates(root: string, options: DuplicateScanOptions = {}): Promise<Map<string, string[]>> {
    const report = await this.scan(root, options);
    return toDigestMap(report.groups);
  }
}

export const toDigestMap = (groups: readonly DuplicateGroup[]): Map<string, string[]> => {
  const result = new Map<string, string[]>();
  for (const group of groups) {
    // same digest at a different size would be a hash collision; first group wins
    if (!result.has(group.digest)) {
      result.set(group.digest, [...group.paths]);
    }
  }
  return result;
};
