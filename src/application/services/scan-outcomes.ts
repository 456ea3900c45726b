import type { FileSystemPort } from '../ports/file-system.port';
import type { TreeWalker, WalkOptions } from './tree-walker';
import { ENTRY_TYPE } from '../../domain/file-descriptor';
import { getLogger } from '../../utils/get-logger';

export type ScannedFile = {
  path: string;
  name: string;
  sizeBytes: number;
  modifiedAt: Date;
};

export type ScanOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; path: string; reason: string };

const logger = getLogger('scan-outcomes');

/**
 * Stat every regular file the walker reaches. Entries that vanish or cannot be
 * statted come back as failed outcomes instead of throwing.
 */
export async function* statRegularFiles(
  walker: TreeWalker,
  fileSystem: FileSystemPort,
  root: string,
  options: WalkOptions = {},
): AsyncGenerator<ScanOutcome<ScannedFile>> {
  for await (const entry of walker.walkEntries(root, options)) {
    if (entry.type !== ENTRY_TYPE.FILE) {
      continue;
    }
    try {
      const stats = await fileSystem.stat(entry.path);
      if (!stats.isFile) {
        continue;
      }
      yield {
        ok: true,
        value: {
          path: entry.path,
          name: entry.name,
          sizeBytes: stats.sizeBytes,
          modifiedAt: stats.modifiedAt,
        },
      };
    } catch (error) {
      yield {
        ok: false,
        path: entry.path,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

/**
 * Drop failed outcomes, logging each at debug level.
 */
export async function* successfulOnly<T>(
  outcomes: AsyncIterable<ScanOutcome<T>>,
): AsyncGenerator<T> {
  for await (const outcome of outcomes) {
    if (outcome.ok) {
      yield outcome.value;
    } else {
      logger.debug(`Skipped entry: path=${outcome.path}, error=${outcome.reason}`);
    }
  }
}

export const scanRegularFiles = (
  walker: TreeWalker,
  fileSystem: FileSystemPort,
  root: string,
  options: WalkOptions = {},
): AsyncGenerator<ScannedFile> => successfulOnly(statRegularFiles(walker, fileSystem, root, options));
