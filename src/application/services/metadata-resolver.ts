import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import { CATEGORY_ICON, categorize } from '../../domain/file-category';
import type { FileDescriptor } from '../../domain/file-descriptor';
import { formatBytes } from '../../utils/format-bytes';
import { getLogger } from '../../utils/get-logger';

export class MetadataResolver {
  private readonly logger = getLogger('metadata-resolver');

  public constructor(private readonly fileSystem: FileSystemPort) { }

  /**
   * Snapshot a path, or null when it does not exist or cannot be statted.
   */
  public async resolve(targetPath: string): Promise<FileDescriptor | null> {
    const absolutePath = path.resolve(targetPath);
    try {
      const stats = await this.fileSystem.stat(absolutePath);
      const name = path.basename(absolutePath) || absolutePath;
      const category = categorize(name, stats.isDirectory);
      return {
        path: absolutePath,
        name,
        isDirectory: stats.isDirectory,
        sizeBytes: stats.isDirectory ? 0 : stats.sizeBytes,
        formattedSize: stats.isDirectory ? null : formatBytes(stats.sizeBytes),
        modifiedAt: stats.modifiedAt,
        category,
        icon: CATEGORY_ICON[category],
      };
    } catch (error) {
      this.logger.debug(
        `Cannot resolve path=${absolutePath}, error=${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
