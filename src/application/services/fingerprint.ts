import { createHash } from 'node:crypto';

import { z } from 'zod';

import type { FileSystemPort } from '../ports/file-system.port';
import { DIGEST_CHUNK_SIZE } from '../../config/constants';
import { getLogger } from '../../utils/get-logger';

export const hashAlgorithmSchema = z.enum(['md5', 'sha1', 'sha256']);

export type HashAlgorithm = z.infer<typeof hashAlgorithmSchema>;

export const chunkSizeSchema = z.number().int().positive();

export type DigestOptions = {
  algorithm?: HashAlgorithm;
  chunkSize?: number;
  signal?: AbortSignal;
};

/**
 * Streams file contents through a hash in fixed-size chunks, so memory use
 * does not grow with file size.
 */
export class FingerprintEngine {
  private readonly logger = getLogger('fingerprint');

  public constructor(private readonly fileSystem: FileSystemPort) { }

  /**
   * Hex digest of a regular file, or null when it cannot be read or the chunk
   * size is not a positive integer. An aborted signal is rethrown rather than
   * reported as a read failure.
   */
  public async digest(filePath: string, options: DigestOptions = {}): Promise<string | null> {
    const { algorithm = 'md5', chunkSize = DIGEST_CHUNK_SIZE, signal } = options;
    if (!chunkSizeSchema.safeParse(chunkSize).success) {
      this.logger.debug(`Digest skipped: path=${filePath}, invalid chunkSize=${chunkSize}`);
      return null;
    }
    try {
      const stats = await this.fileSystem.stat(filePath);
      if (!stats.isFile) {
        return null;
      }

      const hash = createHash(algorithm);
      const stream = this.fileSystem.openReadStream(filePath, chunkSize, signal);
      for await (const chunk of stream) {
        hash.update(chunk);
      }
      return hash.digest('hex');
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      this.logger.debug(
        `Digest failed: path=${filePath}, error=${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
