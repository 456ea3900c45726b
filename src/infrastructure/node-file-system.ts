import { constants, createReadStream, promises as fs } from 'node:fs';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';

import type {
  DiskSpace,
  FileStats,
  FileSystemEntry,
  FileSystemPort,
} from '../application/ports/file-system.port';
import { ENTRY_TYPE } from '../domain/file-descriptor';

const mapEntryType = (entry: Dirent): FileSystemEntry['type'] => {
  if (entry.isFile()) {
    return ENTRY_TYPE.FILE;
  }
  if (entry.isDirectory()) {
    return ENTRY_TYPE.DIRECTORY;
  }
  if (entry.isSymbolicLink()) {
    return ENTRY_TYPE.SYMLINK;
  }
  return ENTRY_TYPE.OTHER;
};

export class NodeFileSystem implements FileSystemPort {
  public async exists(targetPath: string): Promise<boolean> {
    try {
      await fs.access(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  public async canRead(targetPath: string): Promise<boolean> {
    try {
      await fs.access(targetPath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  public async canWrite(targetPath: string): Promise<boolean> {
    try {
      await fs.access(targetPath, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  public async listEntries(targetPath: string): Promise<FileSystemEntry[]> {
    const entries = await fs.readdir(targetPath, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      path: path.join(targetPath, entry.name),
      type: mapEntryType(entry),
    }));
  }

  public async stat(targetPath: string): Promise<FileStats> {
    const stats = await fs.stat(targetPath);
    return {
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
      sizeBytes: stats.isDirectory() ? 0 : stats.size,
      modifiedAt: stats.mtime,
    };
  }

  public openReadStream(targetPath: string, chunkSize: number, signal?: AbortSignal): Readable {
    return createReadStream(targetPath, { highWaterMark: chunkSize, signal });
  }

  public async readFile(targetPath: string): Promise<string> {
    return fs.readFile(targetPath, 'utf8');
  }

  public async ensureDirectory(targetPath: string): Promise<void> {
    await fs.mkdir(targetPath, { recursive: true });
  }

  public async makeDirectory(targetPath: string): Promise<void> {
    await fs.mkdir(targetPath);
  }

  public async writeFileAtomic(targetPath: string, contents: string): Promise<void> {
    const tempPath = `${targetPath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(tempPath, contents, 'utf8');
      await fs.rename(tempPath, targetPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  public async copy(source: string, destination: string): Promise<void> {
    await fs.cp(source, destination, {
      recursive: true,
      errorOnExist: true,
      force: false,
      preserveTimestamps: true,
    });
  }

  public async rename(source: string, destination: string): Promise<void> {
    try {
      await fs.rename(source, destination);
    } catch (error) {
      // rename cannot cross devices; fall back to copy + remove
      if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
        await this.copy(source, destination);
        await this.remove(source);
        return;
      }
      throw error;
    }
  }

  public async remove(targetPath: string): Promise<void> {
    await fs.rm(targetPath, { recursive: true });
  }

  public async diskSpace(targetPath: string): Promise<DiskSpace> {
    const stats = await fs.statfs(targetPath);
    return {
      totalBytes: stats.blocks * stats.bsize,
      freeBytes: stats.bavail * stats.bsize,
    };
  }
}
