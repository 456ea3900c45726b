import path from 'node:path';

import type { DiskSpace, FileSystemPort } from '../ports/file-system.port';
import type { MetadataResolver } from './metadata-resolver';
import type { FileDescriptor } from '../../domain/file-descriptor';
import { FS_ERROR_CODE, failure, success, toFailure } from '../../domain/file-operation-error';
import type { OperationResult } from '../../domain/file-operation-error';
import { getLogger } from '../../utils/get-logger';

export type BulkDeleteResult = {
  path: string;
  result: OperationResult<string>;
};

/**
 * Directories first, then case-insensitive name.
 */
export const compareForListing = (left: FileDescriptor, right: FileDescriptor): number => {
  if (left.isDirectory !== right.isDirectory) {
    return left.isDirectory ? -1 : 1;
  }
  const leftName = left.name.toLowerCase();
  const rightName = right.name.toLowerCase();
  if (leftName === rightName) {
    return 0;
  }
  return leftName < rightName ? -1 : 1;
};

const isPlainName = (name: string): boolean =>
  name.trim().length > 0 && name !== '.' && name !== '..' && !/[\\/]/.test(name);

/**
 * Single-target operations. Expected failures (missing path, permissions,
 * name collisions) come back as failed results, never as exceptions.
 */
export class FileOperations {
  private readonly logger = getLogger('file-operations');

  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly resolver: MetadataResolver,
  ) { }

  public async listDirectory(targetPath: string): Promise<OperationResult<FileDescriptor[]>> {
    const directory = path.resolve(targetPath);
    const check = await this.requireDirectory(directory);
    if (!check.ok) {
      return check;
    }
    if (!(await this.fileSystem.canRead(directory))) {
      return failure(FS_ERROR_CODE.PERMISSION_DENIED, directory, `No read permission for directory '${directory}'`);
    }

    try {
      const entries = await this.fileSystem.listEntries(directory);
      const descriptors: FileDescriptor[] = [];
      for (const entry of entries) {
        const descriptor = await this.resolver.resolve(entry.path);
        if (descriptor) {
          descriptors.push(descriptor);
        }
      }
      descriptors.sort(compareForListing);
      return success(descriptors);
    } catch (error) {
      return toFailure(error, directory, 'Listing directory');
    }
  }

  public async copyItem(source: string, destinationDir: string): Promise<OperationResult<string>> {
    const sourcePath = path.resolve(source);
    const prepared = await this.prepareTransfer(sourcePath, path.resolve(destinationDir));
    if (!prepared.ok) {
      return prepared;
    }

    try {
      await this.fileSystem.copy(sourcePath, prepared.value);
      this.logger.info({ source: sourcePath, destination: prepared.value }, 'Copied item');
      return success(prepared.value);
    } catch (error) {
      return toFailure(error, sourcePath, 'Copy');
    }
  }

  public async moveItem(source: string, destinationDir: string): Promise<OperationResult<string>> {
    const sourcePath = path.resolve(source);
    const prepared = await this.prepareTransfer(sourcePath, path.resolve(destinationDir));
    if (!prepared.ok) {
      return prepared;
    }
    if (!(await this.fileSystem.canWrite(path.dirname(sourcePath)))) {
      return failure(FS_ERROR_CODE.PERMISSION_DENIED, sourcePath, `No permission to remove '${sourcePath}' from its directory`);
    }

    try {
      await this.fileSystem.rename(sourcePath, prepared.value);
      this.logger.info({ source: sourcePath, destination: prepared.value }, 'Moved item');
      return success(prepared.value);
    } catch (error) {
      return toFailure(error, sourcePath, 'Move');
    }
  }

  public async deleteItem(targetPath: string): Promise<OperationResult<string>> {
    const absolutePath = path.resolve(targetPath);
    if (!(await this.fileSystem.exists(absolutePath))) {
      return failure(FS_ERROR_CODE.NOT_FOUND, absolutePath, `Item does not exist: '${absolutePath}'`);
    }
    if (!(await this.fileSystem.canWrite(path.dirname(absolutePath)))) {
      return failure(FS_ERROR_CODE.PERMISSION_DENIED, absolutePath, `No permission to delete '${absolutePath}'`);
    }

    try {
      await this.fileSystem.remove(absolutePath);
      this.logger.info({ path: absolutePath }, 'Deleted item');
      return success(absolutePath);
    } catch (error) {
      return toFailure(error, absolutePath, 'Delete');
    }
  }

  public async deleteItems(paths: readonly string[]): Promise<BulkDeleteResult[]> {
    const results: BulkDeleteResult[] = [];
    for (const targetPath of paths) {
      results.push({ path: targetPath, result: await this.deleteItem(targetPath) });
    }
    const failed = results.filter((entry) => !entry.result.ok).length;
    this.logger.info(`Bulk delete finished: requested=${paths.length}, failed=${failed}`);
    return results;
  }

  public async createFolder(parentDir: string, folderName: string): Promise<OperationResult<string>> {
    const parent = path.resolve(parentDir);
    if (!isPlainName(folderName)) {
      return failure(FS_ERROR_CODE.INVALID_TARGET, parent, `Invalid folder name: '${folderName}'`);
    }
    const check = await this.requireDirectory(parent);
    if (!check.ok) {
      return check;
    }
    if (!(await this.fileSystem.canWrite(parent))) {
      return failure(FS_ERROR_CODE.PERMISSION_DENIED, parent, `No permission to create a folder in '${parent}'`);
    }

    const newPath = path.join(parent, folderName);
    if (await this.fileSystem.exists(newPath)) {
      return failure(FS_ERROR_CODE.ALREADY_EXISTS, newPath, `Folder '${folderName}' already exists`);
    }
    try {
      await this.fileSystem.makeDirectory(newPath);
      return success(newPath);
    } catch (error) {
      return toFailure(error, newPath, 'Creating folder');
    }
  }

  public async renameItem(targetPath: string, newName: string): Promise<OperationResult<string>> {
    const oldPath = path.resolve(targetPath);
    if (!isPlainName(newName)) {
      return failure(FS_ERROR_CODE.INVALID_TARGET, oldPath, `Invalid name: '${newName}'`);
    }
    if (!(await this.fileSystem.exists(oldPath))) {
      return failure(FS_ERROR_CODE.NOT_FOUND, oldPath, `Item does not exist: '${oldPath}'`);
    }
    const parent = path.dirname(oldPath);
    if (!(await this.fileSystem.canWrite(parent))) {
      return failure(FS_ERROR_CODE.PERMISSION_DENIED, oldPath, `No permission to rename inside '${parent}'`);
    }

    const newPath = path.join(parent, newName);
    if (await this.fileSystem.exists(newPath)) {
      return failure(FS_ERROR_CODE.ALREADY_EXISTS, newPath, `Name '${newName}' already exists in this directory`);
    }
    try {
      await this.fileSystem.rename(oldPath, newPath);
      return success(newPath);
    } catch (error) {
      return toFailure(error, oldPath, 'Rename');
    }
  }

  public async diskSpace(targetPath: string): Promise<OperationResult<DiskSpace>> {
    const absolutePath = path.resolve(targetPath);
    try {
      return success(await this.fileSystem.diskSpace(absolutePath));
    } catch (error) {
      return toFailure(error, absolutePath, 'Reading disk space');
    }
  }

  private async requireDirectory(directory: string): Promise<OperationResult<string>> {
    try {
      const stats = await this.fileSystem.stat(directory);
      if (!stats.isDirectory) {
        return failure(FS_ERROR_CODE.INVALID_TARGET, directory, `Not a directory: '${directory}'`);
      }
      return success(directory);
    } catch (error) {
      return toFailure(error, directory, 'Reading directory');
    }
  }

  /**
   * Validates source and destination and returns the destination path.
   */
  private async prepareTransfer(sourcePath: string, destinationDir: string): Promise<OperationResult<string>> {
    if (!(await this.fileSystem.exists(sourcePath))) {
      return failure(FS_ERROR_CODE.NOT_FOUND, sourcePath, `Source does not exist: '${sourcePath}'`);
    }
    const check = await this.requireDirectory(destinationDir);
    if (!check.ok) {
      return check;
    }
    if (!(await this.fileSystem.canWrite(destinationDir))) {
      return failure(FS_ERROR_CODE.PERMISSION_DENIED, destinationDir, `No write permission for '${destinationDir}'`);
    }

    const destinationPath = path.join(destinationDir, path.basename(sourcePath));
    if (destinationPath.startsWith(`${sourcePath}${path.sep}`)) {
      return failure(FS_ERROR_CODE.INVALID_TARGET, destinationPath, `Cannot place '${sourcePath}' inside itself`);
    }
    if (await this.fileSystem.exists(destinationPath)) {
      return failure(
        FS_ERROR_CODE.ALREADY_EXISTS,
        destinationPath,
        `'${path.basename(sourcePath)}' already exists at the destination`,
      );
    }
    return success(destinationPath);
  }
}
