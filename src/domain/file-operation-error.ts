import type { ValueOf } from '../types/value-of';

export const FS_ERROR_CODE = {
  NOT_FOUND: 'not-found',
  PERMISSION_DENIED: 'permission-denied',
  INVALID_TARGET: 'invalid-target',
  ALREADY_EXISTS: 'already-exists',
  IO_FAILURE: 'io-failure',
} as const;

export type FsErrorCode = ValueOf<typeof FS_ERROR_CODE>;

export class FileOperationError extends Error {
  public readonly code: FsErrorCode;
  public readonly path: string;

  public constructor(code: FsErrorCode, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileOperationError';
    this.code = code;
    this.path = path;
  }
}

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FileOperationError };

export const success = <T>(value: T): OperationResult<T> => ({ ok: true, value });

export const failure = <T>(
  code: FsErrorCode,
  path: string,
  message: string,
  cause?: unknown,
): OperationResult<T> => ({
  ok: false,
  error: new FileOperationError(code, path, message, cause === undefined ? undefined : { cause }),
});

const NODE_ERROR_CODES: Record<string, FsErrorCode> = {
  ENOENT: FS_ERROR_CODE.NOT_FOUND,
  EACCES: FS_ERROR_CODE.PERMISSION_DENIED,
  EPERM: FS_ERROR_CODE.PERMISSION_DENIED,
  EEXIST: FS_ERROR_CODE.ALREADY_EXISTS,
  ENOTEMPTY: FS_ERROR_CODE.ALREADY_EXISTS,
  ENOTDIR: FS_ERROR_CODE.INVALID_TARGET,
  EISDIR: FS_ERROR_CODE.INVALID_TARGET,
  EINVAL: FS_ERROR_CODE.INVALID_TARGET,
};

const nodeErrorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

export const classifyError = (error: unknown): FsErrorCode => {
  const code = nodeErrorCode(error);
  return (code ? NODE_ERROR_CODES[code] : undefined) ?? FS_ERROR_CODE.IO_FAILURE;
};

export const toFailure = <T>(error: unknown, path: string, action: string): OperationResult<T> => {
  const code = classifyError(error);
  const detail = error instanceof Error ? error.message : String(error);
  return failure(code, path, `${action} failed for '${path}': ${detail}`, error);
};
