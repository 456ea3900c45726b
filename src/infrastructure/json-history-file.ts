import path from 'node:path';

import type { HistoryPort } from '../application/ports/history.port';
import type { FileSystemPort } from '../application/ports/file-system.port';
import { accessHistorySchema, emptyAccessHistory } from '../domain/access-history';
import type { AccessHistory } from '../domain/access-history';
import { getLogger } from '../utils/get-logger';

export class JsonHistoryFile implements HistoryPort {
  private readonly logger = getLogger('history-file');

  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly historyPath: string,
  ) { }

  public async load(): Promise<AccessHistory> {
    if (!(await this.fileSystem.exists(this.historyPath))) {
      return emptyAccessHistory();
    }

    let content: string;
    try {
      content = await this.fileSystem.readFile(this.historyPath);
    } catch (error) {
      this.logger.warn(
        { path: this.historyPath, error: error instanceof Error ? error.message : error },
        'History file unreadable, starting with empty history',
      );
      return emptyAccessHistory();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      this.logger.warn(
        { path: this.historyPath, error: error instanceof Error ? error.message : error },
        'History file is not valid JSON, starting with empty history',
      );
      return emptyAccessHistory();
    }

    const parsed = accessHistorySchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(
        { path: this.historyPath, issues: parsed.error.issues.length },
        'History file has an unexpected shape, starting with empty history',
      );
      return emptyAccessHistory();
    }
    return parsed.data;
  }

  public async save(history: AccessHistory): Promise<void> {
    await this.fileSystem.ensureDirectory(path.dirname(this.historyPath));
    await this.fileSystem.writeFileAtomic(this.historyPath, JSON.stringify(history, null, 2));
  }
}
