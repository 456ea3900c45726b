import type { AccessHistory } from '../../domain/access-history';

export interface HistoryPort {
  /** Missing or unreadable documents load as empty history. */
  load(): Promise<AccessHistory>;
  save(history: AccessHistory): Promise<void>;
}
