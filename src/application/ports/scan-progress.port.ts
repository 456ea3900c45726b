export type ProcessedStatus = 'matched' | 'skipped';

export interface ScanProgressPort {
  updateCurrent(label: string, entryCount?: number): void;
  addProcessed(name: string, sizeBytes: number, status: ProcessedStatus): void;
}
