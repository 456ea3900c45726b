import type { ProcessedStatus, ScanProgressPort } from '../application/ports/scan-progress.port';
import { formatBytes } from './format-bytes';

export type ProcessedItemStats = {
  name: string;
  sizeBytes: number;
  status: ProcessedStatus;
};

/**
 * TUI Progress Display - Shows real-time progress on the same screen
 */
export class TUIProgress implements ScanProgressPort {
  private currentItem: { label: string; entryCount?: number } | null = null;
  private processedItems: ProcessedItemStats[] = [];
  private totalProcessed = 0;
  private matchedSizeBytes = 0;
  private lastRender = 0;

  public constructor(
    private readonly title: string,
    private readonly output: NodeJS.WriteStream = process.stdout,
    private readonly minRenderIntervalMs = 50,
  ) { }

  public updateCurrent(label: string, entryCount?: number): void {
    this.currentItem = { label, entryCount };
    this.render();
  }

  public addProcessed(name: string, sizeBytes: number, status: ProcessedStatus): void {
    this.processedItems.push({ name, sizeBytes, status });
    if (this.processedItems.length > 15) {
      this.processedItems.shift();
    }
    this.totalProcessed += 1;
    if (status === 'matched') {
      this.matchedSizeBytes += sizeBytes;
    }
    this.render();
  }

  public clear(): void {
    this.output.write('\x1b[2J\x1b[H');
  }

  /**
   * Final render (keep the display after completion)
   */
  public finalize(): void {
    this.currentItem = null;
    this.render(true);
    this.output.write('\n✅ Scan complete!\n');
  }

  private render(force = false): void {
    const now = Date.now();
    if (!force && now - this.lastRender < this.minRenderIntervalMs) {
      return;
    }
    this.lastRender = now;

    const lines: string[] = [
      '\x1b[H\x1b[2J',
      '╔═══════════════════════════════════════════════════════════╗',
      `║ ${this.title.padEnd(57)} ║`,
      '╚═══════════════════════════════════════════════════════════╝',
      '',
    ];

    const current = this.currentItem
      ? `${this.currentItem.label}${this.currentItem.entryCount !== undefined ? ` (${this.currentItem.entryCount} entries)` : ''}`
      : 'Idle';
    lines.push(`📂 Current: ${current}`, '');

    lines.push(
      '📊 Statistics:',
      `  Total processed: ${this.totalProcessed} items`,
      `  Matched size: ${formatBytes(this.matchedSizeBytes)}`,
      '',
    );

    if (this.processedItems.length > 0) {
      lines.push('📋 Recent Items:');
      lines.push('───────────────────────────────────────────────────────────');
      for (const item of this.processedItems) {
        const icon = item.status === 'matched' ? '✓' : '⊘';
        lines.push(`  ${icon} [${item.status}] ${item.name} (${formatBytes(item.sizeBytes)})`);
      }
      lines.push('───────────────────────────────────────────────────────────');
    }

    this.output.write(`${lines.join('\n')}\n`);
  }
}
