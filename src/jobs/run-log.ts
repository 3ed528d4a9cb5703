import { RunLogDocument, RunLogEntry, RunStatus } from '../schemas';
import { DocumentStore, DOCUMENTS } from '../storage/document-store';
import { ProgressReporter } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { formatLogTimestamp } from '../utils/time';

export const MAX_LOG_ENTRIES = 50;
export const FLUSH_EVERY = 5;

export interface RunLogOptions {
  prefix?: string;
  now?: () => Date;
  echo?: (line: string) => void;
}

/**
 * Progress lines of one run, mirrored to the logs document in batches.
 * Only the most recent MAX_LOG_ENTRIES lines are kept.
 */
export class RunLog implements ProgressReporter {
  private entries: RunLogEntry[] = [];
  private unflushed = 0;
  private lastFraction = 0;
  private readonly now: () => Date;
  private readonly echo: (line: string) => void;
  private readonly prefix: string;

  constructor(private readonly store: DocumentStore, options: RunLogOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.echo = options.echo ?? (line => console.log(line));
    this.prefix = options.prefix ?? 'Scrape';
  }

  async status(message: string): Promise<void> {
    this.echo(`${this.prefix}: ${message}`);
    this.entries.push({ timestamp: formatLogTimestamp(this.now()), message });
    if (this.entries.length > MAX_LOG_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_LOG_ENTRIES);
    }
    this.unflushed++;

    if (this.unflushed >= FLUSH_EVERY || message.includes('Completed') || message.includes('Error')) {
      await this.flush('running');
    }
  }

  progress(fraction: number): void {
    this.lastFraction = Math.max(this.lastFraction, Math.min(1, fraction));
  }

  getProgress(): number {
    return this.lastFraction;
  }

  getEntries(): RunLogEntry[] {
    return [...this.entries];
  }

  /**
   * Write the current window with the given status. Sink failures are logged, never thrown.
   */
  async flush(status: RunStatus): Promise<void> {
    const document: RunLogDocument = {
      lastUpdated: formatLogTimestamp(this.now()),
      status,
      progress: this.lastFraction,
      logs: this.getEntries(),
    };
    this.unflushed = 0;

    const result = await this.store.save(DOCUMENTS.logs, document, 'Update execution logs');
    if (!result.ok) {
      debugLogger.warn('RUN_LOG', 'Failed to flush run log', { status, error: result.message });
      console.warn(`Failed to write run log: ${result.message}`);
    }
  }
}
