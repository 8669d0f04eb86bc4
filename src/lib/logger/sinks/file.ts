import { promises as fsPromises } from 'fs';
import path from 'path';
import { format } from 'date-fns';
import type { LogEntry, LogSink } from '../types';

export interface FileSinkOptions {
  logDir: string;
  /** File name stem; each day writes to `<yyyy-MM-dd>_<basename>.log` */
  basename: string;
  jsonFormat?: boolean;
  onError?: (error: Error, entry: LogEntry) => void;
}

export interface FlushResult {
  entriesWritten: number;
  entriesFailed: number;
}

/**
 * FileSink appends log lines to one file per calendar day.
 *
 * Writes are queued and applied in order by a single drain loop, so
 * `write()` never blocks the caller. Use `flush()` to wait for the queue.
 */
export class FileSink implements LogSink {
  private logDir: string;
  private basename: string;
  private jsonFormat: boolean;
  private onError?: (error: Error, entry: LogEntry) => void;

  private queue: LogEntry[] = [];
  private draining?: Promise<void>;
  private dirReady?: Promise<void>;
  private totalWritten = 0;
  private totalFailed = 0;
  private closed = false;

  constructor(options: FileSinkOptions) {
    this.logDir = options.logDir;
    this.basename = options.basename;
    this.jsonFormat = options.jsonFormat ?? false;
    this.onError = options.onError;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    this.queue.push(entry);

    if (!this.draining) {
      this.draining = this.drain().finally(() => {
        this.draining = undefined;
      });
    }
  }

  /**
   * Path of the file an entry written at `timestamp` lands in
   */
  public getFilePath(timestamp: number = Date.now()): string {
    const day = format(timestamp, 'yyyy-MM-dd');
    return path.join(this.logDir, `${day}_${this.basename}.log`);
  }

  /**
   * Wait until every queued entry has been written (or has failed)
   */
  public async flush(): Promise<FlushResult> {
    const startWritten = this.totalWritten;
    const startFailed = this.totalFailed;

    while (this.draining) {
      await this.draining;
    }

    return {
      entriesWritten: this.totalWritten - startWritten,
      entriesFailed: this.totalFailed - startFailed,
    };
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    await this.flush();
    this.closed = true;
  }

  private async drain(): Promise<void> {
    let entry = this.queue.shift();

    while (entry) {
      try {
        await this.ensureDir();
        await fsPromises.appendFile(
          this.getFilePath(entry.timestamp),
          this.formatEntry(entry) + '\n',
          'utf8',
        );
        this.totalWritten++;
      } catch (error) {
        this.totalFailed++;
        this.reportError(
          error instanceof Error ? error : new Error(String(error)),
          entry,
        );
      }

      entry = this.queue.shift();
    }
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = fsPromises
        .mkdir(this.logDir, { recursive: true })
        .then(() => undefined)
        .catch((error: unknown) => {
          // Retry the mkdir on the next entry
          this.dirReady = undefined;
          throw error;
        });
    }

    return this.dirReady;
  }

  private reportError(error: Error, entry: LogEntry): void {
    if (this.onError) {
      this.onError(error, entry);
    } else {
      // eslint-disable-next-line no-console
      console.error(`FileSink write failed: ${error.message}`);
    }
  }

  private formatEntry(entry: LogEntry): string {
    if (this.jsonFormat) {
      return JSON.stringify({
        timestamp: entry.timestamp,
        type: entry.type,
        serviceName: entry.serviceName,
        entityName: entry.entityName,
        message: entry.message,
        params: entry.redactedParams,
        exitCode: entry.exitCode,
      });
    }

    if (entry.type === 'raw') {
      return entry.message;
    }

    let line = `[${format(entry.timestamp, 'yyyy-MM-dd HH:mm:ss')}] [${entry.type.toUpperCase()}]`;

    if (entry.serviceName) {
      line += ` [${entry.serviceName}]`;
    }

    if (entry.entityName) {
      line += ` [${entry.entityName}]`;
    }

    return `${line} ${entry.message}`;
  }
}
