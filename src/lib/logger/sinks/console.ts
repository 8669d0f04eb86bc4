import { format } from 'date-fns';
import type { LogEntry, LogSink, LogType } from '../types';
import { LogLevel, getLogLevel } from '../types';
import { colorize } from '../utils/color';

export interface ConsoleSinkOptions {
  colors?: boolean;
  timestamps?: boolean;
  typeLabels?: boolean;
  muted?: boolean;
  minLevel?: LogLevel;
}

type ConsoleMethod = 'error' | 'warn' | 'info' | 'log';

const CONSOLE_METHODS: Record<LogType, ConsoleMethod> = {
  error: 'error',
  warn: 'warn',
  info: 'info',
  success: 'log',
  notice: 'log',
  debug: 'log',
  raw: 'log',
};

/**
 * Writes entries to the terminal the control panel runs in. Managed process
 * output arrives as `raw` entries and is printed as is.
 */
export class ConsoleSink implements LogSink {
  private colors: boolean;
  private timestamps: boolean;
  private typeLabels: boolean;
  private closed = false;
  private muted: boolean;
  private minLevel: LogLevel;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? false;
    this.typeLabels = options.typeLabels ?? false;
    this.muted = options.muted ?? false;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  public write(entry: LogEntry): void {
    if (this.closed || this.muted) {
      return;
    }

    // Raw entries skip formatting and level filtering
    if (entry.type === 'raw') {
      // eslint-disable-next-line no-console
      console.log(entry.message);
      return;
    }

    if (getLogLevel(entry.type) > this.minLevel) {
      return;
    }

    const line = this.formatLine(entry);

    // eslint-disable-next-line no-console
    console[CONSOLE_METHODS[entry.type]](
      this.colors ? colorize(entry.type, line) : line,
    );
  }

  /**
   * `[timestamp] [TYPE] [service] [entity] message`, each label optional
   */
  public formatLine(entry: LogEntry): string {
    const labels = [
      this.timestamps ? format(entry.timestamp, 'MM-dd-yyyy HH:mm:ss') : undefined,
      this.typeLabels ? entry.type.toUpperCase() : undefined,
      entry.serviceName,
      entry.entityName,
    ].filter((label): label is string => label !== undefined);

    return labels.map((label) => `[${label}] `).join('') + entry.message;
  }

  public setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  public getMinLevel(): LogLevel {
    return this.minLevel;
  }

  public mute(): void {
    this.muted = true;
  }

  public unmute(): void {
    this.muted = false;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  public close(): void {
    this.closed = true;
  }
}
