export type LogType =
  | 'error'
  | 'warn'
  | 'notice'
  | 'success'
  | 'info'
  | 'debug'
  | 'raw';

/**
 * Severity used by sinks that filter. Lower is more important; `success`
 * shares the `INFO` level.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2,
  INFO = 3,
  DEBUG = 4,
}

const LOG_LEVELS: Record<Exclude<LogType, 'raw'>, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  notice: LogLevel.NOTICE,
  success: LogLevel.INFO,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

/**
 * Raw lines have no level; sinks pass them through unfiltered
 */
export function getLogLevel(type: Exclude<LogType, 'raw'>): LogLevel {
  return LOG_LEVELS[type];
}

export interface LogOptions {
  /** Values for the `{{placeholders}}` of the message */
  params?: Record<string, unknown>;
  /** Dot paths into `params` masked before rendering, e.g. `profile.rconPassword` */
  redactedKeys?: string[];
  /** Exit the control panel with this code after logging */
  exitCode?: number;
}

export interface LogEntry {
  timestamp: number;
  type: LogType;
  /** Component, e.g. `lifecycle-controller` */
  serviceName?: string;
  /** Role or profile within the component */
  entityName?: string;
  /** `Server STARTED with PID {{pid}}` */
  template: string;
  /** `Server STARTED with PID 4242`, rendered from `redactedParams` */
  message: string;
  params?: Record<string, unknown>;
  redactedParams?: Record<string, unknown>;
  redactedKeys?: string[];
  /** What `errorObject()` was given */
  error?: unknown;
  exitCode?: number;
}

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

export interface BeforeExitResult {
  /**
   * `proceed` exits once the callback returns; `wait` leaves the exit to
   * the cleanup that is already running
   */
  action: 'proceed' | 'wait';
}

export type BeforeExitCallback = (
  exitCode: number,
  isFirstExit: boolean,
) => BeforeExitResult | Promise<BeforeExitResult>;

export type RedactFunction = (keyName: string, value: unknown) => unknown;

/**
 * Returns a replacement entry for the `ArraySink`, or false to store the
 * entry as is
 */
export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export interface LoggerOptions {
  sinks?: LogSink[];
  /** Whether `exit()` ends the process; tests turn it off */
  callProcessExit?: boolean;
  beforeExitCallback?: BeforeExitCallback;
  onSinkError?: (error: Error, context: 'write' | 'close', sink: LogSink) => void;
}

export type LoggerEvent =
  | { eventType: 'log'; logType: LogType; message: string; timestamp: number }
  | { eventType: 'exit-called'; code: number; isFirstExit: boolean }
  | { eventType: 'exit-process'; code: number }
  | { eventType: 'callback-error'; error: Error }
  | { eventType: 'close' };

export type LoggerEventMap = {
  logger: LoggerEvent;
};
