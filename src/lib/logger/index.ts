import { EventEmitter } from '../event-emitter';
import { safeHandleCallbackAndWait, setCallbackErrorReporter } from '../safe-handle-callback';
import type { CallbackErrorReporter } from '../safe-handle-callback';
import { isNumber, isPromise } from '../type-guards';
import type {
  BeforeExitCallback,
  BeforeExitResult,
  LogEntry,
  LoggerEventMap,
  LoggerOptions,
  LogOptions,
  LogSink,
  LogType,
} from './types';
import type { HandleLogOptions } from './internal-types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import { applyRedaction } from './utils/redaction';
import { prepareErrorObjectLog } from './utils/error-object';
import { renderTemplate } from './utils/template';
import { LoggerService } from './logger-service';

type SinkErrorContext = 'write' | 'close';

/**
 * Fans log entries out to sinks and owns the way the control panel exits.
 *
 * Components log through `logger.service(name)`, and per role through
 * `.entity(role)`. `exit()` is the only path that ends the process, so
 * cleanup registered with `setBeforeExitCallback()` (stopping the managed
 * processes) always runs first.
 */
export class Logger extends EventEmitter<LoggerEventMap> {
  private sinks: LogSink[];
  private readonly callProcessExit: boolean;
  private readonly onSinkError?: LoggerOptions['onSinkError'];
  private beforeExitCallback?: BeforeExitCallback;
  private replacedCallbackReporter?: CallbackErrorReporter;

  private exitState: {
    requested: boolean;
    done: boolean;
    code: number;
  } = { requested: false, done: false, code: 0 };

  private isClosed = false;

  constructor(options: LoggerOptions = {}) {
    super();

    this.sinks = options.sinks ? [...options.sinks] : [];
    this.callProcessExit = options.callProcessExit ?? true;
    this.beforeExitCallback = options.beforeExitCallback;
    this.onSinkError = options.onSinkError;
  }

  /**
   * A logger that records into an `ArraySink` and never ends the process
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    arrayLogTransformer?: (entry: LogEntry) => LogEntry | false;
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink({ transformer: options?.arrayLogTransformer });
    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    const sinks: LogSink[] = consoleSink ? [arraySink, consoleSink] : [arraySink];

    return {
      logger: new Logger({
        sinks: [...sinks, ...(options?.sinks ?? [])],
        callProcessExit: false,
      }),
      arraySink,
      consoleSink,
    };
  }

  /** True once `exit()` has been called, even while cleanup still runs */
  public get exitRequested(): boolean {
    return this.exitState.requested;
  }

  public get didExit(): boolean {
    return this.exitState.done;
  }

  public get exitCode(): number {
    return this.exitState.code;
  }

  public get closed(): boolean {
    return this.isClosed;
  }

  // ---------------------------------------------------------------------
  // Logging
  // ---------------------------------------------------------------------

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log `error` under `prefix`, keeping the original on the entry
   */
  public errorObject(prefix: string, error: unknown, options?: LogOptions): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), { ...options, error });
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Unformatted line, such as a managed process's console output
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  // ---------------------------------------------------------------------
  // Sinks
  // ---------------------------------------------------------------------

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * @returns false when the sink was not attached
   */
  public removeSink(sink: LogSink): boolean {
    const before = this.sinks.length;
    this.sinks = this.sinks.filter((attached) => attached !== sink);
    return this.sinks.length !== before;
  }

  /**
   * Close every sink. Entries logged afterwards are dropped.
   */
  public async close(): Promise<void> {
    this.isClosed = true;

    const sinks = this.sinks;
    this.sinks = [];

    await Promise.all(sinks.map((sink) => this.closeSink(sink)));

    this.unregisterCallbackErrorReporter();
    this.emit('logger', { eventType: 'close' });
  }

  // ---------------------------------------------------------------------
  // Callback errors
  // ---------------------------------------------------------------------

  /**
   * Log errors thrown by event listeners and hooks run through
   * `safeHandleCallback`, instead of printing them to stderr
   */
  public registerCallbackErrorReporter(
    prefix: string = 'Callback failed',
  ): 'success' | 'already_registered' {
    if (this.replacedCallbackReporter) {
      return 'already_registered';
    }

    this.replacedCallbackReporter = setCallbackErrorReporter((error) => {
      this.errorObject(prefix, error);
      this.emit('logger', { eventType: 'callback-error', error });
    });

    return 'success';
  }

  public unregisterCallbackErrorReporter(): 'success' | 'not_registered' {
    if (!this.replacedCallbackReporter) {
      return 'not_registered';
    }

    setCallbackErrorReporter(this.replacedCallbackReporter);
    this.replacedCallbackReporter = undefined;

    return 'success';
  }

  // ---------------------------------------------------------------------
  // Exit
  // ---------------------------------------------------------------------

  public setBeforeExitCallback(callback: BeforeExitCallback | undefined): void {
    this.beforeExitCallback = callback;
  }

  /**
   * End the control panel. The before-exit callback runs first; when it
   * answers `wait` another exit is already cleaning up and will finish the
   * job. Sinks are closed before `process.exit`.
   */
  public exit(code: number): void {
    const isFirstExit = !this.exitState.requested;
    this.exitState.requested = true;

    this.emit('logger', { eventType: 'exit-called', code, isFirstExit });

    const callback = this.beforeExitCallback;

    if (!callback) {
      this.finishExit(code);
      return;
    }

    void safeHandleCallbackAndWait<BeforeExitResult, [number, boolean]>(
      'beforeExit',
      callback,
      code,
      isFirstExit,
    ).then((result) => {
      // A failed callback still exits
      if (result.success && result.value?.action === 'wait') {
        return;
      }

      this.finishExit(code);
    });
  }

  protected handleLog(type: LogType, template: string, options?: HandleLogOptions): void {
    if (this.isClosed) {
      return;
    }

    const entry = createEntry(type, template, options);

    for (const sink of this.sinks) {
      this.writeToSink(sink, entry);
    }

    this.emit('logger', {
      eventType: 'log',
      logType: type,
      message: entry.message,
      timestamp: entry.timestamp,
    });

    if (entry.exitCode !== undefined) {
      this.exit(entry.exitCode);
    }
  }

  private writeToSink(sink: LogSink, entry: LogEntry): void {
    try {
      const result = sink.write(entry);

      if (isPromise(result)) {
        result.catch((error: unknown) => this.reportSinkError(error, 'write', sink));
      }
    } catch (error) {
      this.reportSinkError(error, 'write', sink);
    }
  }

  private async closeSink(sink: LogSink): Promise<void> {
    if (!sink.close) {
      return;
    }

    try {
      await sink.close();
    } catch (error) {
      this.reportSinkError(error, 'close', sink);
    }
  }

  private reportSinkError(value: unknown, context: SinkErrorContext, sink: LogSink): void {
    const error = value instanceof Error ? value : new Error(String(value));

    if (!this.onSinkError) {
      // eslint-disable-next-line no-console
      console.error(
        `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${error.message}`,
      );
      return;
    }

    try {
      this.onSinkError(error, context, sink);
    } catch {
      // eslint-disable-next-line no-console
      console.error(`Error in onSinkError handler: ${error.message}`);
    }
  }

  private finishExit(code: number): void {
    this.exitState.done = true;
    this.exitState.code = code;

    this.emit('logger', { eventType: 'exit-process', code });

    void this.close().finally(() => {
      if (this.callProcessExit) {
        process.exit(code);
      }
    });
  }
}

/**
 * Secrets are masked before the template is rendered, so they never reach
 * `message`. `params` keeps the clear values for sinks that need them.
 */
function createEntry(type: LogType, template: string, options: HandleLogOptions = {}): LogEntry {
  const { params, redactedKeys, exitCode } = options;
  const redactedParams = params ? applyRedaction(params, redactedKeys) : undefined;

  return {
    timestamp: Date.now(),
    type,
    serviceName: options.serviceName?.trim() || undefined,
    entityName: options.entityName?.trim() || undefined,
    template,
    message: redactedParams ? renderTemplate(template, redactedParams) : template,
    params,
    redactedParams,
    redactedKeys: params && redactedKeys?.length ? redactedKeys : undefined,
    error: options.error,
    exitCode: isNumber(exitCode) ? exitCode : undefined,
  };
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
