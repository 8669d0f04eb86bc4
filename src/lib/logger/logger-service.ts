import type { LogOptions, LogType } from './types';
import type { HandleLogFunction } from './internal-types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * Scoped logger that stamps every entry with a service name, and optionally an
 * entity name.
 *
 * ```typescript
 * const log = logger.service('lifecycle-controller');
 * log.entity('server').info('Server STARTED with PID {{pid}}', {
 *   params: { pid: 4242 },
 * });
 * ```
 */
export class LoggerService {
  private readonly handleLog: HandleLogFunction;
  private readonly serviceName: string;
  private readonly entityName?: string;

  constructor(
    handleLog: HandleLogFunction,
    serviceName: string,
    entityName?: string,
  ) {
    this.handleLog = handleLog;
    this.serviceName = serviceName;
    this.entityName = entityName;
  }

  /**
   * Derive a logger for one entity of this service (a role, a profile, ...)
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, this.serviceName, entityName);
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
  }

  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    this.log('error', prepareErrorObjectLog(prefix, error), options, error);
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  public raw(message: string, options?: LogOptions): void {
    this.log('raw', message, options);
  }

  private log(
    type: LogType,
    message: string,
    options?: LogOptions,
    error?: unknown,
  ): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
      error,
    });
  }
}
