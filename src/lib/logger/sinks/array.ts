import type { ArrayLogTransformer, LogEntry, LogSink, LogType } from '../types';

/**
 * ArraySink keeps entries in memory so tests can assert on what was logged
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    const transformed = this.transformer ? this.transformer(entry) : false;
    this.logs.push(transformed === false ? entry : transformed);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * Entries rendered as `type: message`, handy for `toEqual` assertions
   */
  public getLines(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  /**
   * Entries matching a log type and, optionally, a service and entity
   */
  public find(
    type: LogType,
    scope?: { serviceName?: string; entityName?: string },
  ): LogEntry[] {
    return this.logs.filter(
      (log) =>
        log.type === type &&
        (scope?.serviceName === undefined ||
          log.serviceName === scope.serviceName) &&
        (scope?.entityName === undefined ||
          log.entityName === scope.entityName),
    );
  }

  public close(): void {
    this.closed = true;
  }
}
