import type { ProbeTarget } from './types';

/**
 * The server did not answer: timeout, refusal or a socket error
 */
export class ProbeUnreachableError extends Error {
  public errPrefix = 'ActivityProbeErr';
  public errType = 'Query';
  public errCode = 'Unreachable' as const;
  public additionalInfo: ProbeTarget & { reason: string };

  constructor(additionalInfo: ProbeTarget & { reason: string }, cause?: Error) {
    super(
      `Server at ${additionalInfo.host}:${additionalInfo.port} is unreachable (${additionalInfo.reason})`,
      { cause },
    );
    this.name = 'ProbeUnreachableError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * The server answered, but without a usable player count
 */
export class ProbeProtocolError extends Error {
  public errPrefix = 'ActivityProbeErr';
  public errType = 'Query';
  public errCode = 'ProtocolError' as const;
  public additionalInfo: ProbeTarget & { reason: string };

  constructor(additionalInfo: ProbeTarget & { reason: string }) {
    super(
      `Server at ${additionalInfo.host}:${additionalInfo.port} sent an invalid status (${additionalInfo.reason})`,
    );
    this.name = 'ProbeProtocolError';
    this.additionalInfo = additionalInfo;
  }
}

export type ProbeError = ProbeUnreachableError | ProbeProtocolError;
