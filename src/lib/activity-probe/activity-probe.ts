import type { LoggerService } from '../logger';
import { ProbeProtocolError, ProbeUnreachableError } from './errors';
import { createFullStatQuery } from './query-client';
import type { ActivitySample, ProbeTarget, StatusQuery } from './types';

export const MAX_PROBE_TIMEOUT_MS = 5000;

export interface ActivityProbeOptions {
  logger: LoggerService;
  /** Clamped to `MAX_PROBE_TIMEOUT_MS` */
  timeoutMS?: number;
  /** Defaults to the game's full stat query */
  query?: StatusQuery;
  now?: () => number;
}

/**
 * Samples a server's reachability and player count with one status query.
 *
 * `sample()` never throws and never retries; every failure ends up in the
 * returned sample. Reachability changes are logged once per transition.
 */
export class ActivityProbe {
  private logger: LoggerService;
  private timeoutMS: number;
  private query: StatusQuery;
  private now: () => number;

  private lastReachable?: boolean;
  private everReachable = false;

  constructor(options: ActivityProbeOptions) {
    this.logger = options.logger;
    this.timeoutMS = Math.min(
      options.timeoutMS ?? MAX_PROBE_TIMEOUT_MS,
      MAX_PROBE_TIMEOUT_MS,
    );
    this.query = options.query ?? createFullStatQuery();
    this.now = options.now ?? Date.now;
  }

  public get hasBeenReachable(): boolean {
    return this.everReachable;
  }

  public async sample(target: ProbeTarget): Promise<ActivitySample> {
    const timestamp = this.now();

    try {
      const status = await this.query(target, this.timeoutMS);

      this.noteReachable(target);

      return {
        timestamp,
        reachable: true,
        playerCount: status.playerCount,
        maxPlayers: status.maxPlayers,
        players: status.players,
      };
    } catch (error) {
      const probeError =
        error instanceof ProbeUnreachableError ||
        error instanceof ProbeProtocolError
          ? error
          : new ProbeUnreachableError(
              {
                ...target,
                reason: error instanceof Error ? error.message : String(error),
              },
              error instanceof Error ? error : undefined,
            );

      this.noteUnreachable(target, probeError.message);

      return {
        timestamp,
        reachable: false,
        error: probeError.message,
        errorCode: probeError.errCode,
      };
    }
  }

  /**
   * Forget the reachability history, e.g. for a new server run
   */
  public reset(): void {
    this.lastReachable = undefined;
    this.everReachable = false;
  }

  private noteReachable(target: ProbeTarget): void {
    if (this.lastReachable === false) {
      if (this.everReachable) {
        this.logger.success('Server at {{host}}:{{port}} is reachable again', {
          params: { ...target },
        });
      } else {
        this.logger.info('Server at {{host}}:{{port}} is answering', {
          params: { ...target },
        });
      }
    }

    this.lastReachable = true;
    this.everReachable = true;
  }

  private noteUnreachable(target: ProbeTarget, reason: string): void {
    if (this.lastReachable !== false) {
      // Before the first answer the server is most likely still booting
      if (this.everReachable) {
        this.logger.warn('Server at {{host}}:{{port}} stopped answering: {{reason}}', {
          params: { ...target, reason },
        });
      } else {
        this.logger.info('Server at {{host}}:{{port}} is not answering yet', {
          params: { ...target },
        });
      }
    }

    this.lastReachable = false;
  }
}
