import { EventEmitterProtected } from '../event-emitter';
import type { ActivitySample, ProbeTarget } from '../activity-probe';
import type { LoggerService } from '../logger';
import { safeHandleCallback } from '../safe-handle-callback';
import type { ShutdownPlan } from '../shutdown-sequencer';
import type {
  ActivitySampler,
  InactivityMonitorEventMap,
  InactivityMonitorOptions,
  InactivityMonitorState,
  InactivityWindow,
  SuspendReason,
} from './types';

/**
 * Tracks how long a running server has had no players and hands a shutdown
 * plan to `onThreshold` once the idle time reaches the limit.
 *
 * Ticks run on a single timer: the next tick is only scheduled after the
 * current one finished. Every `start()` gets its own AbortController, and
 * `suspend()` aborts it, so a tick that is mid-query when a manual stop
 * arrives drops its result instead of acting on it.
 */
export class InactivityMonitor extends EventEmitterProtected<InactivityMonitorEventMap> {
  private logger: LoggerService;
  private probe: ActivitySampler;
  private target: ProbeTarget;
  private intervalSeconds: number;
  private unreachableTickLimit: number;
  private sleepHostAfter: boolean;
  private shutdownAppAfter: boolean;
  private onThreshold: InactivityMonitorOptions['onThreshold'];
  private now: () => number;

  private state: InactivityMonitorState = 'suspended';
  private suspendReason?: SuspendReason = 'not-started';
  private window: InactivityWindow;
  private consecutiveUnreachable = 0;
  private abortController?: AbortController;
  private timer?: NodeJS.Timeout;

  constructor(options: InactivityMonitorOptions) {
    super();

    this.logger = options.logger;
    this.probe = options.probe;
    this.target = options.target;
    this.intervalSeconds = options.intervalSeconds;
    this.unreachableTickLimit = options.unreachableTickLimit ?? 3;
    this.sleepHostAfter = options.sleepHostAfter;
    this.shutdownAppAfter = options.shutdownAppAfter;
    this.onThreshold = options.onThreshold;
    this.now = options.now ?? Date.now;

    this.window = {
      accumulatedIdleSeconds: 0,
      limitSeconds: options.limitSeconds,
      lastActiveAt: this.now(),
    };
  }

  public getState(): InactivityMonitorState {
    return this.state;
  }

  /**
   * Why tracking is suspended, undefined while tracking
   */
  public getSuspendReason(): SuspendReason | undefined {
    return this.suspendReason;
  }

  public getWindow(): InactivityWindow {
    return { ...this.window };
  }

  /**
   * Begin idle tracking from zero. Restarting an active monitor resets it.
   */
  public start(): void {
    this.cancel();

    this.abortController = new AbortController();
    this.consecutiveUnreachable = 0;
    this.window = {
      ...this.window,
      accumulatedIdleSeconds: 0,
      lastActiveAt: this.now(),
    };

    this.setState('idle-tracking');
    this.logger.info(
      'Inactivity tracking started: limit {{limit}}s, polling every {{interval}}s',
      {
        params: {
          limit: this.window.limitSeconds,
          interval: this.intervalSeconds,
        },
      },
    );

    this.schedule(this.abortController.signal);
  }

  /**
   * Stop tracking. A tick in flight is discarded when it returns.
   */
  public suspend(reason: SuspendReason): void {
    if (this.state === 'suspended') {
      return;
    }

    this.cancel();
    this.setState('suspended', reason);
    this.logger.info('Inactivity tracking suspended ({{reason}})', {
      params: { reason },
    });
  }

  private cancel(): void {
    this.abortController?.abort();
    this.abortController = undefined;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private schedule(signal: AbortSignal): void {
    if (signal.aborted) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = undefined;

      this.tick(signal).catch((error: unknown) => {
        this.logger.errorObject('Inactivity tick failed', error);
        this.schedule(signal);
      });
    }, this.intervalSeconds * 1000);
  }

  private async tick(signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return;
    }

    const sample = await this.probe.sample(this.target);

    if (signal.aborted) {
      return;
    }

    if (!sample.reachable) {
      this.handleUnreachable(sample, signal);
      return;
    }

    if (this.consecutiveUnreachable > 0) {
      this.logger.debug('Probe recovered, idle window reset');
      this.consecutiveUnreachable = 0;
      this.window.accumulatedIdleSeconds = 0;
    }

    const playerCount = sample.playerCount ?? 0;

    if (playerCount > 0) {
      this.window.accumulatedIdleSeconds = 0;
      this.window.lastActiveAt = sample.timestamp;
    } else {
      this.window.accumulatedIdleSeconds += this.intervalSeconds;
    }

    this.logger.debug('{{players}} player(s) online, idle for {{idle}}s of {{limit}}s', {
      params: {
        players: playerCount,
        idle: this.window.accumulatedIdleSeconds,
        limit: this.window.limitSeconds,
      },
    });

    this.emit('tick', { sample, window: this.getWindow() });

    if (this.window.accumulatedIdleSeconds >= this.window.limitSeconds) {
      // A manual stop may have landed while listeners ran
      if (signal.aborted) {
        return;
      }

      this.fireThreshold();
      return;
    }

    this.schedule(signal);
  }

  private handleUnreachable(sample: ActivitySample, signal: AbortSignal): void {
    this.consecutiveUnreachable++;
    this.emit('tick', { sample, window: this.getWindow() });

    if (this.consecutiveUnreachable < this.unreachableTickLimit) {
      this.schedule(signal);
      return;
    }

    const consecutiveFailures = this.consecutiveUnreachable;

    this.logger.warn(
      'Server unreachable for {{count}} consecutive checks, inactivity tracking stopped: {{reason}}',
      { params: { count: consecutiveFailures, reason: sample.error } },
    );

    this.suspend('probe-failed');
    this.emit('probe-failed', { consecutiveFailures, sample });
  }

  private fireThreshold(): void {
    const plan: ShutdownPlan = {
      trigger: 'inactivity',
      sleepHostAfter: this.sleepHostAfter,
      shutdownAppAfter: this.shutdownAppAfter,
    };
    const window = this.getWindow();

    this.logger.notice(
      'No players for {{idle}}s (limit {{limit}}s), requesting shutdown',
      {
        params: {
          idle: window.accumulatedIdleSeconds,
          limit: window.limitSeconds,
        },
      },
    );

    this.suspend('threshold');
    this.emit('threshold', { plan, window });
    safeHandleCallback('onThreshold', this.onThreshold, plan);
  }

  private setState(state: InactivityMonitorState, reason?: SuspendReason): void {
    this.state = state;
    this.suspendReason = reason;
    this.emit('state-changed', { state, reason });
  }
}
