import { safeHandleCallback } from './safe-handle-callback';

/**
 * The signals that request a shutdown of everything the control panel runs.
 * SIGBREAK is Ctrl+Break on Windows and is only listened for there.
 */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM' | 'SIGBREAK';

export interface ProcessSignalManagerStatus {
  isAttached: boolean;
  handlers: {
    shutdown: boolean;
    reload: boolean;
  };
  listeningFor: ShutdownSignal[];
}

export interface ProcessSignalManagerOptions {
  onShutdownRequested?: (signal: ShutdownSignal) => void | Promise<void>;
  /** SIGHUP, outside Windows. Typically re-reads the active profile. */
  onReloadRequested?: () => void | Promise<unknown>;
  /** Defaults to `process`; tests pass an emitter of their own */
  target?: SignalTarget;
  platform?: NodeJS.Platform;
}

/**
 * The part of `process` this manager touches
 */
export interface SignalTarget {
  on(event: string, listener: () => void): unknown;
  off(event: string, listener: () => void): unknown;
}

/**
 * Routes process signals to shutdown and reload callbacks.
 *
 * Listeners are only registered between `attach()` and `detach()`, so a
 * library embedding the controller keeps the default signal behavior until
 * it opts in. Callbacks run through `safeHandleCallback`.
 */
export class ProcessSignalManager {
  private readonly onShutdownRequested?: ProcessSignalManagerOptions['onShutdownRequested'];
  private readonly onReloadRequested?: ProcessSignalManagerOptions['onReloadRequested'];
  private readonly target: SignalTarget;
  private readonly shutdownSignals: ShutdownSignal[];
  private readonly reloadSignal?: 'SIGHUP';

  private shutdownListeners = new Map<ShutdownSignal, () => void>();
  private reloadListener?: () => void;
  private _isAttached = false;

  constructor(options: ProcessSignalManagerOptions) {
    const platform = options.platform ?? process.platform;

    this.onShutdownRequested = options.onShutdownRequested;
    this.onReloadRequested = options.onReloadRequested;
    this.target = options.target ?? process;

    this.shutdownSignals =
      platform === 'win32'
        ? ['SIGINT', 'SIGTERM', 'SIGBREAK']
        : ['SIGINT', 'SIGTERM'];

    if (platform !== 'win32') {
      this.reloadSignal = 'SIGHUP';
    }
  }

  public get isAttached(): boolean {
    return this._isAttached;
  }

  public getStatus(): ProcessSignalManagerStatus {
    return {
      isAttached: this._isAttached,
      handlers: {
        shutdown: this.onShutdownRequested !== undefined,
        reload: this.onReloadRequested !== undefined,
      },
      listeningFor: [...this.shutdownListeners.keys()],
    };
  }

  /**
   * Start listening. Idempotent.
   */
  public attach(): void {
    if (this._isAttached) {
      return;
    }

    const shutdownCallback = this.onShutdownRequested;

    if (shutdownCallback) {
      for (const signal of this.shutdownSignals) {
        const listener = (): void =>
          safeHandleCallback('onShutdownRequested', shutdownCallback, signal);

        this.shutdownListeners.set(signal, listener);
        this.target.on(signal, listener);
      }
    }

    const reloadCallback = this.onReloadRequested;

    if (reloadCallback && this.reloadSignal) {
      this.reloadListener = (): void =>
        safeHandleCallback('onReloadRequested', reloadCallback);
      this.target.on(this.reloadSignal, this.reloadListener);
    }

    this._isAttached = true;
  }

  /**
   * Stop listening and restore the default signal behavior. Idempotent.
   */
  public detach(): void {
    if (!this._isAttached) {
      return;
    }

    for (const [signal, listener] of this.shutdownListeners) {
      this.target.off(signal, listener);
    }

    this.shutdownListeners.clear();

    if (this.reloadListener && this.reloadSignal) {
      this.target.off(this.reloadSignal, this.reloadListener);
      this.reloadListener = undefined;
    }

    this._isAttached = false;
  }

  /**
   * Run the shutdown callback as if `signal` had arrived
   */
  public triggerShutdown(signal: ShutdownSignal = 'SIGTERM'): void {
    if (this.onShutdownRequested) {
      safeHandleCallback('onShutdownRequested', this.onShutdownRequested, signal);
    }
  }

  public triggerReload(): void {
    if (this.onReloadRequested) {
      safeHandleCallback('onReloadRequested', this.onReloadRequested);
    }
  }
}
