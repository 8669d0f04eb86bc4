import path from 'path';
import { ActivityProbe } from '../activity-probe';
import { InactivityMonitor } from '../inactivity-monitor';
import type { ActivitySampler } from '../inactivity-monitor';
import { FileSink } from '../logger';
import type { Logger, LoggerService } from '../logger';
import { ProcessSignalManager } from '../process-signal-manager';
import type { SignalTarget } from '../process-signal-manager';
import {
  ProcessHandle,
  RconControlChannel,
  ROLES,
  SpawnAlreadyRunningError,
  StdinControlChannel,
} from '../process-handle';
import type { LaunchSpec, ProcessExitInfo, Role, SpawnError } from '../process-handle';
import { ShutdownSequencer } from '../shutdown-sequencer';
import type {
  HostInvoker,
  RoleHandles,
  RoleTransition,
  ShutdownPlan,
  ShutdownReport,
  ShutdownStep,
} from '../shutdown-sequencer';
import { sleep } from '../sleep';
import {
  PROFILE_SECRET_KEYS,
  buildAuxiliaryLaunchSpec,
  buildProfileEnvironment,
  buildServerLaunchSpec,
  getProbeTarget,
  parseControlPanelConfig,
  parseProfileConfig,
} from './config';
import type { ControlPanelConfig, ControlPanelConfigInput, ProfileConfig } from './config';
import { ControlError } from './errors';
import type { ControlErrorCode, ControlErrorInfo } from './errors';
import { LifecycleEventBus } from './events';
import type { LifecycleEvent, LifecycleEventListener, SubscribeOptions } from './events';
import { createAppExitInvoker, createHostSleepInvoker } from './host-invokers';
import { canTransition, RoleStateMachine } from './role-state';
import { RoleGuard } from './role-guard';
import { describeStatus, getStatusKey } from './status';
import type {
  AuxiliaryRole,
  ControllerState,
  ControlResult,
  ManagedProcess,
  OperationOutcome,
  ProfileStore,
  RoleState,
  ServerStatusDescription,
} from './types';

export interface LifecycleControllerOptions {
  logger: Logger;
  profileStore: ProfileStore;
  config?: ControlPanelConfigInput;
  /** Defaults to an `ActivityProbe` over the game's query protocol */
  probe?: ActivitySampler;
  /** Defaults to a `ProcessHandle` per role */
  createProcess?: (role: Role, logger: LoggerService) => ManagedProcess;
  /** Defaults to the platform's suspend command */
  hostSleep?: HostInvoker;
  /** Defaults to `logger.exit(0)` */
  appExit?: HostInvoker;
  platform?: NodeJS.Platform;
  now?: () => number;
}

interface ActiveProfileContext {
  profile: ProfileConfig;
  env: Readonly<Record<string, string>>;
  activatedAt: number;
  monitor: InactivityMonitor;
  logSink?: FileSink;
}

interface RoleRecord {
  machine: RoleStateMachine;
  process: ManagedProcess;
}

const NO_HOST_ACTIONS = { sleepHostAfter: false, shutdownAppAfter: false } as const;

/**
 * Facade over the managed processes of one machine: the game server of the
 * active profile plus the tunnel and proxy helpers.
 *
 * The controller owns all role state. Operations return `ControlResult`
 * objects instead of throwing, and a role that is in the middle of another
 * operation answers `Busy`. Full teardowns (profile switch, inactivity,
 * shutdown) hold all three roles.
 */
export class LifecycleController {
  private readonly logger: Logger;
  private readonly log: LoggerService;
  private readonly config: ControlPanelConfig;
  private readonly profileStore: ProfileStore;
  private readonly probe: ActivitySampler;
  private readonly sequencer: ShutdownSequencer;
  private readonly bus: LifecycleEventBus;
  private readonly guard = new RoleGuard();
  private readonly roles: Record<Role, RoleRecord>;
  private readonly platform: NodeJS.Platform;
  private readonly now: () => number;

  private context?: ActiveProfileContext;
  private restarting = false;
  private restartAbort?: AbortController;
  private startupWatcher?: AbortController;
  private probeWasUnreachable = false;
  private shutdownAllPromise?: Promise<ShutdownReport>;
  private signalManager?: ProcessSignalManager;

  /**
   * @throws ControlPanelConfigError when `config` does not validate
   */
  constructor(options: LifecycleControllerOptions) {
    this.logger = options.logger;
    this.log = options.logger.service('lifecycle-controller');
    this.config = parseControlPanelConfig(options.config);
    this.profileStore = options.profileStore;
    this.platform = options.platform ?? process.platform;
    this.now = options.now ?? Date.now;

    this.probe =
      options.probe ??
      new ActivityProbe({
        logger: options.logger.service('activity-probe'),
        timeoutMS: this.config.probeTimeoutMS,
      });

    this.bus = new LifecycleEventBus({
      bufferSize: this.config.eventBufferSize,
      queueSize: this.config.eventQueueSize,
      now: this.now,
    });

    this.sequencer = new ShutdownSequencer({
      logger: options.logger.service('shutdown-sequencer'),
      gracefulStopTimeoutMS: this.config.gracefulStopTimeoutMS,
      auxiliaryStopTimeoutMS: this.config.auxiliaryStopTimeoutMS,
      stopCommand: this.config.stopCommand,
      manualStopEscalates: this.config.manualStopEscalates,
      hostSleep:
        options.hostSleep ??
        createHostSleepInvoker({
          logger: options.logger.service('host'),
          platform: this.platform,
          delayMS: this.config.hostSleepDelayMS,
        }),
      appExit: options.appExit ?? createAppExitInvoker(options.logger),
    });
    this.forwardSequencerEvents();

    const createProcess =
      options.createProcess ??
      ((role: Role, logger: LoggerService): ManagedProcess =>
        new ProcessHandle({ role, logger }));

    const createRole = (role: Role): RoleRecord => {
      const record: RoleRecord = {
        machine: new RoleStateMachine(role),
        process: createProcess(role, options.logger.service('process-handle').entity(role)),
      };
      const output = options.logger.service('console').entity(role);

      record.process.onExit((info) => this.handleProcessExit(role, info));
      record.process.onOutput(({ stream, line }) => {
        output.raw(line);
        this.bus.publish({ role, kind: 'process-output', message: line, data: { stream } });
      });

      return record;
    };

    this.roles = {
      server: createRole('server'),
      tunnel: createRole('tunnel'),
      proxy: createRole('proxy'),
    };
  }

  // ---------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------

  public getState(): ControllerState {
    const context = this.context;

    return {
      profile: context?.profile.name ?? null,
      roles: {
        server: context ? this.roles.server.machine.state : 'Inactive',
        tunnel: this.roles.tunnel.machine.state,
        proxy: this.roles.proxy.machine.state,
      },
      monitor: context
        ? { state: context.monitor.getState(), window: context.monitor.getWindow() }
        : null,
      restarting: this.restarting,
    };
  }

  /**
   * The public status key of the game server with its display message
   */
  public describeServerStatus(): ServerStatusDescription {
    return describeStatus(getStatusKey(this.getState().roles.server, this.restarting));
  }

  /**
   * The active profile, validated and frozen
   */
  public getActiveProfile(): ProfileConfig | undefined {
    return this.context?.profile;
  }

  public subscribe(listener: LifecycleEventListener, options?: SubscribeOptions): () => void {
    return this.bus.subscribe(listener, options);
  }

  /**
   * The last `eventBufferSize` events, oldest first
   */
  public getRecentEvents(): LifecycleEvent[] {
    return this.bus.getRecentEvents();
  }

  /**
   * Resolves once every subscriber has seen every published event
   */
  public whenEventsDelivered(): Promise<void> {
    return this.bus.whenIdle();
  }

  // ---------------------------------------------------------------------
  // Server
  // ---------------------------------------------------------------------

  /**
   * Spawn the server of the active profile. Returns once the process is
   * up; Starting becomes Running when it first answers a status query.
   */
  public async startServer(): Promise<ControlResult> {
    const context = this.context;

    if (!context) {
      return this.fail('NoActiveProfile', 'No active profile', { role: 'server' });
    }

    const release = this.guard.tryAcquire(['server']);

    if (!release) {
      return this.busy('server');
    }

    try {
      const server = this.roles.server;
      const rejected = this.rejectStart('server', server.machine.state);

      if (rejected) {
        return rejected;
      }

      const result = await server.process.start(this.buildServerSpec(context));

      if (!result.success) {
        return this.spawnFailed('server', result.error);
      }

      this.setRoleState('server', 'Starting', 'process spawned');
      this.bus.publish({
        role: 'server',
        kind: 'process-started',
        message: `Server STARTED with PID ${result.info.pid}`,
        data: { pid: result.info.pid, profile: context.profile.name },
      });
      this.watchStartup(context);

      return this.ok(`Server starting for profile '${context.profile.name}'`);
    } finally {
      release();
    }
  }

  /**
   * Stop the server. Returns once the stop is accepted; `completion`
   * settles when the process is gone or the stop gave up.
   */
  public async stopServer(options: { force?: boolean } = {}): Promise<ControlResult> {
    const context = this.context;
    const force = options.force ?? false;

    if (!context) {
      return this.fail('NoActiveProfile', 'No active profile', { role: 'server' });
    }

    const release = this.guard.tryAcquire(['server']);

    if (!release) {
      return this.busy('server');
    }

    const server = this.roles.server;
    const state = server.machine.state;

    if (state === 'Stopped') {
      release();
      return this.fail('NotRunning', 'Server is not running', { role: 'server', state });
    }

    if (state === 'Failed' && !force) {
      release();
      return this.roleFailed('server');
    }

    context.monitor.suspend('manual-stop');
    this.cancelStartupWatch();

    if (state === 'Starting' || state === 'Running') {
      this.setRoleState('server', 'Stopping', force ? 'force stop requested' : 'stop requested');
    }

    const plan: ShutdownPlan = { trigger: force ? 'forced' : 'manual', ...NO_HOST_ACTIONS };
    const completion = this.settle(
      this.sequencer.stopServer(plan, server.process, this.onRoleTransition),
    ).finally(release);

    return this.ok(force ? 'Server is being killed' : 'Server is stopping', completion);
  }

  public forceStopServer(): Promise<ControlResult> {
    return this.stopServer({ force: true });
  }

  /**
   * Stop the server, wait `restartDelayMS`, start it again. A stopped
   * server is simply started.
   */
  public async restartServer(): Promise<ControlResult> {
    if (!this.context) {
      return this.fail('NoActiveProfile', 'No active profile', { role: 'server' });
    }

    if (this.restarting) {
      return this.fail('Busy', 'Server is already restarting', { role: 'server' });
    }

    if (this.roles.server.machine.state === 'Stopped') {
      return this.startServer();
    }

    const stopped = await this.stopServer();

    if (!stopped.success || !stopped.completion) {
      return stopped;
    }

    const abort = new AbortController();

    this.restarting = true;
    this.restartAbort = abort;

    const completion = this.finishRestart(stopped.completion, abort.signal).finally(() => {
      this.restarting = false;

      if (this.restartAbort === abort) {
        this.restartAbort = undefined;
      }
    });

    return this.ok('Server is restarting', completion);
  }

  /**
   * Type a console command into the running server. The stop command is
   * routed through `stopServer()`.
   */
  public async sendServerCommand(command: string): Promise<ControlResult> {
    const trimmed = command.trim();

    if (trimmed === '') {
      return this.fail('InvalidCommand', 'Command is empty', { role: 'server' });
    }

    if (trimmed === this.config.stopCommand) {
      return this.stopServer();
    }

    const state = this.roles.server.machine.state;

    if (state !== 'Running' && state !== 'Starting') {
      return this.fail('NotRunning', 'Server is not running', { role: 'server', state });
    }

    const result = await this.roles.server.process.sendCommand(trimmed);

    if (!result.success) {
      return this.fail(
        'Fatal',
        `Command "${trimmed}" failed: ${result.error?.message ?? 'unknown error'}`,
        { role: 'server' },
        result.error,
      );
    }

    return this.ok(`Sent "${trimmed}"`);
  }

  // ---------------------------------------------------------------------
  // Auxiliary roles
  // ---------------------------------------------------------------------

  public startTunnel(): Promise<ControlResult> {
    return this.startAuxiliary('tunnel');
  }

  public stopTunnel(): Promise<ControlResult> {
    return this.stopAuxiliary('tunnel');
  }

  public startProxy(): Promise<ControlResult> {
    return this.startAuxiliary('proxy');
  }

  public stopProxy(): Promise<ControlResult> {
    return this.stopAuxiliary('proxy');
  }

  // ---------------------------------------------------------------------
  // Profiles and failures
  // ---------------------------------------------------------------------

  /**
   * Tear down the current profile's processes and switch to `name`. The
   * new profile is validated before anything is stopped.
   */
  public async activateProfile(
    name: string,
    options: { forceRestart?: boolean } = {},
  ): Promise<ControlResult> {
    if (this.context?.profile.name === name && !options.forceRestart) {
      return this.fail('AlreadyActive', `Profile '${name}' is already active`, {
        profile: name,
      });
    }

    const release = this.guard.tryAcquire(ROLES);

    if (!release) {
      return this.fail('Busy', 'Another operation is in progress', { profile: name });
    }

    try {
      let record: unknown;

      try {
        record = await this.profileStore.getProfile(name);
      } catch (error) {
        const cause = toError(error);
        return this.fail(
          'ProfileNotFound',
          `Could not load profile '${name}': ${cause.message}`,
          { profile: name },
          cause,
        );
      }

      if (record === undefined) {
        return this.fail('ProfileNotFound', `Profile '${name}' was not found`, {
          profile: name,
        });
      }

      const parsed = parseProfileConfig(record);

      if (!parsed.success) {
        return this.fail(
          'InvalidProfile',
          `Profile '${name}' is invalid: ${parsed.issues.join('; ')}`,
          { profile: name },
        );
      }

      const report = await this.teardown();
      const leftRunning = ROLES.filter((role) => this.roles[role].machine.state !== 'Stopped');

      if (leftRunning.length > 0) {
        const failedStep = report?.steps.find((step) => !step.success);

        return this.fail(
          failedStep?.code ?? 'RoleFailed',
          `Could not switch to profile '${name}', still running: ${leftRunning.join(', ')}`,
          { profile: name },
        );
      }

      await this.swapContext(parsed.profile);

      return this.ok(`Profile '${name}' is active`);
    } finally {
      release();
    }
  }

  /**
   * Read the active profile again and apply it. Only allowed while every
   * role is stopped.
   */
  public async reloadProfile(): Promise<ControlResult> {
    const name = this.context?.profile.name;

    if (name === undefined) {
      return this.fail('NoActiveProfile', 'No active profile');
    }

    const running = ROLES.find((role) => this.roles[role].machine.state !== 'Stopped');

    if (running) {
      return this.fail('Busy', `Stop the ${running} before reloading the profile`, {
        role: running,
      });
    }

    return this.activateProfile(name, { forceRestart: true });
  }

  /**
   * Failed → Stopped. A process that is somehow still alive is killed
   * first.
   */
  public async acknowledgeFailure(role: Role): Promise<ControlResult> {
    const release = this.guard.tryAcquire([role]);

    if (!release) {
      return this.busy(role);
    }

    try {
      const record = this.roles[role];
      const state = record.machine.state;

      if (state !== 'Failed') {
        return this.fail('NotFailed', `The ${role} has not failed`, { role, state });
      }

      const killed = await record.process.forceKill();

      if (!killed.success) {
        return this.fail('Fatal', `Could not kill the ${role}`, { role, state }, killed.error);
      }

      await record.process.release();
      this.setRoleState(role, 'Stopped', 'failure acknowledged');

      return this.ok(`The ${role} failure was acknowledged`);
    } finally {
      release();
    }
  }

  // ---------------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------------

  /**
   * Stop everything, waiting for operations in progress to finish first.
   * Concurrent calls share one run. A server that ignores the stop command
   * is killed, since nothing would be left to stop it afterwards.
   */
  public shutdownAll(reason: string): Promise<ShutdownReport> {
    if (!this.shutdownAllPromise) {
      this.shutdownAllPromise = this.runShutdownAll(reason).finally(() => {
        this.shutdownAllPromise = undefined;
      });
    }

    return this.shutdownAllPromise;
  }

  /**
   * Hand-off from the inactivity monitor. Dropped when any role is busy
   * with a manual operation or the server is no longer running. A plan
   * dropped as `Busy` restarts idle tracking once the roles are free again,
   * if the server is still running.
   */
  public async handleInactivity(plan: ShutdownPlan): Promise<ControlResult> {
    const release = this.guard.tryAcquire(ROLES);

    if (!release) {
      this.log.info('Inactivity shutdown dropped, another operation is in progress');

      if (this.context) {
        this.resumeTrackingWhenFree(this.context);
      }

      return this.fail('Busy', 'Inactivity shutdown dropped, another operation is in progress');
    }

    try {
      const state = this.roles.server.machine.state;

      if (state !== 'Running') {
        this.log.info('Inactivity shutdown dropped, the server is {{state}}', {
          params: { state },
        });
        return this.fail('NotRunning', `Inactivity shutdown dropped, the server is ${state}`, {
          role: 'server',
          state,
        });
      }

      this.cancelStartupWatch();

      const report = await this.sequencer.run(plan, this.getHandles(), this.onRoleTransition);

      if (!report.success) {
        const serverStep = report.steps[0];
        return this.fail(serverStep.code ?? 'Fatal', serverStep.message, { role: 'server' });
      }

      return this.ok('Inactivity shutdown completed');
    } finally {
      release();
    }
  }

  /**
   * Route SIGINT/SIGTERM (and SIGBREAK on Windows) to `shutdownAll()` and
   * an exit, and SIGHUP to `reloadProfile()`
   */
  public attachSignals(options: { target?: SignalTarget } = {}): ProcessSignalManager {
    if (!this.signalManager) {
      this.signalManager = new ProcessSignalManager({
        target: options.target,
        platform: this.platform,
        onShutdownRequested: async (signal) => {
          this.log.notice('Received {{signal}}, shutting down', { params: { signal } });
          await this.shutdownAll(`signal ${signal}`);
          this.logger.exit(0);
        },
        onReloadRequested: async () => {
          const result = await this.reloadProfile();

          if (!result.success) {
            this.log.warn('Profile reload skipped: {{reason}}', {
              params: { reason: result.message },
            });
          }
        },
      });
    }

    this.signalManager.attach();

    return this.signalManager;
  }

  /**
   * Make every `logger.exit()` stop the managed processes first. Only the
   * first exit runs the cleanup; later calls wait for it.
   */
  public registerExitCleanup(): void {
    this.logger.setBeforeExitCallback(async (_code, isFirstExit) => {
      if (!isFirstExit) {
        return { action: 'wait' };
      }

      await this.shutdownAll('exit');

      return { action: 'proceed' };
    });
  }

  /**
   * Detach signals, stop background work and close the profile log. Does
   * not stop processes; see `shutdownAll()`.
   */
  public async close(): Promise<void> {
    this.signalManager?.detach();
    this.cancelStartupWatch();
    this.restartAbort?.abort();

    const context = this.context;

    if (context) {
      context.monitor.suspend('deactivated');
      await this.detachProfileLog(context);
    }
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  private readonly onRoleTransition = (role: Role, transition: RoleTransition): void => {
    const state = this.roles[role].machine.state;

    switch (transition) {
      case 'stopping':
        if (state === 'Starting' || state === 'Running') {
          this.setRoleState(role, 'Stopping', 'stop in progress');
        }
        return;

      case 'stopped':
        if (state !== 'Stopped') {
          this.setRoleState(role, 'Stopped', 'process is gone');
        }

        this.releaseProcess(role);
        return;

      case 'stop-timed-out':
        this.log.entity(role).warn('Still running after the stop command, force stop to kill it');
        return;

      case 'failed':
        if (canTransition(state, 'Failed')) {
          this.setRoleState(role, 'Failed', 'stop failed');
        }
        return;
    }
  };

  private async runShutdownAll(reason: string): Promise<ShutdownReport> {
    this.log.notice('Shutting down all processes ({{reason}})', { params: { reason } });

    this.context?.monitor.suspend('deactivated');
    this.cancelStartupWatch();
    this.restartAbort?.abort();

    const release = await this.guard.acquire(ROLES);

    try {
      const plan: ShutdownPlan = { trigger: 'manual', ...NO_HOST_ACTIONS };
      const report = await this.sequencer.run(plan, this.getHandles(), this.onRoleTransition);

      if (this.roles.server.machine.state === 'Stopped') {
        return report;
      }

      this.log.warn('Server did not stop, killing it');

      const killStep = await this.sequencer.stopServer(
        { trigger: 'forced', ...NO_HOST_ACTIONS },
        this.roles.server.process,
        this.onRoleTransition,
      );

      return { ...report, success: killStep.success, steps: [...report.steps, killStep] };
    } finally {
      release();
    }
  }

  /**
   * Full sequencer pass over the current processes, skipped when nothing
   * is running
   */
  private async teardown(): Promise<ShutdownReport | undefined> {
    this.context?.monitor.suspend('deactivated');
    this.cancelStartupWatch();
    this.restartAbort?.abort();

    if (ROLES.every((role) => this.roles[role].machine.state === 'Stopped')) {
      return undefined;
    }

    return this.sequencer.run(
      { trigger: 'manual', ...NO_HOST_ACTIONS },
      this.getHandles(),
      this.onRoleTransition,
    );
  }

  private async swapContext(profile: ProfileConfig): Promise<void> {
    const previous = this.context;

    if (previous) {
      previous.monitor.suspend('deactivated');
      previous.monitor.clear();
      await this.detachProfileLog(previous);
    }

    this.probeWasUnreachable = false;
    this.context = {
      profile,
      env: Object.freeze(buildProfileEnvironment(profile, this.config.globalKeys)),
      activatedAt: this.now(),
      monitor: this.createMonitor(profile),
      logSink: this.attachProfileLog(profile),
    };

    this.log.success('Profile {{profile.name}} activated', {
      params: { profile },
      redactedKeys: PROFILE_SECRET_KEYS.map((key) => `profile.${key}`),
    });
    this.bus.publish({
      role: null,
      kind: 'profile-activated',
      message: `Profile '${profile.name}' is active`,
      data: { profile: profile.name, previous: previous?.profile.name ?? null },
    });
  }

  private createMonitor(profile: ProfileConfig): InactivityMonitor {
    const monitor = new InactivityMonitor({
      logger: this.logger.service('inactivity-monitor').entity(profile.name),
      probe: this.probe,
      target: getProbeTarget(profile),
      limitSeconds: profile.inactivityLimitSeconds,
      intervalSeconds: profile.pollingIntervalSeconds,
      unreachableTickLimit: this.config.unreachableTickLimit,
      sleepHostAfter: profile.sleepHostAfterInactivity,
      shutdownAppAfter: profile.shutdownAppAfterInactivity,
      onThreshold: async (plan) => {
        await this.handleInactivity(plan);
      },
      now: this.now,
    });

    monitor.on('tick', ({ sample, window }) => {
      if (!sample.reachable) {
        this.probeWasUnreachable = true;
      } else if (this.probeWasUnreachable) {
        this.probeWasUnreachable = false;
        this.bus.publish({
          role: 'server',
          kind: 'probe-recovered',
          message: 'Server answers status queries again',
        });
      }

      this.bus.publish({
        role: 'server',
        kind: 'inactivity-tick',
        message: sample.reachable
          ? `${sample.playerCount ?? 0} player(s) online, idle for ${window.accumulatedIdleSeconds}s of ${window.limitSeconds}s`
          : `Status query failed: ${sample.error ?? 'unknown error'}`,
        data: {
          reachable: sample.reachable,
          playerCount: sample.playerCount,
          accumulatedIdleSeconds: window.accumulatedIdleSeconds,
          limitSeconds: window.limitSeconds,
        },
      });
    });

    monitor.on('probe-failed', ({ consecutiveFailures, sample }) => {
      this.bus.publish({
        role: 'server',
        kind: 'probe-failed',
        message: `Server did not answer ${consecutiveFailures} status queries in a row, inactivity tracking suspended`,
        data: { consecutiveFailures, error: sample.error },
      });
    });

    monitor.on('threshold', ({ plan, window }) => {
      this.bus.publish({
        role: 'server',
        kind: 'inactivity-threshold',
        message: `No players for ${window.accumulatedIdleSeconds}s, shutting down`,
        data: { ...plan, accumulatedIdleSeconds: window.accumulatedIdleSeconds },
      });
    });

    return monitor;
  }

  private attachProfileLog(profile: ProfileConfig): FileSink | undefined {
    if (!this.config.profileLogFiles) {
      return undefined;
    }

    const sink = new FileSink({
      logDir: path.join(profile.serverPath, 'ControllerLogs'),
      basename: 'ControllerLogs',
    });

    this.logger.addSink(sink);

    return sink;
  }

  private async detachProfileLog(context: ActiveProfileContext): Promise<void> {
    const sink = context.logSink;

    if (!sink) {
      return;
    }

    context.logSink = undefined;
    this.logger.removeSink(sink);
    await sink.close();
  }

  private watchStartup(context: ActiveProfileContext): void {
    this.cancelStartupWatch();

    const abort = new AbortController();
    this.startupWatcher = abort;

    this.pollUntilReachable(context, abort.signal).catch((error: unknown) => {
      this.log.entity('server').errorObject('Startup watcher failed', error);
    });
  }

  private async pollUntilReachable(
    context: ActiveProfileContext,
    signal: AbortSignal,
  ): Promise<void> {
    const server = this.roles.server;
    const target = getProbeTarget(context.profile);

    while (server.machine.state === 'Starting') {
      if (!(await sleep(this.config.startupPollIntervalMS, signal))) {
        return;
      }

      if (server.machine.state !== 'Starting') {
        return;
      }

      const sample = await this.probe.sample(target);

      if (signal.aborted || server.machine.state !== 'Starting') {
        return;
      }

      if (sample.reachable) {
        this.setRoleState('server', 'Running', 'answering status queries');
        this.probeWasUnreachable = false;
        context.monitor.start();
        return;
      }
    }
  }

  private resumeTrackingWhenFree(context: ActiveProfileContext): void {
    void this.guard.acquire(ROLES).then((release) => {
      try {
        const monitor = context.monitor;

        // Anything else that suspended the monitor in the meantime wins
        if (
          this.context !== context ||
          this.roles.server.machine.state !== 'Running' ||
          monitor.getSuspendReason() !== 'threshold'
        ) {
          return;
        }

        this.log.info('Inactivity tracking restarted after a dropped shutdown');
        monitor.start();
      } finally {
        release();
      }
    });
  }

  private cancelStartupWatch(): void {
    this.startupWatcher?.abort();
    this.startupWatcher = undefined;
  }

  private async finishRestart(
    stopCompletion: Promise<OperationOutcome>,
    signal: AbortSignal,
  ): Promise<OperationOutcome> {
    const stopped = await stopCompletion;

    if (!stopped.success) {
      return stopped;
    }

    this.log.info('Waiting {{delayMS}}ms before starting the server again', {
      params: { delayMS: this.config.restartDelayMS },
    });

    if (!(await sleep(this.config.restartDelayMS, signal))) {
      return { success: false, code: 'Busy', message: 'Restart cancelled', steps: stopped.steps };
    }

    // Let startServer() see a settled state, not our own restart
    this.restarting = false;

    const started = await this.startServer();

    return {
      success: started.success,
      code: started.code,
      message: started.message,
      steps: stopped.steps,
    };
  }

  private async startAuxiliary(role: AuxiliaryRole): Promise<ControlResult> {
    const launch = this.config[role];

    if (!launch) {
      return this.fail('NotConfigured', `No ${role} is configured`, { role });
    }

    const release = this.guard.tryAcquire([role]);

    if (!release) {
      return this.busy(role);
    }

    try {
      const record = this.roles[role];
      const rejected = this.rejectStart(role, record.machine.state);

      if (rejected) {
        return rejected;
      }

      const result = await record.process.start(
        buildAuxiliaryLaunchSpec(launch, this.context?.env ?? {}),
      );

      if (!result.success) {
        return this.spawnFailed(role, result.error);
      }

      this.setRoleState(role, 'Starting', 'process spawned');
      this.bus.publish({
        role,
        kind: 'process-started',
        message: `The ${role} STARTED with PID ${result.info.pid}`,
        data: { pid: result.info.pid },
      });
      this.setRoleState(role, 'Running', 'process is up');

      return this.ok(`The ${role} started`);
    } finally {
      release();
    }
  }

  private async stopAuxiliary(role: AuxiliaryRole): Promise<ControlResult> {
    if (!this.config[role]) {
      return this.fail('NotConfigured', `No ${role} is configured`, { role });
    }

    const release = this.guard.tryAcquire([role]);

    if (!release) {
      return this.busy(role);
    }

    const record = this.roles[role];
    const state = record.machine.state;

    if (state === 'Stopped') {
      release();
      return this.fail('NotRunning', `The ${role} is not running`, { role, state });
    }

    if (state === 'Failed') {
      release();
      return this.roleFailed(role);
    }

    if (state === 'Starting' || state === 'Running') {
      this.setRoleState(role, 'Stopping', 'stop requested');
    }

    const completion = this.settle(
      this.sequencer.stopAuxiliary(role, record.process, this.onRoleTransition),
    ).finally(release);

    return this.ok(`The ${role} is stopping`, completion);
  }

  private handleProcessExit(role: Role, info: ProcessExitInfo): void {
    const record = this.roles[role];
    const state = record.machine.state;
    const how = info.signal ? `signal ${info.signal}` : `code ${String(info.code)}`;

    this.bus.publish({
      role,
      kind: 'process-exited',
      message: `The ${role} exited with ${how}`,
      data: { code: info.code, signal: info.signal, expected: info.expected },
    });

    if (state === 'Starting' || state === 'Running') {
      this.log.entity(role).error('Exited unexpectedly with {{how}}', { params: { how } });

      if (role === 'server') {
        this.cancelStartupWatch();
      }

      this.setRoleState(role, 'Failed', `unexpected exit with ${how}`);
      return;
    }

    // A stop that timed out earlier has no sequencer waiting for the exit
    if (state === 'Stopping' && !this.guard.isHeld(role)) {
      this.setRoleState(role, 'Stopped', `exited with ${how}`);
      this.releaseProcess(role);
    }
  }

  private setRoleState(role: Role, to: RoleState, reason: string): void {
    const { from } = this.roles[role].machine.transition(to);

    this.log.entity(role).info('{{from}} → {{to}} ({{reason}})', {
      params: { from, to, reason },
    });
    this.bus.publish({
      role,
      kind: 'state-changed',
      message: `${role}: ${from} → ${to}`,
      data: { from, to, reason },
    });

    if (role === 'server' && from === 'Running') {
      this.context?.monitor.suspend('left-running');
    }
  }

  private releaseProcess(role: Role): void {
    this.roles[role].process.release().catch((error: unknown) => {
      this.log.entity(role).errorObject('Releasing the process failed', error);
    });
  }

  private getHandles(): RoleHandles {
    return {
      server: this.roles.server.process,
      tunnel: this.roles.tunnel.process,
      proxy: this.roles.proxy.process,
    };
  }

  private buildServerSpec(context: ActiveProfileContext): LaunchSpec {
    const { profile } = context;
    const spec = buildServerLaunchSpec(profile, context.env);

    if (this.config.controlChannel === 'rcon' && profile.rconPassword !== '') {
      return {
        ...spec,
        controlChannel: () =>
          new RconControlChannel({
            host: profile.serverIP,
            port: profile.rconPort,
            password: profile.rconPassword,
            timeoutMS: this.config.probeTimeoutMS,
          }),
      };
    }

    return { ...spec, controlChannel: (child) => new StdinControlChannel(child.stdin) };
  }

  private rejectStart(role: Role, state: RoleState): ControlResult | undefined {
    switch (state) {
      case 'Starting':
      case 'Running':
        return this.fail(
          'AlreadyRunning',
          role === 'server' ? 'Server is already running' : `The ${role} is already running`,
          { role, state },
        );
      case 'Stopping':
        return this.fail('Busy', `The ${role} is still stopping`, { role, state });
      case 'Failed':
        return this.roleFailed(role);
      case 'Stopped':
        return undefined;
    }
  }

  private settle(step: Promise<ShutdownStep>): Promise<OperationOutcome> {
    return step.then(
      (result): OperationOutcome => ({
        success: result.success,
        code: result.code,
        message: result.message,
        steps: [result],
      }),
      (error: unknown): OperationOutcome => {
        this.log.errorObject('Stop failed', error);
        return { success: false, code: 'Fatal', message: toError(error).message, steps: [] };
      },
    );
  }

  private spawnFailed(role: Role, error: SpawnError): ControlResult {
    this.log.entity(role).error('Could not start: {{reason}}', {
      params: { reason: error.message },
    });

    return this.fail(
      error instanceof SpawnAlreadyRunningError ? 'AlreadyRunning' : 'SpawnFailed',
      error.message,
      { role, state: this.roles[role].machine.state },
      error,
    );
  }

  private roleFailed(role: Role): ControlResult {
    return this.fail('RoleFailed', `The ${role} failed, acknowledge the failure first`, {
      role,
      state: 'Failed',
    });
  }

  private busy(role: Role): ControlResult {
    return this.fail('Busy', `The ${role} is busy with another operation`, { role });
  }

  private ok(message: string, completion?: Promise<OperationOutcome>): ControlResult {
    return { success: true, message, state: this.getState(), completion };
  }

  private fail(
    code: ControlErrorCode,
    message: string,
    info: ControlErrorInfo = {},
    cause?: Error,
  ): ControlResult {
    const error = new ControlError(code, message, info, cause);

    this.log.debug('{{code}}: {{message}}', { params: { code, message } });

    return { success: false, code, message, error, state: this.getState() };
  }

  private forwardSequencerEvents(): void {
    this.sequencer.on('shutdown-started', ({ runID, plan }) => {
      this.bus.publish({
        role: null,
        kind: 'shutdown-started',
        message: `Shutdown started (${plan.trigger})`,
        data: { runID, ...plan },
      });
    });

    this.sequencer.on('shutdown-step', ({ runID, step }) => {
      this.bus.publish({
        role: step.role,
        kind: 'shutdown-step',
        message: step.message,
        data: {
          runID,
          success: step.success,
          outcome: step.outcome,
          code: step.code,
          durationMS: step.durationMS,
        },
      });
    });

    this.sequencer.on('escalated', ({ runID, role, reason }) => {
      this.bus.publish({
        role,
        kind: 'escalated',
        message: `Escalating the ${role} stop to a kill (${reason})`,
        data: { runID, reason },
      });
    });

    this.sequencer.on('host-sleep', ({ runID, success, error }) => {
      this.bus.publish({
        role: null,
        kind: 'host-sleep',
        message: success ? 'Host sleep scheduled' : `Host sleep failed: ${error?.message ?? 'unknown error'}`,
        data: { runID, success },
      });
    });

    this.sequencer.on('app-exit', ({ runID, success, error }) => {
      this.bus.publish({
        role: null,
        kind: 'app-exit',
        message: success ? 'Control panel exit requested' : `Control panel exit failed: ${error?.message ?? 'unknown error'}`,
        data: { runID, success },
      });
    });

    this.sequencer.on('shutdown-completed', ({ report }) => {
      this.bus.publish({
        role: null,
        kind: 'shutdown-completed',
        message: report.success ? 'Shutdown completed' : 'Shutdown finished, server not stopped',
        data: {
          runID: report.id,
          success: report.success,
          hostSleepInvoked: report.hostSleepInvoked,
          appExitInvoked: report.appExitInvoked,
          durationMS: report.durationMS,
        },
      });
    });
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
