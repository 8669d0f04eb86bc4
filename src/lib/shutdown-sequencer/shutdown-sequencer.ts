import { EventEmitterProtected } from '../event-emitter';
import { generateID } from '../id-helpers';
import type { LoggerService } from '../logger';
import type { Role } from '../process-handle';
import { safeHandleCallbackAndWait } from '../safe-handle-callback';
import type {
  HostInvoker,
  RoleHandles,
  RoleTransitionHook,
  ShutdownPlan,
  ShutdownReport,
  ShutdownSequencerEventMap,
  ShutdownSequencerOptions,
  ShutdownStep,
  ShutdownStepOutcome,
  StoppableProcess,
} from './types';

const AUXILIARY_ORDER = ['tunnel', 'proxy'] as const;

/**
 * Ordered teardown of a profile's processes: server first, then tunnel,
 * then proxy, and only then host sleep and app exit.
 *
 * The sequencer never touches role state. It reports transitions through
 * the hook passed to each call, and leaves the bookkeeping to its owner.
 * A failed step is recorded and the run continues with the next one.
 */
export class ShutdownSequencer extends EventEmitterProtected<ShutdownSequencerEventMap> {
  private logger: LoggerService;
  private gracefulStopTimeoutMS: number;
  private auxiliaryStopTimeoutMS: number;
  private stopCommand: string;
  private manualStopEscalates: boolean;
  private hostSleep?: HostInvoker;
  private appExit?: HostInvoker;

  constructor(options: ShutdownSequencerOptions) {
    super();

    this.logger = options.logger;
    this.gracefulStopTimeoutMS = options.gracefulStopTimeoutMS;
    this.auxiliaryStopTimeoutMS = options.auxiliaryStopTimeoutMS;
    this.stopCommand = options.stopCommand;
    this.manualStopEscalates = options.manualStopEscalates ?? false;
    this.hostSleep = options.hostSleep;
    this.appExit = options.appExit;
  }

  /**
   * Full teardown. `success` is true only when the server ended stopped.
   */
  public async run(
    plan: ShutdownPlan,
    handles: RoleHandles,
    onRoleTransition?: RoleTransitionHook,
  ): Promise<ShutdownReport> {
    const runID = generateID();
    const startedAt = Date.now();
    const steps: ShutdownStep[] = [];

    this.logger.notice('Shutdown sequence started ({{trigger}})', {
      params: { trigger: plan.trigger },
    });
    this.emit('shutdown-started', { runID, plan });

    steps.push(
      await this.stopServerStep(runID, plan, handles.server, onRoleTransition),
    );

    for (const role of AUXILIARY_ORDER) {
      steps.push(
        await this.stopAuxiliaryStep(runID, role, handles[role], onRoleTransition),
      );
    }

    // Host actions only once every stop step has settled
    const hostSleep = plan.sleepHostAfter
      ? await this.invokeHost(runID, plan, 'host-sleep', this.hostSleep)
      : { invoked: false };
    const appExit = plan.shutdownAppAfter
      ? await this.invokeHost(runID, plan, 'app-exit', this.appExit)
      : { invoked: false };

    const serverStep = steps[0];
    const report: ShutdownReport = {
      id: runID,
      success: serverStep.success,
      plan,
      steps,
      hostSleepInvoked: hostSleep.invoked,
      appExitInvoked: appExit.invoked,
      hostSleepError: hostSleep.error,
      appExitError: appExit.error,
      durationMS: Date.now() - startedAt,
    };

    if (report.success) {
      this.logger.success('Shutdown sequence completed in {{durationMS}}ms', {
        params: { durationMS: report.durationMS },
      });
    } else {
      this.logger.error('Shutdown sequence finished, server not stopped: {{reason}}', {
        params: { reason: serverStep.message },
      });
    }

    this.emit('shutdown-completed', { report });

    return report;
  }

  /**
   * The server portion of a run, for single-role stop operations
   */
  public stopServer(
    plan: ShutdownPlan,
    handle: StoppableProcess | undefined,
    onRoleTransition?: RoleTransitionHook,
  ): Promise<ShutdownStep> {
    return this.stopServerStep(generateID(), plan, handle, onRoleTransition);
  }

  /**
   * Stop one auxiliary role, force-killing it on timeout
   */
  public stopAuxiliary(
    role: Exclude<Role, 'server'>,
    handle: StoppableProcess | undefined,
    onRoleTransition?: RoleTransitionHook,
  ): Promise<ShutdownStep> {
    return this.stopAuxiliaryStep(generateID(), role, handle, onRoleTransition);
  }

  private async stopServerStep(
    runID: string,
    plan: ShutdownPlan,
    handle: StoppableProcess | undefined,
    onRoleTransition?: RoleTransitionHook,
  ): Promise<ShutdownStep> {
    const role = 'server';
    const startedAt = Date.now();
    const log = this.logger.entity(role);

    if (!handle || !(await handle.isAlive())) {
      return this.finishStep(runID, onRoleTransition, {
        role,
        success: true,
        outcome: 'already-stopped',
        message: 'Server was not running',
        durationMS: Date.now() - startedAt,
      });
    }

    onRoleTransition?.(role, 'stopping');

    if (plan.trigger === 'forced') {
      log.warn('Force stop requested, killing the server');
      return this.killStep(runID, role, handle, 'killed', startedAt, onRoleTransition);
    }

    const graceful = await handle.sendGracefulStop(this.stopCommand);
    const exited = graceful.delivered
      ? await handle.waitForExit(this.gracefulStopTimeoutMS)
      : await handle.requestExit(this.gracefulStopTimeoutMS);

    if (exited) {
      return this.finishStep(runID, onRoleTransition, {
        role,
        success: true,
        outcome: graceful.delivered ? 'graceful' : 'terminated',
        message: graceful.delivered
          ? `Server stopped after "${this.stopCommand}"`
          : 'Server stopped after SIGTERM',
        durationMS: Date.now() - startedAt,
      });
    }

    if (plan.trigger === 'manual' && !this.manualStopEscalates) {
      log.error('Server did not stop within {{timeoutMS}}ms', {
        params: { timeoutMS: this.gracefulStopTimeoutMS },
      });

      return this.finishStep(runID, onRoleTransition, {
        role,
        success: false,
        outcome: 'timeout',
        code: 'Timeout',
        message: `Server did not stop within ${this.gracefulStopTimeoutMS}ms, use force stop to kill it`,
        durationMS: Date.now() - startedAt,
      });
    }

    const reason = `no exit within ${this.gracefulStopTimeoutMS}ms`;

    log.warn('Graceful stop timed out ({{reason}}), escalating to kill', {
      params: { reason },
    });
    this.emit('escalated', { runID, role, reason });

    return this.killStep(runID, role, handle, 'escalated', startedAt, onRoleTransition);
  }

  private async stopAuxiliaryStep(
    runID: string,
    role: Exclude<Role, 'server'>,
    handle: StoppableProcess | undefined,
    onRoleTransition?: RoleTransitionHook,
  ): Promise<ShutdownStep> {
    const startedAt = Date.now();

    if (!handle || !(await handle.isAlive())) {
      return this.finishStep(runID, onRoleTransition, {
        role,
        success: true,
        outcome: 'already-stopped',
        message: `The ${role} was not running`,
        durationMS: Date.now() - startedAt,
      });
    }

    onRoleTransition?.(role, 'stopping');

    if (await handle.requestExit(this.auxiliaryStopTimeoutMS)) {
      return this.finishStep(runID, onRoleTransition, {
        role,
        success: true,
        outcome: 'terminated',
        message: `The ${role} stopped after SIGTERM`,
        durationMS: Date.now() - startedAt,
      });
    }

    const reason = `no exit within ${this.auxiliaryStopTimeoutMS}ms`;

    this.logger.entity(role).warn('Stop timed out ({{reason}}), killing', {
      params: { reason },
    });
    this.emit('escalated', { runID, role, reason });

    return this.killStep(runID, role, handle, 'escalated', startedAt, onRoleTransition);
  }

  private async killStep(
    runID: string,
    role: Role,
    handle: StoppableProcess,
    outcome: Extract<ShutdownStepOutcome, 'killed' | 'escalated'>,
    startedAt: number,
    onRoleTransition?: RoleTransitionHook,
  ): Promise<ShutdownStep> {
    const result = await handle.forceKill();

    if (!result.success) {
      return this.finishStep(runID, onRoleTransition, {
        role,
        success: false,
        outcome: 'kill-failed',
        code: 'Fatal',
        message: `Could not kill the ${role}: ${result.error?.message ?? 'unknown error'}`,
        error: result.error,
        durationMS: Date.now() - startedAt,
      });
    }

    return this.finishStep(runID, onRoleTransition, {
      role,
      success: true,
      outcome,
      message:
        outcome === 'killed'
          ? `The ${role} was killed`
          : `The ${role} was killed after the stop timed out`,
      durationMS: Date.now() - startedAt,
    });
  }

  private finishStep(
    runID: string,
    onRoleTransition: RoleTransitionHook | undefined,
    step: ShutdownStep,
  ): ShutdownStep {
    if (step.success) {
      onRoleTransition?.(step.role, 'stopped');
    } else if (step.code === 'Timeout') {
      onRoleTransition?.(step.role, 'stop-timed-out');
    } else {
      this.logger.entity(step.role).error(step.message);
      onRoleTransition?.(step.role, 'failed');
    }

    this.emit('shutdown-step', { runID, step });

    return step;
  }

  private async invokeHost(
    runID: string,
    plan: ShutdownPlan,
    kind: 'host-sleep' | 'app-exit',
    invoker: HostInvoker | undefined,
  ): Promise<{ invoked: boolean; error?: Error }> {
    if (!invoker) {
      this.logger.warn('No {{kind}} invoker configured, skipping', {
        params: { kind },
      });
      return { invoked: false };
    }

    this.logger.notice('Invoking {{kind}}', { params: { kind } });

    const result = await safeHandleCallbackAndWait(kind, invoker, plan);

    if (!result.success) {
      this.logger.error('{{kind}} failed: {{reason}}', {
        params: { kind, reason: result.error?.message },
      });
    }

    this.emit(kind, { runID, success: result.success, error: result.error });

    return { invoked: true, error: result.error };
  }
}
