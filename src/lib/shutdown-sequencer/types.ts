import type { LoggerService } from '../logger';
import type { ProcessHandle, Role } from '../process-handle';

export type ShutdownTrigger = 'manual' | 'inactivity' | 'forced';

/**
 * Built when a shutdown is requested and consumed by a single run
 */
export interface ShutdownPlan {
  trigger: ShutdownTrigger;
  sleepHostAfter: boolean;
  shutdownAppAfter: boolean;
}

/**
 * How a role's stop step ended:
 * - `graceful`: exited after the protocol stop command
 * - `terminated`: exited after SIGTERM
 * - `killed`: force-killed straight away (forced trigger)
 * - `escalated`: force-killed after the stop timed out
 * - `already-stopped`: there was no live process
 * - `timeout`: still running, escalation not allowed
 * - `kill-failed`: the OS refused the kill
 */
export type ShutdownStepOutcome =
  | 'graceful'
  | 'terminated'
  | 'killed'
  | 'escalated'
  | 'already-stopped'
  | 'timeout'
  | 'kill-failed';

export interface ShutdownStep {
  role: Role;
  success: boolean;
  outcome: ShutdownStepOutcome;
  code?: 'Timeout' | 'Fatal';
  message: string;
  error?: Error;
  durationMS: number;
}

export interface ShutdownReport {
  /** ULID of this run */
  id: string;
  success: boolean;
  plan: ShutdownPlan;
  steps: ShutdownStep[];
  hostSleepInvoked: boolean;
  appExitInvoked: boolean;
  hostSleepError?: Error;
  appExitError?: Error;
  durationMS: number;
}

/**
 * The process operations a shutdown needs
 */
export type StoppableProcess = Pick<
  ProcessHandle,
  'isAlive' | 'sendGracefulStop' | 'waitForExit' | 'requestExit' | 'forceKill'
>;

export type RoleHandles = Partial<Record<Role, StoppableProcess>>;

/**
 * Role transitions observed during a run. `stop-timed-out` leaves the role
 * in Stopping with a live process.
 */
export type RoleTransition = 'stopping' | 'stopped' | 'stop-timed-out' | 'failed';

export type RoleTransitionHook = (role: Role, transition: RoleTransition) => void;

/**
 * A host action run after the processes are down (sleep, app exit). It gets
 * the plan so host sleep can wait for a pending app exit.
 */
export type HostInvoker = (plan: ShutdownPlan) => void | Promise<void>;

export interface ShutdownSequencerOptions {
  logger: LoggerService;
  gracefulStopTimeoutMS: number;
  auxiliaryStopTimeoutMS: number;
  stopCommand: string;
  /** Let a manual stop that timed out escalate to a kill */
  manualStopEscalates?: boolean;
  hostSleep?: HostInvoker;
  appExit?: HostInvoker;
}

export type ShutdownSequencerEventMap = {
  'shutdown-started': { runID: string; plan: ShutdownPlan };
  'shutdown-step': { runID: string; step: ShutdownStep };
  escalated: { runID: string; role: Role; reason: string };
  'host-sleep': { runID: string; success: boolean; error?: Error };
  'app-exit': { runID: string; success: boolean; error?: Error };
  'shutdown-completed': { report: ShutdownReport };
};
