import type { InactivityMonitorState, InactivityWindow } from '../inactivity-monitor';
import type { ProcessHandle, Role } from '../process-handle';
import type { ShutdownStep, StoppableProcess } from '../shutdown-sequencer';
import type { ControlError, ControlErrorCode } from './errors';

export type RoleState = 'Stopped' | 'Starting' | 'Running' | 'Stopping' | 'Failed';

/** `Inactive` while no profile is active */
export type ServerRoleState = RoleState | 'Inactive';

export type AuxiliaryRole = Exclude<Role, 'server'>;

/**
 * Everything the controller needs from a role's process
 */
export type ManagedProcess = StoppableProcess &
  Pick<ProcessHandle, 'pid' | 'start' | 'sendCommand' | 'onExit' | 'onOutput' | 'release'>;

export interface MonitorSnapshot {
  state: InactivityMonitorState;
  window: InactivityWindow;
}

export interface ControllerState {
  /** Name of the active profile */
  profile: string | null;
  roles: {
    server: ServerRoleState;
    tunnel: RoleState;
    proxy: RoleState;
  };
  monitor: MonitorSnapshot | null;
  restarting: boolean;
}

/**
 * How a background part of an accepted operation ended
 */
export interface OperationOutcome {
  success: boolean;
  code?: ControlErrorCode;
  message: string;
  steps: ShutdownStep[];
}

export interface ControlResult {
  success: boolean;
  code?: ControlErrorCode;
  message: string;
  error?: ControlError;
  /** Snapshot taken when the call returned */
  state: ControllerState;
  /** Settles once the work started by an accepted call is done. Never rejects. */
  completion?: Promise<OperationOutcome>;
}

export type ServerStatusKey =
  | 'fully_loaded'
  | 'starting'
  | 'restarting'
  | 'stopping'
  | 'off'
  | 'error';

export interface ServerStatusDescription {
  key: ServerStatusKey;
  message: string;
  statusCode: number;
}

/**
 * Where profiles come from. `getProfile` resolves to the raw stored record,
 * or `undefined` when there is no profile by that name.
 */
export interface ProfileStore {
  getProfile(name: string): Promise<unknown>;
}
