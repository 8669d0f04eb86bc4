import type { Role } from '../process-handle';
import type { RoleState } from './types';

export type ControlErrorCode =
  | 'NotRunning'
  | 'Busy'
  | 'AlreadyActive'
  | 'AlreadyRunning'
  | 'Timeout'
  | 'Fatal'
  | 'NoActiveProfile'
  | 'ProfileNotFound'
  | 'InvalidProfile'
  | 'RoleFailed'
  | 'NotFailed'
  | 'NotConfigured'
  | 'InvalidCommand'
  | 'SpawnFailed';

export interface ControlErrorInfo {
  role?: Role;
  profile?: string;
  state?: RoleState;
}

/**
 * An expected failure of a controller operation. Returned inside a
 * `ControlResult`, never thrown.
 */
export class ControlError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'Control';
  public errCode: ControlErrorCode;
  public additionalInfo: ControlErrorInfo;

  constructor(
    errCode: ControlErrorCode,
    message: string,
    additionalInfo: ControlErrorInfo = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = 'ControlError';
    this.errCode = errCode;
    this.additionalInfo = additionalInfo;
  }
}

/**
 * A role state change the state machine does not allow. Signals a bug in
 * the controller, not a user error.
 */
export class InvalidRoleTransitionError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'RoleState';
  public errCode = 'InvalidTransition' as const;
  public additionalInfo: { role: Role; from: RoleState; to: RoleState };

  constructor(additionalInfo: { role: Role; from: RoleState; to: RoleState }) {
    super(
      `Invalid ${additionalInfo.role} transition: ${additionalInfo.from} → ${additionalInfo.to}`,
    );
    this.name = 'InvalidRoleTransitionError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * The control panel configuration did not validate
 */
export class ControlPanelConfigError extends Error {
  public errPrefix = 'LifecycleControllerErr';
  public errType = 'Config';
  public errCode = 'InvalidConfig' as const;
  public additionalInfo: { issues: string[] };

  constructor(additionalInfo: { issues: string[] }, cause?: Error) {
    super(`Invalid control panel configuration: ${additionalInfo.issues.join('; ')}`, {
      cause,
    });
    this.name = 'ControlPanelConfigError';
    this.additionalInfo = additionalInfo;
  }
}
