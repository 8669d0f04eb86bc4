import type { Role } from '../process-handle';
import { InvalidRoleTransitionError } from './errors';
import type { RoleState } from './types';

const TRANSITIONS: Record<RoleState, readonly RoleState[]> = {
  Stopped: ['Starting'],
  Starting: ['Running', 'Stopping', 'Failed', 'Stopped'],
  Running: ['Stopping', 'Failed', 'Stopped'],
  Stopping: ['Stopped', 'Failed'],
  Failed: ['Stopped'],
};

export function canTransition(from: RoleState, to: RoleState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Current state of one role. Every change goes through `transition()`.
 */
export class RoleStateMachine {
  public readonly role: Role;
  private _state: RoleState = 'Stopped';

  constructor(role: Role) {
    this.role = role;
  }

  public get state(): RoleState {
    return this._state;
  }

  /**
   * @throws InvalidRoleTransitionError when the table does not allow it
   */
  public transition(to: RoleState): { from: RoleState; to: RoleState } {
    const from = this._state;

    if (!canTransition(from, to)) {
      throw new InvalidRoleTransitionError({ role: this.role, from, to });
    }

    this._state = to;
    return { from, to };
  }
}
