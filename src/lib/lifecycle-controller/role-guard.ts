import type { Role } from '../process-handle';

export type ReleaseGuard = () => void;

interface Waiter {
  roles: readonly Role[];
  resolve: (release: ReleaseGuard) => void;
}

/**
 * Per-role exclusive sections. A caller holds either every role it asked
 * for or none of them.
 */
export class RoleGuard {
  private held = new Set<Role>();
  private waiters: Waiter[] = [];

  public isHeld(role: Role): boolean {
    return this.held.has(role);
  }

  /**
   * @returns a release function, or undefined when any role is busy
   */
  public tryAcquire(roles: readonly Role[]): ReleaseGuard | undefined {
    if (!this.isFree(roles)) {
      return undefined;
    }

    return this.take(roles);
  }

  /**
   * Wait until every role is free, first come first served
   */
  public acquire(roles: readonly Role[]): Promise<ReleaseGuard> {
    if (this.waiters.length === 0 && this.isFree(roles)) {
      return Promise.resolve(this.take(roles));
    }

    return new Promise((resolve) => {
      this.waiters.push({ roles, resolve });
    });
  }

  private isFree(roles: readonly Role[]): boolean {
    return roles.every((role) => !this.held.has(role));
  }

  private take(roles: readonly Role[]): ReleaseGuard {
    for (const role of roles) {
      this.held.add(role);
    }

    let released = false;

    return () => {
      if (released) {
        return;
      }

      released = true;

      for (const role of roles) {
        this.held.delete(role);
      }

      this.wakeWaiters();
    };
  }

  private wakeWaiters(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];

      if (!this.isFree(next.roles)) {
        return;
      }

      this.waiters.shift();
      next.resolve(this.take(next.roles));
    }
  }
}
