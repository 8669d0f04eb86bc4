import type { ActivitySample, ProbeTarget } from '../activity-probe';
import { EventEmitterProtected } from '../event-emitter';
import type { EventCallback } from '../event-emitter';
import { generateID } from '../id-helpers';
import type { ActivitySampler } from '../inactivity-monitor';
import { SpawnAlreadyRunningError } from '../process-handle';
import type {
  CommandResult,
  ForceKillResult,
  GracefulStopResult,
  LaunchSpec,
  ProcessExitInfo,
  ProcessHandleEventMap,
  ProcessOutputLine,
  Role,
  SpawnError,
  StartResult,
} from '../process-handle';
import type { ManagedProcess, ProfileStore } from './types';

export interface FakeProcessBehavior {
  /** Exit when the stop command arrives (default true) */
  exitsOnStopCommand?: boolean;
  /** Exit on SIGTERM (default true) */
  exitsOnTerm?: boolean;
  /** The OS refuses the kill */
  refusesKill?: boolean;
  /** Fail every start with this error */
  spawnError?: SpawnError;
}

let nextPID = 4000;

/**
 * In-memory stand-in for a role's `ProcessHandle`. Exits happen on a
 * microtask after the request, like a real child that reacts promptly.
 */
export class FakeProcess
  extends EventEmitterProtected<ProcessHandleEventMap>
  implements ManagedProcess
{
  public readonly role: Role;
  public behavior: FakeProcessBehavior;
  /** Every call in order: `start`, `graceful:<command>`, `term`, `kill`, `release` */
  public readonly calls: string[] = [];
  public readonly commands: string[] = [];
  public readonly launches: LaunchSpec[] = [];

  private alive = false;
  private currentPID?: number;
  private exitRequested = false;
  private exitWaiters = new Set<() => void>();

  constructor(role: Role, behavior: FakeProcessBehavior = {}) {
    super();
    this.role = role;
    this.behavior = behavior;
  }

  public get pid(): number | undefined {
    return this.currentPID;
  }

  public get running(): boolean {
    return this.alive;
  }

  public start(spec: LaunchSpec): Promise<StartResult> {
    this.calls.push('start');
    this.launches.push(spec);

    if (this.behavior.spawnError) {
      return Promise.resolve({ success: false, error: this.behavior.spawnError });
    }

    if (this.alive && this.currentPID !== undefined) {
      return Promise.resolve({
        success: false,
        error: new SpawnAlreadyRunningError({
          role: this.role,
          command: spec.command,
          cwd: spec.cwd,
          pid: this.currentPID,
        }),
      });
    }

    const pid = nextPID++;

    this.alive = true;
    this.currentPID = pid;
    this.exitRequested = false;

    return Promise.resolve({
      success: true,
      info: {
        id: generateID(),
        role: this.role,
        pid,
        command: spec.command,
        args: spec.args ?? [],
        cwd: spec.cwd,
        startedAt: Date.now(),
      },
    });
  }

  public isAlive(): Promise<boolean> {
    return Promise.resolve(this.alive);
  }

  public sendGracefulStop(command: string): Promise<GracefulStopResult> {
    this.calls.push(`graceful:${command}`);

    if (!this.alive) {
      return Promise.resolve({ delivered: false, fallback: 'none' });
    }

    this.exitRequested = true;

    if (this.behavior.exitsOnStopCommand ?? true) {
      this.exitSoon({ code: 0, signal: null });
    }

    return Promise.resolve({ delivered: true });
  }

  public sendCommand(command: string): Promise<CommandResult> {
    if (!this.alive) {
      return Promise.resolve({ success: false, error: new Error('Process is not running') });
    }

    this.commands.push(command);
    return Promise.resolve({ success: true });
  }

  public waitForExit(timeoutMS: number): Promise<boolean> {
    if (!this.alive) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        this.exitWaiters.delete(onExit);
        resolve(false);
      }, timeoutMS);

      this.exitWaiters.add(onExit);
    });
  }

  public requestExit(timeoutMS: number): Promise<boolean> {
    this.calls.push('term');

    if (!this.alive) {
      return Promise.resolve(true);
    }

    this.exitRequested = true;

    if (this.behavior.exitsOnTerm ?? true) {
      this.exitSoon({ code: null, signal: 'SIGTERM' });
    }

    return this.waitForExit(timeoutMS);
  }

  public forceKill(): Promise<ForceKillResult> {
    this.calls.push('kill');

    if (!this.alive) {
      return Promise.resolve({ success: true });
    }

    if (this.behavior.refusesKill) {
      return Promise.resolve({ success: false, error: new Error('kill EPERM') });
    }

    this.exitRequested = true;
    this.exit({ code: null, signal: 'SIGKILL' });

    return Promise.resolve({ success: true });
  }

  public onExit(listener: EventCallback<ProcessExitInfo>): () => void {
    return this.on('exit', listener);
  }

  public onOutput(listener: EventCallback<ProcessOutputLine>): () => void {
    return this.on('output', listener);
  }

  public release(): Promise<void> {
    this.calls.push('release');
    this.currentPID = undefined;
    return Promise.resolve();
  }

  /**
   * The process dies on its own
   */
  public crash(code: number = 1): void {
    this.exit({ code, signal: null });
  }

  public print(line: string, stream: ProcessOutputLine['stream'] = 'stdout'): void {
    this.emit('output', { stream, line });
  }

  private exitSoon(exit: Omit<ProcessExitInfo, 'expected'>): void {
    queueMicrotask(() => this.exit(exit));
  }

  private exit(exit: Omit<ProcessExitInfo, 'expected'>): void {
    if (!this.alive) {
      return;
    }

    this.alive = false;
    this.emit('exit', { ...exit, expected: this.exitRequested });

    for (const waiter of this.exitWaiters) {
      waiter();
    }

    this.exitWaiters.clear();
  }
}

/**
 * Answers status queries from a script of samples, then repeats the
 * fallback
 */
export class FakeProbe implements ActivitySampler {
  public readonly targets: ProbeTarget[] = [];
  private script: Array<Omit<ActivitySample, 'timestamp'>> = [];
  private fallback: Omit<ActivitySample, 'timestamp'>;

  constructor(fallback: Omit<ActivitySample, 'timestamp'> = { reachable: true, playerCount: 0 }) {
    this.fallback = fallback;
  }

  public get sampleCount(): number {
    return this.targets.length;
  }

  public queue(...samples: Array<Omit<ActivitySample, 'timestamp'>>): void {
    this.script.push(...samples);
  }

  public setFallback(sample: Omit<ActivitySample, 'timestamp'>): void {
    this.fallback = sample;
  }

  public sample(target: ProbeTarget): Promise<ActivitySample> {
    this.targets.push(target);

    const next = this.script.shift() ?? this.fallback;

    return Promise.resolve({ timestamp: Date.now(), ...next });
  }
}

export class MemoryProfileStore implements ProfileStore {
  private records: Map<string, unknown>;

  constructor(records: Record<string, unknown> = {}) {
    this.records = new Map(Object.entries(records));
  }

  public set(name: string, record: unknown): void {
    this.records.set(name, record);
  }

  public getProfile(name: string): Promise<unknown> {
    return Promise.resolve(this.records.get(name));
  }
}
