import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { promises as fsPromises } from 'fs';
import readline from 'readline';
import treeKill from 'tree-kill';
import { EventEmitterProtected } from '../event-emitter';
import type { EventCallback } from '../event-emitter';
import { generateID } from '../id-helpers';
import type { LoggerService } from '../logger';
import { sleep } from '../sleep';
import type { ControlChannel } from './control-channel';
import {
  ForceKillError,
  SpawnAlreadyRunningError,
  SpawnFailedError,
  SpawnNotFoundError,
  SpawnPermissionDeniedError,
} from './errors';
import type { SpawnError } from './errors';
import type {
  CommandResult,
  ForceKillResult,
  GracefulStopResult,
  LaunchSpec,
  ProcessExitInfo,
  ProcessHandleEventMap,
  ProcessHandleInfo,
  ProcessOutputLine,
  Role,
  StartResult,
} from './types';

export interface ProcessHandleOptions {
  role: Role;
  logger: LoggerService;
  /** How long `forceKill()` waits for the exit event after the kill signal */
  killConfirmTimeoutMS?: number;
  /** Re-checks of an inconclusive liveness probe */
  livenessRetries?: number;
  livenessRetryDelayMS?: number;
  /** Kills a pid and its descendants; defaults to tree-kill with SIGKILL */
  killProcessTree?: (pid: number) => Promise<Error | undefined>;
}

/**
 * Wraps one child process for one role.
 *
 * The exit of the child is observed through its `exit` event, so callers
 * learn about unexpected exits without polling. Stop and kill requests mark
 * the upcoming exit as expected.
 */
export class ProcessHandle extends EventEmitterProtected<ProcessHandleEventMap> {
  public readonly role: Role;

  private logger: LoggerService;
  private killConfirmTimeoutMS: number;
  private livenessRetries: number;
  private livenessRetryDelayMS: number;
  private killProcessTree: (pid: number) => Promise<Error | undefined>;

  private child?: ChildProcess;
  private info?: ProcessHandleInfo;
  private channel?: ControlChannel;
  private exitInfo?: ProcessExitInfo;
  private exitPromise?: Promise<ProcessExitInfo>;
  private exitRequested = false;

  constructor(options: ProcessHandleOptions) {
    super();

    this.role = options.role;
    this.logger = options.logger;
    this.killConfirmTimeoutMS = options.killConfirmTimeoutMS ?? 5000;
    this.livenessRetries = options.livenessRetries ?? 3;
    this.livenessRetryDelayMS = options.livenessRetryDelayMS ?? 50;
    this.killProcessTree = options.killProcessTree ?? killTree;
  }

  public get pid(): number | undefined {
    return this.info?.pid;
  }

  public getInfo(): ProcessHandleInfo | undefined {
    return this.info;
  }

  /**
   * Exit details of the last process, once it has exited
   */
  public getExitInfo(): ProcessExitInfo | undefined {
    return this.exitInfo;
  }

  public onExit(listener: EventCallback<ProcessExitInfo>): () => void {
    return this.on('exit', listener);
  }

  public onOutput(listener: EventCallback<ProcessOutputLine>): () => void {
    return this.on('output', listener);
  }

  public async start(spec: LaunchSpec): Promise<StartResult> {
    const args = spec.args ?? [];
    const errorInfo = { role: this.role, command: spec.command, cwd: spec.cwd };

    if (this.child && this.hasNotExited(this.child) && this.info) {
      return this.startFailed(
        new SpawnAlreadyRunningError({ ...errorInfo, pid: this.info.pid }),
      );
    }

    if (!(await isDirectory(spec.cwd))) {
      return this.startFailed(
        new SpawnNotFoundError({ ...errorInfo, missing: 'cwd' }),
      );
    }

    this.logger.info('Starting {{command}} in {{cwd}}', {
      params: { command: [spec.command, ...args].join(' '), cwd: spec.cwd },
    });

    const child = spawn(spec.command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...(spec.env ?? {}) },
      shell: spec.shell ?? false,
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const spawnError = await waitForSpawn(child);

    if (spawnError || child.pid === undefined) {
      return this.startFailed(toSpawnError(errorInfo, spawnError));
    }

    this.child = child;
    this.exitInfo = undefined;
    this.exitRequested = false;
    this.info = {
      id: generateID(),
      role: this.role,
      pid: child.pid,
      command: spec.command,
      args,
      cwd: spec.cwd,
      startedAt: Date.now(),
    };

    child.on('error', (error) => {
      this.logger.warn('Child process error: {{reason}}', {
        params: { reason: error.message },
      });
    });

    // EPIPE once the child closes its console; the failed write reports it too
    child.stdin?.on('error', (error) => {
      this.logger.warn('Console stream error: {{reason}}', {
        params: { reason: error.message },
      });
    });

    this.channel = spec.controlChannel?.(child);
    this.exitPromise = this.watchExit(child);
    this.pipeOutput(child);

    this.logger.success('Process STARTED with PID {{pid}}', {
      params: { pid: child.pid },
    });

    return { success: true, info: this.info };
  }

  /**
   * Whether the process is still running. A probe that cannot tell is
   * retried a few times before giving up with `false`.
   */
  public async isAlive(): Promise<boolean> {
    for (let attempt = 0; attempt <= this.livenessRetries; attempt++) {
      const result = this.probeLiveness();

      if (result !== 'unknown') {
        return result === 'alive';
      }

      if (attempt < this.livenessRetries) {
        await sleep(this.livenessRetryDelayMS);
      }
    }

    return false;
  }

  /**
   * Send a protocol stop command without waiting for the exit. Falls back
   * to SIGTERM when there is no channel or the channel fails.
   */
  public async sendGracefulStop(command: string): Promise<GracefulStopResult> {
    const child = this.child;

    if (!child || !this.hasNotExited(child)) {
      return { delivered: false, fallback: 'none' };
    }

    this.exitRequested = true;

    if (this.channel) {
      try {
        await this.channel.send(command);

        this.logger.info('Sent "{{command}}" through {{channel}}', {
          params: { command, channel: this.channel.kind },
        });

        return { delivered: true };
      } catch (error) {
        const channelError = toError(error);

        this.logger.warn(
          'Could not send "{{command}}" through {{channel}}, sending SIGTERM instead: {{reason}}',
          {
            params: {
              command,
              channel: this.channel.kind,
              reason: channelError.message,
            },
          },
        );

        child.kill('SIGTERM');
        return { delivered: false, fallback: 'signal', error: channelError };
      }
    }

    this.logger.info('No control channel, sending SIGTERM');
    child.kill('SIGTERM');

    return { delivered: false, fallback: 'signal' };
  }

  /**
   * Type a console command through the control channel. Unlike
   * `sendGracefulStop()` there is no signal fallback.
   */
  public async sendCommand(command: string): Promise<CommandResult> {
    const child = this.child;

    if (!child || !this.hasNotExited(child)) {
      return { success: false, error: new Error('Process is not running') };
    }

    if (!this.channel) {
      return { success: false, error: new Error('Process has no control channel') };
    }

    try {
      await this.channel.send(command);
    } catch (error) {
      const channelError = toError(error);

      this.logger.warn('Command "{{command}}" failed: {{reason}}', {
        params: { command, reason: channelError.message },
      });

      return { success: false, error: channelError };
    }

    this.logger.debug('Sent "{{command}}" through {{channel}}', {
      params: { command, channel: this.channel.kind },
    });

    return { success: true };
  }

  /**
   * @returns true once the process has exited, false when `timeoutMS` ran out
   */
  public async waitForExit(timeoutMS: number): Promise<boolean> {
    const exitPromise = this.exitPromise;

    if (!exitPromise || this.exitInfo) {
      return true;
    }

    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<'timeout'>((resolve) => {
      timeoutHandle = setTimeout(() => resolve('timeout'), timeoutMS);
    });

    try {
      const result = await Promise.race([exitPromise, timeoutPromise]);
      return result !== 'timeout';
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  /**
   * Send SIGTERM and wait up to `timeoutMS` for the process to exit
   */
  public async requestExit(timeoutMS: number): Promise<boolean> {
    const child = this.child;

    if (!child || !this.hasNotExited(child)) {
      return true;
    }

    this.exitRequested = true;
    this.logger.info('Requesting exit (SIGTERM), waiting up to {{timeoutMS}}ms', {
      params: { timeoutMS },
    });

    child.kill('SIGTERM');

    const exited = await this.waitForExit(timeoutMS);

    if (!exited) {
      this.logger.warn('Process did not exit within {{timeoutMS}}ms', {
        params: { timeoutMS },
      });
    }

    return exited;
  }

  /**
   * Kill the whole process tree. A handle without a live process succeeds
   * without doing anything.
   */
  public async forceKill(): Promise<ForceKillResult> {
    const child = this.child;
    const pid = this.info?.pid;

    if (!child || pid === undefined || !this.hasNotExited(child)) {
      return { success: true };
    }

    this.exitRequested = true;
    this.logger.warn('Force killing process tree of PID {{pid}}', {
      params: { pid },
    });

    const killError = await this.killProcessTree(pid);

    if (killError && this.hasNotExited(child)) {
      const error = new ForceKillError({ role: this.role, pid }, killError);
      this.logger.errorObject('Force kill refused', error);
      return { success: false, error };
    }

    if (!(await this.waitForExit(this.killConfirmTimeoutMS))) {
      const error = new ForceKillError({ role: this.role, pid });
      this.logger.error('Process {{pid}} is still alive after the kill signal', {
        params: { pid },
      });
      return { success: false, error };
    }

    return { success: true };
  }

  /**
   * Forget the current process. Its listeners stay attached to this handle.
   */
  public async release(): Promise<void> {
    const channel = this.channel;

    this.child = undefined;
    this.info = undefined;
    this.channel = undefined;
    this.exitPromise = undefined;

    if (channel) {
      await channel.close().catch((error: unknown) => {
        this.logger.debug('Closing the control channel failed: {{reason}}', {
          params: { reason: toError(error).message },
        });
      });
    }
  }

  private probeLiveness(): 'alive' | 'dead' | 'unknown' {
    const child = this.child;
    const pid = this.info?.pid;

    if (!child || pid === undefined || !this.hasNotExited(child)) {
      return 'dead';
    }

    try {
      process.kill(pid, 0);
      return 'alive';
    } catch (error) {
      const code = errorCode(error);

      if (code === 'ESRCH') {
        return 'dead';
      }

      // The process exists but belongs to someone else
      if (code === 'EPERM') {
        return 'alive';
      }

      return 'unknown';
    }
  }

  private hasNotExited(child: ChildProcess): boolean {
    return (
      this.exitInfo === undefined &&
      child.exitCode === null &&
      child.signalCode === null
    );
  }

  private watchExit(child: ChildProcess): Promise<ProcessExitInfo> {
    return new Promise<ProcessExitInfo>((resolve) => {
      child.once('exit', (code, signal) => {
        const exitInfo: ProcessExitInfo = {
          code,
          signal,
          expected: this.exitRequested,
        };

        // A late exit of a released process must not touch the new one
        if (this.child === child || this.child === undefined) {
          this.exitInfo = exitInfo;
        }

        if (exitInfo.expected) {
          this.logger.info('Process EXITED (code {{code}}, signal {{signal}})', {
            params: { code, signal },
          });
        } else {
          this.logger.warn(
            'Process EXITED unexpectedly (code {{code}}, signal {{signal}})',
            { params: { code, signal } },
          );
        }

        resolve(exitInfo);
        this.emit('exit', exitInfo);
      });
    });
  }

  private pipeOutput(child: ChildProcess): void {
    const streams = [
      ['stdout', child.stdout],
      ['stderr', child.stderr],
    ] as const;

    for (const [stream, readable] of streams) {
      if (!readable) {
        continue;
      }

      const lines = readline.createInterface({ input: readable });

      lines.on('line', (line) => {
        this.emit('output', { stream, line });
      });
    }
  }

  private startFailed(error: SpawnError): StartResult {
    this.logger.errorObject('Could not start process', error);
    return { success: false, error };
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fsPromises.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolves with the spawn error, or undefined once the child is running
 */
function waitForSpawn(child: ChildProcess): Promise<Error | undefined> {
  return new Promise((resolve) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve(undefined);
    };

    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      resolve(error);
    };

    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function toSpawnError(
  info: { role: Role; command: string; cwd: string },
  error: Error | undefined,
): SpawnError {
  const code = errorCode(error);

  if (code === 'ENOENT') {
    return new SpawnNotFoundError({ ...info, missing: 'executable' }, error);
  }

  if (code === 'EACCES' || code === 'EPERM') {
    return new SpawnPermissionDeniedError(info, error);
  }

  return new SpawnFailedError({ ...info, osCode: code }, error);
}

function killTree(pid: number): Promise<Error | undefined> {
  return new Promise((resolve) => {
    treeKill(pid, 'SIGKILL', (error) => {
      resolve(error ?? undefined);
    });
  });
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
