import type { ChildProcess } from 'child_process';
import type { ControlChannel } from './control-channel';
import type { SpawnError } from './errors';

/**
 * A distinct kind of managed child process
 */
export type Role = 'server' | 'tunnel' | 'proxy';

export const ROLES: readonly Role[] = ['server', 'tunnel', 'proxy'];

export interface LaunchSpec {
  command: string;
  args?: string[];
  cwd: string;
  /** Merged over `process.env` for the child only */
  env?: Record<string, string>;
  /** Run through the platform shell (needed for `.bat` scripts on Windows) */
  shell?: boolean;
  /**
   * Builds the protocol channel used by `sendGracefulStop()`. Without one
   * the handle falls back to an OS terminate signal.
   */
  controlChannel?: (child: ChildProcess) => ControlChannel;
}

export interface ProcessHandleInfo {
  /** ULID of this spawn, stable for the life of the process */
  id: string;
  role: Role;
  pid: number;
  command: string;
  args: string[];
  cwd: string;
  startedAt: number;
}

export type StartResult =
  | { success: true; info: ProcessHandleInfo }
  | { success: false; error: SpawnError };

export interface ProcessExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the exit followed a stop or kill request from this handle */
  expected: boolean;
}

export interface GracefulStopResult {
  /** Whether the protocol command reached the process */
  delivered: boolean;
  /** `signal` when SIGTERM was sent instead, `none` when nothing was sent */
  fallback?: 'signal' | 'none';
  error?: Error;
}

export interface CommandResult {
  success: boolean;
  error?: Error;
}

export interface ForceKillResult {
  success: boolean;
  error?: Error;
}

export interface ProcessOutputLine {
  stream: 'stdout' | 'stderr';
  line: string;
}

export type ProcessHandleEventMap = {
  exit: ProcessExitInfo;
  output: ProcessOutputLine;
};
