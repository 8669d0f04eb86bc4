import type { Role } from './types';

interface SpawnErrorInfo {
  role: Role;
  command: string;
  cwd: string;
}

/**
 * The working directory or the executable does not exist
 */
export class SpawnNotFoundError extends Error {
  public errPrefix = 'ProcessHandleErr';
  public errType = 'Spawn';
  public errCode = 'NotFound' as const;
  public additionalInfo: SpawnErrorInfo & { missing: 'cwd' | 'executable' };

  constructor(
    additionalInfo: SpawnErrorInfo & { missing: 'cwd' | 'executable' },
    cause?: Error,
  ) {
    super(
      additionalInfo.missing === 'cwd'
        ? `Working directory "${additionalInfo.cwd}" does not exist`
        : `Executable "${additionalInfo.command}" was not found`,
      { cause },
    );
    this.name = 'SpawnNotFoundError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * The handle already owns a live process
 */
export class SpawnAlreadyRunningError extends Error {
  public errPrefix = 'ProcessHandleErr';
  public errType = 'Spawn';
  public errCode = 'AlreadyRunning' as const;
  public additionalInfo: SpawnErrorInfo & { pid: number };

  constructor(additionalInfo: SpawnErrorInfo & { pid: number }) {
    super(
      `The ${additionalInfo.role} process is already running with PID ${additionalInfo.pid}`,
    );
    this.name = 'SpawnAlreadyRunningError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * The OS refused to execute the command (EACCES/EPERM)
 */
export class SpawnPermissionDeniedError extends Error {
  public errPrefix = 'ProcessHandleErr';
  public errType = 'Spawn';
  public errCode = 'PermissionDenied' as const;
  public additionalInfo: SpawnErrorInfo;

  constructor(additionalInfo: SpawnErrorInfo, cause?: Error) {
    super(`Permission denied running "${additionalInfo.command}"`, { cause });
    this.name = 'SpawnPermissionDeniedError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Any other spawn failure reported by the OS
 */
export class SpawnFailedError extends Error {
  public errPrefix = 'ProcessHandleErr';
  public errType = 'Spawn';
  public errCode = 'Failed' as const;
  public additionalInfo: SpawnErrorInfo & { osCode?: string };

  constructor(additionalInfo: SpawnErrorInfo & { osCode?: string }, cause?: Error) {
    super(
      `Failed to spawn "${additionalInfo.command}"${cause ? `: ${cause.message}` : ''}`,
      { cause },
    );
    this.name = 'SpawnFailedError';
    this.additionalInfo = additionalInfo;
  }
}

export type SpawnError =
  | SpawnNotFoundError
  | SpawnAlreadyRunningError
  | SpawnPermissionDeniedError
  | SpawnFailedError;

/**
 * A kill signal was refused, or the process outlived it
 */
export class ForceKillError extends Error {
  public errPrefix = 'ProcessHandleErr';
  public errType = 'Kill';
  public errCode = 'Refused';
  public additionalInfo: { role: Role; pid: number };

  constructor(additionalInfo: { role: Role; pid: number }, cause?: Error) {
    super(
      `Could not kill the ${additionalInfo.role} process (PID ${additionalInfo.pid})${cause ? `: ${cause.message}` : ''}`,
      { cause },
    );
    this.name = 'ForceKillError';
    this.additionalInfo = additionalInfo;
  }
}
