import { spawn } from 'child_process';
import type { Logger, LoggerService } from '../logger';
import type { HostInvoker } from '../shutdown-sequencer';

export interface HostCommand {
  command: string;
  args: string[];
}

export type SpawnDetached = (command: HostCommand) => Promise<void>;

export interface HostSleepInvokerOptions {
  logger: LoggerService;
  platform?: NodeJS.Platform;
  /** Pause before the host is suspended */
  delayMS?: number;
  /** Process the sleep command outlives when the app is about to exit */
  pid?: number;
  spawnDetached?: SpawnDetached;
}

/**
 * The platform command that suspends the host. With `waitForPID` it first
 * waits for that process to be gone.
 */
export function getHostSleepCommand(
  platform: NodeJS.Platform,
  options: { delayMS: number; waitForPID?: number },
): HostCommand {
  const delaySeconds = Math.max(0, options.delayMS) / 1000;
  const pid = options.waitForPID;

  if (platform === 'win32') {
    const waitForExit =
      pid !== undefined
        ? `while (Get-Process -Id ${pid} -ErrorAction SilentlyContinue) { Start-Sleep -Milliseconds 500 }; `
        : '';

    return {
      command: 'powershell',
      args: [
        '-NoProfile',
        '-WindowStyle',
        'Hidden',
        '-Command',
        `${waitForExit}Start-Sleep -Seconds ${delaySeconds}; rundll32.exe powrprof.dll,SetSuspendState 0,1,0`,
      ],
    };
  }

  const waitForExit =
    pid !== undefined ? `while kill -0 ${pid} 2>/dev/null; do sleep 0.5; done; ` : '';
  const suspend = platform === 'darwin' ? 'pmset sleepnow' : 'systemctl suspend';

  return {
    command: 'sh',
    args: ['-c', `${waitForExit}sleep ${delaySeconds}; ${suspend}`],
  };
}

/**
 * Starts a command that keeps running after this process exits
 */
export const spawnDetached: SpawnDetached = ({ command, args }) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
      windowsHide: true,
    });

    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });

export function createHostSleepInvoker(options: HostSleepInvokerOptions): HostInvoker {
  const platform = options.platform ?? process.platform;
  const delayMS = options.delayMS ?? 2000;
  const pid = options.pid ?? process.pid;
  const run = options.spawnDetached ?? spawnDetached;

  return async (plan) => {
    const command = getHostSleepCommand(platform, {
      delayMS,
      waitForPID: plan.shutdownAppAfter ? pid : undefined,
    });

    options.logger.notice('Scheduling host sleep in {{delayMS}}ms{{afterExit}}', {
      params: {
        delayMS,
        afterExit: plan.shutdownAppAfter ? ' after the control panel exits' : '',
      },
    });

    await run(command);
  };
}

export function createAppExitInvoker(logger: Logger): HostInvoker {
  return () => {
    logger.notice('Closing the control panel');
    logger.exit(0);
  };
}
