import path from 'path';
import { z } from 'zod';
import type { ProbeTarget } from '../activity-probe';
import { MAX_PROBE_TIMEOUT_MS } from '../activity-probe';
import type { LaunchSpec } from '../process-handle';
import { ControlPanelConfigError } from './errors';

const port = z.coerce.number().int().min(1).max(65535);

/**
 * A stored profile record, in the store's snake_case, turned into the
 * camelCase `ProfileConfig` the controller works with
 */
export const ProfileConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    server_path: z.string().min(1),
    server_ip: z.string().min(1).default('localhost'),
    run_script: z.string().min(1).default('run.bat'),
    rcon_password: z.string().default(''),
    rcon_port: port.default(27001),
    query_port: port.default(27002),
    auth_key: z.string().default(''),
    shutdown_key: z.string().default(''),
    inactivity_limit: z.coerce.number().int().positive().default(1800),
    polling_interval: z.coerce.number().int().positive().default(60),
    pc_sleep_after_inactivity: z.boolean().default(true),
    shutdown_app_after_inactivity: z.boolean().default(false),
    description: z.string().default(''),
    env_scope: z.enum(['per_server', 'global']).default('per_server'),
  })
  .transform((record) => ({
    name: record.name,
    serverPath: record.server_path,
    serverIP: record.server_ip,
    runScript: record.run_script,
    rconPassword: record.rcon_password,
    rconPort: record.rcon_port,
    queryPort: record.query_port,
    authKey: record.auth_key,
    shutdownKey: record.shutdown_key,
    inactivityLimitSeconds: record.inactivity_limit,
    pollingIntervalSeconds: record.polling_interval,
    sleepHostAfterInactivity: record.pc_sleep_after_inactivity,
    shutdownAppAfterInactivity: record.shutdown_app_after_inactivity,
    description: record.description,
    envScope: record.env_scope,
  }));

export type ProfileConfig = Readonly<z.output<typeof ProfileConfigSchema>>;
export type ProfileRecord = z.input<typeof ProfileConfigSchema>;

/** Keys of a profile that never reach the logs in clear text */
export const PROFILE_SECRET_KEYS = ['rconPassword', 'authKey', 'shutdownKey'] as const;

const AuxiliaryLaunchSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Defaults to the directory of an absolute `command`, else the current one */
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).default({}),
  shell: z.boolean().default(false),
});

export type AuxiliaryLaunchConfig = z.output<typeof AuxiliaryLaunchSchema>;

export const ControlPanelConfigSchema = z.object({
  gracefulStopTimeoutMS: z.number().int().positive().default(15000),
  auxiliaryStopTimeoutMS: z.number().int().positive().default(5000),
  probeTimeoutMS: z.number().int().positive().max(MAX_PROBE_TIMEOUT_MS).default(5000),
  startupPollIntervalMS: z.number().int().positive().default(2000),
  restartDelayMS: z.number().int().nonnegative().default(20000),
  unreachableTickLimit: z.number().int().positive().default(3),
  stopCommand: z.string().min(1).default('stop'),
  manualStopEscalates: z.boolean().default(false),
  eventBufferSize: z.number().int().positive().default(400),
  /** Per-subscriber queue bound of the event bus */
  eventQueueSize: z.number().int().positive().default(100),
  profileLogFiles: z.boolean().default(false),
  /** How the server receives console commands; rcon needs a password */
  controlChannel: z.enum(['rcon', 'stdin']).default('rcon'),
  hostSleepDelayMS: z.number().int().nonnegative().default(2000),
  /** Keys used by profiles with `env_scope: global` */
  globalKeys: z
    .object({
      adminAuthKey: z.string().optional(),
      authKey: z.string().optional(),
      shutdownKey: z.string().optional(),
    })
    .default({}),
  tunnel: AuxiliaryLaunchSchema.optional(),
  proxy: AuxiliaryLaunchSchema.optional(),
});

export type ControlPanelConfig = Readonly<z.output<typeof ControlPanelConfigSchema>>;
export type ControlPanelConfigInput = z.input<typeof ControlPanelConfigSchema>;

export type ProfileParseResult =
  | { success: true; profile: ProfileConfig }
  | { success: false; issues: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

export function parseProfileConfig(record: unknown): ProfileParseResult {
  const result = ProfileConfigSchema.safeParse(record);

  if (!result.success) {
    return { success: false, issues: formatIssues(result.error) };
  }

  return { success: true, profile: Object.freeze(result.data) };
}

/**
 * @throws ControlPanelConfigError
 */
export function parseControlPanelConfig(input: ControlPanelConfigInput = {}): ControlPanelConfig {
  const result = ControlPanelConfigSchema.safeParse(input);

  if (!result.success) {
    throw new ControlPanelConfigError({ issues: formatIssues(result.error) }, result.error);
  }

  return Object.freeze(result.data);
}

/**
 * The variables a profile's processes see on top of the inherited
 * environment. Nothing here is written to `process.env`.
 */
export function buildProfileEnvironment(
  profile: ProfileConfig,
  globalKeys: ControlPanelConfig['globalKeys'] = {},
): Record<string, string> {
  const env: Record<string, string> = {
    RCON_PASSWORD: profile.rconPassword,
    RCON_PORT: String(profile.rconPort),
    QUERY_PORT: String(profile.queryPort),
  };

  const authKey = profile.envScope === 'global' ? globalKeys.authKey : profile.authKey;
  const shutdownKey =
    profile.envScope === 'global' ? globalKeys.shutdownKey : profile.shutdownKey;

  if (globalKeys.adminAuthKey) {
    env.ADMIN_AUTH_KEY = globalKeys.adminAuthKey;
  }

  if (authKey) {
    env.AUTHKEY_SERVER_WEBSITE = authKey;
  }

  if (shutdownKey) {
    env.SHUTDOWN_AUTH_KEY = shutdownKey;
  }

  return env;
}

/**
 * Batch scripts only run through the shell, which needs the path quoted
 */
export function buildServerLaunchSpec(
  profile: ProfileConfig,
  env: Record<string, string>,
): LaunchSpec {
  const scriptPath = path.resolve(profile.serverPath, profile.runScript);
  const isBatchScript = /\.(bat|cmd)$/i.test(profile.runScript);

  return {
    command: isBatchScript ? `"${scriptPath}"` : scriptPath,
    cwd: profile.serverPath,
    env,
    shell: isBatchScript,
  };
}

export function buildAuxiliaryLaunchSpec(
  launch: AuxiliaryLaunchConfig,
  env: Record<string, string>,
): LaunchSpec {
  return {
    command: launch.command,
    args: [...launch.args],
    cwd:
      launch.cwd ??
      (path.isAbsolute(launch.command) ? path.dirname(launch.command) : process.cwd()),
    env: { ...env, ...launch.env },
    shell: launch.shell,
  };
}

export function getProbeTarget(profile: ProfileConfig): ProbeTarget {
  return { host: profile.serverIP, port: profile.queryPort };
}
