import { EventEmitter } from 'events';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { Logger } from '../logger';
import { defaultRedactFunction } from '../logger/utils/redaction';
import { SpawnNotFoundError } from '../process-handle';
import type { Role } from '../process-handle';
import type { ShutdownPlan } from '../shutdown-sequencer';
import type { ControlPanelConfigInput } from './config';
import type { LifecycleEvent } from './events';
import { LifecycleController } from './lifecycle-controller';
import { canTransition } from './role-state';
import { FakeProbe, FakeProcess, MemoryProfileStore } from './test-doubles';
import type { FakeProcessBehavior } from './test-doubles';
import type { RoleState } from './types';

const PROFILES = {
  survival: {
    name: 'survival',
    server_path: '/srv/survival',
    rcon_password: 'test-secret',
  },
  creative: {
    name: 'creative',
    server_path: '/srv/creative',
    rcon_port: 28001,
    query_port: 28002,
  },
  quick: {
    name: 'quick',
    server_path: '/srv/quick',
    polling_interval: 1,
    inactivity_limit: 2,
    pc_sleep_after_inactivity: true,
    shutdown_app_after_inactivity: false,
  },
  broken: {
    name: 'broken',
    server_path: '/srv/broken',
    rcon_port: 70000,
  },
};

const TEST_CONFIG: ControlPanelConfigInput = {
  gracefulStopTimeoutMS: 50,
  auxiliaryStopTimeoutMS: 50,
  startupPollIntervalMS: 5,
  restartDelayMS: 0,
  tunnel: { command: '/opt/tunnel/agent', env: { TUNNEL_SECRET: 'test-secret' } },
  proxy: { command: '/opt/proxy/caddy', args: ['run'] },
};

const INACTIVITY_PLAN: ShutdownPlan = {
  trigger: 'inactivity',
  sleepHostAfter: true,
  shutdownAppAfter: true,
};

const ROLE_STATES: readonly unknown[] = ['Stopped', 'Starting', 'Running', 'Stopping', 'Failed'];

function isRoleState(value: unknown): value is RoleState {
  return ROLE_STATES.includes(value);
}

const controllers: LifecycleController[] = [];

function createController(
  options: {
    config?: ControlPanelConfigInput;
    behaviors?: Partial<Record<Role, FakeProcessBehavior>>;
  } = {},
) {
  const { logger, arraySink } = Logger.createTestOptimizedLogger();
  const processes: Record<Role, FakeProcess> = {
    server: new FakeProcess('server', options.behaviors?.server),
    tunnel: new FakeProcess('tunnel', options.behaviors?.tunnel),
    proxy: new FakeProcess('proxy', options.behaviors?.proxy),
  };
  const probe = new FakeProbe();
  const hostCalls: string[] = [];

  const controller = new LifecycleController({
    logger,
    profileStore: new MemoryProfileStore(PROFILES),
    config: { ...TEST_CONFIG, ...options.config },
    probe,
    createProcess: (role) => processes[role],
    hostSleep: () => {
      hostCalls.push('host-sleep');
    },
    appExit: () => {
      hostCalls.push('app-exit');
    },
    platform: 'linux',
  });

  const events: LifecycleEvent[] = [];
  controller.subscribe((event) => {
    events.push(event);
  });

  controllers.push(controller);

  return { controller, processes, probe, hostCalls, events, logger, arraySink };
}

async function startRunningServer(
  controller: LifecycleController,
  profile: string = 'survival',
): Promise<void> {
  expect((await controller.activateProfile(profile)).success).toBe(true);
  expect((await controller.startServer()).success).toBe(true);
  await vi.waitFor(() => expect(controller.getState().roles.server).toBe('Running'));
}

describe('LifecycleController', () => {
  afterEach(async () => {
    for (const controller of controllers.splice(0)) {
      await controller.close();
    }

    vi.useRealTimers();
  });

  describe('profiles', () => {
    test('reports an inactive server before any profile is active', async () => {
      const { controller } = createController();

      expect(controller.getState()).toEqual({
        profile: null,
        roles: { server: 'Inactive', tunnel: 'Stopped', proxy: 'Stopped' },
        monitor: null,
        restarting: false,
      });
      expect(controller.describeServerStatus()).toEqual({
        key: 'off',
        message: 'Server Machine is live!\nMinecraft Server is OFFLINE',
        statusCode: 206,
      });

      const result = await controller.startServer();

      expect(result).toMatchObject({
        success: false,
        code: 'NoActiveProfile',
        message: 'No active profile',
      });
    });

    test('rejects unknown and invalid profiles without activating them', async () => {
      const { controller } = createController();

      expect(await controller.activateProfile('hardcore')).toMatchObject({
        success: false,
        code: 'ProfileNotFound',
        message: "Profile 'hardcore' was not found",
      });

      expect(await controller.activateProfile('broken')).toMatchObject({
        success: false,
        code: 'InvalidProfile',
        message:
          "Profile 'broken' is invalid: rcon_port: Number must be less than or equal to 65535",
      });

      expect(controller.getState().profile).toBeNull();
    });

    test('activates a profile and redacts its secrets in the log', async () => {
      const { controller, events, arraySink } = createController();

      const result = await controller.activateProfile('survival');

      expect(result).toMatchObject({ success: true, message: "Profile 'survival' is active" });
      expect(result.state.profile).toBe('survival');
      expect(result.state.roles.server).toBe('Stopped');
      expect(controller.getActiveProfile()?.rconPort).toBe(27001);

      const entry = arraySink.logs.find((log) => log.message === 'Profile survival activated');
      expect(entry?.redactedParams).toMatchObject({
        profile: {
          name: 'survival',
          rconPassword: defaultRedactFunction('rconPassword', 'test-secret'),
        },
      });

      await controller.whenEventsDelivered();
      expect(events.map((event) => event.kind)).toEqual(['profile-activated']);
    });

    test('activating the active profile again changes nothing', async () => {
      const { controller, processes } = createController();
      await startRunningServer(controller);

      const before = controller.getState();
      const callsBefore = [...processes.server.calls];

      const result = await controller.activateProfile('survival');

      expect(result).toMatchObject({
        success: false,
        code: 'AlreadyActive',
        message: "Profile 'survival' is already active",
      });
      expect(controller.getState()).toEqual(before);
      expect(processes.server.calls).toEqual(callsBefore);
    });

    test('switching profiles stops every role first', async () => {
      const { controller, processes, probe } = createController();
      await startRunningServer(controller);
      await controller.startTunnel();

      const result = await controller.activateProfile('creative');

      expect(result.success).toBe(true);
      expect(result.state).toMatchObject({
        profile: 'creative',
        roles: { server: 'Stopped', tunnel: 'Stopped', proxy: 'Stopped' },
      });
      expect(processes.server.calls).toEqual(['start', 'graceful:stop', 'release']);
      expect(processes.tunnel.calls).toEqual(['start', 'term', 'release']);

      await startRunningServer(controller, 'creative');
      expect(probe.targets[probe.targets.length - 1]).toEqual({
        host: 'localhost',
        port: 28002,
      });
    });

    test('keeps the old profile when teardown leaves the server running', async () => {
      const { controller } = createController({
        behaviors: { server: { exitsOnStopCommand: false } },
      });
      await startRunningServer(controller);

      const result = await controller.activateProfile('creative');

      expect(result).toMatchObject({
        success: false,
        code: 'Timeout',
        message: "Could not switch to profile 'creative', still running: server",
      });
      expect(controller.getState().profile).toBe('survival');
      expect(controller.getState().roles.server).toBe('Stopping');
    });

    test('reloads the active profile only while everything is stopped', async () => {
      const { controller } = createController();
      await startRunningServer(controller);

      expect(await controller.reloadProfile()).toMatchObject({
        success: false,
        code: 'Busy',
        message: 'Stop the server before reloading the profile',
      });

      const stopped = await controller.stopServer();
      await stopped.completion;

      expect(await controller.reloadProfile()).toMatchObject({
        success: true,
        message: "Profile 'survival' is active",
      });
    });
  });

  describe('server', () => {
    test('starts, becomes Running on the first answered query and starts tracking', async () => {
      const { controller, processes, probe } = createController();
      await controller.activateProfile('survival');

      const started = await controller.startServer();

      expect(started).toMatchObject({
        success: true,
        message: "Server starting for profile 'survival'",
      });
      expect(started.state.roles.server).toBe('Starting');
      expect(processes.server.launches[0]).toMatchObject({
        command: '"/srv/survival/run.bat"',
        cwd: '/srv/survival',
        shell: true,
        env: { RCON_PASSWORD: 'test-secret', RCON_PORT: '27001', QUERY_PORT: '27002' },
      });

      await vi.waitFor(() => expect(controller.getState().roles.server).toBe('Running'));

      expect(probe.targets[0]).toEqual({ host: 'localhost', port: 27002 });
      expect(controller.getState().monitor?.state).toBe('idle-tracking');
      expect(controller.describeServerStatus()).toEqual({
        key: 'fully_loaded',
        message: 'Server Machine is live!\nMinecraft Server is RUNNING',
        statusCode: 200,
      });

      expect(await controller.startServer()).toMatchObject({
        success: false,
        code: 'AlreadyRunning',
        message: 'Server is already running',
      });
    });

    test('stays Starting while the server does not answer', async () => {
      const { controller, probe } = createController();
      probe.setFallback({ reachable: false, error: 'timed out' });
      await controller.activateProfile('survival');
      await controller.startServer();

      await vi.waitFor(() => expect(probe.sampleCount).toBeGreaterThanOrEqual(3));

      expect(controller.getState().roles.server).toBe('Starting');
      expect(controller.describeServerStatus().key).toBe('starting');
    });

    test('reports a spawn failure and stays Stopped', async () => {
      const spawnError = new SpawnNotFoundError({
        role: 'server',
        command: '/srv/survival/run.bat',
        cwd: '/srv/survival',
        missing: 'executable',
      });
      const { controller } = createController({ behaviors: { server: { spawnError } } });
      await controller.activateProfile('survival');

      const result = await controller.startServer();

      expect(result).toMatchObject({
        success: false,
        code: 'SpawnFailed',
        message: 'Executable "/srv/survival/run.bat" was not found',
      });
      expect(result.error?.cause).toBe(spawnError);
      expect(result.state.roles.server).toBe('Stopped');
    });

    test('stops gracefully and reports the outcome through completion', async () => {
      const { controller, processes } = createController();
      await startRunningServer(controller);

      const stopped = await controller.stopServer();

      expect(stopped).toMatchObject({ success: true, message: 'Server is stopping' });
      expect(stopped.state.roles.server).toBe('Stopping');
      expect(controller.getState().monitor?.state).toBe('suspended');

      const outcome = await stopped.completion;

      expect(outcome).toMatchObject({ success: true, message: 'Server stopped after "stop"' });
      expect(outcome?.steps.map((step) => step.outcome)).toEqual(['graceful']);
      expect(controller.getState().roles.server).toBe('Stopped');
      expect(processes.server.calls).toEqual(['start', 'graceful:stop', 'release']);

      expect(await controller.stopServer()).toMatchObject({
        success: false,
        code: 'NotRunning',
        message: 'Server is not running',
      });
    });

    test('answers Busy while another operation holds the server', async () => {
      const { controller } = createController({
        behaviors: { server: { exitsOnStopCommand: false } },
      });
      await startRunningServer(controller);

      const first = await controller.stopServer();

      expect(await controller.stopServer()).toMatchObject({
        success: false,
        code: 'Busy',
        message: 'The server is busy with another operation',
      });
      expect((await controller.startServer()).code).toBe('Busy');

      await first.completion;
    });

    test('a manual stop that times out leaves the server Stopping until forced', async () => {
      const { controller, processes } = createController({
        behaviors: { server: { exitsOnStopCommand: false } },
      });
      await startRunningServer(controller);

      const stopped = await controller.stopServer();
      const outcome = await stopped.completion;

      expect(outcome).toMatchObject({
        success: false,
        code: 'Timeout',
        message: 'Server did not stop within 50ms, use force stop to kill it',
      });
      expect(controller.getState().roles.server).toBe('Stopping');
      expect(controller.describeServerStatus().key).toBe('stopping');

      const forced = await controller.forceStopServer();
      const forcedOutcome = await forced.completion;

      expect(forcedOutcome?.steps.map((step) => step.outcome)).toEqual(['killed']);
      expect(controller.getState().roles.server).toBe('Stopped');
      expect(processes.server.calls).toEqual(['start', 'graceful:stop', 'kill', 'release']);
    });

    test('a timed out server that exits later ends Stopped', async () => {
      const { controller, processes } = createController({
        behaviors: { server: { exitsOnStopCommand: false } },
      });
      await startRunningServer(controller);

      const stopped = await controller.stopServer();
      await stopped.completion;

      processes.server.crash(0);

      expect(controller.getState().roles.server).toBe('Stopped');
    });

    test('escalates a timed out manual stop when configured to', async () => {
      const { controller, events } = createController({
        config: { manualStopEscalates: true },
        behaviors: { server: { exitsOnStopCommand: false } },
      });
      await startRunningServer(controller);

      const stopped = await controller.stopServer();
      const outcome = await stopped.completion;

      expect(outcome?.success).toBe(true);
      expect(outcome?.steps.map((step) => step.outcome)).toEqual(['escalated']);
      expect(controller.getState().roles.server).toBe('Stopped');

      await controller.whenEventsDelivered();
      const escalated = events.filter((event) => event.kind === 'escalated');

      expect(escalated.map((event) => event.role)).toEqual(['server']);
    });

    test('an unexpected exit fails the server until acknowledged', async () => {
      const { controller, processes } = createController();
      await startRunningServer(controller);

      processes.server.crash(1);

      expect(controller.getState().roles.server).toBe('Failed');
      expect(controller.getState().monitor?.state).toBe('suspended');
      expect(controller.describeServerStatus()).toEqual({
        key: 'error',
        message: 'Server Machine is OFFLINE',
        statusCode: 500,
      });
      expect((await controller.startServer()).code).toBe('RoleFailed');
      expect((await controller.stopServer()).code).toBe('RoleFailed');

      const acknowledged = await controller.acknowledgeFailure('server');

      expect(acknowledged).toMatchObject({
        success: true,
        message: 'The server failure was acknowledged',
      });
      expect(acknowledged.state.roles.server).toBe('Stopped');
      expect((await controller.acknowledgeFailure('server')).code).toBe('NotFailed');
      expect((await controller.startServer()).success).toBe(true);
    });

    test('restarts by stopping, then starting again', async () => {
      const { controller, processes } = createController();
      await startRunningServer(controller);

      const result = await controller.restartServer();

      expect(result).toMatchObject({ success: true, message: 'Server is restarting' });
      expect(controller.describeServerStatus().key).toBe('restarting');
      expect(await controller.restartServer()).toMatchObject({
        success: false,
        code: 'Busy',
        message: 'Server is already restarting',
      });

      const outcome = await result.completion;

      expect(outcome).toMatchObject({
        success: true,
        message: "Server starting for profile 'survival'",
      });
      expect(controller.getState().restarting).toBe(false);
      expect(processes.server.calls.filter((call) => call === 'start')).toHaveLength(2);

      await vi.waitFor(() => expect(controller.getState().roles.server).toBe('Running'));
    });

    test('restarting a stopped server just starts it', async () => {
      const { controller } = createController();
      await controller.activateProfile('survival');

      expect(await controller.restartServer()).toMatchObject({
        success: true,
        message: "Server starting for profile 'survival'",
      });
    });

    test('sends console commands and routes the stop command to stopServer', async () => {
      const { controller, processes } = createController();
      await startRunningServer(controller);

      expect((await controller.sendServerCommand('  say hello ')).message).toBe('Sent "say hello"');
      expect(processes.server.commands).toEqual(['say hello']);
      expect((await controller.sendServerCommand(' ')).code).toBe('InvalidCommand');

      const stop = await controller.sendServerCommand('stop');

      expect(stop.message).toBe('Server is stopping');
      await stop.completion;

      expect((await controller.sendServerCommand('list')).code).toBe('NotRunning');
    });
  });

  describe('auxiliary roles', () => {
    test('answers NotConfigured without a launch spec', async () => {
      const { controller } = createController({ config: { tunnel: undefined } });

      expect(await controller.startTunnel()).toMatchObject({
        success: false,
        code: 'NotConfigured',
        message: 'No tunnel is configured',
      });
      expect((await controller.stopTunnel()).code).toBe('NotConfigured');
    });

    test('starts with the profile environment and stops with SIGTERM', async () => {
      const { controller, processes } = createController();
      await controller.activateProfile('survival');

      const started = await controller.startTunnel();

      expect(started).toMatchObject({ success: true, message: 'The tunnel started' });
      expect(started.state.roles.tunnel).toBe('Running');
      expect(processes.tunnel.launches[0]).toEqual({
        command: '/opt/tunnel/agent',
        args: [],
        cwd: '/opt/tunnel',
        env: {
          RCON_PASSWORD: 'test-secret',
          RCON_PORT: '27001',
          QUERY_PORT: '27002',
          TUNNEL_SECRET: 'test-secret',
        },
        shell: false,
      });
      expect(await controller.startTunnel()).toMatchObject({
        code: 'AlreadyRunning',
        message: 'The tunnel is already running',
      });

      const stopped = await controller.stopTunnel();
      const outcome = await stopped.completion;

      expect(outcome).toMatchObject({
        success: true,
        message: 'The tunnel stopped after SIGTERM',
      });
      expect(controller.getState().roles.tunnel).toBe('Stopped');
      expect((await controller.stopTunnel()).code).toBe('NotRunning');
    });

    test('the proxy runs without an active profile', async () => {
      const { controller, processes } = createController();

      const started = await controller.startProxy();

      expect(started.success).toBe(true);
      expect(processes.proxy.launches[0]).toMatchObject({
        command: '/opt/proxy/caddy',
        args: ['run'],
        env: {},
      });

      const stopped = await controller.stopProxy();
      await stopped.completion;

      expect(controller.getState().roles.proxy).toBe('Stopped');
    });
  });

  describe('inactivity', () => {
    test('stops server, tunnel and proxy in order, then sleeps and exits', async () => {
      const { controller, hostCalls, events } = createController();
      await startRunningServer(controller);
      await controller.startTunnel();
      await controller.startProxy();

      const result = await controller.handleInactivity(INACTIVITY_PLAN);

      expect(result).toMatchObject({ success: true, message: 'Inactivity shutdown completed' });
      expect(result.state.roles).toEqual({
        server: 'Stopped',
        tunnel: 'Stopped',
        proxy: 'Stopped',
      });
      expect(hostCalls).toEqual(['host-sleep', 'app-exit']);

      await controller.whenEventsDelivered();

      const order = events
        .filter((event) => ['shutdown-step', 'host-sleep', 'app-exit'].includes(event.kind))
        .map((event) => `${event.kind}:${event.role ?? '-'}`);

      expect(order).toEqual([
        'shutdown-step:server',
        'shutdown-step:tunnel',
        'shutdown-step:proxy',
        'host-sleep:-',
        'app-exit:-',
      ]);
    });

    test('drops the plan when the server is not running', async () => {
      const { controller, hostCalls } = createController();
      await controller.activateProfile('survival');

      expect(await controller.handleInactivity(INACTIVITY_PLAN)).toMatchObject({
        success: false,
        code: 'NotRunning',
        message: 'Inactivity shutdown dropped, the server is Stopped',
      });
      expect(hostCalls).toEqual([]);
    });

    test('a manual operation in progress wins over the plan', async () => {
      const { controller, hostCalls } = createController({
        behaviors: { server: { exitsOnStopCommand: false } },
      });
      await startRunningServer(controller);

      const stop = await controller.stopServer();

      expect(await controller.handleInactivity(INACTIVITY_PLAN)).toMatchObject({
        success: false,
        code: 'Busy',
      });

      await stop.completion;
      expect(hostCalls).toEqual([]);
    });

    test('idle tracking starts over once a busy role frees up', async () => {
      vi.useFakeTimers();

      const { controller, hostCalls } = createController({
        config: { auxiliaryStopTimeoutMS: 5000 },
        behaviors: { tunnel: { exitsOnTerm: false } },
      });
      await startRunningServer(controller, 'quick');
      expect((await controller.startTunnel()).success).toBe(true);

      // The tunnel ignores SIGTERM, so its stop holds the role past the idle limit
      const tunnelStop = await controller.stopTunnel();

      await vi.advanceTimersByTimeAsync(2500);

      expect(controller.getState().roles.server).toBe('Running');
      expect(controller.getState().monitor?.state).toBe('suspended');
      expect(hostCalls).toEqual([]);

      await vi.advanceTimersByTimeAsync(3000);
      expect((await tunnelStop.completion)?.success).toBe(true);

      expect(controller.getState().roles).toEqual({
        server: 'Running',
        tunnel: 'Stopped',
        proxy: 'Stopped',
      });
      expect(controller.getState().monitor?.state).toBe('idle-tracking');
      expect(hostCalls).toEqual([]);

      await vi.advanceTimersByTimeAsync(2500);
      await vi.waitFor(() => expect(hostCalls).toEqual(['host-sleep']));
      expect(controller.getState().roles.server).toBe('Stopped');
    });

    test('the monitor hands the plan over once the idle limit is reached', async () => {
      vi.useFakeTimers();

      const { controller, hostCalls, events } = createController();
      await controller.activateProfile('quick');
      await controller.startServer();

      await vi.waitFor(() => expect(controller.getState().roles.server).toBe('Running'));
      expect(hostCalls).toEqual([]);

      await vi.advanceTimersByTimeAsync(2500);
      await vi.waitFor(() => expect(hostCalls).toEqual(['host-sleep']));

      expect(controller.getState().roles.server).toBe('Stopped');

      await controller.whenEventsDelivered();
      expect(events.filter((event) => event.kind === 'inactivity-tick')).toHaveLength(2);
      expect(events.filter((event) => event.kind === 'inactivity-threshold')).toHaveLength(1);
    });
  });

  describe('shutdown', () => {
    test('shutdownAll shares one run and kills a server that ignores the stop', async () => {
      const { controller } = createController({
        behaviors: { server: { exitsOnStopCommand: false } },
      });
      await startRunningServer(controller);
      await controller.startProxy();

      const first = controller.shutdownAll('test');
      const second = controller.shutdownAll('test');

      expect(second).toBe(first);

      const report = await first;

      expect(report.success).toBe(true);
      expect(report.steps.map((step) => `${step.role}:${step.outcome}`)).toEqual([
        'server:timeout',
        'tunnel:already-stopped',
        'proxy:terminated',
        'server:killed',
      ]);
      expect(controller.getState().roles).toEqual({
        server: 'Stopped',
        tunnel: 'Stopped',
        proxy: 'Stopped',
      });
    });

    test('a shutdown signal stops everything and exits', async () => {
      const target = new EventEmitter();
      const { controller, logger } = createController();
      await startRunningServer(controller);

      const manager = controller.attachSignals({ target });

      expect(manager.getStatus().listeningFor).toEqual(['SIGINT', 'SIGTERM']);

      target.emit('SIGTERM');

      await vi.waitFor(() => expect(logger.didExit).toBe(true));
      expect(logger.exitCode).toBe(0);
      expect(controller.getState().roles.server).toBe('Stopped');
    });

    test('exit cleanup stops the processes before the logger exits', async () => {
      const { controller, logger } = createController();
      await startRunningServer(controller);
      controller.registerExitCleanup();

      logger.exit(0);

      await vi.waitFor(() => expect(logger.didExit).toBe(true));
      expect(controller.getState().roles.server).toBe('Stopped');
    });
  });

  test('every published role change is allowed by the state machine', async () => {
    const { controller, processes, events } = createController({
      behaviors: { server: { exitsOnStopCommand: false } },
    });

    await startRunningServer(controller);
    await (await controller.stopServer()).completion;
    await (await controller.forceStopServer()).completion;
    await startRunningServer(controller, 'creative');
    processes.server.crash(3);
    await controller.acknowledgeFailure('server');
    await controller.startTunnel();
    await controller.startProxy();
    await controller.activateProfile('survival');

    await controller.whenEventsDelivered();

    const changes = events.filter((event) => event.kind === 'state-changed');

    expect(changes.length).toBeGreaterThan(10);

    for (const change of changes) {
      const from = change.data?.from;
      const to = change.data?.to;

      expect(isRoleState(from) && isRoleState(to) && canTransition(from, to)).toBe(true);
    }

    expect(controller.getState().roles).toEqual({
      server: 'Stopped',
      tunnel: 'Stopped',
      proxy: 'Stopped',
    });
  });
});
