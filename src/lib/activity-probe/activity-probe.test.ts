import { describe, expect, test } from 'vitest';
import { Logger } from '../logger';
import { ActivityProbe, MAX_PROBE_TIMEOUT_MS } from './activity-probe';
import { ProbeProtocolError, ProbeUnreachableError } from './errors';
import type { ServerStatus, StatusQuery } from './types';

const target = { host: 'localhost', port: 27002 };

function scriptedQuery(
  outcomes: Array<ServerStatus | Error>,
): { query: StatusQuery; timeouts: number[] } {
  const timeouts: number[] = [];
  let index = 0;

  const query: StatusQuery = (_target, timeoutMS) => {
    timeouts.push(timeoutMS);
    const outcome = outcomes[Math.min(index++, outcomes.length - 1)];

    return outcome instanceof Error
      ? Promise.reject(outcome)
      : Promise.resolve(outcome);
  };

  return { query, timeouts };
}

function createProbe(outcomes: Array<ServerStatus | Error>, timeoutMS?: number) {
  const { logger, arraySink } = Logger.createTestOptimizedLogger();
  const { query, timeouts } = scriptedQuery(outcomes);
  const probe = new ActivityProbe({
    logger: logger.service('activity-probe'),
    query,
    timeoutMS,
    now: () => 1000,
  });

  return { probe, arraySink, timeouts };
}

const online: ServerStatus = { playerCount: 3, maxPlayers: 20, players: ['a', 'b', 'c'] };
const refused = new ProbeUnreachableError({ ...target, reason: 'connection refused' });

describe('ActivityProbe', () => {
  test('reports player counts of a reachable server', async () => {
    const { probe } = createProbe([online]);

    expect(await probe.sample(target)).toEqual({
      timestamp: 1000,
      reachable: true,
      playerCount: 3,
      maxPlayers: 20,
      players: ['a', 'b', 'c'],
    });
    expect(probe.hasBeenReachable).toBe(true);
  });

  test('encodes failures in the sample', async () => {
    const protocolError = new ProbeProtocolError({ ...target, reason: 'no player count' });
    const { probe } = createProbe([refused, protocolError, new Error('socket hang up')]);

    expect(await probe.sample(target)).toEqual({
      timestamp: 1000,
      reachable: false,
      error: refused.message,
      errorCode: 'Unreachable',
    });
    expect(await probe.sample(target)).toMatchObject({
      reachable: false,
      errorCode: 'ProtocolError',
    });
    expect(await probe.sample(target)).toMatchObject({
      reachable: false,
      errorCode: 'Unreachable',
      error: 'Server at localhost:27002 is unreachable (socket hang up)',
    });
  });

  test('caps the query timeout', async () => {
    const { probe, timeouts } = createProbe([online], 30_000);

    await probe.sample(target);

    expect(timeouts).toEqual([MAX_PROBE_TIMEOUT_MS]);
  });

  test('logs each reachability transition once', async () => {
    const { probe, arraySink } = createProbe([
      refused,
      refused,
      online,
      online,
      refused,
      refused,
      online,
    ]);

    for (let i = 0; i < 7; i++) {
      await probe.sample(target);
    }

    expect(arraySink.getLines()).toEqual([
      'info: Server at localhost:27002 is not answering yet',
      'info: Server at localhost:27002 is answering',
      `warn: Server at localhost:27002 stopped answering: ${refused.message}`,
      'success: Server at localhost:27002 is reachable again',
    ]);
  });

  test('reset forgets that the server was seen', async () => {
    const { probe, arraySink } = createProbe([online, refused]);

    await probe.sample(target);
    probe.reset();
    await probe.sample(target);

    expect(arraySink.getLines()).toEqual([
      'info: Server at localhost:27002 is not answering yet',
    ]);
  });
});
