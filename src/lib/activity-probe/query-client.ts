import { queryFull } from 'minecraft-server-util';
import { isNumber } from '../type-guards';
import { ProbeProtocolError, ProbeUnreachableError } from './errors';
import type { ProbeTarget, ServerStatus, StatusQuery } from './types';

/**
 * The part of a full stat answer activity tracking reads
 */
export interface FullStatAnswer {
  players: {
    online: number;
    max: number;
    list: string[];
  };
}

export type QueryFullFunction = (
  host: string,
  port: number,
  options: { timeout: number },
) => Promise<FullStatAnswer>;

/**
 * A `StatusQuery` over the game's query port (full stat, which carries the
 * player names). Rejects with `ProbeUnreachableError` when the server does
 * not answer in time and `ProbeProtocolError` when the answer has no
 * player count.
 */
export function createFullStatQuery(queryFn: QueryFullFunction = queryFull): StatusQuery {
  return async (target: ProbeTarget, timeoutMS: number): Promise<ServerStatus> => {
    let answer: FullStatAnswer;

    try {
      answer = await queryFn(target.host, target.port, { timeout: timeoutMS });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;

      throw new ProbeUnreachableError(
        { ...target, reason: cause?.message ?? String(error) },
        cause,
      );
    }

    const { online, max, list } = answer.players;

    if (!isNumber(online) || online < 0) {
      throw new ProbeProtocolError({ ...target, reason: 'no player count' });
    }

    return {
      playerCount: online,
      maxPlayers: isNumber(max) ? max : 0,
      players: Array.isArray(list) ? list : [],
    };
  };
}
