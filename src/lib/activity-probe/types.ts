import type { ProbeError } from './errors';

export interface ProbeTarget {
  host: string;
  port: number;
}

/**
 * One status query outcome. Failures are encoded, never thrown.
 */
export interface ActivitySample {
  timestamp: number;
  reachable: boolean;
  playerCount?: number;
  maxPlayers?: number;
  players?: string[];
  error?: string;
  errorCode?: ProbeError['errCode'];
}

/**
 * What a status query has to report for activity tracking
 */
export interface ServerStatus {
  playerCount: number;
  maxPlayers: number;
  players: string[];
}

/**
 * Runs one status query. Rejects with a `ProbeError` on failure.
 */
export type StatusQuery = (
  target: ProbeTarget,
  timeoutMS: number,
) => Promise<ServerStatus>;
