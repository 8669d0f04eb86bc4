export * from './types';
export * from './errors';
export { ActivityProbe, MAX_PROBE_TIMEOUT_MS, type ActivityProbeOptions } from './activity-probe';
export { createFullStatQuery, type FullStatAnswer, type QueryFullFunction } from './query-client';
