export * from './types';
export { InactivityMonitor } from './inactivity-monitor';
