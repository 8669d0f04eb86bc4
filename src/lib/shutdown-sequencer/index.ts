export * from './types';
export { ShutdownSequencer } from './shutdown-sequencer';
