// module entry point

// Controller facade, events, config and host actions
export * from './lib/lifecycle-controller/index';

// Building blocks
export * from './lib/process-handle/index';
export * from './lib/activity-probe/index';
export * from './lib/inactivity-monitor/index';
export * from './lib/shutdown-sequencer/index';

// Logging
export * from './lib/logger/index';

// Process Signal Manager
export {
  ProcessSignalManager,
  type ProcessSignalManagerOptions,
  type ProcessSignalManagerStatus,
  type ShutdownSignal,
  type SignalTarget,
} from './lib/process-signal-manager';

// ID Helpers
export { generateID, isValidID } from './lib/id-helpers';

// Event handling
export {
  EventEmitter,
  EventEmitterProtected,
  type EventCallback,
} from './lib/event-emitter';

// Callback handling
export {
  safeHandleCallback,
  safeHandleCallbackAndWait,
  setCallbackErrorReporter,
  type CallbackErrorReporter,
  type CallbackResult,
} from './lib/safe-handle-callback';

// Utility functions
export { sleep } from './lib/sleep';
export { errorToString } from './lib/error-to-string';
