export * from './types';
export * from './errors';
export * from './control-channel';
export { ProcessHandle, type ProcessHandleOptions } from './process-handle';
