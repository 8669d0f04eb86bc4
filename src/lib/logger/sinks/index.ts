// Built-in sinks
export { ArraySink } from './array';
export { ConsoleSink, type ConsoleSinkOptions } from './console';
export { FileSink, type FileSinkOptions, type FlushResult } from './file';
