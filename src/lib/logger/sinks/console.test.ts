import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { ConsoleSink } from './console';
import type { LogEntry } from '../types';
import { LogLevel } from '../types';

function makeEntry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: new Date(2024, 0, 15, 9, 5, 3).getTime(),
    type: 'info',
    template: 'Server STARTED',
    message: 'Server STARTED',
    ...overrides,
  };
}

describe('ConsoleSink', () => {
  let logSpy: MockInstance;
  let errorSpy: MockInstance;
  let warnSpy: MockInstance;
  let infoSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('routes each type to the matching console method', () => {
    const sink = new ConsoleSink({ colors: false });

    sink.write(makeEntry({ type: 'info', message: 'a' }));
    sink.write(makeEntry({ type: 'error', message: 'b' }));
    sink.write(makeEntry({ type: 'warn', message: 'c' }));
    sink.write(makeEntry({ type: 'success', message: 'd' }));

    expect(infoSpy).toHaveBeenCalledWith('a');
    expect(errorSpy).toHaveBeenCalledWith('b');
    expect(warnSpy).toHaveBeenCalledWith('c');
    expect(logSpy).toHaveBeenCalledWith('d');
  });

  test('prefixes timestamp, type label, service and entity', () => {
    const sink = new ConsoleSink({
      colors: false,
      timestamps: true,
      typeLabels: true,
    });

    sink.write(
      makeEntry({ serviceName: 'lifecycle-controller', entityName: 'server' }),
    );

    expect(infoSpy).toHaveBeenCalledWith(
      '[01-15-2024 09:05:03] [INFO] [lifecycle-controller] [server] Server STARTED',
    );
  });

  test('filters entries below the minimum level', () => {
    const sink = new ConsoleSink({ colors: false });

    sink.write(makeEntry({ type: 'debug', message: 'hidden' }));
    expect(logSpy).not.toHaveBeenCalled();

    sink.setMinLevel(LogLevel.DEBUG);
    sink.write(makeEntry({ type: 'debug', message: 'shown' }));
    expect(logSpy).toHaveBeenCalledWith('shown');
    expect(sink.getMinLevel()).toBe(LogLevel.DEBUG);
  });

  test('raw entries bypass level filtering and formatting', () => {
    const sink = new ConsoleSink({
      colors: false,
      minLevel: LogLevel.ERROR,
      typeLabels: true,
    });

    sink.write(makeEntry({ type: 'raw', message: 'plain', serviceName: 'x' }));

    expect(logSpy).toHaveBeenCalledWith('plain');
  });

  test('mute and close stop output', () => {
    const sink = new ConsoleSink({ colors: false });

    sink.mute();
    expect(sink.isMuted()).toBe(true);
    sink.write(makeEntry());
    expect(infoSpy).not.toHaveBeenCalled();

    sink.unmute();
    sink.close();
    sink.write(makeEntry());
    expect(infoSpy).not.toHaveBeenCalled();
  });
});
