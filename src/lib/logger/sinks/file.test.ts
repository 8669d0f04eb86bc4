import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileSink } from './file';
import type { LogEntry } from '../types';

function makeEntry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: new Date(2024, 2, 9, 23, 59, 58).getTime(),
    type: 'info',
    template: 'Server STARTED',
    message: 'Server STARTED',
    ...overrides,
  };
}

describe('FileSink', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'filesink-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test('appends formatted lines to the daily file', async () => {
    const logDir = path.join(tempDir, 'ControllerLogs');
    const sink = new FileSink({ logDir, basename: 'controller' });

    sink.write(makeEntry({ serviceName: 'lifecycle-controller' }));
    sink.write(
      makeEntry({ type: 'warn', entityName: 'tunnel', message: 'slow' }),
    );

    const result = await sink.flush();
    expect(result).toEqual({ entriesWritten: 2, entriesFailed: 0 });

    const filePath = path.join(logDir, '2024-03-09_controller.log');
    expect(sink.getFilePath(makeEntry().timestamp)).toBe(filePath);

    const content = await readFile(filePath, 'utf8');
    expect(content).toBe(
      '[2024-03-09 23:59:58] [INFO] [lifecycle-controller] Server STARTED\n' +
        '[2024-03-09 23:59:58] [WARN] [tunnel] slow\n',
    );
  });

  test('splits entries across days', async () => {
    const sink = new FileSink({ logDir: tempDir, basename: 'controller' });
    const nextDay = new Date(2024, 2, 10, 0, 0, 1).getTime();

    sink.write(makeEntry());
    sink.write(makeEntry({ timestamp: nextDay, message: 'later' }));
    await sink.flush();

    const second = await readFile(
      path.join(tempDir, '2024-03-10_controller.log'),
      'utf8',
    );
    expect(second).toBe('[2024-03-10 00:00:01] [INFO] later\n');
  });

  test('writes redacted params in JSON format', async () => {
    const sink = new FileSink({
      logDir: tempDir,
      basename: 'json',
      jsonFormat: true,
    });

    sink.write(
      makeEntry({
        params: { password: 'test-secret' },
        redactedParams: { password: '***********' },
      }),
    );
    await sink.close();

    const content = await readFile(
      path.join(tempDir, '2024-03-09_json.log'),
      'utf8',
    );
    const parsed: unknown = JSON.parse(content.trim());
    expect(parsed).toMatchObject({
      type: 'info',
      message: 'Server STARTED',
      params: { password: '***********' },
    });
  });

  test('reports failures through onError and keeps draining', async () => {
    // A plain file where the directory should be makes mkdir fail
    const blocked = path.join(tempDir, 'blocked');
    await writeFile(blocked, 'x');

    const onError = vi.fn();
    const sink = new FileSink({
      logDir: path.join(blocked, 'logs'),
      basename: 'controller',
      onError,
    });

    sink.write(makeEntry());
    sink.write(makeEntry());

    const result = await sink.flush();
    expect(result).toEqual({ entriesWritten: 0, entriesFailed: 2 });
    expect(onError).toHaveBeenCalledTimes(2);
  });

  test('ignores writes after close', async () => {
    const sink = new FileSink({ logDir: tempDir, basename: 'closed' });

    await sink.close();
    sink.write(makeEntry());

    expect(await sink.flush()).toEqual({ entriesWritten: 0, entriesFailed: 0 });
  });
});
