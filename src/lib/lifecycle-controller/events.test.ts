import { describe, expect, test } from 'vitest';
import { setCallbackErrorReporter } from '../safe-handle-callback';
import { LifecycleEventBus } from './events';
import type { LifecycleEvent } from './events';

describe('LifecycleEventBus', () => {
  test('delivers events asynchronously in publish order', async () => {
    const bus = new LifecycleEventBus({ now: () => 1_700_000_000_000 });
    const received: string[] = [];

    bus.subscribe((event) => {
      received.push(event.message);
    });

    const event = bus.publish({ role: 'server', kind: 'process-started', message: 'first' });
    bus.publish({ role: null, kind: 'profile-activated', message: 'second' });

    expect(received).toEqual([]);
    expect(event.timestamp).toBe(1_700_000_000_000);
    expect(event.id).toHaveLength(26);

    await bus.whenIdle();

    expect(received).toEqual(['first', 'second']);
  });

  test('a slow subscriber does not hold up the others', async () => {
    const bus = new LifecycleEventBus();
    const fast: string[] = [];
    let releaseSlow = (): void => {};
    const slowGate = new Promise<void>((resolve) => {
      releaseSlow = resolve;
    });

    bus.subscribe(async () => {
      await slowGate;
    });
    bus.subscribe((event) => {
      fast.push(event.message);
    });

    bus.publish({ role: null, kind: 'shutdown-started', message: 'a' });
    bus.publish({ role: null, kind: 'shutdown-completed', message: 'b' });

    await new Promise((resolve) => setTimeout(resolve, 5));

    expect(fast).toEqual(['a', 'b']);

    releaseSlow();
    await bus.whenIdle();
  });

  test('a full queue drops its oldest events', async () => {
    const bus = new LifecycleEventBus({ queueSize: 2 });
    const received: string[] = [];

    bus.subscribe((event) => {
      received.push(event.message);
    });

    for (const message of ['1', '2', '3', '4']) {
      bus.publish({ role: 'proxy', kind: 'process-output', message });
    }

    await bus.whenIdle();

    expect(received).toEqual(['3', '4']);
    expect(bus.droppedCount).toBe(2);
  });

  test('a throwing listener keeps receiving events', async () => {
    const bus = new LifecycleEventBus();
    const received: string[] = [];
    const reported: Error[] = [];
    const previous = setCallbackErrorReporter((error) => reported.push(error));

    bus.subscribe((event) => {
      received.push(event.message);
      throw new Error('listener broke');
    });

    bus.publish({ role: null, kind: 'host-sleep', message: 'x' });
    bus.publish({ role: null, kind: 'app-exit', message: 'y' });

    await bus.whenIdle();
    setCallbackErrorReporter(previous);

    expect(received).toEqual(['x', 'y']);
    expect(reported).toHaveLength(2);
  });

  test('keeps a bounded buffer of recent events and replays it on request', async () => {
    const bus = new LifecycleEventBus({ bufferSize: 2 });

    bus.publish({ role: 'tunnel', kind: 'state-changed', message: 'one' });
    bus.publish({ role: 'tunnel', kind: 'state-changed', message: 'two' });
    bus.publish({ role: 'tunnel', kind: 'state-changed', message: 'three' });

    expect(bus.getRecentEvents().map((event) => event.message)).toEqual(['two', 'three']);

    const replayed: LifecycleEvent[] = [];
    const unsubscribe = bus.subscribe(
      (event) => {
        replayed.push(event);
      },
      { replay: true },
    );

    await bus.whenIdle();

    expect(replayed.map((event) => event.message)).toEqual(['two', 'three']);
    expect(bus.subscriberCount).toBe(1);

    unsubscribe();

    expect(bus.subscriberCount).toBe(0);
  });
});
