import { generateID } from '../id-helpers';
import type { Role } from '../process-handle';
import { safeHandleCallbackAndWait } from '../safe-handle-callback';

export type LifecycleEventKind =
  | 'state-changed'
  | 'process-started'
  | 'process-exited'
  | 'process-output'
  | 'probe-failed'
  | 'probe-recovered'
  | 'inactivity-tick'
  | 'inactivity-threshold'
  | 'shutdown-started'
  | 'shutdown-step'
  | 'shutdown-completed'
  | 'escalated'
  | 'host-sleep'
  | 'app-exit'
  | 'profile-activated';

export interface LifecycleEvent {
  /** ULID, sorts by publish time */
  id: string;
  timestamp: number;
  role: Role | null;
  kind: LifecycleEventKind;
  message: string;
  data?: Record<string, unknown>;
}

export type LifecycleEventInput = Omit<LifecycleEvent, 'id' | 'timestamp'>;

export type LifecycleEventListener = (event: LifecycleEvent) => void | Promise<void>;

export interface SubscribeOptions {
  /** Queue the buffered recent events for this subscriber first */
  replay?: boolean;
}

export interface LifecycleEventBusOptions {
  /** Recent events kept for `getRecentEvents()` */
  bufferSize?: number;
  /** Events a slow subscriber may fall behind before the oldest is dropped */
  queueSize?: number;
  now?: () => number;
}

interface Subscriber {
  listener: LifecycleEventListener;
  queue: LifecycleEvent[];
  draining?: Promise<void>;
  dropped: number;
  active: boolean;
}

/**
 * Fan-out of lifecycle events to subscribers (websocket feeds, the UI log).
 *
 * `publish()` only enqueues. Each subscriber drains its own bounded queue
 * asynchronously, so a slow or failing subscriber never holds up the
 * controller or the other subscribers.
 */
export class LifecycleEventBus {
  private readonly bufferSize: number;
  private readonly queueSize: number;
  private readonly now: () => number;

  private recent: LifecycleEvent[] = [];
  private subscribers = new Set<Subscriber>();
  private droppedTotal = 0;

  constructor(options: LifecycleEventBusOptions = {}) {
    this.bufferSize = options.bufferSize ?? 400;
    this.queueSize = options.queueSize ?? 100;
    this.now = options.now ?? Date.now;
  }

  public get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Events dropped from full subscriber queues since creation
   */
  public get droppedCount(): number {
    return this.droppedTotal;
  }

  public publish(input: LifecycleEventInput): LifecycleEvent {
    const timestamp = this.now();
    const event: LifecycleEvent = { id: generateID(timestamp), timestamp, ...input };

    this.recent.push(event);

    if (this.recent.length > this.bufferSize) {
      this.recent.shift();
    }

    for (const subscriber of this.subscribers) {
      this.enqueue(subscriber, event);
    }

    return event;
  }

  /**
   * @returns a function that unsubscribes; queued events are discarded
   */
  public subscribe(
    listener: LifecycleEventListener,
    options: SubscribeOptions = {},
  ): () => void {
    const subscriber: Subscriber = { listener, queue: [], dropped: 0, active: true };

    this.subscribers.add(subscriber);

    if (options.replay) {
      for (const event of this.recent) {
        this.enqueue(subscriber, event);
      }
    }

    return () => {
      subscriber.active = false;
      subscriber.queue = [];
      this.subscribers.delete(subscriber);
    };
  }

  public getRecentEvents(): LifecycleEvent[] {
    return [...this.recent];
  }

  /**
   * Resolves once every subscriber queue is empty
   */
  public async whenIdle(): Promise<void> {
    for (;;) {
      const pending = [...this.subscribers]
        .map((subscriber) => subscriber.draining)
        .filter((draining): draining is Promise<void> => draining !== undefined);

      if (pending.length === 0) {
        return;
      }

      await Promise.all(pending);
    }
  }

  private enqueue(subscriber: Subscriber, event: LifecycleEvent): void {
    if (subscriber.queue.length >= this.queueSize) {
      subscriber.queue.shift();
      subscriber.dropped++;
      this.droppedTotal++;
    }

    subscriber.queue.push(event);

    if (!subscriber.draining) {
      subscriber.draining = this.drain(subscriber);
    }
  }

  private async drain(subscriber: Subscriber): Promise<void> {
    // Let the publisher finish its synchronous work first
    await Promise.resolve();

    let event = subscriber.queue.shift();

    while (event && subscriber.active) {
      await safeHandleCallbackAndWait('lifecycle event listener', subscriber.listener, event);
      event = subscriber.queue.shift();
    }

    subscriber.draining = undefined;
  }
}
