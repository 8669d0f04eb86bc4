/**
 * A small typed event emitter.
 *
 * Extend `EventEmitterProtected` when only the owning class should emit, or
 * use `EventEmitter` when any holder of the emitter may emit. Listener errors
 * are isolated through `safeHandleCallback`, so one failing subscriber never
 * prevents the others from running.
 */

import { safeHandleCallback } from './safe-handle-callback';

export type EventCallback<T> = (data: T) => void | Promise<void>;

type EventMapBase = object;

export class EventEmitterProtected<TEvents extends EventMapBase = EventMapBase> {
  private events: Map<keyof TEvents, Set<EventCallback<never>>> = new Map();

  /**
   * Subscribe to an event
   * @returns A function to unsubscribe
   */
  public on<K extends keyof TEvents>(
    event: K,
    callback: EventCallback<TEvents[K]>,
  ): () => void {
    let callbacks = this.events.get(event);

    if (!callbacks) {
      callbacks = new Set();
      this.events.set(event, callbacks);
    }

    callbacks.add(callback);

    return () => {
      const current = this.events.get(event);

      if (current) {
        current.delete(callback);

        if (current.size === 0) {
          this.events.delete(event);
        }
      }
    };
  }

  /**
   * Subscribe to an event once - unsubscribes after the first emission
   */
  public once<K extends keyof TEvents>(
    event: K,
    callback: EventCallback<TEvents[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data: TEvents[K]) => {
      unsubscribe();
      return callback(data);
    });

    return unsubscribe;
  }

  public hasListeners(event: keyof TEvents): boolean {
    const callbacks = this.events.get(event);
    return callbacks !== undefined && callbacks.size > 0;
  }

  public listenerCount(event: keyof TEvents): number {
    return this.events.get(event)?.size ?? 0;
  }

  /**
   * Remove all listeners, or only the listeners of one event
   */
  public clear(event?: keyof TEvents): void {
    if (event !== undefined) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  protected emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const callbacks = this.events.get(event);

    if (!callbacks) {
      return;
    }

    // Copy so listeners that unsubscribe during emit don't skip siblings
    for (const callback of [...callbacks]) {
      safeHandleCallback(`event handler for ${String(event)}`, callback, data);
    }
  }
}

/**
 * Event emitter whose `emit` is public.
 */
export class EventEmitter<
  TEvents extends EventMapBase = EventMapBase,
> extends EventEmitterProtected<TEvents> {
  public emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    super.emit(event, data);
  }
}
