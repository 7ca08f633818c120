import { debugViews } from '@/utils/debugLogger';

type EventCallback<T = unknown> = (data: T) => void;

export interface EventHandlerError {
  event: string;
  handlerId: number;
  message: string;
}

type ErrorListener = (errors: EventHandlerError[]) => void;

/**
 * EventBus - Typed pub/sub event system
 *
 * `TEvents` maps event names to payload types. Subscriptions are keyed by
 * id so unsubscribe is O(1).
 */
export class EventBus<TEvents extends object = Record<string, unknown>> {
  // Map of event name -> Map of subscription ID -> callback
  private events: Map<string, Map<number, EventCallback>> = new Map();
  private errorListeners: Set<ErrorListener> = new Set();
  private nextId = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  public on<K extends keyof TEvents & string>(event: K, callback: EventCallback<TEvents[K]>): () => void {
    const id = this.nextId++;

    let subscriptions = this.events.get(event);
    if (!subscriptions) {
      subscriptions = new Map();
      this.events.set(event, subscriptions);
    }

    subscriptions.set(id, callback as EventCallback);

    return () => this.off(event, id);
  }

  /**
   * Subscribe to an event, automatically unsubscribe after first emit
   */
  public once<K extends keyof TEvents & string>(event: K, callback: EventCallback<TEvents[K]>): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      callback(data);
    });

    return unsubscribe;
  }

  public off(event: keyof TEvents & string, id: number): void {
    const subscriptions = this.events.get(event);
    if (!subscriptions) return;

    subscriptions.delete(id);

    if (subscriptions.size === 0) {
      this.events.delete(event);
    }
  }

  /**
   * Emit an event to all subscribers.
   * A throwing handler does not stop the others; failures are collected and
   * handed to error listeners after the pass.
   */
  public emit<K extends keyof TEvents & string>(event: K, data: TEvents[K]): void {
    const subscriptions = this.events.get(event);
    if (!subscriptions || subscriptions.size === 0) return;

    // Snapshot ids so handlers can unsubscribe each other mid-emit
    const handlerIds = Array.from(subscriptions.keys());
    const errors: EventHandlerError[] = [];

    for (const id of handlerIds) {
      const callback = subscriptions.get(id);
      if (!callback) continue;

      try {
        callback(data);
      } catch (error) {
        errors.push({
          event,
          handlerId: id,
          message: error instanceof Error ? error.message : String(error),
        });
        debugViews.error(`[EventBus] Error in handler for ${event}:`, error);
      }
    }

    if (errors.length > 0) {
      for (const listener of Array.from(this.errorListeners)) {
        try {
          listener(errors);
        } catch (error) {
          debugViews.error('[EventBus] Error listener failed:', error);
        }
      }
    }
  }

  /**
   * Observe handler failures.
   * @returns Unsubscribe function
   */
  public onHandlerErrors(listener: ErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  /**
   * Clear all subscriptions for an event, or all events
   */
  public clear(event?: keyof TEvents & string): void {
    if (event) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  public hasListeners(event: keyof TEvents & string): boolean {
    const subscriptions = this.events.get(event);
    return subscriptions !== undefined && subscriptions.size > 0;
  }

  public listenerCount(event: keyof TEvents & string): number {
    return this.events.get(event)?.size ?? 0;
  }
}
