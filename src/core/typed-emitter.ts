import { EventEmitter } from "node:events";

type EventName<TEvents> = keyof TEvents & string;
type Listener<TEvents, K extends EventName<TEvents>> = (payload: TEvents[K]) => void;

/**
 * Type-safe event emitter built on node:events. Each event carries exactly one
 * payload object.
 *
 * ```ts
 * interface BackendEvents {
 *   heartbeat: { tick: number };
 * }
 * class Backend extends TypedEventEmitter<BackendEvents> {}
 * ```
 *
 * Listeners are invoked one at a time. A listener that throws is handed to
 * {@link onListenerError}; the default rethrows, which skips the remaining
 * listeners the way node:events does. Emitters that fire from timers override
 * it so one faulty listener cannot hide an event from the others.
 *
 * Event names must not be "error": failures here are reported through named
 * events instead.
 */
export class TypedEventEmitter<TEvents extends object> {
  private readonly emitter = new EventEmitter();

  on<K extends EventName<TEvents>>(event: K, listener: Listener<TEvents, K>): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends EventName<TEvents>>(event: K, listener: Listener<TEvents, K>): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends EventName<TEvents>>(event: K, listener: Listener<TEvents, K>): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends EventName<TEvents>>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  listenerCount<K extends EventName<TEvents>>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  /** Returns whether the event had listeners. */
  protected emit<K extends EventName<TEvents>>(event: K, payload: TEvents[K]): boolean {
    // rawListeners keeps the once() wrappers, so calling them also detaches them.
    const listeners = this.emitter.rawListeners(event);
    for (const listener of listeners) {
      try {
        Reflect.apply(listener, this, [payload]);
      } catch (err) {
        this.onListenerError(event, err);
      }
    }
    return listeners.length > 0;
  }

  protected onListenerError(_event: EventName<TEvents>, error: unknown): void {
    throw error;
  }
}
