export type Listener<T> = (payload: T) => void;

export type ListenerErrorHandler = (event: string, error: unknown) => void;

type ListenerTable<Events> = { [K in keyof Events]?: Array<Listener<Events[K]>> };

const warnListenerFailure: ListenerErrorHandler = (event, error) => {
  console.warn(`Listener for "${event}" failed`, error);
};

/**
 * Typed observer list. Listeners run synchronously in registration order; a
 * throwing listener is reported and does not stop delivery to the rest.
 */
export class EventBus<Events extends Record<string, unknown>> {
  private listeners: ListenerTable<Events> = {};

  constructor(private readonly onListenerError: ListenerErrorHandler = warnListenerFailure) {}

  on<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): () => void {
    const list: Array<Listener<Events[K]>> = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;
    return () => this.off(event, listener);
  }

  off<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): void {
    const list = this.listeners[event];
    if (!list) return;
    const idx = list.indexOf(listener);
    if (idx !== -1) {
      list.splice(idx, 1);
      if (list.length === 0) {
        delete this.listeners[event];
      }
    }
  }

  emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
    const list = this.listeners[event];
    if (!list) return;
    for (const l of [...list]) {
      try {
        l(payload);
      } catch (error) {
        this.onListenerError(event, error);
      }
    }
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}
