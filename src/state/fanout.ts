import type { Logger } from "../logger.js";

export type Listener<T> = (event: T) => void;

/**
 * Synchronous publish/subscribe. An event published from inside a listener is
 * queued until every listener has seen the event currently being delivered.
 */
export class ObserverFanout<T> {
  private readonly listeners = new Set<Listener<T>>();
  private readonly queue: T[] = [];
  private delivering = false;

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.listeners.size;
  }

  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: T): void {
    this.queue.push(event);
    if (this.delivering) {
      return;
    }

    this.delivering = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        this.deliver(next);
        next = this.queue.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  private deliver(event: T): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error }, "Timer observer threw while handling an event");
      }
    }
  }
}
