/**
 * Multiplexes several event sources into one consumer.
 *
 * Each source keeps its own FIFO queue; `take` visits the sources round-robin
 * so a busy source cannot starve a quiet one. Producers call `push` from any
 * callback; the single consumer awaits `waitForEvent` when everything is empty.
 */
export class EventMux<TSource extends string, TEvent> {
  private readonly queues = new Map<TSource, TEvent[]>();
  private readonly order: readonly TSource[];
  private cursor = 0;
  private waiter: (() => void) | null = null;

  constructor(sources: readonly TSource[]) {
    this.order = sources;
    for (const source of sources) {
      this.queues.set(source, []);
    }
  }

  /** Total number of queued events */
  get size(): number {
    let total = 0;
    for (const queue of this.queues.values()) total += queue.length;
    return total;
  }

  push(source: TSource, event: TEvent): void {
    const queue = this.queues.get(source);
    if (!queue) {
      throw new Error(`Unknown event source: ${source}`);
    }
    queue.push(event);
    this.wake();
  }

  /**
   * Dequeue the next event, starting from the source after the one served
   * last.
   */
  take(): TEvent | undefined {
    for (let i = 0; i < this.order.length; i++) {
      const index = (this.cursor + i) % this.order.length;
      const source = this.order[index];
      if (source === undefined) continue;
      const queue = this.queues.get(source);
      if (queue && queue.length > 0) {
        this.cursor = (index + 1) % this.order.length;
        return queue.shift();
      }
    }
    return undefined;
  }

  /**
   * Resolve once an event is queued or `wake` is called.
   */
  waitForEvent(): Promise<void> {
    if (this.size > 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Release a pending `waitForEvent` */
  wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  /** Remove and return everything queued for a source */
  drain(source: TSource): TEvent[] {
    const queue = this.queues.get(source);
    if (!queue) return [];
    return queue.splice(0, queue.length);
  }
}
