export const END_OF_INPUT: unique symbol = Symbol("end-of-input");

export type QueueEntry<T> = T | typeof END_OF_INPUT;

/**
 * FIFO hand-off between the discovery producer and the download workers.
 *
 * `capacity` bounds buffered entries (0 means unbounded). The end-of-input
 * marker is not a task: putting it does not count towards `join`, and a
 * consumer that receives it should put it back so the next consumer sees it.
 */
export class WorkQueue<T> {
  private readonly entries: Array<QueueEntry<T>> = [];
  private readonly getters: Array<(entry: QueueEntry<T>) => void> = [];
  private readonly putters: Array<() => void> = [];
  private readonly joiners: Array<() => void> = [];
  private unfinished = 0;
  private endObserved = false;

  constructor(private readonly capacity = 0) {}

  get size(): number {
    return this.entries.length;
  }

  get pendingTasks(): number {
    return this.unfinished;
  }

  isFull(): boolean {
    return this.capacity > 0 && this.entries.length >= this.capacity;
  }

  async put(entry: QueueEntry<T>): Promise<void> {
    // the marker only circulates once the items ahead of it are gone, so it never waits for room
    while (entry !== END_OF_INPUT && this.isFull()) {
      await new Promise<void>((resolve) => {
        this.putters.push(resolve);
      });
    }

    if (entry !== END_OF_INPUT) {
      this.unfinished += 1;
    }

    const getter = this.getters.shift();
    if (getter) {
      this.deliver(getter, entry);
      return;
    }
    this.entries.push(entry);
  }

  async get(): Promise<QueueEntry<T>> {
    if (this.entries.length > 0) {
      const entry = this.entries.shift();
      this.putters.shift()?.();
      if (entry === undefined) {
        throw new Error("work queue invariant violated: empty entry");
      }
      this.observe(entry);
      return entry;
    }

    return new Promise<QueueEntry<T>>((resolve) => {
      this.getters.push(resolve);
    });
  }

  taskDone(): void {
    if (this.unfinished <= 0) {
      throw new Error("taskDone() called more times than items were put");
    }
    this.unfinished -= 1;
    this.settleJoiners();
  }

  /** Resolves once every item has been marked done and a consumer has seen the end-of-input marker. */
  async join(): Promise<void> {
    if (this.isDrained()) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.joiners.push(resolve);
    });
  }

  private deliver(getter: (entry: QueueEntry<T>) => void, entry: QueueEntry<T>): void {
    this.observe(entry);
    getter(entry);
  }

  private observe(entry: QueueEntry<T>): void {
    if (entry === END_OF_INPUT && !this.endObserved) {
      this.endObserved = true;
      this.settleJoiners();
    }
  }

  private isDrained(): boolean {
    return this.endObserved && this.unfinished === 0;
  }

  private settleJoiners(): void {
    if (!this.isDrained()) {
      return;
    }
    for (const resolve of this.joiners.splice(0)) {
      resolve();
    }
  }
}
