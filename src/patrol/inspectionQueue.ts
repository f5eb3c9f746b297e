export class QueueClosedError extends Error {
  constructor() {
    super('Inspection queue closed');
    this.name = 'QueueClosedError';
  }
}

type Waiter<T> = {
  resolve: (task: T) => void;
  reject: (error: Error) => void;
};

export class InspectionQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private unfinished = 0;
  private joiners: Array<() => void> = [];
  private closed = false;

  get pending() {
    return this.items.length;
  }

  get unfinishedTasks() {
    return this.unfinished;
  }

  put(task: T) {
    if (this.closed) {
      throw new QueueClosedError();
    }
    this.unfinished += 1;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(task);
      return;
    }
    this.items.push(task);
  }

  get(): Promise<T> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  taskDone() {
    if (this.unfinished <= 0) {
      throw new Error('taskDone() called more times than tasks were put');
    }
    this.unfinished -= 1;
    if (this.unfinished === 0) {
      const joiners = this.joiners;
      this.joiners = [];
      for (const resolve of joiners) {
        resolve();
      }
    }
  }

  join(): Promise<void> {
    if (this.unfinished === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.joiners.push(resolve);
    });
  }

  close() {
    this.closed = true;
    const waiters = this.waiters.splice(0, this.waiters.length);
    for (const waiter of waiters) {
      waiter.reject(new QueueClosedError());
    }
  }

  isClosed() {
    return this.closed;
  }
}
