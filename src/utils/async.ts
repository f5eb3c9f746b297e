export type WakeSignal = {
  onCancel(listener: () => void): () => void;
  readonly isCancelled: boolean;
};

export function delay(ms: number, signal?: WakeSignal): Promise<void> {
  if (ms <= 0 || signal?.isCancelled) {
    return Promise.resolve();
  }

  return new Promise(resolve => {
    let unsubscribe: (() => void) | null = null;
    const timer = setTimeout(() => {
      unsubscribe?.();
      resolve();
    }, ms);
    if (signal) {
      unsubscribe = signal.onCancel(() => {
        clearTimeout(timer);
        resolve();
      });
    }
  });
}

// A rejection counts as settled.
export async function waitWithTimeout(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | null = null;
  let settled = false;

  await Promise.race([
    promise.then(
      () => {
        settled = true;
      },
      () => {
        settled = true;
      }
    ),
    new Promise<void>(resolve => {
      timer = setTimeout(resolve, Math.max(0, timeoutMs));
      timer.unref?.();
    })
  ]);

  if (timer) {
    clearTimeout(timer);
  }

  return settled;
}

export function createDeferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
