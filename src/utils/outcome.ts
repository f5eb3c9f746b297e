export type Outcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: unknown): Outcome<T> {
  return { ok: false, error: toError(error) };
}

export function toError(input: unknown): Error {
  if (input instanceof Error) {
    return input;
  }
  return new Error(typeof input === 'string' ? input : String(input));
}

export async function attempt<T>(operation: () => Promise<Outcome<T>> | Outcome<T>): Promise<Outcome<T>> {
  try {
    return await operation();
  } catch (error) {
    return failure(error);
  }
}

export async function attemptValue<T>(operation: () => Promise<T> | T): Promise<Outcome<T>> {
  try {
    return success(await operation());
  } catch (error) {
    return failure(error);
  }
}
