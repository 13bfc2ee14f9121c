import { StoreTimeoutError } from "@workflow-dispatch/shared";

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

export function withStoreTimeout<T>(promise: Promise<T>, timeoutMs: number, action: string): Promise<T> {
  return withTimeout(promise, timeoutMs, () => new StoreTimeoutError(`Timed out ${action}.`));
}
