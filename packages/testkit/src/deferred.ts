/**
 * packages/testkit/src/deferred.ts — Manually settled promises for async tests.
 *
 * Why: Remote data sources are promise-based. Tests hand out deferreds so they
 * decide exactly when (and in which order) each fetch settles.
 */

export type Deferred<T> = Readonly<{
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
  readonly settled: boolean;
}>;

export function createDeferred<T>(): Deferred<T> {
  let settled = false;
  let resolveFn: (value: T) => void = () => {};
  let rejectFn: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((resolve, reject) => {
    resolveFn = resolve;
    rejectFn = reject;
  });
  return Object.freeze({
    promise,
    resolve: (value: T) => {
      settled = true;
      resolveFn(value);
    },
    reject: (reason: unknown) => {
      settled = true;
      rejectFn(reason);
    },
    get settled() {
      return settled;
    },
  });
}

/** Let queued microtasks (and the promise chains they start) run. */
export async function flushMicrotasks(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
