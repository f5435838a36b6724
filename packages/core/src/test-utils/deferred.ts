export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

/** A promise settled from the outside, for holding async work at a known point in tests. */
export function deferred<T = void>(): Deferred<T> {
  let settle: { resolve: (value: T) => void; reject: (err: unknown) => void } | undefined;
  const promise = new Promise<T>((resolve, reject) => {
    settle = { resolve, reject };
  });
  return {
    promise,
    resolve: (value) => settle?.resolve(value),
    reject: (err) => settle?.reject(err),
  };
}
