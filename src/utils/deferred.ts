// Typed deferred utility, kept out of the type barrel (src/types.ts).
// Settles JobManager.waitForJob() when a job's run ends.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
