import { TimeoutError } from "./types.js";

/**
 * Settles with `promise`, or rejects with {@link TimeoutError} once `ms`
 * milliseconds pass first. Without `ms` the promise is returned as is.
 *
 * @param label - Names the command in the timeout message
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number | undefined, label: string): Promise<T> {
  if (ms === undefined) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
