export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

/**
 * Resolves `true` once `ms` elapses, or `false` as soon as `signal` aborts.
 */
export const delay: Sleep = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
