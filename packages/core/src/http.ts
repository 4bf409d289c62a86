export const HTTP_TIMEOUT_MS = 15_000;

/** Signal for one outgoing request: times out, and aborts early with `shutdown`. */
export function requestSignal(shutdown?: AbortSignal, timeoutMs: number = HTTP_TIMEOUT_MS): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return shutdown ? AbortSignal.any([shutdown, timeout]) : timeout;
}
