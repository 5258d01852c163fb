export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Settles like `work`, or rejects with the signal's `TimeoutError` once
 * `timeoutMs` passes. For calls that take no `AbortSignal` of their own.
 */
export function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  const signal = AbortSignal.timeout(timeoutMs);
  const deadline = new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
  return Promise.race([work, deadline]);
}
