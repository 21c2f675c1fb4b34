export type Deadlined<T> = { done: true; value: T } | { done: false };

/**
 * Races `promise` against a timer. The timer is always cleared, so a settled
 * race leaves nothing scheduled. `undefined` means no deadline.
 */
export async function withDeadline<T>(promise: Promise<T>, ms: number | undefined): Promise<Deadlined<T>> {
  if (ms === undefined || !Number.isFinite(ms)) {
    return { done: true, value: await promise };
  }
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<Deadlined<T>>((resolve) => {
    timer = setTimeout(() => resolve({ done: false }), Math.max(0, ms));
  });
  try {
    return await Promise.race([promise.then((value): Deadlined<T> => ({ done: true, value })), expired]);
  } finally {
    clearTimeout(timer);
  }
}
