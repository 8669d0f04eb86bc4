/**
 * Sleeps for the specified number of milliseconds.
 *
 * When a signal is passed the returned promise resolves early (with `false`)
 * once the signal aborts, so a waiting loop can notice cancellation at its
 * next boundary instead of finishing the full delay.
 *
 * ```typescript
 * await sleep(1000);
 *
 * const completed = await sleep(5000, controller.signal);
 * ```
 */

export async function sleep(time: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }

  return new Promise<boolean>(function (resolve) {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(function () {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, time);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
