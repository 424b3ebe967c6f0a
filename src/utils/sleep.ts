/**
 * Waits for the given number of milliseconds.
 *
 * Used between retry attempts; the wait is skipped entirely for non-positive values.
 *
 * @example
 * await sleep(250);
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve) => setTimeout(resolve, ms));
}
