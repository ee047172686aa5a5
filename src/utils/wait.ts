export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
}

/**
 * Call `probe` until it yields a defined value or the time bound elapses.
 * The probe always runs at least once, so a zero timeout is a single check.
 */
export async function pollUntil<T>(
  probe: () => Promise<T | undefined>,
  options: PollOptions
): Promise<T | undefined> {
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    const value = await probe();
    if (value !== undefined) return value;
    if (Date.now() >= deadline) return undefined;
    await sleep(Math.min(options.intervalMs, Math.max(0, deadline - Date.now())));
  }
}
