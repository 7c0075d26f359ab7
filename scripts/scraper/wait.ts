import { RenderTimeoutError } from './errors';
import { sleep } from './utils';

export type WaitOptions = {
  timeoutMs: number;
  intervalMs: number;
  /** Used in the timeout message, e.g. `listing cards`. */
  description: string;
};

/**
 * Calls `check` every `intervalMs` until it yields a value and returns that
 * value. Rejects with a RenderTimeoutError once `timeoutMs` has elapsed.
 */
export async function poll<T>(
  check: () => Promise<T | null>,
  { timeoutMs, intervalMs, description }: WaitOptions
): Promise<T> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const value = await check();
    if (value !== null) return value;
    if (Date.now() >= deadline) throw new RenderTimeoutError(description, timeoutMs);
    await sleep(Math.min(intervalMs, Math.max(0, deadline - Date.now())));
  }
}

export async function waitFor(predicate: () => Promise<boolean>, opts: WaitOptions): Promise<void> {
  await poll(async () => ((await predicate()) ? true : null), opts);
}
