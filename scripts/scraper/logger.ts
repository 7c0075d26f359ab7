export const now = () => new Date().toISOString();
export const log = (...args: unknown[]) => console.log(`[${now()}]`, ...args);
export const warn = (...args: unknown[]) => console.log(`[${now()}] ⚠️`, ...args);
export const error = (...args: unknown[]) => console.error(`[${now()}] ❌`, ...args);

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
