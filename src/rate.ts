// Retry with backoff for writes to the inventory API: honours Retry-After on 429, backs off on 5xx.
import { AxiosError } from "axios";

export function sleep(ms: number) { return new Promise<void>(r => setTimeout(r, ms)); }

export type RetryOpts = { max: number; baseMs?: number; wait?: (ms: number) => Promise<void>; };

// Upper bound on any single wait; dispatch runs while the run lock is held.
export const MAX_WAIT_MS = 60_000;

export async function withRetry<T>(fn: () => Promise<T>, { max, baseMs = 500, wait = sleep }: RetryOpts): Promise<T> {
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      attempt++;
      const resp = err instanceof AxiosError ? err.response : undefined;
      if (!resp || attempt > max) throw err;
      if (resp.status === 429) {
        const retryAfter = Number(resp.headers["retry-after"]);
        await wait(Math.min(retryAfter > 0 ? retryAfter * 1000 : baseMs * Math.pow(2, attempt), MAX_WAIT_MS));
      } else if (resp.status >= 500 && resp.status < 600) {
        await wait(Math.min(baseMs * Math.pow(2, attempt), MAX_WAIT_MS));
      } else {
        throw err;
      }
    }
  }
}
