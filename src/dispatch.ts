import { AxiosError, AxiosInstance } from "axios";
import pLimit from "p-limit";
import type { Logger } from "pino";
import { withRetry, type RetryOpts } from "./rate";
import type { CountOrder } from "./types";

// Direction type the inventory API uses for count orders.
const COUNT_DIRECTION = 5;

export type DispatchResult = {
  dispatched: string[];
  failed: Array<{ id: string; name: string; error: string }>;
};

/** Next business day from `from`: Friday and Saturday roll to Monday. */
export function countDeadline(from: Date): Date {
  const day = from.getDay();
  const add = day === 5 ? 3 : day === 6 ? 2 : 1;
  const d = new Date(from);
  d.setDate(d.getDate() + add);
  return d;
}

// Names carry the order id, so a clash means this same order was already published (e.g. a retried POST).
function alreadyExists(e: unknown): boolean {
  if (!(e instanceof AxiosError) || e.response?.status !== 422) return false;
  return /already exists/i.test(JSON.stringify(e.response.data ?? ""));
}

/** Publishes persisted count orders to the inventory system, two at a time. */
export class OrderDispatcher {
  constructor(
    private readonly http: AxiosInstance,
    private readonly log: Logger,
    private readonly opts: { priority: number; retry?: RetryOpts; now?: () => Date } = { priority: 3 }
  ) {}

  async dispatch(orders: CountOrder[]): Promise<DispatchResult> {
    const limit = pLimit(2);
    const deadline = countDeadline(this.opts.now ? this.opts.now() : new Date()).toISOString();
    const result: DispatchResult = { dispatched: [], failed: [] };

    await Promise.all(
      orders.map(o => limit(async () => {
        const payload = {
          name: o.name,
          directionType: COUNT_DIRECTION,
          priority: this.opts.priority,
          deadline,
          locations: [{ id: o.locationId }],
        };
        try {
          await withRetry(() => this.http.post("/orders", payload), this.opts.retry ?? { max: 4, baseMs: 1000 });
          result.dispatched.push(o.id);
        } catch (e) {
          if (alreadyExists(e)) {
            this.log.info({ order: o.name }, "order already exists in inventory system");
            result.dispatched.push(o.id);
            return;
          }
          const error = e instanceof Error ? e.message : String(e);
          this.log.warn({ order: o.name, err: e }, "order dispatch failed");
          result.failed.push({ id: o.id, name: o.name, error });
        }
      }))
    );
    return result;
  }
}
