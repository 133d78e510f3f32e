import type { Knex } from "knex";
import { CycleCountError, InvalidStatusTransition, NotFoundError, StoreUnavailable } from "./errors";
import {
  OPEN_STATUSES,
  ORDER_STATUSES,
  RUN_OUTCOMES,
  RUN_STAGES,
  type CountOrder,
  type OrderStatus,
  type Run,
} from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

type OrderRow = {
  id: string;
  location_id: string;
  name: string;
  status: string;
  run_id: string;
  rank: number;
  reference_date: string;
  created_at: string;
  updated_at: string;
};

type RunRow = {
  id: string;
  trigger: string;
  started_at: string;
  finished_at: string | null;
  outcome: string | null;
  orders_created: number;
  failed_stage: string | null;
  error: string | null;
};

export type HistoryStoreOptions = {
  /** null: open orders never age out */
  cooldownDays?: number | null;
  /** rows per INSERT statement */
  batchSize?: number;
  now?: () => Date;
};

export type OrderQuery = {
  status?: OrderStatus;
  locationId?: string;
  runId?: string;
  limit?: number;
};

function oneOf<T extends string>(values: readonly T[], s: string | null): T | null {
  return values.find(v => v === s) ?? null;
}

function toOrder(r: OrderRow): CountOrder {
  const status = oneOf(ORDER_STATUSES, r.status);
  if (!status) throw new StoreUnavailable(`count_orders row ${r.id} has unknown status "${r.status}"`);
  return {
    id: r.id,
    locationId: r.location_id,
    name: r.name,
    status,
    runId: r.run_id,
    rank: r.rank,
    referenceDate: new Date(r.reference_date),
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

function toRun(r: RunRow): Run {
  return {
    id: r.id,
    trigger: r.trigger === "scheduled" ? "scheduled" : "manual",
    startedAt: new Date(r.started_at),
    finishedAt: r.finished_at ? new Date(r.finished_at) : null,
    outcome: oneOf(RUN_OUTCOMES, r.outcome),
    ordersCreated: r.orders_created,
    failedStage: oneOf(RUN_STAGES, r.failed_stage),
    error: r.error,
  };
}

/**
 * Durable record of generated count orders and of runs, on SQLite through knex.
 * A store handed out by `transaction()` is bound to that transaction; the root
 * instance talks to the pool.
 */
export class HistoryStore {
  private readonly cooldownDays: number | null;
  private readonly batchSize: number;
  private readonly now: () => Date;

  constructor(private readonly db: Knex, private readonly opts: HistoryStoreOptions = {}) {
    this.cooldownDays = opts.cooldownDays ?? null;
    this.batchSize = opts.batchSize ?? 30;
    this.now = opts.now ?? (() => new Date());
  }

  async transaction<T>(fn: (tx: HistoryStore) => Promise<T>): Promise<T> {
    return this.guard("transaction", () =>
      this.db.transaction(trx => fn(new HistoryStore(trx, this.opts)))
    );
  }

  /** Locations that already have an order waiting to be counted. */
  async getOpenLocationIds(): Promise<Set<string>> {
    return this.guard("getOpenLocationIds", async () => {
      const q = this.db("count_orders").distinct("location_id").whereIn("status", [...OPEN_STATUSES]);
      const cutoff = this.cooldownCutoff();
      if (cutoff) q.where("created_at", ">=", cutoff);
      const rows: Array<Pick<OrderRow, "location_id">> = await q;
      return new Set(rows.map(r => r.location_id));
    });
  }

  /** Writes a run's orders all-or-nothing. */
  async persist(orders: CountOrder[], runId: string): Promise<number> {
    return this.guard("persist", () =>
      this.db.transaction(async trx => {
        const cutoff = this.cooldownCutoff();
        if (cutoff) {
          // aged-out orders stop blocking their location; close them so only one stays open
          await trx("count_orders")
            .whereIn("status", [...OPEN_STATUSES])
            .where("created_at", "<", cutoff)
            .update({ status: "expired", updated_at: this.now().toISOString() });
        }
        const rows: OrderRow[] = orders.map(o => ({
          id: o.id,
          location_id: o.locationId,
          name: o.name,
          status: o.status,
          run_id: runId,
          rank: o.rank,
          reference_date: o.referenceDate.toISOString(),
          created_at: o.createdAt.toISOString(),
          updated_at: o.updatedAt.toISOString(),
        }));
        for (let i = 0; i < rows.length; i += this.batchSize) {
          await trx("count_orders").insert(rows.slice(i, i + this.batchSize));
        }
        return rows.length;
      })
    );
  }

  async recordRun(run: Run): Promise<void> {
    const row: RunRow = {
      id: run.id,
      trigger: run.trigger,
      started_at: run.startedAt.toISOString(),
      finished_at: run.finishedAt ? run.finishedAt.toISOString() : null,
      outcome: run.outcome,
      orders_created: run.ordersCreated,
      failed_stage: run.failedStage,
      error: run.error,
    };
    await this.guard("recordRun", async () => {
      await this.db("runs").insert(row).onConflict("id").merge();
    });
  }

  async listRuns(limit = 50): Promise<Run[]> {
    return this.guard("listRuns", async () => {
      const rows: RunRow[] = await this.db("runs").select("*").orderBy("started_at", "desc").limit(limit);
      return rows.map(toRun);
    });
  }

  async listOrders({ status, locationId, runId, limit = 500 }: OrderQuery = {}): Promise<CountOrder[]> {
    return this.guard("listOrders", async () => {
      const q = this.db("count_orders").select("*");
      if (status) q.where("status", status);
      if (locationId) q.where("location_id", locationId);
      if (runId) q.where("run_id", runId);
      const rows: OrderRow[] = await q
        .orderBy([{ column: "created_at", order: "desc" }, { column: "rank", order: "asc" }])
        .limit(limit);
      return rows.map(toOrder);
    });
  }

  async getOrder(id: string): Promise<CountOrder | null> {
    return this.guard("getOrder", async () => {
      const row: OrderRow | undefined = await this.db("count_orders").where("id", id).first();
      return row ? toOrder(row) : null;
    });
  }

  /** Out-of-band status change; only open orders can move. */
  async updateOrderStatus(id: string, status: OrderStatus): Promise<CountOrder> {
    return this.transaction(async tx => {
      const current = await tx.getOrder(id);
      if (!current) throw new NotFoundError(`Count order ${id} not found`);
      if (!OPEN_STATUSES.includes(current.status) || current.status === status) {
        throw new InvalidStatusTransition(id, current.status, status);
      }
      const updatedAt = tx.now();
      await tx.db("count_orders").where("id", id).update({ status, updated_at: updatedAt.toISOString() });
      return { ...current, status, updatedAt };
    });
  }

  async markDispatched(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    return this.guard("markDispatched", async () => {
      const n: number = await this.db("count_orders")
        .whereIn("id", ids)
        .where("status", "pending")
        .update({ status: "dispatched", updated_at: this.now().toISOString() });
      return n;
    });
  }

  private cooldownCutoff(): string | null {
    if (this.cooldownDays === null) return null;
    return new Date(this.now().getTime() - this.cooldownDays * DAY_MS).toISOString();
  }

  private async guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof CycleCountError) throw e;
      throw new StoreUnavailable(`history store ${op} failed: ${e instanceof Error ? e.message : String(e)}`, e);
    }
  }
}
