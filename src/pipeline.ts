import { randomUUID } from "crypto";
import type { Logger } from "pino";
import type { OrderDispatcher } from "./dispatch";
import { CycleCountError, RunAlreadyInProgress, errorMessage } from "./errors";
import { applyRunFilters, type RunScope } from "./filters";
import type { HistoryStore } from "./history";
import { generateCountOrders } from "./orders";
import { rankLocations } from "./rank";
import type { InventorySource } from "./sourceClient";
import type { CountOrder, Run, RunOutcome, RunStage, RunTrigger } from "./types";

export type RunSummary = {
  runId: string;
  trigger: RunTrigger;
  outcome: RunOutcome;
  startedAt: Date;
  finishedAt: Date;
  ordersCreated: number;
  orders: CountOrder[];
  locationsRanked: number;
  dispatchFailures: number;
  failedStage: RunStage | null;
  error: string | null;
};

/**
 * Process-wide state shared by every trigger. Starts unlocked with no prior
 * run; nothing survives a restart, so a crash mid-run cannot leave it locked.
 */
export class RunContext {
  running = false;
  currentRunId: string | null = null;
  stage: RunStage = "idle";
  lastRun: RunSummary | null = null;
}

export type RunRequest = Omit<RunScope, "excludedStorageUnitPrefixes"> & {
  trigger?: RunTrigger;
  maxOrders?: number;
  namePrefix?: string;
};

export type CoordinatorDeps = {
  source: InventorySource;
  store: HistoryStore;
  log: Logger;
  maxOrdersPerRun: number;
  excludedStorageUnitPrefixes?: string[];
  dispatcher?: OrderDispatcher | null;
  context?: RunContext;
  now?: () => Date;
};

export class RunCoordinator {
  readonly context: RunContext;
  private readonly now: () => Date;

  constructor(private readonly deps: CoordinatorDeps) {
    this.context = deps.context ?? new RunContext();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * One fetch -> rank -> generate -> persist cycle. Throws RunAlreadyInProgress
   * without touching anything if another run holds the lock; any other failure
   * is recorded as a failed run and rethrown with its stage set.
   */
  async run(req: RunRequest = {}): Promise<RunSummary> {
    const ctx = this.context;
    if (ctx.running) {
      this.deps.log.info({ runId: ctx.currentRunId, trigger: req.trigger ?? "manual" }, "run already in progress, trigger skipped");
      throw new RunAlreadyInProgress(ctx.currentRunId);
    }

    const runId = randomUUID();
    ctx.running = true;
    ctx.currentRunId = runId;
    const trigger = req.trigger ?? "manual";
    const startedAt = this.now();
    const log = this.deps.log.child({ runId, trigger });
    const run: Run = {
      id: runId,
      trigger,
      startedAt,
      finishedAt: null,
      outcome: null,
      ordersCreated: 0,
      failedStage: null,
      error: null,
    };
    let orders: CountOrder[] = [];

    try {
      this.enter("starting");
      await this.deps.store.recordRun(run);

      this.enter("fetching");
      const items = await this.deps.source.fetchItemsAndLocations();
      const scoped = applyRunFilters(items, {
        excludedStorageUnitPrefixes: this.deps.excludedStorageUnitPrefixes,
        storageUnits: req.storageUnits,
        qualifications: req.qualifications,
        locationNames: req.locationNames,
      });
      log.info({ fetched: items.length, inScope: scoped.length }, "inventory snapshot fetched");

      this.enter("ranking");
      const ranked = rankLocations(scoped, startedAt);

      orders = await this.deps.store.transaction(async tx => {
        this.enter("generating");
        const open = await tx.getOpenLocationIds();
        const drafts = generateCountOrders(ranked, req.maxOrders ?? this.deps.maxOrdersPerRun, open, {
          runId,
          now: this.now(),
          namePrefix: req.namePrefix,
        });
        log.info({ ranked: ranked.length, open: open.size, selected: drafts.length }, "count orders generated");

        this.enter("persisting");
        await tx.persist(drafts, runId);
        return drafts;
      });

      let dispatchFailures = 0;
      if (this.deps.dispatcher && orders.length > 0) {
        this.enter("dispatching");
        const res = await this.deps.dispatcher.dispatch(orders);
        await this.deps.store.markDispatched(res.dispatched);
        const sent = new Set(res.dispatched);
        for (const o of orders) if (sent.has(o.id)) o.status = "dispatched";
        dispatchFailures = res.failed.length;
      }

      const outcome: RunOutcome = dispatchFailures > 0 ? "partial" : "success";
      const finishedAt = this.now();
      await this.deps.store.recordRun({ ...run, finishedAt, outcome, ordersCreated: orders.length });
      this.enter("succeeded");

      const summary: RunSummary = {
        runId,
        trigger,
        outcome,
        startedAt,
        finishedAt,
        ordersCreated: orders.length,
        orders,
        locationsRanked: ranked.length,
        dispatchFailures,
        failedStage: null,
        error: null,
      };
      ctx.lastRun = summary;
      log.info({ ordersCreated: orders.length, outcome }, "cycle count run finished");
      return summary;
    } catch (e) {
      const failedStage = ctx.stage;
      this.enter("failed");
      const err = e instanceof CycleCountError ? e : new CycleCountError("Internal", errorMessage(e));
      err.stage = failedStage;
      const finishedAt = this.now();
      ctx.lastRun = {
        runId,
        trigger,
        outcome: "failure",
        startedAt,
        finishedAt,
        ordersCreated: orders.length,
        orders,
        locationsRanked: 0,
        dispatchFailures: 0,
        failedStage,
        error: err.message,
      };
      try {
        await this.deps.store.recordRun({
          ...run,
          finishedAt,
          outcome: "failure",
          ordersCreated: orders.length,
          failedStage,
          error: err.message,
        });
      } catch (recordErr) {
        log.error({ err: recordErr }, "could not record failed run");
      }
      log.error({ err, stage: failedStage, code: err.code }, "cycle count run failed");
      throw err;
    } finally {
      ctx.running = false;
      ctx.currentRunId = null;
      ctx.stage = "idle";
    }
  }

  private enter(stage: RunStage) {
    this.context.stage = stage;
  }
}
