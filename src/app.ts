import cors from "cors";
import express, { NextFunction, Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { computeCoverage } from "./coverage";
import { writeCSV } from "./csv";
import { CycleCountError, RunAlreadyInProgress } from "./errors";
import { applyRunFilters } from "./filters";
import type { HistoryStore } from "./history";
import type { RunCoordinator } from "./pipeline";
import type { InventorySource } from "./sourceClient";
import { ORDER_STATUSES, type CountOrder } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type AppDeps = {
  coordinator: RunCoordinator;
  store: HistoryStore;
  source: InventorySource;
  log: Logger;
  excludedStorageUnitPrefixes?: string[];
  exportDir?: string;
  corsOrigins?: string[];
};

const runBodySchema = z.object({
  maxOrders: z.coerce.number().int().min(0).optional(),
  storageUnits: z.array(z.string()).optional(),
  qualifications: z.array(z.string()).optional(),
  locationNames: z.array(z.string()).optional(),
  namePrefix: z.string().max(32).optional(),
});

const orderQuerySchema = z.object({
  status: z.enum(ORDER_STATUSES).optional(),
  locationId: z.string().min(1).optional(),
  runId: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(5000).optional(),
});

const statusBodySchema = z.object({ status: z.enum(["resolved", "cancelled"]) });

function serializeOrder(o: CountOrder) {
  return {
    id: o.id,
    locationId: o.locationId,
    name: o.name,
    status: o.status,
    runId: o.runId,
    rank: o.rank,
    referenceDate: o.referenceDate.toISOString(),
    createdAt: o.createdAt.toISOString(),
    updatedAt: o.updatedAt.toISOString(),
  };
}

function badRequest(res: Response, error: z.ZodError) {
  res.status(400).json({
    status: "error",
    message: "invalid request",
    issues: error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
  });
}

export function createApp(deps: AppDeps) {
  const { coordinator, store, source, log } = deps;
  const app = express();
  app.use(express.json());
  app.use(cors({
    origin: deps.corsOrigins ?? ["http://localhost:5173", "http://127.0.0.1:5173"],
    methods: ["GET", "POST", "PATCH", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  }));
  app.use((req, _res, next) => { log.debug({ method: req.method, url: req.url }, "request"); next(); });

  app.get("/health", (_req, res) => res.json({ ok: true }));

  // Manual trigger. Query: ?export=1 writes the run's orders to data/*.csv
  app.post("/api/cycle-count/run", async (req, res, next) => {
    const body = runBodySchema.safeParse(req.body ?? {});
    if (!body.success) return badRequest(res, body.error);
    try {
      const out = await coordinator.run({ ...body.data, trigger: "manual" });
      const orders = out.orders.map(serializeOrder);
      const payload = {
        status: out.outcome,
        runId: out.runId,
        ordersCreated: out.ordersCreated,
        dispatchFailures: out.dispatchFailures,
        orders,
      };
      if (String(req.query.export || "").trim() === "1") {
        const file = writeCSV(`count-orders-${out.runId}.csv`, orders, deps.exportDir);
        return res.json({ ...payload, exports: { orders: file } });
      }
      res.json(payload);
    } catch (e) {
      next(e);
    }
  });

  app.get("/api/cycle-count/last-run", (_req, res) => {
    const last = coordinator.context.lastRun;
    if (!last) return res.status(404).json({ status: "error", message: "no run since start-up" });
    res.json({
      ...last,
      orders: last.orders.map(serializeOrder),
      running: coordinator.context.running,
      stage: coordinator.context.stage,
    });
  });

  app.get("/api/cycle-count/coverage", async (req, res, next) => {
    const raw = typeof req.query.date === "string" ? req.query.date : "";
    const since = raw ? new Date(raw) : new Date(Date.now() - 60 * DAY_MS);
    if (Number.isNaN(since.getTime())) {
      return res.status(400).json({ status: "error", message: `invalid date "${raw}"` });
    }
    try {
      const items = applyRunFilters(await source.fetchItemsAndLocations(), {
        excludedStorageUnitPrefixes: deps.excludedStorageUnitPrefixes,
      });
      res.json(computeCoverage(items, since));
    } catch (e) {
      next(e);
    }
  });

  app.get("/api/count-orders", async (req, res, next) => {
    const q = orderQuerySchema.safeParse(req.query);
    if (!q.success) return badRequest(res, q.error);
    try {
      const orders = await store.listOrders(q.data);
      res.json(orders.map(serializeOrder));
    } catch (e) {
      next(e);
    }
  });

  app.patch("/api/count-orders/:id", async (req, res, next) => {
    const body = statusBodySchema.safeParse(req.body ?? {});
    if (!body.success) return badRequest(res, body.error);
    try {
      const order = await store.updateOrderStatus(req.params.id, body.data.status);
      res.json(serializeOrder(order));
    } catch (e) {
      next(e);
    }
  });

  app.get("/api/runs", async (req, res, next) => {
    const limit = Number(req.query.limit) > 0 ? Math.min(Number(req.query.limit), 500) : 50;
    try {
      res.json(await store.listRuns(limit));
    } catch (e) {
      next(e);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RunAlreadyInProgress) {
      return res.status(409).json({ status: "already_running", message: err.message });
    }
    if (err instanceof CycleCountError) {
      if (err.statusCode >= 500) log.error({ err, stage: err.stage }, "request failed");
      return res.status(err.statusCode).json({
        status: "error",
        code: err.code,
        stage: err.stage,
        message: err.message,
        runId: err.stage ? coordinator.context.lastRun?.runId ?? null : null,
      });
    }
    log.error({ err }, "unhandled request error");
    res.status(500).json({ status: "error", message: err instanceof Error ? err.message : "internal_error" });
  });

  return app;
}
