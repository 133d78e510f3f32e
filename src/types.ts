// Shared domain types for the count-order engine.

/** One item as held in one location, per the inventory source snapshot. */
export type Item = {
  id: string;
  locationId: string;
  putDate: string;
  lastCountDate: string | null;
  storageUnit?: string;
  qualification?: string;
  locationName?: string;
  quantity?: number;
};

export type RankedLocation = {
  locationId: string;
  rank: number;
  referenceDate: Date;
  ageDays: number;
  neverCounted: boolean;
  itemCount: number;
  storageUnit?: string;
};

export const ORDER_STATUSES = ["pending", "dispatched", "resolved", "cancelled", "expired"] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

/** Statuses that keep a location out of the next run's selection. */
export const OPEN_STATUSES: readonly OrderStatus[] = ["pending", "dispatched"];

export type CountOrder = {
  id: string;
  locationId: string;
  name: string;
  status: OrderStatus;
  runId: string;
  rank: number;
  referenceDate: Date;
  createdAt: Date;
  updatedAt: Date;
};

export type RunTrigger = "scheduled" | "manual";

export const RUN_OUTCOMES = ["success", "partial", "failure"] as const;
export type RunOutcome = (typeof RUN_OUTCOMES)[number];

export const RUN_STAGES = [
  "idle",
  "starting",
  "fetching",
  "ranking",
  "generating",
  "persisting",
  "dispatching",
  "succeeded",
  "failed",
] as const;
export type RunStage = (typeof RUN_STAGES)[number];

export type Run = {
  id: string;
  trigger: RunTrigger;
  startedAt: Date;
  finishedAt: Date | null;
  outcome: RunOutcome | null;
  ordersCreated: number;
  failedStage: RunStage | null;
  error: string | null;
};
