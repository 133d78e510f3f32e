import { randomUUID } from "crypto";
import type { CountOrder, RankedLocation } from "./types";

export type GenerateOptions = {
  runId: string;
  now?: Date;
  /** Inserted before "Count" in the batch name, e.g. "Recheck" -> 241002.G1RecheckCount.4.<id> */
  namePrefix?: string;
  newId?: () => string;
};

function yymmdd(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(d.getFullYear() % 100)}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
}

/**
 * Order name published to the inventory system. Ranks repeat between runs on
 * the same day, so the order id's first segment keeps names unique per order.
 */
export function batchName(loc: RankedLocation, orderId: string, now: Date, namePrefix = ""): string {
  return `${yymmdd(now)}.${loc.storageUnit ?? ""}${namePrefix}Count.${loc.rank}.${orderId.slice(0, 8)}`;
}

/**
 * Picks the highest-priority locations without an open order, up to maxOrders,
 * and turns them into pending count orders. Everything past the cap waits for
 * the next run.
 */
export function generateCountOrders(
  ranked: RankedLocation[],
  maxOrders: number,
  openLocationIds: ReadonlySet<string>,
  { runId, now = new Date(), namePrefix = "", newId = randomUUID }: GenerateOptions
): CountOrder[] {
  if (maxOrders <= 0) return [];

  const out: CountOrder[] = [];
  for (const loc of ranked) {
    if (out.length >= maxOrders) break;
    if (openLocationIds.has(loc.locationId)) continue;
    const id = newId();
    out.push({
      id,
      locationId: loc.locationId,
      name: batchName(loc, id, now, namePrefix),
      status: "pending",
      runId,
      rank: loc.rank,
      referenceDate: loc.referenceDate,
      createdAt: now,
      updatedAt: now,
    });
  }
  return out;
}
