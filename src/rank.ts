import { InvalidDateData } from "./errors";
import type { Item, RankedLocation } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

// ISO-8601 date or date-time. Anything else ("7", "42", "March 3") is rejected rather than guessed at.
const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

function parseDate(item: Item, field: "putDate" | "lastCountDate", raw: string): Date {
  if (!ISO_DATE.test(raw)) throw new InvalidDateData(item.id, field, raw);
  const d = new Date(raw);
  if (Number.isNaN(d.getTime())) throw new InvalidDateData(item.id, field, raw);
  return d;
}

/** The instant an item was last verified: the later of put and count, or the put date if never counted. */
export function referenceDate(item: Item): Date {
  const put = parseDate(item, "putDate", item.putDate);
  if (item.lastCountDate === null) return put;
  const counted = parseDate(item, "lastCountDate", item.lastCountDate);
  return counted.getTime() > put.getTime() ? counted : put;
}

type Acc = { ref: Date; neverCounted: boolean; itemCount: number; storageUnit?: string };

/**
 * FIFO staleness ranking: oldest reference date first, never-counted before
 * counted on equal dates, then location id. A location is as stale as its
 * least recently verified item. Throws InvalidDateData on any bad date.
 */
export function rankLocations(items: Item[], asOf: Date = new Date()): RankedLocation[] {
  const byLocation = new Map<string, Acc>();
  for (const it of items) {
    const ref = referenceDate(it);
    const curr = byLocation.get(it.locationId);
    if (!curr) {
      byLocation.set(it.locationId, {
        ref,
        neverCounted: it.lastCountDate === null,
        itemCount: 1,
        storageUnit: it.storageUnit,
      });
      continue;
    }
    if (ref.getTime() < curr.ref.getTime()) curr.ref = ref;
    curr.neverCounted = curr.neverCounted || it.lastCountDate === null;
    curr.itemCount += 1;
    curr.storageUnit = curr.storageUnit ?? it.storageUnit;
  }

  const merged = [...byLocation.entries()].map(([locationId, v]) => ({ locationId, ...v }));
  merged.sort((a, b) =>
    a.ref.getTime() - b.ref.getTime() ||
    Number(b.neverCounted) - Number(a.neverCounted) ||
    (a.locationId < b.locationId ? -1 : a.locationId > b.locationId ? 1 : 0)
  );

  return merged.map((m, i) => ({
    locationId: m.locationId,
    rank: i + 1,
    referenceDate: m.ref,
    ageDays: Math.max(0, Math.floor((asOf.getTime() - m.ref.getTime()) / DAY_MS)),
    neverCounted: m.neverCounted,
    itemCount: m.itemCount,
    storageUnit: m.storageUnit,
  }));
}
