import { referenceDate } from "./rank";
import type { Item } from "./types";

export type CoverageRow = {
  storageUnit: string;
  totalLocations: number;
  verifiedLocations: number;
  coveragePct: number;
};

export type CoverageReport = {
  since: string;
  rows: CoverageRow[];
  totalLocations: number;
  verifiedLocations: number;
  coveragePct: number;
};

const pct = (part: number, whole: number) => (whole ? Math.round((part / whole) * 1000) / 10 : 0);

/**
 * Share of locations, per storage unit, that were counted or freshly put
 * since `since`. A location counts as verified only if every item in it is.
 */
export function computeCoverage(items: Item[], since: Date): CoverageReport {
  const locations = new Map<string, { unit: string; verified: boolean }>();
  for (const it of items) {
    const ok = referenceDate(it).getTime() >= since.getTime();
    const curr = locations.get(it.locationId);
    if (curr) curr.verified = curr.verified && ok;
    else locations.set(it.locationId, { unit: it.storageUnit ?? "Unknown", verified: ok });
  }

  const units = new Map<string, { total: number; verified: number }>();
  for (const loc of locations.values()) {
    const u = units.get(loc.unit) ?? { total: 0, verified: 0 };
    u.total += 1;
    if (loc.verified) u.verified += 1;
    units.set(loc.unit, u);
  }

  const rows = [...units.entries()]
    .map(([storageUnit, u]) => ({
      storageUnit,
      totalLocations: u.total,
      verifiedLocations: u.verified,
      coveragePct: pct(u.verified, u.total),
    }))
    .sort((a, b) => (a.storageUnit < b.storageUnit ? -1 : a.storageUnit > b.storageUnit ? 1 : 0));

  const totalLocations = rows.reduce((s, r) => s + r.totalLocations, 0);
  const verifiedLocations = rows.reduce((s, r) => s + r.verifiedLocations, 0);
  return {
    since: since.toISOString(),
    rows,
    totalLocations,
    verifiedLocations,
    coveragePct: pct(verifiedLocations, totalLocations),
  };
}
