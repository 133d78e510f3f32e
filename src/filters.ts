import type { Item } from "./types";

export type RunScope = {
  excludedStorageUnitPrefixes?: string[];
  storageUnits?: string[];
  qualifications?: string[];
  locationNames?: string[];
};

function keeps(list: string[] | undefined, value: string | undefined): boolean {
  if (!list || list.length === 0) return true;
  return value !== undefined && list.includes(value);
}

/** Narrows a source snapshot to the part of the warehouse a run should consider. */
export function applyRunFilters(items: Item[], scope: RunScope): Item[] {
  const prefixes = scope.excludedStorageUnitPrefixes ?? [];
  return items.filter(it => {
    const unit = it.storageUnit;
    if (unit !== undefined && prefixes.some(p => unit.startsWith(p))) return false;
    return (
      keeps(scope.storageUnits, unit) &&
      keeps(scope.qualifications, it.qualification) &&
      keeps(scope.locationNames, it.locationName)
    );
  });
}
