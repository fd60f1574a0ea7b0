/**
 * Reference Snapshot
 *
 * Immutable lookup maps of the active vehicles, drivers, stations and cost
 * centers, keyed the way CSV cells are matched: trimmed and upper-cased.
 *
 * @module shared/fuel-import/reference-snapshot
 */

import type { NamedRef, ReferenceSnapshot, VehicleRef } from '../types/fuel-import.types';

export interface ReferenceSnapshotInput {
  vehicles?: readonly VehicleRef[];
  drivers?: readonly NamedRef[];
  stations?: readonly NamedRef[];
  costCenters?: readonly NamedRef[];
}

/**
 * Normalize a plate or name for lookup
 */
export function referenceKey(value: string): string {
  return value.trim().toUpperCase();
}

function indexBy<T>(items: readonly T[], key: (item: T) => string): ReadonlyMap<string, T> {
  const map = new Map<string, T>();
  for (const item of items) {
    const k = referenceKey(key(item));
    // First entry wins when two records normalize to the same key
    if (!map.has(k)) {
      map.set(k, Object.freeze({ ...item }));
    }
  }
  return map;
}

export function createReferenceSnapshot(input: ReferenceSnapshotInput = {}): ReferenceSnapshot {
  return Object.freeze({
    vehicles: indexBy(input.vehicles ?? [], (v) => v.plate),
    drivers: indexBy(input.drivers ?? [], (d) => d.name),
    stations: indexBy(input.stations ?? [], (s) => s.name),
    costCenters: indexBy(input.costCenters ?? [], (c) => c.name),
  });
}
