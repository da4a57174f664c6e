import type { FacilityRecord, ReferenceLocation } from "../types/facility";

// ~1.1km / 0.7 miles, applied independently to each axis.
export const PROXIMITY_TOLERANCE = 0.01;

// One cell per 0.01 degrees. The 3x3 probe below only covers the tolerance
// because the cell size matches it; a variable radius needs a real spatial index.
const CELLS_PER_DEGREE = 100;

export interface GridIndex {
  cells: Map<string, ReferenceLocation[]>;
  size: number;
}

type Coordinates = { latitude: number | null; longitude: number | null };

export const hasFiniteCoordinates = <T extends Coordinates>(
  point: T,
): point is T & { latitude: number; longitude: number } =>
  typeof point.latitude === "number" &&
  Number.isFinite(point.latitude) &&
  typeof point.longitude === "number" &&
  Number.isFinite(point.longitude);

const toCell = (degrees: number): number => Math.round(degrees * CELLS_PER_DEGREE);

const cellKey = (latCell: number, lonCell: number): string => `${latCell},${lonCell}`;

export const buildGridIndex = (references: readonly ReferenceLocation[]): GridIndex => {
  const cells = new Map<string, ReferenceLocation[]>();
  let size = 0;
  for (const reference of references) {
    if (!hasFiniteCoordinates(reference)) continue;
    const key = cellKey(toCell(reference.latitude), toCell(reference.longitude));
    const bucket = cells.get(key);
    if (bucket) {
      bucket.push(reference);
    } else {
      cells.set(key, [reference]);
    }
    size += 1;
  }
  return { cells, size };
};

export const isWithinTolerance = (
  a: { latitude: number; longitude: number },
  b: { latitude: number; longitude: number },
): boolean =>
  Math.abs(a.latitude - b.latitude) < PROXIMITY_TOLERANCE &&
  Math.abs(a.longitude - b.longitude) < PROXIMITY_TOLERANCE;

const hasNearbyReference = (
  point: { latitude: number; longitude: number },
  index: GridIndex,
): boolean => {
  const latCell = toCell(point.latitude);
  const lonCell = toCell(point.longitude);
  for (let dLat = -1; dLat <= 1; dLat++) {
    for (let dLon = -1; dLon <= 1; dLon++) {
      const bucket = index.cells.get(cellKey(latCell + dLat, lonCell + dLon));
      if (!bucket) continue;
      if (bucket.some((reference) => isWithinTolerance(point, reference))) return true;
    }
  }
  return false;
};

export const findNearReference = (
  candidates: readonly Pick<FacilityRecord, "id" | "latitude" | "longitude">[],
  index: GridIndex,
): Set<string> => {
  const matched = new Set<string>();
  if (index.size === 0) return matched;
  for (const candidate of candidates) {
    if (matched.has(candidate.id)) continue;
    if (!hasFiniteCoordinates(candidate)) continue;
    if (hasNearbyReference(candidate, index)) matched.add(candidate.id);
  }
  return matched;
};

export const classifyFacilities = (
  records: readonly FacilityRecord[],
  references: readonly ReferenceLocation[],
): Set<string> => findNearReference(records, buildGridIndex(references));
