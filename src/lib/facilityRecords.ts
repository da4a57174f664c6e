import type { FacilityRecord, Measurement } from "../types/facility";

// Wire shape written by the partition pipeline:
// { npdes, pollutant, unit, lat, lon, measurements: [{ date, value }] }

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toFiniteNumber = (value: unknown): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const toMeasurement = (raw: unknown): Measurement | null => {
  if (!isRecord(raw)) return null;
  const date = typeof raw.date === "string" ? raw.date.trim() : "";
  const value = toFiniteNumber(raw.value);
  if (!date || value === null) return null;
  return { date, value };
};

export const toFacilityRecord = (raw: unknown): FacilityRecord | null => {
  if (!isRecord(raw)) return null;
  const id = typeof raw.npdes === "string" ? raw.npdes.trim() : "";
  if (!id) return null;
  if (!Array.isArray(raw.measurements)) return null;

  const measurements = raw.measurements
    .map(toMeasurement)
    .filter((m): m is Measurement => m !== null);

  return {
    id,
    latitude: toFiniteNumber(raw.lat),
    longitude: toFiniteNumber(raw.lon),
    pollutant: typeof raw.pollutant === "string" ? raw.pollutant : "",
    unit: typeof raw.unit === "string" ? raw.unit : "",
    measurements,
  };
};

export interface ParsedFacilityRecords {
  records: FacilityRecord[];
  skipped: number;
}

export const parseFacilityRecords = (payload: readonly unknown[]): ParsedFacilityRecords => {
  const records: FacilityRecord[] = [];
  let skipped = 0;
  for (const raw of payload) {
    const record = toFacilityRecord(raw);
    if (record) {
      records.push(record);
    } else {
      skipped += 1;
    }
  }
  return { records, skipped };
};
