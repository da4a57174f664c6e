import { CLASS_FILTER, type ClassFilter, type FacilityRecord } from "../types/facility";
import { hasFiniteCoordinates } from "./proximity";

export interface DisplayFilters {
  pollutant: string;
  year: string;
  classFilter: ClassFilter;
}

export interface DisplaySet {
  records: FacilityRecord[];
  count: number;
}

// Pollutant names show up with and without commas between qualifiers
// ("Nitrogen, total [as N]" vs "Nitrogen total [as N]").
export const normalizePollutantName = (name: string): string =>
  name.replace(/,/g, "").replace(/\s+/g, " ").trim();

const US_DATE = /^\d{1,2}\/\d{1,2}\/(\d{4})$/;
const ISO_DATE = /^(\d{4})-\d{2}-\d{2}/;

export const getMeasurementYear = (date: string): string | null => {
  const trimmed = date.trim();
  const us = US_DATE.exec(trimmed);
  if (us) return us[1];
  const iso = ISO_DATE.exec(trimmed);
  if (iso) return iso[1];
  return null;
};

export const isPlottable = (record: FacilityRecord): boolean => hasFiniteCoordinates(record);

export const filterDisplaySet = (
  records: readonly FacilityRecord[],
  { pollutant, year, classFilter }: DisplayFilters,
  nearReference: ReadonlySet<string>,
): DisplaySet => {
  const wantedPollutant = normalizePollutantName(pollutant);

  const byPollutant = wantedPollutant
    ? records.filter((record) => normalizePollutantName(record.pollutant) === wantedPollutant)
    : records;

  const byYear: FacilityRecord[] = [];
  for (const record of byPollutant) {
    const measurements = record.measurements.filter((m) => getMeasurementYear(m.date) === year);
    if (measurements.length === 0) continue;
    byYear.push({ ...record, measurements });
  }

  let result = byYear;
  if (classFilter === CLASS_FILTER.ONLY) {
    result = byYear.filter((record) => nearReference.has(record.id));
  } else if (classFilter === CLASS_FILTER.EXCLUDE) {
    result = byYear.filter((record) => !nearReference.has(record.id));
  }

  return { records: result, count: result.length };
};
