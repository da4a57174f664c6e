export interface Measurement {
  date: string;
  value: number;
}

export interface FacilityRecord {
  /** NPDES permit id; unique within a partition */
  id: string;
  latitude: number | null;
  longitude: number | null;
  pollutant: string;
  unit: string;
  measurements: Measurement[];
}

export interface ReferenceLocation {
  latitude: number;
  longitude: number;
}

export const CLASS_FILTER = {
  ALL: "all",
  ONLY: "only_ad",
  EXCLUDE: "exclude_ad",
} as const;

export type ClassFilter = (typeof CLASS_FILTER)[keyof typeof CLASS_FILTER];

export const ALL_REGIONS = "ALL";

export interface ViewState {
  /** Pollutant display name; empty means no pollutant filter */
  pollutant: string;
  /** Region code, ALL_REGIONS, or null when nothing is selected */
  region: string | null;
  year: string | null;
  classFilter: ClassFilter;
}

export interface FetchProgress {
  completed: number;
  total: number;
}

// Consumed by the view reconciler; the map UI implements it.
export interface DisplaySink {
  renderDisplaySet: (records: FacilityRecord[], nearReference: ReadonlySet<string>) => void;
  clearRendering: () => void;
  reportCount: (count: number) => void;
  reportProgress: (completed: number, total: number) => void;
  reportError: (message: string) => void;
  setLoading: (loading: boolean) => void;
}
