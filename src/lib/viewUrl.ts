// URL utilities for shareable viewer state
// Uses query parameters: ?year=2015&state=OH&pollutant=Nitrogen%2C+total+%5Bas+N%5D&ad=only_ad

import { getLatestYear, type ViewerCatalog } from "../data/catalog";
import { ALL_REGIONS, CLASS_FILTER, type ClassFilter, type ViewState } from "../types/facility";
import { normalizePollutantName } from "./filters";

const PARAM_YEAR = "year";
const PARAM_REGION = "state";
const PARAM_POLLUTANT = "pollutant";
const PARAM_CLASS_FILTER = "ad";

const CLASS_FILTER_VALUES: readonly ClassFilter[] = Object.values(CLASS_FILTER);

export const isClassFilter = (value: unknown): value is ClassFilter =>
  typeof value === "string" && CLASS_FILTER_VALUES.some((option) => option === value);

const isKnownRegion = (value: string, catalog: ViewerCatalog): boolean =>
  value === ALL_REGIONS || catalog.regions.includes(value);

// Map a pollutant onto its catalog display name; unknown names are dropped.
const resolvePollutant = (value: string, catalog: ViewerCatalog): string => {
  const wanted = normalizePollutantName(value);
  if (!wanted) return "";
  return catalog.pollutants.find((name) => normalizePollutantName(name) === wanted) ?? "";
};

export interface ViewStateInput {
  pollutant?: string | null;
  region?: string | null;
  year?: string | null;
  classFilter?: string | null;
}

// Validate a proposed state. Blank or unknown region/year means "not selected".
export const sanitizeViewState = (raw: ViewStateInput, catalog: ViewerCatalog): ViewState => {
  const region = raw.region?.trim() ?? "";
  const year = raw.year?.trim() ?? "";
  return {
    pollutant: resolvePollutant(raw.pollutant ?? "", catalog),
    region: region && isKnownRegion(region, catalog) ? region : null,
    year: year && catalog.years.includes(year) ? year : null,
    classFilter: isClassFilter(raw.classFilter) ? raw.classFilter : CLASS_FILTER.ALL,
  };
};

export const getDefaultViewState = (catalog: ViewerCatalog): ViewState => ({
  pollutant: "",
  region: ALL_REGIONS,
  year: getLatestYear(catalog),
  classFilter: CLASS_FILTER.ALL,
});

// Get viewer state from URL; missing or invalid fields take the startup defaults
export function getViewStateFromUrl(catalog: ViewerCatalog): ViewState {
  const defaults = getDefaultViewState(catalog);
  if (typeof window === "undefined") return defaults;

  const params = new URLSearchParams(window.location.search);
  const parsed = sanitizeViewState(
    {
      pollutant: params.get(PARAM_POLLUTANT),
      region: params.get(PARAM_REGION),
      year: params.get(PARAM_YEAR),
      classFilter: params.get(PARAM_CLASS_FILTER),
    },
    catalog,
  );

  return {
    pollutant: parsed.pollutant,
    region: parsed.region ?? defaults.region,
    year: parsed.year ?? defaults.year,
    classFilter: parsed.classFilter,
  };
}

// Update URL with viewer state without triggering navigation
export function updateUrlWithViewState(state: ViewState): void {
  if (typeof window === "undefined") return;

  const url = new URL(window.location.href);

  url.searchParams.set(PARAM_YEAR, state.year ?? "");
  url.searchParams.set(PARAM_REGION, state.region ?? "");
  url.searchParams.set(PARAM_POLLUTANT, state.pollutant);
  url.searchParams.set(PARAM_CLASS_FILTER, state.classFilter);

  // Use replaceState to avoid polluting browser history
  window.history.replaceState(null, "", url.toString());
}
