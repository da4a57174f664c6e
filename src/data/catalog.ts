import pollutants from "./pollutants.json";
import regions from "./regions.json";
import years from "./years.json";

export interface ViewerCatalog {
  regions: readonly string[];
  years: readonly string[];
  pollutants: readonly string[];
}

export const DEFAULT_CATALOG: ViewerCatalog = {
  regions,
  years,
  pollutants,
};

export const getLatestYear = (catalog: ViewerCatalog): string | null =>
  catalog.years.length > 0 ? catalog.years[catalog.years.length - 1] : null;
