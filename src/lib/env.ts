type EnvRecord = Record<string, unknown>;

const coerceBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const lowered = value.toLowerCase().trim();
    if (["true", "1", "yes", "y"].includes(lowered)) return true;
    if (["false", "0", "no", "n"].includes(lowered)) return false;
  }
  return undefined;
};

const getImportMetaEnv = (): EnvRecord => {
  try {
    const env: unknown = import.meta.env;
    return env && typeof env === "object" ? Object.fromEntries(Object.entries(env)) : {};
  } catch {
    return {};
  }
};

const getProcessEnv = (): EnvRecord => {
  if (typeof process === "undefined" || typeof process.env !== "object") return {};
  return { ...process.env };
};

export const getEnv = (): EnvRecord => {
  return { ...getProcessEnv(), ...getImportMetaEnv() };
};

export const getEnvString = (key: string): string | undefined => {
  const value = getEnv()[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
};

export const getEnvBoolean = (key: string): boolean | undefined => {
  const value = getEnv()[key];
  return coerceBoolean(value);
};

export const isDevEnv = (): boolean => {
  const rawDev = getEnvBoolean("DEV");
  if (rawDev !== undefined) return rawDev;

  const mode = getEnvString("MODE") ?? getEnvString("NODE_ENV");
  if (mode) return mode !== "production";

  return true;
};

export const DEFAULT_DATA_BASE_URL = "./leaflet_dmr_json";
export const DEFAULT_REFERENCE_CSV_URL = "./AnaerobicDigestionFacilities.csv";
export const DEFAULT_MAP_STYLE_URL = "https://basemaps.cartocdn.com/gl/positron-gl-style/style.json";

export interface ViewerConfig {
  /** Root of the year/region partition tree */
  dataBaseUrl: string;
  referenceCsvUrl: string;
  mapStyleUrl: string;
  /** Log per-partition progress to the console */
  verbose: boolean;
}

export const getViewerConfig = (): ViewerConfig => ({
  dataBaseUrl: (getEnvString("VITE_DATA_BASE_URL") ?? DEFAULT_DATA_BASE_URL).replace(/\/+$/, ""),
  referenceCsvUrl: getEnvString("VITE_REFERENCE_CSV_URL") ?? DEFAULT_REFERENCE_CSV_URL,
  mapStyleUrl: getEnvString("VITE_MAP_STYLE_URL") ?? DEFAULT_MAP_STYLE_URL,
  verbose: getEnvBoolean("VITE_VERBOSE_LOGGING") ?? isDevEnv(),
});
