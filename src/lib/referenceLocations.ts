import { csvParseRows } from "d3-dsv";

import type { ReferenceLocation } from "../types/facility";
import { ReferenceSourceError, isAbortError } from "./errors";
import type { FetchLike } from "./partitions";

// Column positions in the AD facility registry export.
export const REFERENCE_LATITUDE_COLUMN = 11;
export const REFERENCE_LONGITUDE_COLUMN = 12;

const parseCoordinate = (raw: string | undefined): number =>
  raw === undefined ? Number.NaN : Number.parseFloat(raw);

export const parseReferenceLocations = (csvText: string): ReferenceLocation[] => {
  const rows = csvParseRows(csvText.trim());
  const locations: ReferenceLocation[] = [];
  // First row is the header.
  for (const row of rows.slice(1)) {
    const latitude = parseCoordinate(row[REFERENCE_LATITUDE_COLUMN]);
    const longitude = parseCoordinate(row[REFERENCE_LONGITUDE_COLUMN]);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) continue;
    locations.push({ latitude, longitude });
  }
  return locations;
};

export const loadReferenceLocations = async (
  url: string,
  { fetchImpl, signal }: { fetchImpl?: FetchLike; signal?: AbortSignal } = {},
): Promise<ReferenceLocation[]> => {
  const doFetch: FetchLike = fetchImpl ?? ((input, init) => fetch(input, init));

  let response: Response;
  try {
    response = await doFetch(url, { signal });
  } catch (error) {
    if (isAbortError(error)) throw error;
    throw new ReferenceSourceError("network request failed", { cause: error });
  }
  if (!response.ok) {
    throw new ReferenceSourceError(`status ${response.status}`);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    if (isAbortError(error)) throw error;
    throw new ReferenceSourceError("response body could not be read", { cause: error });
  }
  const locations = parseReferenceLocations(text);
  console.info(`[referenceLocations] Parsed ${locations.length} AD facility locations`);
  return locations;
};
