import { ALL_REGIONS, type FacilityRecord, type FetchProgress } from "../types/facility";
import { PartitionNotFoundError, PartitionTransportError, isAbortError } from "./errors";
import { parseFacilityRecords } from "./facilityRecords";

// The DMR export bundles every fiscal year before FY2009 into one file.
export const PARTITION_CUTOFF_YEAR = 2009;
export const PRE_CUTOFF_LABEL = "PREFY2009";

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface PartitionFetchOptions {
  baseUrl: string;
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
  onProgress?: (progress: FetchProgress) => void;
  /** Log each partition settlement */
  verbose?: boolean;
}

export interface RecordsQuery {
  year: string;
  /** Region code or ALL_REGIONS */
  region: string;
}

export const getPartitionLabel = (year: string): string => {
  const yearAsNumber = Number.parseInt(year, 10);
  if (Number.isFinite(yearAsNumber) && yearAsNumber < PARTITION_CUTOFF_YEAR) {
    return PRE_CUTOFF_LABEL;
  }
  return year;
};

export const getPartitionPath = (year: string, region: string, baseUrl: string): string => {
  const label = getPartitionLabel(year);
  return `${baseUrl}/${label}/${region}/${region}_${label}.json`;
};

const resolveFetch = (fetchImpl?: FetchLike): FetchLike => {
  if (fetchImpl) return fetchImpl;
  return (input, init) => fetch(input, init);
};

export const fetchPartition = async (
  year: string,
  region: string,
  { baseUrl, fetchImpl, signal }: Pick<PartitionFetchOptions, "baseUrl" | "fetchImpl" | "signal">,
): Promise<FacilityRecord[]> => {
  const path = getPartitionPath(year, region, baseUrl);
  const doFetch = resolveFetch(fetchImpl);

  let response: Response;
  try {
    response = await doFetch(path, { signal });
  } catch (error) {
    if (isAbortError(error)) throw error;
    throw new PartitionTransportError(region, year, "network request failed", { cause: error });
  }

  if (!response.ok) {
    throw new PartitionNotFoundError(region, year, response.status);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    if (isAbortError(error)) throw error;
    throw new PartitionTransportError(region, year, "response was not valid JSON", { cause: error });
  }

  if (!Array.isArray(payload)) {
    throw new PartitionTransportError(region, year, "malformed partition");
  }

  const { records, skipped } = parseFacilityRecords(payload);
  if (skipped > 0) {
    console.warn(`[partitions] Skipped ${skipped} malformed records in ${path}`);
  }
  return records;
};

/**
 * Fetch every region's partition for a year and merge them in region order.
 *
 * A missing partition counts as "no data for that region". Any other failure
 * rejects immediately and aborts the sibling requests; progress stops there.
 */
export const fetchAllPartitions = async (
  year: string,
  regions: readonly string[],
  { baseUrl, fetchImpl, signal, onProgress, verbose = false }: PartitionFetchOptions,
): Promise<FacilityRecord[]> => {
  const total = regions.length;
  let completed = 0;
  let stopped = false;
  onProgress?.({ completed, total });

  const controller = new AbortController();
  const abortSiblings = () => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener("abort", abortSiblings, { once: true });

  let failFast: (error: unknown) => void = () => {};
  const firstFailure = new Promise<never>((_resolve, reject) => {
    failFast = reject;
  });

  const settle = (region: string) => {
    if (stopped) return;
    completed += 1;
    if (verbose) console.info(`[partitions] ${region} ${year} settled (${completed}/${total})`);
    onProgress?.({ completed, total });
  };

  const requests = regions.map((region) =>
    fetchPartition(year, region, { baseUrl, fetchImpl, signal: controller.signal }).then(
      (records): FacilityRecord[] | null => {
        settle(region);
        return records;
      },
      (error: unknown): null => {
        if (error instanceof PartitionNotFoundError) {
          settle(region);
          return null;
        }
        if (!stopped) {
          stopped = true;
          controller.abort();
          failFast(error);
        }
        return null;
      },
    ),
  );

  let outcomes: Array<FacilityRecord[] | null>;
  try {
    outcomes = await Promise.race([Promise.all(requests), firstFailure]);
  } finally {
    signal?.removeEventListener("abort", abortSiblings);
  }

  const merged: FacilityRecord[] = [];
  let found = 0;
  for (const records of outcomes) {
    if (!records) continue;
    found += 1;
    merged.push(...records);
  }

  if (total > 0 && found === 0) {
    throw new PartitionNotFoundError("all regions", year, null);
  }

  return merged;
};

export const fetchRecords = async (
  { year, region }: RecordsQuery,
  regions: readonly string[],
  options: PartitionFetchOptions,
): Promise<FacilityRecord[]> => {
  if (region === ALL_REGIONS) {
    return fetchAllPartitions(year, regions, options);
  }

  options.onProgress?.({ completed: 0, total: 1 });
  const records = await fetchPartition(year, region, options);
  options.onProgress?.({ completed: 1, total: 1 });
  return records;
};
