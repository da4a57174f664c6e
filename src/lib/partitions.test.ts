import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ALL_REGIONS, type FetchProgress } from "../types/facility";
import { PartitionNotFoundError, PartitionTransportError } from "./errors";
import {
  fetchAllPartitions,
  fetchPartition,
  fetchRecords,
  getPartitionLabel,
  getPartitionPath,
  type FetchLike,
} from "./partitions";

const BASE_URL = "./leaflet_dmr_json";

const REGIONS = Array.from({ length: 50 }, (_, i) => `R${String(i).padStart(2, "0")}`);

const partitionPayload = (region: string) => [
  {
    npdes: `${region}-001`,
    pollutant: "Nitrogen, total [as N]",
    unit: "mg/L",
    lat: 40,
    lon: -80,
    measurements: [{ date: "06/30/2015", value: "2.5" }],
  },
];

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

const regionFromPath = (path: string): string => {
  const file = path.split("/").pop() ?? "";
  return file.split("_")[0];
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("partition paths", () => {
  it("collapses years before 2009 onto the pre-cutoff label", () => {
    expect(getPartitionLabel("2008")).toBe("PREFY2009");
    expect(getPartitionLabel("2005")).toBe(getPartitionLabel("2008"));
    expect(getPartitionLabel("2009")).toBe("2009");
    expect(getPartitionLabel("2015")).toBe("2015");
  });

  it("builds the label/region/file path", () => {
    expect(getPartitionPath("2005", "OH", BASE_URL)).toBe(
      "./leaflet_dmr_json/PREFY2009/OH/OH_PREFY2009.json",
    );
    expect(getPartitionPath("2015", "TX", BASE_URL)).toBe("./leaflet_dmr_json/2015/TX/TX_2015.json");
  });
});

describe("fetchPartition", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses records and skips malformed entries", async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse([...partitionPayload("OH"), { pollutant: "no id" }, "garbage"]);

    const records = await fetchPartition("2015", "OH", { baseUrl: BASE_URL, fetchImpl });

    expect(records).toEqual([
      {
        id: "OH-001",
        latitude: 40,
        longitude: -80,
        pollutant: "Nitrogen, total [as N]",
        unit: "mg/L",
        measurements: [{ date: "06/30/2015", value: 2.5 }],
      },
    ]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("reports a missing partition as not found, naming region and year", async () => {
    const fetchImpl: FetchLike = async () => new Response("not found", { status: 404 });

    const error = await fetchPartition("2015", "OH", { baseUrl: BASE_URL, fetchImpl }).catch((e: unknown) => e);

    if (!(error instanceof PartitionNotFoundError)) throw error;
    expect(error.message).toBe("No data found for OH in 2015");
    expect(error.status).toBe(404);
    expect(error.kind).toBe("not-found");
  });

  it("reports a network failure as a transport error", async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };

    await expect(fetchPartition("2015", "OH", { baseUrl: BASE_URL, fetchImpl })).rejects.toBeInstanceOf(
      PartitionTransportError,
    );
  });

  it("rejects a payload that is not an array", async () => {
    const fetchImpl: FetchLike = async () => jsonResponse({ npdes: "OH-001" });

    await expect(fetchPartition("2015", "OH", { baseUrl: BASE_URL, fetchImpl })).rejects.toThrow(
      "Could not load data for OH in 2015: malformed partition",
    );
  });
});

describe("fetchAllPartitions", () => {
  it("merges successful partitions in region order and treats 404s as empty", async () => {
    const missing = new Set(["R03", "R10", "R11", "R27", "R40", "R48", "R49"]);
    const requested: string[] = [];
    const fetchImpl: FetchLike = async (path) => {
      requested.push(path);
      const region = regionFromPath(path);
      // Settle out of order
      await sleep((REGIONS.indexOf(region) * 7) % 5);
      if (missing.has(region)) return new Response("", { status: 404 });
      return jsonResponse(partitionPayload(region));
    };
    const progress: FetchProgress[] = [];

    const records = await fetchAllPartitions("2015", REGIONS, {
      baseUrl: BASE_URL,
      fetchImpl,
      onProgress: (p) => progress.push(p),
    });

    expect(requested).toHaveLength(50);
    expect(records.map((r) => r.id)).toEqual(
      REGIONS.filter((region) => !missing.has(region)).map((region) => `${region}-001`),
    );
    expect(progress[0]).toEqual({ completed: 0, total: 50 });
    expect(progress[progress.length - 1]).toEqual({ completed: 50, total: 50 });
    expect(progress.map((p) => p.completed)).toEqual(Array.from({ length: 51 }, (_, i) => i));
  });

  it("rejects on the first transport error without waiting for stalled partitions", async () => {
    const signals: AbortSignal[] = [];
    const fetchImpl: FetchLike = (path, init) => {
      if (init?.signal) signals.push(init.signal);
      if (regionFromPath(path) === "A") return Promise.reject(new TypeError("fetch failed"));
      return new Promise<Response>(() => {});
    };
    const progress: FetchProgress[] = [];

    const error = await fetchAllPartitions("2015", ["A", "B"], {
      baseUrl: BASE_URL,
      fetchImpl,
      onProgress: (p) => progress.push(p),
    }).catch((e: unknown) => e);

    if (!(error instanceof PartitionTransportError)) throw error;
    expect(error.message).toBe("Could not load data for A in 2015: network request failed");
    expect(signals).toHaveLength(2);
    expect(signals.every((s) => s.aborted)).toBe(true);
    expect(progress).toEqual([{ completed: 0, total: 2 }]);
  });

  it("stops reporting progress once a transport error has failed the request", async () => {
    const fetchImpl: FetchLike = async (path) => {
      const region = regionFromPath(path);
      if (region === "R05") throw new TypeError("fetch failed");
      await sleep(2);
      return jsonResponse(partitionPayload(region));
    };
    const progress: FetchProgress[] = [];

    const error = await fetchAllPartitions("2015", REGIONS, {
      baseUrl: BASE_URL,
      fetchImpl,
      onProgress: (p) => progress.push(p),
    }).catch((e: unknown) => e);
    await sleep(10);

    expect(error).toBeInstanceOf(PartitionTransportError);
    expect(progress).toEqual([{ completed: 0, total: 50 }]);
  });

  it("aborts in-flight partitions when the caller aborts", async () => {
    const abortError = () => Object.assign(new Error("The operation was aborted."), { name: "AbortError" });
    const fetchImpl: FetchLike = (_path, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(abortError()), { once: true });
      });
    const caller = new AbortController();

    const pending = fetchAllPartitions("2015", ["OH", "KY"], {
      baseUrl: BASE_URL,
      fetchImpl,
      signal: caller.signal,
    }).catch((e: unknown) => e);
    caller.abort();
    const error = await pending;

    expect(error instanceof Error ? error.name : "").toBe("AbortError");
  });

  it("fails when no region has a partition for the year", async () => {
    const fetchImpl: FetchLike = async () => new Response("", { status: 404 });

    await expect(
      fetchAllPartitions("2015", ["OH", "KY"], { baseUrl: BASE_URL, fetchImpl }),
    ).rejects.toThrow("No data found for all regions in 2015");
  });
});

describe("fetchRecords", () => {
  it("fans out over every region for the all-regions sentinel", async () => {
    const requested: string[] = [];
    const fetchImpl: FetchLike = async (path) => {
      requested.push(path);
      return jsonResponse(partitionPayload(regionFromPath(path)));
    };

    const records = await fetchRecords({ year: "2008", region: ALL_REGIONS }, ["OH", "KY"], {
      baseUrl: BASE_URL,
      fetchImpl,
    });

    expect(requested).toEqual([
      "./leaflet_dmr_json/PREFY2009/OH/OH_PREFY2009.json",
      "./leaflet_dmr_json/PREFY2009/KY/KY_PREFY2009.json",
    ]);
    expect(records.map((r) => r.id)).toEqual(["OH-001", "KY-001"]);
  });

  it("loads a single region with one-step progress", async () => {
    const fetchImpl: FetchLike = async (path) => jsonResponse(partitionPayload(regionFromPath(path)));
    const progress: FetchProgress[] = [];

    const records = await fetchRecords({ year: "2015", region: "OH" }, ["OH", "KY"], {
      baseUrl: BASE_URL,
      fetchImpl,
      onProgress: (p) => progress.push(p),
    });

    expect(records.map((r) => r.id)).toEqual(["OH-001"]);
    expect(progress).toEqual([
      { completed: 0, total: 1 },
      { completed: 1, total: 1 },
    ]);
  });

  it("surfaces a missing single-region partition as an error", async () => {
    const fetchImpl: FetchLike = async () => new Response("", { status: 404 });

    await expect(
      fetchRecords({ year: "2015", region: "OH" }, ["OH"], { baseUrl: BASE_URL, fetchImpl }),
    ).rejects.toBeInstanceOf(PartitionNotFoundError);
  });
});
