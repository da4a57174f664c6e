import { describe, expect, it } from "vitest";

import type { FacilityRecord, ReferenceLocation } from "../types/facility";
import {
  buildGridIndex,
  classifyFacilities,
  findNearReference,
  hasFiniteCoordinates,
  isWithinTolerance,
} from "./proximity";

const facility = (id: string, latitude: number | null, longitude: number | null): FacilityRecord => ({
  id,
  latitude,
  longitude,
  pollutant: "Nitrogen, total [as N]",
  unit: "mg/L",
  measurements: [{ date: "06/30/2015", value: 1 }],
});

// Reference answer: every candidate against every reference.
const naiveClassify = (
  candidates: readonly FacilityRecord[],
  references: readonly ReferenceLocation[],
): Set<string> => {
  const matched = new Set<string>();
  const usable = references.filter((r) => hasFiniteCoordinates(r));
  for (const candidate of candidates) {
    if (!hasFiniteCoordinates(candidate)) continue;
    if (usable.some((r) => isWithinTolerance(candidate, r))) matched.add(candidate.id);
  }
  return matched;
};

// mulberry32, so the generated point clouds are the same on every run
const seededRandom = (seed: number) => {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

describe("proximity matcher", () => {
  it("matches a facility within the per-axis tolerance of a reference", () => {
    const records = [facility("OH001", 41.5, -81.5), facility("OH002", null, null)];
    const references = [{ latitude: 41.501, longitude: -81.499 }];
    expect([...classifyFacilities(records, references)]).toEqual(["OH001"]);
  });

  it("finds references across a grid cell boundary", () => {
    // 41.5049 rounds into cell 4150, 41.5051 into cell 4151
    const records = [facility("A", 41.5049, -81.5)];
    const references = [{ latitude: 41.5051, longitude: -81.5 }];
    expect(classifyFacilities(records, references).has("A")).toBe(true);
  });

  it("does not match when only one axis is within tolerance", () => {
    const records = [facility("A", 41.5, -81.5)];
    const references = [{ latitude: 41.5, longitude: -81.52 }];
    expect(classifyFacilities(records, references).size).toBe(0);
  });

  it("returns an empty set for an empty reference set", () => {
    const records = [facility("A", 41.5, -81.5)];
    expect(classifyFacilities(records, []).size).toBe(0);
    expect(buildGridIndex([]).size).toBe(0);
  });

  it("skips references and candidates without finite coordinates", () => {
    const references = [
      { latitude: Number.NaN, longitude: -81.5 },
      { latitude: 41.5, longitude: Number.POSITIVE_INFINITY },
    ];
    const index = buildGridIndex(references);
    expect(index.size).toBe(0);
    expect(findNearReference([facility("A", null, -81.5)], buildGridIndex([{ latitude: 41.5, longitude: -81.5 }])).size).toBe(0);
  });

  it("agrees with the naive matcher on random point clouds", () => {
    const random = seededRandom(20240601);
    for (let trial = 0; trial < 20; trial++) {
      const references: ReferenceLocation[] = Array.from({ length: 40 + trial * 10 }, () => ({
        latitude: 40 + random() * 0.5,
        longitude: -82 + random() * 0.5,
      }));
      const candidates = Array.from({ length: 300 }, (_, i) =>
        i % 25 === 0
          ? facility(`C${trial}-${i}`, null, null)
          : facility(`C${trial}-${i}`, 40 + random() * 0.5, -82 + random() * 0.5),
      );
      expect(classifyFacilities(candidates, references)).toEqual(naiveClassify(candidates, references));
    }
  });

  it("agrees with the naive matcher when either side is empty", () => {
    const candidates = [facility("A", 41.5, -81.5)];
    const references = [{ latitude: 41.5, longitude: -81.5 }];
    expect(classifyFacilities([], references)).toEqual(naiveClassify([], references));
    expect(classifyFacilities(candidates, [])).toEqual(naiveClassify(candidates, []));
    expect(classifyFacilities([], [])).toEqual(new Set());
  });
});
